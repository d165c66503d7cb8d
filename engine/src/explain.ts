/**
 * Pick Feedback Engine - Explainability
 * Human-readable reasons, market display strings and stage reports
 */

import { formatAmericanOdds } from './odds';
import { roundTo } from './math';
import type { MarketDisplay, Market, MetricsSnapshot, OddsRecord, PredictionBoard, PricingMode } from './types';

/**
 * Market display strings, e.g. "Bears:-150 | Packers:+130"
 */
export function buildMarketDisplay(record: OddsRecord): MarketDisplay {
    const ml = record.moneylineA !== null || record.moneylineB !== null
        ? `${record.sideA}:${formatAmericanOdds(record.moneylineA)} | ${record.sideB}:${formatAmericanOdds(record.moneylineB)}`
        : '';

    const ats = record.spreadA || record.spreadB
        ? `${record.sideA} ${formatPoint(record.spreadA?.point ?? null)} (${formatAmericanOdds(record.spreadA?.price)}) | ` +
          `${record.sideB} ${formatPoint(record.spreadB?.point ?? null)} (${formatAmericanOdds(record.spreadB?.price)})`
        : '';

    const ou = record.total
        ? `O/U ${record.total.point ?? 'n/a'}: Over ${formatAmericanOdds(record.total.overPrice)} | Under ${formatAmericanOdds(record.total.underPrice)}`
        : '';

    return { ml, ats, ou };
}

export function formatPoint(point: number | null): string {
    if (point === null) return 'n/a';
    return point > 0 ? `+${point}` : `${point}`;
}

/**
 * Free-text reason stored alongside a prediction
 */
export function buildReason(market: Market, pricing: PricingMode, probability: number): string {
    const pct = roundTo(probability * 100, 1);
    const label = market === 'MONEYLINE' ? 'Moneyline' : market === 'SPREAD' ? 'Spread' : 'Total';
    if (pricing === 'BOTH') {
        return `${label}: market no-vig probability ${pct}%`;
    }
    return `${label}: single-side price, raw implied probability ${pct}%`;
}

/**
 * One-line description of a pick for logs and boards
 */
export function describePick(pick: string, market: Market, pickPoint: number | null): string {
    if (market === 'MONEYLINE') return `${pick} (ML)`;
    if (market === 'SPREAD') return `${pick} ${formatPoint(pickPoint)} (ATS)`;
    return pickPoint === null ? `${pick} (O/U)` : `${pick} ${pickPoint} (O/U)`;
}

/**
 * Print the prediction board to the console
 */
export function printBoardSummary(board: PredictionBoard): void {
    console.log('\n' + '='.repeat(60));
    console.log(`Prediction Board - ${board.generatedAt}`);
    console.log('='.repeat(60));

    for (const s of board.sports) {
        const status = s.feedError ? `feed unavailable (${s.feedError})` : `fetched=${s.fetched} predicted=${s.predicted}`;
        console.log(`  ${s.sport.padEnd(6)} ${status} rejected=${s.rejected} abstained=${s.abstained} skipped=${s.skipped}`);
    }

    const ranked = [...board.predictions].sort((a, b) => b.edge - a.edge);
    if (ranked.length === 0) {
        console.log('\n  no events processed');
    }
    for (const p of ranked.slice(0, 10)) {
        const flags = `${p.lockFlag ? ' [LOCK]' : ''}${p.upsetFlag ? ' [UPSET]' : ''}`;
        console.log(
            `  ${p.sport.padEnd(6)} ${describePick(p.pick, p.market, p.pickPoint)} ` +
            `conf=${p.confidence.toFixed(1)} edge=${p.edge.toFixed(2)}${flags}`
        );
    }

    console.log('='.repeat(60) + '\n');
}

/**
 * Print a tuner run
 */
export function printMetricsSummary(snapshot: MetricsSnapshot): void {
    console.log('\n' + '='.repeat(60));
    console.log(`Feedback Tuner - ${snapshot.timestamp}`);
    console.log('='.repeat(60));
    console.log(`  Record: ${snapshot.wins}-${snapshot.losses}-${snapshot.pushes} (decided ${snapshot.decided})`);
    console.log(`  Win rate: ${snapshot.winRate.toFixed(1)}%  ROI: ${snapshot.roiPercent.toFixed(1)}%`);
    console.log(`  Avg edge: ${snapshot.avgEdge.toFixed(2)}  Avg confidence: ${snapshot.avgConfidence.toFixed(1)}`);
    console.log(
        `  Adjust factor: ${snapshot.adjustFactorBefore.toFixed(4)} -> ${snapshot.adjustFactorAfter.toFixed(4)} (${snapshot.direction})`
    );
    console.log('='.repeat(60) + '\n');
}
