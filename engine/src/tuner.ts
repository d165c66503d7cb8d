/**
 * Pick Feedback Engine - Feedback Tuner
 * Settled outcomes -> win rate -> one-step nudge of the adjust factor
 */

import { CONFIG } from './config';
import { clamp, mean, roundTo, safeDivide } from './math';
import type {
    Configuration,
    LedgerEntry,
    Market,
    MetricsSnapshot,
    OutcomeCounts,
    TuningDirection,
} from './types';

export interface OutcomeSummary extends OutcomeCounts {
    decided: number;
    winRate: number;
    roiPercent: number;
    avgEdge: number;
    avgConfidence: number;
    byMarket: Record<Market, OutcomeCounts>;
}

export interface TuningResult {
    config: Configuration;
    direction: TuningDirection;
    before: number;
    after: number;
}

const emptyCounts = (): OutcomeCounts => ({ wins: 0, losses: 0, pushes: 0 });

/**
 * Only WIN / LOSS / PUSH rows feed the tuner
 */
export function isGradedEntry(entry: LedgerEntry): boolean {
    return entry.status === 'WIN' || entry.status === 'LOSS' || entry.status === 'PUSH';
}

/**
 * wins / (wins + losses) * 100; 0 when nothing was decided
 */
export function computeWinRate(wins: number, losses: number): number {
    return safeDivide(wins, wins + losses, 0) * 100;
}

export function summarizeOutcomes(entries: LedgerEntry[]): OutcomeSummary {
    const graded = entries.filter(isGradedEntry);
    const byMarket: Record<Market, OutcomeCounts> = {
        MONEYLINE: emptyCounts(),
        SPREAD: emptyCounts(),
        TOTAL: emptyCounts(),
    };
    const totals = emptyCounts();

    for (const entry of graded) {
        const bucket = byMarket[entry.market];
        if (entry.status === 'WIN') { totals.wins++; bucket.wins++; }
        else if (entry.status === 'LOSS') { totals.losses++; bucket.losses++; }
        else { totals.pushes++; bucket.pushes++; }
    }

    const decided = totals.wins + totals.losses;
    const all = decided + totals.pushes;

    return {
        ...totals,
        decided,
        winRate: computeWinRate(totals.wins, totals.losses),
        roiPercent: safeDivide(totals.wins - totals.losses, all, 0) * 100,
        avgEdge: mean(graded.map(e => e.edge)),
        avgConfidence: mean(graded.map(e => e.confidence)),
        byMarket,
    };
}

/**
 * Cold streak (< 60%) dampens, hot streak (> 70%) amplifies, otherwise hold.
 * No decided games leaves the configuration untouched.
 */
export function tuneConfiguration(
    config: Configuration,
    summary: Pick<OutcomeSummary, 'decided' | 'winRate'>,
    now: string
): TuningResult {
    const before = config.adjustFactor;

    if (summary.decided === 0) {
        return { config, direction: 'HOLD', before, after: before };
    }

    let direction: TuningDirection = 'HOLD';
    let after = before;
    if (summary.winRate < CONFIG.COLD_WIN_RATE) {
        direction = 'DOWN';
        after = before * CONFIG.COLD_MULTIPLIER;
    } else if (summary.winRate > CONFIG.HOT_WIN_RATE) {
        direction = 'UP';
        after = before * CONFIG.HOT_MULTIPLIER;
    }
    after = clamp(after, CONFIG.ADJUST_FACTOR_MIN, CONFIG.ADJUST_FACTOR_MAX);
    // Pinned at a bound
    if (after === before) direction = 'HOLD';

    return {
        config: {
            ...config,
            adjustFactor: after,
            lastWinRate: summary.winRate,
            lastUpdate: now,
        },
        direction,
        before,
        after,
    };
}

export function buildMetricsSnapshot(summary: OutcomeSummary, tuning: TuningResult, timestamp: string): MetricsSnapshot {
    return {
        timestamp,
        wins: summary.wins,
        losses: summary.losses,
        pushes: summary.pushes,
        decided: summary.decided,
        winRate: roundTo(summary.winRate, 2),
        roiPercent: roundTo(summary.roiPercent, 2),
        avgEdge: roundTo(summary.avgEdge, 4),
        avgConfidence: roundTo(summary.avgConfidence, 2),
        adjustFactorBefore: tuning.before,
        adjustFactorAfter: tuning.after,
        direction: tuning.direction,
        byMarket: summary.byMarket,
    };
}

/**
 * Rows settled after the last tuning pass (standalone learn command)
 */
export function settledSince(entries: LedgerEntry[], lastUpdate: string | null): LedgerEntry[] {
    const cutoff = lastUpdate ? Date.parse(lastUpdate) : Number.NaN;
    return entries.filter(e => {
        if (!isGradedEntry(e) || !e.settledAt) return false;
        if (Number.isNaN(cutoff)) return true;
        return Date.parse(e.settledAt) > cutoff;
    });
}
