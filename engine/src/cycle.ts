/**
 * Pick Feedback Engine - Cycle
 * generate -> settle -> learn, run once per scheduled invocation
 *
 * Each stage takes the Configuration value explicitly; only learn produces a
 * new one, which the next cycle loads.
 */

import { errorMessage } from './errors';
import { applyLockLimit, generatePredictions } from './pickEngine';
import { validatePredictionBatch } from './sanity';
import type { SanityResult } from './sanity';
import { applySettlement, settleEntries } from './settlement';
import type { SettlementCounts } from './settlement';
import { buildMetricsSnapshot, settledSince, summarizeOutcomes, tuneConfiguration } from './tuner';
import type { TuningResult } from './tuner';
import type {
    BoardRepository,
    ConfigRepository,
    Configuration,
    EngineLogger,
    HistoryLedger,
    LedgerEntry,
    MetricsLog,
    MetricsSnapshot,
    OddsFeed,
    Prediction,
    PredictionBoard,
    Sport,
    SportSummary,
} from './types';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface CycleDeps {
    feed: OddsFeed;
    ledger: HistoryLedger;
    configRepo: ConfigRepository;
    metrics: MetricsLog;
    boards: BoardRepository;
    logger: EngineLogger;
    now?: () => Date;
}

export interface CycleOptions {
    sports: Sport[];
    resultsDaysFrom: number;
    /** Re-attempt NO_MATCH rows inside the results window */
    retryNoMatch: boolean;
    capLocks: boolean;
}

export interface GenerateSummary {
    board: PredictionBoard;
    appended: number;
    sanity: SanityResult;
}

export interface SettleSportSummary {
    sport: Sport;
    open: number;
    results: number;
    feedError: string | null;
    counts: SettlementCounts | null;
    written: number;
}

export interface SettleSummary {
    /** Rows graded WIN / LOSS / PUSH in this pass, post-settlement */
    graded: LedgerEntry[];
    sports: SettleSportSummary[];
}

export interface LearnSummary {
    config: Configuration;
    tuning: TuningResult | null;
    snapshot: MetricsSnapshot | null;
}

export type CycleStage = 'generate' | 'settle' | 'learn';

export interface StageFailure {
    stage: CycleStage;
    error: string;
}

export interface CycleSummary {
    generate: GenerateSummary | null;
    settle: SettleSummary | null;
    learn: LearnSummary | null;
    failures: StageFailure[];
}

function clock(deps: CycleDeps): Date {
    return deps.now ? deps.now() : new Date();
}

/**
 * Fetch odds per sport, price them, append to the ledger, publish a board
 */
export async function runGenerate(
    deps: CycleDeps,
    config: Configuration,
    options: CycleOptions
): Promise<GenerateSummary> {
    const { feed, ledger, boards, logger } = deps;
    const generatedAt = clock(deps).toISOString();
    const predictions: Prediction[] = [];
    const sports: SportSummary[] = [];

    logger.info('Generate', `Pricing ${options.sports.length} sports with adjust factor ${config.adjustFactor.toFixed(4)}`);

    for (const sport of options.sports) {
        const odds = await feed.fetchOdds(sport);
        if (!odds.ok) {
            logger.warn('Generate', `${sport}: feed unavailable, skipping`, odds.reason);
            sports.push({ sport, fetched: 0, rejected: 0, predicted: 0, abstained: 0, skipped: 0, feedError: odds.reason });
            continue;
        }

        const batch = generatePredictions(odds.data, config, {
            createdAt: generatedAt,
            capLocks: false,
            logger,
        });
        predictions.push(...batch.predictions);
        sports.push({
            sport,
            fetched: odds.data.length,
            rejected: odds.rejected,
            predicted: batch.predictions.length,
            abstained: batch.abstained.length,
            skipped: batch.skipped.length,
            feedError: null,
        });
        logger.info(
            'Generate',
            `${sport}: fetched=${odds.data.length} rejected=${odds.rejected} predicted=${batch.predictions.length} ` +
            `abstained=${batch.abstained.length} skipped=${batch.skipped.length}`
        );
    }

    // Lock cap is a whole-board policy, applied across sports
    const finalPredictions = options.capLocks ? applyLockLimit(predictions) : predictions;

    const sanity = validatePredictionBatch(finalPredictions);
    for (const e of sanity.errors) logger.error('Generate', `Sanity: ${e}`);
    for (const w of sanity.warnings) logger.warn('Generate', `Sanity: ${w}`);

    const appended = await ledger.append(finalPredictions);
    const board: PredictionBoard = { generatedAt, predictions: finalPredictions, sports };
    await boards.append(board);

    if (finalPredictions.length === 0) {
        logger.info('Generate', 'no events processed');
    } else {
        logger.info('Generate', `Appended ${appended.length} ledger rows, ${finalPredictions.filter(p => p.lockFlag).length} locks`);
    }

    return { board, appended: appended.length, sanity };
}

/**
 * Reconcile open ledger rows against trailing-window final scores
 */
export async function runSettle(deps: CycleDeps, options: CycleOptions): Promise<SettleSummary> {
    const { feed, ledger, logger } = deps;
    const now = clock(deps);
    const settledAt = now.toISOString();
    const window = { from: new Date(now.getTime() - options.resultsDaysFrom * DAY_MS), to: now };
    const graded: LedgerEntry[] = [];
    const sports: SettleSportSummary[] = [];

    for (const sport of options.sports) {
        const open = await ledger.findUnsettled(sport, window, { includeNoMatch: options.retryNoMatch });
        if (open.length === 0) {
            logger.info('Settle', `${sport}: no pending predictions`);
            sports.push({ sport, open: 0, results: 0, feedError: null, counts: null, written: 0 });
            continue;
        }

        const results = await feed.fetchResults(sport, options.resultsDaysFrom);
        if (!results.ok) {
            // Rows stay open; a missing feed is not evidence of a missing game
            logger.warn('Settle', `${sport}: results unavailable, ${open.length} rows left open`, results.reason);
            sports.push({ sport, open: open.length, results: 0, feedError: results.reason, counts: null, written: 0 });
            continue;
        }

        const batch = settleEntries(open, results.data, settledAt);
        const changed = new Set(await ledger.settle(batch.updates));
        const written = changed.size;

        // Rows another run finalized first are not ours to learn from
        const byRow = new Map(batch.updates.map(u => [u.rowId, u]));
        for (const entry of open) {
            const update = byRow.get(entry.rowId);
            if (!update || !changed.has(entry.rowId)) continue;
            const settled = applySettlement(entry, update.outcome, update.settledAt);
            if (settled.status === 'WIN' || settled.status === 'LOSS' || settled.status === 'PUSH') {
                graded.push(settled);
            }
        }

        const c = batch.counts;
        logger.info(
            'Settle',
            `${sport}: open=${open.length} results=${results.data.length} win=${c.wins} loss=${c.losses} ` +
            `push=${c.pushes} no_match=${c.noMatch} error=${c.errors} written=${written}`
        );
        sports.push({ sport, open: open.length, results: results.data.length, feedError: null, counts: c, written });
    }

    if (graded.length === 0) {
        logger.info('Settle', 'No predictions graded this pass');
    }

    return { graded, sports };
}

/**
 * Tune the adjust factor from graded rows.
 * Without an explicit batch, uses rows settled after the last tuning pass.
 */
export async function runLearn(
    deps: CycleDeps,
    config: Configuration,
    graded: LedgerEntry[] | null
): Promise<LearnSummary> {
    const { ledger, configRepo, metrics, logger } = deps;
    const now = clock(deps).toISOString();

    const entries = graded ?? settledSince(await ledger.entries(), config.lastUpdate);
    if (entries.length === 0) {
        logger.info('Learn', 'Nothing to learn: no settled predictions since last update');
        return { config, tuning: null, snapshot: null };
    }

    const summary = summarizeOutcomes(entries);
    if (summary.decided === 0) {
        logger.info('Learn', `No decided games (${summary.pushes} pushes); adjust factor held at ${config.adjustFactor.toFixed(4)}`);
        return { config, tuning: null, snapshot: null };
    }

    const tuning = tuneConfiguration(config, summary, now);
    await configRepo.save(tuning.config);

    const snapshot = buildMetricsSnapshot(summary, tuning, now);
    await metrics.append(snapshot);

    logger.info(
        'Learn',
        `Win rate ${summary.winRate.toFixed(1)}% over ${summary.decided} decided; ` +
        `adjust factor ${tuning.before.toFixed(4)} -> ${tuning.after.toFixed(4)} (${tuning.direction})`
    );

    return { config: tuning.config, tuning, snapshot };
}

/**
 * Full cycle. Stage failures are recorded and logged; later stages still run
 * when they do not depend on the failed one.
 */
export async function runCycle(deps: CycleDeps, options: CycleOptions): Promise<CycleSummary> {
    const { logger } = deps;
    const failures: StageFailure[] = [];
    const config = await deps.configRepo.load();

    let generate: GenerateSummary | null = null;
    try {
        generate = await runGenerate(deps, config, options);
    } catch (err) {
        failures.push({ stage: 'generate', error: errorMessage(err) });
        logger.error('Cycle', 'Generate stage failed', err);
    }

    let settle: SettleSummary | null = null;
    try {
        settle = await runSettle(deps, options);
    } catch (err) {
        failures.push({ stage: 'settle', error: errorMessage(err) });
        logger.error('Cycle', 'Settle stage failed', err);
    }

    let learn: LearnSummary | null = null;
    if (settle) {
        try {
            learn = await runLearn(deps, config, settle.graded);
        } catch (err) {
            failures.push({ stage: 'learn', error: errorMessage(err) });
            logger.error('Cycle', 'Learn stage failed', err);
        }
    } else {
        logger.warn('Cycle', 'Learn stage skipped: settlement did not complete');
    }

    logger.info('Cycle', 'Cycle complete', {
        predictions: generate?.board.predictions.length ?? null,
        appended: generate?.appended ?? null,
        graded: settle?.graded.length ?? null,
        adjustFactor: learn?.config.adjustFactor ?? config.adjustFactor,
        failures: failures.map(f => `${f.stage}: ${f.error}`),
    });

    return { generate, settle, learn, failures };
}
