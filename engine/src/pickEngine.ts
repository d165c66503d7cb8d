/**
 * Pick Feedback Engine - Pick Engine
 * Normalized odds + Configuration -> Predictions with edge, confidence and flags
 */

import { CONFIG } from './config';
import { InvalidRecordError, errorMessage } from './errors';
import { buildMarketDisplay, buildReason } from './explain';
import { normalizeOddsRecord } from './odds';
import type {
    Configuration,
    EngineLogger,
    Market,
    NormalizedOddsRecord,
    OddsRecord,
    Prediction,
    TwoWayProbabilities,
} from './types';

export interface SidePick {
    side: 'A' | 'B';
    probability: number;
}

export interface PickFlags {
    lockFlag: boolean;
    upsetFlag: boolean;
}

export interface SkippedEvent {
    eventId: string;
    error: string;
}

export interface PickBatchResult {
    predictions: Prediction[];
    /** Events with no priceable market at all */
    abstained: string[];
    skipped: SkippedEvent[];
}

export interface PickBatchOptions {
    createdAt?: string;
    /** Restrict locks to the top LOCK_LIMIT predictions by edge */
    capLocks?: boolean;
    logger?: EngineLogger;
}

/**
 * Choose a side from two-way probabilities.
 * Ties break toward side A; a single priced side is taken directly.
 */
export function chooseSide(probs: TwoWayProbabilities): SidePick | null {
    switch (probs.pricing) {
        case 'BOTH':
            if (probs.normA === null || probs.normB === null) return null;
            return probs.normA >= probs.normB
                ? { side: 'A', probability: probs.normA }
                : { side: 'B', probability: probs.normB };
        case 'SIDE_A':
            return probs.normA === null ? null : { side: 'A', probability: probs.normA };
        case 'SIDE_B':
            return probs.normB === null ? null : { side: 'B', probability: probs.normB };
        case 'NONE':
            return null;
    }
}

/**
 * Distance from a coin flip, scaled by the tunable factor. Always >= 0.
 */
export function computeEdge(probability: number, adjustFactor: number): number {
    return Math.abs(probability - CONFIG.COIN_FLIP) * 100 * Math.abs(adjustFactor);
}

export function computeConfidence(probability: number): number {
    return probability * 100;
}

export function computeFlags(edge: number, confidence: number, config: Configuration): PickFlags {
    return {
        lockFlag: edge >= config.lockEdgeThreshold && confidence >= config.lockConfidenceThreshold,
        upsetFlag: edge >= config.upsetEdgeThreshold && confidence < CONFIG.UPSET_CONFIDENCE_CEILING,
    };
}

/**
 * Structural checks an odds record must pass before pricing
 */
export function validateOddsRecord(record: OddsRecord): string[] {
    const problems: string[] = [];
    const a = record.sideA.trim();
    const b = record.sideB.trim();

    if (!record.eventId.trim()) problems.push('missing event id');
    if (!a) problems.push('missing side A name');
    if (!b) problems.push('missing side B name');
    if (a && b && a.toLowerCase() === b.toLowerCase()) problems.push(`side names are identical ("${a}")`);

    return problems;
}

/**
 * Price a single normalized record. Returns one prediction per priceable market.
 */
export function predictRecord(
    normalized: NormalizedOddsRecord,
    config: Configuration,
    createdAt: string
): Prediction[] {
    const { record } = normalized;
    const display = buildMarketDisplay(record);
    const predictions: Prediction[] = [];

    const build = (
        market: Market,
        probs: TwoWayProbabilities,
        pickFor: (side: 'A' | 'B') => { pick: string; pickPoint: number | null } | null
    ): void => {
        const chosen = chooseSide(probs);
        if (!chosen) return;
        const target = pickFor(chosen.side);
        if (!target) return;

        const edge = computeEdge(chosen.probability, config.adjustFactor);
        const confidence = computeConfidence(chosen.probability);
        const flags = computeFlags(edge, confidence, config);

        predictions.push({
            eventId: record.eventId,
            sport: record.sport,
            market,
            createdAt,
            commenceTime: record.commenceTime,
            sideA: record.sideA,
            sideB: record.sideB,
            pick: target.pick,
            pickPoint: target.pickPoint,
            modelProbability: chosen.probability,
            confidence,
            edge,
            lockFlag: flags.lockFlag,
            upsetFlag: flags.upsetFlag,
            display,
            reason: buildReason(market, probs.pricing, chosen.probability),
            status: 'PENDING',
        });
    };

    build('MONEYLINE', normalized.moneyline, side => ({
        pick: side === 'A' ? record.sideA : record.sideB,
        pickPoint: null,
    }));

    build('SPREAD', normalized.spread, side => {
        const point = side === 'A' ? record.spreadA?.point : record.spreadB?.point;
        if (point === null || point === undefined) return null;
        return { pick: side === 'A' ? record.sideA : record.sideB, pickPoint: point };
    });

    build('TOTAL', normalized.total, side => {
        const point = record.total?.point;
        if (point === null || point === undefined) return null;
        return { pick: side === 'A' ? 'Over' : 'Under', pickPoint: point };
    });

    return predictions;
}

/**
 * Batch policy: rank by edge (desc, stable) and clear the lock flag of every
 * prediction ranked below the limit. Input order is preserved.
 */
export function applyLockLimit(predictions: Prediction[], limit: number = CONFIG.LOCK_LIMIT): Prediction[] {
    const ranked = predictions
        .map((p, index) => ({ edge: p.edge, index }))
        .sort((a, b) => b.edge - a.edge || a.index - b.index);

    const allowed = new Set(ranked.slice(0, Math.max(0, limit)).map(r => r.index));

    return predictions.map((p, index) =>
        p.lockFlag && !allowed.has(index) ? { ...p, lockFlag: false } : p
    );
}

/**
 * Price a batch of odds records. One bad event never aborts the batch.
 */
export function generatePredictions(
    records: OddsRecord[],
    config: Configuration,
    options: PickBatchOptions = {}
): PickBatchResult {
    const createdAt = options.createdAt ?? new Date().toISOString();
    const capLocks = options.capLocks ?? true;

    let predictions: Prediction[] = [];
    const abstained: string[] = [];
    const skipped: SkippedEvent[] = [];

    for (const record of records) {
        try {
            const problems = validateOddsRecord(record);
            if (problems.length > 0) {
                throw new InvalidRecordError(record.eventId, problems);
            }

            const picks = predictRecord(normalizeOddsRecord(record), config, createdAt);
            if (picks.length === 0) {
                abstained.push(record.eventId);
                options.logger?.debug('PickEngine', `Abstained on ${record.eventId}: no priceable market`);
                continue;
            }
            predictions.push(...picks);
        } catch (err) {
            const error = errorMessage(err);
            skipped.push({ eventId: record.eventId, error });
            options.logger?.warn('PickEngine', `Skipped event ${record.eventId}`, error);
        }
    }

    if (capLocks) {
        predictions = applyLockLimit(predictions);
    }

    return { predictions, abstained, skipped };
}
