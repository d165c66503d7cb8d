/**
 * Pick Feedback Engine - Sanity Module
 * Batch-level consistency checks run before a board is published
 */

import type { Prediction } from './types';

export interface SanityResult {
    isValid: boolean;
    errors: string[];
    warnings: string[];
}

/** Edge above this is almost certainly a pricing bug */
const EDGE_WARNING_CEILING = 100;

export function validatePredictionBatch(predictions: Prediction[]): SanityResult {
    const errors: string[] = [];
    const warnings: string[] = [];

    const badConfidence = predictions.filter(p => !(p.confidence >= 0 && p.confidence <= 100));
    if (badConfidence.length > 0) {
        errors.push(`Confidence out of [0,100]: ${badConfidence.length} rows`);
    }

    const badProbability = predictions.filter(p => !(p.modelProbability >= 0 && p.modelProbability <= 1));
    if (badProbability.length > 0) {
        errors.push(`Model probability out of [0,1]: ${badProbability.length} rows`);
    }

    const negativeEdge = predictions.filter(p => !(p.edge >= 0));
    if (negativeEdge.length > 0) {
        errors.push(`Negative or missing edge: ${negativeEdge.length} rows`);
    }

    const missingPick = predictions.filter(p => !p.pick.trim());
    if (missingPick.length > 0) {
        errors.push(`Missing pick: ${missingPick.length} rows`);
    }

    const hugeEdge = predictions.filter(p => p.edge > EDGE_WARNING_CEILING);
    if (hugeEdge.length > 0) {
        warnings.push(`Extremely high edge values: ${hugeEdge.length} rows`);
    }

    // Same matchup priced twice in one batch (different event ids from the feed)
    const seen = new Map<string, number>();
    for (const p of predictions) {
        const key = `${p.sport}|${p.market}|${[p.sideA, p.sideB].map(s => s.toLowerCase()).sort().join('|')}`;
        seen.set(key, (seen.get(key) ?? 0) + 1);
    }
    const dupes = [...seen.values()].filter(n => n > 1).reduce((a, b) => a + b, 0);
    if (dupes > 0) {
        warnings.push(`Duplicate games found: ${dupes} rows`);
    }

    return { isValid: errors.length === 0, errors, warnings };
}
