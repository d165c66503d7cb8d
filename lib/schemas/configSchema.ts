/**
 * configSchema.ts
 * Persisted Configuration: snake_case JSON on disk, camelCase in the engine.
 *
 * Each key is validated on its own so one bad value falls back to its
 * default without discarding the rest of the file.
 */

import { z } from 'zod';
import { defaultConfiguration } from '../../engine/src/config';
import type { Configuration } from '../../engine/src/types';

export const ConfigFileSchema = z.record(z.string(), z.unknown());

const finitePositive = z.number().finite().positive();
const finiteNonNegative = z.number().finite().nonnegative();
const isoTimestamp = z.string().refine(v => !Number.isNaN(Date.parse(v)), { message: 'not a timestamp' });

export const CONFIG_KEYS = {
    adjustFactor: { file: 'adjust_factor', schema: finitePositive },
    lockEdgeThreshold: { file: 'lock_edge_threshold', schema: finiteNonNegative },
    lockConfidenceThreshold: { file: 'lock_confidence_threshold', schema: finiteNonNegative.max(100) },
    upsetEdgeThreshold: { file: 'upset_edge_threshold', schema: finiteNonNegative },
    lastWinRate: { file: 'last_win_rate', schema: finiteNonNegative.max(100).nullable() },
    lastUpdate: { file: 'last_update', schema: isoTimestamp.nullable() },
} as const;

export interface ConfigDecodeResult {
    config: Configuration;
    /** Keys that were present but invalid and fell back to defaults */
    invalidKeys: string[];
}

/**
 * Decode the on-disk object. Missing keys take defaults silently;
 * invalid keys take defaults and are reported.
 */
export function decodeConfiguration(raw: Record<string, unknown>): ConfigDecodeResult {
    const defaults = defaultConfiguration();
    const invalidKeys: string[] = [];

    const pick = <T>(file: string, schema: z.ZodType<T>, fallback: T): T => {
        if (!(file in raw)) return fallback;
        const parsed = schema.safeParse(raw[file]);
        if (parsed.success) return parsed.data;
        invalidKeys.push(file);
        return fallback;
    };

    const k = CONFIG_KEYS;
    return {
        config: {
            adjustFactor: pick(k.adjustFactor.file, k.adjustFactor.schema, defaults.adjustFactor),
            lockEdgeThreshold: pick(k.lockEdgeThreshold.file, k.lockEdgeThreshold.schema, defaults.lockEdgeThreshold),
            lockConfidenceThreshold: pick(
                k.lockConfidenceThreshold.file,
                k.lockConfidenceThreshold.schema,
                defaults.lockConfidenceThreshold,
            ),
            upsetEdgeThreshold: pick(k.upsetEdgeThreshold.file, k.upsetEdgeThreshold.schema, defaults.upsetEdgeThreshold),
            lastWinRate: pick(k.lastWinRate.file, k.lastWinRate.schema, defaults.lastWinRate),
            lastUpdate: pick(k.lastUpdate.file, k.lastUpdate.schema, defaults.lastUpdate),
        },
        invalidKeys,
    };
}

/**
 * Encode onto an existing on-disk object; keys this module does not own survive
 */
export function encodeConfiguration(config: Configuration, existing: Record<string, unknown> = {}): Record<string, unknown> {
    const k = CONFIG_KEYS;
    return {
        ...existing,
        [k.adjustFactor.file]: config.adjustFactor,
        [k.lockEdgeThreshold.file]: config.lockEdgeThreshold,
        [k.lockConfidenceThreshold.file]: config.lockConfidenceThreshold,
        [k.upsetEdgeThreshold.file]: config.upsetEdgeThreshold,
        [k.lastWinRate.file]: config.lastWinRate,
        [k.lastUpdate.file]: config.lastUpdate,
    };
}
