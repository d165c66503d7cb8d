/**
 * Pick Feedback Engine - Configuration
 * Compiled-in defaults and engine constants in one place
 */

import type { Configuration } from './types';

export const CONFIG = {
    // ============================================================================
    // TUNABLE DEFAULTS (persisted Configuration falls back to these)
    // ============================================================================

    /** Starting multiplier for the raw distance-from-coin-flip signal */
    ADJUST_FACTOR: 0.35,

    /** Lock flag requires edge AND confidence at or above these */
    LOCK_EDGE_THRESHOLD: 0.5,
    LOCK_CONFIDENCE_THRESHOLD: 51.0,

    /** Upset flag requires edge at or above this with confidence under 50 */
    UPSET_EDGE_THRESHOLD: 0.3,

    // ============================================================================
    // PICK ENGINE
    // ============================================================================

    /** Probability of a coin flip; edge measures distance from it */
    COIN_FLIP: 0.5,

    /** Confidence below which a pick counts as contrarian */
    UPSET_CONFIDENCE_CEILING: 50,

    /** Batch policy: at most this many locks, by edge rank */
    LOCK_LIMIT: 5,

    // ============================================================================
    // FEEDBACK TUNER
    // ============================================================================

    /** Win rate (%) under which the factor is dampened */
    COLD_WIN_RATE: 60,

    /** Win rate (%) over which the factor is amplified */
    HOT_WIN_RATE: 70,

    COLD_MULTIPLIER: 0.9,
    HOT_MULTIPLIER: 1.05,

    /** Hard bounds for the tuned factor */
    ADJUST_FACTOR_MIN: 0.05,
    ADJUST_FACTOR_MAX: 2.0,

    /** Most recent metrics snapshots retained */
    METRICS_RETENTION: 30,

    // ============================================================================
    // FEEDS & SETTLEMENT WINDOWS
    // ============================================================================

    /** Ignore odds for events further out than this */
    LOOKAHEAD_DAYS: 3,

    /** Trailing window for final scores */
    RESULTS_DAYS_FROM: 3,

    /** Single fixed timeout for every feed request */
    FEED_TIMEOUT_MS: 15_000,

    // ============================================================================
    // PERSISTENCE
    // ============================================================================

    /** Lock files older than this are considered abandoned */
    LOCK_STALE_MS: 60_000,

    /** How long to wait for a held lock before giving up */
    LOCK_WAIT_MS: 5_000,

    LOCK_POLL_MS: 50,
} as const;

/**
 * Fresh Configuration built from the compiled-in defaults
 */
export function defaultConfiguration(): Configuration {
    return {
        adjustFactor: CONFIG.ADJUST_FACTOR,
        lockEdgeThreshold: CONFIG.LOCK_EDGE_THRESHOLD,
        lockConfidenceThreshold: CONFIG.LOCK_CONFIDENCE_THRESHOLD,
        upsetEdgeThreshold: CONFIG.UPSET_EDGE_THRESHOLD,
        lastWinRate: null,
        lastUpdate: null,
    };
}
