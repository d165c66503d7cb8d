/**
 * Pick Feedback Engine - Index
 * Public API exports
 */

// Types
export * from './types';
export * from './errors';

// Configuration
export { CONFIG, defaultConfiguration } from './config';

// Math utilities
export * from './math';

// Core modules
export * from './odds';
export * from './pickEngine';
export * from './settlement';
export * from './tuner';

// Sanity
export * from './sanity';

// Explainability
export * from './explain';

// Orchestration
export { runGenerate, runSettle, runLearn, runCycle } from './cycle';
export type {
    CycleDeps,
    CycleOptions,
    CycleStage,
    CycleSummary,
    GenerateSummary,
    LearnSummary,
    SettleSummary,
    SettleSportSummary,
    StageFailure,
} from './cycle';
