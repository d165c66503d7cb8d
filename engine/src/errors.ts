/**
 * Pick Feedback Engine - Error Types
 * Recoverable-per-record vs fatal-per-stage failures
 */

/** A single feed record cannot be used; the batch continues without it */
export class InvalidRecordError extends Error {
    constructor(
        public readonly eventId: string,
        public readonly problems: string[],
    ) {
        super(`[record:${eventId || 'unknown'}] ${problems.join('; ')}`);
        this.name = 'InvalidRecordError';
    }
}

/** Ledger / configuration / log could not be written; fatal for the stage */
export class PersistenceError extends Error {
    constructor(
        public readonly target: string,
        message: string,
        options?: { cause?: unknown },
    ) {
        super(`[persist:${target}] ${message}`, options);
        this.name = 'PersistenceError';
    }
}

/** Required runtime setting is missing or invalid */
export class ConfigurationError extends Error {
    constructor(message: string) {
        super(`[ENV] ${message}`);
        this.name = 'ConfigurationError';
    }
}

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
