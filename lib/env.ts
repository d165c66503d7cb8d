// lib/env.ts

import dotenv from 'dotenv';
import { z } from 'zod';
import { CONFIG } from '../engine/src/config';
import { ConfigurationError } from '../engine/src/errors';
import { SPORTS } from '../engine/src/types';
import type { Sport } from '../engine/src/types';
import { LOG_LEVELS } from './logger';
import type { LogLevel } from './logger';

export type EnvSource = Record<string, string | undefined>;

/** Load `.env` into process.env; existing variables win */
export function loadDotenv(path?: string): void {
    dotenv.config(path ? { path } : undefined);
}

export function mustEnv(key: string, env: EnvSource = process.env): string {
    const v = env[key];
    if (!v || !v.trim()) throw new ConfigurationError(`${key} is required`);
    return v;
}

export function optEnv(key: string, fallback = '', env: EnvSource = process.env): string {
    return env[key] ?? fallback;
}

const isSport = (value: string): value is Sport => SPORTS.some(s => s === value);
const isLogLevel = (value: string): value is LogLevel => LOG_LEVELS.some(l => l === value);

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

export const SportListSchema = z
    .string()
    .transform((raw, ctx) => {
        const parts = raw.split(',').map(s => s.trim().toUpperCase()).filter(Boolean);
        const sports: Sport[] = [];
        for (const part of parts) {
            if (!isSport(part)) {
                ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unknown sport "${part}"` });
                return z.NEVER;
            }
            if (!sports.includes(part)) sports.push(part);
        }
        if (sports.length === 0) {
            ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'no sports given' });
            return z.NEVER;
        }
        return sports;
    });

export const EnvSchema = z.object({
    ODDS_API_KEY: z.string().trim().min(1).optional(),
    DATA_DIR: z.string().trim().min(1).default('./data'),
    LEDGER_BACKEND: z.enum(['csv', 'supabase']).default('csv'),
    SUPABASE_URL: z.string().trim().url().optional(),
    SUPABASE_SERVICE_ROLE_KEY: z.string().trim().min(1).optional(),
    FEED_TIMEOUT_MS: positiveInt(CONFIG.FEED_TIMEOUT_MS),
    LOOKAHEAD_DAYS: positiveInt(CONFIG.LOOKAHEAD_DAYS),
    RESULTS_DAYS_FROM: positiveInt(CONFIG.RESULTS_DAYS_FROM),
    SPORTS: SportListSchema.optional(),
    LOG_LEVEL: z
        .string()
        .trim()
        .toLowerCase()
        .refine(isLogLevel, { message: `expected one of ${LOG_LEVELS.join('|')}` })
        .optional(),
});

export interface RuntimeSettings {
    oddsApiKey: string | null;
    dataDir: string;
    ledgerBackend: 'csv' | 'supabase';
    supabaseUrl: string | null;
    supabaseServiceRoleKey: string | null;
    feedTimeoutMs: number;
    lookaheadDays: number;
    resultsDaysFrom: number;
    sports: Sport[];
    logLevel: LogLevel;
}

/**
 * Validate runtime settings. Blank variables count as unset.
 */
export function readSettings(env: EnvSource = process.env): RuntimeSettings {
    const cleaned: EnvSource = {};
    for (const [key, value] of Object.entries(env)) {
        if (value !== undefined && value.trim() !== '') cleaned[key] = value;
    }

    const parsed = EnvSchema.safeParse(cleaned);
    if (!parsed.success) {
        const problems = parsed.error.issues.map(i => `${i.path.join('.') || 'env'}: ${i.message}`);
        throw new ConfigurationError(problems.join('; '));
    }

    const e = parsed.data;
    return {
        oddsApiKey: e.ODDS_API_KEY ?? null,
        dataDir: e.DATA_DIR,
        ledgerBackend: e.LEDGER_BACKEND,
        supabaseUrl: e.SUPABASE_URL ?? null,
        supabaseServiceRoleKey: e.SUPABASE_SERVICE_ROLE_KEY ?? null,
        feedTimeoutMs: e.FEED_TIMEOUT_MS,
        lookaheadDays: e.LOOKAHEAD_DAYS,
        resultsDaysFrom: e.RESULTS_DAYS_FROM,
        sports: e.SPORTS ?? [...SPORTS],
        logLevel: e.LOG_LEVEL ?? 'info',
    };
}
