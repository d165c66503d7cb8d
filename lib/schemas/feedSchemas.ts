/**
 * feedSchemas.ts
 * Zod schemas for feed payloads, validated at the boundary into typed records.
 *
 * Architecture:
 * ├─ OddsRecordInputSchema   — logical odds row (file feeds, fixtures)
 * ├─ ResultRecordInputSchema — logical final-score row
 * ├─ OddsApiEventSchema      — The Odds API v4 /odds element
 * └─ OddsApiScoreSchema      — The Odds API v4 /scores element
 *
 * Odds values stay loose (number | string | null): the normalizer decides
 * what is priceable, so "+130" or "" never fail a whole record here.
 */

import { z } from 'zod';
import { SPORTS } from '../../engine/src/types';
import type { OddsRecord, ResultRecord, Sport } from '../../engine/src/types';

// ═══════════════════════════════════════════════════════════════════════════
// §1  PRIMITIVES
// ═══════════════════════════════════════════════════════════════════════════

const isSport = (value: string): value is Sport => SPORTS.some(s => s === value);

export const SportSchema = z
    .string()
    .trim()
    .toUpperCase()
    .refine(isSport, { message: `expected one of ${SPORTS.join('|')}` });

const OddsValueSchema = z.union([z.number(), z.string(), z.null()]).optional().transform(v => v ?? null);

const OptionalPointSchema = z
    .union([z.number(), z.string(), z.null()])
    .optional()
    .transform(v => {
        if (v === null || v === undefined) return null;
        if (typeof v === 'number') return Number.isFinite(v) ? v : null;
        const t = v.trim();
        if (t === '') return null;
        const n = Number(t);
        return Number.isFinite(n) ? n : null;
    });

const OptionalTimeSchema = z
    .string()
    .nullish()
    .transform(v => (v && !Number.isNaN(Date.parse(v)) ? v : null));

const ScoreValueSchema = z.union([z.number(), z.string(), z.null()]).optional().transform(v => v ?? null);

// ═══════════════════════════════════════════════════════════════════════════
// §2  LOGICAL RECORDS
// ═══════════════════════════════════════════════════════════════════════════

const SpreadInputSchema = z.object({
    point: OptionalPointSchema,
    price: OddsValueSchema,
});

export const OddsRecordInputSchema = z.object({
    event_id: z.string().trim().min(1),
    sport: SportSchema,
    commence_time: OptionalTimeSchema,
    side_a_name: z.string().trim().min(1),
    side_b_name: z.string().trim().min(1),
    side_a_moneyline: OddsValueSchema,
    side_b_moneyline: OddsValueSchema,
    spread_a: SpreadInputSchema.nullish(),
    spread_b: SpreadInputSchema.nullish(),
    total_point: OptionalPointSchema,
    over_price: OddsValueSchema,
    under_price: OddsValueSchema,
});

export type OddsRecordInput = z.input<typeof OddsRecordInputSchema>;

export function toOddsRecord(input: z.output<typeof OddsRecordInputSchema>): OddsRecord {
    const hasTotal = input.total_point !== null || input.over_price !== null || input.under_price !== null;
    return {
        eventId: input.event_id,
        sport: input.sport,
        commenceTime: input.commence_time,
        sideA: input.side_a_name,
        sideB: input.side_b_name,
        moneylineA: input.side_a_moneyline,
        moneylineB: input.side_b_moneyline,
        spreadA: input.spread_a ?? null,
        spreadB: input.spread_b ?? null,
        total: hasTotal
            ? { point: input.total_point, overPrice: input.over_price, underPrice: input.under_price }
            : null,
    };
}

const ScoreLineSchema = z.object({
    name: z.string(),
    score: ScoreValueSchema,
});

export const ResultRecordInputSchema = z.object({
    sport: SportSchema,
    home_name: z.string().trim().min(1),
    away_name: z.string().trim().min(1),
    commence_time: OptionalTimeSchema,
    completed: z.boolean().optional(),
    scores: z.array(ScoreLineSchema).nullish(),
});

export type ResultRecordInput = z.input<typeof ResultRecordInputSchema>;

function scoreFor(scores: { name: string; score: number | string | null }[], team: string): number | string | null {
    const key = team.trim().toLowerCase();
    return scores.find(s => s.name.trim().toLowerCase() === key)?.score ?? null;
}

/**
 * Incomplete games map to null and are ignored by the feed
 */
export function toResultRecord(input: z.output<typeof ResultRecordInputSchema>): ResultRecord | null {
    if (input.completed === false) return null;
    const scores = input.scores ?? [];
    return {
        sport: input.sport,
        homeName: input.home_name,
        awayName: input.away_name,
        homeScore: scoreFor(scores, input.home_name),
        awayScore: scoreFor(scores, input.away_name),
        commenceTime: input.commence_time,
    };
}

// ═══════════════════════════════════════════════════════════════════════════
// §3  THE ODDS API v4
// ═══════════════════════════════════════════════════════════════════════════

const OddsApiOutcomeSchema = z.object({
    name: z.string(),
    price: z.number().nullish(),
    point: z.number().nullish(),
});

const OddsApiMarketSchema = z.object({
    key: z.string(),
    outcomes: z.array(OddsApiOutcomeSchema),
});

const OddsApiBookmakerSchema = z.object({
    key: z.string(),
    title: z.string().optional(),
    markets: z.array(OddsApiMarketSchema),
});

export const OddsApiEventSchema = z.object({
    id: z.string().min(1),
    sport_key: z.string().optional(),
    commence_time: z.string().nullish(),
    home_team: z.string().min(1),
    away_team: z.string().min(1),
    bookmakers: z.array(OddsApiBookmakerSchema).default([]),
});

export type OddsApiEvent = z.output<typeof OddsApiEventSchema>;

export const OddsApiScoreSchema = z.object({
    id: z.string(),
    commence_time: z.string().nullish(),
    completed: z.boolean().default(false),
    home_team: z.string().min(1),
    away_team: z.string().min(1),
    scores: z.array(ScoreLineSchema).nullish(),
});

export type OddsApiScore = z.output<typeof OddsApiScoreSchema>;
