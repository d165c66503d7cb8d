/**
 * supabaseLedger.ts
 * History ledger in the `pick_ledger` table (see supabase/migrations).
 *
 * Settlement is a conditional update: `result in (PENDING, NO_MATCH)` is part
 * of the filter, so a final row is never touched even by a concurrent writer.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import { PersistenceError } from '../../engine/src/errors';
import { OPEN_STATUSES } from '../../engine/src/types';
import type {
    EngineLogger,
    FindUnsettledOptions,
    HistoryLedger,
    LedgerEntry,
    Prediction,
    SettlementUpdate,
    Sport,
    TimeWindow,
} from '../../engine/src/types';
import { SportSchema } from '../schemas/feedSchemas';
import { isUnsettledIn, toNewEntries } from './ledgerCommon';

export const LEDGER_TABLE = 'pick_ledger';

const PAGE_SIZE = 1000;

export const PickLedgerRowSchema = z.object({
    row_id: z.string(),
    event_id: z.string(),
    market: z.enum(['MONEYLINE', 'SPREAD', 'TOTAL']),
    sport: SportSchema,
    commence_time: z.string().nullable(),
    side_a: z.string(),
    side_b: z.string(),
    pick: z.string(),
    pick_point: z.number().nullable(),
    model_probability: z.number(),
    confidence: z.number(),
    edge: z.number(),
    lock_flag: z.boolean(),
    upset_flag: z.boolean(),
    display_ml: z.string(),
    display_ats: z.string(),
    display_ou: z.string(),
    reason: z.string(),
    created_at: z.string(),
    result: z.enum(['PENDING', 'WIN', 'LOSS', 'PUSH', 'NO_MATCH', 'ERROR']),
    settled_at: z.string().nullable(),
    final_score_a: z.number().nullable(),
    final_score_b: z.number().nullable(),
    settlement_note: z.string(),
});

export type PickLedgerRow = z.infer<typeof PickLedgerRowSchema>;

export function entryToDbRow(entry: LedgerEntry): PickLedgerRow {
    return {
        row_id: entry.rowId,
        event_id: entry.eventId,
        market: entry.market,
        sport: entry.sport,
        commence_time: entry.commenceTime,
        side_a: entry.sideA,
        side_b: entry.sideB,
        pick: entry.pick,
        pick_point: entry.pickPoint,
        model_probability: entry.modelProbability,
        confidence: entry.confidence,
        edge: entry.edge,
        lock_flag: entry.lockFlag,
        upset_flag: entry.upsetFlag,
        display_ml: entry.display.ml,
        display_ats: entry.display.ats,
        display_ou: entry.display.ou,
        reason: entry.reason,
        created_at: entry.createdAt,
        result: entry.status,
        settled_at: entry.settledAt,
        final_score_a: entry.finalScoreA,
        final_score_b: entry.finalScoreB,
        settlement_note: entry.settlementNote,
    };
}

export function dbRowToEntry(row: PickLedgerRow): LedgerEntry {
    return {
        rowId: row.row_id,
        eventId: row.event_id,
        sport: row.sport,
        market: row.market,
        createdAt: row.created_at,
        commenceTime: row.commence_time,
        sideA: row.side_a,
        sideB: row.side_b,
        pick: row.pick,
        pickPoint: row.pick_point,
        modelProbability: row.model_probability,
        confidence: row.confidence,
        edge: row.edge,
        lockFlag: row.lock_flag,
        upsetFlag: row.upset_flag,
        display: { ml: row.display_ml, ats: row.display_ats, ou: row.display_ou },
        reason: row.reason,
        status: row.result,
        settledAt: row.settled_at,
        finalScoreA: row.final_score_a,
        finalScoreB: row.final_score_b,
        settlementNote: row.settlement_note,
    };
}

interface SelectResponse {
    data: unknown[] | null;
    error: { message: string } | null;
}

/**
 * PostgREST logic tree for the settlement window: commence_time when known,
 * else created_at. Timestamps are quoted since they contain `:` and `.`.
 */
export function windowFilter(window: TimeWindow): string {
    const from = `"${window.from.toISOString()}"`;
    const to = `"${window.to.toISOString()}"`;
    return [
        `and(commence_time.gte.${from},commence_time.lte.${to})`,
        `and(commence_time.is.null,created_at.gte.${from},created_at.lte.${to})`,
    ].join(',');
}

export class SupabaseHistoryLedger implements HistoryLedger {
    constructor(
        private readonly supabase: SupabaseClient,
        private readonly logger: EngineLogger,
    ) {}

    private decode(rows: unknown[]): LedgerEntry[] {
        const entries: LedgerEntry[] = [];
        let undecodable = 0;
        for (const row of rows) {
            const parsed = PickLedgerRowSchema.safeParse(row);
            if (parsed.success) entries.push(dbRowToEntry(parsed.data));
            else undecodable++;
        }
        if (undecodable > 0) {
            this.logger.warn('Ledger', `${undecodable} ${LEDGER_TABLE} rows could not be decoded and were ignored`);
        }
        return entries;
    }

    async append(predictions: Prediction[]): Promise<LedgerEntry[]> {
        const entries = toNewEntries(predictions);
        if (entries.length === 0) return entries;

        const { error } = await this.supabase.from(LEDGER_TABLE).insert(entries.map(entryToDbRow));
        if (error) {
            throw new PersistenceError(LEDGER_TABLE, `insert failed: ${error.message}`, { cause: error });
        }
        return entries;
    }

    /** Reads every page of a seq-ordered select; PostgREST caps each response */
    private async selectAll(page: (from: number, to: number) => PromiseLike<SelectResponse>): Promise<unknown[]> {
        const rows: unknown[] = [];
        for (let from = 0; ; from += PAGE_SIZE) {
            const { data, error } = await page(from, from + PAGE_SIZE - 1);
            if (error) {
                throw new PersistenceError(LEDGER_TABLE, `select failed: ${error.message}`, { cause: error });
            }
            const batch: unknown[] = data ?? [];
            rows.push(...batch);
            if (batch.length < PAGE_SIZE) break;
        }
        return rows;
    }

    async entries(): Promise<LedgerEntry[]> {
        const rows = await this.selectAll((from, to) =>
            this.supabase
                .from(LEDGER_TABLE)
                .select('*')
                .order('seq', { ascending: true })
                .range(from, to)
        );
        return this.decode(rows);
    }

    async findUnsettled(sport: Sport, window: TimeWindow, options: FindUnsettledOptions = {}): Promise<LedgerEntry[]> {
        const statuses = options.includeNoMatch ? [...OPEN_STATUSES] : ['PENDING'];
        const rows = await this.selectAll((from, to) =>
            this.supabase
                .from(LEDGER_TABLE)
                .select('*')
                .eq('sport', sport)
                .in('result', statuses)
                .or(windowFilter(window))
                .order('seq', { ascending: true })
                .range(from, to)
        );
        return this.decode(rows).filter(e => isUnsettledIn(e, sport, window, options));
    }

    async settle(updates: SettlementUpdate[]): Promise<string[]> {
        const changed: string[] = [];
        for (const update of updates) {
            const { outcome } = update;
            const { data, error } = await this.supabase
                .from(LEDGER_TABLE)
                .update({
                    result: outcome.status,
                    settled_at: update.settledAt,
                    final_score_a: outcome.scoreA,
                    final_score_b: outcome.scoreB,
                    settlement_note: outcome.reason,
                })
                .eq('row_id', update.rowId)
                .in('result', [...OPEN_STATUSES])
                .select('row_id');
            if (error) {
                throw new PersistenceError(LEDGER_TABLE, `update ${update.rowId} failed: ${error.message}`, { cause: error });
            }
            const touched: unknown[] = data ?? [];
            if (touched.length > 0) changed.push(update.rowId);
        }
        return changed;
    }
}
