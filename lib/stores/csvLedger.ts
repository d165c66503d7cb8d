/**
 * csvLedger.ts
 * Append-only prediction history in a single CSV file.
 *
 * - Header is fixed (LEDGER_COLUMNS). A file written with fewer columns is
 *   rewritten once with the full header; missing cells take defaults.
 * - append(): one appendFile call per batch.
 * - settle(): read, update open rows, write-then-rename.
 * - Rows that fail to decode are carried through rewrites untouched.
 */

import { randomUUID } from 'node:crypto';
import { appendFile } from 'node:fs/promises';
import { z } from 'zod';
import { PersistenceError, errorMessage } from '../../engine/src/errors';
import { isFinalStatus, isOpenStatus } from '../../engine/src/settlement';
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
import { encodeRow, parseCsvRecords } from '../csv';
import { readTextIfExists, withFileLock, writeFileAtomic } from '../fsAtomic';
import type { FileLockOptions } from '../fsAtomic';
import { SportSchema } from '../schemas/feedSchemas';
import { isUnsettledIn, toNewEntries } from './ledgerCommon';

export const LEDGER_COLUMNS = [
    'row_id', 'id', 'market', 'sport', 'commence_time', 'team1', 'team2', 'pick', 'pick_point',
    'pred_prob', 'confidence', 'edge', 'lock', 'upset', 'ml', 'ats', 'ou', 'reason',
    'created_at', 'settled', 'result', 'settled_at', 'score1', 'score2', 'note',
] as const;

export type LedgerColumn = typeof LEDGER_COLUMNS[number];
export type LedgerRow = Record<LedgerColumn, string>;
/** Row as read from disk, keyed by header name */
type RawRow = Record<string, string>;

const COLUMN_DEFAULTS: RawRow = {
    market: 'MONEYLINE',
    lock: 'false',
    upset: 'false',
    settled: 'false',
    result: 'PENDING',
};

export const LEDGER_HEADER = encodeRow([...LEDGER_COLUMNS]);

// ═══════════════════════════════════════════════════════════════════════════
// ROW CODEC
// ═══════════════════════════════════════════════════════════════════════════

const blankToNull = z.string().transform(v => (v.trim() === '' ? null : v.trim()));

const numberCell = z.string().trim().min(1).pipe(z.coerce.number().finite());

const nullableNumberCell = z.string().transform((v, ctx) => {
    const t = v.trim();
    if (t === '') return null;
    const n = Number(t);
    if (!Number.isFinite(n)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `not a number: "${v}"` });
        return z.NEVER;
    }
    return n;
});

const boolCell = z.string().transform(v => ['true', '1', 'yes'].includes(v.trim().toLowerCase()));

export const LedgerRowSchema = z.object({
    row_id: z.string().trim().min(1),
    id: z.string().trim().min(1),
    market: z.enum(['MONEYLINE', 'SPREAD', 'TOTAL']),
    sport: SportSchema,
    commence_time: blankToNull,
    team1: z.string(),
    team2: z.string(),
    pick: z.string(),
    pick_point: nullableNumberCell,
    pred_prob: numberCell,
    confidence: numberCell,
    edge: numberCell,
    lock: boolCell,
    upset: boolCell,
    ml: z.string(),
    ats: z.string(),
    ou: z.string(),
    reason: z.string(),
    created_at: z.string().trim().min(1),
    settled: z.string(),
    result: z.enum(['PENDING', 'WIN', 'LOSS', 'PUSH', 'NO_MATCH', 'ERROR']),
    settled_at: blankToNull,
    score1: nullableNumberCell,
    score2: nullableNumberCell,
    note: z.string(),
});

export function rowToEntry(row: RawRow): LedgerEntry | null {
    const parsed = LedgerRowSchema.safeParse(row);
    if (!parsed.success) return null;
    const r = parsed.data;
    return {
        rowId: r.row_id,
        eventId: r.id,
        sport: r.sport,
        market: r.market,
        createdAt: r.created_at,
        commenceTime: r.commence_time,
        sideA: r.team1,
        sideB: r.team2,
        pick: r.pick,
        pickPoint: r.pick_point,
        modelProbability: r.pred_prob,
        confidence: r.confidence,
        edge: r.edge,
        lockFlag: r.lock,
        upsetFlag: r.upset,
        display: { ml: r.ml, ats: r.ats, ou: r.ou },
        reason: r.reason,
        status: r.result,
        settledAt: r.settled_at,
        finalScoreA: r.score1,
        finalScoreB: r.score2,
        settlementNote: r.note,
    };
}

const cell = (v: number | null): string => (v === null ? '' : String(v));

export function entryToRow(entry: LedgerEntry): LedgerRow {
    return {
        row_id: entry.rowId,
        id: entry.eventId,
        market: entry.market,
        sport: entry.sport,
        commence_time: entry.commenceTime ?? '',
        team1: entry.sideA,
        team2: entry.sideB,
        pick: entry.pick,
        pick_point: cell(entry.pickPoint),
        pred_prob: String(entry.modelProbability),
        confidence: String(entry.confidence),
        edge: String(entry.edge),
        lock: String(entry.lockFlag),
        upset: String(entry.upsetFlag),
        ml: entry.display.ml,
        ats: entry.display.ats,
        ou: entry.display.ou,
        reason: entry.reason,
        created_at: entry.createdAt,
        settled: String(isFinalStatus(entry.status)),
        result: entry.status,
        settled_at: entry.settledAt ?? '',
        score1: cell(entry.finalScoreA),
        score2: cell(entry.finalScoreB),
        note: entry.settlementNote,
    };
}

function completeRow(record: RawRow): RawRow {
    const row: RawRow = {};
    for (const column of LEDGER_COLUMNS) {
        const value = record[column];
        row[column] = value !== undefined && value !== '' ? value : COLUMN_DEFAULTS[column] ?? '';
    }
    if (!row.row_id) row.row_id = randomUUID();
    return row;
}

const serializeRow = (row: RawRow): string => encodeRow(LEDGER_COLUMNS.map(c => row[c] ?? ''));

// ═══════════════════════════════════════════════════════════════════════════
// LEDGER
// ═══════════════════════════════════════════════════════════════════════════

export class CsvHistoryLedger implements HistoryLedger {
    constructor(
        private readonly path: string,
        private readonly logger: EngineLogger,
        private readonly lockOptions: FileLockOptions = {},
    ) {}

    private async readRows(): Promise<{ rows: RawRow[]; needsRepair: boolean }> {
        const text = await readTextIfExists(this.path);
        if (text === null || text.trim() === '') return { rows: [], needsRepair: true };

        const { header, records } = parseCsvRecords(text);
        const needsRepair = header.join(',') !== LEDGER_COLUMNS.join(',') || records.some(r => !r.row_id);
        return { rows: records.map(completeRow), needsRepair };
    }

    private async rewrite(rows: RawRow[]): Promise<void> {
        const body = rows.map(serializeRow).join('\n');
        await writeFileAtomic(this.path, body ? `${LEDGER_HEADER}\n${body}\n` : `${LEDGER_HEADER}\n`);
    }

    /** Create or repair the file so appends land under the full header. Lock held by caller. */
    private async ensureSchema(): Promise<void> {
        const { rows, needsRepair } = await this.readRows();
        if (!needsRepair) return;
        if (rows.length > 0) {
            this.logger.warn('Ledger', `Repairing ${this.path}: rewriting ${rows.length} rows under the full header`);
        }
        await this.rewrite(rows);
    }

    async append(predictions: Prediction[]): Promise<LedgerEntry[]> {
        const entries = toNewEntries(predictions);

        await withFileLock(this.path, async () => {
            await this.ensureSchema();
            if (entries.length === 0) return;
            const lines = entries.map(e => serializeRow(entryToRow(e))).join('\n') + '\n';
            try {
                await appendFile(this.path, lines, 'utf8');
            } catch (err) {
                throw new PersistenceError(this.path, `append failed: ${errorMessage(err)}`, { cause: err });
            }
        }, this.lockOptions);

        return entries;
    }

    async entries(): Promise<LedgerEntry[]> {
        const first = await this.readRows();
        let rows = first.rows;
        if (first.needsRepair && rows.length > 0) {
            // Row ids must be on disk before callers hand them back to settle()
            await withFileLock(this.path, () => this.ensureSchema(), this.lockOptions);
            rows = (await this.readRows()).rows;
        }
        const entries: LedgerEntry[] = [];
        let undecodable = 0;
        for (const row of rows) {
            const entry = rowToEntry(row);
            if (entry) entries.push(entry);
            else undecodable++;
        }
        if (undecodable > 0) {
            this.logger.warn('Ledger', `${undecodable} rows in ${this.path} could not be decoded and were ignored`);
        }
        return entries;
    }

    async findUnsettled(sport: Sport, window: TimeWindow, options: FindUnsettledOptions = {}): Promise<LedgerEntry[]> {
        const all = await this.entries();
        return all.filter(e => isUnsettledIn(e, sport, window, options));
    }

    async settle(updates: SettlementUpdate[]): Promise<string[]> {
        if (updates.length === 0) return [];
        const byRow = new Map(updates.map(u => [u.rowId, u]));

        return withFileLock(this.path, async () => {
            const { rows } = await this.readRows();
            const changed: string[] = [];

            for (const row of rows) {
                const update = byRow.get(row.row_id);
                if (!update) continue;
                const status = LedgerRowSchema.shape.result.safeParse(row.result);
                if (!status.success || !isOpenStatus(status.data)) continue;

                const { outcome } = update;
                row.result = outcome.status;
                row.settled = String(isFinalStatus(outcome.status));
                row.settled_at = update.settledAt;
                row.score1 = cell(outcome.scoreA);
                row.score2 = cell(outcome.scoreB);
                row.note = outcome.reason;
                changed.push(row.row_id);
            }

            if (changed.length > 0) await this.rewrite(rows);
            return changed;
        }, this.lockOptions);
    }
}
