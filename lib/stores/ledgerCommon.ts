/**
 * ledgerCommon.ts
 * Backend-independent ledger rules shared by the CSV and Supabase ledgers
 */

import { randomUUID } from 'node:crypto';
import type { FindUnsettledOptions, LedgerEntry, Prediction, Sport, TimeWindow } from '../../engine/src/types';

/**
 * New ledger entries for a batch; (eventId, market) is kept once per call
 */
export function toNewEntries(predictions: Prediction[]): LedgerEntry[] {
    const seen = new Set<string>();
    const entries: LedgerEntry[] = [];
    for (const p of predictions) {
        const key = `${p.eventId}|${p.market}`;
        if (seen.has(key)) continue;
        seen.add(key);
        entries.push({
            ...p,
            rowId: randomUUID(),
            settledAt: null,
            finalScoreA: null,
            finalScoreB: null,
            settlementNote: '',
        });
    }
    return entries;
}

/**
 * Reference time for window checks: commence time, else creation time
 */
export function entryTime(entry: Pick<LedgerEntry, 'commenceTime' | 'createdAt'>): number | null {
    for (const iso of [entry.commenceTime, entry.createdAt]) {
        if (!iso) continue;
        const ms = Date.parse(iso);
        if (!Number.isNaN(ms)) return ms;
    }
    return null;
}

export function isUnsettledIn(
    entry: LedgerEntry,
    sport: Sport,
    window: TimeWindow,
    options: FindUnsettledOptions = {},
): boolean {
    if (entry.sport !== sport) return false;
    const open = entry.status === 'PENDING' || (options.includeNoMatch === true && entry.status === 'NO_MATCH');
    if (!open) return false;
    const t = entryTime(entry);
    return t !== null && t >= window.from.getTime() && t <= window.to.getTime();
}
