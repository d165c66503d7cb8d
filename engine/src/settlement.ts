/**
 * Pick Feedback Engine - Settlement Reconciler
 * Matches open ledger rows to final scores and grades them
 *
 * Transition rules:
 *   PENDING  -> WIN | LOSS | PUSH | NO_MATCH | ERROR
 *   NO_MATCH -> WIN | LOSS | PUSH | NO_MATCH | ERROR   (revisitable)
 *   WIN | LOSS | PUSH | ERROR -> (never changes)
 */

import { toFiniteNumber } from './math';
import { FINAL_STATUSES, OPEN_STATUSES } from './types';
import type {
    LedgerEntry,
    Prediction,
    ResultRecord,
    SettlementOutcome,
    SettlementStatus,
    SettlementUpdate,
} from './types';

export interface SettlementCounts {
    examined: number;
    wins: number;
    losses: number;
    pushes: number;
    noMatch: number;
    errors: number;
    /** Rows already final; left untouched */
    unchanged: number;
}

export interface SettlementBatch {
    updates: SettlementUpdate[];
    counts: SettlementCounts;
}

export function normalizeTeamName(name: string): string {
    return name.trim().replace(/\s+/g, ' ').toLowerCase();
}

export function isFinalStatus(status: SettlementStatus): boolean {
    return FINAL_STATUSES.includes(status);
}

export function isOpenStatus(status: SettlementStatus): boolean {
    return OPEN_STATUSES.includes(status);
}

/**
 * Parse a score in any numeric-string form ("24", " 24 ", "24.0")
 */
export function parseScore(value: number | string | null): number | null {
    const score = toFiniteNumber(value);
    if (score === null || score < 0) return null;
    return score;
}

function timeOf(iso: string | null): number | null {
    if (!iso) return null;
    const ms = Date.parse(iso);
    return Number.isNaN(ms) ? null : ms;
}

/**
 * Find the result for a prediction: {sideA, sideB} == {home, away} as a set.
 * When several games qualify (a series), the closest commence time wins.
 */
export function findMatchingResult(prediction: Prediction, results: ResultRecord[]): ResultRecord | null {
    const a = normalizeTeamName(prediction.sideA);
    const b = normalizeTeamName(prediction.sideB);

    const candidates = results.filter(r => {
        const home = normalizeTeamName(r.homeName);
        const away = normalizeTeamName(r.awayName);
        return (home === a && away === b) || (home === b && away === a);
    });

    if (candidates.length <= 1) return candidates[0] ?? null;

    const target = timeOf(prediction.commenceTime);
    if (target === null) return candidates[0];

    let best = candidates[0];
    let bestDistance = Number.POSITIVE_INFINITY;
    for (const candidate of candidates) {
        const t = timeOf(candidate.commenceTime);
        const distance = t === null ? Number.POSITIVE_INFINITY : Math.abs(t - target);
        if (distance < bestDistance) {
            best = candidate;
            bestDistance = distance;
        }
    }
    return best;
}

/**
 * Grade a prediction against a matched result
 */
export function gradePrediction(prediction: Prediction, result: ResultRecord): SettlementOutcome {
    const homeScore = parseScore(result.homeScore);
    const awayScore = parseScore(result.awayScore);

    if (homeScore === null || awayScore === null) {
        return {
            status: 'ERROR',
            reason: `Unparseable score: ${result.homeName}=${String(result.homeScore)} ${result.awayName}=${String(result.awayScore)}`,
            scoreA: null,
            scoreB: null,
        };
    }

    const aIsHome = normalizeTeamName(result.homeName) === normalizeTeamName(prediction.sideA);
    const scoreA = aIsHome ? homeScore : awayScore;
    const scoreB = aIsHome ? awayScore : homeScore;
    const graded = (status: SettlementOutcome['status'], reason: string): SettlementOutcome =>
        ({ status, reason, scoreA, scoreB });

    if (prediction.market === 'MONEYLINE') {
        if (scoreA === scoreB) return graded('PUSH', `Tie ${scoreA}-${scoreB}`);
        const winner = scoreA > scoreB ? prediction.sideA : prediction.sideB;
        return normalizeTeamName(prediction.pick) === normalizeTeamName(winner)
            ? graded('WIN', `${winner} won ${Math.max(scoreA, scoreB)}-${Math.min(scoreA, scoreB)}`)
            : graded('LOSS', `${winner} won ${Math.max(scoreA, scoreB)}-${Math.min(scoreA, scoreB)}`);
    }

    if (prediction.pickPoint === null) {
        return { status: 'ERROR', reason: `No line stored for ${prediction.market} pick`, scoreA, scoreB };
    }

    if (prediction.market === 'SPREAD') {
        const pickedIsA = normalizeTeamName(prediction.pick) === normalizeTeamName(prediction.sideA);
        const pickedMargin = pickedIsA ? scoreA - scoreB : scoreB - scoreA;
        const cover = pickedMargin + prediction.pickPoint;
        if (cover > 0) return graded('WIN', `Cover by ${cover}`);
        if (cover < 0) return graded('LOSS', `Missed by ${Math.abs(cover)}`);
        return graded('PUSH', 'Landed on the number');
    }

    const total = scoreA + scoreB;
    const line = prediction.pickPoint;
    if (total === line) return graded('PUSH', `Total ${total} on the line`);
    const overHit = total > line;
    const pickedOver = prediction.pick === 'Over';
    return overHit === pickedOver
        ? graded('WIN', `Total ${total} vs ${line}`)
        : graded('LOSS', `Total ${total} vs ${line}`);
}

/**
 * Resolve a prediction: NO_MATCH when no result fits, otherwise graded
 */
export function resolvePrediction(prediction: Prediction, results: ResultRecord[]): SettlementOutcome {
    const match = findMatchingResult(prediction, results);
    if (!match) {
        return {
            status: 'NO_MATCH',
            reason: `No final score for ${prediction.sideA} vs ${prediction.sideB} in window`,
            scoreA: null,
            scoreB: null,
        };
    }
    return gradePrediction(prediction, match);
}

/**
 * Apply an outcome to a ledger entry. Final rows come back unchanged.
 */
export function applySettlement(entry: LedgerEntry, outcome: SettlementOutcome, settledAt: string): LedgerEntry {
    if (!isOpenStatus(entry.status)) return entry;
    return {
        ...entry,
        status: outcome.status,
        settledAt,
        finalScoreA: outcome.scoreA,
        finalScoreB: outcome.scoreB,
        settlementNote: outcome.reason,
    };
}

/**
 * Grade a batch of open ledger rows. A malformed result only errors its own row.
 */
export function settleEntries(entries: LedgerEntry[], results: ResultRecord[], settledAt: string): SettlementBatch {
    const counts: SettlementCounts = {
        examined: 0, wins: 0, losses: 0, pushes: 0, noMatch: 0, errors: 0, unchanged: 0,
    };
    const updates: SettlementUpdate[] = [];

    for (const entry of entries) {
        counts.examined++;
        if (!isOpenStatus(entry.status)) {
            counts.unchanged++;
            continue;
        }

        let outcome: SettlementOutcome;
        try {
            outcome = resolvePrediction(entry, results);
        } catch (err) {
            outcome = {
                status: 'ERROR',
                reason: err instanceof Error ? err.message : String(err),
                scoreA: null,
                scoreB: null,
            };
        }

        switch (outcome.status) {
            case 'WIN': counts.wins++; break;
            case 'LOSS': counts.losses++; break;
            case 'PUSH': counts.pushes++; break;
            case 'NO_MATCH': counts.noMatch++; break;
            case 'ERROR': counts.errors++; break;
        }

        updates.push({ rowId: entry.rowId, outcome, settledAt });
    }

    return { updates, counts };
}
