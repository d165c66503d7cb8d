/**
 * Pick Feedback Engine - Odds Normalizer
 * American odds -> implied probability -> no-vig two-way probabilities
 */

import { CONFIG } from './config';
import { toFiniteNumber } from './math';
import type { NormalizedOddsRecord, OddsRecord, OddsValue, TwoWayProbabilities } from './types';

/**
 * Parse American odds. Zero, blank and non-numeric values cannot be priced.
 */
export function parseAmericanOdds(value: OddsValue | undefined): number | null {
    const odds = toFiniteNumber(value);
    if (odds === null || odds === 0) return null;
    return odds;
}

/**
 * Implied probability of American odds (vig included)
 *   +o -> 100 / (o + 100)
 *   -o -> |o| / (|o| + 100)
 */
export function impliedProbability(value: OddsValue | undefined): number | null {
    const odds = parseAmericanOdds(value);
    if (odds === null) return null;
    if (odds > 0) return 100 / (odds + 100);
    const abs = Math.abs(odds);
    return abs / (abs + 100);
}

/**
 * Normalize a two-sided price pair so the sides sum to 1.
 * With one side priced the other stays null and the priced side is used as-is.
 */
export function normalizeTwoWay(priceA: OddsValue | undefined, priceB: OddsValue | undefined): TwoWayProbabilities {
    const impliedA = impliedProbability(priceA);
    const impliedB = impliedProbability(priceB);

    if (impliedA !== null && impliedB !== null) {
        const normA = impliedA / (impliedA + impliedB);
        const normB = 1 - normA;
        let favorite: 'A' | 'B' | null = null;
        if (normA > CONFIG.COIN_FLIP) favorite = 'A';
        else if (normB > CONFIG.COIN_FLIP) favorite = 'B';
        return { impliedA, impliedB, normA, normB, pricing: 'BOTH', favorite };
    }

    if (impliedA !== null) {
        return { impliedA, impliedB: null, normA: impliedA, normB: null, pricing: 'SIDE_A', favorite: null };
    }

    if (impliedB !== null) {
        return { impliedA: null, impliedB, normA: null, normB: impliedB, pricing: 'SIDE_B', favorite: null };
    }

    return { impliedA: null, impliedB: null, normA: null, normB: null, pricing: 'NONE', favorite: null };
}

/**
 * Normalize every market of an odds record
 */
export function normalizeOddsRecord(record: OddsRecord): NormalizedOddsRecord {
    return {
        record,
        moneyline: normalizeTwoWay(record.moneylineA, record.moneylineB),
        spread: normalizeTwoWay(record.spreadA?.price, record.spreadB?.price),
        total: normalizeTwoWay(record.total?.overPrice, record.total?.underPrice),
    };
}

/**
 * Display form of American odds: "+130", "-150", "n/a"
 */
export function formatAmericanOdds(value: OddsValue | undefined): string {
    const odds = parseAmericanOdds(value);
    if (odds === null) return 'n/a';
    return odds > 0 ? `+${odds}` : `${odds}`;
}
