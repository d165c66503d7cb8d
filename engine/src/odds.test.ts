/**
 * Odds normalizer tests
 */

import { describe, it, expect } from 'vitest';
import {
    formatAmericanOdds,
    impliedProbability,
    normalizeOddsRecord,
    normalizeTwoWay,
    parseAmericanOdds,
} from './odds';
import type { OddsRecord } from './types';

describe('parseAmericanOdds', () => {
    it('accepts numbers and numeric strings', () => {
        expect(parseAmericanOdds(-150)).toBe(-150);
        expect(parseAmericanOdds('+130')).toBe(130);
        expect(parseAmericanOdds(' -110 ')).toBe(-110);
    });

    it('rejects zero, blanks and garbage', () => {
        expect(parseAmericanOdds(0)).toBeNull();
        expect(parseAmericanOdds('')).toBeNull();
        expect(parseAmericanOdds('EVEN')).toBeNull();
        expect(parseAmericanOdds(null)).toBeNull();
        expect(parseAmericanOdds(undefined)).toBeNull();
    });
});

describe('impliedProbability', () => {
    it('handles underdog and favorite prices', () => {
        expect(impliedProbability(300)).toBeCloseTo(0.25, 10);
        expect(impliedProbability(-300)).toBeCloseTo(0.75, 10);
        expect(impliedProbability(100)).toBeCloseTo(0.5, 10);
        expect(impliedProbability(-100)).toBeCloseTo(0.5, 10);
    });

    it('returns null for unpriceable values', () => {
        expect(impliedProbability(0)).toBeNull();
        expect(impliedProbability('n/a')).toBeNull();
    });
});

describe('normalizeTwoWay', () => {
    it('removes the vig: Bears -150 / Packers +130', () => {
        const probs = normalizeTwoWay(-150, 130);
        const rawA = 150 / 250;
        const rawB = 100 / 230;

        expect(probs.pricing).toBe('BOTH');
        expect(probs.impliedA).toBeCloseTo(rawA, 10);
        expect(probs.impliedB).toBeCloseTo(rawB, 10);
        expect(probs.normA).toBeCloseTo(rawA / (rawA + rawB), 10);
        expect(probs.normA).toBeCloseTo(0.578, 2);
        expect(probs.normB).toBeCloseTo(0.422, 2);
        expect(probs.favorite).toBe('A');
    });

    it('sums to one and stays inside (0, 1) for priced pairs', () => {
        const pairs: Array<[number, number]> = [
            [-110, -110], [-150, 130], [250, -300], [-1000, 700], [105, 105], [-200, -120],
        ];
        for (const [a, b] of pairs) {
            const probs = normalizeTwoWay(a, b);
            expect(probs.normA).not.toBeNull();
            expect(probs.normB).not.toBeNull();
            const sum = (probs.normA ?? 0) + (probs.normB ?? 0);
            expect(sum).toBeCloseTo(1, 12);
            expect(probs.normA).toBeGreaterThan(0);
            expect(probs.normA).toBeLessThan(1);
        }
    });

    it('has no favorite on an even market', () => {
        const probs = normalizeTwoWay(-110, -110);
        expect(probs.normA).toBeCloseTo(0.5, 12);
        expect(probs.favorite).toBeNull();
    });

    it('uses the raw implied value when only one side is priced', () => {
        const onlyA = normalizeTwoWay(-150, null);
        expect(onlyA.pricing).toBe('SIDE_A');
        expect(onlyA.normA).toBeCloseTo(0.6, 10);
        expect(onlyA.normB).toBeNull();

        const onlyB = normalizeTwoWay('', 200);
        expect(onlyB.pricing).toBe('SIDE_B');
        expect(onlyB.normB).toBeCloseTo(1 / 3, 10);
        expect(onlyB.normA).toBeNull();
    });

    it('reports NONE when neither side is priced', () => {
        const probs = normalizeTwoWay(0, 'off');
        expect(probs.pricing).toBe('NONE');
        expect(probs.normA).toBeNull();
        expect(probs.normB).toBeNull();
    });
});

describe('normalizeOddsRecord', () => {
    it('normalizes every market independently', () => {
        const record: OddsRecord = {
            eventId: 'evt-1',
            sport: 'NFL',
            commenceTime: '2026-10-18T17:00:00Z',
            sideA: 'Bears',
            sideB: 'Packers',
            moneylineA: -150,
            moneylineB: 130,
            spreadA: { point: -3.5, price: -110 },
            spreadB: { point: 3.5, price: -110 },
            total: { point: 44.5, overPrice: -105, underPrice: null },
        };

        const normalized = normalizeOddsRecord(record);
        expect(normalized.moneyline.pricing).toBe('BOTH');
        expect(normalized.spread.normA).toBeCloseTo(0.5, 12);
        expect(normalized.total.pricing).toBe('SIDE_A');
        expect(normalized.total.normA).toBeCloseTo(105 / 205, 10);
    });

    it('treats missing markets as unpriced', () => {
        const record: OddsRecord = {
            eventId: 'evt-2',
            sport: 'NBA',
            commenceTime: null,
            sideA: 'Hawks',
            sideB: 'Nets',
            moneylineA: 120,
            moneylineB: -140,
            spreadA: null,
            spreadB: null,
            total: null,
        };

        const normalized = normalizeOddsRecord(record);
        expect(normalized.spread.pricing).toBe('NONE');
        expect(normalized.total.pricing).toBe('NONE');
        expect(normalized.moneyline.favorite).toBe('B');
    });
});

describe('formatAmericanOdds', () => {
    it('prints sign-prefixed prices', () => {
        expect(formatAmericanOdds(130)).toBe('+130');
        expect(formatAmericanOdds(-150)).toBe('-150');
        expect(formatAmericanOdds('+105')).toBe('+105');
        expect(formatAmericanOdds(null)).toBe('n/a');
    });
});
