/**
 * fileFeed.ts
 * Odds and results read from local JSON files (arrays of logical records).
 * Used for offline runs and replaying captured slates.
 */

import { z } from 'zod';
import { errorMessage } from '../../engine/src/errors';
import type { EngineLogger, FeedResult, OddsFeed, OddsRecord, ResultRecord, Sport } from '../../engine/src/types';
import { readTextIfExists } from '../fsAtomic';
import {
    OddsRecordInputSchema,
    ResultRecordInputSchema,
    SportSchema,
    toOddsRecord,
    toResultRecord,
} from '../schemas/feedSchemas';

export interface FileFeedOptions {
    oddsPath?: string | null;
    resultsPath?: string | null;
}

async function readArray(path: string): Promise<{ ok: true; items: unknown[] } | { ok: false; reason: string }> {
    let text: string | null;
    try {
        text = await readTextIfExists(path);
    } catch (err) {
        return { ok: false, reason: errorMessage(err) };
    }
    if (text === null) return { ok: false, reason: `${path} not found` };

    let json: unknown;
    try {
        json = JSON.parse(text);
    } catch (err) {
        return { ok: false, reason: `${path} is not valid JSON: ${errorMessage(err)}` };
    }
    if (!Array.isArray(json)) return { ok: false, reason: `${path} must contain a JSON array` };
    return { ok: true, items: json };
}

const SportTagSchema = z.object({ sport: SportSchema });

/**
 * Validate items and keep those of the requested sport.
 * A malformed item counts against its own sport; one whose sport cannot be
 * read is unattributed.
 */
function collect<O, T extends { sport: Sport }>(
    items: unknown[],
    schema: z.ZodType<O, z.ZodTypeDef, unknown>,
    map: (value: O) => T | null,
    sport: Sport,
): { data: T[]; rejected: number; unattributed: number } {
    const data: T[] = [];
    let rejected = 0;
    let unattributed = 0;
    for (const item of items) {
        const parsed = schema.safeParse(item);
        if (!parsed.success) {
            const tag = SportTagSchema.safeParse(item);
            if (!tag.success) unattributed++;
            else if (tag.data.sport === sport) rejected++;
            continue;
        }
        const record = map(parsed.data);
        if (record && record.sport === sport) data.push(record);
    }
    return { data, rejected, unattributed };
}

export class FileFeed implements OddsFeed {
    private readonly reportedUnattributed = new Set<string>();

    constructor(
        private readonly options: FileFeedOptions,
        private readonly logger: EngineLogger,
    ) {}

    private report(kind: 'odds' | 'result', path: string, sport: Sport, rejected: number, unattributed: number): void {
        if (rejected > 0) this.logger.warn('FileFeed', `${rejected} malformed ${sport} ${kind} records in ${path}`);
        if (unattributed > 0 && !this.reportedUnattributed.has(path)) {
            this.reportedUnattributed.add(path);
            this.logger.warn('FileFeed', `${unattributed} ${kind} records without a known sport in ${path}`);
        }
    }

    async fetchOdds(sport: Sport): Promise<FeedResult<OddsRecord>> {
        const path = this.options.oddsPath;
        if (!path) return { ok: false, reason: 'no odds file configured' };

        const file = await readArray(path);
        if (!file.ok) {
            this.logger.warn('FileFeed', `${sport} odds unavailable`, file.reason);
            return file;
        }
        const { data, rejected, unattributed } = collect(file.items, OddsRecordInputSchema, toOddsRecord, sport);
        this.report('odds', path, sport, rejected, unattributed);
        return { ok: true, data, rejected };
    }

    async fetchResults(sport: Sport, _daysFrom: number): Promise<FeedResult<ResultRecord>> {
        const path = this.options.resultsPath;
        if (!path) return { ok: false, reason: 'no results file configured' };

        const file = await readArray(path);
        if (!file.ok) {
            this.logger.warn('FileFeed', `${sport} results unavailable`, file.reason);
            return file;
        }
        const { data, rejected, unattributed } = collect(file.items, ResultRecordInputSchema, toResultRecord, sport);
        this.report('result', path, sport, rejected, unattributed);
        return { ok: true, data, rejected };
    }
}
