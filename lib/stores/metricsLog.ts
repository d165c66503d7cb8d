/**
 * metricsLog.ts
 * Bounded MetricsSnapshot log: a JSON array, oldest first.
 */

import { z } from 'zod';
import { CONFIG } from '../../engine/src/config';
import type { EngineLogger, MetricsLog, MetricsSnapshot } from '../../engine/src/types';
import { readTextIfExists, writeFileAtomic } from '../fsAtomic';

const CountsSchema = z.object({
    wins: z.number(),
    losses: z.number(),
    pushes: z.number(),
});

export const MetricsSnapshotSchema = z.object({
    timestamp: z.string(),
    wins: z.number(),
    losses: z.number(),
    pushes: z.number(),
    decided: z.number(),
    winRate: z.number(),
    roiPercent: z.number(),
    avgEdge: z.number(),
    avgConfidence: z.number(),
    adjustFactorBefore: z.number(),
    adjustFactorAfter: z.number(),
    direction: z.enum(['UP', 'DOWN', 'HOLD']),
    byMarket: z.object({
        MONEYLINE: CountsSchema,
        SPREAD: CountsSchema,
        TOTAL: CountsSchema,
    }),
});

export class FileMetricsLog implements MetricsLog {
    constructor(
        private readonly path: string,
        private readonly logger: EngineLogger,
        private readonly retention: number = CONFIG.METRICS_RETENTION,
    ) {}

    async list(): Promise<MetricsSnapshot[]> {
        const text = await readTextIfExists(this.path);
        if (text === null) return [];

        let json: unknown;
        try {
            json = JSON.parse(text);
        } catch {
            this.logger.warn('Metrics', `Corrupt ${this.path}, starting a fresh log`);
            return [];
        }
        if (!Array.isArray(json)) {
            this.logger.warn('Metrics', `${this.path} is not an array, starting a fresh log`);
            return [];
        }

        const snapshots: MetricsSnapshot[] = [];
        let dropped = 0;
        for (const item of json) {
            const parsed = MetricsSnapshotSchema.safeParse(item);
            if (parsed.success) snapshots.push(parsed.data);
            else dropped++;
        }
        if (dropped > 0) {
            this.logger.warn('Metrics', `Dropped ${dropped} malformed snapshots from ${this.path}`);
        }
        return snapshots;
    }

    async latest(): Promise<MetricsSnapshot | null> {
        const all = await this.list();
        return all.length > 0 ? all[all.length - 1] : null;
    }

    async append(snapshot: MetricsSnapshot): Promise<MetricsSnapshot[]> {
        const kept = [...(await this.list()), snapshot].slice(-Math.max(1, this.retention));
        await writeFileAtomic(this.path, JSON.stringify(kept, null, 2) + '\n');
        return kept;
    }
}
