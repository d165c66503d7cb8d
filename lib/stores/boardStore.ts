/**
 * boardStore.ts
 * Prediction boards as JSON lines; latest() is the greatest generatedAt,
 * independent of file naming or line order.
 */

import { appendFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { PersistenceError, errorMessage } from '../../engine/src/errors';
import type { BoardRepository, EngineLogger, PredictionBoard } from '../../engine/src/types';
import { ensureDir, readTextIfExists } from '../fsAtomic';

function isBoard(value: unknown): value is PredictionBoard {
    if (typeof value !== 'object' || value === null) return false;
    return 'generatedAt' in value && typeof value.generatedAt === 'string'
        && 'predictions' in value && Array.isArray(value.predictions)
        && 'sports' in value && Array.isArray(value.sports);
}

export class JsonlBoardRepository implements BoardRepository {
    constructor(
        private readonly path: string,
        private readonly logger: EngineLogger,
    ) {}

    async append(board: PredictionBoard): Promise<void> {
        try {
            await ensureDir(dirname(this.path));
            await appendFile(this.path, JSON.stringify(board) + '\n', 'utf8');
        } catch (err) {
            throw new PersistenceError(this.path, `board append failed: ${errorMessage(err)}`, { cause: err });
        }
    }

    async latest(): Promise<PredictionBoard | null> {
        const text = await readTextIfExists(this.path);
        if (text === null) return null;

        let best: PredictionBoard | null = null;
        let bestTime = Number.NEGATIVE_INFINITY;
        let malformed = 0;

        for (const line of text.split('\n')) {
            if (!line.trim()) continue;
            let json: unknown;
            try {
                json = JSON.parse(line);
            } catch {
                malformed++;
                continue;
            }
            if (!isBoard(json)) { malformed++; continue; }

            const t = Date.parse(json.generatedAt);
            if (!Number.isNaN(t) && t >= bestTime) {
                best = json;
                bestTime = t;
            }
        }

        if (malformed > 0) {
            this.logger.warn('Boards', `Skipped ${malformed} malformed board lines in ${this.path}`);
        }
        return best;
    }
}
