import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { appendFile, readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { defaultConfiguration } from '../engine/src/config';
import type { MetricsSnapshot, PredictionBoard } from '../engine/src/types';
import { decodeConfiguration } from '../lib/schemas/configSchema';
import { JsonlBoardRepository } from '../lib/stores/boardStore';
import { FileConfigRepository } from '../lib/stores/configStore';
import { FileMetricsLog } from '../lib/stores/metricsLog';
import { createCapturingLogger, makeTempDir, removeDir } from './helpers';

let dir: string;

beforeEach(async () => {
  dir = await makeTempDir();
});

afterEach(async () => {
  await removeDir(dir);
});

function snapshot(timestamp: string, after = 0.35): MetricsSnapshot {
  return {
    timestamp,
    wins: 1,
    losses: 0,
    pushes: 0,
    decided: 1,
    winRate: 100,
    roiPercent: 100,
    avgEdge: 2.79,
    avgConfidence: 57.98,
    adjustFactorBefore: 0.35,
    adjustFactorAfter: after,
    direction: 'UP',
    byMarket: {
      MONEYLINE: { wins: 1, losses: 0, pushes: 0 },
      SPREAD: { wins: 0, losses: 0, pushes: 0 },
      TOTAL: { wins: 0, losses: 0, pushes: 0 },
    },
  };
}

describe('decodeConfiguration', () => {
  it('keeps valid keys and reports invalid ones', () => {
    const { config, invalidKeys } = decodeConfiguration({
      adjust_factor: 0.5,
      lock_edge_threshold: 'high',
      last_win_rate: 62.5,
    });
    expect(config).toEqual({ ...defaultConfiguration(), adjustFactor: 0.5, lastWinRate: 62.5 });
    expect(invalidKeys).toEqual(['lock_edge_threshold']);
  });
});

describe('FileConfigRepository', () => {
  it('uses defaults when the file is missing', async () => {
    const { logger, lines } = createCapturingLogger();
    const repo = new FileConfigRepository(join(dir, 'config.json'), logger);
    expect(await repo.load()).toEqual(defaultConfiguration());
    expect(lines.filter(l => l.level === 'warn')).toEqual([]);
  });

  it('uses defaults with a warning when the file is corrupt', async () => {
    const path = join(dir, 'config.json');
    await writeFile(path, '{"adjust_factor": 0.4');
    const { logger, lines } = createCapturingLogger();

    expect(await new FileConfigRepository(path, logger).load()).toEqual(defaultConfiguration());
    expect(lines.some(l => l.level === 'warn' && l.line.startsWith(`[Config] Corrupt ${path}, using defaults`))).toBe(true);
  });

  it('falls back per key and warns', async () => {
    const path = join(dir, 'config.json');
    await writeFile(path, JSON.stringify({ adjust_factor: -1, lock_confidence_threshold: 55 }));
    const { logger, text } = createCapturingLogger();

    const config = await new FileConfigRepository(path, logger).load();
    expect(config.adjustFactor).toBe(0.35);
    expect(config.lockConfidenceThreshold).toBe(55);
    expect(text()).toContain('[Config] Invalid keys fell back to defaults: adjust_factor');
  });

  it('saves snake_case keys and keeps keys it does not own', async () => {
    const path = join(dir, 'config.json');
    await writeFile(path, JSON.stringify({ adjust_factor: 0.35, operator_note: 'manual reset' }));
    const { logger } = createCapturingLogger();
    const repo = new FileConfigRepository(path, logger);

    const next = { ...defaultConfiguration(), adjustFactor: 0.3675, lastWinRate: 100, lastUpdate: '2026-10-19T06:00:00.000Z' };
    await repo.save(next);

    expect(JSON.parse(await readFile(path, 'utf8'))).toEqual({
      adjust_factor: 0.3675,
      operator_note: 'manual reset',
      lock_edge_threshold: 0.5,
      lock_confidence_threshold: 51,
      upset_edge_threshold: 0.3,
      last_win_rate: 100,
      last_update: '2026-10-19T06:00:00.000Z',
    });
    expect(await repo.load()).toEqual(next);
  });
});

describe('FileMetricsLog', () => {
  it('starts empty and appends oldest first', async () => {
    const { logger } = createCapturingLogger();
    const log = new FileMetricsLog(join(dir, 'metrics.json'), logger);

    expect(await log.list()).toEqual([]);
    expect(await log.latest()).toBeNull();

    await log.append(snapshot('2026-10-18T06:00:00.000Z'));
    await log.append(snapshot('2026-10-19T06:00:00.000Z', 0.3675));

    expect((await log.list()).map(s => s.timestamp)).toEqual(['2026-10-18T06:00:00.000Z', '2026-10-19T06:00:00.000Z']);
    expect((await log.latest())?.adjustFactorAfter).toBe(0.3675);
  });

  it('keeps only the most recent snapshots', async () => {
    const { logger } = createCapturingLogger();
    const log = new FileMetricsLog(join(dir, 'metrics.json'), logger, 2);
    for (const day of ['16', '17', '18']) {
      await log.append(snapshot(`2026-10-${day}T06:00:00.000Z`));
    }
    expect((await log.list()).map(s => s.timestamp.slice(8, 10))).toEqual(['17', '18']);
  });

  it('drops malformed entries with a warning', async () => {
    const path = join(dir, 'metrics.json');
    await writeFile(path, JSON.stringify([snapshot('2026-10-18T06:00:00.000Z'), { timestamp: 'x' }]));
    const { logger, text } = createCapturingLogger();

    expect(await new FileMetricsLog(path, logger).list()).toHaveLength(1);
    expect(text()).toContain(`[Metrics] Dropped 1 malformed snapshots from ${path}`);
  });
});

describe('JsonlBoardRepository', () => {
  const board = (generatedAt: string): PredictionBoard => ({ generatedAt, predictions: [], sports: [] });

  it('returns null before anything is written', async () => {
    const { logger } = createCapturingLogger();
    expect(await new JsonlBoardRepository(join(dir, 'boards.jsonl'), logger).latest()).toBeNull();
  });

  it('picks the newest board regardless of line order', async () => {
    const path = join(dir, 'boards.jsonl');
    const { logger, text } = createCapturingLogger();
    const repo = new JsonlBoardRepository(path, logger);

    await repo.append(board('2026-10-19T06:00:00.000Z'));
    await repo.append(board('2026-10-18T06:00:00.000Z'));
    await appendFile(path, 'not json\n');

    expect((await repo.latest())?.generatedAt).toBe('2026-10-19T06:00:00.000Z');
    expect(text()).toContain(`[Boards] Skipped 1 malformed board lines in ${path}`);
  });
});
