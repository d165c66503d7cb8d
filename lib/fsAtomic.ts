/**
 * fsAtomic.ts
 * Crash-consistent file writes and lock-file mutual exclusion.
 *
 * writeFileAtomic: write to a sibling temp file, then rename over the target.
 * withFileLock:    exclusive-create `<file>.lock`; stale locks are broken.
 */

import { randomUUID } from 'node:crypto';
import { mkdir, open, readFile, rename, rm, stat, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { setTimeout as sleep } from 'node:timers/promises';
import { CONFIG } from '../engine/src/config';
import { PersistenceError, errorMessage } from '../engine/src/errors';

export interface FileLockOptions {
    staleMs?: number;
    waitMs?: number;
    pollMs?: number;
}

function errorCode(err: unknown): string | null {
    if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
        return err.code;
    }
    return null;
}

export async function ensureDir(dir: string): Promise<void> {
    await mkdir(dir, { recursive: true });
}

/**
 * Read a text file; null when it does not exist
 */
export async function readTextIfExists(path: string): Promise<string | null> {
    try {
        return await readFile(path, 'utf8');
    } catch (err) {
        if (errorCode(err) === 'ENOENT') return null;
        throw new PersistenceError(path, `read failed: ${errorMessage(err)}`, { cause: err });
    }
}

export async function writeFileAtomic(path: string, contents: string): Promise<void> {
    const tmp = `${path}.${randomUUID()}.tmp`;
    try {
        await ensureDir(dirname(path));
        await writeFile(tmp, contents, 'utf8');
        await rename(tmp, path);
    } catch (err) {
        await rm(tmp, { force: true });
        throw new PersistenceError(path, `atomic write failed: ${errorMessage(err)}`, { cause: err });
    }
}

async function tryAcquire(lockPath: string): Promise<boolean> {
    try {
        const handle = await open(lockPath, 'wx');
        await handle.writeFile(`${process.pid} ${new Date().toISOString()}`);
        await handle.close();
        return true;
    } catch (err) {
        if (errorCode(err) === 'EEXIST') return false;
        throw err;
    }
}

async function isStale(lockPath: string, staleMs: number): Promise<boolean> {
    try {
        const info = await stat(lockPath);
        return Date.now() - info.mtimeMs > staleMs;
    } catch (err) {
        // Released between our create attempt and the stat
        if (errorCode(err) === 'ENOENT') return true;
        throw err;
    }
}

/**
 * Run `fn` while holding `<path>.lock`
 */
export async function withFileLock<T>(path: string, fn: () => Promise<T>, options: FileLockOptions = {}): Promise<T> {
    const lockPath = `${path}.lock`;
    const staleMs = options.staleMs ?? CONFIG.LOCK_STALE_MS;
    const waitMs = options.waitMs ?? CONFIG.LOCK_WAIT_MS;
    const pollMs = options.pollMs ?? CONFIG.LOCK_POLL_MS;
    const deadline = Date.now() + waitMs;

    try {
        await ensureDir(dirname(path));
        while (!(await tryAcquire(lockPath))) {
            if (await isStale(lockPath, staleMs)) {
                await rm(lockPath, { force: true });
                continue;
            }
            if (Date.now() >= deadline) {
                throw new PersistenceError(path, `lock held by another process (${lockPath})`);
            }
            await sleep(pollMs);
        }
    } catch (err) {
        if (err instanceof PersistenceError) throw err;
        throw new PersistenceError(path, `could not acquire lock: ${errorMessage(err)}`, { cause: err });
    }

    try {
        return await fn();
    } finally {
        await rm(lockPath, { force: true });
    }
}
