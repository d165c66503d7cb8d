/**
 * configStore.ts
 * Configuration repository backed by a JSON file.
 *
 * load(): defaults merged with the file; a missing, unreadable or corrupt file
 *         yields defaults with a warning.
 * save(): read-merge-write under `<file>.lock`, replaced atomically.
 */

import { defaultConfiguration } from '../../engine/src/config';
import { errorMessage } from '../../engine/src/errors';
import type { ConfigRepository, Configuration, EngineLogger } from '../../engine/src/types';
import { readTextIfExists, withFileLock, writeFileAtomic } from '../fsAtomic';
import type { FileLockOptions } from '../fsAtomic';
import { ConfigFileSchema, decodeConfiguration, encodeConfiguration } from '../schemas/configSchema';

type RawConfig = Record<string, unknown>;

export class FileConfigRepository implements ConfigRepository {
    constructor(
        private readonly path: string,
        private readonly logger: EngineLogger,
        private readonly lockOptions: FileLockOptions = {},
    ) {}

    /** Parse the file; null when absent or unusable */
    private async readRaw(): Promise<RawConfig | null> {
        let text: string | null;
        try {
            text = await readTextIfExists(this.path);
        } catch (err) {
            this.logger.warn('Config', `Unreadable ${this.path}, using defaults`, errorMessage(err));
            return null;
        }
        if (text === null) return null;

        let json: unknown;
        try {
            json = JSON.parse(text);
        } catch (err) {
            this.logger.warn('Config', `Corrupt ${this.path}, using defaults`, errorMessage(err));
            return null;
        }

        const parsed = ConfigFileSchema.safeParse(json);
        if (!parsed.success) {
            this.logger.warn('Config', `${this.path} is not a JSON object, using defaults`);
            return null;
        }
        return parsed.data;
    }

    async load(): Promise<Configuration> {
        const raw = await this.readRaw();
        if (!raw) return defaultConfiguration();

        const { config, invalidKeys } = decodeConfiguration(raw);
        if (invalidKeys.length > 0) {
            this.logger.warn('Config', `Invalid keys fell back to defaults: ${invalidKeys.join(', ')}`);
        }
        return config;
    }

    async save(config: Configuration): Promise<void> {
        await withFileLock(this.path, async () => {
            const existing = (await this.readRaw()) ?? {};
            const merged = encodeConfiguration(config, existing);
            await writeFileAtomic(this.path, JSON.stringify(merged, null, 2) + '\n');
        }, this.lockOptions);
        this.logger.debug('Config', `Saved ${this.path}`, { adjustFactor: config.adjustFactor });
    }
}
