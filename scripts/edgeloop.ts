#!/usr/bin/env npx tsx
/**
 * EDGELOOP CLI
 *
 * PURPOSE: Run the prediction -> settlement -> learning loop, one stage or the
 *          whole cycle per invocation (cron friendly, run-to-completion).
 *
 * USAGE:
 *   npx tsx scripts/edgeloop.ts generate [--sports NFL,NBA] [--data-dir ./data] [--odds-file odds.json]
 *   npx tsx scripts/edgeloop.ts settle   [--sports ...] [--results-file results.json] [--pending-only]
 *   npx tsx scripts/edgeloop.ts learn    [--data-dir ./data]
 *   npx tsx scripts/edgeloop.ts cycle    [all of the above]
 *
 * EXIT: 0 on success (including "nothing to do"), 1 on bad usage, missing
 *       credentials or a stage that could not persist its results.
 */

import { join } from 'node:path';
import { pathToFileURL } from 'node:url';
import { parseArgs } from 'node:util';
import { ConfigurationError, errorMessage } from '../engine/src/errors';
import { printBoardSummary, printMetricsSummary } from '../engine/src/explain';
import { runCycle, runGenerate, runLearn, runSettle } from '../engine/src/cycle';
import type { CycleDeps, CycleOptions } from '../engine/src/cycle';
import type { HistoryLedger, OddsFeed, Sport } from '../engine/src/types';
import { SportListSchema, loadDotenv, mustEnv, readSettings } from '../lib/env';
import type { EnvSource, RuntimeSettings } from '../lib/env';
import { FileFeed } from '../lib/feeds/fileFeed';
import { OddsApiFeed } from '../lib/feeds/oddsApiFeed';
import { Logger, logger as defaultLogger } from '../lib/logger';
import { JsonlBoardRepository } from '../lib/stores/boardStore';
import { FileConfigRepository } from '../lib/stores/configStore';
import { CsvHistoryLedger } from '../lib/stores/csvLedger';
import { FileMetricsLog } from '../lib/stores/metricsLog';
import { SupabaseHistoryLedger } from '../lib/stores/supabaseLedger';
import { createSupabaseClient } from '../lib/supabase';

export const COMMANDS = ['generate', 'settle', 'learn', 'cycle'] as const;
export type Command = typeof COMMANDS[number];

export const DATA_FILES = {
    ledger: 'history.csv',
    config: 'config.json',
    metrics: 'metrics.json',
    boards: 'boards.jsonl',
} as const;

const USAGE = `Usage: edgeloop <${COMMANDS.join('|')}> [options]

Options:
  --sports <list>         Comma separated sports (default: SPORTS env or all)
  --data-dir <dir>        Ledger, config and metrics directory (default: DATA_DIR or ./data)
  --odds-file <path>      Read odds from a JSON file instead of The Odds API
  --results-file <path>   Read final scores from a JSON file instead of The Odds API
  --pending-only          Do not revisit NO_MATCH rows during settlement
  -h, --help              Show this message`;

export interface CliContext {
    env?: EnvSource;
    logger?: Logger;
    now?: () => Date;
    /** Transport for The Odds API and Supabase */
    fetch?: typeof fetch;
}

interface CliArgs {
    command: Command;
    sports: string | undefined;
    dataDir: string | undefined;
    oddsFile: string | undefined;
    resultsFile: string | undefined;
    pendingOnly: boolean;
}

const isCommand = (value: string): value is Command => COMMANDS.some(c => c === value);

class UsageError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'UsageError';
    }
}

function parseArgv(argv: string[]) {
    try {
        return parseArgs({
            args: argv,
            allowPositionals: true,
            strict: true,
            options: {
                sports: { type: 'string' },
                'data-dir': { type: 'string' },
                'odds-file': { type: 'string' },
                'results-file': { type: 'string' },
                'pending-only': { type: 'boolean', default: false },
                help: { type: 'boolean', short: 'h', default: false },
            },
        });
    } catch (err) {
        throw new UsageError(errorMessage(err));
    }
}

function parseCli(argv: string[]): CliArgs | 'help' {
    const { values, positionals } = parseArgv(argv);

    if (values.help) return 'help';
    const [command, ...extra] = positionals;
    if (!command) throw new UsageError('missing command');
    if (!isCommand(command)) throw new UsageError(`unknown command "${command}"`);
    if (extra.length > 0) throw new UsageError(`unexpected arguments: ${extra.join(' ')}`);

    return {
        command,
        sports: values.sports,
        dataDir: values['data-dir'],
        oddsFile: values['odds-file'],
        resultsFile: values['results-file'],
        pendingOnly: values['pending-only'] === true,
    };
}

function resolveSports(flag: string | undefined, settings: RuntimeSettings): Sport[] {
    if (flag === undefined) return settings.sports;
    const parsed = SportListSchema.safeParse(flag);
    if (!parsed.success) {
        throw new UsageError(`--sports: ${parsed.error.issues.map(i => i.message).join('; ')}`);
    }
    return parsed.data;
}

function buildFeed(args: CliArgs, settings: RuntimeSettings, env: EnvSource, ctx: CliContext, log: Logger): OddsFeed {
    if (args.oddsFile || args.resultsFile || args.command === 'learn') {
        return new FileFeed({ oddsPath: args.oddsFile ?? null, resultsPath: args.resultsFile ?? null }, log);
    }
    return new OddsApiFeed({
        apiKey: mustEnv('ODDS_API_KEY', env),
        timeoutMs: settings.feedTimeoutMs,
        lookaheadDays: settings.lookaheadDays,
        fetch: ctx.fetch,
        now: ctx.now,
    }, log);
}

function buildLedger(dataDir: string, settings: RuntimeSettings, env: EnvSource, ctx: CliContext, log: Logger): HistoryLedger {
    if (settings.ledgerBackend === 'supabase') {
        const client = createSupabaseClient({
            url: mustEnv('SUPABASE_URL', env),
            serviceRoleKey: mustEnv('SUPABASE_SERVICE_ROLE_KEY', env),
            fetch: ctx.fetch,
        });
        return new SupabaseHistoryLedger(client, log);
    }
    return new CsvHistoryLedger(join(dataDir, DATA_FILES.ledger), log);
}

async function execute(args: CliArgs, deps: CycleDeps, options: CycleOptions): Promise<number> {
    switch (args.command) {
        case 'generate': {
            const config = await deps.configRepo.load();
            const result = await runGenerate(deps, config, options);
            printBoardSummary(result.board);
            return 0;
        }
        case 'settle': {
            await runSettle(deps, options);
            return 0;
        }
        case 'learn': {
            const config = await deps.configRepo.load();
            const result = await runLearn(deps, config, null);
            if (result.snapshot) printMetricsSummary(result.snapshot);
            return 0;
        }
        case 'cycle': {
            const result = await runCycle(deps, options);
            if (result.generate) printBoardSummary(result.generate.board);
            if (result.learn?.snapshot) printMetricsSummary(result.learn.snapshot);
            return result.failures.length > 0 ? 1 : 0;
        }
    }
}

/**
 * Run one CLI invocation; resolves to the process exit code
 */
export async function main(argv: string[], ctx: CliContext = {}): Promise<number> {
    const env = ctx.env ?? process.env;
    const log = ctx.logger ?? defaultLogger;

    try {
        const args = parseCli(argv);
        if (args === 'help') {
            console.log(USAGE);
            return 0;
        }

        const settings = readSettings(env);
        if (!ctx.logger) log.setLevel(settings.logLevel);

        const options: CycleOptions = {
            sports: resolveSports(args.sports, settings),
            resultsDaysFrom: settings.resultsDaysFrom,
            retryNoMatch: !args.pendingOnly,
            capLocks: true,
        };

        const dataDir = args.dataDir ?? settings.dataDir;
        const deps: CycleDeps = {
            feed: buildFeed(args, settings, env, ctx, log),
            ledger: buildLedger(dataDir, settings, env, ctx, log),
            configRepo: new FileConfigRepository(join(dataDir, DATA_FILES.config), log),
            metrics: new FileMetricsLog(join(dataDir, DATA_FILES.metrics), log),
            boards: new JsonlBoardRepository(join(dataDir, DATA_FILES.boards), log),
            logger: log,
            now: ctx.now,
        };

        log.info('CLI', `${args.command}: sports=${options.sports.join(',')} data=${dataDir} ledger=${settings.ledgerBackend}`);
        return await execute(args, deps, options);
    } catch (err) {
        if (err instanceof UsageError) {
            log.error('CLI', errorMessage(err));
            console.error(USAGE);
            return 1;
        }
        if (err instanceof ConfigurationError) {
            log.error('CLI', errorMessage(err));
            return 1;
        }
        log.error('CLI', 'Run failed', err);
        return 1;
    }
}

// CLI Entry Point
const entry = process.argv[1];
if (entry && import.meta.url === pathToFileURL(entry).href) {
    loadDotenv();
    main(process.argv.slice(2)).then(
        code => { process.exitCode = code; },
        (err: unknown) => {
            console.error('[CLI] Fatal', err);
            process.exitCode = 1;
        },
    );
}
