import { describe, it, expect } from 'vitest';
import { ConfigurationError } from '../engine/src/errors';
import { SportListSchema, mustEnv, optEnv, readSettings } from '../lib/env';

describe('mustEnv / optEnv', () => {
  it('returns a set variable', () => {
    expect(mustEnv('ODDS_API_KEY', { ODDS_API_KEY: 'test-secret' })).toBe('test-secret');
  });

  it('throws a configuration error for a missing or blank variable', () => {
    expect(() => mustEnv('ODDS_API_KEY', {})).toThrow(ConfigurationError);
    expect(() => mustEnv('ODDS_API_KEY', { ODDS_API_KEY: '  ' })).toThrow('[ENV] ODDS_API_KEY is required');
  });

  it('falls back for optional variables', () => {
    expect(optEnv('DATA_DIR', './data', {})).toBe('./data');
    expect(optEnv('DATA_DIR', './data', { DATA_DIR: '/srv/edgeloop' })).toBe('/srv/edgeloop');
  });
});

describe('SportListSchema', () => {
  it('uppercases, trims and dedupes', () => {
    expect(SportListSchema.parse(' nfl, NBA,nfl ')).toEqual(['NFL', 'NBA']);
  });

  it('rejects an unknown sport', () => {
    const parsed = SportListSchema.safeParse('NFL,CURLING');
    expect(parsed.success).toBe(false);
    expect(parsed.error?.issues[0].message).toBe('unknown sport "CURLING"');
  });
});

describe('readSettings', () => {
  it('applies defaults to an empty environment', () => {
    expect(readSettings({})).toEqual({
      oddsApiKey: null,
      dataDir: './data',
      ledgerBackend: 'csv',
      supabaseUrl: null,
      supabaseServiceRoleKey: null,
      feedTimeoutMs: 15_000,
      lookaheadDays: 3,
      resultsDaysFrom: 3,
      sports: ['NFL', 'NCAAF', 'NBA', 'NHL', 'MLB'],
      logLevel: 'info',
    });
  });

  it('reads typed values and treats blanks as unset', () => {
    const settings = readSettings({
      ODDS_API_KEY: 'test-secret',
      DATA_DIR: '',
      LEDGER_BACKEND: 'supabase',
      SUPABASE_URL: 'http://localhost:54321',
      FEED_TIMEOUT_MS: '2500',
      SPORTS: 'nhl,mlb',
      LOG_LEVEL: 'WARN',
    });
    expect(settings.oddsApiKey).toBe('test-secret');
    expect(settings.dataDir).toBe('./data');
    expect(settings.ledgerBackend).toBe('supabase');
    expect(settings.supabaseUrl).toBe('http://localhost:54321');
    expect(settings.feedTimeoutMs).toBe(2500);
    expect(settings.sports).toEqual(['NHL', 'MLB']);
    expect(settings.logLevel).toBe('warn');
  });

  it('reports every invalid variable at once', () => {
    expect(() => readSettings({ LEDGER_BACKEND: 'sqlite', LOOKAHEAD_DAYS: '-1' })).toThrow(ConfigurationError);
    try {
      readSettings({ LOOKAHEAD_DAYS: '-1', LOG_LEVEL: 'loud' });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigurationError);
      expect(String(err)).toContain('LOOKAHEAD_DAYS');
      expect(String(err)).toContain('LOG_LEVEL: expected one of debug|info|warn|error|silent');
    }
  });
});
