/**
 * oddsApiFeed.ts
 * The Odds API v4 adapter: /odds for pricing, /scores for settlement.
 *
 * Fail-soft per request: timeout, non-2xx, or a non-array body yields
 * { ok: false, reason } and the caller skips the sport. No retry.
 */

import { CONFIG } from '../../engine/src/config';
import { errorMessage } from '../../engine/src/errors';
import type {
    EngineLogger,
    FeedResult,
    OddsFeed,
    OddsRecord,
    ResultRecord,
    Sport,
    SpreadQuote,
    TotalQuote,
} from '../../engine/src/types';
import { OddsApiEventSchema, OddsApiScoreSchema } from '../schemas/feedSchemas';
import type { OddsApiEvent } from '../schemas/feedSchemas';

export const ODDS_API_BASE = 'https://api.the-odds-api.com/v4';

export const SPORT_KEYS: Record<Sport, string> = {
    NFL: 'americanfootball_nfl',
    NCAAF: 'americanfootball_ncaaf',
    NBA: 'basketball_nba',
    NHL: 'icehockey_nhl',
    MLB: 'baseball_mlb',
};

/** The scores endpoint only serves 1..3 days back */
const MAX_DAYS_FROM = 3;

const DAY_MS = 24 * 60 * 60 * 1000;

export interface OddsApiFeedOptions {
    apiKey: string;
    timeoutMs?: number;
    lookaheadDays?: number;
    baseUrl?: string;
    fetch?: typeof fetch;
    now?: () => Date;
}

type Outcome = OddsApiEvent['bookmakers'][number]['markets'][number]['outcomes'][number];

function marketOutcomes(event: OddsApiEvent, key: 'h2h' | 'spreads' | 'totals'): Outcome[] | null {
    for (const bookmaker of event.bookmakers) {
        const market = bookmaker.markets.find(m => m.key === key);
        if (market && market.outcomes.length > 0) return market.outcomes;
    }
    return null;
}

const sameName = (a: string, b: string) => a.trim().toLowerCase() === b.trim().toLowerCase();

/**
 * Map an event to the logical record; side A is the home team.
 * Each market comes from the first bookmaker that offers it.
 */
export function eventToOddsRecord(event: OddsApiEvent, sport: Sport): OddsRecord {
    const h2h = marketOutcomes(event, 'h2h');
    const spreads = marketOutcomes(event, 'spreads');
    const totals = marketOutcomes(event, 'totals');

    const h2hFor = (team: string) => h2h?.find(o => sameName(o.name, team))?.price ?? null;

    const spreadFor = (team: string): SpreadQuote | null => {
        const outcome = spreads?.find(o => sameName(o.name, team));
        return outcome ? { point: outcome.point ?? null, price: outcome.price ?? null } : null;
    };

    let total: TotalQuote | null = null;
    if (totals) {
        const over = totals.find(o => sameName(o.name, 'Over'));
        const under = totals.find(o => sameName(o.name, 'Under'));
        total = {
            point: over?.point ?? under?.point ?? null,
            overPrice: over?.price ?? null,
            underPrice: under?.price ?? null,
        };
    }

    return {
        eventId: event.id,
        sport,
        commenceTime: event.commence_time ?? null,
        sideA: event.home_team,
        sideB: event.away_team,
        moneylineA: h2hFor(event.home_team),
        moneylineB: h2hFor(event.away_team),
        spreadA: spreadFor(event.home_team),
        spreadB: spreadFor(event.away_team),
        total,
    };
}

export class OddsApiFeed implements OddsFeed {
    private readonly timeoutMs: number;
    private readonly lookaheadDays: number;
    private readonly baseUrl: string;
    private readonly fetchImpl: typeof fetch;
    private readonly now: () => Date;

    constructor(
        private readonly options: OddsApiFeedOptions,
        private readonly logger: EngineLogger,
    ) {
        this.timeoutMs = options.timeoutMs ?? CONFIG.FEED_TIMEOUT_MS;
        this.lookaheadDays = options.lookaheadDays ?? CONFIG.LOOKAHEAD_DAYS;
        this.baseUrl = options.baseUrl ?? ODDS_API_BASE;
        this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
        this.now = options.now ?? (() => new Date());
    }

    private async getJson(path: string, params: Record<string, string>): Promise<{ ok: true; body: unknown[] } | { ok: false; reason: string }> {
        const url = new URL(`${this.baseUrl}${path}`);
        url.searchParams.set('apiKey', this.options.apiKey);
        for (const [key, value] of Object.entries(params)) url.searchParams.set(key, value);

        try {
            const res = await this.fetchImpl(url.toString(), { signal: AbortSignal.timeout(this.timeoutMs) });
            if (!res.ok) {
                return { ok: false, reason: `HTTP ${res.status} from ${path}` };
            }
            const body: unknown = await res.json();
            if (!Array.isArray(body)) {
                return { ok: false, reason: `Unexpected payload from ${path}` };
            }
            return { ok: true, body };
        } catch (err) {
            return { ok: false, reason: `Request to ${path} failed: ${errorMessage(err)}` };
        }
    }

    async fetchOdds(sport: Sport): Promise<FeedResult<OddsRecord>> {
        const path = `/sports/${SPORT_KEYS[sport]}/odds/`;
        const res = await this.getJson(path, {
            regions: 'us',
            markets: 'h2h,spreads,totals',
            oddsFormat: 'american',
        });
        if (!res.ok) {
            this.logger.warn('OddsAPI', `${sport} odds unavailable`, res.reason);
            return res;
        }

        const horizon = this.now().getTime() + this.lookaheadDays * DAY_MS;
        const data: OddsRecord[] = [];
        let rejected = 0;
        let beyondHorizon = 0;

        for (const item of res.body) {
            const parsed = OddsApiEventSchema.safeParse(item);
            if (!parsed.success) {
                rejected++;
                continue;
            }
            const start = parsed.data.commence_time ? Date.parse(parsed.data.commence_time) : Number.NaN;
            if (!Number.isNaN(start) && start > horizon) {
                beyondHorizon++;
                continue;
            }
            data.push(eventToOddsRecord(parsed.data, sport));
        }

        this.logger.debug('OddsAPI', `${sport}: ${data.length} events, ${rejected} rejected, ${beyondHorizon} beyond lookahead`);
        return { ok: true, data, rejected };
    }

    async fetchResults(sport: Sport, daysFrom: number): Promise<FeedResult<ResultRecord>> {
        const days = Math.min(MAX_DAYS_FROM, Math.max(1, Math.round(daysFrom)));
        const path = `/sports/${SPORT_KEYS[sport]}/scores/`;
        const res = await this.getJson(path, { daysFrom: String(days) });
        if (!res.ok) {
            this.logger.warn('OddsAPI', `${sport} scores unavailable`, res.reason);
            return res;
        }

        const data: ResultRecord[] = [];
        let rejected = 0;
        for (const item of res.body) {
            const parsed = OddsApiScoreSchema.safeParse(item);
            if (!parsed.success) {
                rejected++;
                continue;
            }
            const game = parsed.data;
            // A finished game without scores still settles, as ERROR
            if (!game.completed) continue;

            const scoreOf = (team: string) => game.scores?.find(s => sameName(s.name, team))?.score ?? null;
            data.push({
                sport,
                homeName: game.home_team,
                awayName: game.away_team,
                homeScore: scoreOf(game.home_team),
                awayScore: scoreOf(game.away_team),
                commenceTime: game.commence_time ?? null,
            });
        }

        this.logger.debug('OddsAPI', `${sport}: ${data.length} final scores, ${rejected} rejected`);
        return { ok: true, data, rejected };
    }
}
