/**
 * Pick Feedback Engine - Type Definitions
 * Canonical data contracts for the prediction / settlement / tuning loop
 */

// ============================================================================
// ENUMS
// ============================================================================

export type Sport = 'NFL' | 'NCAAF' | 'NBA' | 'NHL' | 'MLB';

export const SPORTS: readonly Sport[] = ['NFL', 'NCAAF', 'NBA', 'NHL', 'MLB'];

export type Market = 'MONEYLINE' | 'SPREAD' | 'TOTAL';

export type SettlementStatus = 'PENDING' | 'WIN' | 'LOSS' | 'PUSH' | 'NO_MATCH' | 'ERROR';

/** Statuses a later run may never overwrite */
export const FINAL_STATUSES: readonly SettlementStatus[] = ['WIN', 'LOSS', 'PUSH', 'ERROR'];

/** Statuses the reconciler is allowed to (re)resolve */
export const OPEN_STATUSES: readonly SettlementStatus[] = ['PENDING', 'NO_MATCH'];

// ============================================================================
// ODDS INPUT CONTRACT (what ingestion must produce)
// ============================================================================

/** American odds as delivered by a feed; strings are parsed by the normalizer */
export type OddsValue = number | string | null;

export interface SpreadQuote {
    point: number | null;
    price: OddsValue;
}

export interface TotalQuote {
    point: number | null;
    overPrice: OddsValue;
    underPrice: OddsValue;
}

export interface OddsRecord {
    eventId: string;
    sport: Sport;
    commenceTime: string | null;
    sideA: string;
    sideB: string;
    moneylineA: OddsValue;
    moneylineB: OddsValue;
    spreadA: SpreadQuote | null;
    spreadB: SpreadQuote | null;
    total: TotalQuote | null;
}

export interface ResultRecord {
    sport: Sport;
    homeName: string;
    awayName: string;
    /** Raw score values; parsed (or rejected) at settlement time */
    homeScore: number | string | null;
    awayScore: number | string | null;
    commenceTime: string | null;
}

// ============================================================================
// NORMALIZED ODDS
// ============================================================================

export type PricingMode = 'BOTH' | 'SIDE_A' | 'SIDE_B' | 'NONE';

export interface TwoWayProbabilities {
    /** Raw implied probability (vig included) */
    impliedA: number | null;
    impliedB: number | null;
    /** No-vig probability; equals the raw value when only one side is priced */
    normA: number | null;
    normB: number | null;
    pricing: PricingMode;
    /** Market-implied favorite; only set when both sides are priced */
    favorite: 'A' | 'B' | null;
}

export interface NormalizedOddsRecord {
    record: OddsRecord;
    moneyline: TwoWayProbabilities;
    spread: TwoWayProbabilities;
    total: TwoWayProbabilities;
}

// ============================================================================
// CONFIGURATION (persisted tunable state)
// ============================================================================

export interface Configuration {
    adjustFactor: number;
    lockEdgeThreshold: number;
    lockConfidenceThreshold: number;
    upsetEdgeThreshold: number;
    lastWinRate: number | null;
    lastUpdate: string | null;
}

// ============================================================================
// PREDICTIONS & LEDGER
// ============================================================================

export interface MarketDisplay {
    ml: string;
    ats: string;
    ou: string;
}

export interface Prediction {
    eventId: string;
    sport: Sport;
    market: Market;
    createdAt: string;
    commenceTime: string | null;
    sideA: string;
    sideB: string;
    pick: string;
    /** Spread point for SPREAD, total line for TOTAL, null for MONEYLINE */
    pickPoint: number | null;
    modelProbability: number;
    confidence: number;
    edge: number;
    lockFlag: boolean;
    upsetFlag: boolean;
    display: MarketDisplay;
    reason: string;
    status: SettlementStatus;
}

export interface LedgerEntry extends Prediction {
    rowId: string;
    settledAt: string | null;
    finalScoreA: number | null;
    finalScoreB: number | null;
    settlementNote: string;
}

export interface TimeWindow {
    from: Date;
    to: Date;
}

export interface SettlementOutcome {
    status: Exclude<SettlementStatus, 'PENDING'>;
    reason: string;
    scoreA: number | null;
    scoreB: number | null;
}

export interface SettlementUpdate {
    rowId: string;
    outcome: SettlementOutcome;
    settledAt: string;
}

export interface FindUnsettledOptions {
    /** Also return NO_MATCH rows so a wider window can resolve them */
    includeNoMatch?: boolean;
}

/**
 * Append-only prediction history.
 * Rows are only ever mutated by settle(), and only out of an open status;
 * settle() resolves to the row ids it actually changed.
 */
export interface HistoryLedger {
    append(predictions: Prediction[]): Promise<LedgerEntry[]>;
    findUnsettled(sport: Sport, window: TimeWindow, options?: FindUnsettledOptions): Promise<LedgerEntry[]>;
    settle(updates: SettlementUpdate[]): Promise<string[]>;
    entries(): Promise<LedgerEntry[]>;
}

// ============================================================================
// METRICS
// ============================================================================

export interface OutcomeCounts {
    wins: number;
    losses: number;
    pushes: number;
}

export type TuningDirection = 'UP' | 'DOWN' | 'HOLD';

export interface MetricsSnapshot extends OutcomeCounts {
    timestamp: string;
    decided: number;
    winRate: number;
    roiPercent: number;
    avgEdge: number;
    avgConfidence: number;
    adjustFactorBefore: number;
    adjustFactorAfter: number;
    direction: TuningDirection;
    byMarket: Record<Market, OutcomeCounts>;
}

export interface ConfigRepository {
    load(): Promise<Configuration>;
    save(config: Configuration): Promise<void>;
}

export interface MetricsLog {
    append(snapshot: MetricsSnapshot): Promise<MetricsSnapshot[]>;
    list(): Promise<MetricsSnapshot[]>;
    latest(): Promise<MetricsSnapshot | null>;
}

// ============================================================================
// FEEDS
// ============================================================================

export type FeedResult<T> =
    | { ok: true; data: T[]; rejected: number }
    | { ok: false; reason: string };

export interface OddsFeed {
    fetchOdds(sport: Sport): Promise<FeedResult<OddsRecord>>;
    fetchResults(sport: Sport, daysFrom: number): Promise<FeedResult<ResultRecord>>;
}

// ============================================================================
// PREDICTION BOARD (display output)
// ============================================================================

export interface SportSummary {
    sport: Sport;
    fetched: number;
    rejected: number;
    predicted: number;
    abstained: number;
    skipped: number;
    feedError: string | null;
}

export interface PredictionBoard {
    generatedAt: string;
    predictions: Prediction[];
    sports: SportSummary[];
}

export interface BoardRepository {
    append(board: PredictionBoard): Promise<void>;
    latest(): Promise<PredictionBoard | null>;
}

// ============================================================================
// LOGGING
// ============================================================================

export interface EngineLogger {
    debug(context: string, message: string, data?: unknown): void;
    info(context: string, message: string, data?: unknown): void;
    warn(context: string, message: string, data?: unknown): void;
    error(context: string, message: string, data?: unknown): void;
}
