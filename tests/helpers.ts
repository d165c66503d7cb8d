import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { Prediction } from '../engine/src/types';
import { Logger } from '../lib/logger';
import type { LogSink } from '../lib/logger';

// ── temp directories ─────────────────────────────────────────────────────

export async function makeTempDir(prefix = 'edgeloop-'): Promise<string> {
  return mkdtemp(join(tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

// ── logging ──────────────────────────────────────────────────────────────

export interface CapturedLine {
  level: 'debug' | 'info' | 'warn' | 'error';
  line: string;
}

export function createCapturingLogger(): { logger: Logger; lines: CapturedLine[]; text: () => string[] } {
  const lines: CapturedLine[] = [];
  const sink: LogSink = {
    debug: line => { lines.push({ level: 'debug', line }); },
    info: line => { lines.push({ level: 'info', line }); },
    warn: line => { lines.push({ level: 'warn', line }); },
    error: line => { lines.push({ level: 'error', line }); },
  };
  return { logger: new Logger('debug', sink), lines, text: () => lines.map(l => l.line) };
}

// ── fixtures ─────────────────────────────────────────────────────────────

export function makePrediction(overrides: Partial<Prediction> = {}): Prediction {
  return {
    eventId: 'evt-bears-packers',
    sport: 'NFL',
    market: 'MONEYLINE',
    createdAt: '2026-10-18T12:00:00.000Z',
    commenceTime: '2026-10-18T17:00:00Z',
    sideA: 'Bears',
    sideB: 'Packers',
    pick: 'Bears',
    pickPoint: null,
    modelProbability: 0.58,
    confidence: 58,
    edge: 2.8,
    lockFlag: true,
    upsetFlag: false,
    display: { ml: 'Bears:-150 | Packers:+130', ats: '', ou: '' },
    reason: 'Moneyline: market no-vig probability 58%',
    status: 'PENDING',
    ...overrides,
  };
}

// ── PostgREST stand-in ───────────────────────────────────────────────────

type Row = Record<string, unknown>;

export interface PostgrestCall {
  method: string;
  table: string;
  params: URLSearchParams;
  body: unknown;
}

export interface PostgrestFailure {
  status: number;
  message: string;
}

const isRow = (value: unknown): value is Row =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const RESERVED_PARAMS = new Set(['select', 'order', 'offset', 'limit', 'columns']);

const unquote = (value: string): string => value.replace(/^"|"$/g, '');

/** Splits on commas outside parentheses and double quotes */
function splitTopLevel(list: string): string[] {
  const parts: string[] = [];
  let depth = 0;
  let quoted = false;
  let current = '';
  for (const ch of list) {
    if (ch === '"') quoted = !quoted;
    else if (!quoted && ch === '(') depth++;
    else if (!quoted && ch === ')') depth--;
    if (ch === ',' && depth === 0 && !quoted) {
      parts.push(current);
      current = '';
    } else {
      current += ch;
    }
  }
  parts.push(current);
  return parts;
}

function compare(cell: unknown, value: string): number | null {
  if (cell === null || cell === undefined) return null;
  const a = Number(cell);
  const b = Number(value);
  if (Number.isFinite(a) && Number.isFinite(b)) return a - b;
  const ta = Date.parse(String(cell));
  const tb = Date.parse(value);
  return Number.isNaN(ta) || Number.isNaN(tb) ? null : ta - tb;
}

/** One `op.value` filter against a cell */
function testFilter(cell: unknown, expr: string): boolean {
  const dot = expr.indexOf('.');
  const op = expr.slice(0, dot);
  const value = expr.slice(dot + 1);
  switch (op) {
    case 'eq':
      return String(cell) === unquote(value);
    case 'in':
      return splitTopLevel(value.slice(1, -1)).map(unquote).includes(String(cell));
    case 'is':
      return value === 'null' ? cell === null || cell === undefined : String(cell) === value;
    case 'gte': {
      const d = compare(cell, unquote(value));
      return d !== null && d >= 0;
    }
    case 'lte': {
      const d = compare(cell, unquote(value));
      return d !== null && d <= 0;
    }
    default:
      throw new Error(`unsupported filter ${expr}`);
  }
}

/** `and(...)`, `or(...)` or `column.op.value` inside a logic tree */
function testCondition(row: Row, condition: string): boolean {
  for (const [prefix, every] of [['and(', true], ['or(', false]] as const) {
    if (condition.startsWith(prefix) && condition.endsWith(')')) {
      const terms = splitTopLevel(condition.slice(prefix.length, -1));
      return every ? terms.every(t => testCondition(row, t)) : terms.some(t => testCondition(row, t));
    }
  }
  const dot = condition.indexOf('.');
  return testFilter(row[condition.slice(0, dot)], condition.slice(dot + 1));
}

function matches(row: Row, params: URLSearchParams): boolean {
  for (const [column, expr] of params) {
    if (RESERVED_PARAMS.has(column)) continue;
    if (column === 'or' || column === 'and') {
      if (!testCondition(row, `${column}${expr}`)) return false;
    } else if (!testFilter(row[column], expr)) {
      return false;
    }
  }
  return true;
}

function project(row: Row, select: string | null): Row {
  if (!select || select === '*') return { ...row };
  const out: Row = {};
  for (const column of select.split(',')) out[column] = row[column];
  return out;
}

function json(status: number, body: unknown): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json' } });
}

export interface PostgrestStubOptions {
  /** Server-side cap on rows per response, like PostgREST's max-rows */
  maxRows?: number;
}

/**
 * In-memory tables behind a fetch function, enough of PostgREST for
 * insert / select (eq, in, is, gte, lte, or/and, order, range) / update ... select.
 */
export function createPostgrestStub(tables: Record<string, Row[]> = {}, options: PostgrestStubOptions = {}) {
  const calls: PostgrestCall[] = [];
  let seq = 0;
  let nextFailure: PostgrestFailure | null = null;

  const fetchImpl: typeof fetch = async (input, init) => {
    const href = typeof input === 'string' ? input : input instanceof URL ? input.href : input.url;
    const url = new URL(href);
    const table = url.pathname.replace(/^\/rest\/v1\//, '');
    const method = (init?.method ?? 'GET').toUpperCase();
    const body: unknown = typeof init?.body === 'string' ? JSON.parse(init.body) : null;
    calls.push({ method, table, params: url.searchParams, body });

    if (nextFailure) {
      const failure = nextFailure;
      nextFailure = null;
      return json(failure.status, { message: failure.message, code: 'XX000', details: null, hint: null });
    }

    const rows = tables[table] ?? (tables[table] = []);

    if (method === 'POST') {
      const incoming = Array.isArray(body) ? body : [body];
      for (const item of incoming) {
        if (isRow(item)) rows.push({ seq: ++seq, ...item });
      }
      return new Response('', { status: 201 });
    }

    if (method === 'PATCH') {
      const patch = isRow(body) ? body : {};
      const touched = rows.filter(r => matches(r, url.searchParams));
      for (const row of touched) Object.assign(row, patch);
      const select = url.searchParams.get('select');
      if (!select) return new Response(null, { status: 204 });
      return json(200, touched.map(r => project(r, select)));
    }

    if (method === 'GET') {
      let found = rows.filter(r => matches(r, url.searchParams));
      const order = url.searchParams.get('order');
      if (order) {
        const [column, direction] = order.split('.');
        const sign = direction === 'desc' ? -1 : 1;
        found = [...found].sort((a, b) => (Number(a[column]) - Number(b[column])) * sign);
      }
      const offset = Number(url.searchParams.get('offset') ?? 0);
      const limit = url.searchParams.get('limit');
      found = found.slice(offset, limit === null ? undefined : offset + Number(limit));
      if (options.maxRows !== undefined) found = found.slice(0, options.maxRows);
      return json(200, found.map(r => project(r, url.searchParams.get('select'))));
    }

    return json(405, { message: `unsupported method ${method}` });
  };

  return {
    fetch: fetchImpl,
    calls,
    tables,
    failNext(failure: PostgrestFailure): void {
      nextFailure = failure;
    },
  };
}

// ── JSON responses for feed tests ────────────────────────────────────────

export function jsonResponse(body: unknown, status = 200): Response {
  return json(status, body);
}
