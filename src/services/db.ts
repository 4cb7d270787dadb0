import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';
import { getConfigValue } from '../config/json-config.js';
import type { CircuitBreakerEventType, CircuitState } from '../types/circuit-breaker.js';
import type { RoutingStrategy } from '../types/routing.js';

const IN_MEMORY = ':memory:';
const DB_PATH = resolveDbPath(getConfigValue('SWITCHYARD_DB_PATH') ?? 'memory/switchyard.db');

function resolveDbPath(configured: string): string {
  if (configured === IN_MEMORY) return IN_MEMORY;
  const resolved = path.resolve(configured);
  if (!fs.existsSync(path.dirname(resolved))) {
    fs.mkdirSync(path.dirname(resolved), { recursive: true });
  }
  return resolved;
}

export const db = new Database(DB_PATH);

if (DB_PATH !== IN_MEMORY) {
  db.pragma('journal_mode = WAL');
}

db.exec(`
  CREATE TABLE IF NOT EXISTS routing_events (
    id TEXT PRIMARY KEY,
    correlation_id TEXT,
    provider TEXT NOT NULL,
    strategy TEXT NOT NULL,
    score REAL,
    alternatives_json TEXT NOT NULL,
    reason TEXT NOT NULL,
    created_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS circuit_breaker_events (
    id TEXT PRIMARY KEY,
    breaker TEXT NOT NULL,
    event_type TEXT NOT NULL,
    prev_state TEXT NOT NULL,
    new_state TEXT NOT NULL,
    reason TEXT NOT NULL,
    stats_json TEXT NOT NULL,
    created_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS routing_usage (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    provider TEXT NOT NULL,
    success INTEGER NOT NULL,
    latency_ms REAL NOT NULL,
    tokens INTEGER NOT NULL DEFAULT 0,
    cost REAL NOT NULL DEFAULT 0,
    created_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS runbook_chunks (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    source TEXT NOT NULL,
    content TEXT NOT NULL,
    created_at TEXT NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_circuit_breaker_events_breaker ON circuit_breaker_events(breaker, created_at);
  CREATE INDEX IF NOT EXISTS idx_routing_usage_provider ON routing_usage(provider, created_at);
`);

// ── Routing Telemetry ──────────────────────────────────────────────────────

export interface RoutingEventRow {
  id: string;
  correlation_id: string | null;
  provider: string;
  strategy: RoutingStrategy;
  score: number | null;
  alternatives_json: string;
  reason: string;
  created_at: string;
}

export interface RoutingEventInput {
  id: string;
  correlationId: string | null;
  provider: string;
  strategy: RoutingStrategy;
  /** `null` stands in for the infinite fallback score, which SQLite cannot store. */
  score: number | null;
  alternatives: string[];
  reason: string;
  createdAt?: string;
}

export function saveRoutingEvent(input: RoutingEventInput, maxRows = 500): void {
  db.prepare(`
    INSERT INTO routing_events (id, correlation_id, provider, strategy, score, alternatives_json, reason, created_at)
    VALUES (?, ?, ?, ?, ?, ?, ?, ?)
  `).run(
    input.id,
    input.correlationId,
    input.provider,
    input.strategy,
    input.score,
    JSON.stringify(input.alternatives),
    input.reason,
    input.createdAt ?? new Date().toISOString(),
  );

  const boundedLimit = Math.max(50, Math.floor(maxRows));
  db.prepare(`
    DELETE FROM routing_events
    WHERE id IN (
      SELECT id
      FROM routing_events
      ORDER BY created_at DESC
      LIMIT -1 OFFSET ?
    )
  `).run(boundedLimit);
}

export function listRoutingEvents(limit = 80): RoutingEventRow[] {
  const boundedLimit = Math.max(1, Math.min(500, Math.floor(limit)));
  return db.prepare(`
    SELECT id, correlation_id, provider, strategy, score, alternatives_json, reason, created_at
    FROM routing_events
    ORDER BY created_at DESC
    LIMIT ?
  `).all(boundedLimit) as RoutingEventRow[];
}

export interface RoutingUsageInput {
  provider: string;
  success: boolean;
  latencyMs: number;
  tokens: number;
  cost: number;
  createdAt?: string;
}

export function saveRoutingUsage(input: RoutingUsageInput): void {
  db.prepare(`
    INSERT INTO routing_usage (provider, success, latency_ms, tokens, cost, created_at)
    VALUES (?, ?, ?, ?, ?, ?)
  `).run(
    input.provider,
    input.success ? 1 : 0,
    input.latencyMs,
    Math.max(0, Math.floor(input.tokens)),
    input.cost,
    input.createdAt ?? new Date().toISOString(),
  );
}

export interface ProviderUsageAggregateRow {
  provider: string;
  requests: number;
  failures: number;
  tokens: number;
  cost: number;
}

export function aggregateRoutingUsageSince(sinceIso: string): ProviderUsageAggregateRow[] {
  return db.prepare(`
    SELECT
      provider,
      COUNT(*) AS requests,
      SUM(CASE WHEN success = 0 THEN 1 ELSE 0 END) AS failures,
      COALESCE(SUM(tokens), 0) AS tokens,
      COALESCE(SUM(cost), 0) AS cost
    FROM routing_usage
    WHERE created_at >= ?
    GROUP BY provider
    ORDER BY provider
  `).all(sinceIso) as ProviderUsageAggregateRow[];
}

// ── Circuit Breaker Health ─────────────────────────────────────────────────

export interface CircuitBreakerEventRow {
  id: string;
  breaker: string;
  event_type: CircuitBreakerEventType;
  prev_state: CircuitState;
  new_state: CircuitState;
  reason: string;
  stats_json: string;
  created_at: string;
}

export function saveCircuitBreakerEvent(input: {
  id: string;
  breaker: string;
  eventType: CircuitBreakerEventType;
  prevState: CircuitState;
  newState: CircuitState;
  reason: string;
  stats: unknown;
  createdAt?: string;
}): void {
  db.prepare(`
    INSERT INTO circuit_breaker_events (id, breaker, event_type, prev_state, new_state, reason, stats_json, created_at)
    VALUES (?, ?, ?, ?, ?, ?, ?, ?)
  `).run(
    input.id,
    input.breaker,
    input.eventType,
    input.prevState,
    input.newState,
    input.reason,
    JSON.stringify(input.stats),
    input.createdAt ?? new Date().toISOString(),
  );
}

export function listCircuitBreakerEvents(breaker: string, limit = 50): CircuitBreakerEventRow[] {
  const boundedLimit = Math.max(1, Math.min(500, Math.floor(limit)));
  return db.prepare(`
    SELECT id, breaker, event_type, prev_state, new_state, reason, stats_json, created_at
    FROM circuit_breaker_events
    WHERE breaker = ?
    ORDER BY created_at DESC, rowid DESC
    LIMIT ?
  `).all(breaker, boundedLimit) as CircuitBreakerEventRow[];
}

// ── Runbook Chunks ─────────────────────────────────────────────────────────

export interface RunbookChunkRow {
  id: number;
  source: string;
  content: string;
  created_at: string;
}

export function insertRunbookChunk(source: string, content: string, createdAt?: string): number {
  const result = db.prepare(`
    INSERT INTO runbook_chunks (source, content, created_at)
    VALUES (?, ?, ?)
  `).run(source, content, createdAt ?? new Date().toISOString());
  return Number(result.lastInsertRowid);
}

export function listRecentRunbookChunks(limit = 400): RunbookChunkRow[] {
  const boundedLimit = Math.max(1, Math.floor(limit));
  return db.prepare(`
    SELECT id, source, content, created_at
    FROM runbook_chunks
    ORDER BY id DESC
    LIMIT ?
  `).all(boundedLimit) as RunbookChunkRow[];
}

export function getRunbookChunksByIds(ids: number[]): RunbookChunkRow[] {
  if (ids.length === 0) return [];
  const placeholders = ids.map(() => '?').join(', ');
  return db.prepare(`
    SELECT id, source, content, created_at
    FROM runbook_chunks
    WHERE id IN (${placeholders})
  `).all(...ids) as RunbookChunkRow[];
}
