import { mkdirSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import Database from 'better-sqlite3';
import {
  ROUND_PHASES,
  ROUND_STATUSES,
  type ParticipantProfile,
  type RegisteredParticipant,
  type RoundRecord,
  type RoundStatus,
  type TrustSnapshot
} from '../types/domain.js';
import { isDifficultyTier } from '../engine/tiers.js';
import { SqliteTrustStore } from './trustStore.js';
import type { ShapedWeights } from './weights.js';

export interface RoundRecorder {
  recordRound(record: RoundRecord): void;
}

type ParticipantUpsertInput = ParticipantProfile & {
  enabled?: boolean;
  metadata?: Record<string, unknown>;
};

export type PublishedSnapshotRecord = {
  round: number;
  snapshotHash: string;
  snapshot: TrustSnapshot;
  weights: ShapedWeights;
  publishedAt: string;
};

const SCHEMA = `
CREATE TABLE IF NOT EXISTS participants (
  id TEXT PRIMARY KEY,
  endpoint TEXT NOT NULL,
  api_key TEXT,
  enabled INTEGER NOT NULL DEFAULT 1,
  metadata_json TEXT,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS rounds (
  id TEXT PRIMARY KEY,
  round INTEGER NOT NULL,
  status TEXT NOT NULL,
  seed INTEGER NOT NULL,
  tier INTEGER NOT NULL,
  challenge_id TEXT,
  failed_phase TEXT,
  reason TEXT,
  phases_json TEXT NOT NULL,
  outcomes_json TEXT NOT NULL,
  publication_ref TEXT,
  started_at TEXT NOT NULL,
  finished_at TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS published_snapshots (
  round INTEGER PRIMARY KEY,
  snapshot_hash TEXT NOT NULL,
  snapshot_json TEXT NOT NULL,
  weights_json TEXT NOT NULL,
  published_at TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_participants_enabled ON participants(enabled);
CREATE INDEX IF NOT EXISTS idx_rounds_started_at ON rounds(started_at DESC);
CREATE INDEX IF NOT EXISTS idx_rounds_status ON rounds(status, started_at DESC);
`;

function nowIso() {
  return new Date().toISOString();
}

function parseJson<T>(value: unknown, fallback: T): T {
  if (!value) return fallback;
  try {
    return JSON.parse(String(value)) as T;
  } catch {
    return fallback;
  }
}

function ensureValue<T extends string>(value: string, allowed: readonly T[], fallback: T): T {
  return allowed.find((candidate) => candidate === value) ?? fallback;
}

function toParticipant(row: Record<string, unknown>): RegisteredParticipant {
  return {
    id: String(row.id),
    endpoint: String(row.endpoint),
    apiKey: row.api_key ? String(row.api_key) : undefined,
    enabled: Number(row.enabled) === 1,
    metadata: row.metadata_json ? parseJson<Record<string, unknown>>(String(row.metadata_json), {}) : undefined,
    createdAt: String(row.created_at),
    updatedAt: String(row.updated_at)
  };
}

function toRound(row: Record<string, unknown>): RoundRecord {
  const tier = Number(row.tier);
  return {
    id: String(row.id),
    round: Number(row.round),
    status: ensureValue(String(row.status), ROUND_STATUSES, 'abandoned'),
    seed: Number(row.seed),
    tier: isDifficultyTier(tier) ? tier : 0,
    challengeId: row.challenge_id ? String(row.challenge_id) : undefined,
    failedPhase: row.failed_phase ? ensureValue(String(row.failed_phase), ROUND_PHASES, 'idle') : undefined,
    reason: row.reason ? String(row.reason) : undefined,
    phases: parseJson<RoundRecord['phases']>(row.phases_json, []),
    outcomes: parseJson<RoundRecord['outcomes']>(row.outcomes_json, []),
    publicationRef: row.publication_ref ? String(row.publication_ref) : undefined,
    startedAt: String(row.started_at),
    finishedAt: String(row.finished_at)
  };
}

export function openDatabase(file: string): Database.Database {
  if (file !== ':memory:') {
    const path = resolve(process.cwd(), file);
    mkdirSync(dirname(path), { recursive: true });
    file = path;
  }

  const db = new Database(file);
  db.pragma('journal_mode = WAL');
  db.pragma('synchronous = NORMAL');
  db.exec(SCHEMA);
  return db;
}

export function createStore(db: Database.Database) {
  const trust = new SqliteTrustStore(db);

  function getParticipant(id: string): RegisteredParticipant | undefined {
    const row = db.prepare('SELECT * FROM participants WHERE id = ?').get(id) as Record<string, unknown> | undefined;
    return row ? toParticipant(row) : undefined;
  }

  const store = {
    trust,

    listParticipants(options: { enabledOnly?: boolean } = {}): RegisteredParticipant[] {
      const sql = options.enabledOnly
        ? 'SELECT * FROM participants WHERE enabled = 1 ORDER BY id'
        : 'SELECT * FROM participants ORDER BY id';
      const rows = db.prepare(sql).all() as Record<string, unknown>[];
      return rows.map(toParticipant);
    },

    getParticipant,

    findParticipantByApiKey(apiKey: string): RegisteredParticipant | undefined {
      const row = db
        .prepare('SELECT * FROM participants WHERE api_key = ? AND enabled = 1')
        .get(apiKey) as Record<string, unknown> | undefined;
      return row ? toParticipant(row) : undefined;
    },

    upsertParticipant(input: ParticipantUpsertInput): RegisteredParticipant {
      const now = nowIso();
      db.prepare(`
        INSERT INTO participants (id, endpoint, api_key, enabled, metadata_json, created_at, updated_at)
        VALUES (?, ?, ?, ?, ?, ?, ?)
        ON CONFLICT(id) DO UPDATE SET
          endpoint=excluded.endpoint,
          api_key=excluded.api_key,
          enabled=excluded.enabled,
          metadata_json=excluded.metadata_json,
          updated_at=excluded.updated_at
      `).run(
        input.id,
        input.endpoint,
        input.apiKey ?? null,
        input.enabled === false ? 0 : 1,
        input.metadata ? JSON.stringify(input.metadata) : null,
        now,
        now
      );

      const saved = getParticipant(input.id);
      if (!saved) throw new Error(`participant_upsert_failed:${input.id}`);
      return saved;
    },

    setParticipantEnabled(id: string, enabled: boolean): RegisteredParticipant | undefined {
      db.prepare('UPDATE participants SET enabled = ?, updated_at = ? WHERE id = ?').run(enabled ? 1 : 0, nowIso(), id);
      return getParticipant(id);
    },

    recordRound(record: RoundRecord): void {
      db.prepare(`
        INSERT INTO rounds (
          id, round, status, seed, tier, challenge_id, failed_phase, reason,
          phases_json, outcomes_json, publication_ref, started_at, finished_at
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      `).run(
        record.id,
        record.round,
        record.status,
        record.seed,
        record.tier,
        record.challengeId ?? null,
        record.failedPhase ?? null,
        record.reason ?? null,
        JSON.stringify(record.phases),
        JSON.stringify(record.outcomes),
        record.publicationRef ?? null,
        record.startedAt,
        record.finishedAt
      );
    },

    listRounds(options: { status?: RoundStatus; limit?: number } = {}): RoundRecord[] {
      const limit = options.limit ?? 50;
      const rows = options.status
        ? db.prepare('SELECT * FROM rounds WHERE status = ? ORDER BY started_at DESC, rowid DESC LIMIT ?').all(options.status, limit)
        : db.prepare('SELECT * FROM rounds ORDER BY started_at DESC, rowid DESC LIMIT ?').all(limit);
      return (rows as Record<string, unknown>[]).map(toRound);
    },

    getRound(id: string): RoundRecord | undefined {
      const row = db.prepare('SELECT * FROM rounds WHERE id = ?').get(id) as Record<string, unknown> | undefined;
      return row ? toRound(row) : undefined;
    },

    savePublishedSnapshot(record: PublishedSnapshotRecord): void {
      db.prepare(`
        INSERT INTO published_snapshots (round, snapshot_hash, snapshot_json, weights_json, published_at)
        VALUES (?, ?, ?, ?, ?)
        ON CONFLICT(round) DO UPDATE SET
          snapshot_hash=excluded.snapshot_hash,
          snapshot_json=excluded.snapshot_json,
          weights_json=excluded.weights_json,
          published_at=excluded.published_at
      `).run(
        record.round,
        record.snapshotHash,
        JSON.stringify(record.snapshot),
        JSON.stringify(record.weights),
        record.publishedAt
      );
    },

    latestPublishedSnapshot(): PublishedSnapshotRecord | undefined {
      const row = db
        .prepare('SELECT * FROM published_snapshots ORDER BY round DESC LIMIT 1')
        .get() as Record<string, unknown> | undefined;
      if (!row) return undefined;
      return {
        round: Number(row.round),
        snapshotHash: String(row.snapshot_hash),
        snapshot: parseJson<TrustSnapshot>(row.snapshot_json, { round: 0, entries: [], createdAt: '' }),
        weights: parseJson<ShapedWeights>(row.weights_json, { participantIds: [], weights: [] }),
        publishedAt: String(row.published_at)
      };
    },

    stats() {
      const count = (sql: string) => (db.prepare(sql).get() as { count: number } | undefined)?.count ?? 0;
      return {
        participants: count('SELECT COUNT(*) as count FROM participants'),
        enabledParticipants: count('SELECT COUNT(*) as count FROM participants WHERE enabled = 1'),
        rounds: count('SELECT COUNT(*) as count FROM rounds'),
        publishedRounds: count("SELECT COUNT(*) as count FROM rounds WHERE status = 'published'"),
        abandonedRounds: count("SELECT COUNT(*) as count FROM rounds WHERE status = 'abandoned'"),
        lastTrustRound: trust.lastRound()
      };
    }
  };

  return store satisfies RoundRecorder;
}

export type ValidatorStore = ReturnType<typeof createStore>;
