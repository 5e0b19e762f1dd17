import type Database from 'better-sqlite3';
import { z } from 'zod';
import type { TrustCheckpoint, TrustEntry, TrustMapping } from '../types/domain.js';

/**
 * Owner of the per-participant trust state. Only the trust aggregator writes
 * to it, once per round, through `commit`.
 */
export interface TrustStore {
  load(): Map<string, TrustEntry>;
  lastRound(): number;
  /** Writes every entry and advances the round index in one atomic step. */
  commit(round: number, entries: ReadonlyMap<string, TrustEntry>): void;
  checkpoint(): TrustCheckpoint;
  /** Accepts a checkpoint or a bare participant mapping. */
  restore(saved: TrustCheckpoint | TrustMapping): void;
}

const trustMappingSchema = z.record(
  z.string(),
  z.object({ trust: z.number().finite(), lastRound: z.number().int().min(0) })
);

const trustCheckpointSchema = z.object({
  round: z.number().int().min(0),
  entries: trustMappingSchema
});

/**
 * Reads persisted trust state. A bare mapping carries no round index, so the
 * newest `lastRound` among its entries stands in for it.
 */
export function parseTrustCheckpoint(saved: unknown): TrustCheckpoint {
  const bare = trustMappingSchema.safeParse(saved);
  if (!bare.success) return trustCheckpointSchema.parse(saved);

  const round = Math.max(0, ...Object.values(bare.data).map((entry) => entry.lastRound));
  return { round, entries: bare.data };
}

function assertAdvances(current: number, round: number) {
  if (!Number.isInteger(round) || round <= current) {
    throw new Error(`stale_round_commit:${round}<=${current}`);
  }
}

export class MemoryTrustStore implements TrustStore {
  private entries = new Map<string, TrustEntry>();
  private round = 0;

  static fromCheckpoint(saved: TrustCheckpoint | TrustMapping): MemoryTrustStore {
    const store = new MemoryTrustStore();
    store.restore(saved);
    return store;
  }

  load(): Map<string, TrustEntry> {
    return new Map([...this.entries].map(([id, entry]) => [id, { ...entry }]));
  }

  lastRound(): number {
    return this.round;
  }

  commit(round: number, entries: ReadonlyMap<string, TrustEntry>): void {
    assertAdvances(this.round, round);
    const next = new Map(this.entries);
    for (const [id, entry] of entries) next.set(id, { ...entry });
    this.entries = next;
    this.round = round;
  }

  checkpoint(): TrustCheckpoint {
    return {
      round: this.round,
      entries: Object.fromEntries([...this.entries].map(([id, entry]) => [id, { ...entry }]))
    };
  }

  restore(saved: TrustCheckpoint | TrustMapping): void {
    const checkpoint = parseTrustCheckpoint(saved);
    this.entries = new Map(Object.entries(checkpoint.entries).map(([id, entry]) => [id, { ...entry }]));
    this.round = checkpoint.round;
  }
}

export const TRUST_SCHEMA = `
CREATE TABLE IF NOT EXISTS trust_state (
  participant_id TEXT PRIMARY KEY,
  trust REAL NOT NULL,
  last_round INTEGER NOT NULL,
  updated_at TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS trust_meta (
  key TEXT PRIMARY KEY,
  value TEXT NOT NULL
);
`;

type TrustRow = {
  participant_id: string;
  trust: number;
  last_round: number;
};

export class SqliteTrustStore implements TrustStore {
  constructor(private readonly db: Database.Database) {
    db.exec(TRUST_SCHEMA);
  }

  load(): Map<string, TrustEntry> {
    const rows = this.db
      .prepare('SELECT participant_id, trust, last_round FROM trust_state ORDER BY participant_id')
      .all() as TrustRow[];
    return new Map(rows.map((row) => [row.participant_id, { trust: row.trust, lastRound: row.last_round }]));
  }

  lastRound(): number {
    const row = this.db.prepare("SELECT value FROM trust_meta WHERE key = 'last_round'").get() as
      | { value: string }
      | undefined;
    return row ? Number(row.value) : 0;
  }

  commit(round: number, entries: ReadonlyMap<string, TrustEntry>): void {
    const upsert = this.db.prepare(`
      INSERT INTO trust_state (participant_id, trust, last_round, updated_at)
      VALUES (?, ?, ?, ?)
      ON CONFLICT(participant_id) DO UPDATE SET
        trust=excluded.trust,
        last_round=excluded.last_round,
        updated_at=excluded.updated_at
    `);
    const setRound = this.db.prepare(`
      INSERT INTO trust_meta (key, value) VALUES ('last_round', ?)
      ON CONFLICT(key) DO UPDATE SET value=excluded.value
    `);

    const tx = this.db.transaction(() => {
      assertAdvances(this.lastRound(), round);
      const now = new Date().toISOString();
      for (const [id, entry] of entries) {
        upsert.run(id, entry.trust, entry.lastRound, now);
      }
      setRound.run(String(round));
    });

    tx();
  }

  checkpoint(): TrustCheckpoint {
    return {
      round: this.lastRound(),
      entries: Object.fromEntries(this.load())
    };
  }

  restore(saved: TrustCheckpoint | TrustMapping): void {
    const checkpoint = parseTrustCheckpoint(saved);
    const tx = this.db.transaction(() => {
      this.db.prepare('DELETE FROM trust_state').run();
      const insert = this.db.prepare(
        'INSERT INTO trust_state (participant_id, trust, last_round, updated_at) VALUES (?, ?, ?, ?)'
      );
      const now = new Date().toISOString();
      for (const [id, entry] of Object.entries(checkpoint.entries)) {
        insert.run(id, entry.trust, entry.lastRound, now);
      }
      this.db
        .prepare(`
          INSERT INTO trust_meta (key, value) VALUES ('last_round', ?)
          ON CONFLICT(key) DO UPDATE SET value=excluded.value
        `)
        .run(String(checkpoint.round));
    });

    tx();
  }
}
