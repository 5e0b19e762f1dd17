import type { TrustEntry, TrustSnapshot, TrustSnapshotEntry } from '../types/domain.js';
import { MAX_SCORE, MIN_SCORE } from './reward.js';
import type { TrustStore } from './trustStore.js';

export const EMA_ALPHA = 0.2;
export const INITIAL_TRUST = 0.5;

export type TrustPolicy = {
  alpha: number;
  initialTrust: number;
  minScore: number;
};

export type TrustUpdateOptions = {
  round?: number;
  /**
   * Participants expected to report this round. Those without a score are
   * updated with the minimum score. Defaults to every known participant.
   */
  expected?: Iterable<string>;
};

export type PendingTrustUpdate = {
  round: number;
  snapshot: TrustSnapshot;
  commit(): TrustSnapshot;
};

function sanitizeScore(value: number | undefined, minScore: number): number {
  if (value === undefined || !Number.isFinite(value)) return minScore;
  return Math.max(MIN_SCORE, Math.min(MAX_SCORE, value));
}

/** One EMA step that lands between `previous` and `target`, rounding included. */
export function smooth(previous: number, target: number, alpha: number): number {
  const next = previous + alpha * (target - previous);
  return target >= previous ? Math.min(next, target) : Math.max(next, target);
}

function freezeSnapshot(round: number, entries: ReadonlyMap<string, TrustEntry>): TrustSnapshot {
  const list: TrustSnapshotEntry[] = [...entries]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([participantId, entry]) => Object.freeze({ participantId, ...entry }));

  return Object.freeze({
    round,
    entries: Object.freeze(list),
    createdAt: new Date().toISOString()
  });
}

export class TrustAggregator {
  readonly policy: TrustPolicy;

  constructor(
    private readonly store: TrustStore,
    policy: Partial<TrustPolicy> = {}
  ) {
    this.policy = {
      alpha: policy.alpha ?? EMA_ALPHA,
      initialTrust: policy.initialTrust ?? INITIAL_TRUST,
      minScore: policy.minScore ?? MIN_SCORE
    };

    if (!(this.policy.alpha > 0 && this.policy.alpha <= 1)) {
      throw new RangeError(`trust alpha must be in (0, 1], got ${this.policy.alpha}`);
    }
  }

  current(): TrustSnapshot {
    return freezeSnapshot(this.store.lastRound(), this.store.load());
  }

  /**
   * Computes the next trust vector without touching the store. The returned
   * `commit` writes it in one step, and refuses if another round has been
   * committed in between.
   */
  prepare(roundScores: ReadonlyMap<string, number>, options: TrustUpdateOptions = {}): PendingTrustUpdate {
    const base = this.store.load();
    const baseRound = this.store.lastRound();
    const round = options.round ?? baseRound + 1;

    const participants = new Set<string>(options.expected ?? base.keys());
    for (const id of roundScores.keys()) participants.add(id);

    const updated = new Map<string, TrustEntry>();
    for (const id of participants) {
      const previous = base.get(id)?.trust ?? this.policy.initialTrust;
      const target = sanitizeScore(roundScores.get(id), this.policy.minScore);
      updated.set(id, { trust: smooth(previous, target, this.policy.alpha), lastRound: round });
    }

    const merged = new Map(base);
    for (const [id, entry] of updated) merged.set(id, entry);
    const snapshot = freezeSnapshot(round, merged);

    return {
      round,
      snapshot,
      commit: () => {
        this.store.commit(round, updated);
        return snapshot;
      }
    };
  }

  update(roundScores: ReadonlyMap<string, number>, options: TrustUpdateOptions = {}): TrustSnapshot {
    return this.prepare(roundScores, options).commit();
  }
}
