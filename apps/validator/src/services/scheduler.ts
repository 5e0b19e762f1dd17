import { randomInt } from 'node:crypto';
import { setTimeout as sleep } from 'node:timers/promises';
import { generate } from '../engine/mapGenerator.js';
import { replayAll, type ReplayOptions } from '../engine/replayEngine.js';
import { DIFFICULTY_TIERS } from '../engine/tiers.js';
import type {
  ChallengeSpec,
  DifficultyTier,
  ParticipantOutcome,
  ReplayResult,
  RoundPhase,
  RoundRecord
} from '../types/domain.js';
import { PublicationError, RoundAbortedError, ValidatorError, errorMessage } from '../utils/errors.js';
import { newRoundId } from '../utils/ids.js';
import type { DispatchChannel } from './dispatch.js';
import type { LedgerClient } from './ledger.js';
import type { Logger } from './logger.js';
import type { ValidatorMetrics } from './metrics.js';
import { MIN_SCORE, score } from './reward.js';
import { sampleParticipants } from './sampling.js';
import type { RoundRecorder } from './store.js';
import type { TrustAggregator } from './trust.js';

export type RoundSchedulerConfig = {
  roundTimeoutMs: number;
  sampleSize: number;
  tiers: readonly DifficultyTier[];
};

export type RoundSchedulerDeps = {
  ledger: LedgerClient;
  dispatch: DispatchChannel;
  aggregator: TrustAggregator;
  logger: Logger;
  recorder?: RoundRecorder;
  metrics?: Pick<ValidatorMetrics, 'observeRound'>;
  generateChallenge?: (seed: number, tier: DifficultyTier) => ChallengeSpec;
  replayOptions?: ReplayOptions;
  seedSource?: () => number;
  now?: () => number;
};

function defaultSeed(): number {
  return randomInt(0, 2 ** 32 - 1);
}

function outcomeFor(participantId: string, result: ReplayResult | undefined): ParticipantOutcome {
  if (!result) {
    return { participantId, responded: false, score: MIN_SCORE, error: 'no_response' };
  }

  const base = {
    participantId,
    responded: true,
    terminationReason: result.terminationReason,
    timeToGoal: result.timeToGoal,
    ...(Number.isFinite(result.energyUsed) ? { energyUsed: result.energyUsed } : {}),
    ...(result.invalidReason ? { error: result.invalidReason } : {})
  };

  try {
    return { ...base, score: score(result) };
  } catch (error) {
    return { ...base, score: MIN_SCORE, error: `scoring_error:${errorMessage(error)}` };
  }
}

/**
 * Drives rounds end to end: generate, dispatch, collect, replay, score,
 * aggregate, publish. Trust is committed only after the ledger accepted the
 * snapshot, so an abandoned round leaves it as it was.
 */
export class RoundScheduler {
  private currentPhase: RoundPhase = 'idle';
  private inFlightRound: Promise<RoundRecord> | null = null;
  private lastRound = 0;
  private controller = new AbortController();
  private readonly log: Logger;
  private readonly now: () => number;
  private readonly seedSource: () => number;
  private readonly tiers: readonly DifficultyTier[];

  constructor(
    private readonly deps: RoundSchedulerDeps,
    private readonly config: RoundSchedulerConfig
  ) {
    this.log = deps.logger.child({ component: 'scheduler' });
    this.now = deps.now ?? Date.now;
    this.seedSource = deps.seedSource ?? defaultSeed;
    this.tiers = config.tiers.length > 0 ? config.tiers : DIFFICULTY_TIERS;
  }

  get phase(): RoundPhase {
    return this.currentPhase;
  }

  get inFlight(): boolean {
    return this.inFlightRound !== null;
  }

  get stopped(): boolean {
    return this.controller.signal.aborted;
  }

  /** Runs a single round. A call made while a round is running joins that round. */
  runOneRound(): Promise<RoundRecord> {
    if (this.inFlightRound) return this.inFlightRound;

    this.inFlightRound = this.executeRound().finally(() => {
      this.inFlightRound = null;
    });
    return this.inFlightRound;
  }

  /** Runs rounds until `stop()`, sleeping `pollIntervalMs` between them. */
  async runForever(pollIntervalMs: number): Promise<void> {
    if (this.stopped) this.controller = new AbortController();
    const signal = this.controller.signal;
    this.log.info({ pollIntervalMs, tiers: this.tiers }, 'round scheduler started');

    while (!signal.aborted) {
      await this.runOneRound();
      if (signal.aborted) break;

      this.currentPhase = 'sleeping';
      try {
        await sleep(pollIntervalMs, undefined, { signal });
      } catch (error) {
        if (!signal.aborted) throw error;
      } finally {
        this.currentPhase = 'idle';
      }
    }

    this.log.info('round scheduler stopped');
  }

  /** Aborts between phases and interrupts the sleep. A replay in progress completes first. */
  stop(): void {
    this.controller.abort();
  }

  private enter(phase: RoundPhase, record: RoundRecord) {
    if (this.stopped) throw new RoundAbortedError(phase);
    this.currentPhase = phase;
    record.phases.push(phase);
  }

  private pickTier(round: number): DifficultyTier {
    return this.tiers[(round - 1) % this.tiers.length] ?? 0;
  }

  private async executeRound(): Promise<RoundRecord> {
    const { aggregator, ledger, dispatch } = this.deps;
    const startedAt = this.now();
    let log = this.log;

    // provisional until the trust store has been read
    const provisionalRound = this.lastRound + 1;
    const record: RoundRecord = {
      id: newRoundId(provisionalRound),
      round: provisionalRound,
      status: 'abandoned',
      seed: 0,
      tier: this.pickTier(provisionalRound),
      phases: [],
      outcomes: [],
      startedAt: new Date(startedAt).toISOString(),
      finishedAt: ''
    };

    try {
      this.enter('generating', record);
      const round = aggregator.current().round + 1;
      const seed = this.seedSource() >>> 0;
      const tier = this.pickTier(round);
      this.lastRound = round;
      record.id = newRoundId(round);
      record.round = round;
      record.seed = seed;
      record.tier = tier;
      log = this.log.child({ round, seed, tier });

      const challenge = (this.deps.generateChallenge ?? generate)(seed, tier);
      record.challengeId = challenge.id;
      log.debug({ challengeId: challenge.id, obstacles: challenge.obstacles.length }, 'challenge generated');

      this.enter('dispatching', record);
      const pool = await ledger.currentParticipantIds();
      const sampled = sampleParticipants(pool, this.config.sampleSize, seed);
      if (sampled.length === 0) {
        throw new ValidatorError('no_participants', 'ledger reported no participants');
      }
      const handles = await dispatch.broadcast(challenge, new Set(sampled));

      this.enter('collecting', record);
      const responses = await dispatch.collect(handles, this.now() + this.config.roundTimeoutMs);
      log.info({ challengeId: challenge.id, sampled: sampled.length, responded: responses.size }, 'responses collected');

      this.enter('replaying', record);
      const results = await replayAll(challenge, responses, this.deps.replayOptions);

      this.enter('scoring', record);
      const scores = new Map<string, number>();
      for (const participantId of sampled) {
        const outcome = outcomeFor(participantId, results.get(participantId));
        record.outcomes.push(outcome);
        scores.set(participantId, outcome.score);
      }

      this.enter('aggregating', record);
      const pending = aggregator.prepare(scores, { round, expected: sampled });

      this.enter('publishing', record);
      const receipt = await ledger.publish(pending.snapshot);
      if (!receipt.ok) {
        throw new PublicationError(receipt.reason ?? 'rejected');
      }
      pending.commit();

      record.status = 'published';
      record.publicationRef = receipt.reference;
      log.info({ challengeId: challenge.id, reference: receipt.reference }, 'round published');
    } catch (error) {
      record.status = 'abandoned';
      record.failedPhase = this.currentPhase;
      record.reason = errorMessage(error);
      log.error({ err: error, phase: this.currentPhase }, 'round abandoned');
    } finally {
      this.currentPhase = 'idle';
    }

    record.finishedAt = new Date(this.now()).toISOString();
    try {
      this.deps.metrics?.observeRound(record, this.now() - startedAt);
    } catch (error) {
      log.error({ err: error }, 'failed to update round metrics');
    }
    try {
      this.deps.recorder?.recordRound(record);
    } catch (error) {
      log.error({ err: error }, 'failed to record round');
    }

    return record;
  }
}
