import { describe, expect, it } from 'vitest';
import { distance } from '../engine/geometry.js';
import { generate } from '../engine/mapGenerator.js';
import { replay } from '../engine/replayEngine.js';
import type { CapabilityProfile, ChallengeSpec, ReplayResult, ScoringContext } from '../types/domain.js';
import { GOAL_BASE, MAX_SCORE, MIN_SCORE, compareOutcomes, score } from './reward.js';

const SCORING: ScoringContext = {
  tier: 0,
  horizon: 120,
  bestTime: 10,
  batteryCapacity: 1000,
  initialDistance: 50
};

function reached(timeToGoal: number, energyUsed: number, scoring: ScoringContext = SCORING): ReplayResult {
  return {
    goalReached: true,
    timeToGoal,
    energyUsed,
    collided: false,
    outOfBounds: false,
    terminationReason: 'goal',
    elapsed: timeToGoal,
    closestApproach: 1,
    clampedSamples: 0,
    scoring
  };
}

function missed(
  terminationReason: ReplayResult['terminationReason'],
  elapsed: number,
  closestApproach: number,
  collided = false
): ReplayResult {
  return {
    goalReached: false,
    timeToGoal: null,
    energyUsed: 100,
    collided,
    outOfBounds: false,
    terminationReason,
    elapsed,
    closestApproach,
    clampedSamples: 0,
    scoring: SCORING
  };
}

describe('reward function', () => {
  it('weights speed and efficiency for reached goals', () => {
    // 0.5 + 0.5 * (0.7 * 80/110 + 0.3 * 0.7)
    expect(score(reached(40, 300))).toBeCloseTo(0.859545, 5);
    expect(score(reached(10, 0))).toBeCloseTo(MAX_SCORE, 12);
    expect(score(reached(5, 0))).toBeCloseTo(MAX_SCORE, 12);
    expect(score(reached(120, 1000))).toBe(GOAL_BASE);
  });

  it('scores non-reaching flights by their closest approach', () => {
    expect(score(missed('timeout', 120, 50))).toBeCloseTo(0.02, 9);
    expect(score(missed('timeout', 120, 25))).toBeCloseTo(0.06, 9);
    expect(score(missed('battery-depleted', 60, 0))).toBeCloseTo(0.1, 9);
  });

  it('gives collisions and invalid input the minimum score', () => {
    expect(score(missed('collision', 10, 1, true))).toBe(MIN_SCORE);
    expect(score({ ...missed('invalid-input', 0, 50), energyUsed: Number.POSITIVE_INFINITY })).toBe(MIN_SCORE);
  });

  it('ranks any reached goal above any missed one', () => {
    const reachedResults = [reached(120, 1000), reached(119.9, 999), reached(60, 500), reached(1, 0)];
    const missedResults = [missed('timeout', 120, 0), missed('battery-depleted', 30, 0.01), missed('timeout', 120, 50)];

    for (const a of reachedResults) {
      for (const b of missedResults) {
        expect(score(a)).toBeGreaterThan(score(b));
      }
    }
  });

  it('never ranks a collision above a non-colliding miss', () => {
    const collision = missed('collision', 10, 0, true);
    for (const approach of [0, 10, 50, 500]) {
      expect(score(collision)).toBeLessThanOrEqual(score(missed('timeout', 120, approach)));
    }
  });

  it('prefers the faster leaner flight on the seed 42 tier 0 challenge', () => {
    const spec = generate(42, 0);
    expect(spec.horizon).toBe(120);
    expect(spec.captureRadius).toBe(2);

    const scoring: ScoringContext = {
      tier: spec.tier,
      horizon: spec.horizon,
      bestTime: spec.bestTime,
      batteryCapacity: 4500,
      initialDistance: distance(spec.start, spec.goal.position)
    };
    const quick = reached(40, 0.3 * 4500, scoring);
    const slow = reached(100, 0.9 * 4500, scoring);

    expect(score(quick)).toBeGreaterThan(score(slow));
  });

  it('scores a timeout at 120 s above a collision at 10 s on the same challenge', () => {
    const drone: CapabilityProfile = { model: 'unit-test', mass: 1, maxThrust: 10, maxYawRate: 1, batteryCapacity: 100 };
    const spec: ChallengeSpec = {
      id: 'challenge-crash',
      seed: 1,
      tier: 0,
      worldBounds: { min: { x: -100, y: -100, z: -100 }, max: { x: 100, y: 100, z: 100 } },
      start: { x: 0, y: 0, z: 0 },
      // surface at x = 5.2, reached by the drone body once x >= 5
      obstacles: [{ kind: 'sphere', center: { x: 6.2, y: 0, z: 0 }, radius: 1, motion: { type: 'static' } }],
      goal: { position: { x: 50, y: 0, z: 0 }, motion: { type: 'static' } },
      noFlyZones: [],
      physicsStep: 0.1,
      horizon: 120,
      gravity: 0,
      drag: 0,
      wind: { x: 0, y: 0, z: 0 },
      captureRadius: 2,
      captureDwell: 0,
      nominalSpeed: 2,
      bestTime: 25
    };
    const flight = (thrustX: number) => ({
      challengeId: spec.id,
      controlSequence: [{ t: 0, thrust: { x: thrustX, y: 0, z: 0 }, yawRate: 0 }],
      declaredCapability: drone
    });

    // 0.1 N from rest: x_k = 0.0005 * k(k + 1) first reaches 5 at k = 100
    const crashed = replay(spec, flight(0.1), { capabilities: [drone] });
    const timedOut = replay(spec, flight(0), { capabilities: [drone] });

    expect(crashed.terminationReason).toBe('collision');
    expect(crashed.elapsed).toBeCloseTo(10, 9);
    expect(crashed.closestApproach).toBeLessThan(timedOut.closestApproach);
    expect(timedOut.terminationReason).toBe('timeout');
    expect(timedOut.elapsed).toBeCloseTo(120, 9);

    expect(score(crashed)).toBe(MIN_SCORE);
    expect(score(timedOut)).toBeGreaterThan(score(crashed));
  });

  it('orders outcomes best first', () => {
    const outcomes = [missed('collision', 10, 0, true), reached(100, 900), missed('timeout', 120, 10), reached(40, 300)];
    const sorted = [...outcomes].sort(compareOutcomes);

    expect(sorted.map((result) => result.terminationReason)).toEqual(['goal', 'goal', 'timeout', 'collision']);
    expect(sorted[0]?.timeToGoal).toBe(40);
  });
});
