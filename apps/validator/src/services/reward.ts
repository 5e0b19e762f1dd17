import type { ReplayResult } from '../types/domain.js';

export const MIN_SCORE = 0;
export const MAX_SCORE = 1;

/**
 * Reward policy. A reached goal is worth at least GOAL_BASE; a non-reaching
 * flight at most NON_REACHING_FLOOR + PROXIMITY_WEIGHT, which must stay below
 * GOAL_BASE. SPEED_WEIGHT and EFFICIENCY_WEIGHT sum to one.
 */
export const GOAL_BASE = 0.5;
export const SPEED_WEIGHT = 0.7;
export const EFFICIENCY_WEIGHT = 0.3;
export const NON_REACHING_FLOOR = 0.02;
export const PROXIMITY_WEIGHT = 0.08;

function clamp01(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.max(0, Math.min(1, value));
}

function penalized(result: ReplayResult): boolean {
  return result.collided || result.terminationReason === 'invalid-input';
}

/** 1 at or under the best-possible time, 0 at or past the horizon. */
export function speedTerm(result: ReplayResult): number {
  if (!result.goalReached || result.timeToGoal === null) return 0;
  const { horizon, bestTime } = result.scoring;
  const t = result.timeToGoal;
  if (t >= horizon) return 0;
  if (t <= bestTime) return 1;
  return clamp01((horizon - t) / (horizon - bestTime));
}

export function efficiencyTerm(result: ReplayResult): number {
  if (!result.goalReached) return 0;
  const capacity = result.scoring.batteryCapacity;
  if (!(capacity > 0)) return 0;
  return clamp01(1 - result.energyUsed / capacity);
}

export function proximityTerm(result: ReplayResult): number {
  const initial = result.scoring.initialDistance;
  if (!(initial > 0)) return 0;
  return clamp01(1 - result.closestApproach / initial);
}

/**
 * Maps one replay outcome to a score in [MIN_SCORE, MAX_SCORE]. Collisions
 * and invalid input score the minimum; any reached goal outscores any flight
 * that did not reach it.
 */
export function score(result: ReplayResult): number {
  if (penalized(result)) return MIN_SCORE;

  if (!result.goalReached) {
    return NON_REACHING_FLOOR + PROXIMITY_WEIGHT * proximityTerm(result);
  }

  const quality = SPEED_WEIGHT * speedTerm(result) + EFFICIENCY_WEIGHT * efficiencyTerm(result);
  const value = GOAL_BASE + (MAX_SCORE - GOAL_BASE) * quality;
  return Math.max(MIN_SCORE, Math.min(MAX_SCORE, value));
}

/**
 * Sort comparator, best first: score, then the speed term, then the
 * efficiency term.
 */
export function compareOutcomes(a: ReplayResult, b: ReplayResult): number {
  return (
    score(b) - score(a) ||
    speedTerm(b) - speedTerm(a) ||
    efficiencyTerm(b) - efficiencyTerm(a)
  );
}
