import type { DifficultyTier, MotionLaw } from '../types/domain.js';

export type Range = readonly [min: number, max: number];

export type TierProfile = {
  obstacleCount: number;
  obstacleSize: Range;
  goalDistance: Range;
  goalHeight: Range;
  goalMotions: readonly MotionLaw['type'][];
  obstacleMotions: readonly MotionLaw['type'][];
  movingObstacleFraction: number;
  noFlyZones: number;
  captureRadius: number;
  captureDwell: number;
  horizon: number;
  nominalSpeed: number;
  /** Start-to-goal distance may use at most this share of `horizon × nominalSpeed`. */
  distanceCapFraction: number;
  /** Speed at which the best-possible time is computed. */
  bestSpeed: number;
  maxWind: number;
  drag: number;
};

export const DIFFICULTY_TIERS: readonly DifficultyTier[] = [0, 1, 2, 3];

export const PHYSICS_STEP = 1 / 50;
export const GRAVITY = 9.81;
export const SAFE_ALTITUDE = 2;
export const HEIGHT_SCALE = 1.8;
export const WORLD_MARGIN = 15;
export const CEILING_MARGIN = 12;
export const START_CLEARANCE = 2;
export const GOAL_CLEARANCE = 1;
export const SOLVABILITY_SAMPLE_STEP = 1;

/** Layouts drawn per generate() call before the generator gives up. */
export const MAX_GENERATION_ATTEMPTS = 64;

export const TIER_PROFILES: Record<DifficultyTier, TierProfile> = {
  0: {
    obstacleCount: 8,
    obstacleSize: [0.6, 1.5],
    goalDistance: [20, 50],
    goalHeight: [2, 4],
    goalMotions: ['static'],
    obstacleMotions: ['static'],
    movingObstacleFraction: 0,
    noFlyZones: 0,
    captureRadius: 2,
    captureDwell: 0,
    horizon: 120,
    nominalSpeed: 2,
    distanceCapFraction: 0.5,
    bestSpeed: 5,
    maxWind: 0,
    drag: 0.1
  },
  1: {
    obstacleCount: 16,
    obstacleSize: [0.8, 2],
    goalDistance: [30, 70],
    goalHeight: [2, 8],
    goalMotions: ['static', 'linear'],
    obstacleMotions: ['static'],
    movingObstacleFraction: 0,
    noFlyZones: 1,
    captureRadius: 1.5,
    captureDwell: 0,
    horizon: 120,
    nominalSpeed: 2,
    distanceCapFraction: 0.5,
    bestSpeed: 6,
    maxWind: 1,
    drag: 0.1
  },
  2: {
    obstacleCount: 28,
    obstacleSize: [1, 2.5],
    goalDistance: [40, 90],
    goalHeight: [3, 12],
    goalMotions: ['linear'],
    obstacleMotions: ['static', 'linear'],
    movingObstacleFraction: 0.25,
    noFlyZones: 2,
    captureRadius: 1.2,
    captureDwell: 0.5,
    horizon: 150,
    nominalSpeed: 2,
    distanceCapFraction: 0.5,
    bestSpeed: 7,
    maxWind: 2,
    drag: 0.12
  },
  3: {
    obstacleCount: 40,
    obstacleSize: [1, 3],
    goalDistance: [50, 110],
    goalHeight: [3, 16],
    goalMotions: ['linear', 'circular'],
    obstacleMotions: ['static', 'linear', 'circular'],
    movingObstacleFraction: 0.4,
    noFlyZones: 3,
    captureRadius: 1,
    captureDwell: 1,
    horizon: 180,
    nominalSpeed: 2,
    distanceCapFraction: 0.5,
    bestSpeed: 8,
    maxWind: 3,
    drag: 0.15
  }
};

export function isDifficultyTier(value: number): value is DifficultyTier {
  return DIFFICULTY_TIERS.some((tier) => tier === value);
}

export function distanceCap(tier: DifficultyTier): number {
  const profile = TIER_PROFILES[tier];
  return profile.horizon * profile.nominalSpeed * profile.distanceCapFraction;
}
