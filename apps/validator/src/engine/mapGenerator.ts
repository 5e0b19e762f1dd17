import type {
  Box3,
  ChallengeSpec,
  DifficultyTier,
  MotionLaw,
  Obstacle,
  Vec3
} from '../types/domain.js';
import { GenerationError } from '../utils/errors.js';
import { stableHash } from '../utils/hash.js';
import { distance, insideBox, obstacleDistance, regionDistance, vec } from './geometry.js';
import { motionExtent, motionOffset, positionAt } from './motion.js';
import { type RandomStream, createRandomStream, mixSeed } from './random.js';
import {
  CEILING_MARGIN,
  GOAL_CLEARANCE,
  GRAVITY,
  HEIGHT_SCALE,
  MAX_GENERATION_ATTEMPTS,
  PHYSICS_STEP,
  SAFE_ALTITUDE,
  SOLVABILITY_SAMPLE_STEP,
  START_CLEARANCE,
  TIER_PROFILES,
  type TierProfile,
  WORLD_MARGIN,
  distanceCap
} from './tiers.js';

export type GenerationPolicy = {
  maxAttempts: number;
};

export const DEFAULT_GENERATION_POLICY: GenerationPolicy = {
  maxAttempts: MAX_GENERATION_ATTEMPTS
};

type Layout = Omit<ChallengeSpec, 'id'>;

// `+ 0` folds -0 into 0, which JSON cannot carry
function round3(value: number): number {
  return Math.round(value * 1000) / 1000 + 0;
}

function roundVec(v: Vec3): Vec3 {
  return vec(round3(v.x), round3(v.y), round3(v.z));
}

function worldBoundsFor(profile: TierProfile): Box3 {
  const half = profile.goalDistance[1] + WORLD_MARGIN;
  return {
    min: vec(-half, -half, 0),
    max: vec(half, half, round3(profile.goalHeight[1] * HEIGHT_SCALE + CEILING_MARGIN))
  };
}

function drawMotion(rng: RandomStream, type: MotionLaw['type'], horizontalOnly: boolean): MotionLaw {
  switch (type) {
    case 'static':
      return { type: 'static' };
    case 'linear': {
      const heading = rng.range(0, 2 * Math.PI);
      const span = rng.range(2, 6);
      const climb = horizontalOnly ? 0 : rng.range(-1, 1);
      return {
        type: 'linear',
        displacement: roundVec(vec(span * Math.cos(heading), span * Math.sin(heading), climb)),
        period: round3(rng.range(20, 40))
      };
    }
    case 'circular':
      return {
        type: 'circular',
        radius: round3(rng.range(2, 5)),
        angularSpeed: round3(rng.range(0.05, 0.2)),
        phase: round3(rng.range(0, 2 * Math.PI))
      };
  }
}

function drawObstacle(rng: RandomStream, profile: TierProfile, bounds: Box3): Obstacle {
  const [minSize, maxSize] = profile.obstacleSize;
  const x = round3(rng.range(bounds.min.x + 2, bounds.max.x - 2));
  const y = round3(rng.range(bounds.min.y + 2, bounds.max.y - 2));
  const moving = rng.next() < profile.movingObstacleFraction;
  const motion = moving
    ? drawMotion(rng, rng.pick(profile.obstacleMotions), true)
    : { type: 'static' as const };
  const kind = rng.pick(['sphere', 'box', 'cylinder'] as const);

  switch (kind) {
    case 'sphere': {
      const radius = round3(rng.range(minSize, maxSize));
      const z = round3(rng.range(radius, profile.goalHeight[1] * HEIGHT_SCALE));
      return { kind, center: vec(x, y, z), radius, motion };
    }
    case 'box': {
      const halfZ = round3(rng.range(minSize, maxSize) * HEIGHT_SCALE);
      return {
        kind,
        center: vec(x, y, halfZ),
        halfExtents: vec(round3(rng.range(minSize, maxSize)), round3(rng.range(minSize, maxSize)), halfZ),
        motion
      };
    }
    case 'cylinder':
      return {
        kind,
        center: vec(x, y, 0),
        radius: round3(rng.range(minSize / 2, maxSize / 2)),
        height: round3(rng.range(2, profile.goalHeight[1] * HEIGHT_SCALE)),
        motion
      };
  }
}

function drawNoFlyZone(rng: RandomStream, bounds: Box3): Box3 {
  const halfX = rng.range(3, 8);
  const halfY = rng.range(3, 8);
  const cx = rng.range(bounds.min.x + halfX, bounds.max.x - halfX);
  const cy = rng.range(bounds.min.y + halfY, bounds.max.y - halfY);
  return {
    min: roundVec(vec(cx - halfX, cy - halfY, bounds.min.z)),
    max: roundVec(vec(cx + halfX, cy + halfY, bounds.max.z))
  };
}

function drawLayout(rng: RandomStream, seed: number, tier: DifficultyTier): Layout {
  const profile = TIER_PROFILES[tier];
  const worldBounds = worldBoundsFor(profile);
  const start = vec(0, 0, SAFE_ALTITUDE);

  const goalRange = rng.range(profile.goalDistance[0], profile.goalDistance[1]);
  const bearing = rng.range(0, 2 * Math.PI);
  const goalHeight = rng.range(profile.goalHeight[0], profile.goalHeight[1]);
  const goalPosition = roundVec(vec(goalRange * Math.cos(bearing), goalRange * Math.sin(bearing), goalHeight));
  const goalMotion = drawMotion(rng, rng.pick(profile.goalMotions), false);

  const obstacles: Obstacle[] = [];
  for (let i = 0; i < profile.obstacleCount; i += 1) {
    obstacles.push(drawObstacle(rng, profile, worldBounds));
  }

  const noFlyZones: Box3[] = [];
  for (let i = 0; i < profile.noFlyZones; i += 1) {
    noFlyZones.push(drawNoFlyZone(rng, worldBounds));
  }

  const windHeading = rng.range(0, 2 * Math.PI);
  const windSpeed = rng.range(0, profile.maxWind);

  return {
    seed,
    tier,
    worldBounds,
    start,
    obstacles,
    goal: { position: goalPosition, motion: goalMotion },
    noFlyZones,
    physicsStep: PHYSICS_STEP,
    horizon: profile.horizon,
    gravity: GRAVITY,
    drag: profile.drag,
    wind: roundVec(vec(windSpeed * Math.cos(windHeading), windSpeed * Math.sin(windHeading), 0)),
    captureRadius: profile.captureRadius,
    captureDwell: profile.captureDwell,
    nominalSpeed: profile.nominalSpeed,
    bestTime: round3(distance(start, goalPosition) / profile.bestSpeed)
  };
}

/**
 * Returns the reason a layout cannot be flown, or null when it is solvable in
 * principle: the goal stays inside the world, within the tier's distance cap
 * and clear of every obstacle and no-fly zone for the whole horizon, and the
 * start is clear.
 */
export function solvabilityViolation(layout: Layout): string | null {
  const cap = distanceCap(layout.tier);
  const goalClearance = layout.captureRadius + GOAL_CLEARANCE;

  if (distance(layout.start, layout.goal.position) + motionExtent(layout.goal.motion) > cap) {
    return 'goal_beyond_distance_cap';
  }

  for (const obstacle of layout.obstacles) {
    if (obstacleDistance(layout.start, obstacle) <= START_CLEARANCE) return 'start_blocked';
  }
  for (const zone of layout.noFlyZones) {
    if (regionDistance(layout.start, zone) <= START_CLEARANCE) return 'start_in_no_fly_zone';
  }

  for (let t = 0; t <= layout.horizon; t += SOLVABILITY_SAMPLE_STEP) {
    const goal = positionAt(layout.goal.position, layout.goal.motion, t);

    if (!insideBox(goal, layout.worldBounds)) return 'goal_out_of_bounds';
    if (goal.z - layout.captureRadius < layout.worldBounds.min.z) return 'goal_below_ground';

    for (const obstacle of layout.obstacles) {
      if (obstacleDistance(goal, obstacle, motionOffset(obstacle.motion, t)) <= goalClearance) {
        return 'goal_enclosed';
      }
    }
    for (const zone of layout.noFlyZones) {
      if (regionDistance(goal, zone) <= goalClearance) return 'goal_in_no_fly_zone';
    }
  }

  return null;
}

export function challengeIdFor(layout: Layout): string {
  return `0x${stableHash(layout)}`;
}

/**
 * Derives the challenge for one round from a seed and a difficulty tier.
 * Identical inputs always yield identical specs; no wall clock or ambient
 * entropy is read. Throws GenerationError when the attempt budget runs out,
 * which points at a misconfigured tier table rather than bad luck.
 */
export function generate(
  seed: number,
  tier: DifficultyTier,
  policy: GenerationPolicy = DEFAULT_GENERATION_POLICY
): ChallengeSpec {
  const normalizedSeed = seed >>> 0;
  const rng = createRandomStream(mixSeed(normalizedSeed, tier));
  let lastRejection = 'no_attempts';

  for (let attempt = 0; attempt < policy.maxAttempts; attempt += 1) {
    const layout = drawLayout(rng, normalizedSeed, tier);
    const violation = solvabilityViolation(layout);
    if (!violation) {
      return { id: challengeIdFor(layout), ...layout };
    }
    lastRejection = violation;
  }

  throw new GenerationError(normalizedSeed, tier, policy.maxAttempts, lastRejection);
}
