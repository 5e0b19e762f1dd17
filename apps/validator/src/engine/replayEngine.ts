import { setImmediate } from 'node:timers/promises';
import type {
  CapabilityProfile,
  ChallengeSpec,
  ControlSample,
  ReplayResult,
  ScoringContext,
  TerminationReason,
  Vec3
} from '../types/domain.js';
import { errorMessage } from '../utils/errors.js';
import { add, clampMagnitude, distance, insideBox, length, obstacleDistance, scale, sub, vec } from './geometry.js';
import { CAPABILITY_PROFILES, matchCapability, parseFlightPlan } from './flightPlan.js';
import { motionOffset, positionAt } from './motion.js';

export const PROPELLER_EFFICIENCY = 0.6;
export const YAW_POWER = 0.5;
export const DRONE_RADIUS = 0.2;

export type ReplayOptions = {
  capabilities?: readonly CapabilityProfile[];
};

type ActiveControl = {
  thrust: Vec3;
  yawRate: number;
};

const IDLE: ActiveControl = { thrust: vec(0, 0, 0), yawRate: 0 };

function scoringContext(spec: ChallengeSpec, batteryCapacity: number): ScoringContext {
  return {
    tier: spec.tier,
    horizon: spec.horizon,
    bestTime: spec.bestTime,
    batteryCapacity,
    initialDistance: distance(spec.start, spec.goal.position)
  };
}

function invalidResult(spec: ChallengeSpec, reason: string, batteryCapacity = 0): ReplayResult {
  const scoring = scoringContext(spec, batteryCapacity);
  return {
    goalReached: false,
    timeToGoal: null,
    energyUsed: Number.POSITIVE_INFINITY,
    collided: false,
    outOfBounds: false,
    terminationReason: 'invalid-input',
    elapsed: 0,
    closestApproach: scoring.initialDistance,
    clampedSamples: 0,
    invalidReason: reason,
    scoring
  };
}

function stepIndex(t: number, dt: number): number {
  return Math.floor(t / dt + 1e-9);
}

function clampControl(sample: ControlSample, capability: CapabilityProfile): { control: ActiveControl; clamped: boolean } {
  const thrust = clampMagnitude(sample.thrust, capability.maxThrust);
  const yawRate = Math.max(-capability.maxYawRate, Math.min(capability.maxYawRate, sample.yawRate));
  return {
    control: { thrust: thrust.value, yawRate },
    clamped: thrust.clamped || yawRate !== sample.yawRate
  };
}

function collidesAt(spec: ChallengeSpec, p: Vec3, t: number): boolean {
  for (const obstacle of spec.obstacles) {
    if (obstacleDistance(p, obstacle, motionOffset(obstacle.motion, t)) <= DRONE_RADIUS) return true;
  }
  for (const zone of spec.noFlyZones) {
    if (insideBox(p, zone)) return true;
  }
  return false;
}

/**
 * Re-executes a submitted plan against the challenge inside a simulation this
 * module owns. The submission is untrusted: only its control outputs are
 * read, clamped to the declared (allow-listed) envelope, and fed through the
 * integrator. Never throws; malformed input yields `invalid-input` without a
 * single physics step.
 *
 * Termination precedence per step: collision, battery, goal, horizon.
 */
export function replay(spec: ChallengeSpec, submission: unknown, options: ReplayOptions = {}): ReplayResult {
  const parsed = parseFlightPlan(submission);
  if (!parsed.ok) return invalidResult(spec, parsed.reason);

  const plan = parsed.plan;
  if (plan.challengeId !== spec.id) return invalidResult(spec, 'challenge_id_mismatch');

  const capability = matchCapability(plan.declaredCapability, options.capabilities ?? CAPABILITY_PROFILES);
  if (!capability) return invalidResult(spec, 'capability_not_allowed');

  const dt = spec.physicsStep;
  const steps = Math.max(1, Math.round(spec.horizon / dt));
  const gravity = vec(0, 0, -spec.gravity);
  const samples = plan.controlSequence;
  const scoring = scoringContext(spec, capability.batteryCapacity);

  let position = spec.start;
  let velocity = vec(0, 0, 0);
  let control = IDLE;
  let cursor = 0;
  let clampedSamples = 0;
  let energyUsed = 0;
  let dwell = 0;
  let closestApproach = scoring.initialDistance;

  const finish = (
    terminationReason: TerminationReason,
    elapsed: number,
    flags: { collided?: boolean; outOfBounds?: boolean } = {}
  ): ReplayResult => ({
    goalReached: terminationReason === 'goal',
    timeToGoal: terminationReason === 'goal' ? elapsed : null,
    energyUsed,
    collided: flags.collided ?? false,
    outOfBounds: flags.outOfBounds ?? false,
    terminationReason,
    elapsed,
    closestApproach,
    clampedSamples,
    scoring
  });

  for (let k = 1; k <= steps; k += 1) {
    // the command issued at (k - 1) * dt drives step k; the last one is held
    while (cursor < samples.length) {
      const sample = samples[cursor];
      if (!sample || stepIndex(sample.t, dt) > k - 1) break;
      const next = clampControl(sample, capability);
      if (next.clamped) clampedSamples += 1;
      control = next.control;
      cursor += 1;
    }

    const dragForce = scale(sub(velocity, spec.wind), -spec.drag);
    const acceleration = add(scale(add(control.thrust, dragForce), 1 / capability.mass), gravity);
    velocity = add(velocity, scale(acceleration, dt));
    position = add(position, scale(velocity, dt));
    energyUsed += (length(control.thrust) / PROPELLER_EFFICIENCY + YAW_POWER * Math.abs(control.yawRate)) * dt;

    const elapsed = k * dt;
    const goal = positionAt(spec.goal.position, spec.goal.motion, elapsed);
    const goalDistance = distance(position, goal);
    closestApproach = Math.min(closestApproach, goalDistance);

    if (!insideBox(position, spec.worldBounds)) {
      return finish('collision', elapsed, { collided: true, outOfBounds: true });
    }
    if (collidesAt(spec, position, elapsed)) {
      return finish('collision', elapsed, { collided: true });
    }
    if (energyUsed > capability.batteryCapacity) {
      return finish('battery-depleted', elapsed);
    }
    if (goalDistance <= spec.captureRadius) {
      dwell += dt;
      if (dwell >= spec.captureDwell - 1e-9) return finish('goal', elapsed);
    } else {
      dwell = 0;
    }
  }

  return finish('timeout', steps * dt);
}

/**
 * Replays every submission against the same challenge. Each replay is
 * independent; an unexpected failure in one is reported as invalid input for
 * that submission alone.
 */
export async function replayAll(
  spec: ChallengeSpec,
  submissions: ReadonlyMap<string, unknown>,
  options: ReplayOptions = {}
): Promise<Map<string, ReplayResult>> {
  const results = new Map<string, ReplayResult>();
  for (const [participantId, submission] of submissions) {
    try {
      results.set(participantId, replay(spec, submission, options));
    } catch (error) {
      results.set(participantId, invalidResult(spec, `replay_error:${errorMessage(error)}`));
    }
    // yield to the event loop between replays
    await setImmediate();
  }
  return results;
}
