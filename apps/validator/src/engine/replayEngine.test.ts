import { describe, expect, it } from 'vitest';
import type { CapabilityProfile, ChallengeSpec, ControlSample, FlightPlan, Obstacle } from '../types/domain.js';
import { replay, replayAll } from './replayEngine.js';

const UNIT_DRONE: CapabilityProfile = {
  model: 'unit-test',
  mass: 1,
  maxThrust: 10,
  maxYawRate: 1,
  batteryCapacity: 100
};

const options = { capabilities: [UNIT_DRONE] };

function makeSpec(overrides: Partial<ChallengeSpec> = {}): ChallengeSpec {
  return {
    id: 'challenge-1',
    seed: 1,
    tier: 0,
    worldBounds: { min: { x: -100, y: -100, z: -100 }, max: { x: 100, y: 100, z: 100 } },
    start: { x: 0, y: 0, z: 0 },
    obstacles: [],
    goal: { position: { x: 50, y: 0, z: 0 }, motion: { type: 'static' } },
    noFlyZones: [],
    physicsStep: 0.1,
    horizon: 10,
    gravity: 0,
    drag: 0,
    wind: { x: 0, y: 0, z: 0 },
    captureRadius: 0.5,
    captureDwell: 0,
    nominalSpeed: 2,
    bestTime: 1,
    ...overrides
  };
}

function thrustX(x: number, t = 0): ControlSample {
  return { t, thrust: { x, y: 0, z: 0 }, yawRate: 0 };
}

function plan(samples: ControlSample[], capability: CapabilityProfile = UNIT_DRONE, challengeId = 'challenge-1'): FlightPlan {
  return { challengeId, controlSequence: samples, declaredCapability: capability };
}

describe('replay engine', () => {
  it('captures a goal already inside the capture radius after one step', () => {
    const spec = makeSpec({ goal: { position: { x: 0.3, y: 0, z: 0 }, motion: { type: 'static' } } });
    const result = replay(spec, plan([thrustX(0)]), options);

    expect(result.terminationReason).toBe('goal');
    expect(result.goalReached).toBe(true);
    expect(result.timeToGoal).toBeCloseTo(0.1, 9);
    expect(result.energyUsed).toBe(0);
  });

  it('integrates constant thrust with semi-implicit Euler', () => {
    const spec = makeSpec({ goal: { position: { x: 10, y: 0, z: 0 }, motion: { type: 'static' } } });
    const result = replay(spec, plan([thrustX(1)]), options);

    // x_k = 0.01 * k(k+1)/2 crosses 9.5 at k = 44
    expect(result.terminationReason).toBe('goal');
    expect(result.timeToGoal).toBeCloseTo(4.4, 9);
    expect(result.energyUsed).toBeCloseTo(44 / 6, 9);
    expect(result.closestApproach).toBeCloseTo(0.1, 9);
    expect(result.collided).toBe(false);
  });

  it('holds the goal for the capture dwell before counting it', () => {
    const spec = makeSpec({
      goal: { position: { x: 0, y: 0, z: 0 }, motion: { type: 'static' } },
      captureDwell: 0.25
    });
    const result = replay(spec, plan([thrustX(0)]), options);

    expect(result.terminationReason).toBe('goal');
    expect(result.timeToGoal).toBeCloseTo(0.3, 9);
  });

  it('applies each control sample from the step its time falls in', () => {
    const spec = makeSpec({ horizon: 0.5 });
    const result = replay(spec, plan([thrustX(0), thrustX(6, 0.25)]), options);

    // 6 N drives steps 3, 4 and 5 at 1 J per step
    expect(result.terminationReason).toBe('timeout');
    expect(result.energyUsed).toBeCloseTo(3, 9);
  });

  it('reports a collision when the start is inside an obstacle', () => {
    const sphere: Obstacle = { kind: 'sphere', center: { x: 0, y: 0, z: 0 }, radius: 1, motion: { type: 'static' } };
    const result = replay(makeSpec({ obstacles: [sphere] }), plan([thrustX(0)]), options);

    expect(result.terminationReason).toBe('collision');
    expect(result.collided).toBe(true);
    expect(result.outOfBounds).toBe(false);
    expect(result.elapsed).toBeCloseTo(0.1, 9);
  });

  it('tracks moving obstacles along their motion law', () => {
    const sweeper: Obstacle = {
      kind: 'sphere',
      center: { x: 5, y: 0, z: 0 },
      radius: 1,
      motion: { type: 'linear', displacement: { x: -5, y: 0, z: 0 }, period: 4 }
    };
    const result = replay(makeSpec({ obstacles: [sweeper] }), plan([thrustX(0)]), options);

    // the sphere surface is within drone radius once 5 - 2.5t <= 1.2
    expect(result.terminationReason).toBe('collision');
    expect(result.elapsed).toBeCloseTo(1.6, 9);
  });

  it('treats entering a no-fly zone as a collision', () => {
    const spec = makeSpec({
      noFlyZones: [{ min: { x: 0.8, y: -1, z: -1 }, max: { x: 3, y: 1, z: 1 } }]
    });
    // 10 N from rest: x = 0.6 after step 3, 1.0 after step 4
    const result = replay(spec, plan([thrustX(10)]), options);

    expect(result.terminationReason).toBe('collision');
    expect(result.collided).toBe(true);
    expect(result.outOfBounds).toBe(false);
    expect(result.elapsed).toBeCloseTo(0.4, 9);
  });

  it('captures a moving goal at its current position', () => {
    const linearGoal = makeSpec({
      goal: {
        position: { x: 3, y: 0, z: 0 },
        motion: { type: 'linear', displacement: { x: -3, y: 0, z: 0 }, period: 4 }
      }
    });
    const staticGoal = makeSpec({ goal: { position: { x: 3, y: 0, z: 0 }, motion: { type: 'static' } } });

    // the goal sits at x = 3 - 1.5t and enters the 0.5 m radius at t = 1.7
    const result = replay(linearGoal, plan([thrustX(0)]), options);
    expect(result.terminationReason).toBe('goal');
    expect(result.timeToGoal).toBeCloseTo(1.7, 9);

    expect(replay(staticGoal, plan([thrustX(0)]), options).terminationReason).toBe('timeout');
  });

  it('lets a collision win over a goal capture in the same step', () => {
    const spec = makeSpec({
      goal: { position: { x: 0.3, y: 0, z: 0 }, motion: { type: 'static' } },
      obstacles: [{ kind: 'sphere', center: { x: 0.3, y: 0, z: 0 }, radius: 0.2, motion: { type: 'static' } }]
    });
    const result = replay(spec, plan([thrustX(0)]), options);

    expect(result.terminationReason).toBe('collision');
    expect(result.goalReached).toBe(false);
    expect(result.timeToGoal).toBeNull();
    expect(result.elapsed).toBeCloseTo(0.1, 9);
  });

  it('treats leaving the world bounds as a collision', () => {
    const spec = makeSpec({
      worldBounds: { min: { x: -100, y: -100, z: -100 }, max: { x: 1.2, y: 100, z: 100 } }
    });
    const result = replay(spec, plan([thrustX(10)]), options);

    expect(result.terminationReason).toBe('collision');
    expect(result.collided).toBe(true);
    expect(result.outOfBounds).toBe(true);
    expect(result.elapsed).toBeCloseTo(0.5, 9);
  });

  it('stops when the battery is depleted', () => {
    const drone = { ...UNIT_DRONE, batteryCapacity: 2.5 };
    const result = replay(makeSpec(), plan([thrustX(6)], drone), { capabilities: [drone] });

    expect(result.terminationReason).toBe('battery-depleted');
    expect(result.elapsed).toBeCloseTo(0.3, 9);
    expect(result.energyUsed).toBeCloseTo(3, 9);
    expect(result.goalReached).toBe(false);
  });

  it('times out at the horizon', () => {
    const result = replay(makeSpec({ horizon: 1 }), plan([thrustX(0)]), options);

    expect(result.terminationReason).toBe('timeout');
    expect(result.elapsed).toBeCloseTo(1, 9);
    expect(result.timeToGoal).toBeNull();
    expect(result.closestApproach).toBe(50);
  });

  it('clamps thrust to the declared envelope', () => {
    const spec = makeSpec({ horizon: 2 });
    const clamped = replay(spec, plan([thrustX(20)]), options);
    const exact = replay(spec, plan([thrustX(10)]), options);

    expect(clamped.clampedSamples).toBe(1);
    expect({ ...clamped, clampedSamples: 0 }).toEqual(exact);
  });

  it('rejects malformed plans without simulating', () => {
    const nan = replay(makeSpec(), plan([thrustX(Number.NaN)]), options);
    expect(nan.terminationReason).toBe('invalid-input');
    expect(nan.energyUsed).toBe(Number.POSITIVE_INFINITY);
    expect(nan.elapsed).toBe(0);
    expect(nan.invalidReason).toBe('malformed_plan:controlSequence.0.thrust.x:Expected number, received nan');

    expect(replay(makeSpec(), 'not a plan', options).invalidReason).toBe('malformed_plan:plan:Expected object, received string');
  });

  it('rejects plans for another challenge or an unknown capability', () => {
    expect(replay(makeSpec(), plan([thrustX(1)], UNIT_DRONE, 'challenge-2'), options).invalidReason).toBe(
      'challenge_id_mismatch'
    );

    const tuned = { ...UNIT_DRONE, maxThrust: 1000 };
    const result = replay(makeSpec(), plan([thrustX(1)], tuned), options);
    expect(result.terminationReason).toBe('invalid-input');
    expect(result.invalidReason).toBe('capability_not_allowed');
  });

  it('isolates each submission in a batch', async () => {
    const spec = makeSpec({ goal: { position: { x: 10, y: 0, z: 0 }, motion: { type: 'static' } } });
    const good = plan([thrustX(1)]);
    const hostile = {
      get challengeId(): string {
        throw new Error('boom');
      }
    };

    const results = await replayAll(
      spec,
      new Map<string, unknown>([
        ['good', good],
        ['hostile', hostile],
        ['garbage', { controlSequence: 'x' }]
      ]),
      options
    );

    expect(results.get('good')).toEqual(replay(spec, good, options));
    expect(results.get('hostile')?.invalidReason).toBe('replay_error:boom');
    expect(results.get('garbage')?.terminationReason).toBe('invalid-input');
  });

  it('yields to the event loop between replays', async () => {
    const spec = makeSpec({ horizon: 1 });
    let yielded = false;

    const pending = replayAll(
      spec,
      new Map<string, unknown>([
        ['a', plan([thrustX(0)])],
        ['b', plan([thrustX(0)])]
      ]),
      options
    );
    setImmediate(() => {
      yielded = true;
    });
    const results = await pending;

    expect(results.size).toBe(2);
    expect(yielded).toBe(true);
  });
});
