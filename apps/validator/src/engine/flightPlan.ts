import { z } from 'zod';
import type { CapabilityProfile, FlightPlan } from '../types/domain.js';

/** Upper bound on control samples in one plan; 50 Hz over the longest horizon is 9000. */
export const MAX_CONTROL_SAMPLES = 20_000;

export const CAPABILITY_PROFILES: readonly CapabilityProfile[] = [
  { model: 'quad-light', mass: 1.2, maxThrust: 30, maxYawRate: 3, batteryCapacity: 3000 },
  { model: 'quad-standard', mass: 1.6, maxThrust: 40, maxYawRate: 2.5, batteryCapacity: 4500 },
  { model: 'quad-heavy', mass: 2.5, maxThrust: 60, maxYawRate: 2, batteryCapacity: 7000 }
];

const finite = z.number().finite();

const vecSchema = z.object({ x: finite, y: finite, z: finite });

const controlSampleSchema = z.object({
  t: finite.min(0),
  thrust: vecSchema,
  yawRate: finite.default(0)
});

const capabilitySchema = z.object({
  model: z.string().min(1).max(64),
  mass: finite.positive(),
  maxThrust: finite.positive(),
  maxYawRate: finite.nonnegative(),
  batteryCapacity: finite.positive()
});

export const flightPlanSchema = z.object({
  challengeId: z.string().min(1).max(128),
  controlSequence: z
    .array(controlSampleSchema)
    .min(1)
    .max(MAX_CONTROL_SAMPLES)
    .superRefine((samples, ctx) => {
      for (let i = 1; i < samples.length; i += 1) {
        const previous = samples[i - 1];
        const current = samples[i];
        if (previous && current && current.t < previous.t) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: [i, 't'],
            message: 'control samples must be ordered by time'
          });
          return;
        }
      }
    }),
  declaredCapability: capabilitySchema
});

export type FlightPlanParseResult =
  | { ok: true; plan: FlightPlan }
  | { ok: false; reason: string };

export function parseFlightPlan(input: unknown): FlightPlanParseResult {
  const parsed = flightPlanSchema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const path = issue?.path.join('.') || 'plan';
    return { ok: false, reason: `malformed_plan:${path}:${issue?.message ?? 'invalid'}` };
  }
  return { ok: true, plan: parsed.data };
}

/** The allow-listed profile equal in every field to the declared one, if any. */
export function matchCapability(
  declared: CapabilityProfile,
  allowList: readonly CapabilityProfile[] = CAPABILITY_PROFILES
): CapabilityProfile | undefined {
  return allowList.find(
    (profile) =>
      profile.model === declared.model &&
      profile.mass === declared.mass &&
      profile.maxThrust === declared.maxThrust &&
      profile.maxYawRate === declared.maxYawRate &&
      profile.batteryCapacity === declared.batteryCapacity
  );
}
