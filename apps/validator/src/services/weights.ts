import type { TrustSnapshot } from '../types/domain.js';

export const BOOST_BETA = 5;
const U16_MAX = 65_535;

export type WeightPolicy = {
  beta: number;
  burnFraction: number;
  burnId?: string;
};

export type ShapedWeights = {
  participantIds: string[];
  weights: number[];
};

function standardDeviation(values: readonly number[]): number {
  const mean = values.reduce((sum, value) => sum + value, 0) / values.length;
  const variance = values.reduce((sum, value) => sum + (value - mean) ** 2, 0) / values.length;
  return Math.sqrt(variance);
}

/**
 * Exponential boost by the gap to the best value, scaled by the spread; the
 * best participant ends at 1. When every value is equal only the maxima keep
 * weight.
 */
export function boost(values: readonly number[], beta = BOOST_BETA): number[] {
  if (values.length === 0) return [];
  const best = Math.max(...values);
  const sigma = standardDeviation(values);

  if (sigma < 1e-9) {
    return values.map((value) => (value === best ? 1 : 0));
  }

  const raw = values.map((value) => Math.exp((beta * (value - best)) / sigma));
  const top = Math.max(...raw);
  return raw.map((value) => value / top);
}

/**
 * Turns a trust snapshot into publishable weights. With a burn configured the
 * reserved id takes `burnFraction` and the rest share what is left in
 * proportion to their boosted weight.
 */
export function shapeWeights(snapshot: TrustSnapshot, policy: Partial<WeightPolicy> = {}): ShapedWeights {
  const beta = policy.beta ?? BOOST_BETA;
  const burnFraction = policy.burnFraction ?? 0;
  const burnId = policy.burnId;

  const entries = snapshot.entries.filter((entry) => entry.participantId !== burnId);
  const participantIds = entries.map((entry) => entry.participantId);
  const boosted = boost(
    entries.map((entry) => entry.trust),
    beta
  );

  if (!burnId || burnFraction <= 0) {
    return { participantIds, weights: boosted };
  }

  const total = boosted.reduce((sum, value) => sum + value, 0);
  const keep = 1 - burnFraction;
  const kept = total > 0 ? boosted.map((value) => (value * keep) / total) : boosted.map(() => 0);

  return {
    participantIds: [burnId, ...participantIds],
    weights: [burnFraction, ...kept]
  };
}

/** Scales weights so the largest becomes u16 max; an all-zero vector stays zero. */
export function quantizeU16(weights: readonly number[]): number[] {
  const top = Math.max(0, ...weights);
  if (!(top > 0)) return weights.map(() => 0);
  return weights.map((value) => Math.round((Math.max(0, value) / top) * U16_MAX));
}
