import { createRandomStream, mixSeed } from '../engine/random.js';

const SAMPLING_SALT = 0x5a4d504c;

/**
 * Draws up to `size` participants for a round. The draw depends only on the
 * pool and the round seed, so any validator holding the seed can repeat it.
 */
export function sampleParticipants(pool: Iterable<string>, size: number, seed: number): string[] {
  const ids = [...new Set(pool)].sort();
  if (size >= ids.length) return ids;

  const rng = createRandomStream(mixSeed(seed, SAMPLING_SALT));
  for (let i = ids.length - 1; i > 0; i -= 1) {
    const j = rng.int(0, i);
    const held = ids[i];
    const swapped = ids[j];
    if (held === undefined || swapped === undefined) continue;
    ids[i] = swapped;
    ids[j] = held;
  }

  return ids.slice(0, Math.max(0, size)).sort();
}
