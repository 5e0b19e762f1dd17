import { randomBytes } from 'node:crypto';

export function newRoundId(round: number): string {
  return `round_${round}_${randomBytes(4).toString('hex')}`;
}
