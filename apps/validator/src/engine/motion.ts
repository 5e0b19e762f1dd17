import type { MotionLaw, Vec3 } from '../types/domain.js';
import { ZERO, add, length, scale } from './geometry.js';

function triangle(u: number): number {
  const frac = u - Math.floor(u);
  return frac < 0.5 ? 2 * frac : 2 * (1 - frac);
}

/** Offset from the base position after `t` seconds. */
export function motionOffset(motion: MotionLaw, t: number): Vec3 {
  switch (motion.type) {
    case 'static':
      return ZERO;
    case 'linear':
      return scale(motion.displacement, triangle(t / motion.period));
    case 'circular': {
      const angle = motion.phase + motion.angularSpeed * t;
      return { x: motion.radius * Math.cos(angle), y: motion.radius * Math.sin(angle), z: 0 };
    }
  }
}

export function positionAt(base: Vec3, motion: MotionLaw, t: number): Vec3 {
  return add(base, motionOffset(motion, t));
}

/** Largest distance the law ever moves away from its base position. */
export function motionExtent(motion: MotionLaw): number {
  switch (motion.type) {
    case 'static':
      return 0;
    case 'linear':
      return length(motion.displacement);
    case 'circular':
      return motion.radius;
  }
}
