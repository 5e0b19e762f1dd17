import type { Box3, Obstacle, Vec3 } from '../types/domain.js';

export const ZERO: Vec3 = Object.freeze({ x: 0, y: 0, z: 0 });

export function vec(x: number, y: number, z: number): Vec3 {
  return { x, y, z };
}

export function add(a: Vec3, b: Vec3): Vec3 {
  return { x: a.x + b.x, y: a.y + b.y, z: a.z + b.z };
}

export function sub(a: Vec3, b: Vec3): Vec3 {
  return { x: a.x - b.x, y: a.y - b.y, z: a.z - b.z };
}

export function scale(v: Vec3, k: number): Vec3 {
  return { x: v.x * k, y: v.y * k, z: v.z * k };
}

export function length(v: Vec3): number {
  return Math.hypot(v.x, v.y, v.z);
}

export function distance(a: Vec3, b: Vec3): number {
  return length(sub(a, b));
}

export function clampMagnitude(v: Vec3, max: number): { value: Vec3; clamped: boolean } {
  const magnitude = length(v);
  if (magnitude <= max) return { value: v, clamped: false };
  return { value: scale(v, max / magnitude), clamped: true };
}

export function insideBox(p: Vec3, box: Box3): boolean {
  return (
    p.x >= box.min.x && p.x <= box.max.x &&
    p.y >= box.min.y && p.y <= box.max.y &&
    p.z >= box.min.z && p.z <= box.max.z
  );
}

function boxDistance(p: Vec3, center: Vec3, half: Vec3): number {
  const qx = Math.abs(p.x - center.x) - half.x;
  const qy = Math.abs(p.y - center.y) - half.y;
  const qz = Math.abs(p.z - center.z) - half.z;
  const outside = Math.hypot(Math.max(qx, 0), Math.max(qy, 0), Math.max(qz, 0));
  const inside = Math.min(Math.max(qx, qy, qz), 0);
  return outside + inside;
}

export function boxFromRegion(region: Box3): { center: Vec3; half: Vec3 } {
  return {
    center: scale(add(region.min, region.max), 0.5),
    half: scale(sub(region.max, region.min), 0.5)
  };
}

export function regionDistance(p: Vec3, region: Box3): number {
  const { center, half } = boxFromRegion(region);
  return boxDistance(p, center, half);
}

/**
 * Signed distance from `p` to the obstacle surface, with the obstacle shifted
 * by `offset`. Negative inside.
 */
export function obstacleDistance(p: Vec3, obstacle: Obstacle, offset: Vec3 = ZERO): number {
  const center = add(obstacle.center, offset);

  switch (obstacle.kind) {
    case 'sphere':
      return distance(p, center) - obstacle.radius;
    case 'box':
      return boxDistance(p, center, obstacle.halfExtents);
    case 'cylinder': {
      // center is the middle of the base disc; the cylinder is vertical
      const radial = Math.hypot(p.x - center.x, p.y - center.y) - obstacle.radius;
      const vertical = Math.max(center.z - p.z, p.z - (center.z + obstacle.height));
      const outside = Math.hypot(Math.max(radial, 0), Math.max(vertical, 0));
      const inside = Math.min(Math.max(radial, vertical), 0);
      return outside + inside;
    }
  }
}
