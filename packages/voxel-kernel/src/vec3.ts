/** Minimal 2D/3D vectors — plain tuples for speed, helpers for clarity. */
export type Vec2 = [number, number];
export type Vec3 = [number, number, number];

/** Axis-aligned bounding box. */
export interface BoundingBox { min: Vec3; max: Vec3; }

export function sub(a: Vec3, b: Vec3): Vec3 {
  return [a[0] - b[0], a[1] - b[1], a[2] - b[2]];
}

export function cross(a: Vec3, b: Vec3): Vec3 {
  return [
    a[1] * b[2] - a[2] * b[1],
    a[2] * b[0] - a[0] * b[2],
    a[0] * b[1] - a[1] * b[0],
  ];
}

/** Bounds of a point list. An empty list yields a zero box at the origin. */
export function boundsOf(points: readonly Vec3[]): BoundingBox {
  if (points.length === 0) return { min: [0, 0, 0], max: [0, 0, 0] };
  const min: Vec3 = [Infinity, Infinity, Infinity];
  const max: Vec3 = [-Infinity, -Infinity, -Infinity];
  for (const p of points) {
    for (let i = 0; i < 3; i++) {
      if (p[i] < min[i]) min[i] = p[i];
      if (p[i] > max[i]) max[i] = p[i];
    }
  }
  return { min, max };
}
