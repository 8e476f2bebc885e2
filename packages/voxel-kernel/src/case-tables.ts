/**
 * Case tables for marching cubes and marching squares.
 *
 * A case index is formed from the corner samples of one cell; each row
 * says which edges the surface crosses and how the crossings triangulate.
 * The 256-row cube tables live in tables/marching-cubes.json.
 */

import cubeTables from './tables/marching-cubes.json' with { type: 'json' };
import type { Vec2, Vec3 } from './vec3.js';

// ─── Cubes ─────────────────────────────────────────────────────

/** Corner offsets from a cube's minimum corner, in case-bit order. */
export const CUBE_CORNERS: readonly Readonly<Vec3>[] = [
  [0, 0, 0], [1, 0, 0], [1, 1, 0], [0, 1, 0],
  [0, 0, 1], [1, 0, 1], [1, 1, 1], [0, 1, 1],
];

/** The 12 cube edges as corner pairs: 4 bottom, 4 top, 4 vertical. */
export const CUBE_EDGES: readonly (readonly [number, number])[] = [
  [0, 1], [1, 2], [2, 3], [3, 0],
  [4, 5], [5, 6], [6, 7], [7, 4],
  [0, 4], [1, 5], [2, 6], [3, 7],
];

/** 12-bit mask of crossed edges per case. Zero means no surface. */
export const CUBE_EDGE_MASKS: readonly number[] = cubeTables.edges;

/** Per case, edge indices in groups of 3; at most 5 triangles. */
export const CUBE_TRIANGLES: readonly (readonly number[])[] = cubeTables.triangles;

// ─── Squares ───────────────────────────────────────────────────

/**
 * Crossed edges per square case. Each segment is 8 numbers: two corner
 * pairs (ax, ay, bx, by) locating where the contour cuts the square.
 * Corners are [u][v] into the 2×2 sample window.
 * Cases 6 and 9 are saddles and carry two segments.
 */
export const SQUARE_SEGMENTS: readonly (readonly number[])[] = [
  [],
  [0, 1, 1, 1, 1, 0, 1, 1],
  [1, 1, 1, 0, 0, 0, 1, 0],
  [0, 1, 1, 1, 0, 0, 1, 0],
  [0, 0, 0, 1, 1, 1, 0, 1],
  [0, 0, 0, 1, 1, 0, 1, 1],
  [0, 0, 0, 1, 0, 0, 1, 0, 1, 1, 1, 0, 1, 1, 0, 1],
  [0, 0, 0, 1, 0, 0, 1, 0],
  [1, 0, 0, 0, 0, 1, 0, 0],
  [1, 0, 0, 0, 1, 0, 1, 1, 0, 1, 1, 1, 0, 1, 0, 0],
  [1, 1, 1, 0, 0, 1, 0, 0],
  [0, 1, 1, 1, 0, 1, 0, 0],
  [1, 0, 0, 0, 1, 1, 0, 1],
  [1, 0, 0, 0, 1, 0, 1, 1],
  [1, 1, 1, 0, 1, 1, 0, 1],
  [],
];

/** Fixed corner positions; slots 4–7 of the vertex buffer hold crossings. */
export const SQUARE_CORNERS: readonly Readonly<Vec2>[] = [[0, 0], [1, 0], [0, 1], [1, 1]];

/**
 * Triangles covering the above-level part of the square, as indices
 * into the 8-slot vertex buffer (0–3 corners, 4–7 crossings).
 */
export const SQUARE_TRIANGLES: readonly (readonly number[])[] = [
  [],
  [4, 3, 5],
  [4, 1, 5],
  [4, 3, 1, 4, 1, 5],
  [4, 2, 5],
  [4, 2, 5, 2, 3, 5],
  [4, 2, 7, 4, 7, 6, 5, 4, 6, 5, 6, 1],
  [4, 2, 3, 4, 3, 5, 3, 1, 5],
  [4, 0, 5],
  [4, 6, 5, 5, 6, 3, 4, 7, 6, 4, 0, 7],
  [4, 1, 5, 1, 0, 5],
  [5, 1, 0, 5, 3, 1, 5, 4, 3],
  [4, 0, 2, 2, 5, 4],
  [4, 0, 2, 4, 2, 5, 5, 2, 3],
  [4, 1, 0, 4, 0, 5, 0, 2, 5],
  [0, 2, 1, 2, 3, 1],
];
