/**
 * Marching Cubes — triangles for one 8-sample cell.
 *
 * Classic table-driven extraction (Lorensen & Cline, Bourke's tables):
 *   1. Set bit i of the case index when corner i samples below the level
 *   2. Look up which of the 12 edges the surface crosses
 *   3. Interpolate a crossing on each of those edges
 *   4. Emit the case's triangles, 3 vertices each
 *
 * Works in unscaled grid-index units; callers apply the cell size.
 */

import { CUBE_CORNERS, CUBE_EDGES, CUBE_EDGE_MASKS, CUBE_TRIANGLES } from './case-tables.js';
import type { Vec3 } from './vec3.js';
import type { ScalarVolume } from './volume.js';

/** Receives one vertex at a time, in face order. Each vertex is a fresh copy. */
export type VertexEmitter = (vertex: Vec3) => void;

export class MarchingCube {
  // Scratch, reused across calls. Not safe to share between callers.
  private readonly corners: Vec3[] = CUBE_CORNERS.map((): Vec3 => [0, 0, 0]);
  private readonly samples = new Float64Array(8);
  private readonly crossings: Vec3[] = CUBE_EDGES.map((): Vec3 => [0, 0, 0]);

  constructor(
    readonly level: number,
    private readonly emit: VertexEmitter,
  ) {}

  /**
   * Extract the surface through the cube whose minimum corner is (x, y, z).
   *
   * Emits nothing when a corner falls outside the volume, so cubes based
   * on the last index along any axis are skipped; boundary closure covers
   * those faces.
   */
  calculate(volume: ScalarVolume, x: number, y: number, z: number): void {
    const width = volume.length;
    if (width === 0) return;
    const height = volume[0].length;
    if (height === 0) return;
    const depth = volume[0][0].length;

    for (let i = 0; i < 8; i++) {
      const offset = CUBE_CORNERS[i];
      const cx = x + offset[0];
      const cy = y + offset[1];
      const cz = z + offset[2];
      if (cx < 0 || cy < 0 || cz < 0 || cx >= width || cy >= height || cz >= depth) return;
      const corner = this.corners[i];
      corner[0] = cx;
      corner[1] = cy;
      corner[2] = cz;
    }

    let caseIndex = 0;
    for (let i = 0; i < 8; i++) {
      const [cx, cy, cz] = this.corners[i];
      const value = volume[cx][cy][cz];
      this.samples[i] = value;
      if (value < this.level) caseIndex |= 1 << i;
    }

    const mask = CUBE_EDGE_MASKS[caseIndex];
    if (mask === 0) return;

    for (let e = 0; e < 12; e++) {
      if ((mask & (1 << e)) === 0) continue;
      const [a, b] = CUBE_EDGES[e];
      this.interpolate(this.crossings[e], this.corners[a], this.samples[a], this.corners[b], this.samples[b]);
    }

    for (const e of CUBE_TRIANGLES[caseIndex]) {
      const p = this.crossings[e];
      this.emit([p[0], p[1], p[2]]);
    }
  }

  /**
   * Where the level cuts the segment p0→p1. Must match the square
   * interpolation exactly, or the boundary caps will not stitch.
   * A crossed edge has one sample below the level and one not, so the
   * denominator is non-zero for finite samples. Non-finite samples are
   * passed through unguarded.
   *
   * Always walks the edge from its lower end: neighbouring cubes list
   * shared edges in opposite directions, and both must round alike.
   */
  private interpolate(out: Vec3, p0: Vec3, v0: number, p1: Vec3, v1: number): void {
    if (p1[0] + p1[1] + p1[2] < p0[0] + p0[1] + p0[2]) {
      this.interpolate(out, p1, v1, p0, v0);
      return;
    }
    const mu = (this.level - v0) / (v1 - v0);
    out[0] = p0[0] + mu * (p1[0] - p0[0]);
    out[1] = p0[1] + mu * (p1[1] - p0[1]);
    out[2] = p0[2] + mu * (p1[2] - p0[2]);
  }
}
