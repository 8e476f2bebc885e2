/**
 * Boundary faces — blocky quad mesh from an occupancy volume.
 *
 * Every true voxel is a solid unit cube. A quad is emitted wherever a
 * true voxel meets a false one, and wherever a true voxel sits on one
 * of the volume's 6 outer faces. Winding puts every normal on the
 * false side.
 */

import type { VertexEmitter } from './marching-cube.js';
import type { Vec3 } from './vec3.js';
import { volumeDims, type OccupancyVolume } from './volume.js';

type Quad = [Vec3, Vec3, Vec3, Vec3];

export class BoundaryFaces {
  constructor(private readonly emit: VertexEmitter) {}

  /** 4 emissions, in order when `forward`, reversed otherwise. */
  private addQuad(quad: Quad, forward: boolean): void {
    if (forward) {
      for (let i = 0; i < 4; i++) this.emit(quad[i]);
    } else {
      for (let i = 3; i >= 0; i--) this.emit(quad[i]);
    }
  }

  makeQuadsFromVoxels(volume: OccupancyVolume, cellSize: number): void {
    const { width, height, depth } = volumeDims(volume);
    if (width === 0 || height === 0 || depth === 0) return;
    const s = cellSize;

    // Quads in the plane x = i, y = j or z = k. Forward order faces +x, -y, +z.
    const xQuad = (i: number, j: number, k: number): Quad => [
      [i * s, j * s, k * s],
      [i * s, (j + 1) * s, k * s],
      [i * s, (j + 1) * s, (k + 1) * s],
      [i * s, j * s, (k + 1) * s],
    ];
    const yQuad = (i: number, j: number, k: number): Quad => [
      [i * s, j * s, k * s],
      [(i + 1) * s, j * s, k * s],
      [(i + 1) * s, j * s, (k + 1) * s],
      [i * s, j * s, (k + 1) * s],
    ];
    const zQuad = (i: number, j: number, k: number): Quad => [
      [i * s, j * s, k * s],
      [(i + 1) * s, j * s, k * s],
      [(i + 1) * s, (j + 1) * s, k * s],
      [i * s, (j + 1) * s, k * s],
    ];

    // ─── Interior walls ────────────────────────────────────────

    for (let i = 0; i < width; i++) {
      for (let j = 0; j < height; j++) {
        for (let k = 0; k < depth; k++) {
          const here = volume[i][j][k];
          if (i > 0 && volume[i - 1][j][k] !== here) {
            this.addQuad(xQuad(i, j, k), volume[i - 1][j][k]);
          }
          if (j > 0 && volume[i][j - 1][k] !== here) {
            this.addQuad(yQuad(i, j, k), here);
          }
          if (k > 0 && volume[i][j][k - 1] !== here) {
            this.addQuad(zQuad(i, j, k), volume[i][j][k - 1]);
          }
        }
      }
    }

    // ─── Outer walls ───────────────────────────────────────────

    // left and right
    for (let j = 0; j < height; j++) {
      for (let k = 0; k < depth; k++) {
        if (volume[0][j][k]) this.addQuad(xQuad(0, j, k), false);
        if (volume[width - 1][j][k]) this.addQuad(xQuad(width, j, k), true);
      }
    }

    // front and back
    for (let i = 0; i < width; i++) {
      for (let k = 0; k < depth; k++) {
        if (volume[i][0][k]) this.addQuad(yQuad(i, 0, k), true);
        if (volume[i][height - 1][k]) this.addQuad(yQuad(i, height, k), false);
      }
    }

    // bottom and top
    for (let i = 0; i < width; i++) {
      for (let j = 0; j < height; j++) {
        if (volume[i][j][0]) this.addQuad(zQuad(i, j, 0), false);
        if (volume[i][j][depth - 1]) this.addQuad(zQuad(i, j, depth), true);
      }
    }
  }
}
