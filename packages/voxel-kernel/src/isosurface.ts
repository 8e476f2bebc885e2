/**
 * Isosurface — closed triangle mesh from a scalar volume.
 *
 * Phase 1 runs marching cubes over every cell of the volume. That
 * surface is open wherever the above-level region touches the volume's
 * outer faces, so phase 2 caps each of the 6 faces with marching
 * squares over its outermost layer of samples.
 *
 * Both phases emit (cell index + interpolation fraction) × cellSize on
 * every axis, which is what lets cap edges coincide with the edges of
 * the interior surface.
 */

import { MarchingCube, type VertexEmitter } from './marching-cube.js';
import { MarchingSquare, type SquareValues, type Winding } from './marching-squares.js';
import type { Vec2, Vec3 } from './vec3.js';
import { volumeDims, type Axis, type ScalarVolume } from './volume.js';

/** One outer face of the volume: the plane where `axis` equals `offset`. */
export interface BoundaryPlane {
  name: 'left' | 'right' | 'front' | 'back' | 'bottom' | 'top';
  axis: Axis;
  offset: number;
  winding: Winding;
}

/**
 * The 6 outer faces, as consecutive opposite pairs in cap order. Opposite
 * faces wind oppositely so that every cap faces away from the volume.
 * (u, v) on each plane follows the free axes in x, y, z order.
 */
export function boundaryPlanes(width: number, height: number, depth: number): BoundaryPlane[] {
  return [
    { name: 'bottom', axis: 'z', offset: 0, winding: 'clockwise' },
    { name: 'top', axis: 'z', offset: depth - 1, winding: 'counter-clockwise' },
    { name: 'left', axis: 'x', offset: 0, winding: 'clockwise' },
    { name: 'right', axis: 'x', offset: width - 1, winding: 'counter-clockwise' },
    { name: 'front', axis: 'y', offset: 0, winding: 'counter-clockwise' },
    { name: 'back', axis: 'y', offset: height - 1, winding: 'clockwise' },
  ];
}

/** Grid point on `plane` at plane coordinates (u, v). */
function planePoint(plane: BoundaryPlane, u: number, v: number): Vec3 {
  switch (plane.axis) {
    case 'x': return [plane.offset, u, v];
    case 'y': return [u, plane.offset, v];
    case 'z': return [u, v, plane.offset];
  }
}

export class Isosurface {
  constructor(private readonly emit: VertexEmitter) {}

  /**
   * Extract the level surface of `volume` and close it against the
   * volume's outer faces. The region above `level` ends up inside.
   */
  makeFromVoxels(volume: ScalarVolume, cellSize: number, level: number): void {
    const { width, height, depth } = volumeDims(volume);
    if (width === 0 || height === 0 || depth === 0) return;

    // Phase 1: interior
    const cube = new MarchingCube(level, (vertex) => {
      vertex[0] *= cellSize;
      vertex[1] *= cellSize;
      vertex[2] *= cellSize;
      this.emit(vertex);
    });
    for (let x = 0; x < width; x++) {
      for (let y = 0; y < height; y++) {
        for (let z = 0; z < depth; z++) {
          cube.calculate(volume, x, y, z);
        }
      }
    }

    // Phase 2: caps, both faces of an axis pair per cell
    const planes = boundaryPlanes(width, height, depth);
    for (let pair = 0; pair < planes.length; pair += 2) {
      this.closeAxisPair(volume, planes[pair], planes[pair + 1], cellSize, level);
    }
  }

  /** Cap two opposite faces, visiting each (u, v) cell once and emitting `near` then `far`. */
  private closeAxisPair(
    volume: ScalarVolume,
    near: BoundaryPlane,
    far: BoundaryPlane,
    cellSize: number,
    level: number,
  ): void {
    const { width, height, depth } = volumeDims(volume);
    const [nu, nv] =
      near.axis === 'x' ? [height, depth] :
      near.axis === 'y' ? [width, depth] :
      [width, height];

    const sides = [near, far].map((plane) => ({
      plane,
      square: new MarchingSquare(level, (point: Vec2, cell) => {
        const vertex = planePoint(plane, cell[0] + point[0], cell[1] + point[1]);
        this.emit([vertex[0] * cellSize, vertex[1] * cellSize, vertex[2] * cellSize]);
      }),
    }));

    for (let u = 0; u < nu - 1; u++) {
      for (let v = 0; v < nv - 1; v++) {
        for (const { plane, square } of sides) {
          const sample = (su: number, sv: number): number => {
            const [x, y, z] = planePoint(plane, su, sv);
            return volume[x][y][z];
          };
          const values: SquareValues = [
            [sample(u, v), sample(u, v + 1)],
            [sample(u + 1, v), sample(u + 1, v + 1)],
          ];
          square.calculateFaces(values, plane.winding, [u, v]);
        }
      }
    }
  }
}
