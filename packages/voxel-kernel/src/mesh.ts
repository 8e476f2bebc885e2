/**
 * Mesh assembly — collects the vertex stream of one extraction run.
 *
 * Extractors push vertices one at a time in face order; the assembler
 * groups them by primitive kind and hands back a fresh VoxelMesh.
 */

import { BoundaryFaces } from './boundary-faces.js';
import { Isosurface } from './isosurface.js';
import { boundsOf, type Vec3, type BoundingBox } from './vec3.js';
import type { OccupancyVolume, ScalarVolume } from './volume.js';

export type PrimitiveKind = 'triangles' | 'quads';

export const VERTICES_PER_FACE: Record<PrimitiveKind, number> = {
  triangles: 3,
  quads: 4,
};

export interface VoxelMesh {
  kind: PrimitiveKind;
  /** Face-ordered vertex soup; every face owns its own vertices. */
  vertices: Vec3[];
  faceCount: number;
  /** Triangles once quads are split in two. */
  triangleCount: number;
  bounds: BoundingBox;
}

export type Triangle = [Vec3, Vec3, Vec3];

export class MeshAssembler {
  private vertices: Vec3[] = [];

  constructor(readonly kind: PrimitiveKind) {}

  /** Pass as the extractor's vertex emitter. */
  readonly emit = (vertex: Vec3): void => {
    this.vertices.push(vertex);
  };

  get vertexCount(): number {
    return this.vertices.length;
  }

  /** Hand over the mesh and start a new, empty one. */
  finish(): VoxelMesh {
    const per = VERTICES_PER_FACE[this.kind];
    if (this.vertices.length % per !== 0) {
      throw new Error(
        `Incomplete face: ${this.vertices.length} vertices is not a multiple of ${per} (${this.kind})`
      );
    }
    const vertices = this.vertices;
    this.vertices = [];
    const faceCount = vertices.length / per;
    return {
      kind: this.kind,
      vertices,
      faceCount,
      triangleCount: this.kind === 'quads' ? faceCount * 2 : faceCount,
      bounds: boundsOf(vertices),
    };
  }
}

function checkCellSize(cellSize: number): void {
  if (!(cellSize > 0) || !Number.isFinite(cellSize)) {
    throw new Error('cellSize must be positive');
  }
}

/** Closed triangle mesh of the region above `level` (marching cubes + capped faces). */
export function isosurfaceMesh(volume: ScalarVolume, cellSize: number, level: number): VoxelMesh {
  checkCellSize(cellSize);
  const assembler = new MeshAssembler('triangles');
  new Isosurface(assembler.emit).makeFromVoxels(volume, cellSize, level);
  return assembler.finish();
}

/** Quad mesh of the faces between occupied and empty voxels. */
export function boundaryMesh(volume: OccupancyVolume, cellSize: number): VoxelMesh {
  checkCellSize(cellSize);
  const assembler = new MeshAssembler('quads');
  new BoundaryFaces(assembler.emit).makeQuadsFromVoxels(volume, cellSize);
  return assembler.finish();
}

/**
 * Faces as triangles, in serialization order. A quad (v0, v1, v2, v3)
 * becomes (v0, v1, v2) and (v0, v2, v3).
 */
export function meshTriangles(mesh: VoxelMesh): Triangle[] {
  const { vertices } = mesh;
  const out: Triangle[] = [];
  if (mesh.kind === 'quads') {
    for (let i = 0; i + 3 < vertices.length; i += 4) {
      out.push([vertices[i], vertices[i + 1], vertices[i + 2]]);
      out.push([vertices[i], vertices[i + 2], vertices[i + 3]]);
    }
  } else {
    for (let i = 0; i + 2 < vertices.length; i += 3) {
      out.push([vertices[i], vertices[i + 1], vertices[i + 2]]);
    }
  }
  return out;
}
