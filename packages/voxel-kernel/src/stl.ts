/**
 * Binary STL export.
 *
 * Format: 80-byte header + uint32 count + 50 bytes per triangle
 * (normal, 3 vertices, uint16 attribute), all little-endian.
 * Quads are split in two; both halves carry the first half's normal.
 */

import { cross, sub, type Vec3 } from './vec3.js';
import type { VoxelMesh } from './mesh.js';

export const STL_HEADER_BYTES = 80;
export const STL_TRIANGLE_BYTES = 50;

/**
 * 'exact' is the true unit cross product. 'legacy' reproduces older
 * voxel exporters, which wrote the z component of the cross product in
 * the y slot, left z at 0 and worked in float32.
 */
export type NormalMode = 'exact' | 'legacy';

export interface STLExportOptions {
  /** Written at the start of the header; the rest is zero-filled. Default: all zeros. */
  header?: string;
  normals?: NormalMode;
}

/** Unit normal of (v0, v1, v2) by the right-hand rule. Degenerate faces give NaN. */
export function faceNormal(v0: Vec3, v1: Vec3, v2: Vec3, mode: NormalMode = 'exact'): Vec3 {
  if (mode === 'legacy') return legacyNormal(v0, v1, v2);

  const [nx, ny, nz] = cross(sub(v1, v0), sub(v2, v0));
  const size = Math.sqrt(nx * nx + ny * ny + nz * nz);
  return [nx / size, ny / size, nz / size];
}

function legacyNormal(d0: Vec3, d1: Vec3, d2: Vec3): Vec3 {
  const f = Math.fround;
  // start from the float32 vertices that end up in the file
  const v0 = d0.map(f), v1 = d1.map(f), v2 = d2.map(f);
  const ax = f(v1[0] - v0[0]), ay = f(v1[1] - v0[1]);
  const bx = f(v2[0] - v0[0]), by = f(v2[1] - v0[1]);
  const nx = f(f(ay * f(v2[2] - v0[2])) - f(f(v1[2] - v0[2]) * by));
  // y slot holds the z component; z is never assigned
  const ny = f(f(ax * by) - f(ay * bx));
  const nz = 0;
  const size = f(Math.sqrt(f(f(f(nx * nx) + f(ny * ny)) + nz * nz)));
  return [f(nx / size), f(ny / size), f(nz / size)];
}

export function stlByteLength(triangleCount: number): number {
  return STL_HEADER_BYTES + 4 + STL_TRIANGLE_BYTES * triangleCount;
}

export function exportSTL(mesh: VoxelMesh, options: STLExportOptions = {}): ArrayBuffer {
  const mode = options.normals ?? 'exact';
  const headerBytes = new TextEncoder().encode(options.header ?? '');
  if (headerBytes.length > STL_HEADER_BYTES) {
    throw new Error(
      `STL header exceeds 80 bytes (got ${headerBytes.length}). Shorten the header string.`
    );
  }

  const { vertices, kind, triangleCount } = mesh;
  const per = kind === 'quads' ? 4 : 3;
  const perFace = kind === 'quads' ? 2 : 1;
  if (vertices.length !== mesh.faceCount * per || triangleCount !== mesh.faceCount * perFace) {
    throw new Error(
      `Mesh data inconsistent: ${vertices.length} vertices, ${mesh.faceCount} ${kind}, ${triangleCount} triangles`
    );
  }

  const buffer = new ArrayBuffer(stlByteLength(triangleCount));
  const view = new DataView(buffer);
  new Uint8Array(buffer).set(headerBytes, 0);
  view.setUint32(STL_HEADER_BYTES, triangleCount, true);

  let offset = STL_HEADER_BYTES + 4;
  const putVec = (v: Vec3): void => {
    view.setFloat32(offset, v[0], true); offset += 4;
    view.setFloat32(offset, v[1], true); offset += 4;
    view.setFloat32(offset, v[2], true); offset += 4;
  };
  const putTriangle = (n: Vec3, a: Vec3, b: Vec3, c: Vec3): void => {
    putVec(n);
    putVec(a);
    putVec(b);
    putVec(c);
    // Attribute byte count
    view.setUint16(offset, 0, true); offset += 2;
  };

  for (let i = 0; i < vertices.length; i += per) {
    const v0 = vertices[i];
    const v1 = vertices[i + 1];
    const v2 = vertices[i + 2];
    const n = faceNormal(v0, v1, v2, mode);
    putTriangle(n, v0, v1, v2);
    if (kind === 'quads') putTriangle(n, v0, v2, vertices[i + 3]);
  }

  return buffer;
}
