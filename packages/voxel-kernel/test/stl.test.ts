import { describe, it, expect } from 'vitest';
import { exportSTL, faceNormal, stlByteLength } from '../src/stl.js';
import { boundaryMesh, isosurfaceMesh, type VoxelMesh } from '../src/mesh.js';
import { sampleVolume } from '../src/volume.js';
import { boundsOf, type Vec3 } from '../src/vec3.js';
import { nearVec3 } from './helpers.js';

function triangleMesh(vertices: Vec3[]): VoxelMesh {
  return {
    kind: 'triangles',
    vertices,
    faceCount: vertices.length / 3,
    triangleCount: vertices.length / 3,
    bounds: boundsOf(vertices),
  };
}

function readVec3(view: DataView, offset: number): Vec3 {
  return [
    view.getFloat32(offset, true),
    view.getFloat32(offset + 4, true),
    view.getFloat32(offset + 8, true),
  ];
}

// ─── Normals ────────────────────────────────────────────────────

describe('faceNormal', () => {
  it('follows the right-hand rule', () => {
    nearVec3(faceNormal([0, 0, 0], [1, 0, 0], [0, 1, 0]), [0, 0, 1]);
    nearVec3(faceNormal([0, 0, 0], [0, 1, 0], [1, 0, 0]), [0, 0, -1]);
  });

  it('is unit length for any size of face', () => {
    nearVec3(faceNormal([0, 0, 0], [0, 0, 5], [0, 3, 0]), [-1, 0, 0]);
  });

  it('gives NaN for a degenerate face', () => {
    const n = faceNormal([0, 0, 0], [1, 1, 1], [2, 2, 2]);
    expect(n.every(Number.isNaN)).toBe(true);
  });

  it('legacy mode writes the z component in the y slot', () => {
    nearVec3(faceNormal([0, 0, 0], [1, 0, 0], [0, 1, 0], 'legacy'), [0, 1, 0]);
    // x is computed as usual; z stays 0
    nearVec3(faceNormal([0, 0, 0], [0, 1, 0], [0, 0, 1], 'legacy'), [1, 0, 0]);
  });

  it('legacy mode depends only on the float32 vertices', () => {
    const v0: Vec3 = [0.1, 0.2, 0.3];
    const v1: Vec3 = [1.7, 0.45, 0.9];
    const v2: Vec3 = [0.35, 1.3, 2.1];
    const f32 = (v: Vec3): Vec3 => [Math.fround(v[0]), Math.fround(v[1]), Math.fround(v[2])];
    const n = faceNormal(v0, v1, v2, 'legacy');
    expect(n).toEqual(faceNormal(f32(v0), f32(v1), f32(v2), 'legacy'));
    expect(n.map(Math.fround)).toEqual(n);
    expect(n[2]).toBe(0);
  });
});

// ─── Binary layout ──────────────────────────────────────────────

describe('exportSTL', () => {
  const cube = boundaryMesh([[[true]]], 1);

  it('sizes the file as 84 + 50 bytes per triangle', () => {
    const buf = exportSTL(cube);
    expect(stlByteLength(12)).toBe(684);
    expect(buf.byteLength).toBe(684);
    expect(new DataView(buf).getUint32(80, true)).toBe(12);
  });

  it('stores the count little-endian after a zero header', () => {
    const bytes = new Uint8Array(exportSTL(cube));
    expect(Array.from(bytes.subarray(0, 80)).every(b => b === 0)).toBe(true);
    expect(Array.from(bytes.subarray(80, 84))).toEqual([12, 0, 0, 0]);
  });

  it('writes a custom header and zero-fills the rest', () => {
    const bytes = new Uint8Array(exportSTL(cube, { header: 'voxmesh' }));
    expect(new TextDecoder().decode(bytes.subarray(0, 7))).toBe('voxmesh');
    expect(Array.from(bytes.subarray(7, 80)).every(b => b === 0)).toBe(true);
  });

  it('rejects a header longer than 80 bytes', () => {
    expect(() => exportSTL(cube, { header: 'x'.repeat(81) })).toThrow(
      'STL header exceeds 80 bytes (got 81). Shorten the header string.',
    );
  });

  it('splits each quad into two records sharing the first normal', () => {
    // first quad of a lone voxel is the left face: (0,0,1) (0,1,1) (0,1,0) (0,0,0)
    const view = new DataView(exportSTL(cube));
    const first = 84;
    const second = 84 + 50;

    nearVec3(readVec3(view, first), [-1, 0, 0]);
    expect(readVec3(view, first + 12)).toEqual([0, 0, 1]);
    expect(readVec3(view, first + 24)).toEqual([0, 1, 1]);
    expect(readVec3(view, first + 36)).toEqual([0, 1, 0]);
    expect(view.getUint16(first + 48, true)).toBe(0);

    nearVec3(readVec3(view, second), [-1, 0, 0]);
    expect(readVec3(view, second + 12)).toEqual([0, 0, 1]);
    expect(readVec3(view, second + 24)).toEqual([0, 1, 0]);
    expect(readVec3(view, second + 36)).toEqual([0, 0, 0]);
  });

  it('writes one record per triangle of an isosurface', () => {
    const volume = sampleVolume({ width: 3, height: 3, depth: 3 }, () => 1);
    const mesh = isosurfaceMesh(volume, 1, 0.5);
    const buf = exportSTL(mesh);
    expect(buf.byteLength).toBe(stlByteLength(mesh.triangleCount));
    expect(new DataView(buf).getUint32(80, true)).toBe(48);
  });

  it('rounds coordinates to float32', () => {
    const view = new DataView(exportSTL(triangleMesh([[0.1, 0, 0], [1, 0, 0], [0, 1, 0]])));
    expect(view.getFloat32(84 + 12, true)).toBe(Math.fround(0.1));
  });

  it('uses legacy normals when asked', () => {
    const mesh = triangleMesh([[0, 0, 0], [1, 0, 0], [0, 1, 0]]);
    nearVec3(readVec3(new DataView(exportSTL(mesh)), 84), [0, 0, 1]);
    nearVec3(readVec3(new DataView(exportSTL(mesh, { normals: 'legacy' })), 84), [0, 1, 0]);
  });

  it('writes a header-only file for an empty mesh', () => {
    const buf = exportSTL(triangleMesh([]));
    expect(buf.byteLength).toBe(84);
    expect(new DataView(buf).getUint32(80, true)).toBe(0);
  });

  it('refuses a mesh whose counts disagree with its vertices', () => {
    const mesh = { ...triangleMesh([[0, 0, 0], [1, 0, 0], [0, 1, 0]]), faceCount: 2 };
    expect(() => exportSTL(mesh)).toThrow(
      'Mesh data inconsistent: 3 vertices, 2 triangles, 1 triangles',
    );
  });
});
