import { expect } from 'vitest';
import type { Vec3 } from '../src/vec3.js';
import { cross, sub } from '../src/vec3.js';
import type { Triangle } from '../src/mesh.js';

const EPSILON = 1e-9;

export function nearVec3(actual: Vec3, expected: Vec3, tol = EPSILON) {
  expect(Math.abs(actual[0] - expected[0])).toBeLessThan(tol);
  expect(Math.abs(actual[1] - expected[1])).toBeLessThan(tol);
  expect(Math.abs(actual[2] - expected[2])).toBeLessThan(tol);
}

/** Group a flat vertex stream into triangles. */
export function chunkTriangles(vertices: Vec3[]): Triangle[] {
  const out: Triangle[] = [];
  for (let i = 0; i + 2 < vertices.length; i += 3) {
    out.push([vertices[i], vertices[i + 1], vertices[i + 2]]);
  }
  return out;
}

/** Cross product of the first two edges; its length is twice the triangle area. */
export function areaNormal([a, b, c]: Triangle): Vec3 {
  return cross(sub(b, a), sub(c, a));
}

export interface EdgeReport {
  /** Undirected edges not shared by exactly 2 triangles. */
  boundaryEdges: number;
  /** Directed edges without exactly one opposite partner. */
  unpairedEdges: number;
  /** Signed enclosed volume; positive when faces wind outward. */
  signedVolume: number;
}

export function edgeReport(triangles: Triangle[]): EdgeReport {
  const key = (p: Vec3) => p.join(',');
  const undirected = new Map<string, number>();
  const directed = new Map<string, number>();
  let volume6 = 0;

  for (const [a, b, c] of triangles) {
    for (const [p, q] of [[a, b], [b, c], [c, a]] as const) {
      const kp = key(p);
      const kq = key(q);
      const u = kp < kq ? `${kp}|${kq}` : `${kq}|${kp}`;
      undirected.set(u, (undirected.get(u) ?? 0) + 1);
      const d = `${kp}>${kq}`;
      directed.set(d, (directed.get(d) ?? 0) + 1);
    }
    volume6 += a[0] * (b[1] * c[2] - b[2] * c[1])
      - a[1] * (b[0] * c[2] - b[2] * c[0])
      + a[2] * (b[0] * c[1] - b[1] * c[0]);
  }

  let boundaryEdges = 0;
  for (const n of undirected.values()) if (n !== 2) boundaryEdges++;

  let unpairedEdges = 0;
  for (const [d, n] of directed) {
    const [p, q] = d.split('>');
    if (n !== 1 || directed.get(`${q}>${p}`) !== 1) unpairedEdges++;
  }

  return { boundaryEdges, unpairedEdges, signedVolume: volume6 / 6 };
}
