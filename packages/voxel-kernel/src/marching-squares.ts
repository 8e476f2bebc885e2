/**
 * Marching Squares — the 2D analogue of marching cubes.
 *
 * One MarchingSquare handles a single 2×2 window of samples. It can
 * triangulate the part of the window above the level (used to cap the
 * outer faces of a volume) or emit the bare crossing segments.
 *
 * extractContours() runs it over a whole 2D grid and stitches the
 * segments into polyline loops.
 */

import { SQUARE_CORNERS, SQUARE_SEGMENTS, SQUARE_TRIANGLES } from './case-tables.js';
import type { Vec2 } from './vec3.js';

/** 2×2 sample window indexed [u][v]. */
export type SquareValues = readonly [readonly [number, number], readonly [number, number]];

/**
 * Emission order for triangulated squares. Opposite faces of a volume
 * use opposite windings so both caps face outward.
 */
export type Winding = 'clockwise' | 'counter-clockwise';

/**
 * Receives one local (u, v) point in [0,1]² at a time, along with the
 * cell the caller passed to calculateFaces()/calculateLines().
 */
export type SquareEmitter = (point: Vec2, cell: Readonly<Vec2>) => void;

const ORIGIN: Readonly<Vec2> = [0, 0];

export class MarchingSquare {
  // Slots 0–3 are the corners; 4–7 are rewritten per call with crossings.
  private readonly vertices: Vec2[] = [
    ...SQUARE_CORNERS.map((c): Vec2 => [c[0], c[1]]),
    [0, 0], [0, 0], [0, 0], [0, 0],
  ];

  constructor(
    readonly level: number,
    private readonly emit: SquareEmitter,
  ) {}

  /** 4-bit case: [0][0]→8, [0][1]→4, [1][0]→2, [1][1]→1, set when above the level. */
  calculateType(values: SquareValues): number {
    return (
      (values[0][0] > this.level ? 8 : 0) |
      (values[0][1] > this.level ? 4 : 0) |
      (values[1][0] > this.level ? 2 : 0) |
      (values[1][1] > this.level ? 1 : 0)
    );
  }

  /** Triangulate the above-level area, 3 emissions per triangle. */
  calculateFaces(values: SquareValues, winding: Winding, cell: Readonly<Vec2> = ORIGIN): void {
    const type = this.calculateType(values);
    this.calculateVertices(values, type);

    const triangles = SQUARE_TRIANGLES[type];
    const n = triangles.length;
    for (let i = 0; i < n; i++) {
      const slot = winding === 'clockwise' ? triangles[i] : triangles[n - 1 - i];
      this.emitSlot(slot, cell);
    }
  }

  /** Emit each crossing segment as 2 points. Saddle cases give 2 segments. */
  calculateLines(values: SquareValues, cell: Readonly<Vec2> = ORIGIN): void {
    const type = this.calculateType(values);
    this.calculateVertices(values, type);

    const segmentCount = SQUARE_SEGMENTS[type].length / 8;
    for (let s = 0; s < segmentCount; s++) {
      this.emitSlot(4 + 2 * s, cell);
      this.emitSlot(5 + 2 * s, cell);
    }
  }

  private emitSlot(slot: number, cell: Readonly<Vec2>): void {
    const p = this.vertices[slot];
    this.emit([p[0], p[1]], cell);
  }

  private calculateVertices(values: SquareValues, type: number): void {
    const row = SQUARE_SEGMENTS[type];
    for (let i = 0; i < row.length; i += 8) {
      const slot = 4 + i / 4;
      this.crossing(this.vertices[slot], values, row[i], row[i + 1], row[i + 2], row[i + 3]);
      this.crossing(this.vertices[slot + 1], values, row[i + 4], row[i + 5], row[i + 6], row[i + 7]);
    }
  }

  /** Same arithmetic as MarchingCube's interpolation, lower end first. */
  private crossing(out: Vec2, values: SquareValues, ax: number, ay: number, bx: number, by: number): void {
    if (bx + by < ax + ay) {
      this.crossing(out, values, bx, by, ax, ay);
      return;
    }
    const va = values[ax][ay];
    const vb = values[bx][by];
    const mu = (this.level - va) / (vb - va);
    out[0] = ax + mu * (bx - ax);
    out[1] = ay + mu * (by - ay);
  }
}

// ─── Contours over a 2D grid ───────────────────────────────────

export interface ContourLoop {
  points: Vec2[];
  closed: boolean;
}

/**
 * Extract level contours from a 2D grid indexed [u][v].
 *
 * @param grid - Samples, at least 2×2
 * @param level - Contour level
 * @param cellSize - Spacing between samples
 * @returns Polylines, closed where the contour does not leave the grid
 */
export function extractContours(
  grid: ReadonlyArray<ReadonlyArray<number>>,
  level: number,
  cellSize = 1,
): ContourLoop[] {
  if (!(cellSize > 0)) throw new Error('cellSize must be positive');
  const nu = grid.length;
  const nv = nu > 0 ? grid[0].length : 0;
  if (nu < 2 || nv < 2) return [];

  const segments: [Vec2, Vec2][] = [];
  let pending: Vec2 | null = null;
  const square = new MarchingSquare(level, (p, cell) => {
    const point: Vec2 = [(cell[0] + p[0]) * cellSize, (cell[1] + p[1]) * cellSize];
    if (pending === null) {
      pending = point;
    } else {
      segments.push([pending, point]);
      pending = null;
    }
  });

  for (let u = 0; u < nu - 1; u++) {
    for (let v = 0; v < nv - 1; v++) {
      const values: SquareValues = [
        [grid[u][v], grid[u][v + 1]],
        [grid[u + 1][v], grid[u + 1][v + 1]],
      ];
      square.calculateLines(values, [u, v]);
    }
  }

  return stitchContours(segments);
}

// ─── Contour Stitching ─────────────────────────────────────────

/**
 * Stitch unordered segments into polylines via endpoint hashing.
 * Open chains are walked in both directions from their first segment.
 */
function stitchContours(segments: [Vec2, Vec2][]): ContourLoop[] {
  if (segments.length === 0) return [];

  const PRECISION = 6;
  const key = (p: Vec2): string => `${p[0].toFixed(PRECISION)},${p[1].toFixed(PRECISION)}`;

  interface EndRef { seg: number; end: 0 | 1 }
  const adj = new Map<string, EndRef[]>();
  const link = (k: string, ref: EndRef): void => {
    const refs = adj.get(k);
    if (refs) refs.push(ref);
    else adj.set(k, [ref]);
  };
  segments.forEach(([a, b], i) => {
    link(key(a), { seg: i, end: 0 });
    link(key(b), { seg: i, end: 1 });
  });

  const used = new Uint8Array(segments.length);

  // Follow unused segments from `from`, returning the points reached.
  const walk = (from: Vec2): Vec2[] => {
    const reached: Vec2[] = [];
    let current = key(from);
    for (;;) {
      const next = (adj.get(current) ?? []).find(ref => !used[ref.seg]);
      if (!next) return reached;
      used[next.seg] = 1;
      const point = segments[next.seg][next.end === 0 ? 1 : 0];
      reached.push(point);
      current = key(point);
    }
  };

  const loops: ContourLoop[] = [];
  for (let start = 0; start < segments.length; start++) {
    if (used[start]) continue;
    used[start] = 1;

    const [head, tail] = segments[start];
    const points: Vec2[] = [head, tail, ...walk(tail)];
    const closed = points.length > 2 && key(points[0]) === key(points[points.length - 1]);
    if (closed) {
      points.pop();
    } else {
      points.unshift(...walk(head).reverse());
    }
    loops.push({ points, closed });
  }

  return loops;
}
