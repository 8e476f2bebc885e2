import { describe, it, expect } from 'vitest';
import { MarchingSquare, extractContours, type SquareValues, type Winding } from '../src/marching-squares.js';
import type { Vec2 } from '../src/vec3.js';

function collect(level = 0.5) {
  const points: Vec2[] = [];
  const cells: Vec2[] = [];
  const square = new MarchingSquare(level, (p, cell) => {
    points.push(p);
    cells.push([cell[0], cell[1]]);
  });
  return { square, points, cells };
}

/** Window with the given corners above the level (1) and the rest below (0). */
function window(c00: number, c01: number, c10: number, c11: number): SquareValues {
  return [[c00, c01], [c10, c11]];
}

function signedArea(points: Vec2[]): number {
  let area = 0;
  for (let i = 0; i < points.length; i += 3) {
    const [a, b, c] = [points[i], points[i + 1], points[i + 2]];
    area += ((b[0] - a[0]) * (c[1] - a[1]) - (b[1] - a[1]) * (c[0] - a[0])) / 2;
  }
  return area;
}

// ─── Case index ─────────────────────────────────────────────────

describe('MarchingSquare.calculateType', () => {
  it('assigns bits 8, 4, 2, 1 to [0][0], [0][1], [1][0], [1][1]', () => {
    const { square } = collect();
    expect(square.calculateType(window(1, 0, 0, 0))).toBe(8);
    expect(square.calculateType(window(0, 1, 0, 0))).toBe(4);
    expect(square.calculateType(window(0, 0, 1, 0))).toBe(2);
    expect(square.calculateType(window(0, 0, 0, 1))).toBe(1);
    expect(square.calculateType(window(1, 1, 1, 1))).toBe(15);
  });

  it('counts a sample equal to the level as below', () => {
    const { square } = collect(0.5);
    expect(square.calculateType(window(0.5, 0.5, 0.5, 0.5))).toBe(0);
  });
});

// ─── Triangulation ──────────────────────────────────────────────

describe('MarchingSquare.calculateFaces', () => {
  it('emits nothing when all corners are below', () => {
    const { square, points } = collect();
    square.calculateFaces(window(0, 0, 0, 0), 'clockwise');
    expect(points).toHaveLength(0);
  });

  it('covers the whole square when all corners are above', () => {
    const { square, points } = collect();
    square.calculateFaces(window(1, 1, 1, 1), 'clockwise');
    expect(points).toEqual([[0, 0], [0, 1], [1, 0], [0, 1], [1, 1], [1, 0]]);
  });

  it('cuts off one corner with interpolated crossings', () => {
    const { square, points } = collect();
    square.calculateFaces(window(0, 0, 0, 1), 'clockwise');
    expect(points).toEqual([[0.5, 1], [1, 1], [1, 0.5]]);
  });

  it('counter-clockwise emits the same triangles reversed', () => {
    const { square, points } = collect();
    square.calculateFaces(window(0, 0, 0, 1), 'counter-clockwise');
    expect(points).toEqual([[1, 0.5], [1, 1], [0.5, 1]]);
  });

  it('uses one orientation across every case, flipped by winding', () => {
    for (let type = 1; type < 16; type++) {
      const values = window((type >> 3) & 1, (type >> 2) & 1, (type >> 1) & 1, type & 1);
      const areas: Record<Winding, number> = { 'clockwise': 0, 'counter-clockwise': 0 };
      for (const winding of ['clockwise', 'counter-clockwise'] as const) {
        const { square, points } = collect();
        square.calculateFaces(values, winding);
        expect(points.length % 3).toBe(0);
        areas[winding] = signedArea(points);
      }
      expect(areas['clockwise']).toBeLessThan(0);
      expect(areas['counter-clockwise']).toBeCloseTo(-areas['clockwise'], 12);
    }
  });

  it('triangulated area matches the above-level region', () => {
    const { square, points } = collect();
    // 3 corners above: the square minus one corner triangle of area 1/8
    square.calculateFaces(window(1, 1, 1, 0), 'clockwise');
    expect(Math.abs(signedArea(points))).toBeCloseTo(0.875, 12);
  });

  it('connects both corners of a saddle', () => {
    const { square, points } = collect();
    square.calculateFaces(window(0, 1, 1, 0), 'clockwise');
    expect(points).toHaveLength(12);
    expect(Math.abs(signedArea(points))).toBeCloseTo(0.75, 12);
  });

  it('passes the caller cell through untouched', () => {
    const { square, cells } = collect();
    square.calculateFaces(window(0, 0, 0, 1), 'clockwise', [4, 7]);
    expect(cells).toEqual([[4, 7], [4, 7], [4, 7]]);
  });
});

// ─── Lines ──────────────────────────────────────────────────────

describe('MarchingSquare.calculateLines', () => {
  it('emits one segment per crossing', () => {
    const { square, points } = collect();
    square.calculateLines(window(0, 0, 0, 1));
    expect(points).toEqual([[0.5, 1], [1, 0.5]]);
  });

  it('emits two distinct segments for a saddle', () => {
    const { square, points } = collect();
    square.calculateLines(window(0, 1, 1, 0));
    expect(points).toEqual([[0, 0.5], [0.5, 0], [1, 0.5], [0.5, 1]]);
  });

  it('emits nothing for uniform squares', () => {
    const { square, points } = collect();
    square.calculateLines(window(0, 0, 0, 0));
    square.calculateLines(window(1, 1, 1, 1));
    expect(points).toHaveLength(0);
  });
});

// ─── Contours ───────────────────────────────────────────────────

describe('extractContours', () => {
  // 4×4 grid with a raised 2×2 block in the middle
  const grid = [
    [0, 0, 0, 0],
    [0, 1, 1, 0],
    [0, 1, 1, 0],
    [0, 0, 0, 0],
  ];

  it('produces a single closed loop around the raised block', () => {
    const loops = extractContours(grid, 0.5);
    expect(loops).toHaveLength(1);
    expect(loops[0].closed).toBe(true);
    expect(loops[0].points).toHaveLength(8);
  });

  it('loop points are the edge crossings', () => {
    const [loop] = extractContours(grid, 0.5);
    const keys = loop.points.map(p => p.join(',')).sort();
    expect(keys).toEqual([
      '0.5,1', '0.5,2', '1,0.5', '1,2.5', '2,0.5', '2,2.5', '2.5,1', '2.5,2',
    ]);
  });

  it('scales points by cell size', () => {
    const [loop] = extractContours(grid, 0.5, 2);
    for (const [u, v] of loop.points) {
      expect(Number.isInteger(u)).toBe(true);
      expect(Number.isInteger(v)).toBe(true);
    }
  });

  it('leaves a contour open where it runs off the grid', () => {
    const ramp = [
      [0, 0, 0],
      [1, 1, 1],
    ];
    const loops = extractContours(ramp, 0.5);
    expect(loops).toHaveLength(1);
    expect(loops[0].closed).toBe(false);
    expect(loops[0].points).toHaveLength(3);
  });

  it('returns nothing for a flat grid', () => {
    expect(extractContours([[1, 1], [1, 1]], 0.5)).toEqual([]);
  });

  it('throws on non-positive cellSize', () => {
    expect(() => extractContours(grid, 0.5, 0)).toThrow(/positive/);
  });
});
