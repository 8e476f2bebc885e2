/**
 * Volumes — regularly-sampled 3D grids indexed as volume[x][y][z].
 *
 * Extraction never mutates a volume. Dimensions are read from the
 * first row along each axis; ragged grids are the caller's problem.
 */

/** Read-only 3D grid, x-major. */
export type Grid3<T> = ReadonlyArray<ReadonlyArray<ReadonlyArray<T>>>;

/** Floating-point samples for isosurface extraction. */
export type ScalarVolume = Grid3<number>;

/** Occupancy samples for boundary-face extraction. */
export type OccupancyVolume = Grid3<boolean>;

export type Axis = 'x' | 'y' | 'z';

export interface VolumeDims {
  width: number;
  height: number;
  depth: number;
}

export function volumeDims<T>(volume: Grid3<T>): VolumeDims {
  const width = volume.length;
  const height = width > 0 ? volume[0].length : 0;
  const depth = height > 0 ? volume[0][0].length : 0;
  return { width, height, depth };
}

/** Sample a function at every integer grid point. */
export function sampleVolume<T>(
  dims: VolumeDims,
  sample: (x: number, y: number, z: number) => T,
): Grid3<T> {
  const grid: T[][][] = [];
  for (let x = 0; x < dims.width; x++) {
    const plane: T[][] = [];
    for (let y = 0; y < dims.height; y++) {
      const row: T[] = [];
      for (let z = 0; z < dims.depth; z++) row.push(sample(x, y, z));
      plane.push(row);
    }
    grid.push(plane);
  }
  return grid;
}

/**
 * One plane of samples, perpendicular to `axis` at `index`, as grid[u][v]
 * where (u, v) are the other two axes in x, y, z order.
 */
export function volumeSlice<T>(volume: Grid3<T>, axis: Axis, index: number): T[][] {
  const { width, height, depth } = volumeDims(volume);
  const extent = axis === 'x' ? width : axis === 'y' ? height : depth;
  if (!Number.isInteger(index) || index < 0 || index >= extent) {
    throw new Error(`Slice index ${index} is outside 0..${extent - 1} on the ${axis} axis`);
  }
  const [nu, nv] = axis === 'x' ? [height, depth] : axis === 'y' ? [width, depth] : [width, height];
  const grid: T[][] = [];
  for (let u = 0; u < nu; u++) {
    const row: T[] = [];
    for (let v = 0; v < nv; v++) {
      row.push(
        axis === 'x' ? volume[index][u][v] :
        axis === 'y' ? volume[u][index][v] :
        volume[u][v][index],
      );
    }
    grid.push(row);
  }
  return grid;
}

// ─── Incremental builder ───────────────────────────────────────

/**
 * Mutable grid that callers fill voxel by voxel, or layer by layer
 * along z, before handing a snapshot to an extractor.
 *
 * Writes outside the grid are ignored and reported through the
 * boolean return value.
 */
export class VolumeBuilder<T> {
  private readonly cells: T[][][];
  private layer = 0;

  constructor(readonly dims: VolumeDims, fill: T) {
    for (const [axis, n] of Object.entries(dims)) {
      if (!Number.isInteger(n) || n < 1) {
        throw new Error(`Volume ${axis} must be a positive integer (got ${n})`);
      }
    }
    this.cells = [];
    for (let x = 0; x < dims.width; x++) {
      const plane: T[][] = [];
      for (let y = 0; y < dims.height; y++) plane.push(new Array<T>(dims.depth).fill(fill));
      this.cells.push(plane);
    }
  }

  get cellCount(): number {
    return this.dims.width * this.dims.height * this.dims.depth;
  }

  contains(x: number, y: number, z: number): boolean {
    const { width, height, depth } = this.dims;
    return Number.isInteger(x) && Number.isInteger(y) && Number.isInteger(z)
      && x >= 0 && x < width && y >= 0 && y < height && z >= 0 && z < depth;
  }

  get(x: number, y: number, z: number): T | undefined {
    return this.contains(x, y, z) ? this.cells[x][y][z] : undefined;
  }

  set(x: number, y: number, z: number, value: T): boolean {
    if (!this.contains(x, y, z)) return false;
    this.cells[x][y][z] = value;
    return true;
  }

  // ─── Layer cursor ────────────────────────────────────────────

  /** The z index that setInLayer() writes to. */
  get currentLayer(): number {
    return this.layer;
  }

  /** Write into the current layer. False once the cursor has run past the top. */
  setInLayer(x: number, y: number, value: T): boolean {
    return this.set(x, y, this.layer, value);
  }

  /**
   * Advance the cursor one layer. Returns false when the cursor was
   * already past the top layer; advancing onto the position just past
   * the top still returns true.
   */
  nextLayer(): boolean {
    if (this.layer >= this.dims.depth) return false;
    this.layer++;
    return true;
  }

  resetLayer(): void {
    this.layer = 0;
  }

  /** Overwrite one whole z layer from rows indexed [x][y]. */
  setLayer(z: number, rows: ReadonlyArray<ReadonlyArray<T>>): number {
    let written = 0;
    for (let x = 0; x < rows.length; x++) {
      for (let y = 0; y < rows[x].length; y++) {
        if (this.set(x, y, z, rows[x][y])) written++;
      }
    }
    return written;
  }

  /** Every cell value in x, y, z order, read in place. */
  *values(): IterableIterator<T> {
    for (const plane of this.cells) {
      for (const row of plane) yield* row;
    }
  }

  /** Independent snapshot; later writes to the builder do not show through. */
  build(): Grid3<T> {
    return this.cells.map(plane => plane.map(row => row.slice()));
  }
}
