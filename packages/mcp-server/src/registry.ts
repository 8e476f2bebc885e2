/**
 * Volume Registry — in-memory named volume store.
 *
 * Every mutating MCP tool stores its result here and returns
 * a structured readback so the LLM always knows the current state.
 */

import type { VolumeBuilder, VolumeDims, VoxelMesh } from '@voxmesh/kernel';

export type StoredVolume =
  | { kind: 'scalar'; builder: VolumeBuilder<number> }
  | { kind: 'occupancy'; builder: VolumeBuilder<boolean> };

export type VolumeKind = StoredVolume['kind'];

export type VolumeEntry = StoredVolume & { id: string };

export interface VolumeReadback {
  dims: VolumeDims;
  cell_count: number;
  /** Next z layer append_layer writes; equals dims.depth once full. */
  layer_cursor: number;
  /** Scalar volumes: sample range. */
  min?: number;
  max?: number;
  /** Occupancy volumes: true voxels. */
  occupied?: number;
  has_mesh: boolean;
}

export interface VolumeResult {
  volume_id: string;
  kind: VolumeKind;
  readback: VolumeReadback;
}

export interface CachedMesh {
  mesh: VoxelMesh;
  method: 'isosurface' | 'boundary_faces';
  cell_size: number;
  level?: number;
}

let nextId = 1;

const volumes = new Map<string, VolumeEntry>();
const meshCache = new Map<string, CachedMesh>();

function readback(entry: VolumeEntry): VolumeReadback {
  const { builder } = entry;
  const base = {
    dims: { ...builder.dims },
    cell_count: builder.cellCount,
    layer_cursor: builder.currentLayer,
    has_mesh: meshCache.has(entry.id),
  };
  if (entry.kind === 'occupancy') {
    let occupied = 0;
    for (const cell of entry.builder.values()) if (cell) occupied++;
    return { ...base, occupied };
  }
  let min = Infinity;
  let max = -Infinity;
  for (const value of entry.builder.values()) {
    if (value < min) min = value;
    if (value > max) max = value;
  }
  return { ...base, min, max };
}

function toResult(entry: VolumeEntry): VolumeResult {
  return { volume_id: entry.id, kind: entry.kind, readback: readback(entry) };
}

/** Store a volume and return its ID + readback. */
export function create(volume: StoredVolume, name?: string): VolumeResult {
  if (name !== undefined && !/^[a-zA-Z0-9_-]+$/.test(name)) {
    throw new Error(
      `Invalid volume name "${name}". Use only letters, digits, hyphens, underscores.`
    );
  }
  const id = name ?? `vol_${nextId++}`;
  if (volumes.has(id) && !name) {
    // Auto-generated collision — bump
    return create(volume);
  }
  // Overwriting a volume invalidates its mesh
  meshCache.delete(id);
  const entry: VolumeEntry = { ...volume, id };
  volumes.set(id, entry);
  return toResult(entry);
}

/** Retrieve a volume or throw a clear error. */
export function get(id: string): VolumeEntry {
  const entry = volumes.get(id);
  if (!entry) {
    const available = [...volumes.keys()];
    throw new Error(
      `Volume "${id}" not found. Available volumes: [${available.join(', ')}]`
    );
  }
  return entry;
}

function wrongKind(entry: VolumeEntry, wanted: VolumeKind, purpose: string): Error {
  return new Error(
    `Volume "${entry.id}" holds ${entry.kind} samples; ${purpose} needs a ${wanted} volume.`
  );
}

export function getScalar(id: string, purpose: string): VolumeBuilder<number> {
  const entry = get(id);
  if (entry.kind !== 'scalar') throw wrongKind(entry, 'scalar', purpose);
  return entry.builder;
}

export function getOccupancy(id: string, purpose: string): VolumeBuilder<boolean> {
  const entry = get(id);
  if (entry.kind !== 'occupancy') throw wrongKind(entry, 'occupancy', purpose);
  return entry.builder;
}

/** Readback for a stored volume. */
export function describe(id: string): VolumeResult {
  return toResult(get(id));
}

/** Call after writing into a volume: its cached mesh no longer matches. */
export function touch(id: string): void {
  get(id);
  meshCache.delete(id);
}

/** Remove a volume and its cached mesh from the registry. */
export function remove(id: string): void {
  if (!volumes.has(id)) {
    throw new Error(`Volume "${id}" not found — cannot delete.`);
  }
  volumes.delete(id);
  meshCache.delete(id);
}

/** Check if a volume exists. */
export function has(id: string): boolean {
  return volumes.has(id);
}

/** List all volumes with their readbacks. */
export function list(): VolumeResult[] {
  return [...volumes.values()].map(toResult);
}

// ─── Mesh cache (separate from volume entries) ─────────────────

/** Cache a computed mesh for a volume. */
export function cacheMesh(volumeId: string, cached: CachedMesh): void {
  get(volumeId);
  meshCache.set(volumeId, cached);
}

/** Get cached mesh for a volume, or null. */
export function getMesh(volumeId: string): CachedMesh | null {
  return meshCache.get(volumeId) ?? null;
}

/** Clear all volumes and the mesh cache (for testing). */
export function clear(): void {
  volumes.clear();
  meshCache.clear();
  nextId = 1;
}
