/**
 * MCP Tool Registrations — 13 tools wrapping the voxel kernel.
 *
 * Every tool returns JSON with { volume_id, kind, readback } (or a
 * mesh/export summary) so the LLM always knows the current state
 * after every operation.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import {
  VolumeBuilder,
  isosurfaceMesh, boundaryMesh,
  extractContours, volumeSlice,
  saveSTL,
  type VolumeDims,
} from '@voxmesh/kernel';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { ServerConfig } from './config.js';
import * as registry from './registry.js';

const dimension = (axis: string) =>
  z.number().int().positive().describe(`Number of samples along ${axis}`);

const nameParam = z.string().optional()
  .describe('Optional name for the volume (letters, digits, hyphens, underscores only)');

const volumeParam = z.string().describe('ID of the volume');

const sampleValue = z.union([z.number().finite(), z.boolean()]);

const scalarRows = z.array(z.array(z.number().finite()));
const occupancyRows = z.array(z.array(z.boolean()));

function parseRows<T>(schema: z.ZodType<T>, rows: unknown, entry: registry.VolumeEntry): T {
  const parsed = schema.safeParse(rows);
  if (!parsed.success) {
    throw new Error(
      `Volume "${entry.id}" holds ${entry.kind} samples; every row entry must be a ${entry.kind === 'scalar' ? 'number' : 'boolean'}.`
    );
  }
  return parsed.data;
}

/** Write a layer of rows into a volume of either kind; returns samples written. */
function writeLayer(volumeId: string, rows: unknown, layer: number): number {
  const entry = registry.get(volumeId);
  const written = entry.kind === 'scalar'
    ? entry.builder.setLayer(layer, parseRows(scalarRows, rows, entry))
    : entry.builder.setLayer(layer, parseRows(occupancyRows, rows, entry));
  registry.touch(volumeId);
  return written;
}

function text(result: unknown) {
  return { content: [{ type: 'text' as const, text: JSON.stringify(result) }] };
}

export function registerTools(server: McpServer, config: ServerConfig): void {

  function checkSize(dims: VolumeDims): void {
    const cells = dims.width * dims.height * dims.depth;
    if (cells > config.maxCells) {
      throw new Error(
        `Volume of ${dims.width}×${dims.height}×${dims.depth} = ${cells} samples exceeds the limit of ${config.maxCells}. ` +
        'Use fewer samples and a larger cell_size.'
      );
    }
  }

  // ─── Volumes (4) ─────────────────────────────────────────────

  server.tool(
    'create_scalar_volume',
    'Create a scalar volume of width × height × depth samples, for isosurface extraction. Either fill it with one value or pass every sample as values[x][y][z].',
    {
      width: dimension('X'),
      height: dimension('Y'),
      depth: dimension('Z'),
      fill: z.number().finite().default(0).describe('Initial value of every sample'),
      values: z.array(z.array(z.array(z.number().finite()))).optional()
        .describe('Samples indexed [x][y][z]; must match width, height and depth exactly'),
      name: nameParam,
    },
    async ({ width, height, depth, fill, values, name }) => {
      const dims = { width, height, depth };
      checkSize(dims);
      const builder = new VolumeBuilder<number>(dims, fill);
      if (values) {
        const fits = values.length === width
          && values.every((plane) => plane.length === height && plane.every((row) => row.length === depth));
        if (!fits) {
          throw new Error(`values must be nested [x][y][z] arrays of exactly ${width}×${height}×${depth} numbers.`);
        }
        for (let x = 0; x < width; x++) {
          for (let y = 0; y < height; y++) {
            for (let zi = 0; zi < depth; zi++) builder.set(x, y, zi, values[x][y][zi]);
          }
        }
      }
      return text(registry.create({ kind: 'scalar', builder }, name));
    }
  );

  server.tool(
    'create_occupancy_volume',
    'Create an occupancy volume of width × height × depth voxels, each solid (true) or empty (false), for boundary-face extraction.',
    {
      width: dimension('X'),
      height: dimension('Y'),
      depth: dimension('Z'),
      fill: z.boolean().default(false).describe('Initial state of every voxel'),
      name: nameParam,
    },
    async ({ width, height, depth, fill, name }) => {
      const dims = { width, height, depth };
      checkSize(dims);
      const builder = new VolumeBuilder<boolean>(dims, fill);
      return text(registry.create({ kind: 'occupancy', builder }, name));
    }
  );

  server.tool(
    'create_sphere_volume',
    'Create a cubic volume of size³ samples holding a ball centred in the grid. Scalar volumes store radius minus distance (positive inside, so level 0 is the sphere); occupancy volumes mark samples within the radius.',
    {
      kind: z.enum(['scalar', 'occupancy']).default('scalar').describe('Sample type'),
      size: z.number().int().min(2).describe('Samples along each axis'),
      radius: z.number().positive().describe('Ball radius in samples'),
      name: nameParam,
    },
    async ({ kind, size, radius, name }) => {
      const dims = { width: size, height: size, depth: size };
      checkSize(dims);
      const c = (size - 1) / 2;
      const distance = (x: number, y: number, zi: number) => Math.hypot(x - c, y - c, zi - c);
      if (kind === 'scalar') {
        const builder = new VolumeBuilder<number>(dims, 0);
        for (let x = 0; x < size; x++) {
          for (let y = 0; y < size; y++) {
            for (let zi = 0; zi < size; zi++) builder.set(x, y, zi, radius - distance(x, y, zi));
          }
        }
        return text(registry.create({ kind, builder }, name));
      }
      const builder = new VolumeBuilder<boolean>(dims, false);
      for (let x = 0; x < size; x++) {
        for (let y = 0; y < size; y++) {
          for (let zi = 0; zi < size; zi++) builder.set(x, y, zi, distance(x, y, zi) <= radius);
        }
      }
      return text(registry.create({ kind, builder }, name));
    }
  );

  server.tool(
    'get_volume',
    'Get the readback (dimensions, sample range or occupied count, layer cursor, mesh state) for a volume.',
    {
      volume: volumeParam,
    },
    async ({ volume }) => text(registry.describe(volume))
  );

  // ─── Editing (3) ─────────────────────────────────────────────

  server.tool(
    'set_voxels',
    'Write individual samples. Numbers go into scalar volumes, booleans into occupancy volumes. Writes outside the grid are skipped and counted. Invalidates any computed mesh.',
    {
      volume: volumeParam,
      voxels: z.array(z.object({
        x: z.number().int(),
        y: z.number().int(),
        z: z.number().int(),
        value: sampleValue,
      })).min(1).max(100000).describe('Samples to write'),
    },
    async ({ volume, voxels }) => {
      const entry = registry.get(volume);
      let written = 0;
      for (const voxel of voxels) {
        let ok: boolean;
        if (entry.kind === 'scalar') {
          if (typeof voxel.value !== 'number') {
            throw new Error(`Volume "${volume}" is scalar; got ${voxel.value} at (${voxel.x}, ${voxel.y}, ${voxel.z}).`);
          }
          ok = entry.builder.set(voxel.x, voxel.y, voxel.z, voxel.value);
        } else {
          if (typeof voxel.value !== 'boolean') {
            throw new Error(`Volume "${volume}" holds occupancy; got ${voxel.value} at (${voxel.x}, ${voxel.y}, ${voxel.z}).`);
          }
          ok = entry.builder.set(voxel.x, voxel.y, voxel.z, voxel.value);
        }
        if (ok) written++;
      }
      registry.touch(volume);
      return text({ ...registry.describe(volume), written, skipped: voxels.length - written });
    }
  );

  server.tool(
    'set_layer',
    'Overwrite one z layer from rows indexed [x][y]. z must lie within the volume\'s depth; rows and columns past the grid are skipped. Invalidates any computed mesh.',
    {
      volume: volumeParam,
      z: z.number().int().min(0).describe('Layer index along Z'),
      rows: z.array(z.array(sampleValue)).describe('Layer samples indexed [x][y]'),
    },
    async ({ volume, z: layer, rows }) => {
      const { depth } = registry.get(volume).builder.dims;
      if (layer >= depth) {
        throw new Error(
          `Layer ${layer} is outside volume "${volume}": it has ${depth} layers (z = 0..${depth - 1}).`
        );
      }
      const written = writeLayer(volume, rows, layer);
      return text({ ...registry.describe(volume), layer, written });
    }
  );

  server.tool(
    'append_layer',
    'Write rows indexed [x][y] into the layer at the volume\'s layer cursor, then advance the cursor. Starts at z = 0; fails once every layer is written.',
    {
      volume: volumeParam,
      rows: z.array(z.array(sampleValue)).describe('Layer samples indexed [x][y]'),
      restart: z.boolean().default(false).describe('Move the cursor back to z = 0 first'),
    },
    async ({ volume, rows, restart }) => {
      const { builder } = registry.get(volume);
      if (restart) builder.resetLayer();
      const layer = builder.currentLayer;
      if (layer >= builder.dims.depth) {
        throw new Error(
          `Volume "${volume}" is full: all ${builder.dims.depth} layers are written. Pass restart: true to start again at z = 0.`
        );
      }
      const written = writeLayer(volume, rows, layer);
      builder.nextLayer();
      return text({ ...registry.describe(volume), layer, written });
    }
  );

  // ─── Extraction (3) ──────────────────────────────────────────

  server.tool(
    'compute_isosurface',
    'Extract the closed level surface of a scalar volume (marching cubes, capped on the 6 outer faces). The region above level is the solid. Must be called before export_mesh.',
    {
      volume: volumeParam,
      level: z.number().finite().default(0).describe('Iso level'),
      cell_size: z.number().positive().finite().default(1).describe('Distance between samples in output units'),
    },
    async ({ volume, level, cell_size }) => {
      const builder = registry.getScalar(volume, 'compute_isosurface');
      const start = Date.now();
      const mesh = isosurfaceMesh(builder.build(), cell_size, level);
      const elapsed = Date.now() - start;
      registry.cacheMesh(volume, { mesh, method: 'isosurface', cell_size, level });
      return text({
        volume_id: volume,
        type: 'mesh',
        mesh_info: {
          method: 'isosurface',
          kind: mesh.kind,
          vertex_count: mesh.vertices.length,
          face_count: mesh.faceCount,
          triangle_count: mesh.triangleCount,
          level,
          cell_size,
          computed_in_ms: elapsed,
          bounds: mesh.bounds,
        },
      });
    }
  );

  server.tool(
    'compute_boundary_faces',
    'Extract the blocky quad surface of an occupancy volume: one square face wherever a solid voxel meets an empty one or the edge of the grid. Must be called before export_mesh.',
    {
      volume: volumeParam,
      cell_size: z.number().positive().finite().default(1).describe('Voxel edge length in output units'),
    },
    async ({ volume, cell_size }) => {
      const builder = registry.getOccupancy(volume, 'compute_boundary_faces');
      const start = Date.now();
      const mesh = boundaryMesh(builder.build(), cell_size);
      const elapsed = Date.now() - start;
      registry.cacheMesh(volume, { mesh, method: 'boundary_faces', cell_size });
      return text({
        volume_id: volume,
        type: 'mesh',
        mesh_info: {
          method: 'boundary_faces',
          kind: mesh.kind,
          vertex_count: mesh.vertices.length,
          face_count: mesh.faceCount,
          triangle_count: mesh.triangleCount,
          cell_size,
          computed_in_ms: elapsed,
          bounds: mesh.bounds,
        },
      });
    }
  );

  server.tool(
    'slice_contours',
    'Trace the level contours of one plane of a scalar volume (marching squares). Points are in the plane\'s (u, v) coordinates: the two other axes in x, y, z order, scaled by cell_size.',
    {
      volume: volumeParam,
      axis: z.enum(['x', 'y', 'z']).describe('Axis the slice is perpendicular to'),
      index: z.number().int().min(0).describe('Sample index along that axis'),
      level: z.number().finite().default(0).describe('Iso level'),
      cell_size: z.number().positive().finite().default(1).describe('Distance between samples in output units'),
    },
    async ({ volume, axis, index, level, cell_size }) => {
      const builder = registry.getScalar(volume, 'slice_contours');
      const grid = volumeSlice(builder.build(), axis, index);
      const loops = extractContours(grid, level, cell_size);
      return text({
        volume_id: volume,
        type: 'contours',
        slice: { axis, index, level },
        loop_count: loops.length,
        loops: loops.map((loop) => ({
          closed: loop.closed,
          point_count: loop.points.length,
          points: loop.points,
        })),
      });
    }
  );

  // ─── Mesh Export (1) ──────────────────────────────────────────

  server.tool(
    'export_mesh',
    'Export the computed mesh of a volume as a binary STL file. Call compute_isosurface or compute_boundary_faces first — it will throw if no mesh exists.',
    {
      volume: volumeParam,
      normals: z.enum(['exact', 'legacy']).default('exact')
        .describe('Facet normals: exact unit normals, or the legacy layout some older voxel tools wrote'),
      header: z.string().max(80).optional().describe('Text for the 80-byte STL header'),
    },
    async ({ volume, normals, header }) => {
      const entry = registry.get(volume);
      const cached = registry.getMesh(entry.id);
      if (!cached) {
        throw new Error(
          `No mesh computed for "${entry.id}". Call ${entry.kind === 'scalar' ? 'compute_isosurface' : 'compute_boundary_faces'}(volume: "${entry.id}") first.`
        );
      }
      if (cached.mesh.faceCount === 0) {
        throw new Error(
          `Mesh for "${entry.id}" is empty. ${cached.method === 'isosurface' ? `No sample crosses level ${cached.level}.` : 'No voxel is occupied.'}`
        );
      }

      await fs.mkdir(config.exportDir, { recursive: true });
      const safeId = entry.id.replace(/[^a-zA-Z0-9_-]/g, '_');
      const filePath = path.join(config.exportDir, `${safeId}-${Date.now()}.stl`);
      const saved = await saveSTL(cached.mesh, filePath, { normals, header });

      return text({
        volume_id: entry.id,
        type: 'stl_export',
        file_path: saved.filePath,
        file_size_bytes: saved.byteLength,
        triangle_count: saved.triangleCount,
        normals,
        bounds: cached.mesh.bounds,
      });
    }
  );

  // ─── Session (2) ─────────────────────────────────────────────

  server.tool(
    'list_volumes',
    'List all volumes in the registry with their kind and readback.',
    {},
    async () => {
      const volumes = registry.list();
      return text({ count: volumes.length, volumes });
    }
  );

  server.tool(
    'delete_volume',
    'Remove a volume and its computed mesh from the registry.',
    {
      volume: volumeParam,
    },
    async ({ volume }) => {
      registry.remove(volume);
      return text({ deleted: volume, remaining: registry.list().length });
    }
  );
}
