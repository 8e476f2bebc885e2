/**
 * Writing STL files.
 *
 * The bytes go to a temporary file beside the destination, which is
 * renamed into place only after a complete write and sync. A failed
 * write leaves the destination untouched; if the temporary file cannot
 * be removed either, that failure rides along on the MeshWriteError.
 */

import { open, rename, rm } from 'node:fs/promises';
import { MeshWriteError } from './errors.js';
import type { VoxelMesh } from './mesh.js';
import { exportSTL, type STLExportOptions } from './stl.js';

export interface SavedMesh {
  filePath: string;
  byteLength: number;
  triangleCount: number;
}

export async function saveSTL(
  mesh: VoxelMesh,
  filePath: string,
  options: STLExportOptions = {},
): Promise<SavedMesh> {
  const bytes = new Uint8Array(exportSTL(mesh, options));
  const tmpPath = `${filePath}.${process.pid}-${Date.now()}.tmp`;

  try {
    const handle = await open(tmpPath, 'wx');
    try {
      await handle.writeFile(bytes);
      await handle.sync();
    } finally {
      await handle.close();
    }
    await rename(tmpPath, filePath);
  } catch (err) {
    const error = new MeshWriteError(filePath, err);
    try {
      await rm(tmpPath, { force: true });
    } catch (cleanupErr) {
      error.cleanupError = cleanupErr;
    }
    throw error;
  }

  return { filePath, byteLength: bytes.byteLength, triangleCount: mesh.triangleCount };
}
