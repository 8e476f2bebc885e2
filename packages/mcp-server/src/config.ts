/**
 * Server configuration, read once from the environment at startup.
 *
 *   VOXMESH_EXPORT_DIR  where export_mesh writes STL files (default: <tmpdir>/voxmesh)
 *   VOXMESH_MAX_CELLS   largest volume a tool may allocate (default: 256³)
 */

import * as os from 'node:os';
import * as path from 'node:path';
import { z } from 'zod';

const EnvSchema = z.object({
  VOXMESH_EXPORT_DIR: z.string().min(1).optional(),
  VOXMESH_MAX_CELLS: z.coerce.number().int().positive().default(256 ** 3),
});

export interface ServerConfig {
  exportDir: string;
  maxCells: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid server configuration: ${issues}`);
  }
  return {
    exportDir: parsed.data.VOXMESH_EXPORT_DIR ?? path.join(os.tmpdir(), 'voxmesh'),
    maxCells: parsed.data.VOXMESH_MAX_CELLS,
  };
}
