import { describe, it, expect } from 'vitest';
import * as os from 'node:os';
import * as path from 'node:path';
import { loadConfig } from '../src/config.js';

describe('loadConfig', () => {
  it('defaults to a voxmesh directory under the system temp dir', () => {
    expect(loadConfig({})).toEqual({
      exportDir: path.join(os.tmpdir(), 'voxmesh'),
      maxCells: 256 ** 3,
    });
  });

  it('reads both settings from the environment', () => {
    expect(loadConfig({ VOXMESH_EXPORT_DIR: '/srv/meshes', VOXMESH_MAX_CELLS: '4096' })).toEqual({
      exportDir: '/srv/meshes',
      maxCells: 4096,
    });
  });

  it('rejects a cell limit that is not a positive integer', () => {
    expect(() => loadConfig({ VOXMESH_MAX_CELLS: 'lots' })).toThrow(/^Invalid server configuration: VOXMESH_MAX_CELLS: /);
    expect(() => loadConfig({ VOXMESH_MAX_CELLS: '-5' })).toThrow(/VOXMESH_MAX_CELLS/);
  });
});
