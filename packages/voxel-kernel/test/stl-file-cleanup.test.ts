import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { saveSTL } from '../src/stl-file.js';
import { boundaryMesh } from '../src/mesh.js';
import { MeshWriteError } from '../src/errors.js';

vi.mock('node:fs/promises', async (importOriginal) => {
  const actual = await importOriginal<typeof import('node:fs/promises')>();
  return { ...actual, rm: vi.fn(actual.rm) };
});

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), 'voxmesh-stl-cleanup-'));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

describe('saveSTL cleanup', () => {
  it('keeps the write failure when removing the temporary file also fails', async () => {
    const cleanupFailure = new Error('temporary file is busy');
    vi.mocked(rm).mockRejectedValueOnce(cleanupFailure);
    const filePath = join(dir, 'missing', 'cube.stl');

    const err = await saveSTL(boundaryMesh([[[true]]], 1), filePath).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(MeshWriteError);
    if (!(err instanceof MeshWriteError)) return;
    expect(err.message).toMatch(/^Failed to write mesh to ".*cube\.stl": ENOENT/);
    expect(err.cleanupError).toBe(cleanupFailure);
  });

  it('leaves cleanupError unset when the temporary file is removed', async () => {
    const err = await saveSTL(boundaryMesh([[[true]]], 1), join(dir, 'missing', 'cube.stl'))
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(MeshWriteError);
    if (!(err instanceof MeshWriteError)) return;
    expect(err.cleanupError).toBeUndefined();
  });
});
