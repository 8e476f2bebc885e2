/**
 * Raised when a mesh file cannot be written. The destination is left
 * untouched; `cause` carries the underlying error.
 */
export class MeshWriteError extends Error {
  /** Set when the temporary file could not be removed after the failure. */
  cleanupError?: unknown;

  constructor(
    readonly filePath: string,
    cause: unknown,
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to write mesh to "${filePath}": ${reason}`, { cause });
    this.name = 'MeshWriteError';
  }
}
