/**
 * Error types shared by the indexer and the metadata stripper.
 *
 * Configuration errors are fatal for a run. Image processing errors are
 * scoped to one file and travel inside a per-file result instead of being
 * thrown past the batch loop.
 */

export class ConfigurationError extends Error {
  public readonly exitCode = 1;

  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Pipeline stage a per-file failure happened in
 */
export type ProcessingStage = 'read' | 'inspect' | 'encode' | 'backup' | 'write';

export class ImageProcessingError extends Error {
  constructor(
    public readonly path: string,
    public readonly stage: ProcessingStage,
    cause: unknown
  ) {
    super(describeCause(cause), { cause });
    this.name = 'ImageProcessingError';
  }
}

export function describeCause(cause: unknown): string {
  if (cause instanceof Error) {
    return cause.message;
  }
  return String(cause);
}

/**
 * Narrow an unknown rejection to a Node.js system error with a code
 */
export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
