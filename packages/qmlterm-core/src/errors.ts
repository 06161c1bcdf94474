/**
 * Error types surfaced to callers. Malformed markup is never an error; only
 * failures to obtain input are.
 */

export class QmltermError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "QmltermError";
  }
}

/**
 * A markup document could not be read from disk
 */
export class MarkupReadError extends QmltermError {
  readonly path: string;

  constructor(path: string, cause?: unknown) {
    super(`Failed to open markup file: ${path}`, { cause });
    this.name = "MarkupReadError";
    this.path = path;
  }
}
