export type LoadErrorReason = "not_found" | "unreadable" | "unparseable" | "missing_column";

/**
 * The projections file could not be turned into a table. Blocking for every
 * view that depends on it, but never fatal to the process.
 */
export class LoadError extends Error {
  readonly path: string;
  readonly reason: LoadErrorReason;

  constructor(path: string, reason: LoadErrorReason, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "LoadError";
    this.path = path;
    this.reason = reason;
  }
}

export function isLoadError(e: unknown): e is LoadError {
  return e instanceof LoadError;
}
