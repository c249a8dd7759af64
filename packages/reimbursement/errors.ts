// Error taxonomy for the index, retrieval and conversation layers.
// Every error leaves the state it was raised from exactly as it was before the call.

/**
 * A write to the vector index was rejected: dimension mismatch, duplicate id,
 * an invalid record, or a storage failure during persist.
 */
export class IndexWriteError extends Error {
  constructor(
    message: string,
    public readonly recordId?: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'IndexWriteError';
  }
}

/** Caller supplied a filter key the retrieval engine does not know, or a malformed value. */
export class InvalidFilterError extends Error {
  constructor(
    message: string,
    public readonly issues: readonly string[] = [],
  ) {
    super(message);
    this.name = 'InvalidFilterError';
  }
}

/** The session id is unknown or has expired. Call getOrCreateSession first. */
export class SessionNotFoundError extends Error {
  constructor(public readonly sessionId: string) {
    super(`Session "${sessionId}" not found or expired`);
    this.name = 'SessionNotFoundError';
  }
}

/**
 * The embedding provider threw, or produced a vector that cannot be
 * normalized (empty, all zeros, NaN/Infinity components).
 */
export class EmbeddingFailure extends Error {
  constructor(
    message: string,
    public readonly l2Norm?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'EmbeddingFailure';
  }
}

/** The on-disk snapshot exists but its artifacts disagree with each other or with the index. */
export class SnapshotLoadError extends Error {
  constructor(
    message: string,
    public readonly snapshotDir: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'SnapshotLoadError';
  }
}

/** The language model collaborator is not configured or its SDK could not be loaded. */
export class LlmUnavailableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'LlmUnavailableError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
