/** Remote source that failed to answer in time or with a success response. */
export type RemoteSource = "profile_directory" | "summary_api" | "analysis_api" | "upload_store" | "telegram";

export class RemoteUnavailableError extends Error {
  readonly source: RemoteSource;

  constructor(source: RemoteSource, message: string, options?: { cause?: unknown }) {
    super(`${source}: ${message}`, options);
    this.name = "RemoteUnavailableError";
    this.source = source;
  }
}

/**
 * Both the primary registration API and the direct store insert failed.
 * The draft that produced the payload must be discarded by the caller.
 */
export class PersistenceFailure extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PersistenceFailure";
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : "Unknown error";
}
