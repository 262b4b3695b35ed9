/**
 * Failures of a single job run.
 *
 * Each stage of the pipeline rejects with its own subclass so the orchestrator
 * can tell where a run stopped without inspecting driver-specific errors.
 */
export abstract class JobError extends Error {
  readonly cause: unknown;

  protected constructor(message: string, cause?: unknown) {
    super(cause === undefined ? message : `${message}: ${describeError(cause)}`);
    this.name = new.target.name;
    this.cause = cause;
  }
}

/**
 * A credential artifact could not be fetched from storage or written to disk.
 */
export class FetchError extends JobError {
  constructor(
    readonly blobName: string,
    cause?: unknown,
  ) {
    super(`Failed to provision ${blobName}`, cause);
  }
}

/**
 * The database session could not be established.
 */
export class ConnectError extends JobError {
  constructor(
    readonly dsn: string,
    cause?: unknown,
  ) {
    super(`Failed to connect to ${dsn}`, cause);
  }
}

/**
 * The batch insert or its commit failed; the batch was rolled back.
 */
export class InsertError extends JobError {
  constructor(
    readonly rowCount: number,
    cause?: unknown,
  ) {
    super(`Failed to insert batch of ${rowCount} rows`, cause);
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
