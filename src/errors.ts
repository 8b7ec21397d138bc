export enum ErrorCode {
  CONFIGURATION = 'CONFIGURATION',
  WORKER_COUNT_MISMATCH = 'WORKER_COUNT_MISMATCH',
  POOL_EXHAUSTED = 'POOL_EXHAUSTED',
  REMOTE_EXECUTION_FAILED = 'REMOTE_EXECUTION_FAILED',
  STORE_WRITE_FAILED = 'STORE_WRITE_FAILED',
  INVALID_RUN_STATE = 'INVALID_RUN_STATE'
}

export class LoadTestError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message?: string,
    options?: { cause?: unknown }
  ) {
    super(message || code, options);
    this.name = new.target.name;
  }
}

/** Fatal before any worker starts. */
export class ConfigurationError extends LoadTestError {
  constructor(message: string, code: ErrorCode = ErrorCode.CONFIGURATION) {
    super(code, message);
  }
}

export class WorkerCountMismatchError extends ConfigurationError {
  constructor(
    public readonly poolSize: number,
    public readonly expectedWorkerCount: number
  ) {
    super(
      `Device pool size (${poolSize}) does not match the expected worker count (${expectedWorkerCount}); ` +
        `pool mode needs exactly one worker per pooled device`,
      ErrorCode.WORKER_COUNT_MISMATCH
    );
  }
}

export class PoolExhaustedError extends LoadTestError {
  constructor(public readonly poolSize: number) {
    super(ErrorCode.POOL_EXHAUSTED, `All ${poolSize} pooled device identities are checked out`);
  }
}

export class RemoteExecutionFailure extends LoadTestError {
  constructor(message: string, cause?: unknown) {
    super(ErrorCode.REMOTE_EXECUTION_FAILED, message, { cause });
  }
}

export class StoreWriteError extends LoadTestError {
  constructor(message: string, cause?: unknown) {
    super(ErrorCode.STORE_WRITE_FAILED, message, { cause });
  }
}

export class InvalidRunStateError extends LoadTestError {
  constructor(operation: string, state: string) {
    super(ErrorCode.INVALID_RUN_STATE, `Cannot ${operation} while the run is ${state}`);
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
