export type AllpairErrorCode =
  | 'CONFIGURATION'
  | 'SCHEDULE_GENERATION'
  | 'INVALID_INPUT'
  | 'JOB_LAUNCH'
  | 'JOB_TIMEOUT'
  | 'JOB_FAILURE';

export class AllpairError extends Error {
  readonly code: AllpairErrorCode;

  constructor(code: AllpairErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Unreadable node source, bad option value, missing workload. Fatal. */
export class ConfigurationError extends AllpairError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CONFIGURATION', message, options);
  }
}

/** Fatal: the schedule could not be built. */
export class ScheduleGenerationError extends AllpairError {
  constructor(message: string, code: AllpairErrorCode = 'SCHEDULE_GENERATION') {
    super(code, message);
  }
}

export class InvalidInputError extends ScheduleGenerationError {
  constructor(message: string) {
    super(message, 'INVALID_INPUT');
  }
}

/** A pair that cannot be turned into a job. Local to its round. */
export class JobLaunchError extends AllpairError {
  constructor(
    message: string,
    readonly roundIndex: number,
    readonly rawPair: readonly unknown[]
  ) {
    super('JOB_LAUNCH', message);
  }
}

export class JobTimeoutError extends AllpairError {
  constructor(
    readonly logPath: string,
    readonly timeoutMs: number
  ) {
    super('JOB_TIMEOUT', `job exceeded ${timeoutMs}ms: ${logPath}`);
  }
}

export class JobFailureError extends AllpairError {
  constructor(
    readonly logPath: string,
    readonly exitCode: number | null,
    readonly signal: NodeJS.Signals | null
  ) {
    super(
      'JOB_FAILURE',
      signal ? `job terminated by ${signal}: ${logPath}` : `job exited with code ${exitCode}: ${logPath}`
    );
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
