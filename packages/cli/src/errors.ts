/**
 * Command Errors
 *
 * Every failure a command can end with carries the exit code the CLI
 * should terminate with.
 */

export const ExitCode = {
  Success: 0,
  Failure: 1,
  Aborted: 2,
} as const;

export type ExitCodeValue = (typeof ExitCode)[keyof typeof ExitCode];

export class CommandError extends Error {
  constructor(
    message: string,
    public readonly exitCode: ExitCodeValue = ExitCode.Failure
  ) {
    super(message);
    this.name = 'CommandError';
  }
}

/**
 * A value given on the command line or at a prompt is missing or not one
 * of the accepted choices.
 */
export class InvalidInputError extends CommandError {
  constructor(
    message: string,
    public readonly parameter: string,
    public readonly value: string | null = null,
    public readonly allowed: readonly string[] = []
  ) {
    super(message);
    this.name = 'InvalidInputError';
  }

  static notAllowed(parameter: string, value: string, allowed: readonly string[]): InvalidInputError {
    const choices = allowed.length > 0 ? allowed.join(', ') : 'none';
    return new InvalidInputError(
      `Invalid value "${value}" for ${parameter}. Allowed values: ${choices}`,
      parameter,
      value,
      allowed
    );
  }

  static missing(parameter: string): InvalidInputError {
    return new InvalidInputError(`Missing required value for ${parameter}`, parameter);
  }
}

export class UserAbortedError extends CommandError {
  constructor(message = 'Command aborted by user.') {
    super(message, ExitCode.Aborted);
    this.name = 'UserAbortedError';
  }
}

export class RemoteFailureError extends CommandError {
  constructor(
    message: string,
    public readonly status?: number,
    public readonly code?: string
  ) {
    super(message);
    this.name = 'RemoteFailureError';
  }
}

export class OutputIOError extends CommandError {
  constructor(
    message: string,
    public readonly destination: string
  ) {
    super(message);
    this.name = 'OutputIOError';
  }
}

/**
 * Extract a printable message from anything thrown
 */
export function getErrorMessage(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
}
