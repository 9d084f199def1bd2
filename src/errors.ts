/**
 * Error taxonomy for the stamping CLI.
 *
 * Path and parameter errors are surfaced as prompt validation messages,
 * per-image errors are tallied by the batch runner, and cancellation ends the run.
 * A photo without a capture date is not an error at all (see exifDate.ts).
 */

export type WatermarkErrorCode =
  | 'INVALID_PATH'
  | 'INVALID_PARAMETER'
  | 'IMAGE_DECODE'
  | 'USER_CANCELLED';

export class WatermarkError extends Error {
  public readonly code: WatermarkErrorCode;

  public override readonly cause?: Error;

  constructor(message: string, code: WatermarkErrorCode, cause?: Error) {
    super(message);
    this.name = 'WatermarkError';
    this.code = code;
    this.cause = cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/** Path does not exist, or is neither a regular file nor a directory. */
export class InvalidPathError extends WatermarkError {
  public readonly path: string;

  constructor(path: string, reason: string) {
    super(`Invalid path "${path}": ${reason}`, 'INVALID_PATH');
    this.name = 'InvalidPathError';
    this.path = path;
  }
}

export class InvalidParameterError extends WatermarkError {
  public readonly parameter: 'fontSize' | 'color' | 'position';

  constructor(parameter: 'fontSize' | 'color' | 'position', message: string) {
    super(message, 'INVALID_PARAMETER');
    this.name = 'InvalidParameterError';
    this.parameter = parameter;
  }
}

export class ImageDecodeError extends WatermarkError {
  constructor(file: string, cause?: Error) {
    super(`Could not decode image ${file}${cause ? `: ${cause.message}` : ''}`, 'IMAGE_DECODE', cause);
    this.name = 'ImageDecodeError';
  }
}

export class UserCancellationError extends WatermarkError {
  constructor() {
    super('Cancelled by user', 'USER_CANCELLED');
    this.name = 'UserCancellationError';
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

export function hasErrorCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}
