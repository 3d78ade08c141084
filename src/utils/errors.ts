import { EXIT_CODES } from '@/config/constants';

export class AppError extends Error {
  constructor(
    public exitCode: number,
    message: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = this.constructor.name;
  }
}

/**
 * Required flags were not supplied. Kept apart from a help request.
 */
export class UsageError extends AppError {
  constructor(
    message: string,
    public readonly missing: string[] = [],
  ) {
    super(EXIT_CODES.USAGE, message);
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super(EXIT_CODES.FAILURE, message);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(EXIT_CODES.FAILURE, message);
  }
}

export class ConflictError extends AppError {
  constructor(message: string) {
    super(EXIT_CODES.FAILURE, message);
  }
}

/**
 * An external program (ffmpeg, ffprobe or an upscaling engine) failed.
 */
export class ExternalToolError extends AppError {
  constructor(
    public readonly tool: string,
    message: string,
    options?: ErrorOptions,
  ) {
    super(EXIT_CODES.FAILURE, `${tool}: ${message}`, options);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
