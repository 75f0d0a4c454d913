/**
 * Application error types
 *
 * Every error raised on purpose carries an HTTP status and a stable code so
 * the global error handler can answer without inspecting messages.
 */

export class AppError extends Error {
  readonly statusCode: number;
  readonly code: string;

  constructor(message: string, statusCode = 500, code = 'INTERNAL_ERROR') {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.code = code;
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, 400, 'VALIDATION_ERROR');
  }
}

/**
 * Raised by a converter when a file cannot be turned into Markdown.
 * `details` carries the tool output (stderr) when there is any.
 */
export class ConversionError extends AppError {
  readonly details?: string;

  constructor(message: string, details?: string) {
    super(message, 500, 'CONVERSION_ERROR');
    this.details = details;
  }
}

export class ConversionTimeoutError extends AppError {
  readonly timeoutSeconds: number;

  constructor(timeoutSeconds: number) {
    super(`Conversion timed out after ${timeoutSeconds}s`, 504, 'CONVERSION_TIMEOUT');
    this.timeoutSeconds = timeoutSeconds;
  }
}

/**
 * A status transition was attempted for a path that is not registered.
 * Only happens when the store was cleared while the job was queued or running.
 */
export class UnknownJobError extends AppError {
  readonly filePath: string;

  constructor(filePath: string) {
    super(`Unknown job: ${filePath}`, 500, 'UNKNOWN_JOB');
    this.filePath = filePath;
  }
}

/**
 * Human-readable text for a job status message
 */
export function describeError(error: unknown): string {
  if (error instanceof ConversionError && error.details) {
    return `${error.message}: ${error.details}`;
  }
  if (error instanceof Error) {
    return error.message || error.name;
  }
  return String(error);
}
