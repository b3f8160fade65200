/**
 * Error types shared by every dictation component
 */

export type DictationErrorType =
  | 'config_error'
  | 'connection_error'
  | 'auth_error'
  | 'transcriber_error'
  | 'microphone_error'
  | 'injection_error';

export class DictationError extends Error {
  public readonly type: DictationErrorType;
  public readonly originalError?: Error;
  public readonly timestamp: number;

  constructor(message: string, type: DictationErrorType, originalError?: Error) {
    super(message);
    this.name = 'DictationError';
    this.type = type;
    this.originalError = originalError;
    this.timestamp = Date.now();
  }
}

export function isDictationError(error: unknown): error is DictationError {
  return error instanceof DictationError;
}

/**
 * Wraps anything thrown into a DictationError, keeping an existing one as-is.
 */
export function toDictationError(
  error: unknown,
  type: DictationErrorType,
  context?: string,
): DictationError {
  if (error instanceof DictationError) return error;

  const original = error instanceof Error ? error : undefined;
  const detail = original ? original.message : String(error);
  const message = context ? `${context}: ${detail}` : detail;
  return new DictationError(message, type, original);
}
