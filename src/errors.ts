/**
 * Structured error classes for the channels client.
 */

/**
 * Error codes used throughout the library.
 */
export const ErrorCode = {
  INVALID_PAYLOAD: 'INVALID_PAYLOAD',
  NOT_CONNECTED: 'NOT_CONNECTED',
  TIMEOUT: 'TIMEOUT',
  DECODE_FAILED: 'DECODE_FAILED',
  VALIDATION_FAILED: 'VALIDATION_FAILED',
} as const;

/**
 * Type representing valid error codes.
 */
export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];

/**
 * Base error class with code property.
 */
abstract class BaseError extends Error {
  abstract readonly code: ErrorCodeType;

  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace?.(this, this.constructor);
  }
}

/**
 * The payload of a push could not be serialized to the wire format.
 */
export class InvalidPayloadError extends BaseError {
  readonly code = 'INVALID_PAYLOAD' as const;

  constructor(message = 'Invalid payload request.') {
    super(message);
  }
}

/**
 * A push was sent while the transport was not connected.
 */
export class NotConnectedError extends BaseError {
  readonly code = 'NOT_CONNECTED' as const;

  constructor(message = 'Not connected to socket.') {
    super(message);
  }
}

/**
 * No reply arrived before the push deadline.
 */
export class TimeoutError extends BaseError {
  readonly code = 'TIMEOUT' as const;

  constructor(message = 'Push timed out.') {
    super(message);
  }
}

/**
 * An inbound frame did not have the wire shape.
 */
export class DecodeError extends BaseError {
  readonly code = 'DECODE_FAILED' as const;

  constructor(message: string) {
    super(`Could not decode frame: ${message}`);
  }
}

/**
 * Thrown when schema validation fails.
 */
export class ValidationError extends BaseError {
  readonly code = 'VALIDATION_FAILED' as const;

  constructor(message: string) {
    super(`Validation failed! ${message}`);
  }
}

/**
 * Errors a push can be resolved with locally, without a server reply.
 */
export type PushError = InvalidPayloadError | NotConnectedError | TimeoutError;

/**
 * Type guard for errors with a code property.
 */
export function hasErrorCode(err: unknown): err is Error & { code: string } {
  return err instanceof Error && 'code' in err && typeof err.code === 'string';
}

/**
 * Extract error code safely, returning undefined if not present.
 */
export function getErrorCode(err: unknown): string | undefined {
  if (hasErrorCode(err)) {
    return err.code;
  }
  return undefined;
}
