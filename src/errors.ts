/**
 * Structured error classes for the serial transport.
 */

/**
 * Error codes used throughout the library.
 */
export const ErrorCode = {
  VALIDATION_FAILED: 'VALIDATION_FAILED',
  PEER_CLOSED: 'PEER_CLOSED',
  NOT_CLOSED: 'NOT_CLOSED',
  INVARIANT_VIOLATION: 'INVARIANT_VIOLATION',
  NO_DEVICE: 'NO_DEVICE',
  DEVICE_ERROR: 'DEVICE_ERROR',
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

  toJSON() {
    return {
      message: this.message,
      name: this.name,
      code: this.code,
      stack: this.stack,
    };
  }
}

/**
 * Thrown when connection options fail schema validation.
 */
export class ValidationError extends BaseError {
  readonly code = 'VALIDATION_FAILED' as const;

  constructor(message: string) {
    super(`Validation failed! ${message}`);
  }
}

/**
 * Passed to `connectionLost` when the device signals end-of-stream.
 */
export class PeerClosedError extends BaseError {
  readonly code = 'PEER_CLOSED' as const;

  constructor(message = 'Other side has closed') {
    super(message);
  }
}

/**
 * Passed to `connectionLost` when a transport is disposed without being closed.
 */
export class TransportNotClosedError extends BaseError {
  readonly code = 'NOT_CLOSED' as const;

  constructor(message = 'Transport was not closed!') {
    super(message);
  }
}

/**
 * Internal invariant violated by the caller (e.g. consumer read after shutdown).
 */
export class InvariantError extends BaseError {
  readonly code = 'INVARIANT_VIOLATION' as const;
}

/**
 * Thrown when a connection is requested before a device was configured.
 */
export class NoDeviceError extends BaseError {
  readonly code = 'NO_DEVICE' as const;

  constructor(message = 'No serial device configured') {
    super(message);
  }
}

/**
 * Device misbehaviour detected by the adapter itself.
 */
export class DeviceError extends BaseError {
  readonly code = 'DEVICE_ERROR' as const;
}

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

/**
 * Normalize a thrown value into an Error.
 */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
