/**
 * @fileoverview Error taxonomy shared by the decoding and connection layers.
 * @module age-graph-bridge/utils/errors
 *
 * Every failure surfaced by this package is a {@link GraphBridgeError}. The
 * subclass tells a caller whether it is looking at a data-integrity problem
 * with an upstream query (`DecodeError`, `SchemaMismatchError`) or at a
 * configuration/connectivity problem (`ValidationError`, `ResourceError`).
 */

export enum GraphBridgeErrorCode {
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  DECODE_ERROR = 'DECODE_ERROR',
  SCHEMA_MISMATCH = 'SCHEMA_MISMATCH',
  RESOURCE_ERROR = 'RESOURCE_ERROR',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

export type GraphBridgeErrorDetails = Record<string, unknown> | undefined;

export class GraphBridgeError extends Error {
  public readonly code: GraphBridgeErrorCode;
  public readonly details?: GraphBridgeErrorDetails;
  public readonly component?: string;
  public readonly timestamp: string;

  constructor(
    message: string,
    code: GraphBridgeErrorCode,
    details?: GraphBridgeErrorDetails,
    component?: string,
    cause?: unknown,
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'GraphBridgeError';
    this.code = code;
    this.details = details;
    this.component = component;
    this.timestamp = new Date().toISOString();
    Object.setPrototypeOf(this, new.target.prototype);
  }

  toPlainObject(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      details: this.details,
      component: this.component,
      timestamp: this.timestamp,
      cause: this.cause instanceof Error ? this.cause.message : this.cause,
    };
  }

  toJSON(): Record<string, unknown> {
    return this.toPlainObject();
  }

  static isGraphBridgeError(error: unknown): error is GraphBridgeError {
    return error instanceof GraphBridgeError;
  }

  /**
   * Returns `error` untouched when it already belongs to the taxonomy,
   * otherwise wraps it under `code` with the original kept as `cause`.
   */
  static wrap(
    error: unknown,
    code: GraphBridgeErrorCode,
    message?: string,
    component?: string,
  ): GraphBridgeError {
    if (GraphBridgeError.isGraphBridgeError(error)) return error;
    const baseMessage = error instanceof Error ? error.message : String(error);
    return new GraphBridgeError(
      message ? `${message}: ${baseMessage}` : baseMessage,
      code,
      undefined,
      component,
      error,
    );
  }
}

export class ValidationError extends GraphBridgeError {
  constructor(message: string, details?: GraphBridgeErrorDetails, component?: string) {
    super(message, GraphBridgeErrorCode.VALIDATION_ERROR, details, component);
    this.name = 'ValidationError';
  }
}

export class DecodeError extends GraphBridgeError {
  /** The text that failed to decode. */
  public readonly text: string;

  constructor(message: string, text: string, cause?: unknown) {
    super(message, GraphBridgeErrorCode.DECODE_ERROR, { text }, 'AgtypeDecoder', cause);
    this.name = 'DecodeError';
    this.text = text;
  }
}

export class SchemaMismatchError extends GraphBridgeError {
  /** Offending key, or null when the value's overall shape is wrong. */
  public readonly key: string | null;

  constructor(message: string, key: string | null, details?: GraphBridgeErrorDetails) {
    super(message, GraphBridgeErrorCode.SCHEMA_MISMATCH, { key, ...details }, 'GraphRecord');
    this.name = 'SchemaMismatchError';
    this.key = key;
  }
}

export class ResourceError extends GraphBridgeError {
  constructor(message: string, cause?: unknown, details?: GraphBridgeErrorDetails, component?: string) {
    super(message, GraphBridgeErrorCode.RESOURCE_ERROR, details, component, cause);
    this.name = 'ResourceError';
  }

  static from(error: unknown, message: string, component?: string): ResourceError {
    if (error instanceof ResourceError) return error;
    const reason = error instanceof Error ? error.message : String(error);
    return new ResourceError(`${message}: ${reason}`, error, undefined, component);
  }
}

/** Normalizes a thrown value to an `Error` instance. */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
