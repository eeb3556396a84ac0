import {
  BaseError,
  HttpRequestError,
  LimitExceededRpcError,
  ResourceUnavailableRpcError,
  RpcError,
  TimeoutError,
} from 'viem';

/**
 * Base error class for all collector errors
 * Provides structured error information with context and retry guidance
 */
export class SweepError extends Error {
  /**
   * Unique error code for categorization
   * Format: CATEGORY_SPECIFIC_ERROR (e.g., RPC_TRANSIENT, PRECONDITION_NO_DESTINATION)
   */
  readonly code: string;

  /**
   * Indicates if this error is transient and can be retried
   */
  readonly retriable: boolean;

  /**
   * Additional context for logging (account, window, asset)
   * Must not carry key material
   */
  readonly context: Record<string, unknown>;

  readonly timestamp: Date;

  constructor(
    message: string,
    code: string,
    retriable: boolean,
    context?: Record<string, unknown>,
    cause?: unknown
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = this.constructor.name;
    this.code = code;
    this.retriable = retriable;
    this.context = context ?? {};
    this.timestamp = new Date();

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Converts error to JSON for logging/serialization
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      retriable: this.retriable,
      context: ErrorUtils.sanitizeContext(this.context),
      timestamp: this.timestamp.toISOString(),
      cause:
        this.cause instanceof Error
          ? { name: this.cause.name, message: ErrorUtils.describe(this.cause) }
          : undefined,
    };
  }
}

/**
 * Rate-limited, overloaded or temporarily unavailable endpoint.
 * Retried with bounded backoff.
 */
export class TransientRpcError extends SweepError {
  readonly method: string;
  readonly endpoint: string;

  constructor(method: string, endpoint: string, cause?: unknown, context?: Record<string, unknown>) {
    super(
      `${method} temporarily unavailable: ${ErrorUtils.describe(cause)}`,
      'RPC_TRANSIENT',
      true,
      { method, endpoint, ...context },
      cause
    );
    this.method = method;
    this.endpoint = endpoint;
  }
}

/**
 * Malformed call, unsupported method or contract revert. Never retried.
 */
export class PermanentRpcError extends SweepError {
  readonly method: string;
  readonly endpoint: string;

  constructor(method: string, endpoint: string, cause?: unknown, context?: Record<string, unknown>) {
    super(
      `${method} failed: ${ErrorUtils.describe(cause)}`,
      'RPC_PERMANENT',
      false,
      { method, endpoint, ...context },
      cause
    );
    this.method = method;
    this.endpoint = endpoint;
  }
}

export type PreconditionCode =
  | 'NO_CREDENTIALS'
  | 'NO_DESTINATION'
  | 'NO_REACHABLE_ENDPOINT'
  | 'CHAIN_MISMATCH';

/**
 * Missing input that makes the run impossible. Halts before any
 * state-changing action.
 */
export class PreconditionError extends SweepError {
  readonly precondition: PreconditionCode;

  constructor(
    message: string,
    precondition: PreconditionCode,
    context?: Record<string, unknown>,
    cause?: unknown
  ) {
    super(message, `PRECONDITION_${precondition}`, false, context, cause);
    this.precondition = precondition;
  }

  static noCredentials(source?: string): PreconditionError {
    return new PreconditionError(
      'No usable private keys found',
      'NO_CREDENTIALS',
      source ? { source } : {}
    );
  }

  static noDestination(): PreconditionError {
    return new PreconditionError('Destination address is not configured', 'NO_DESTINATION');
  }

  static chainMismatch(expected: number, actual: number, endpoint: string): PreconditionError {
    return new PreconditionError(
      `Endpoint reports chain ${actual}, expected ${expected}`,
      'CHAIN_MISMATCH',
      { expected, actual, endpoint }
    );
  }
}

/**
 * Every candidate endpoint failed its liveness probe
 */
export class NoReachableEndpointError extends PreconditionError {
  readonly attempts: ReadonlyArray<{ url: string; error: string }>;

  constructor(attempts: ReadonlyArray<{ url: string; error: string }>) {
    super(
      attempts.length === 0
        ? 'No RPC endpoints configured'
        : `None of ${attempts.length} RPC endpoints answered`,
      'NO_REACHABLE_ENDPOINT',
      { endpoints: attempts.map((a) => a.url) }
    );
    this.attempts = attempts;
  }
}

export type DispatchStage = 'nonce' | 'build' | 'sign' | 'submit' | 'enumerate';

/**
 * Signing or submission was rejected for one transfer
 */
export class DispatchFailure extends SweepError {
  readonly stage: DispatchStage;

  constructor(stage: DispatchStage, context: Record<string, unknown>, cause?: unknown) {
    super(
      `${stage} failed: ${ErrorUtils.describe(cause)}`,
      `DISPATCH_${stage.toUpperCase()}_FAILED`,
      false,
      context,
      cause
    );
    this.stage = stage;
  }
}

/**
 * Inclusion was not observed in time. The transaction may still land.
 */
export class ConfirmationTimeout extends SweepError {
  readonly hash: string;
  readonly timeoutMs: number;

  constructor(hash: string, timeoutMs: number, context?: Record<string, unknown>) {
    super(
      `Transaction ${hash} not included after ${timeoutMs}ms`,
      'CONFIRMATION_TIMEOUT',
      false,
      { hash, timeoutMs, ...context }
    );
    this.hash = hash;
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Input validation error
 * Not retriable - indicates configuration or credential error
 */
export class ValidationError extends SweepError {
  readonly field: string;
  readonly expected: string;

  constructor(message: string, field: string, expected: string, context?: Record<string, unknown>) {
    super(message, `VALIDATION_${field.toUpperCase()}_INVALID`, false, context);
    this.field = field;
    this.expected = expected;
  }

  static invalidAddress(field: string, address: string): ValidationError {
    return new ValidationError(
      `Invalid address for ${field}: ${address}`,
      field,
      '0x-prefixed 40-character hex string',
      { received: address }
    );
  }

  static invalidParameter(field: string, expected: string, received: unknown): ValidationError {
    return new ValidationError(
      `Invalid ${field}: expected ${expected}, got ${String(received)}`,
      field,
      expected,
      { received: String(received) }
    );
  }

  /**
   * The key itself is never echoed back
   */
  static invalidPrivateKey(line: number): ValidationError {
    return new ValidationError(
      `Line ${line} is not a 32-byte hex private key`,
      'privateKey',
      '64 hex characters, optionally 0x-prefixed',
      { line }
    );
  }
}

const TRANSIENT_HTTP_STATUSES = [408, 425, 429, 500, 502, 503, 504];

const TRANSIENT_RPC_CODES: number[] = [LimitExceededRpcError.code, ResourceUnavailableRpcError.code];

const TRANSIENT_MESSAGE_PATTERNS = [
  'rate limit',
  'too many requests',
  'overloaded',
  'temporarily unavailable',
  'service unavailable',
  'timeout',
  'timed out',
  'econnreset',
  'etimedout',
  'try again',
];

/**
 * Utility functions for error handling
 */
export class ErrorUtils {
  private static readonly SENSITIVE_KEYS = [
    'apiKey',
    'api_key',
    'secret',
    'password',
    'privateKey',
    'private_key',
    'mnemonic',
    'seed',
  ];

  /**
   * Determines if an RPC failure is a transient overload rather than a
   * rejection of the request itself
   */
  static isTransient(error: unknown): boolean {
    if (error instanceof SweepError) {
      return error.retriable;
    }

    if (error instanceof BaseError) {
      const match = error.walk(
        (e) =>
          e instanceof TimeoutError ||
          (e instanceof HttpRequestError &&
            e.status !== undefined &&
            TRANSIENT_HTTP_STATUSES.includes(e.status)) ||
          (e instanceof RpcError && TRANSIENT_RPC_CODES.includes(e.code))
      );
      if (match) return true;
      if (error.walk((e) => e instanceof RpcError || e instanceof HttpRequestError)) {
        // The node answered with a definite error code
        return ErrorUtils.matchesTransientMessage(error.shortMessage);
      }
    }

    return ErrorUtils.matchesTransientMessage(ErrorUtils.describe(error));
  }

  /**
   * Wraps any failure of an RPC method into the collector's taxonomy
   */
  static toRpcError(
    error: unknown,
    method: string,
    endpoint: string,
    context?: Record<string, unknown>
  ): TransientRpcError | PermanentRpcError {
    if (error instanceof TransientRpcError || error instanceof PermanentRpcError) {
      return error;
    }
    return ErrorUtils.isTransient(error)
      ? new TransientRpcError(method, endpoint, error, context)
      : new PermanentRpcError(method, endpoint, error, context);
  }

  /**
   * Short human-readable message; prefers viem's shortMessage
   */
  static describe(error: unknown): string {
    if (error instanceof BaseError) {
      return error.shortMessage || error.message;
    }
    if (error instanceof Error) {
      return error.message || error.name;
    }
    if (typeof error === 'string') {
      return error;
    }
    return String(error);
  }

  /**
   * Sanitizes error context to remove sensitive data
   * @returns Sanitized context safe for logging
   */
  static sanitizeContext(context: Record<string, unknown>): Record<string, unknown> {
    const sanitized: Record<string, unknown> = {};

    for (const [key, value] of Object.entries(context)) {
      const lowerKey = key.toLowerCase();
      const isSensitive = this.SENSITIVE_KEYS.some((sensitive) =>
        lowerKey.includes(sensitive.toLowerCase())
      );

      if (isSensitive) {
        sanitized[key] = '[REDACTED]';
        continue;
      }

      if (ErrorUtils.isPlainObject(value)) {
        sanitized[key] = this.sanitizeContext(value);
      } else if (typeof value === 'bigint') {
        sanitized[key] = value.toString();
      } else {
        sanitized[key] = value;
      }
    }

    return sanitized;
  }

  private static matchesTransientMessage(message: string): boolean {
    const lower = message.toLowerCase();
    return TRANSIENT_MESSAGE_PATTERNS.some((pattern) => lower.includes(pattern));
  }

  private static isPlainObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
  }
}
