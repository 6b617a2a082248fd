export enum ErrorCode {
  // Session Errors (1xxx)
  ROUTER_UNREACHABLE = 1001,
  REQUEST_TIMEOUT = 1002,
  AUTHENTICATION_FAILED = 1003,
  SESSION_EXPIRED = 1004,
  CSRF_MISMATCH = 1005,
  TOO_MANY_SESSIONS = 1006,
  OPERATION_UNSUPPORTED = 1007,

  // Configuration Errors (2xxx)
  CONFIG_INVALID = 2002,

  // Mesh Errors (3xxx)
  MALFORMED_RESPONSE = 3001,
  ROUTER_NOT_FOUND = 3002,
  CYCLE_TIMEOUT = 3003,
  CYCLE_FAILED = 3004,
  CAPABILITY_MISSING = 3005,

  // Storage Errors (4xxx)
  STORE_READ_FAILED = 4001,
  STORE_WRITE_FAILED = 4002,

  // General Errors (9xxx)
  UNKNOWN_ERROR = 9000,
  INVALID_PARAMETER = 9002,
}

export interface ErrorDetails {
  code: ErrorCode;
  message: string;
  cause?: Error | undefined;
  context?: Record<string, unknown> | undefined;
  timestamp: Date;
  recoverable: boolean;
}

export interface ErrorOptions {
  cause?: Error | undefined;
  context?: Record<string, unknown> | undefined;
}

export class MeshError extends Error {
  readonly code: ErrorCode;
  override readonly cause?: Error | undefined;
  readonly context?: Record<string, unknown> | undefined;
  readonly timestamp: Date;
  readonly recoverable: boolean;

  constructor(
    code: ErrorCode,
    message: string,
    options?: ErrorOptions & { recoverable?: boolean | undefined }
  ) {
    super(message);
    this.name = 'MeshError';
    this.code = code;
    this.cause = options?.cause;
    this.context = options?.context;
    this.timestamp = new Date();
    this.recoverable = options?.recoverable ?? false;

    Error.captureStackTrace?.(this, MeshError);
  }

  toJSON(): ErrorDetails {
    return {
      code: this.code,
      message: this.message,
      cause: this.cause,
      context: this.context,
      timestamp: this.timestamp,
      recoverable: this.recoverable,
    };
  }

  static fromError(err: unknown, code: ErrorCode = ErrorCode.UNKNOWN_ERROR): MeshError {
    if (err instanceof MeshError) return err;
    if (err instanceof Error) return new MeshError(code, err.message, { cause: err });
    return new MeshError(code, String(err));
  }
}

/** Bad credentials. Sticky until the credentials are replaced. */
export class AuthenticationFailedError extends MeshError {
  constructor(routerId: string, options?: ErrorOptions) {
    super(ErrorCode.AUTHENTICATION_FAILED, `Authentication failed for router '${routerId}'`, {
      ...options,
      context: { routerId, ...options?.context },
      recoverable: false,
    });
    this.name = 'AuthenticationFailedError';
  }
}

export class SessionExpiredError extends MeshError {
  constructor(routerId: string, options?: ErrorOptions) {
    super(ErrorCode.SESSION_EXPIRED, `Session expired on router '${routerId}'`, {
      ...options,
      context: { routerId, ...options?.context },
      recoverable: true,
    });
    this.name = 'SessionExpiredError';
  }
}

export class CsrfMismatchError extends MeshError {
  constructor(routerId: string, options?: ErrorOptions) {
    super(ErrorCode.CSRF_MISMATCH, `CSRF token rejected by router '${routerId}'`, {
      ...options,
      context: { routerId, ...options?.context },
      recoverable: true,
    });
    this.name = 'CsrfMismatchError';
  }
}

export class TooManySessionsError extends MeshError {
  readonly retryAfterMs: number;

  constructor(routerId: string, retryAfterMs: number, options?: ErrorOptions) {
    super(ErrorCode.TOO_MANY_SESSIONS, `Router '${routerId}' refused a new session, retry in ${retryAfterMs}ms`, {
      ...options,
      context: { routerId, retryAfterMs, ...options?.context },
      recoverable: true,
    });
    this.name = 'TooManySessionsError';
    this.retryAfterMs = retryAfterMs;
  }
}

export class RouterUnreachableError extends MeshError {
  readonly routerId: string;

  constructor(routerId: string, reason: string, options?: ErrorOptions) {
    super(ErrorCode.ROUTER_UNREACHABLE, `Router '${routerId}' unreachable: ${reason}`, {
      ...options,
      context: { routerId, ...options?.context },
      recoverable: true,
    });
    this.name = 'RouterUnreachableError';
    this.routerId = routerId;
  }
}

export class OperationUnsupportedError extends MeshError {
  constructor(routerId: string, operation: string, options?: ErrorOptions) {
    super(ErrorCode.OPERATION_UNSUPPORTED, `Router '${routerId}' does not support '${operation}'`, {
      ...options,
      context: { routerId, operation, ...options?.context },
      recoverable: false,
    });
    this.name = 'OperationUnsupportedError';
  }
}

export class MalformedResponseError extends MeshError {
  constructor(message: string, options?: ErrorOptions) {
    super(ErrorCode.MALFORMED_RESPONSE, message, { ...options, recoverable: true });
    this.name = 'MalformedResponseError';
  }
}

export class ConfigurationError extends MeshError {
  constructor(message: string, options?: ErrorOptions) {
    super(ErrorCode.CONFIG_INVALID, message, { ...options, recoverable: false });
    this.name = 'ConfigurationError';
  }
}

export class OperationTimeoutError extends MeshError {
  constructor(operation: string, timeoutMs: number, options?: ErrorOptions) {
    super(
      ErrorCode.REQUEST_TIMEOUT,
      `Operation '${operation}' timed out after ${timeoutMs}ms`,
      { ...options, recoverable: true }
    );
    this.name = 'OperationTimeoutError';
  }
}

/** A control call the router cannot take, refused before anything is sent. */
export class CapabilityMissingError extends MeshError {
  constructor(routerId: string, capability: string, options?: ErrorOptions) {
    super(ErrorCode.CAPABILITY_MISSING, `Router '${routerId}' has no '${capability}' capability`, {
      ...options,
      context: { routerId, capability, ...options?.context },
      recoverable: false,
    });
    this.name = 'CapabilityMissingError';
  }
}

export class InvalidParameterError extends MeshError {
  constructor(message: string, options?: ErrorOptions) {
    super(ErrorCode.INVALID_PARAMETER, message, { ...options, recoverable: false });
    this.name = 'InvalidParameterError';
  }
}

export class StoreError extends MeshError {
  constructor(code: ErrorCode.STORE_READ_FAILED | ErrorCode.STORE_WRITE_FAILED, message: string, options?: ErrorOptions) {
    super(code, message, { ...options, recoverable: true });
    this.name = 'StoreError';
  }
}
