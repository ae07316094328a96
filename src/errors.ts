export enum NomadErrorCode {
  AUTH = 'AUTH',
  API = 'API',
  TRANSPORT = 'TRANSPORT',
  CACHE_READ = 'CACHE_READ',
  RESPONSE_SHAPE = 'RESPONSE_SHAPE',
}

export class NomadError extends Error {
  readonly code: NomadErrorCode;
  readonly details: Record<string, unknown> | undefined;

  constructor(code: NomadErrorCode, message: string, details?: Record<string, unknown>, options?: ErrorOptions) {
    super(message, options);
    this.name = 'NomadError';
    this.code = code;
    this.details = details;
    Object.setPrototypeOf(this, new.target.prototype);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * Credentials or token rejected. A 401 means the token itself is invalid; a 403
 * only refuses the requested operation or access scope.
 */
export class AuthError extends NomadError {
  readonly status: number | undefined;

  constructor(message: string, status?: number, details?: Record<string, unknown>, options?: ErrorOptions) {
    super(NomadErrorCode.AUTH, message, { status, ...details }, options);
    this.name = 'AuthError';
    this.status = status;
  }
}

export class ApiError extends NomadError {
  readonly status: number;

  constructor(status: number, message: string, details?: Record<string, unknown>) {
    super(NomadErrorCode.API, `API Error (${status}): ${message}`, { status, ...details });
    this.name = 'ApiError';
    this.status = status;
  }
}

export class TransportError extends NomadError {
  constructor(message: string, details?: Record<string, unknown>, options?: ErrorOptions) {
    super(NomadErrorCode.TRANSPORT, message, details, options);
    this.name = 'TransportError';
  }
}

// Only ever raised inside the cache layer, where it becomes a miss.
export class CacheReadError extends NomadError {
  constructor(message: string, details?: Record<string, unknown>, options?: ErrorOptions) {
    super(NomadErrorCode.CACHE_READ, message, details, options);
    this.name = 'CacheReadError';
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
