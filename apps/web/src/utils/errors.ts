export class AppError extends Error {
  constructor(
    public code: string,
    message: string,
  ) {
    super(message);
    this.name = 'AppError';
  }
}

/** Local precondition failure. Never reaches the network. */
export class ValidationError extends AppError {
  constructor(message: string) {
    super('VALIDATION_ERROR', message);
    this.name = 'ValidationError';
  }
}

export class MalformedTokenError extends AppError {
  constructor(message: string = 'Malformed token') {
    super('MALFORMED_TOKEN', message);
    this.name = 'MalformedTokenError';
  }
}

export class ExpiredTokenError extends AppError {
  constructor(message: string = 'Token has expired') {
    super('TOKEN_EXPIRED', message);
    this.name = 'ExpiredTokenError';
  }
}

export class MalformedResponseError extends AppError {
  constructor(message: string = 'Malformed response from server') {
    super('MALFORMED_RESPONSE', message);
    this.name = 'MalformedResponseError';
  }
}

/** Non-2xx answer from the Authentication Service or the Resource API. */
export class ApiError extends AppError {
  constructor(
    public status: number,
    message: string,
    public body?: unknown,
  ) {
    super('HTTP_ERROR', message);
    this.name = 'ApiError';
  }
}

export class TransportError extends AppError {
  constructor(message: string = 'Network request failed') {
    super('TRANSPORT_FAILURE', message);
    this.name = 'TransportError';
  }
}

export class AuthRejectedError extends AppError {
  constructor(
    public status: number,
    message: string,
  ) {
    super('AUTH_REJECTED', message);
    this.name = 'AuthRejectedError';
  }
}

export class StorageError extends AppError {
  constructor(message: string) {
    super('STORAGE_FAILURE', message);
    this.name = 'StorageError';
  }
}

export class AuthenticationError extends AppError {
  constructor(message: string = 'Authentication required') {
    super('AUTHENTICATION_ERROR', message);
    this.name = 'AuthenticationError';
  }
}

const rejectionMessages: Record<number, string> = {
  401: 'Invalid username or password',
  409: 'Username already exists',
  422: 'Invalid input format',
  500: 'Internal server error, please try again later',
};

export const NETWORK_ERROR_MESSAGE = 'Network error, please check your connection';

/**
 * Map a login/register failure to the error surfaced to callers and to
 * `loginError` / `registerError` listeners.
 */
export function normalizeAuthError(error: unknown): AppError {
  if (error instanceof ApiError) {
    return new AuthRejectedError(error.status, rejectionMessages[error.status] ?? error.message);
  }

  if (error instanceof TransportError) {
    return new TransportError(NETWORK_ERROR_MESSAGE);
  }

  if (error instanceof AppError) {
    return error;
  }

  const message = error instanceof Error && error.message ? error.message : 'Unknown error';
  return new AppError('UNKNOWN_ERROR', message);
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
