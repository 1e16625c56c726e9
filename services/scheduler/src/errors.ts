import { truncate } from '@velvetqueue/shared/utils';

export type PublishErrorCode =
  | 'VALIDATION'
  | 'NOT_FOUND'
  | 'NO_CREDENTIALS'
  | 'NO_CHANNEL'
  | 'HOSTING_ERROR'
  | 'REMOTE_API_ERROR'
  | 'TIMEOUT'
  | 'CONFLICT'
  | 'INVALID_STATE';

export class PublishError extends Error {
  constructor(
    message: string,
    public readonly code: PublishErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'PublishError';
  }
}

export class ValidationError extends PublishError {
  constructor(message: string) {
    super(message, 'VALIDATION');
    this.name = 'ValidationError';
  }
}

export class NotFoundError extends PublishError {
  constructor(message: string) {
    super(message, 'NOT_FOUND');
    this.name = 'NotFoundError';
  }
}

export class NoCredentialsError extends PublishError {
  constructor(message: string) {
    super(message, 'NO_CREDENTIALS');
    this.name = 'NoCredentialsError';
  }
}

export class NoChannelError extends PublishError {
  constructor(message: string) {
    super(message, 'NO_CHANNEL');
    this.name = 'NoChannelError';
  }
}

export class HostingError extends PublishError {
  constructor(
    message: string,
    public readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, 'HOSTING_ERROR', options);
    this.name = 'HostingError';
  }
}

export type RemoteApiErrorKind = 'token_expired' | 'other';

export class RemoteApiError extends PublishError {
  constructor(
    message: string,
    public readonly kind: RemoteApiErrorKind,
    public readonly details: { status?: number; code?: number; type?: string } = {},
    options?: { cause?: unknown }
  ) {
    super(message, 'REMOTE_API_ERROR', options);
    this.name = 'RemoteApiError';
  }

  get tokenExpired(): boolean {
    return this.kind === 'token_expired';
  }
}

export class TimeoutError extends PublishError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'TIMEOUT', options);
    this.name = 'TimeoutError';
  }
}

/** Another attempt holds the claim on the post. */
export class PublishConflictError extends PublishError {
  constructor(message: string) {
    super(message, 'CONFLICT');
    this.name = 'PublishConflictError';
  }
}

export class InvalidStateError extends PublishError {
  constructor(message: string) {
    super(message, 'INVALID_STATE');
    this.name = 'InvalidStateError';
  }
}

export const MAX_ERROR_LENGTH = 1000;

export const describeError = (error: unknown): string => {
  const message = error instanceof Error ? error.message : String(error);
  const trimmed = message.trim() || 'Unknown error';
  return truncate(trimmed, MAX_ERROR_LENGTH);
};
