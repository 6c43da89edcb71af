import type { ServiceErrorKind } from '../types';

const STATUS_BY_KIND: Record<ServiceErrorKind, number> = {
  invalid_url: 400,
  upstream_not_found: 404,
  upstream_unavailable: 503,
  generation_failed: 500,
  internal_error: 500,
};

export class ServiceError extends Error {
  readonly statusCode: number;

  constructor(
    readonly kind: ServiceErrorKind,
    message: string,
  ) {
    super(message);
    this.name = 'ServiceError';
    this.statusCode = STATUS_BY_KIND[kind];
  }

  static invalidUrl(url: string): ServiceError {
    return new ServiceError('invalid_url', `Invalid URL or no ASIN found in: ${url}`);
  }

  static notFound(message: string): ServiceError {
    return new ServiceError('upstream_not_found', message);
  }

  static unavailable(message: string): ServiceError {
    return new ServiceError('upstream_unavailable', message);
  }

  static generationFailed(message: string): ServiceError {
    return new ServiceError('generation_failed', message);
  }

  toJSON(): { status: 'error'; error: ServiceErrorKind; message: string } {
    return { status: 'error', error: this.kind, message: this.message };
  }
}

export function isServiceError(error: unknown): error is ServiceError {
  return error instanceof ServiceError;
}

/** Failures that are not ServiceErrors are bugs, not upstream or model failures. */
export function errorKindOf(error: unknown): ServiceErrorKind {
  return isServiceError(error) ? error.kind : 'internal_error';
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
