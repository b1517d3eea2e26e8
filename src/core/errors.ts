export type WatchErrorCode = 'UPSTREAM_UNAVAILABLE' | 'UPSTREAM_REJECTED' | 'VALIDATION' | 'NOT_FOUND';

export class WatchError extends Error {
  constructor(
    readonly code: WatchErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class UpstreamUnavailableError extends WatchError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('UPSTREAM_UNAVAILABLE', message, options);
  }
}

export class UpstreamRejectedError extends WatchError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('UPSTREAM_REJECTED', message, options);
  }
}

export class ValidationError extends WatchError {
  constructor(readonly issues: string[]) {
    super('VALIDATION', issues.join('; '));
  }
}

export class NotFoundError extends WatchError {
  constructor(message: string) {
    super('NOT_FOUND', message);
  }
}

export type UpstreamError = UpstreamUnavailableError | UpstreamRejectedError;

export const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));

export const toUpstreamError = (error: unknown): UpstreamError => {
  if (error instanceof UpstreamUnavailableError || error instanceof UpstreamRejectedError) {
    return error;
  }
  return new UpstreamUnavailableError(errorMessage(error), { cause: error });
};
