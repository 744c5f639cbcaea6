export type NavigationErrorCode = 'no_route' | 'invalid_state' | 'position_unavailable';

export class NavigationError extends Error {
  readonly code: NavigationErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: NavigationErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'NavigationError';
    this.code = code;
    this.details = details;
  }
}

export const isNavigationError = (value: unknown): value is NavigationError =>
  value instanceof NavigationError;

export const describeError = (error: unknown) => {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return 'Unknown error';
};
