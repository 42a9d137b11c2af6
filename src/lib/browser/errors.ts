/**
 * Raised when a page does not reach its load milestone in time.
 */
export class NavigationTimeoutError extends Error {
  readonly url: string;
  readonly timeoutMs: number;

  constructor(url: string, timeoutMs: number, cause?: unknown) {
    super(`Page load timed out after ${timeoutMs}ms: ${url}`, { cause });
    this.name = 'NavigationTimeoutError';
    this.url = url;
    this.timeoutMs = timeoutMs;
  }
}

export function isNavigationTimeout(error: unknown): error is NavigationTimeoutError {
  return error instanceof NavigationTimeoutError;
}
