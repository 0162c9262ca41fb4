/** Transient failure kinds the synchronizer is allowed to wait out. */
export type RetryableKind = 'not_found' | 'stale' | 'ambiguous';

interface AppErrorOptions {
  retryable?: RetryableKind;
  cause?: unknown;
}

interface LocatorDescription {
  kind: string;
  value: string;
}

export class AppError extends Error {
  readonly code: string;
  readonly retryable: RetryableKind | undefined;

  constructor(message: string, code: string, options: AppErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = this.constructor.name;
    this.code = code;
    this.retryable = options.retryable;
  }
}

export type RetryableError = AppError & { readonly retryable: RetryableKind };

export function isRetryable(err: unknown): err is RetryableError {
  return err instanceof AppError && err.retryable !== undefined;
}

function describe(target: LocatorDescription): string {
  const value = target.value.length > 80 ? `${target.value.slice(0, 77)}...` : target.value;
  return `${target.kind} "${value}"`;
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, 'VALIDATION_ERROR');
  }
}

export class PreconditionError extends AppError {
  constructor(message: string, code = 'PRECONDITION_FAILED') {
    super(message, code);
  }
}

export class FileNotFoundError extends PreconditionError {
  readonly path: string;

  constructor(path: string) {
    super(`Cannot attach file, ${path} does not exist`, 'FILE_NOT_FOUND');
    this.path = path;
  }
}

export class InvalidLocatorError extends AppError {
  constructor(message: string) {
    super(message, 'INVALID_LOCATOR');
  }
}

export class ActionError extends AppError {
  constructor(action: string, reason?: string) {
    const detail = reason ? `: ${reason}` : '';
    super(`Action failed: ${action}${detail}`, 'ACTION_FAILED');
  }
}

export class NavigationError extends AppError {
  constructor(url: string, reason?: string) {
    const detail = reason ? `: ${reason}` : '';
    super(`Navigation failed for ${url}${detail}`, 'NAVIGATION_FAILED');
  }
}

export class ElementNotFoundError extends AppError {
  declare readonly retryable: 'not_found';

  constructor(target: LocatorDescription) {
    super(`Unable to find ${describe(target)}`, 'ELEMENT_NOT_FOUND', { retryable: 'not_found' });
  }
}

export class AmbiguousMatchError extends AppError {
  declare readonly retryable: 'ambiguous';
  readonly count: number;

  constructor(target: LocatorDescription, count: number) {
    super(`Ambiguous match, found ${count} elements matching ${describe(target)}`, 'AMBIGUOUS_MATCH', {
      retryable: 'ambiguous',
    });
    this.count = count;
  }
}

export class StaleElementError extends AppError {
  declare readonly retryable: 'stale';

  constructor(action: string, reason?: string) {
    const detail = reason ? `: ${reason}` : '';
    super(`Element went stale during ${action}${detail}`, 'STALE_ELEMENT', { retryable: 'stale' });
  }
}

export class WaitTimeoutError extends AppError {
  readonly timeoutMs: number;
  readonly attempts: number;
  readonly lastError: RetryableError;

  constructor(timeoutMs: number, attempts: number, lastError: RetryableError) {
    super(
      `Timed out after ${timeoutMs}ms (${attempts} attempt${attempts === 1 ? '' : 's'}): ${lastError.message}`,
      'WAIT_TIMEOUT',
      { cause: lastError },
    );
    this.timeoutMs = timeoutMs;
    this.attempts = attempts;
    this.lastError = lastError;
  }
}
