export type ErrorCode =
  | 'FetchError'
  | 'FetchBlocked'
  | 'RateLimitExceeded'
  | 'DiscoveryIncomplete'
  | 'CategorizationSchemaViolation'
  | 'ExtractionError'
  | 'ServiceUnavailable'
  | 'RunFailed';

export class IntelError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = code;
    this.code = code;
  }
}

/** Transport-level failure: timeout, reset, 5xx after retries, non-retryable 4xx. */
export class FetchError extends IntelError {
  constructor(
    readonly url: string,
    message: string,
    readonly status: number | null = null,
    options?: { cause?: unknown }
  ) {
    super('FetchError', message, options);
  }
}

export type BlockReason = 'policy' | 'robots' | 'forbidden' | 'throttled' | 'host-blocked';

export class FetchBlocked extends IntelError {
  constructor(
    readonly url: string,
    readonly reason: BlockReason,
    message?: string
  ) {
    super('FetchBlocked', message ?? `Blocked (${reason}): ${url}`);
  }
}

export class RateLimitExceeded extends IntelError {
  constructor(
    readonly key: string,
    readonly waitMs: number
  ) {
    super('RateLimitExceeded', `Local quota for ${key} exhausted (next slot in ${Math.ceil(waitMs)}ms)`);
  }
}

/** Non-fatal: carried on discovery results, never thrown by the engine. */
export class DiscoveryIncomplete extends IntelError {
  constructor(readonly rootUrl: string, readonly pagesFound: number) {
    super('DiscoveryIncomplete', `No commercial pages found for ${rootUrl} (${pagesFound} pages total)`);
  }
}

export class CategorizationSchemaViolation extends IntelError {
  constructor(readonly issue: string, readonly received: unknown = undefined) {
    super('CategorizationSchemaViolation', `Categorization response rejected: ${issue}`);
  }
}

export class ExtractionError extends IntelError {
  constructor(
    readonly analysisType: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super('ExtractionError', message, options);
  }
}

export class ServiceUnavailable extends IntelError {
  constructor(
    readonly service: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super('ServiceUnavailable', `${service}: ${message}`, options);
  }
}

export class RunFailed extends IntelError {
  constructor(readonly competitorId: string, message: string) {
    super('RunFailed', message);
  }
}

export type RunStage = 'discovery' | 'fetch' | 'complaints' | 'categorization' | 'extraction';

/** A stage-level failure as carried on results; never thrown. */
export type RunFailure = {
  stage: RunStage;
  scope: string | null;
  code: ErrorCode | 'Aborted' | 'UnknownError';
  message: string;
};

export function toRunFailure(stage: RunStage, scope: string | null, error: unknown): RunFailure {
  if (error instanceof IntelError) {
    const cause = error.cause instanceof IntelError ? ` (${error.cause.code}: ${error.cause.message})` : '';
    return { stage, scope, code: error.code, message: `${error.message}${cause}` };
  }
  if (isAbortError(error)) {
    return { stage, scope, code: 'Aborted', message: 'Cancelled' };
  }
  const message = error instanceof Error ? error.message : String(error);
  return { stage, scope, code: 'UnknownError', message };
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError');
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
