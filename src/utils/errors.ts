/**
 * Error taxonomy for Leak Triage
 *
 * Fatal errors (configuration, target, search) abort a run before any
 * per-record work. Preview and classification failures never leave their
 * stage: they are converted to the Unavailable / Unknown terminal states.
 */

/**
 * Missing or invalid credentials and settings, raised before any network call
 */
export class ConfigurationError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

/**
 * Raw target string that is neither an email, a domain nor an IP address
 */
export class TargetError extends Error {
  readonly input: string;

  constructor(message: string, input: string) {
    super(message);
    this.name = 'TargetError';
    this.input = input;
  }
}

export type SearchFailureKind = 'Unauthorized' | 'ProviderError' | 'Timeout';

/**
 * Terminal failure of the search stage; no findings are produced
 */
export class SearchFailure extends Error {
  readonly kind: SearchFailureKind;
  readonly reason: string;
  readonly sessionId?: string;

  constructor(kind: SearchFailureKind, reason: string, sessionId?: string) {
    super(`Search failed (${kind}): ${reason}`);
    this.name = 'SearchFailure';
    this.kind = kind;
    this.reason = reason;
    this.sessionId = sessionId;
  }
}

/**
 * HTTP-level failure of a provider call. `status` is undefined for
 * network errors where no response was received.
 */
export class ProviderHttpError extends Error {
  readonly provider: string;
  readonly status?: number;

  constructor(provider: string, message: string, status?: number) {
    super(status !== undefined ? `${provider} error (status ${status}): ${message}` : `${provider} error: ${message}`);
    this.name = 'ProviderHttpError';
    this.provider = provider;
    this.status = status;
  }
}

/**
 * The provider cannot serve a partial read for this record
 */
export class PreviewUnsupportedError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PreviewUnsupportedError';
  }
}

/** Internal: a single record's preview could not be produced */
export class PreviewFailure extends Error {
  readonly recordId: string;

  constructor(recordId: string, message: string) {
    super(message);
    this.name = 'PreviewFailure';
    this.recordId = recordId;
  }
}

/** Internal: a single record's classification could not be produced */
export class ClassificationFailure extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ClassificationFailure';
  }
}

/** Internal: a record stage or the whole run exceeded its deadline */
export class RunTimeout extends Error {
  readonly timeoutMs: number;

  constructor(timeoutMs: number, message = `Operation timed out after ${timeoutMs}ms`) {
    super(message);
    this.name = 'RunTimeout';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * True for HTTP statuses that mean the credentials were rejected
 */
export function isAuthorizationError(error: unknown): boolean {
  return error instanceof ProviderHttpError && (error.status === 401 || error.status === 403);
}

/**
 * Render any thrown value as a message string
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
