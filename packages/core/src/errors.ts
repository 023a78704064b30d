/**
 * Error taxonomy for the DOE pipeline.
 *
 * Only input problems are thrown. Malformed mesh records pass through,
 * and task failures or timeouts are recorded as per-variant statuses.
 */

export type DoeErrorCode = 'MISSING_INPUT' | 'PARSE_FAILURE';

export class DoeError extends Error {
  readonly code: DoeErrorCode;

  constructor(code: DoeErrorCode, message: string) {
    super(message);
    this.name = 'DoeError';
    this.code = code;
  }
}

/** A required file or folder is absent */
export class MissingInputError extends DoeError {
  readonly path: string;

  constructor(what: string, missingPath: string, detail?: string) {
    super('MISSING_INPUT', `${what} not found: ${missingPath}${detail ? ` (${detail})` : ''}`);
    this.name = 'MissingInputError';
    this.path = missingPath;
  }
}

/** A required numeric literal could not be found or converted */
export class ParseFailureError extends DoeError {
  readonly subject: string;

  constructor(subject: string, message: string) {
    super('PARSE_FAILURE', message);
    this.name = 'ParseFailureError';
    this.subject = subject;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** True for ENOENT from fs calls */
export function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
