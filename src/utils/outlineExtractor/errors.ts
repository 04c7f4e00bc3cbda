/**
 * Per-document failure types. Each carries a stable `code` so the batch
 * summary can attribute failures without string-matching messages.
 */

export type OutlineErrorCode =
  | 'UNREADABLE_DOCUMENT'
  | 'PARSE_ERROR'
  | 'DOCUMENT_TIMEOUT'
  | 'CONFIGURATION_ERROR'
  | 'OUTPUT_CONFLICT';

export class OutlineError extends Error {
  readonly code: OutlineErrorCode;

  constructor(code: OutlineErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'OutlineError';
    this.code = code;
  }
}

/** Corrupt, encrypted, unsupported or zero-page PDF */
export class UnreadableDocumentError extends OutlineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('UNREADABLE_DOCUMENT', message, options);
    this.name = 'UnreadableDocumentError';
  }
}

/** The PDF has pages but none of them yielded text */
export class ParseError extends OutlineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('PARSE_ERROR', message, options);
    this.name = 'ParseError';
  }
}

export class DocumentTimeoutError extends OutlineError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super('DOCUMENT_TIMEOUT', `Document exceeded its ${timeoutMs}ms processing budget`);
    this.name = 'DocumentTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export class ConfigurationError extends OutlineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CONFIGURATION_ERROR', message, options);
    this.name = 'ConfigurationError';
  }
}

/** Two inputs would write the same output file */
export class OutputConflictError extends OutlineError {
  constructor(message: string) {
    super('OUTPUT_CONFLICT', message);
    this.name = 'OutputConflictError';
  }
}

/** Render any thrown value as a single log-friendly line. */
export function describeError(err: unknown): string {
  if (err instanceof OutlineError) return `${err.code}: ${err.message}`;
  if (err instanceof Error) return err.message;
  return String(err);
}
