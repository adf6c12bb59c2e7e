export enum ParseErrorCode {
  FILE_NOT_FOUND = 'FILE_NOT_FOUND',
  UNREADABLE = 'UNREADABLE',
  INVALID_JSON = 'INVALID_JSON',
  NOT_AN_ARRAY = 'NOT_AN_ARRAY',
}

/** Raised while loading a test file. Fatal for the whole run. */
export class ParseError extends Error {
  readonly code: ParseErrorCode;
  readonly filePath: string;

  constructor(code: ParseErrorCode, filePath: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ParseError';
    this.code = code;
    this.filePath = filePath;
  }
}

export type TestFailure =
  | { kind: 'malformed'; reason: string }
  | { kind: 'transport'; reason: string }
  | { kind: 'status-mismatch'; expected: number; actual: number }
  | { kind: 'response-decode' }
  | { kind: 'key-not-found'; key: string }
  /** Both sides already formatted for display. */
  | { kind: 'value-mismatch'; key: string; expected: string; actual: string }
  | { kind: 'type-mismatch'; key: string; expected: string; actual: string };

export type CheckOutcome = { ok: true } | { ok: false; failure: TestFailure };

export const PASS: CheckOutcome = { ok: true };

export const fail = (failure: TestFailure): CheckOutcome => ({ ok: false, failure });

export const malformed = (reason: string): TestFailure => ({ kind: 'malformed', reason });

export const missingField = (key: string): TestFailure =>
  malformed(`Must provide '${key}' in tests file.`);

export function describeFailure(failure: TestFailure): string {
  switch (failure.kind) {
    case 'malformed':
      return `Malformed test. ${failure.reason}`;
    case 'transport':
      return `Request failed: ${failure.reason}`;
    case 'status-mismatch':
      return `Expected status ${failure.expected} but got ${failure.actual}.`;
    case 'response-decode':
      return 'Could not decode JSON from response.';
    case 'key-not-found':
      return `Expected key '${failure.key}' not found.`;
    case 'value-mismatch':
      return `Expected value '${failure.expected}' at key '${failure.key}' but got '${failure.actual}'.`;
    case 'type-mismatch':
      return `Invalid type at key '${failure.key}'. Expected '${failure.expected}' got '${failure.actual}'.`;
  }
}

/** Bad command-line input. */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}
