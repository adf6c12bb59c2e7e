export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;

export interface JsonObject {
  [key: string]: JsonValue;
}

/**
 * A single entry of a test file. Fields are left as raw JSON so that
 * structural problems surface per test when the case runs, not at load time.
 */
export interface TestCase {
  /** Unique name for the test */
  readonly name?: JsonValue;
  /** Path appended verbatim to the base url */
  readonly url?: JsonValue;
  /** GET or POST, compared case-insensitively */
  readonly method?: JsonValue;
  /** JSON body sent with POST */
  readonly payload?: JsonValue;
  /** Response status the server must answer with */
  readonly expected_status?: JsonValue;
  /** Exact values expected at top-level response keys */
  readonly expected_response_values?: JsonValue;
  /** Type tags expected at top-level response keys */
  readonly expected_response_types?: JsonValue;
  readonly [field: string]: JsonValue | undefined;
}

export type HttpMethod = 'GET' | 'POST';

export const TYPE_TAGS = ['string', 'int', 'float'] as const;

export type TypeTag = (typeof TYPE_TAGS)[number];

/** A test case whose required fields have been checked. */
export interface ResolvedTestCase {
  name: string;
  url: string;
  method: HttpMethod;
  payload?: JsonValue;
  expectedStatus?: number;
  expectedValues?: JsonObject;
  expectedTypes?: JsonObject;
}

export type TestStatus = 'PASSED' | 'FAILED';

export type TestResult =
  | { readonly name: string; readonly status: 'PASSED'; readonly elapsedTime: number }
  | { readonly name: string; readonly status: 'FAILED'; readonly elapsedTime: number; readonly errorMsg: string };

export interface SuiteRun {
  readonly results: readonly TestResult[];
  readonly passed: number;
  readonly failed: number;
  /** Wall clock of the whole batch in seconds */
  readonly totalElapsedTime: number;
}

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
