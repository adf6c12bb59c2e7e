import { performance } from 'perf_hooks';
import { PASS, describeFailure, fail, malformed, missingField } from './errors.js';
import type { CheckOutcome, TestFailure } from './errors.js';
import { checkTypes, checkValues, firstFailure } from './checks.js';
import type { TypeCheckOptions } from './checks.js';
import type { HttpClient, HttpResponse } from './http-client.js';
import { decodeJson } from './json.js';
import type { DecodedValue } from './json.js';
import type { PluginHost } from './plugin-host.js';
import { isJsonObject } from './types.js';
import type { HttpMethod, JsonObject, JsonValue, ResolvedTestCase, SuiteRun, TestCase, TestResult } from './types.js';

export const NAME_NOT_PROVIDED = 'name not provided';

export interface RunnerOptions {
  client: HttpClient;
  pluginHost?: PluginHost;
  typeChecks?: TypeCheckOptions;
  /** Monotonic clock in seconds */
  now?: () => number;
}

type Resolution = { ok: true; test: ResolvedTestCase } | { ok: false; failure: TestFailure };

/** Names may be any JSON value; non-strings are shown as JSON. */
export function displayName(name: JsonValue | undefined): string {
  if (name === undefined) return NAME_NOT_PROVIDED;
  return typeof name === 'string' ? name : JSON.stringify(name);
}

function requireString(test: TestCase, key: 'url' | 'method'): string | TestFailure {
  const value = test[key];
  if (value === undefined) return missingField(key);
  if (typeof value !== 'string') return malformed(`'${key}' must be a string.`);
  return value;
}

function optionalObject(
  test: TestCase,
  key: 'expected_response_values' | 'expected_response_types',
): { ok: true; value?: JsonObject } | { ok: false; failure: TestFailure } {
  const value = test[key];
  if (value === undefined) return { ok: true };
  if (isJsonObject(value)) return { ok: true, value };
  return { ok: false, failure: malformed(`'${key}' must be an object.`) };
}

function toMethod(method: string): HttpMethod | undefined {
  const upper = method.toUpperCase();
  return upper === 'GET' || upper === 'POST' ? upper : undefined;
}

/** Checks the required fields in the order name, url, method. */
export function resolveTestCase(test: TestCase): Resolution {
  if (test.name === undefined) return { ok: false, failure: missingField('name') };
  const name = displayName(test.name);
  const url = requireString(test, 'url');
  if (typeof url !== 'string') return { ok: false, failure: url };
  const rawMethod = requireString(test, 'method');
  if (typeof rawMethod !== 'string') return { ok: false, failure: rawMethod };

  const method = toMethod(rawMethod);
  if (!method) return { ok: false, failure: malformed('Allowed methods are GET and POST') };

  const rawStatus = test.expected_status;
  let expectedStatus: number | undefined;
  if (rawStatus !== undefined) {
    if (typeof rawStatus !== 'number' || !Number.isInteger(rawStatus)) {
      return { ok: false, failure: malformed(`'expected_status' must be an integer.`) };
    }
    expectedStatus = rawStatus;
  }

  const expectedValues = optionalObject(test, 'expected_response_values');
  if (!expectedValues.ok) return expectedValues;
  const expectedTypes = optionalObject(test, 'expected_response_types');
  if (!expectedTypes.ok) return expectedTypes;

  return {
    ok: true,
    test: {
      name,
      url,
      method,
      // null reads as no payload
      payload: test.payload === null ? undefined : test.payload,
      expectedStatus,
      expectedValues: expectedValues.value,
      expectedTypes: expectedTypes.value,
    },
  };
}

function decodeBody(text: string): { ok: true; body: DecodedValue } | { ok: false } {
  try {
    return { ok: true, body: decodeJson(text) };
  } catch {
    return { ok: false };
  }
}

export class TestRunner {
  private client: HttpClient;
  private pluginHost?: PluginHost;
  private typeChecks: TypeCheckOptions;
  private now: () => number;
  private current: SuiteRun = { results: [], passed: 0, failed: 0, totalElapsedTime: 0 };

  constructor(options: RunnerOptions) {
    this.client = options.client;
    this.pluginHost = options.pluginHost;
    this.typeChecks = options.typeChecks ?? {};
    this.now = options.now ?? (() => performance.now() / 1000);
  }

  /** Statistics of the most recent run. */
  get lastRun(): SuiteRun {
    return this.current;
  }

  async run(testCases: readonly TestCase[], baseUrl: string): Promise<SuiteRun> {
    const results: TestResult[] = [];
    let passed = 0;
    let failed = 0;
    const runStart = this.now();

    await this.pluginHost?.dispatchRunStart(testCases);

    for (const [index, test] of testCases.entries()) {
      await this.pluginHost?.dispatchTestStart(test, index);

      const testStart = this.now();
      const outcome = await this.runTest(test, baseUrl);
      const elapsedTime = this.now() - testStart;

      const name = displayName(test.name);
      let result: TestResult;
      if (outcome.ok) {
        result = { name, status: 'PASSED', elapsedTime };
        passed += 1;
      } else {
        result = { name, status: 'FAILED', elapsedTime, errorMsg: describeFailure(outcome.failure) };
        failed += 1;
      }
      results.push(result);

      await this.pluginHost?.dispatchTestEnd(test, result);
    }

    this.current = { results, passed, failed, totalElapsedTime: this.now() - runStart };
    await this.pluginHost?.dispatchRunEnd(this.current);
    return this.current;
  }

  private async runTest(test: TestCase, baseUrl: string): Promise<CheckOutcome> {
    const resolution = resolveTestCase(test);
    if (!resolution.ok) return fail(resolution.failure);
    const { url, method, payload, expectedStatus, expectedValues, expectedTypes } = resolution.test;

    let response: HttpResponse;
    try {
      response = await this.client.request({
        method,
        url: baseUrl + url,
        body: method === 'POST' ? payload : undefined,
      });
    } catch (error) {
      return fail({ kind: 'transport', reason: error instanceof Error ? error.message : String(error) });
    }

    if (expectedStatus !== undefined && response.status !== expectedStatus) {
      return fail({ kind: 'status-mismatch', expected: expectedStatus, actual: response.status });
    }

    const decoded = decodeBody(response.text);
    if (!decoded.ok) return fail({ kind: 'response-decode' });
    const { body } = decoded;

    return firstFailure(
      () => (expectedValues ? checkValues(body, expectedValues) : PASS),
      () => (expectedTypes ? checkTypes(body, expectedTypes, this.typeChecks) : PASS),
    );
  }
}
