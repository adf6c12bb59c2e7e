export { loadTestCases } from './loader.js';
export { TestRunner, displayName, resolveTestCase, NAME_NOT_PROVIDED } from './runner.js';
export type { RunnerOptions } from './runner.js';
export { checkTypes, checkValues, describeType } from './checks.js';
export { decodeJson, formatValue, jsonEquals } from './json.js';
export type { DecodedObject, DecodedValue } from './json.js';
export type { TypeCheckOptions } from './checks.js';
export { HttpClient } from './http-client.js';
export type { FetchLike, HttpRequest, HttpResponse } from './http-client.js';
export { render, writeReport, parseFormat, successPercentage, REPORT_FORMATS } from './reporter.js';
export type { ReportFormat } from './reporter.js';
export { PluginHost } from './plugin-host.js';
export type { Plugin, PluginContext } from './plugin-api.js';
export { progressReporterPlugin } from './plugins/progress-reporter.js';
export { ParseError, ParseErrorCode, UsageError, describeFailure } from './errors.js';
export type { CheckOutcome, TestFailure } from './errors.js';
export { loadConfig, parseArgs, pickConfig, resolveConfig } from './config.js';
export type { CliConfig, ResolvedConfig } from './config.js';
export type {
  HttpMethod,
  JsonObject,
  JsonPrimitive,
  JsonValue,
  ResolvedTestCase,
  SuiteRun,
  TestCase,
  TestResult,
  TestStatus,
  TypeTag,
} from './types.js';
export { isJsonObject, TYPE_TAGS } from './types.js';
