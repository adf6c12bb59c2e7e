#!/usr/bin/env node
import { realpathSync } from 'fs';
import type { Writable } from 'stream';
import { fileURLToPath } from 'url';

import { HttpClient } from './http-client.js';
import { loadConfig } from './config.js';
import type { ResolvedConfig } from './config.js';
import { ParseError, UsageError } from './errors.js';
import { loadTestCases } from './loader.js';
import { PluginHost } from './plugin-host.js';
import type { Plugin } from './plugin-api.js';
import { progressReporterPlugin } from './plugins/progress-reporter.js';
import { writeReport } from './reporter.js';
import { TestRunner } from './runner.js';
import type { FetchLike } from './http-client.js';
import type { TestCase } from './types.js';

export interface RunOptions {
  fetch?: FetchLike;
  stdout?: Writable;
}

/**
 * Loads the suite, runs it and writes the report. Resolves to the process
 * exit code: 1 when the test file cannot be loaded, 0 otherwise.
 */
export async function runAllTests(cfg: ResolvedConfig, opts: RunOptions = {}): Promise<number> {
  let testCases: TestCase[];
  try {
    testCases = await loadTestCases(cfg.suiteFile);
  } catch (error) {
    if (error instanceof ParseError) {
      console.error(error.message);
      return 1;
    }
    throw error;
  }

  const plugins: Plugin[] = [];
  if (cfg.verbose) {
    plugins.push(progressReporterPlugin({ baseUrl: cfg.baseUrl }));
  }
  const host = new PluginHost(plugins);
  await host.setup();

  const api = new HttpClient({
    timeout: cfg.timeout,
    pluginHost: host,
    fetch: opts.fetch,
  });
  Object.entries(cfg.headers).forEach(([key, value]) => {
    api.setHeader(key, value);
  });
  const runner = new TestRunner({
    client: api,
    pluginHost: host,
    typeChecks: { boolAsInt: cfg.boolAsInt },
  });

  const run = await runner.run(testCases, cfg.baseUrl);
  const stdout = opts.stdout ?? process.stdout;
  await writeReport(run, cfg.format, cfg.outputFile ?? stdout, stdout);
  return 0;
}

export async function main(argv = process.argv): Promise<number> {
  let cfg: ResolvedConfig;
  try {
    cfg = await loadConfig(argv);
  } catch (error) {
    if (error instanceof UsageError) {
      console.error(`error: ${error.message}`);
      return 1;
    }
    throw error;
  }
  return runAllTests(cfg);
}

if (process.argv[1] && fileURLToPath(import.meta.url) === realpathSync(process.argv[1])) {
  main(process.argv).then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      console.error(error);
      process.exitCode = 1;
    },
  );
}
