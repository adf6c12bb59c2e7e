import { open } from 'fs/promises';
import type { Writable } from 'stream';
import type { SuiteRun, TestResult } from './types.js';

export const REPORT_FORMATS = ['json', 'text'] as const;

export type ReportFormat = (typeof REPORT_FORMATS)[number];

export function parseFormat(format: string): ReportFormat {
  const normalized = format.toLowerCase();
  const match = REPORT_FORMATS.find((f) => f === normalized);
  if (!match) {
    throw new Error(`Unknown output format '${format}'. Use json or text.`);
  }
  return match;
}

export function successPercentage(run: SuiteRun): number {
  const total = run.passed + run.failed;
  return total === 0 ? 0 : (run.passed / total) * 100;
}

function toJsonEntry(result: TestResult) {
  const entry = {
    name: result.name,
    status: result.status,
    elapsed_time: result.elapsedTime,
  };
  return result.status === 'FAILED' ? { ...entry, error_msg: result.errorMsg } : entry;
}

function renderJson(run: SuiteRun): string {
  const report = {
    summary: {
      passed: run.passed,
      failed: run.failed,
      success_percentage: successPercentage(run),
      total_elapsed_time: run.totalElapsedTime,
    },
    test_results: run.results.map(toJsonEntry),
  };
  return `${JSON.stringify(report, null, 4)}\n`;
}

function renderText(run: SuiteRun): string {
  const lines = [
    '***',
    'TEST SUMMARY',
    '------------',
    `Tests passed: ${run.passed}`,
    `Tests failed: ${run.failed}`,
    `Success percentage : ${successPercentage(run).toFixed(2)}%`,
    `Total elapsed time: ${run.totalElapsedTime.toFixed(3)} seconds`,
    '***',
  ];
  run.results.forEach((result) => {
    lines.push(result.name);
    lines.push(`\tStatus:${result.status}`);
    lines.push(`\tElapsed time: ${result.elapsedTime.toFixed(6)}`);
    if (result.status === 'FAILED') {
      lines.push(`\tError message: ${result.errorMsg}`);
    }
  });
  return `${lines.join('\n')}\n`;
}

export function render(run: SuiteRun, format: string): string {
  return parseFormat(format) === 'json' ? renderJson(run) : renderText(run);
}

function writeTo(stream: Writable, output: string): Promise<void> {
  return new Promise((resolve, reject) => {
    stream.write(output, (error) => {
      if (error) reject(error);
      else resolve();
    });
  });
}

/**
 * Writes the rendered report to a stream or a file path. When the file
 * cannot be written the report goes to `fallback` instead.
 */
export async function writeReport(
  run: SuiteRun,
  format: ReportFormat,
  sink: Writable | string,
  fallback: Writable = process.stdout,
): Promise<void> {
  const output = render(run, format);
  if (typeof sink !== 'string') {
    await writeTo(sink, output);
    return;
  }

  try {
    const handle = await open(sink, 'w');
    try {
      await handle.writeFile(output, 'utf8');
    } finally {
      await handle.close();
    }
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    console.error(`Cannot write report to '${sink}': ${reason}`);
    await writeTo(fallback, output);
  }
}
