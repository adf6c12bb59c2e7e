import type { Plugin } from '../plugin-api.js';
import type { SuiteRun } from '../types.js';

function red(text: string): string {
  return `\u001b[31m${text}\u001b[39m`;
}

function green(text: string): string {
  return `\u001b[32m${text}\u001b[39m`;
}

export function drawProgressBar(passed: number, failed: number, total: number, width: number = 30): string {
  const passedWidth = Math.round((passed / total) * width) || 0;
  const failedWidth = Math.round((failed / total) * width) || 0;
  const pendingWidth = Math.max(width - passedWidth - failedWidth, 0);

  const passedBar = green('█'.repeat(passedWidth));
  const failedBar = red('█'.repeat(failedWidth));
  const pendingBar = '░'.repeat(pendingWidth);

  return `[${passedBar}${failedBar}${pendingBar}]`;
}

export interface ProgressReporterOptions {
  baseUrl: string;
  /** Where progress goes; stdout is kept for the report */
  stream?: NodeJS.WritableStream;
}

/** Live progress and a closing latency line, written to stderr. */
export const progressReporterPlugin = (opts: ProgressReporterOptions): Plugin => ({
  name: 'progress-reporter',
  setup(ctx) {
    const out = opts.stream ?? process.stderr;
    let totalTests = 0;
    let passedTests = 0;
    let failedTests = 0;

    ctx.onRunStart((cases) => {
      out.write(`🚀 Running ${cases.length} tests against ${opts.baseUrl}\n`);
      out.write(`${'='.repeat(50)}\n`);
      totalTests = cases.length;
      passedTests = 0;
      failedTests = 0;
    });

    ctx.onTestEnd((_test, result) => {
      if (result.status === 'PASSED') {
        passedTests++;
      } else {
        failedTests++;
        out.write(`${red(`  [❌] ${result.name}: ${result.errorMsg}`)}\n`);
      }
      const progress = passedTests + failedTests;
      const bar = drawProgressBar(passedTests, failedTests, totalTests);
      const percentage = ((progress / totalTests) * 100).toFixed(0);
      out.write(`  Progress: ${bar} ${percentage}% (${progress}/${totalTests})\r`);
    });

    ctx.onRunEnd((run: SuiteRun) => {
      out.write('\n'); // Clear progress bar line
      out.write(`✨ Tests completed: ${run.passed}/${run.results.length} passed\n`);

      if (run.results.length > 0) {
        const latencies = run.results.map((r) => r.elapsedTime * 1000).sort((a, b) => a - b);
        const min = latencies[0];
        const max = latencies[latencies.length - 1];
        const avg = latencies.reduce((a, b) => a + b, 0) / latencies.length;
        out.write(`⏱️  Latency: min ${min.toFixed(2)}ms; avg ${avg.toFixed(2)}ms; max ${max.toFixed(2)}ms\n`);
      }
    });
  },
});
