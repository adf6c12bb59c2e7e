import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { PluginHost } from '../plugin-host.js';
import { drawProgressBar, progressReporterPlugin } from '../plugins/progress-reporter.js';
import type { SuiteRun } from '../types.js';
import { MemoryStream } from './stub-fetch.js';

describe('PluginHost', () => {
  it('chains onFetch transforms in registration order', async () => {
    const host = new PluginHost([
      { name: 'one', setup: (ctx) => ctx.onFetch((req) => new Request(`${req.url}?one`)) },
      { name: 'two', setup: (ctx) => ctx.onFetch((req) => new Request(`${req.url}&two`)) },
    ]);
    await host.setup();
    const req = await host.transformRequest(new Request('http://api.test/x'));
    assert.equal(req.url, 'http://api.test/x?one&two');
  });

  it('returns the request unchanged without plugins', async () => {
    const host = new PluginHost();
    await host.setup();
    const original = new Request('http://api.test/x');
    assert.equal(await host.transformRequest(original), original);
  });

  it('awaits async plugin setup', async () => {
    const events: string[] = [];
    const host = new PluginHost([
      {
        name: 'slow',
        async setup(ctx) {
          await new Promise((resolve) => setTimeout(resolve, 5));
          ctx.onRunEnd(() => { events.push('end'); });
        },
      },
    ]);
    await host.setup();
    await host.dispatchRunEnd({ results: [], passed: 0, failed: 0, totalElapsedTime: 0 });
    assert.deepEqual(events, ['end']);
  });
});

describe('progressReporterPlugin', () => {
  it('draws a bar split between passed and failed', () => {
    assert.equal(drawProgressBar(1, 1, 2, 4), '[\u001b[32m██\u001b[39m\u001b[31m██\u001b[39m]');
  });

  it('draws an empty bar before any test finished', () => {
    assert.equal(drawProgressBar(0, 0, 0, 3), '[\u001b[32m\u001b[39m\u001b[31m\u001b[39m░░░]');
  });

  it('writes progress and a summary to its stream', async () => {
    const stream = new MemoryStream();
    const host = new PluginHost([progressReporterPlugin({ baseUrl: 'http://api.test', stream })]);
    await host.setup();
    const run: SuiteRun = {
      results: [
        { name: 'a', status: 'PASSED', elapsedTime: 0.01 },
        { name: 'b', status: 'FAILED', elapsedTime: 0.03, errorMsg: 'boom' },
      ],
      passed: 1,
      failed: 1,
      totalElapsedTime: 0.05,
    };
    await host.dispatchRunStart([{ name: 'a' }, { name: 'b' }]);
    await host.dispatchTestEnd({ name: 'a' }, run.results[0]);
    await host.dispatchTestEnd({ name: 'b' }, run.results[1]);
    await host.dispatchRunEnd(run);

    const lines = stream.text.split('\n');
    assert.equal(lines[0], '🚀 Running 2 tests against http://api.test');
    assert.ok(stream.text.includes('\r\u001b[31m  [❌] b: boom\u001b[39m\n'));
    assert.ok(lines.includes('✨ Tests completed: 1/2 passed'));
    assert.ok(lines.includes('⏱️  Latency: min 10.00ms; avg 20.00ms; max 30.00ms'));
  });
});
