import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { mkdtemp, readFile } from 'fs/promises';
import { tmpdir } from 'os';
import path from 'path';
import { parseFormat, render, successPercentage, writeReport } from '../reporter.js';
import type { SuiteRun } from '../types.js';
import { MemoryStream } from './stub-fetch.js';

const run: SuiteRun = {
  results: [
    { name: 't1', status: 'PASSED', elapsedTime: 0.5 },
    { name: 't2', status: 'FAILED', elapsedTime: 0.25, errorMsg: "Expected key 'id' not found." },
  ],
  passed: 1,
  failed: 1,
  totalElapsedTime: 0.75,
};

const emptyRun: SuiteRun = { results: [], passed: 0, failed: 0, totalElapsedTime: 0 };

const expectedText = [
  '***',
  'TEST SUMMARY',
  '------------',
  'Tests passed: 1',
  'Tests failed: 1',
  'Success percentage : 50.00%',
  'Total elapsed time: 0.750 seconds',
  '***',
  't1',
  '\tStatus:PASSED',
  '\tElapsed time: 0.500000',
  't2',
  '\tStatus:FAILED',
  '\tElapsed time: 0.250000',
  "\tError message: Expected key 'id' not found.",
  '',
].join('\n');

describe('successPercentage', () => {
  it('is zero when no tests ran', () => {
    assert.equal(successPercentage(emptyRun), 0);
  });

  it('is the share of passed tests', () => {
    assert.equal(successPercentage({ ...emptyRun, passed: 3, failed: 1 }), 75);
  });
});

describe('render', () => {
  it('renders the text layout', () => {
    assert.equal(render(run, 'text'), expectedText);
  });

  it('rounds the text percentage to two decimals', () => {
    const output = render({ ...emptyRun, passed: 2, failed: 1 }, 'text');
    assert.equal(output.split('\n')[5], 'Success percentage : 66.67%');
  });

  it('renders an empty run without dividing by zero', () => {
    const output = render(emptyRun, 'text');
    assert.equal(output.split('\n')[5], 'Success percentage : 0.00%');
    const report = JSON.parse(render(emptyRun, 'json'));
    assert.equal(report.summary.success_percentage, 0);
    assert.deepEqual(report.test_results, []);
  });

  it('renders the JSON document with error_msg only on failures', () => {
    const report = JSON.parse(render(run, 'json'));
    assert.deepEqual(report, {
      summary: { passed: 1, failed: 1, success_percentage: 50, total_elapsed_time: 0.75 },
      test_results: [
        { name: 't1', status: 'PASSED', elapsed_time: 0.5 },
        { name: 't2', status: 'FAILED', elapsed_time: 0.25, error_msg: "Expected key 'id' not found." },
      ],
    });
  });

  it('indents JSON output by four spaces', () => {
    assert.equal(render(emptyRun, 'json').split('\n')[1], '    "summary": {');
  });

  it('accepts the format in any case', () => {
    assert.equal(render(run, 'TEXT'), expectedText);
    assert.equal(render(run, 'Json'), render(run, 'json'));
  });

  it('is deterministic', () => {
    assert.equal(render(run, 'json'), render(run, 'json'));
    assert.equal(render(run, 'text'), render(run, 'text'));
  });

  it('rejects unknown formats', () => {
    assert.throws(() => parseFormat('xml'), { message: "Unknown output format 'xml'. Use json or text." });
  });
});

describe('writeReport', () => {
  it('writes to a stream', async () => {
    const stream = new MemoryStream();
    await writeReport(run, 'text', stream);
    assert.equal(stream.text, expectedText);
  });

  it('writes to a file', async () => {
    const dir = await mkdtemp(path.join(tmpdir(), 'jsoncheck-report-'));
    const file = path.join(dir, 'report.json');
    await writeReport(run, 'json', file);
    assert.equal(await readFile(file, 'utf8'), render(run, 'json'));
  });

  it('falls back to the fallback stream when the file cannot be opened', async (t) => {
    const errors = t.mock.method(console, 'error', () => {});
    const dir = await mkdtemp(path.join(tmpdir(), 'jsoncheck-report-'));
    const file = path.join(dir, 'missing', 'report.txt');
    const fallback = new MemoryStream();
    await writeReport(run, 'text', file, fallback);
    assert.equal(fallback.text, expectedText);
    assert.equal(errors.mock.callCount(), 1);
  });
});

