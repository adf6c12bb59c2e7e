import type { SuiteRun, TestCase, TestResult } from './types.js';

export interface PluginContext {
  // Network Phase: Transform the native Request object before execution
  onFetch(callback: (req: Request) => Promise<Request> | Request): void;

  // Execution Lifecycle
  onRunStart(callback: (cases: readonly TestCase[]) => Promise<void> | void): void;
  onRunEnd(callback: (run: SuiteRun) => Promise<void> | void): void;

  // Test Granularity
  onTestStart(callback: (test: TestCase, index: number) => Promise<void> | void): void;
  onTestEnd(callback: (test: TestCase, result: TestResult) => Promise<void> | void): void;
}

export interface Plugin {
  name: string;
  setup: (ctx: PluginContext) => void | Promise<void>;
}
