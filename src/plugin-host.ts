import type { Plugin, PluginContext } from './plugin-api.js';
import type { SuiteRun, TestCase, TestResult } from './types.js';

type Hook<Args extends unknown[]> = (...args: Args) => Promise<void> | void;

export class PluginHost {
  private plugins: Plugin[] = [];

  // Callbacks
  private onFetchCbs: ((req: Request) => Promise<Request> | Request)[] = [];
  private onRunStartCbs: Hook<[readonly TestCase[]]>[] = [];
  private onRunEndCbs: Hook<[SuiteRun]>[] = [];
  private onTestStartCbs: Hook<[TestCase, number]>[] = [];
  private onTestEndCbs: Hook<[TestCase, TestResult]>[] = [];

  public context: PluginContext = {
    onFetch: (callback) => {
      this.onFetchCbs.push(callback);
    },
    onRunStart: (callback) => {
      this.onRunStartCbs.push(callback);
    },
    onRunEnd: (callback) => {
      this.onRunEndCbs.push(callback);
    },
    onTestStart: (callback) => {
      this.onTestStartCbs.push(callback);
    },
    onTestEnd: (callback) => {
      this.onTestEndCbs.push(callback);
    },
  };

  constructor(plugins: Plugin[] = []) {
    this.plugins = plugins;
  }

  public async setup(): Promise<void> {
    for (const plugin of this.plugins) {
      await plugin.setup(this.context);
    }
  }

  public async transformRequest(req: Request): Promise<Request> {
    let result = req;
    for (const cb of this.onFetchCbs) {
      result = await cb(result);
    }
    return result;
  }

  public async dispatchRunStart(cases: readonly TestCase[]): Promise<void> {
    for (const cb of this.onRunStartCbs) await cb(cases);
  }

  public async dispatchTestStart(test: TestCase, index: number): Promise<void> {
    for (const cb of this.onTestStartCbs) await cb(test, index);
  }

  public async dispatchTestEnd(test: TestCase, result: TestResult): Promise<void> {
    for (const cb of this.onTestEndCbs) await cb(test, result);
  }

  public async dispatchRunEnd(run: SuiteRun): Promise<void> {
    for (const cb of this.onRunEndCbs) await cb(run);
  }
}
