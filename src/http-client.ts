import type { PluginHost } from './plugin-host.js';
import type { HttpMethod, JsonValue } from './types.js';

export type FetchLike = (request: Request, init?: { signal?: AbortSignal }) => Promise<Response>;

export interface HttpRequest {
  method: HttpMethod;
  /** Absolute url, sent as given */
  url: string;
  body?: JsonValue;
}

export interface HttpResponse {
  status: number;
  text: string;
}

export class HttpClient {
  private timeout: number;
  private headers: Record<string, string>;
  private pluginHost?: PluginHost;
  private fetchImpl: FetchLike;

  constructor(config: {
    timeout: number;
    pluginHost?: PluginHost;
    fetch?: FetchLike;
  }) {
    this.timeout = config.timeout;
    this.pluginHost = config.pluginHost;
    this.fetchImpl = config.fetch ?? ((request, init) => fetch(request, init));
    this.headers = {};
  }

  public setHeader(key: string, value: string): void {
    this.headers[key] = value;
  }

  public async request(options: HttpRequest): Promise<HttpResponse> {
    const headers: Record<string, string> = { ...this.headers };
    let body: string | undefined;
    if (options.body !== undefined) {
      body = JSON.stringify(options.body);
      headers['Content-Type'] = 'application/json';
    }

    const initialRequest = new Request(options.url, {
      method: options.method,
      headers,
      body,
    });

    const transformedRequest = this.pluginHost
      ? await this.pluginHost.transformRequest(initialRequest)
      : initialRequest;

    const controller = new AbortController();
    const timeout = setTimeout(() => {
      controller.abort();
    }, this.timeout);

    try {
      const response = await this.fetchImpl(transformedRequest, {
        signal: controller.signal,
      });
      const text = await response.text();
      return { status: response.status, text };
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        throw new Error(`Request timed out after ${this.timeout}ms`);
      }
      throw error;
    } finally {
      clearTimeout(timeout);
    }
  }
}
