import { AxiosError } from 'axios';
import type { AxiosAdapter, AxiosResponse, InternalAxiosRequestConfig } from 'axios';

export interface RecordedRequest {
  method: string;
  baseURL?: string;
  url: string;
  headers: Record<string, unknown>;
  body: unknown;
}

export type FakeReply =
  | { status: number; data?: unknown }
  | { networkError: string };

interface FakeRoute {
  method: string;
  url: string | RegExp;
  replies: FakeReply[];
}

/**
 * In-process stand-in for the remote APIs. Plugs into axios through the
 * `adapter` option and records every request it sees. Replies queued for
 * a route are consumed in order; the last one repeats.
 */
export class FakeTransport {
  readonly requests: RecordedRequest[] = [];
  private readonly routes: FakeRoute[] = [];

  on(method: string, url: string | RegExp, ...replies: FakeReply[]): this {
    this.routes.push({ method: method.toUpperCase(), url, replies });
    return this;
  }

  calls(method: string, url: string | RegExp): RecordedRequest[] {
    return this.requests.filter((r) => r.method === method.toUpperCase() && matches(url, r.url));
  }

  readonly adapter: AxiosAdapter = async (config: InternalAxiosRequestConfig) => {
    const request: RecordedRequest = {
      method: (config.method ?? 'get').toUpperCase(),
      baseURL: config.baseURL,
      url: config.url ?? '',
      headers: config.headers.toJSON(),
      body: typeof config.data === 'string' ? JSON.parse(config.data) : config.data
    };
    this.requests.push(request);

    const route = this.routes.find((r) => r.method === request.method && matches(r.url, request.url));
    if (!route) {
      throw new AxiosError(`No fake route for ${request.method} ${request.url}`, AxiosError.ERR_NETWORK, config);
    }

    const reply = route.replies.length > 1 ? route.replies.shift() : route.replies[0];
    if (!reply) {
      throw new AxiosError(`No reply queued for ${request.method} ${request.url}`, AxiosError.ERR_NETWORK, config);
    }

    if ('networkError' in reply) {
      throw new AxiosError(reply.networkError, AxiosError.ERR_NETWORK, config);
    }

    const response: AxiosResponse = {
      data: reply.data ?? {},
      status: reply.status,
      statusText: String(reply.status),
      headers: {},
      config,
      request: {}
    };

    if (reply.status < 200 || reply.status >= 300) {
      throw new AxiosError(
        `Request failed with status code ${reply.status}`,
        AxiosError.ERR_BAD_RESPONSE,
        config,
        {},
        response
      );
    }

    return response;
  };
}

function matches(pattern: string | RegExp, url: string): boolean {
  return typeof pattern === 'string' ? pattern === url : pattern.test(url);
}

/** An OpenAI message list holding one assistant reply */
export const assistantReply = (text: string) => ({
  object: 'list',
  data: [
    {
      id: 'msg_reply',
      role: 'assistant',
      content: [{ type: 'text', text: { value: text, annotations: [] } }]
    }
  ]
});

export const run = (status: string, id = 'run_1') => ({ id, object: 'thread.run', status });
