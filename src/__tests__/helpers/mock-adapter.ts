/**
 * In-process axios adapter: answers requests from a handler instead of the
 * network and records what was sent.
 */

import axios, {
  AxiosError,
  AxiosHeaders,
  CanceledError,
  type AxiosAdapter,
  type AxiosResponse,
  type InternalAxiosRequestConfig,
} from 'axios';

export interface MockReply {
  status?: number;
  body?: unknown;
  headers?: Record<string, string>;
  /** Transport failure with this axios error code, e.g. ECONNRESET */
  networkError?: string;
  /** Never answer; rejects only when the request is aborted */
  hang?: boolean;
}

export interface RecordedRequest {
  url: URL;
  authorization: string | undefined;
  userAgent: string | undefined;
}

export type MockHandler = (request: RecordedRequest) => MockReply;

function headerValue(config: InternalAxiosRequestConfig, name: string): string | undefined {
  const value = config.headers.get(name);
  return typeof value === 'string' ? value : undefined;
}

export function createMockAdapter(handler: MockHandler): { adapter: AxiosAdapter; requests: RecordedRequest[] } {
  const requests: RecordedRequest[] = [];

  const adapter: AxiosAdapter = async (config: InternalAxiosRequestConfig) => {
    const request: RecordedRequest = {
      url: new URL(axios.getUri(config)),
      authorization: headerValue(config, 'Authorization'),
      userAgent: headerValue(config, 'User-Agent'),
    };
    requests.push(request);

    const reply = handler(request);

    if (reply.hang) {
      return new Promise<AxiosResponse>((_resolve, reject) => {
        const signal = config.signal;
        const onAbort = () => reject(new CanceledError('canceled'));
        if (signal?.aborted) onAbort();
        signal?.addEventListener?.('abort', onAbort);
      });
    }

    if (reply.networkError) {
      throw new AxiosError(`network failure ${reply.networkError}`, reply.networkError, config, {});
    }

    const status = reply.status ?? 200;
    const response: AxiosResponse = {
      data: reply.body,
      status,
      statusText: String(status),
      headers: new AxiosHeaders(reply.headers ?? {}),
      config,
      request: {},
    };

    if (status >= 400) {
      throw new AxiosError(
        `Request failed with status code ${status}`,
        status >= 500 ? AxiosError.ERR_BAD_RESPONSE : AxiosError.ERR_BAD_REQUEST,
        config,
        {},
        response
      );
    }

    return response;
  };

  return { adapter, requests };
}

/** Replies in order; the last one repeats once the list runs out. */
export function inSequence(...replies: MockReply[]): MockHandler {
  let index = 0;
  return () => {
    const reply = replies[Math.min(index, replies.length - 1)];
    index++;
    return reply ?? { status: 500 };
  };
}

export function envelope(data: unknown, pagination?: Record<string, unknown>, status = 200): Record<string, unknown> {
  return { status, message: status === 200 ? 'OK' : 'Error', data, ...(pagination ? { pagination } : {}) };
}
