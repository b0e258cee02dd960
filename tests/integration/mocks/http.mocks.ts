/**
 * In-process HTTP stand-in for the axios-based providers
 */

import axios, { AxiosError, AxiosInstance, AxiosResponse, CanceledError, InternalAxiosRequestConfig } from 'axios';

export interface MockRequest {
  method: string;
  url: string;
  params: Record<string, unknown>;
  data: unknown;
  header: (name: string) => string | undefined;
  responseType?: string;
  signal?: InternalAxiosRequestConfig['signal'];
}

export interface MockReply {
  status: number;
  data?: unknown;
  headers?: Record<string, string>;
}

export type MockHandler = (request: MockRequest) => MockReply | Promise<MockReply>;

export interface MockHttp {
  http: AxiosInstance;
  requests: MockRequest[];
}

function parseBody(data: unknown): unknown {
  if (typeof data !== 'string') return data;
  try {
    return JSON.parse(data);
  } catch {
    return data;
  }
}

/**
 * Create an axios instance whose requests are answered by `handler`.
 * Non-2xx replies reject with an AxiosError as the real adapters do.
 */
export function createMockHttp(handler: MockHandler): MockHttp {
  const requests: MockRequest[] = [];

  const http = axios.create({
    adapter: async (config: InternalAxiosRequestConfig): Promise<AxiosResponse> => {
      if (config.signal?.aborted) {
        throw new CanceledError(undefined, undefined, config);
      }

      const request: MockRequest = {
        method: (config.method ?? 'get').toUpperCase(),
        url: config.url ?? '',
        params: { ...config.params },
        data: parseBody(config.data),
        header: name => {
          const value = config.headers.get(name);
          return typeof value === 'string' ? value : undefined;
        },
        responseType: config.responseType,
        signal: config.signal,
      };
      requests.push(request);

      const reply = await handler(request);
      const response: AxiosResponse = {
        data: reply.data ?? null,
        status: reply.status,
        statusText: String(reply.status),
        headers: reply.headers ?? {},
        config,
      };

      if (reply.status < 200 || reply.status >= 300) {
        throw new AxiosError(
          `Request failed with status code ${reply.status}`,
          reply.status >= 500 ? AxiosError.ERR_BAD_RESPONSE : AxiosError.ERR_BAD_REQUEST,
          config,
          undefined,
          response
        );
      }

      return response;
    },
  });

  return { http, requests };
}

/**
 * Reply to a request with a network failure (no response)
 */
export function networkError(config?: InternalAxiosRequestConfig): AxiosError {
  return new AxiosError('connect ECONNREFUSED 127.0.0.1:443', 'ECONNREFUSED', config);
}
