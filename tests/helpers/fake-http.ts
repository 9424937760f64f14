/**
 * axios instance backed by an in-process adapter, for the solver client tests.
 */

import axios, { type AxiosInstance, type AxiosResponse, type InternalAxiosRequestConfig } from 'axios';

export interface RecordedRequest {
  method: string;
  url: string;
  params: unknown;
  /** JSON bodies parsed, form bodies as a plain object */
  body: unknown;
}

export type FakeReply = { status?: number; data: unknown } | Error;

export type Responder = (request: RecordedRequest) => FakeReply;

function parseBody(data: unknown): unknown {
  if (typeof data !== 'string') return data;
  try {
    return JSON.parse(data);
  } catch {
    return Object.fromEntries(new URLSearchParams(data));
  }
}

export function fakeHttp(responder: Responder): { http: AxiosInstance; requests: RecordedRequest[] } {
  const requests: RecordedRequest[] = [];
  const http = axios.create({
    validateStatus: () => true,
    adapter: async (config: InternalAxiosRequestConfig): Promise<AxiosResponse> => {
      const request: RecordedRequest = {
        method: (config.method ?? 'get').toLowerCase(),
        url: config.url ?? '',
        params: config.params,
        body: parseBody(config.data),
      };
      requests.push(request);
      const reply = responder(request);
      if (reply instanceof Error) throw reply;
      return { data: reply.data, status: reply.status ?? 200, statusText: 'OK', headers: {}, config };
    },
  });
  return { http, requests };
}

/** Replies from a queue per path; the last reply for a path repeats */
export function routeReplies(routes: Record<string, FakeReply[]>): Responder {
  const cursors = new Map<string, number>();
  return (request) => {
    const queue = routes[request.url];
    if (!queue || queue.length === 0) return { status: 404, data: { error: `no route for ${request.url}` } };
    const index = cursors.get(request.url) ?? 0;
    cursors.set(request.url, index + 1);
    return queue[Math.min(index, queue.length - 1)];
  };
}
