import axios, { AxiosInstance } from 'axios';

export interface RecordedRequest {
  method?: string;
  url?: string;
  params?: unknown;
  body?: unknown;
}

export interface StubReply {
  status?: number;
  data: unknown;
}

export type StubResponder = (request: RecordedRequest) => StubReply;

/**
 * Axios instance whose adapter answers in process and records every request
 */
export function createHttpStub(responder: StubResponder): { http: AxiosInstance; requests: RecordedRequest[] } {
  const requests: RecordedRequest[] = [];

  const http = axios.create({
    adapter: async config => {
      const request: RecordedRequest = {
        method: config.method,
        url: config.url,
        params: config.params,
        body: typeof config.data === 'string' ? JSON.parse(config.data) : config.data,
      };
      requests.push(request);

      const reply = responder(request);
      return {
        data: reply.data,
        status: reply.status ?? 200,
        statusText: 'OK',
        headers: {},
        config,
      };
    },
  });

  return { http, requests };
}
