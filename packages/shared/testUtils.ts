import type { PlannerRequest, PlannerResponse } from './http';

export interface MockRes extends PlannerResponse {
  statusCode: number;
  body: unknown;
  headers: Record<string, string>;
  setHeader(name: string, value: string): MockRes;
  status(statusCode: number): MockRes;
}

export function createMockRes(): MockRes {
  const headers: Record<string, string> = {};
  const res: MockRes = {
    statusCode: 200,
    body: undefined,
    headers,
    setHeader(name, value) {
      headers[name.toLowerCase()] = value;
      return res;
    },
    status(code) {
      res.statusCode = code;
      return res;
    },
    json(payload) {
      res.body = payload;
    },
    send(payload) {
      res.body = payload;
    },
  };
  return res;
}

export function createMockReq(overrides: { method?: string; body?: unknown; url?: string } = {}): PlannerRequest {
  return {
    method: overrides.method ?? 'POST',
    url: overrides.url ?? '/',
    body: overrides.body,
    query: {},
  };
}
