import { AxiosInstance, AxiosRequestConfig } from 'axios';
import type { Logger } from 'pino';
import { DEFAULT_UPSTREAM } from '@/constants/upstream';
import { RawRow } from '@/interfaces/announcement';

export interface FakeCall {
  method: 'GET' | 'POST';
  url: string;
  params: Record<string, string>;
  body?: string;
}

export interface FakeReply {
  status: number;
  data: unknown;
  headers?: Record<string, unknown>;
}

export type FakeHandler = (call: FakeCall) => FakeReply | Error;

/**
 * Stand-in for the session's axios instance. Every call is recorded and
 * answered by `handler`; an Error reply rejects like a network failure.
 */
export function createFakeClient(handler: FakeHandler) {
  const calls: FakeCall[] = [];

  const respond = async (call: FakeCall) => {
    calls.push(call);
    const reply = handler(call);
    if (reply instanceof Error) throw reply;
    return { status: reply.status, data: reply.data, headers: reply.headers ?? {}, config: {} };
  };

  const client = {
    get: jest.fn((url: string, config?: AxiosRequestConfig) =>
      respond({ method: 'GET', url, params: { ...(config?.params ?? {}) } })
    ),
    post: jest.fn((url: string, body?: unknown) =>
      respond({
        method: 'POST',
        url,
        params: {},
        body: typeof body === 'string' ? body : undefined,
      })
    ),
  } as unknown as AxiosInstance;

  return { client, calls };
}

export const createMockLog = () =>
  ({
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  } as unknown as Logger);

/**
 * Upstream-shaped announcement row
 */
export const makeRawRow = (i: number, overrides: RawRow = {}): RawRow => ({
  NEWSID: `news-${i}`,
  SCRIP_CD: 500000 + i,
  S_LONGNAME: `Company ${i}`,
  NEWSSUB: `Headline ${i}`,
  DT_TM: '2025-01-01T10:00:00',
  CATEGORYNAME: 'Company Update',
  ATTACHMENTNAME: `file-${i}.pdf`,
  PDFFLAG: 0,
  ...overrides,
});

export const makeRawRows = (count: number, offset = 0): RawRow[] =>
  Array.from({ length: count }, (_, i) => makeRawRow(offset + i + 1));

export const isDataEndpoint = (url: string) => DEFAULT_UPSTREAM.endpoints.includes(url);

/**
 * Answers warm-up requests with an HTML page and serves `pages[pageno]`
 * from the first endpoint's GET with the first variant. Everything else
 * on the data endpoints gets a non-JSON body.
 */
export const pagedUpstream =
  (pages: Record<number, unknown[]>): FakeHandler =>
  (call) => {
    if (!isDataEndpoint(call.url)) {
      return { status: 200, data: '<html></html>' };
    }
    const isPrimary =
      call.method === 'GET' &&
      call.url === DEFAULT_UPSTREAM.endpoints[0] &&
      call.params.strIsXBRL !== undefined &&
      call.params.strPrevDate === undefined;

    if (!isPrimary) return { status: 200, data: 'blocked' };

    const rows = pages[Number(call.params.pageno)] ?? [];
    return { status: 200, data: JSON.stringify({ Table: rows }) };
  };
