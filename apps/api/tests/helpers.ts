/**
 * Shared test helpers for API tests: request/response doubles and a fake engine.
 */

import { Readable } from 'node:stream';
import type { IncomingMessage, ServerResponse } from 'node:http';
import { vi } from 'vitest';
import type { MatchReport, PlagiarismEngine } from '@textguard/similarity';

export interface MockReqOptions {
  headers?: Record<string, string>;
  body?: string | Buffer;
}

export function createMockReq(method: string, url = '', options: MockReqOptions = {}): IncomingMessage {
  const chunks = options.body === undefined ? [] : [Buffer.from(options.body)];
  const stream = Readable.from(chunks);
  return Object.assign(stream, {
    method,
    url,
    headers: options.headers ?? {},
    socket: { remoteAddress: '127.0.0.1' },
  }) as unknown as IncomingMessage;
}

export type MockRes = ServerResponse & {
  _body: string;
  _statusCode: number;
  _headers: Record<string, string>;
  json(): Record<string, unknown>;
};

export function createMockRes(): MockRes {
  const res = {
    statusCode: 200,
    writableEnded: false,
    _body: '',
    _statusCode: 200,
    _headers: {} as Record<string, string>,
    setHeader(name: string, value: string) {
      this._headers[name.toLowerCase()] = value;
    },
    end(body?: string) {
      this._body = body ?? '';
      this._statusCode = this.statusCode;
      this.writableEnded = true;
    },
    json() {
      return JSON.parse(this._body) as Record<string, unknown>;
    },
  } as unknown as MockRes;
  return res;
}

export function sampleReport(overrides: Partial<MatchReport> = {}): MatchReport {
  return {
    submissionId: '11111111-1111-4111-8111-111111111111',
    reportId: '22222222-2222-4222-8222-222222222222',
    score: 0.5,
    percent: 50,
    matches: [],
    candidatesCount: 1,
    acceptedCount: 1,
    queryShingles: 6,
    semanticUsed: false,
    crawl: {
      discovered: 0,
      fetched: 0,
      cached: 0,
      blocked: 0,
      failed: 0,
      tooShort: 0,
      skipped: 0,
      discoveryFallback: false,
      partial: false,
    },
    elapsedMs: 3,
    ...overrides,
  };
}

export function createFakeEngine() {
  const engine = {
    checkText: vi.fn().mockResolvedValue(sampleReport()),
    checkDocument: vi.fn().mockResolvedValue(sampleReport()),
    indexDocument: vi.fn().mockResolvedValue('33333333-3333-4333-8333-333333333333'),
    clearCorpus: vi.fn().mockResolvedValue({ pagesRemoved: 4 }),
    listCorpus: vi.fn().mockResolvedValue([]),
    listSubmissions: vi.fn().mockResolvedValue([]),
    getReport: vi.fn().mockResolvedValue(null),
    ping: vi.fn().mockResolvedValue(true),
    stats: vi.fn().mockReturnValue({ documents: 4, bands: 25, rows: 5, numPerm: 128, fallbacks: [] }),
  };
  return { engine, asEngine: engine as unknown as PlagiarismEngine };
}
