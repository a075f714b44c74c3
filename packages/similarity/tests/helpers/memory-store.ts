/**
 * In-memory PersistentStore for engine tests. Mirrors the PostgreSQL store:
 * upsert keyed by url keeps the page id, submissions and reports append.
 */

import { randomUUID } from 'node:crypto';
import type {
  PageInput,
  PageRecord,
  PageSummary,
  PersistentStore,
  ReportInput,
  ReportRecord,
  SubmissionInput,
  SubmissionRecord,
  SubmissionSummary,
} from '../../src/store/types.js';

export class MemoryStore implements PersistentStore {
  readonly pages = new Map<string, PageRecord>();
  readonly submissions: SubmissionRecord[] = [];
  readonly reports: ReportRecord[] = [];
  failSubmissions = false;
  closed = false;

  async upsertPage(input: PageInput): Promise<PageRecord> {
    const existing = [...this.pages.values()].find((p) => p.url === input.url);
    const record: PageRecord = { ...input, id: existing?.id ?? randomUUID(), sketch: Uint32Array.from(input.sketch) };
    this.pages.set(record.id, record);
    return record;
  }

  async getPage(id: string): Promise<PageRecord | null> {
    return this.pages.get(id) ?? null;
  }

  async getPageByUrl(url: string): Promise<PageRecord | null> {
    return [...this.pages.values()].find((p) => p.url === url) ?? null;
  }

  async getPages(ids: readonly string[]): Promise<PageRecord[]> {
    return ids.flatMap((id) => {
      const page = this.pages.get(id);
      return page ? [page] : [];
    });
  }

  async listPageIds(): Promise<string[]> {
    return [...this.pages.keys()];
  }

  async listPages(limit: number, offset: number): Promise<PageSummary[]> {
    return [...this.pages.values()]
      .sort((a, b) => b.fetchedAt.getTime() - a.fetchedAt.getTime())
      .slice(offset, offset + limit)
      .map(({ text: _text, sketch: _sketch, ...summary }) => summary);
  }

  async countPages(): Promise<number> {
    return this.pages.size;
  }

  async clearPages(): Promise<number> {
    const removed = this.pages.size;
    this.pages.clear();
    return removed;
  }

  async createSubmission(input: SubmissionInput): Promise<SubmissionRecord> {
    if (this.failSubmissions) throw new Error('connection refused');
    const record: SubmissionRecord = { ...input, id: randomUUID(), createdAt: new Date() };
    this.submissions.push(record);
    return record;
  }

  async listSubmissions(limit: number): Promise<SubmissionSummary[]> {
    return this.submissions
      .slice(-limit)
      .reverse()
      .map(({ text: _text, sketch: _sketch, ...summary }) => summary);
  }

  async createReport(input: ReportInput): Promise<ReportRecord> {
    const record: ReportRecord = { ...input, id: randomUUID(), createdAt: new Date() };
    this.reports.push(record);
    return record;
  }

  async getReport(id: string): Promise<ReportRecord | null> {
    return this.reports.find((r) => r.id === id) ?? null;
  }

  async ping(): Promise<boolean> {
    return !this.closed;
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}
