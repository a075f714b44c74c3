/**
 * FILE PURPOSE: PostgreSQL implementation of the engine's PersistentStore
 *
 * HOW: Drizzle query builder over the pages/submissions/reports tables.
 *      upsertPage is a single INSERT ... ON CONFLICT (url) DO UPDATE, so a
 *      page row is either fully replaced or untouched and keeps its id.
 */

import { count, desc, eq, inArray, sql } from 'drizzle-orm';
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
} from '@textguard/similarity';
import type { Database } from '../db/connection.js';
import { pages, reports, submissions } from '../db/schema.js';
import type { PageRow } from '../db/schema.js';

const pageSummaryColumns = {
  id: pages.id,
  url: pages.url,
  contentHash: pages.contentHash,
  wordCount: pages.wordCount,
  fetchedAt: pages.fetchedAt,
  domain: pages.domain,
  label: pages.label,
  origin: pages.origin,
};

function toPageRecord(row: PageRow): PageRecord {
  return {
    id: row.id,
    url: row.url,
    text: row.text,
    contentHash: row.contentHash,
    sketch: row.sketch,
    wordCount: row.wordCount,
    fetchedAt: row.fetchedAt,
    domain: row.domain,
    label: row.label,
    origin: row.origin,
  };
}

export class DrizzleStore implements PersistentStore {
  constructor(
    private readonly db: Database,
    private readonly closeFn: () => Promise<void> = async () => {},
  ) {}

  // ─── Pages ───

  async upsertPage(input: PageInput): Promise<PageRecord> {
    const [row] = await this.db
      .insert(pages)
      .values(input)
      .onConflictDoUpdate({
        target: pages.url,
        set: {
          text: input.text,
          contentHash: input.contentHash,
          sketch: input.sketch,
          wordCount: input.wordCount,
          fetchedAt: input.fetchedAt,
          domain: input.domain,
          label: input.label,
          origin: input.origin,
        },
      })
      .returning();
    if (!row) throw new Error(`Upsert of ${input.url} returned no row`);
    return toPageRecord(row);
  }

  async getPage(id: string): Promise<PageRecord | null> {
    const [row] = await this.db.select().from(pages).where(eq(pages.id, id)).limit(1);
    return row ? toPageRecord(row) : null;
  }

  async getPageByUrl(url: string): Promise<PageRecord | null> {
    const [row] = await this.db.select().from(pages).where(eq(pages.url, url)).limit(1);
    return row ? toPageRecord(row) : null;
  }

  async getPages(ids: readonly string[]): Promise<PageRecord[]> {
    if (ids.length === 0) return [];
    const rows = await this.db.select().from(pages).where(inArray(pages.id, [...ids]));
    return rows.map(toPageRecord);
  }

  async listPageIds(): Promise<string[]> {
    const rows = await this.db.select({ id: pages.id }).from(pages);
    return rows.map((r) => r.id);
  }

  async listPages(limit: number, offset: number): Promise<PageSummary[]> {
    return this.db
      .select(pageSummaryColumns)
      .from(pages)
      .orderBy(desc(pages.fetchedAt))
      .limit(limit)
      .offset(offset);
  }

  async countPages(): Promise<number> {
    const [row] = await this.db.select({ total: count() }).from(pages);
    return row?.total ?? 0;
  }

  async clearPages(): Promise<number> {
    const removed = await this.db.delete(pages).returning({ id: pages.id });
    return removed.length;
  }

  // ─── Audit records ───

  async createSubmission(input: SubmissionInput): Promise<SubmissionRecord> {
    const [row] = await this.db.insert(submissions).values(input).returning();
    if (!row) throw new Error('Submission insert returned no row');
    return row;
  }

  async listSubmissions(limit: number): Promise<SubmissionSummary[]> {
    return this.db
      .select({
        id: submissions.id,
        userRef: submissions.userRef,
        score: submissions.score,
        filename: submissions.filename,
        createdAt: submissions.createdAt,
      })
      .from(submissions)
      .orderBy(desc(submissions.createdAt))
      .limit(limit);
  }

  async createReport(input: ReportInput): Promise<ReportRecord> {
    const [row] = await this.db.insert(reports).values(input).returning();
    if (!row) throw new Error('Report insert returned no row');
    return row;
  }

  async getReport(id: string): Promise<ReportRecord | null> {
    const [row] = await this.db.select().from(reports).where(eq(reports.id, id)).limit(1);
    return row ?? null;
  }

  // ─── Lifecycle ───

  async ping(): Promise<boolean> {
    try {
      await this.db.execute(sql`SELECT 1`);
      return true;
    } catch (err) {
      process.stderr.write(`WARN: Database ping failed: ${err}\n`);
      return false;
    }
  }

  async close(): Promise<void> {
    await this.closeFn();
  }
}
