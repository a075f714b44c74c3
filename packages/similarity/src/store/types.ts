/**
 * FILE PURPOSE: Persistent store contract for pages, submissions and reports
 *
 * WHY: The engine needs durable records that survive restart, but not a
 *      particular database. apps/api implements this over PostgreSQL; tests
 *      use an in-memory implementation.
 *
 * CONTRACT:
 *   - upsertPage is a single atomic statement keyed by url: a page is either
 *     fully replaced (text, hash, sketch, timestamp) or untouched.
 *   - Submissions and reports are append-only.
 *   - clearPages removes pages only; submissions and reports are audit records.
 */

import type { Sketch } from '../sketch/minhash.js';
import type { Match, PageOrigin } from '../scoring/types.js';

export interface PageRecord {
  id: string;
  url: string;
  text: string;
  contentHash: string;
  sketch: Sketch;
  wordCount: number;
  fetchedAt: Date;
  domain: string | null;
  label: string | null;
  origin: PageOrigin;
}

export type PageInput = Omit<PageRecord, 'id'>;

export type PageSummary = Omit<PageRecord, 'text' | 'sketch'>;

export interface SubmissionRecord {
  id: string;
  userRef: string | null;
  text: string;
  sketch: Sketch;
  score: number;
  filename: string | null;
  createdAt: Date;
}

export type SubmissionInput = Omit<SubmissionRecord, 'id' | 'createdAt'>;

export type SubmissionSummary = Omit<SubmissionRecord, 'text' | 'sketch'>;

export interface ReportRecord {
  id: string;
  submissionId: string;
  matches: Match[];
  createdAt: Date;
}

export type ReportInput = Omit<ReportRecord, 'id' | 'createdAt'>;

export interface PersistentStore {
  upsertPage(input: PageInput): Promise<PageRecord>;
  getPage(id: string): Promise<PageRecord | null>;
  getPageByUrl(url: string): Promise<PageRecord | null>;
  getPages(ids: readonly string[]): Promise<PageRecord[]>;
  listPageIds(): Promise<string[]>;
  listPages(limit: number, offset: number): Promise<PageSummary[]>;
  countPages(): Promise<number>;
  /** Returns the number of pages removed. */
  clearPages(): Promise<number>;

  createSubmission(input: SubmissionInput): Promise<SubmissionRecord>;
  listSubmissions(limit: number): Promise<SubmissionSummary[]>;
  createReport(input: ReportInput): Promise<ReportRecord>;
  getReport(id: string): Promise<ReportRecord | null>;

  ping(): Promise<boolean>;
  close(): Promise<void>;
}
