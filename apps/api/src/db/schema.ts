/**
 * FILE PURPOSE: Database schema for pages, submissions and reports
 *
 * WHY: The store survives restarts; the in-memory banded index is rebuilt
 *      from the snapshot and reconciled against the pages table at init.
 *
 * HOW: Drizzle ORM schema definitions. Run `npm run db:push -w @textguard/api`
 *      to sync to the database.
 *
 * Tables: pages, submissions, reports.
 */

import {
  pgTable,
  uuid,
  text,
  integer,
  doublePrecision,
  timestamp,
  index,
  jsonb,
  customType,
} from 'drizzle-orm/pg-core';
import { decodeSketch, encodeSketch } from '@textguard/similarity';
import type { Match, PageOrigin, Sketch } from '@textguard/similarity';

// ─── Sketch column: 4 bytes per slot, little-endian ─────────────────────────
const sketch = customType<{ data: Sketch; driverData: Buffer }>({
  dataType() {
    return 'bytea';
  },
  toDriver(value: Sketch): Buffer {
    return encodeSketch(value);
  },
  fromDriver(value: Buffer): Sketch {
    return decodeSketch(value);
  },
});

// ─── Table 1: pages ─────────────────────────────────────────────────────────
// Corpus documents and crawled web pages. url is the upsert key; corpus
// documents use `corpus:<label>`.
export const pages = pgTable(
  'pages',
  {
    id: uuid('id').defaultRandom().primaryKey(),
    url: text('url').notNull().unique(),
    text: text('text').notNull(),
    contentHash: text('content_hash').notNull(),
    sketch: sketch('sketch').notNull(),
    wordCount: integer('word_count').notNull(),
    fetchedAt: timestamp('fetched_at', { withTimezone: true }).notNull(),
    domain: text('domain'),
    label: text('label'),
    origin: text('origin').$type<PageOrigin>().notNull(),
  },
  (table) => [
    index('idx_pages_fetched_at').on(table.fetchedAt),
    index('idx_pages_content_hash').on(table.contentHash),
  ],
);

// ─── Table 2: submissions ───────────────────────────────────────────────────
// Every checked text, append-only. Not part of the matchable corpus.
export const submissions = pgTable(
  'submissions',
  {
    id: uuid('id').defaultRandom().primaryKey(),
    userRef: text('user_ref'),
    text: text('text').notNull(),
    sketch: sketch('sketch').notNull(),
    score: doublePrecision('score').notNull(),
    filename: text('filename'),
    createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => [
    index('idx_submissions_created').on(table.createdAt),
    index('idx_submissions_user').on(table.userRef),
  ],
);

// ─── Table 3: reports ───────────────────────────────────────────────────────
export const reports = pgTable(
  'reports',
  {
    id: uuid('id').defaultRandom().primaryKey(),
    submissionId: uuid('submission_id').notNull().references(() => submissions.id),
    matches: jsonb('matches').$type<Match[]>().notNull(),
    createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => [
    index('idx_reports_submission').on(table.submissionId),
  ],
);

export type PageRow = typeof pages.$inferSelect;
export type SubmissionRow = typeof submissions.$inferSelect;
export type ReportRow = typeof reports.$inferSelect;
