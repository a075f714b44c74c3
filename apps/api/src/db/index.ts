/**
 * FILE PURPOSE: Barrel export for database layer
 */

export { db, closeDatabase } from './connection.js';
export type { Database } from './connection.js';
export { pages, submissions, reports } from './schema.js';
export type { PageRow, SubmissionRow, ReportRow } from './schema.js';
