/**
 * FILE PURPOSE: Job payloads for the corpus seeding queue
 */

export const CorpusJobType = {
  INDEX_URL: 'index-url',
} as const;

/** Crawl one URL into the corpus. */
export interface IndexUrlJobData {
  type: typeof CorpusJobType.INDEX_URL;
  url: string;
}

export type CorpusJobData = IndexUrlJobData;
