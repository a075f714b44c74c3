import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { Job } from 'bullmq';
import type { JobsOptions, Queue } from 'bullmq';
import { processCorpusJob } from '../src/pipeline/worker.js';
import { corpusJobId, enqueueUrls } from '../src/pipeline/queue.js';
import { parseRedisConnection } from '../src/pipeline/connection.js';
import type { CorpusJobData } from '../src/pipeline/jobs.js';
import { engineFixture } from './helpers/engine.js';
import type { EngineFixture } from './helpers/engine.js';
import { routeFetch, html } from './helpers/fetch-stub.js';

const TEXT = 'one two three four five six seven eight nine ten';

function job(data: CorpusJobData) {
  return { data, log: vi.fn() } as unknown as Job<CorpusJobData> & { log: ReturnType<typeof vi.fn> };
}

describe('processCorpusJob', () => {
  let fx: EngineFixture;

  beforeEach(async () => {
    fx = await engineFixture();
  });

  afterEach(async () => {
    await fx.cleanup();
  });

  it('crawls a URL into the corpus', async () => {
    const fetchImpl = routeFetch({ 'https://site.test/page': () => html(`<main><p>${TEXT}</p></main>`) });
    const engine = fx.create({ fetchImpl });
    await engine.init();

    const result = await processCorpusJob(engine, job({ type: 'index-url', url: 'https://site.test/page' }));

    expect(result).toMatchObject({ type: 'index-url', url: 'https://site.test/page', result: { outcome: 'fetched' } });
    expect(fx.store.pages.size).toBe(1);
  });

  it('reports pages the crawler rejects without failing the job', async () => {
    const engine = fx.create({ fetchImpl: routeFetch({ 'https://site.test/short': () => html('<p>tiny</p>') }) });
    await engine.init();
    const result = await processCorpusJob(engine, job({ type: 'index-url', url: 'https://site.test/short' }));
    expect(result).toEqual({ type: 'index-url', url: 'https://site.test/short', result: { outcome: 'too-short' } });
  });

  it('throws on an unknown job type', async () => {
    const engine = fx.create();
    await engine.init();
    const bogus = { data: { type: 'reindex-all' }, log: vi.fn() } as unknown as Job<CorpusJobData>;
    await expect(processCorpusJob(engine, bogus)).rejects.toThrow('Unknown corpus job type');
  });
});

describe('enqueueUrls', () => {
  it('adds one job per distinct URL with a stable id', async () => {
    const addBulk = vi.fn().mockResolvedValue([]);
    const queue = { addBulk } as unknown as Queue<CorpusJobData>;

    const count = await enqueueUrls(queue, ['https://a.test/', 'https://b.test/', 'https://a.test/']);

    expect(count).toBe(2);
    expect(addBulk).toHaveBeenCalledWith([
      {
        name: 'index-url',
        data: { type: 'index-url', url: 'https://a.test/' },
        opts: { jobId: `index-url-${Buffer.from('https://a.test/').toString('base64url')}` },
      },
      {
        name: 'index-url',
        data: { type: 'index-url', url: 'https://b.test/' },
        opts: { jobId: `index-url-${Buffer.from('https://b.test/').toString('base64url')}` },
      },
    ]);
  });

  it('builds job options that BullMQ accepts', async () => {
    const addBulk = vi.fn().mockResolvedValue([]);
    await enqueueUrls({ addBulk } as unknown as Queue<CorpusJobData>, ['https://a.test/page?q=1:2', 'http://b.test:8080/']);

    // The same option checks Queue.add runs before talking to Redis
    const validateOptions: (this: { opts: JobsOptions }, jobData: { data: string }) => void =
      Reflect.get(Job.prototype, 'validateOptions');
    const jobs = addBulk.mock.calls[0]?.[0] as Array<{ data: CorpusJobData; opts: JobsOptions }>;
    expect(jobs).toHaveLength(2);
    for (const { data, opts } of jobs) {
      expect(() => validateOptions.call({ opts }, { data: JSON.stringify(data) })).not.toThrow();
    }
    expect(() => validateOptions.call({ opts: { jobId: 'index-url:abc' } }, { data: '{}' }))
      .toThrow('Custom Id cannot contain :');
  });

  it('derives colon-free ids', () => {
    expect(corpusJobId('https://a.test/x')).toBe(`index-url-${Buffer.from('https://a.test/x').toString('base64url')}`);
    expect(corpusJobId('http://b.test:8080/')).not.toContain(':');
  });

  it('skips the queue for an empty list', async () => {
    const addBulk = vi.fn();
    expect(await enqueueUrls({ addBulk } as unknown as Queue<CorpusJobData>, [])).toBe(0);
    expect(addBulk).not.toHaveBeenCalled();
  });
});

describe('parseRedisConnection', () => {
  it('parses host, port, password and TLS', () => {
    expect(parseRedisConnection('rediss://:test-secret@cache.internal:6380')).toEqual({
      host: 'cache.internal',
      port: 6380,
      password: 'test-secret',
      tls: {},
    });
  });

  it('defaults the port', () => {
    expect(parseRedisConnection('redis://localhost')).toMatchObject({ host: 'localhost', port: 6379, tls: undefined });
  });
});
