import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { Logger } from '../../obs/logger';
import { readSnapshot } from '../../persistence/csvSnapshot';
import type { Sleep } from '../../utils/async';
import { readUrlList, runCrawl, type RunCrawlArgs } from '../crawl';

const buildLogger = (): Logger => ({ debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() });

const articleHtml = (title: string) =>
  `<html><body><h1>${title}</h1><h2>${title} subtitle</h2><article><p>${title} body</p></article></body></html>`;

describe('runCrawl', () => {
  let dir: string;
  let urlsFile: string;
  let snapshotFile: string;

  const buildArgs = (overrides: Partial<RunCrawlArgs> = {}): RunCrawlArgs => ({
    config: {
      crawl: { urlsFile, politenessDelayMs: 10_000 },
      fetch: {
        timeoutMs: 1_000,
        maxRetries: 3,
        backoffStepMs: 5_000,
        userAgent: 'test-agent',
        referer: 'https://referer.example/',
      },
      persistence: { snapshotFile },
    },
    logger: buildLogger(),
    sleep: vi.fn<Sleep>(async () => {}),
    ...overrides,
  });

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'crawl-'));
    urlsFile = path.join(dir, 'urls.txt');
    snapshotFile = path.join(dir, 'results.csv');
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('scrapes every URL in order, waits after each one and writes the batch', async () => {
    await fs.writeFile(
      urlsFile,
      'https://example.com/one\n\n  https://example.com/missing  \nhttps://example.com/two\n',
      'utf-8',
    );
    const fetchImpl = vi.fn<typeof fetch>(async (input) => {
      const url = String(input);
      if (url.endsWith('/missing')) return new Response('', { status: 404 });
      return new Response(articleHtml(url.endsWith('/one') ? 'One' : 'Two'), { status: 200 });
    });
    const sleep = vi.fn<Sleep>(async () => {});

    const report = await runCrawl(buildArgs({ fetchImpl, sleep }));

    expect(fetchImpl.mock.calls.map(([input]) => String(input))).toEqual([
      'https://example.com/one',
      'https://example.com/missing',
      'https://example.com/two',
    ]);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([10_000, 10_000, 10_000]);
    expect(report.status).toBe('written');
    expect(report.attempted).toBe(3);
    expect(report.succeeded).toBe(2);
    expect(report.failures).toEqual([
      {
        url: 'https://example.com/missing',
        failure: { kind: 'http', message: 'HTTP 404', status: 404, attempts: 1 },
      },
    ]);

    const records = await readSnapshot(snapshotFile);
    expect(records.map((record) => [record.url, record.title, record.subtitle, record.text])).toEqual([
      ['https://example.com/one', 'One', 'One subtitle', 'One body'],
      ['https://example.com/two', 'Two', 'Two subtitle', 'Two body'],
    ]);
  });

  it('reports a missing URL file without crawling', async () => {
    const fetchImpl = vi.fn<typeof fetch>();

    const report = await runCrawl(buildArgs({ fetchImpl }));

    expect(report).toEqual({ status: 'missing-input', attempted: 0, succeeded: 0, failures: [] });
    expect(fetchImpl).not.toHaveBeenCalled();
  });

  it('reports an empty URL file', async () => {
    await fs.writeFile(urlsFile, '\n   \n', 'utf-8');

    const report = await runCrawl(buildArgs());

    expect(report.status).toBe('empty-input');
  });

  it('writes nothing when no page could be scraped', async () => {
    await fs.writeFile(urlsFile, 'https://example.com/down\n', 'utf-8');
    const fetchImpl = vi.fn<typeof fetch>(async () => {
      throw new TypeError('fetch failed');
    });

    const report = await runCrawl(buildArgs({ fetchImpl }));

    expect(report.status).toBe('corpus-empty');
    expect(report.failures[0].failure.kind).toBe('network');
    await expect(fs.access(snapshotFile)).rejects.toThrow();
  });

  it('stops between pages once cancelled', async () => {
    await fs.writeFile(urlsFile, 'https://example.com/one\nhttps://example.com/two\n', 'utf-8');
    const controller = new AbortController();
    const fetchImpl = vi.fn<typeof fetch>(async () => new Response(articleHtml('One'), { status: 200 }));
    const sleep = vi.fn<Sleep>(async () => {
      controller.abort();
      throw new Error('Aborted');
    });

    const report = await runCrawl(buildArgs({ fetchImpl, sleep, signal: controller.signal }));

    expect(fetchImpl).toHaveBeenCalledTimes(1);
    expect(report.status).toBe('aborted');
    expect(report.succeeded).toBe(1);
  });
});

describe('readUrlList', () => {
  it('returns null for a missing file', async () => {
    expect(await readUrlList(path.join(os.tmpdir(), 'does-not-exist', 'urls.txt'))).toBeNull();
  });
});
