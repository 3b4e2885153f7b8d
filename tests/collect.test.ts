import { describe, it, expect, jest, beforeEach, afterEach } from '@jest/globals';
import * as fs from 'fs/promises';
import * as path from 'path';
import { collectPapers } from '../src/ingest/collect';
import type { PageFetcher, PaperDetail } from '../src/ingest/types';
import { fileExists, readJsonFile } from '../src/utils/jsonFiles';
import { silentLogger } from '../src/utils/logger';
import { makeTempDir, readLines, removeTempDir } from './utils/testHelpers';

const entries = [
  { title: 'First', link: 'https://openaccess.thecvf.com/a.html' },
  { title: 'Second', link: 'https://openaccess.thecvf.com/b.html' },
  { title: 'Third', link: 'https://openaccess.thecvf.com/c.html' },
];

function fakeFetcher(details: Record<string, PaperDetail>): PageFetcher {
  return {
    fetchListing: async () => [],
    fetchDetail: async (url) => details[url] ?? { authors: 'Error', abstract: 'Error' },
  };
}

describe('collectPapers', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('enriches every entry in order and pauses between requests', async () => {
    const outputPath = path.join(dir, 'papers.json');
    const sleep = jest.fn(async (_ms: number) => undefined);
    const fetcher = fakeFetcher({
      'https://openaccess.thecvf.com/a.html': { authors: 'Ada', abstract: 'one' },
      'https://openaccess.thecvf.com/c.html': { authors: 'Cy', abstract: 'three' },
    });

    const papers = await collectPapers({
      entries,
      fetcher,
      outputPath,
      logPath: `${outputPath}l`,
      delayMs: { min: 1000, max: 2000 },
      logger: silentLogger,
      sleep,
      random: () => 0.5,
    });

    expect(papers).toEqual([
      { title: 'First', url: 'https://openaccess.thecvf.com/a.html', authors: 'Ada', abstract: 'one' },
      { title: 'Second', url: 'https://openaccess.thecvf.com/b.html', authors: 'Error', abstract: 'Error' },
      { title: 'Third', url: 'https://openaccess.thecvf.com/c.html', authors: 'Cy', abstract: 'three' },
    ]);
    expect(await readJsonFile(outputPath)).toEqual(papers);
    expect(await fileExists(`${outputPath}l`)).toBe(false);
    expect(sleep.mock.calls).toEqual([[1500], [1500]]);
  });

  it('keeps fetched papers in the log when a fetch throws', async () => {
    const outputPath = path.join(dir, 'papers.json');
    const fetcher: PageFetcher = {
      fetchListing: async () => [],
      fetchDetail: async (url) => {
        if (url.endsWith('b.html')) throw new Error('connection reset');
        return { authors: 'Ada', abstract: 'one' };
      },
    };

    await expect(
      collectPapers({
        entries,
        fetcher,
        outputPath,
        logPath: `${outputPath}l`,
        delayMs: { min: 0, max: 0 },
        logger: silentLogger,
        sleep: async () => undefined,
      })
    ).rejects.toThrow('connection reset');

    expect(await readLines(`${outputPath}l`)).toHaveLength(1);
    expect(await fileExists(outputPath)).toBe(false);
  });

  it('keeps the log of an interrupted collection', async () => {
    const outputPath = path.join(dir, 'papers.json');
    await fs.writeFile(`${outputPath}l`, '{"title":"Earlier"}\n', 'utf8');

    await collectPapers({
      entries: entries.slice(0, 1),
      fetcher: fakeFetcher({}),
      outputPath,
      logPath: `${outputPath}l`,
      delayMs: { min: 0, max: 0 },
      logger: silentLogger,
      sleep: async () => undefined,
    });

    const names = (await fs.readdir(dir)).sort();
    expect(names).toHaveLength(2);
    expect(names[0]).toMatch(/^papers\.interrupted-\d{8}_\d{6}\.jsonl$/);
    expect(names[1]).toBe('papers.json');
    expect(await readLines(path.join(dir, names[0] ?? ''))).toEqual(['{"title":"Earlier"}']);
  });
});
