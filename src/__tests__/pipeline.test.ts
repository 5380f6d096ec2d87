import { existsSync } from 'node:fs';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';
import type { TrackerConfig } from '../config';
import { AuthenticationError } from '../errors';
import { CHART_FILE_NAME, runTracker, type ChartRenderer, type ContributionFetcher } from '../pipeline';
import type { ContributionRecord } from '../services/types';

const records: ContributionRecord[] = [
  { date: '2024-01-01', type: 'commit', repository: 'octocat/one', count: 3 },
  { date: '2024-01-02', type: 'other', repository: 'unknown', count: 0 },
  { date: '2024-01-03', type: 'review', repository: 'octocat/two', count: 1 },
  // after the run date; dropped by aggregation
  { date: '2024-01-05', type: 'commit', repository: 'octocat/one', count: 9 },
];

const createFetcher = (fetchContributions: ContributionFetcher['fetchContributions']) => ({
  verifyToken: vi.fn<ContributionFetcher['verifyToken']>(async () => 'octocat'),
  fetchContributions: vi.fn(fetchContributions),
});

describe('runTracker', () => {
  let dir: string;
  let config: TrackerConfig;
  const now = () => new Date(2024, 0, 3, 10, 0, 0);

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'contribution-pipeline-'));
    config = {
      githubToken: 'test-token',
      githubUsername: 'octocat',
      dataDir: join(dir, 'data'),
      days: 7,
      fetchTimeoutMs: 1_000,
      logLevel: 'info',
    };
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  test('fetches, aggregates, renders and saves in one pass', async () => {
    const fetcher = createFetcher(async () => records);
    const renderChart = vi.fn<ChartRenderer>(async (_, outputPath) => outputPath);

    const result = await runTracker(config, { fetcher, renderChart, now });

    expect(fetcher.fetchContributions).toHaveBeenCalledWith('octocat', '2023-12-28', '2024-01-03');
    expect(result.stats.totalContributions).toBe(4);
    expect(result.stats.skippedRecords).toBe(1);
    expect(result.stats.dailyTotals).toEqual({ '2024-01-01': 3, '2024-01-02': 0, '2024-01-03': 1 });
    expect(result.stats.currentStreak).toBe(1);
    expect(renderChart).toHaveBeenCalledWith(result.stats.dailyTotals, join(config.dataDir, CHART_FILE_NAME));

    expect(result.files).toEqual({
      csv: join(config.dataDir, 'contributions_20240103_100000.csv'),
      report: join(config.dataDir, 'analysis_20240103_100000.txt'),
      chart: join(config.dataDir, CHART_FILE_NAME),
    });
    expect((await readFile(result.files.csv, 'utf8')).split('\n')).toEqual([
      'date,type,repository,count',
      '2024-01-01,commit,octocat/one,3',
      '2024-01-02,other,unknown,0',
      '2024-01-03,review,octocat/two,1',
      '2024-01-05,commit,octocat/one,9',
      '',
    ]);
    expect(await readFile(result.files.report, 'utf8')).toContain('\ntotal_contributions: 4\n');
  });

  test('writes nothing when the fetch fails', async () => {
    const fetcher = createFetcher(async () => {
      throw new AuthenticationError();
    });
    const renderChart = vi.fn<ChartRenderer>(async (_, outputPath) => outputPath);

    await expect(runTracker(config, { fetcher, renderChart, now })).rejects.toBeInstanceOf(AuthenticationError);
    expect(renderChart).not.toHaveBeenCalled();
    expect(existsSync(config.dataDir)).toBe(false);
  });
});
