import { join } from 'node:path';
import type { TrackerConfig } from './config';
import { silentLogger, type Logger } from './logger';
import { aggregate } from './services/aggregation.service';
import { ChartService } from './services/chart.service';
import { GitHubService, historyWindow } from './services/github.service';
import { ReportService } from './services/report.service';
import type { AggregatedStats, ContributionMap, ContributionRecord } from './services/types';
import { formatCalendarDate } from './utils';

export const CHART_FILE_NAME = 'contribution_graph.png';

export interface ContributionFetcher {
  verifyToken(): Promise<string>;
  fetchContributions(username: string, since: string, until: string): Promise<ContributionRecord[]>;
}

export type ChartRenderer = (dailyTotals: ContributionMap, outputPath: string) => Promise<string>;

export interface TrackerDependencies {
  fetcher?: ContributionFetcher;
  renderChart?: ChartRenderer;
  logger?: Logger;
  now?: () => Date;
}

export interface TrackerResult {
  stats: AggregatedStats;
  records: ContributionRecord[];
  files: {
    csv: string;
    report: string;
    chart: string;
  };
}

/**
 * Runs one fetch → aggregate → visualize → save pass.
 * Nothing is written until the fetch and the aggregation have both succeeded.
 */
export async function runTracker(config: TrackerConfig, deps: TrackerDependencies = {}): Promise<TrackerResult> {
  const logger = deps.logger ?? silentLogger;
  const runStartedAt = (deps.now ?? (() => new Date()))();
  const fetcher =
    deps.fetcher ??
    new GitHubService(config.githubToken, {
      timeoutMs: config.fetchTimeoutMs,
      logger: logger.child('github'),
    });
  const renderChart: ChartRenderer =
    deps.renderChart ?? ((dailyTotals, outputPath) => ChartService.renderChart(dailyTotals, outputPath));
  const reports = new ReportService(config.dataDir, logger.child('report'));

  await fetcher.verifyToken();

  logger.info('Fetching GitHub contributions...');
  const { since, until } = historyWindow(config.days, runStartedAt);
  const records = await fetcher.fetchContributions(config.githubUsername, since, until);

  logger.info('Analyzing contribution data...');
  const stats = aggregate(records, { asOf: formatCalendarDate(runStartedAt) });
  if (stats.skippedRecords > 0) {
    logger.warn(`Skipped ${stats.skippedRecords} malformed contribution records`);
  }
  if (stats.totalContributions === 0) {
    logger.warn('No contributions found in the specified time period');
  }
  const unrecognized = Object.keys(stats.unrecognizedTypes);
  if (unrecognized.length > 0) {
    logger.debug(`Folded unrecognized types into "other": ${unrecognized.join(', ')}`);
  }

  await reports.ensureDataDirectory();

  logger.info('Creating visualization...');
  const chart = await renderChart(stats.dailyTotals, join(config.dataDir, CHART_FILE_NAME));
  logger.info(`Saved visualization to ${chart}`);

  logger.info('Saving results...');
  const csv = await reports.writeCsv(records, runStartedAt);
  const report = await reports.writeReport(stats, runStartedAt, config.githubUsername);

  logger.info('Contribution analysis completed successfully!');
  return { stats, records, files: { csv, report, chart } };
}
