import { mkdir } from 'node:fs/promises';
import { join } from 'node:path';
import { silentLogger, type Logger } from '../logger';
import { formatRunTimestamp, writeFileAtomic } from '../utils';
import { CONTRIBUTION_TYPES, type AggregatedStats, type ContributionRecord } from './types';

const CSV_COLUMNS = ['date', 'type', 'repository', 'count'] as const;

const escapeCsv = (value: string | number) => {
  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
};

export function toCsv(records: readonly ContributionRecord[]): string {
  const lines = [CSV_COLUMNS.join(',')];
  records.forEach((record) => {
    lines.push(CSV_COLUMNS.map((column) => escapeCsv(record[column])).join(','));
  });
  return `${lines.join('\n')}\n`;
}

const indentedEntries = (entries: Array<[string, number]>) =>
  entries.length > 0 ? entries.map(([key, value]) => `  ${key}: ${value}`) : ['  (none)'];

export function formatReport(stats: AggregatedStats, username: string, generatedAt: Date): string {
  const range = stats.dateRange ? `${stats.dateRange.start} to ${stats.dateRange.end}` : 'none';
  const lines = [
    `GitHub contribution analysis for ${username}`,
    `generated_at: ${generatedAt.toISOString()}`,
    `total_contributions: ${stats.totalContributions}`,
    `active_days: ${stats.activeDays}`,
    `active_repositories: ${stats.activeRepositories}`,
    `daily_average: ${stats.dailyAverage.toFixed(2)}`,
    `date_range: ${range}`,
    `longest_streak: ${stats.longestStreak}`,
    `current_streak: ${stats.currentStreak}`,
    `last_contribution_date: ${stats.lastContributionDate ?? 'none'}`,
    `skipped_records: ${stats.skippedRecords}`,
    'contributions_by_type:',
    ...indentedEntries(CONTRIBUTION_TYPES.map((type): [string, number] => [type, stats.byType[type]])),
    'contributions_by_repository:',
    ...indentedEntries(Object.entries(stats.byRepository)),
    'unrecognized_types:',
    ...indentedEntries(Object.entries(stats.unrecognizedTypes)),
  ];
  return `${lines.join('\n')}\n`;
}

export class ReportService {
  constructor(
    private readonly dataDir: string,
    private readonly logger: Logger = silentLogger
  ) {}

  async ensureDataDirectory(): Promise<void> {
    await mkdir(this.dataDir, { recursive: true });
  }

  async writeCsv(records: readonly ContributionRecord[], runStartedAt: Date): Promise<string> {
    await this.ensureDataDirectory();
    const path = join(this.dataDir, `contributions_${formatRunTimestamp(runStartedAt)}.csv`);
    await writeFileAtomic(path, toCsv(records));
    this.logger.info(`Saved contribution data to ${path}`);
    return path;
  }

  async writeReport(stats: AggregatedStats, runStartedAt: Date, username: string): Promise<string> {
    await this.ensureDataDirectory();
    const path = join(this.dataDir, `analysis_${formatRunTimestamp(runStartedAt)}.txt`);
    await writeFileAtomic(path, formatReport(stats, username, runStartedAt));
    this.logger.info(`Saved analysis to ${path}`);
    return path;
  }
}
