#!/usr/bin/env -S node --import tsx
import 'dotenv/config';
import chalk from 'chalk';
import { loadConfig } from './config';
import { TrackerError } from './errors';
import { createLogger } from './logger';
import { runTracker, type TrackerResult } from './pipeline';
import { CONTRIBUTION_TYPES } from './services/types';

function printSummary(username: string, { stats, files }: TrackerResult) {
  const range = stats.dateRange ? `${stats.dateRange.start} → ${stats.dateRange.end}` : 'no activity';

  console.log(`\n  ${chalk.bold('◈  Summary')} for ${chalk.green(`@${username}`)}  ${chalk.dim(range)}\n`);
  console.log(`  ✦  Total contributions : ${chalk.bold(stats.totalContributions)}`);
  console.log(`  ✦  Active days         : ${stats.activeDays}`);
  console.log(`  ✦  Daily average       : ${stats.dailyAverage.toFixed(2)}`);
  console.log(`  ✦  Repositories        : ${stats.activeRepositories}`);
  console.log(`  ✦  Longest streak      : ${stats.longestStreak} days`);
  console.log(`  ✦  Current streak      : ${stats.currentStreak} days`);
  CONTRIBUTION_TYPES.forEach((type) => {
    console.log(`     ${chalk.dim('·')} ${type.padEnd(13)} ${stats.byType[type]}`);
  });
  if (stats.skippedRecords > 0) {
    console.log(chalk.yellow(`  ⚠  Skipped records     : ${stats.skippedRecords}`));
  }

  console.log(`\n  ${chalk.bold('Files')}`);
  Object.values(files).forEach((path) => console.log(`  ✓  ${path}`));
  console.log();
}

async function main() {
  const config = loadConfig();
  const logger = createLogger({ level: config.logLevel, scope: ['tracker'] });

  const result = await runTracker(config, { logger });
  printSummary(config.githubUsername, result);
}

main().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error(chalk.red(`\n  ✗  ${error instanceof Error ? error.name : 'Error'}: ${message}`));
  process.exitCode = error instanceof TrackerError ? error.exitCode : 1;
});
