import { InvalidInputError } from '../errors';
import { daysBetween, roundHalfEven, toCalendarDate } from '../utils';
import {
  CONTRIBUTION_TYPES,
  type AggregateOptions,
  type AggregatedStats,
  type ContributionMap,
  type ContributionRecord,
  type ContributionType,
  type StreakStats,
  type TypeTotals,
} from './types';

const DAILY_AVERAGE_DECIMALS = 2;
const UNKNOWN_REPOSITORY = 'unknown';
const MISSING_TYPE = '(missing)';

const TYPE_ALIASES = new Map<string, ContributionType>([
  ['pr', 'pull_request'],
  ['pullrequest', 'pull_request'],
  ['pull_request_review', 'review'],
]);

type NormalizedType = { type: ContributionType; raw: string | null };

export function normalizeType(value: unknown): NormalizedType {
  if (typeof value !== 'string' || value.trim() === '') {
    return { type: 'other', raw: MISSING_TYPE };
  }
  const key = value.trim().toLowerCase().replace(/[\s-]+/g, '_');
  const known = CONTRIBUTION_TYPES.find((type) => type === key) ?? TYPE_ALIASES.get(key);
  return known ? { type: known, raw: null } : { type: 'other', raw: value };
}

type Normalized =
  | { ok: true; record: ContributionRecord; rawType: string | null }
  | { ok: false };

/**
 * Brings a loosely typed record into the fixed {@link ContributionRecord} shape.
 * A missing count means a single discrete event; a count of 0 is kept as a placeholder.
 */
export function normalizeRecord(value: unknown, options: AggregateOptions = {}): Normalized {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return { ok: false };
  }
  const raw: Record<string, unknown> = { ...value };

  const date = toCalendarDate(raw.date);
  if (!date) return { ok: false };
  if (options.asOf && date > options.asOf) return { ok: false };

  const count = raw.count ?? 1;
  if (typeof count !== 'number' || !Number.isInteger(count) || count < 0) {
    return { ok: false };
  }

  const { type, raw: rawType } = normalizeType(raw.type);
  const repository =
    typeof raw.repository === 'string' && raw.repository.trim() !== ''
      ? raw.repository.trim()
      : UNKNOWN_REPOSITORY;

  return { ok: true, record: { date, type, repository, count }, rawType };
}

export function calculateStreaks(dailyTotals: ContributionMap): StreakStats {
  const sortedDates = Object.keys(dailyTotals).sort((a, b) => a.localeCompare(b));
  if (sortedDates.length === 0) {
    return { currentStreak: 0, longestStreak: 0, lastContributionDate: null };
  }

  const activeDates = sortedDates.filter((date) => dailyTotals[date] > 0);
  const latestDate = sortedDates[sortedDates.length - 1];
  const lastContributionDate = activeDates.length > 0 ? activeDates[activeDates.length - 1] : null;

  let longestStreak = 0;
  let tempStreak = 0;
  let previous: string | null = null;

  for (const date of activeDates) {
    tempStreak = previous !== null && daysBetween(previous, date) === 1 ? tempStreak + 1 : 1;
    longestStreak = Math.max(longestStreak, tempStreak);
    previous = date;
  }

  // tempStreak now holds the run ending at the last active date
  const currentStreak = lastContributionDate === latestDate ? tempStreak : 0;

  return { currentStreak, longestStreak, lastContributionDate };
}

function emptyTypeTotals(): TypeTotals {
  return { commit: 0, pull_request: 0, issue: 0, review: 0, other: 0 };
}

function sortedEntries(map: Map<string, number>): Record<string, number> {
  return Object.fromEntries([...map.entries()].sort(([a], [b]) => a.localeCompare(b)));
}

/**
 * Reduces contribution records into summary statistics.
 *
 * Malformed records (bad date, negative or fractional count, not an object) are
 * excluded and tallied in `skippedRecords`. Only a non-array input throws.
 */
export function aggregate(records: unknown, options: AggregateOptions = {}): AggregatedStats {
  if (!Array.isArray(records)) {
    throw new InvalidInputError(
      `Expected a list of contribution records, received ${records === null ? 'null' : typeof records}`
    );
  }

  const byType = emptyTypeTotals();
  const byRepository = new Map<string, number>();
  const dailyTotals = new Map<string, number>();
  const unrecognizedTypes = new Map<string, number>();
  let totalContributions = 0;
  let skippedRecords = 0;

  for (const value of records) {
    const normalized = normalizeRecord(value, options);
    if (!normalized.ok) {
      skippedRecords++;
      continue;
    }

    const { date, type, repository, count } = normalized.record;
    dailyTotals.set(date, (dailyTotals.get(date) ?? 0) + count);
    if (count === 0) continue;

    totalContributions += count;
    byType[type] += count;
    byRepository.set(repository, (byRepository.get(repository) ?? 0) + count);
    if (normalized.rawType !== null) {
      unrecognizedTypes.set(normalized.rawType, (unrecognizedTypes.get(normalized.rawType) ?? 0) + count);
    }
  }

  const days = sortedEntries(dailyTotals);
  const dates = Object.keys(days);
  const activeDays = dates.filter((date) => days[date] > 0).length;
  const dateRange = dates.length > 0 ? Object.freeze({ start: dates[0], end: dates[dates.length - 1] }) : null;

  return Object.freeze({
    totalContributions,
    byType: Object.freeze(byType),
    byRepository: Object.freeze(sortedEntries(byRepository)),
    dailyTotals: Object.freeze(days),
    activeDays,
    activeRepositories: byRepository.size,
    dateRange,
    dailyAverage: activeDays > 0 ? roundHalfEven(totalContributions / activeDays, DAILY_AVERAGE_DECIMALS) : 0,
    skippedRecords,
    unrecognizedTypes: Object.freeze(sortedEntries(unrecognizedTypes)),
    ...calculateStreaks(days),
  });
}
