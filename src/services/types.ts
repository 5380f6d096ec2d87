export const CONTRIBUTION_TYPES = ['commit', 'pull_request', 'issue', 'review', 'other'] as const;

export type ContributionType = (typeof CONTRIBUTION_TYPES)[number];

export interface ContributionRecord {
  /** Calendar date, `yyyy-MM-dd`. */
  date: string;
  type: ContributionType;
  repository: string;
  /** Events on this date in this repository. 0 marks a calendar day without activity. */
  count: number;
}

/** Loosely typed record as it may arrive from a provider, before normalization. */
export interface RawContributionRecord {
  date?: unknown;
  type?: unknown;
  repository?: unknown;
  count?: unknown;
}

export interface DateRange {
  start: string;
  end: string;
}

export interface ContributionMap {
  [date: string]: number;
}

export type TypeTotals = Record<ContributionType, number>;

export interface StreakStats {
  currentStreak: number;
  longestStreak: number;
  lastContributionDate: string | null;
}

export interface AggregatedStats extends StreakStats {
  totalContributions: number;
  byType: Readonly<TypeTotals>;
  byRepository: Readonly<Record<string, number>>;
  dailyTotals: Readonly<ContributionMap>;
  activeDays: number;
  activeRepositories: number;
  dateRange: Readonly<DateRange> | null;
  dailyAverage: number;
  skippedRecords: number;
  unrecognizedTypes: Readonly<Record<string, number>>;
}

export interface AggregateOptions {
  /** Records dated after this calendar day are skipped. */
  asOf?: string;
}
