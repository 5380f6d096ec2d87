import { graphql, GraphqlResponseError } from '@octokit/graphql';
import { RequestError } from '@octokit/request-error';
import { addDays, addYears, isAfter, min, parseISO } from 'date-fns';
import { AuthenticationError, FetchTimeoutError, NetworkError } from '../errors';
import { silentLogger, type Logger } from '../logger';
import { formatCalendarDate, toCalendarDate } from '../utils';
import type { ContributionRecord, ContributionType } from './types';

export interface GitHubServiceOptions {
  timeoutMs?: number;
  retryDelayMs?: number;
  logger?: Logger;
  /** Custom fetch implementation handed to octokit. */
  fetch?: typeof fetch;
}

interface RepositoryRef {
  nameWithOwner: string;
}

interface ContributionsByRepository<Node> {
  repository: RepositoryRef;
  contributions: { nodes: Node[] };
}

interface OccurredAt {
  occurredAt: string;
}

export interface ContributionCollectionResponse {
  user: {
    contributionsCollection: {
      contributionCalendar: {
        weeks: Array<{
          contributionDays: Array<{
            contributionCount: number;
            date: string;
          }>;
        }>;
      };
      commitContributionsByRepository: ContributionsByRepository<OccurredAt & { commitCount: number }>[];
      issueContributionsByRepository: ContributionsByRepository<OccurredAt>[];
      pullRequestContributionsByRepository: ContributionsByRepository<OccurredAt>[];
      pullRequestReviewContributionsByRepository: ContributionsByRepository<OccurredAt>[];
    };
  } | null;
}

interface ViewerResponse {
  viewer: {
    login: string;
  };
}

const CONTRIBUTIONS_QUERY = `
  query($username: String!, $from: DateTime!, $to: DateTime!) {
    user(login: $username) {
      contributionsCollection(from: $from, to: $to) {
        contributionCalendar {
          weeks {
            contributionDays {
              contributionCount
              date
            }
          }
        }
        commitContributionsByRepository(maxRepositories: 100) {
          repository { nameWithOwner }
          contributions(first: 100) { nodes { occurredAt commitCount } }
        }
        issueContributionsByRepository(maxRepositories: 100) {
          repository { nameWithOwner }
          contributions(first: 100) { nodes { occurredAt } }
        }
        pullRequestContributionsByRepository(maxRepositories: 100) {
          repository { nameWithOwner }
          contributions(first: 100) { nodes { occurredAt } }
        }
        pullRequestReviewContributionsByRepository(maxRepositories: 100) {
          repository { nameWithOwner }
          contributions(first: 100) { nodes { occurredAt } }
        }
      }
    }
  }
`;

const DEFAULT_TIMEOUT_MS = 10_000;
const DEFAULT_RETRY_DELAY_MS = 1_000;
const UNKNOWN_REPOSITORY = 'unknown';

const sleep = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

/** Maps an octokit failure onto the tracker's error taxonomy. */
export function toFetchError(error: unknown): AuthenticationError | NetworkError {
  if (error instanceof GraphqlResponseError) {
    const messages = error.errors?.map((e) => e.message).join('; ') || error.message;
    return new NetworkError(`GitHub rejected the query: ${messages}`, false, { cause: error });
  }
  if (error instanceof RequestError) {
    if (error.status === 401) {
      return new AuthenticationError(undefined, { cause: error });
    }
    const rateLimited =
      error.status === 429 ||
      (error.status === 403 && error.response?.headers['x-ratelimit-remaining'] === '0');
    if (rateLimited) {
      return new NetworkError('GitHub API rate limit exceeded', true, { cause: error });
    }
    return new NetworkError(
      `GitHub API request failed with status ${error.status}: ${error.message}`,
      error.status >= 500,
      { cause: error }
    );
  }
  const message = error instanceof Error ? error.message : String(error);
  return new NetworkError(`Could not reach GitHub: ${message}`, true, { cause: error });
}

/** Splits `[since, until]` into windows GitHub accepts (at most one year each). */
export function splitIntoYearWindows(since: string, until: string): Array<{ from: Date; to: Date }> {
  const end = parseISO(`${until}T23:59:59Z`);
  const windows: Array<{ from: Date; to: Date }> = [];
  let cursor = parseISO(`${since}T00:00:00Z`);

  while (!isAfter(cursor, end)) {
    const to = min([new Date(addYears(cursor, 1).getTime() - 1000), end]);
    windows.push({ from: cursor, to });
    cursor = new Date(to.getTime() + 1000);
  }
  return windows;
}

export class GitHubService {
  private graphql: typeof graphql;
  private timeoutMs: number;
  private retryDelayMs: number;
  private logger: Logger;

  constructor(token: string, options: GitHubServiceOptions = {}) {
    this.graphql = graphql.defaults({
      headers: {
        authorization: token ? `bearer ${token}` : '',
      },
      request: options.fetch ? { fetch: options.fetch } : {},
    });
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.retryDelayMs = options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
    this.logger = options.logger ?? silentLogger;
  }

  private async request<T>(query: string, variables: Record<string, unknown> = {}): Promise<T> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
    try {
      return await this.graphql<T>(query, { ...variables, request: { signal: controller.signal } });
    } catch (error) {
      if (controller.signal.aborted) {
        throw new FetchTimeoutError(this.timeoutMs);
      }
      throw toFetchError(error);
    } finally {
      clearTimeout(timeout);
    }
  }

  /** One retry for transient failures; auth problems and timeouts surface immediately. */
  private async requestWithRetry<T>(query: string, variables: Record<string, unknown> = {}): Promise<T> {
    try {
      return await this.request<T>(query, variables);
    } catch (error) {
      if (!(error instanceof NetworkError) || !error.retryable) throw error;
      this.logger.warn(`${error.message}; retrying in ${this.retryDelayMs}ms`);
      await sleep(this.retryDelayMs);
      return this.request<T>(query, variables);
    }
  }

  /** Resolves the token's owner. Throws {@link AuthenticationError} for a bad token. */
  async verifyToken(): Promise<string> {
    const { viewer } = await this.requestWithRetry<ViewerResponse>(`
      query {
        viewer {
          login
        }
      }
    `);
    this.logger.debug(`Authenticated as ${viewer.login}`);
    return viewer.login;
  }

  private async getContributionsForWindow(username: string, from: Date, to: Date) {
    const response = await this.requestWithRetry<ContributionCollectionResponse>(CONTRIBUTIONS_QUERY, {
      username,
      from: from.toISOString(),
      to: to.toISOString(),
    });
    if (!response.user) {
      throw new NetworkError(`GitHub user "${username}" could not be resolved`, false);
    }
    return response.user.contributionsCollection;
  }

  /**
   * Fetches contribution records for `username` between two calendar dates (inclusive).
   *
   * Commits yield one record per day and repository; pull requests, issues and reviews
   * one record each. Calendar activity the typed lists do not explain (private work,
   * repository creation) becomes an `other` record, and empty calendar days become
   * zero-count placeholders so streaks can be measured against the whole window.
   */
  async fetchContributions(username: string, since: string, until: string): Promise<ContributionRecord[]> {
    const records: ContributionRecord[] = [];
    const inWindow = (date: string) => date >= since && date <= until;

    for (const { from, to } of splitIntoYearWindows(since, until)) {
      this.logger.debug(`Fetching contributions from ${from.toISOString()} to ${to.toISOString()}`);
      const collection = await this.getContributionsForWindow(username, from, to);
      const typed: ContributionRecord[] = [];

      const push = (occurredAt: string, type: ContributionType, repository: RepositoryRef, count: number) => {
        const date = toCalendarDate(occurredAt);
        if (!date || !inWindow(date)) return;
        typed.push({ date, type, repository: repository.nameWithOwner || UNKNOWN_REPOSITORY, count });
      };

      collection.commitContributionsByRepository.forEach(({ repository, contributions }) => {
        contributions.nodes.forEach((node) => push(node.occurredAt, 'commit', repository, node.commitCount));
      });
      collection.pullRequestContributionsByRepository.forEach(({ repository, contributions }) => {
        contributions.nodes.forEach((node) => push(node.occurredAt, 'pull_request', repository, 1));
      });
      collection.issueContributionsByRepository.forEach(({ repository, contributions }) => {
        contributions.nodes.forEach((node) => push(node.occurredAt, 'issue', repository, 1));
      });
      collection.pullRequestReviewContributionsByRepository.forEach(({ repository, contributions }) => {
        contributions.nodes.forEach((node) => push(node.occurredAt, 'review', repository, 1));
      });

      const typedPerDay = new Map<string, number>();
      typed.forEach((record) => typedPerDay.set(record.date, (typedPerDay.get(record.date) ?? 0) + record.count));

      const calendar: ContributionRecord[] = [];
      collection.contributionCalendar.weeks.forEach((week) => {
        week.contributionDays.forEach((day) => {
          const date = toCalendarDate(day.date);
          if (!date || !inWindow(date)) return;
          const unexplained = day.contributionCount - (typedPerDay.get(date) ?? 0);
          if (day.contributionCount === 0) {
            calendar.push({ date, type: 'other', repository: UNKNOWN_REPOSITORY, count: 0 });
          } else if (unexplained > 0) {
            calendar.push({ date, type: 'other', repository: UNKNOWN_REPOSITORY, count: unexplained });
          }
        });
      });

      records.push(...typed, ...calendar);
    }

    records.sort((a, b) => a.date.localeCompare(b.date));
    this.logger.info(`Fetched ${records.length} contribution records for ${username}`);
    return records;
  }
}

/** Inclusive window of `days` calendar days ending on `now`. */
export function historyWindow(days: number, now: Date = new Date()): { since: string; until: string } {
  return {
    since: formatCalendarDate(addDays(now, -(days - 1))),
    until: formatCalendarDate(now),
  };
}
