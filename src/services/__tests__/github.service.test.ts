import { beforeEach, describe, expect, test, vi, type Mock } from 'vitest';
import { AuthenticationError, FetchTimeoutError, NetworkError } from '../../errors';
import { GitHubService, historyWindow, splitIntoYearWindows } from '../github.service';

const jsonResponse = (body: unknown, status = 200, headers: Record<string, string> = {}) =>
  new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json; charset=utf-8', ...headers },
  });

// One week of activity for a single user
const mockGraphQLResponse = {
  data: {
    user: {
      contributionsCollection: {
        contributionCalendar: {
          weeks: [
            {
              contributionDays: [
                { date: '2024-01-01', contributionCount: 3 },
                { date: '2024-01-02', contributionCount: 0 },
                { date: '2024-01-03', contributionCount: 2 },
                { date: '2024-01-04', contributionCount: 1 },
                // outside the requested window
                { date: '2024-01-08', contributionCount: 5 },
              ],
            },
          ],
        },
        commitContributionsByRepository: [
          {
            repository: { nameWithOwner: 'octocat/one' },
            contributions: {
              nodes: [
                { occurredAt: '2024-01-01T08:00:00Z', commitCount: 2 },
                { occurredAt: '2024-01-03T08:00:00Z', commitCount: 2 },
              ],
            },
          },
        ],
        issueContributionsByRepository: [],
        pullRequestContributionsByRepository: [
          {
            repository: { nameWithOwner: 'octocat/two' },
            contributions: { nodes: [{ occurredAt: '2024-01-01T12:00:00Z' }] },
          },
        ],
        pullRequestReviewContributionsByRepository: [
          {
            repository: { nameWithOwner: 'octocat/one' },
            contributions: { nodes: [{ occurredAt: '2024-01-08T09:00:00Z' }] },
          },
        ],
      },
    },
  },
};

describe('GitHubService', () => {
  let fetchMock: Mock<typeof fetch>;
  let service: GitHubService;

  beforeEach(() => {
    fetchMock = vi.fn<typeof fetch>();
    service = new GitHubService('test-token', { fetch: fetchMock, retryDelayMs: 0, timeoutMs: 1_000 });
  });

  test('turns typed contributions and calendar days into records', async () => {
    fetchMock.mockImplementation(async () => jsonResponse(mockGraphQLResponse));

    const records = await service.fetchContributions('octocat', '2024-01-01', '2024-01-07');

    expect(records).toEqual([
      { date: '2024-01-01', type: 'commit', repository: 'octocat/one', count: 2 },
      { date: '2024-01-01', type: 'pull_request', repository: 'octocat/two', count: 1 },
      { date: '2024-01-02', type: 'other', repository: 'unknown', count: 0 },
      { date: '2024-01-03', type: 'commit', repository: 'octocat/one', count: 2 },
      { date: '2024-01-04', type: 'other', repository: 'unknown', count: 1 },
    ]);
  });

  test('sends the window and token to the GraphQL endpoint', async () => {
    fetchMock.mockImplementation(async () => jsonResponse(mockGraphQLResponse));

    await service.fetchContributions('octocat', '2024-01-01', '2024-01-07');

    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0];
    expect(String(url)).toBe('https://api.github.com/graphql');
    expect(new Headers(init?.headers).get('authorization')).toBe('bearer test-token');
    const body = JSON.parse(String(init?.body));
    expect(body.variables).toEqual({
      username: 'octocat',
      from: '2024-01-01T00:00:00.000Z',
      to: '2024-01-07T23:59:59.000Z',
    });
  });

  test('returns the login of the token owner', async () => {
    fetchMock.mockImplementation(async () => jsonResponse({ data: { viewer: { login: 'octocat' } } }));

    await expect(service.verifyToken()).resolves.toBe('octocat');
  });

  test('maps 401 to AuthenticationError without retrying', async () => {
    fetchMock.mockImplementation(async () => jsonResponse({ message: 'Bad credentials' }, 401));

    await expect(service.verifyToken()).rejects.toBeInstanceOf(AuthenticationError);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  test('retries a server error once', async () => {
    fetchMock
      .mockImplementationOnce(async () => jsonResponse({ message: 'Bad gateway' }, 502))
      .mockImplementationOnce(async () => jsonResponse(mockGraphQLResponse));

    const records = await service.fetchContributions('octocat', '2024-01-01', '2024-01-07');

    expect(records).toHaveLength(5);
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  test('gives up with NetworkError when the retry fails too', async () => {
    fetchMock.mockImplementation(async () => jsonResponse({ message: 'Server error' }, 500));

    const error = await service.fetchContributions('octocat', '2024-01-01', '2024-01-07').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(NetworkError);
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  test('reports an exhausted rate limit as NetworkError', async () => {
    fetchMock.mockImplementation(async () =>
      jsonResponse({ message: 'API rate limit exceeded' }, 403, { 'x-ratelimit-remaining': '0' })
    );

    const error = await service.verifyToken().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(NetworkError);
    expect(error).toHaveProperty('message', 'GitHub API rate limit exceeded');
  });

  test('surfaces GraphQL errors without retrying', async () => {
    fetchMock.mockImplementation(async () =>
      jsonResponse({
        data: { user: null },
        errors: [{ type: 'NOT_FOUND', path: ['user'], message: "Could not resolve to a User with the login of 'ghost'." }],
      })
    );

    const error = await service.fetchContributions('ghost', '2024-01-01', '2024-01-07').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(NetworkError);
    expect(error).toHaveProperty(
      'message',
      "GitHub rejected the query: Could not resolve to a User with the login of 'ghost'."
    );
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  test('fails with FetchTimeoutError when GitHub does not answer in time', async () => {
    const slowService = new GitHubService('test-token', { fetch: fetchMock, timeoutMs: 20 });
    fetchMock.mockImplementation(
      (_url, init) =>
        new Promise<Response>((_, reject) => {
          init?.signal?.addEventListener('abort', () => reject(new DOMException('aborted', 'AbortError')));
        })
    );

    await expect(slowService.verifyToken()).rejects.toBeInstanceOf(FetchTimeoutError);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });
});

describe('splitIntoYearWindows', () => {
  test('keeps a short range in one window', () => {
    const windows = splitIntoYearWindows('2024-01-01', '2024-01-07');

    expect(windows.map(({ from, to }) => [from.toISOString(), to.toISOString()])).toEqual([
      ['2024-01-01T00:00:00.000Z', '2024-01-07T23:59:59.000Z'],
    ]);
  });

  test('splits ranges longer than a year', () => {
    const windows = splitIntoYearWindows('2023-01-01', '2024-06-30');

    expect(windows.map(({ from, to }) => [from.toISOString(), to.toISOString()])).toEqual([
      ['2023-01-01T00:00:00.000Z', '2023-12-31T23:59:59.000Z'],
      ['2024-01-01T00:00:00.000Z', '2024-06-30T23:59:59.000Z'],
    ]);
  });
});

describe('historyWindow', () => {
  test('covers the requested number of calendar days ending today', () => {
    expect(historyWindow(7, new Date(2024, 0, 10, 12))).toEqual({ since: '2024-01-04', until: '2024-01-10' });
  });
});
