import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { ReleaseIndexCache, ReleaseIndexClient, rateLimitWait } from '../../../src/core/release/release-index.js';
import { RetryPolicy } from '../../../src/utils/retry.js';
import {
  ConfigurationError,
  IndexUnreachableError,
  NotFoundError,
  RateLimitedError
} from '../../../src/utils/errors.js';
import { FakeHttpClient, releasesPage, releasesUrl } from '../../helpers/fake-http.js';

const REPO = { owner: 'esp-rs', repo: 'rust-build' };

function noWaitRetry(maxAttempts: number = 3): RetryPolicy {
  return new RetryPolicy({ maxAttempts, baseDelayMs: 0, maxDelayMs: 0 }, async () => {}, () => 0);
}

function recordingRetry(waits: number[]): RetryPolicy {
  return new RetryPolicy({ maxAttempts: 3, baseDelayMs: 0, maxDelayMs: 0 }, async ms => {
    waits.push(ms);
  }, () => 0);
}

function client(
  http: FakeHttpClient,
  options: { token?: string; perPage?: number; retry?: RetryPolicy; now?: () => number } = {}
) {
  return new ReleaseIndexClient({
    http,
    cache: new ReleaseIndexCache(),
    retry: options.retry ?? noWaitRetry(),
    token: options.token,
    perPage: options.perPage,
    now: options.now
  });
}

describe('ReleaseIndexClient', () => {
  it('reads releases and sends the GitHub API headers', async () => {
    const http = new FakeHttpClient().on(
      releasesUrl('esp-rs', 'rust-build'),
      { body: releasesPage([{ tag: 'v1.82.0.3', assets: ['rust-1.82.0.3-x86_64-unknown-linux-gnu.tar.xz'] }]) }
    );

    const releases = await client(http, { token: 'test-secret' }).listReleases(REPO);

    assert.deepEqual(releases, [
      {
        tag: 'v1.82.0.3',
        draft: false,
        prerelease: false,
        assets: [
          {
            name: 'rust-1.82.0.3-x86_64-unknown-linux-gnu.tar.xz',
            url: 'https://downloads.test/v1.82.0.3/rust-1.82.0.3-x86_64-unknown-linux-gnu.tar.xz',
            size: 1
          }
        ]
      }
    ]);
    assert.deepEqual(http.requests[0].headers, {
      Accept: 'application/vnd.github+json',
      'X-GitHub-Api-Version': '2022-11-28',
      'User-Agent': 'espforge',
      Authorization: 'Bearer test-secret'
    });
  });

  it('follows pages until a short page', async () => {
    const http = new FakeHttpClient()
      .on(releasesUrl('esp-rs', 'rust-build', 1, 2), { body: releasesPage([{ tag: 'v1.83.0.1' }, { tag: 'v1.82.0.3' }]) })
      .on(releasesUrl('esp-rs', 'rust-build', 2, 2), { body: releasesPage([{ tag: 'v1.81.0.0' }]) });

    const releases = await client(http, { perPage: 2 }).listReleases(REPO);
    assert.deepEqual(releases.map(release => release.tag), ['v1.83.0.1', 'v1.82.0.3', 'v1.81.0.0']);
    assert.equal(http.requests.length, 2);
  });

  it('skips entries it cannot read', async () => {
    const http = new FakeHttpClient().on(releasesUrl('esp-rs', 'rust-build'), {
      body: JSON.stringify([{ name: 'no tag' }, { tag_name: 'v1.82.0.3', assets: [{ name: 'x' }], prerelease: true }])
    });
    assert.deepEqual(await client(http).listReleases(REPO), [
      { tag: 'v1.82.0.3', draft: false, prerelease: true, assets: [] }
    ]);
  });

  it('fetches each repository once per run', async () => {
    const http = new FakeHttpClient().on(releasesUrl('esp-rs', 'rust-build'), { body: releasesPage([{ tag: 'v1.82.0.3' }]) });
    const index = client(http);

    await Promise.all([index.listReleases(REPO), index.listReleases(REPO)]);
    await index.listReleases(REPO);
    assert.equal(http.requests.length, 1);
  });

  it('retries server errors and keeps going', async () => {
    const http = new FakeHttpClient().on(
      releasesUrl('esp-rs', 'rust-build'),
      { status: 502, body: 'Bad Gateway' },
      { body: releasesPage([{ tag: 'v1.82.0.3' }]) }
    );
    const releases = await client(http).listReleases(REPO);
    assert.equal(releases.length, 1);
    assert.equal(http.requests.length, 2);
  });

  it('reports rate limiting with a token hint once retries run out', async () => {
    const url = releasesUrl('esp-rs', 'rust-build');
    const http = new FakeHttpClient().on(url, {
      status: 403,
      headers: { 'x-ratelimit-remaining': '0' },
      body: '{"message":"API rate limit exceeded"}'
    });

    await assert.rejects(client(http, { retry: noWaitRetry(2) }).listReleases(REPO), (error: unknown) => {
      assert.ok(error instanceof RateLimitedError);
      assert.equal(
        error.message,
        `Release index rate limit exceeded for ${url}. Set GITHUB_TOKEN (or pass --github-token) to raise the rate limit.`
      );
      return true;
    });
    assert.equal(http.requests.length, 2);
  });

  it('retries a rate-limited page without refetching the pages around it', async () => {
    const http = new FakeHttpClient()
      .on(releasesUrl('esp-rs', 'rust-build', 1, 1), { status: 429 }, { body: releasesPage([{ tag: 'v1.0.0.3' }]) })
      .on(releasesUrl('esp-rs', 'rust-build', 2, 1), { body: releasesPage([{ tag: 'v1.0.0.2' }]) })
      .on(releasesUrl('esp-rs', 'rust-build', 3, 1), { body: releasesPage([{ tag: 'v1.0.0.1' }]) })
      .on(releasesUrl('esp-rs', 'rust-build', 4, 1), { body: '[]' });

    const releases = await client(http, { perPage: 1 }).listReleases(REPO);
    assert.deepEqual(releases.map(release => release.tag), ['v1.0.0.3', 'v1.0.0.2', 'v1.0.0.1']);
    assert.equal(http.requests.length, 5);
  });

  it('waits as long as retry-after asks', async () => {
    const waits: number[] = [];
    const http = new FakeHttpClient().on(
      releasesUrl('esp-rs', 'rust-build'),
      { status: 429, headers: { 'retry-after': '7' } },
      { body: releasesPage([{ tag: 'v1.82.0.3' }]) }
    );

    await client(http, { retry: recordingRetry(waits) }).listReleases(REPO);
    assert.deepEqual(waits, [7000]);
  });

  it('waits until the rate limit resets', async () => {
    const waits: number[] = [];
    const http = new FakeHttpClient().on(
      releasesUrl('esp-rs', 'rust-build'),
      { status: 403, headers: { 'x-ratelimit-remaining': '0', 'x-ratelimit-reset': '1700000030' } },
      { body: releasesPage([{ tag: 'v1.82.0.3' }]) }
    );

    await client(http, { retry: recordingRetry(waits), now: () => 1_700_000_000_000 }).listReleases(REPO);
    assert.deepEqual(waits, [30_000]);
  });

  it('gives up at once when the rate limit resets too far ahead', async () => {
    const waits: number[] = [];
    const http = new FakeHttpClient().on(releasesUrl('esp-rs', 'rust-build'), {
      status: 429,
      headers: { 'retry-after': '3600' }
    });

    await assert.rejects(client(http, { retry: recordingRetry(waits) }).listReleases(REPO), (error: unknown) => {
      assert.ok(error instanceof RateLimitedError);
      assert.equal(error.retryAfterMs, 3_600_000);
      return true;
    });
    assert.equal(http.requests.length, 1);
    assert.deepEqual(waits, []);
  });

  it('does not retry bad credentials', async () => {
    const http = new FakeHttpClient().on(releasesUrl('esp-rs', 'rust-build'), {
      status: 401,
      body: '{"message":"Bad credentials"}'
    });
    await assert.rejects(client(http, { token: 'test-secret' }).listReleases(REPO), ConfigurationError);
    assert.equal(http.requests.length, 1);
  });

  it('does not retry a missing repository', async () => {
    const http = new FakeHttpClient();
    await assert.rejects(client(http).listReleases(REPO), NotFoundError);
    assert.equal(http.requests.length, 1);
  });

  it('treats a malformed body as unreachable', async () => {
    const http = new FakeHttpClient().on(releasesUrl('esp-rs', 'rust-build'), { body: '{"not":"a list"}' });
    await assert.rejects(client(http, { retry: noWaitRetry(1) }).listReleases(REPO), IndexUnreachableError);
  });

  it('forgets failed lookups', async () => {
    const http = new FakeHttpClient().on(
      releasesUrl('esp-rs', 'rust-build'),
      { status: 500 },
      { body: releasesPage([{ tag: 'v1.82.0.3' }]) }
    );
    const index = client(http, { retry: noWaitRetry(1) });

    await assert.rejects(index.listReleases(REPO), IndexUnreachableError);
    assert.equal((await index.listReleases(REPO)).length, 1);
  });
});

describe('rateLimitWait', () => {
  const now = Date.parse('2026-03-01T12:00:00Z');

  it('reads retry-after as seconds or as a date', () => {
    assert.equal(rateLimitWait({ 'retry-after': '12' }, now), 12_000);
    assert.equal(rateLimitWait({ 'retry-after': 'Sun, 01 Mar 2026 12:00:05 GMT' }, now), 5_000);
    assert.equal(rateLimitWait({ 'retry-after': 'Sun, 01 Mar 2026 11:00:00 GMT' }, now), 0);
  });

  it('falls back to the reset time and then to nothing', () => {
    assert.equal(rateLimitWait({ 'x-ratelimit-reset': String(now / 1000 + 45) }, now), 45_000);
    assert.equal(rateLimitWait({ 'retry-after': 'soon', 'x-ratelimit-reset': 'later' }, now), undefined);
    assert.equal(rateLimitWait({}, now), undefined);
  });
});
