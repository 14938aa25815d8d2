/**
 * GitHub releases client with a per-run page cache.
 */

import type { RepositoryRef } from '../../types/index.js';
import { GITHUB } from '../../constants/index.js';
import type { HttpClient, HttpResponse } from '../../utils/http-client.js';
import { RetryPolicy, RetryExhaustedError } from '../../utils/retry.js';
import {
  ConfigurationError,
  IndexUnreachableError,
  NotFoundError,
  RateLimitedError,
  isAbortError
} from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

export interface GithubReleaseAsset {
  name: string;
  url: string;
  size?: number;
}

export interface GithubRelease {
  tag: string;
  draft: boolean;
  prerelease: boolean;
  assets: GithubReleaseAsset[];
}

function repositoryKey(repository: RepositoryRef): string {
  return `${repository.owner}/${repository.repo}`;
}

/**
 * Release listings fetched during one orchestrator invocation. Concurrent
 * callers share the in-flight request; failed lookups are not remembered.
 */
export class ReleaseIndexCache {
  private readonly entries = new Map<string, Promise<GithubRelease[]>>();

  getOrLoad(repository: RepositoryRef, load: () => Promise<GithubRelease[]>): Promise<GithubRelease[]> {
    const key = repositoryKey(repository);
    const cached = this.entries.get(key);
    if (cached) {
      return cached;
    }
    const pending = load().catch((error: unknown) => {
      this.entries.delete(key);
      throw error;
    });
    this.entries.set(key, pending);
    return pending;
  }

  has(repository: RepositoryRef): boolean {
    return this.entries.has(repositoryKey(repository));
  }
}

export interface ReleaseIndexClientOptions {
  http: HttpClient;
  cache: ReleaseIndexCache;
  retry: RetryPolicy;
  token?: string;
  apiBaseUrl?: string;
  perPage?: number;
  signal?: AbortSignal;
  /** Clock for rate-limit reset times */
  now?: () => number;
}

function sanitizeAsset(raw: unknown): GithubReleaseAsset | undefined {
  if (!raw || typeof raw !== 'object') return undefined;
  const name = 'name' in raw ? raw.name : undefined;
  const url = 'browser_download_url' in raw ? raw.browser_download_url : undefined;
  const size = 'size' in raw ? raw.size : undefined;
  if (typeof name !== 'string' || typeof url !== 'string') return undefined;
  return typeof size === 'number' ? { name, url, size } : { name, url };
}

function sanitizeRelease(raw: unknown): GithubRelease | undefined {
  if (!raw || typeof raw !== 'object') return undefined;
  const tag = 'tag_name' in raw ? raw.tag_name : undefined;
  if (typeof tag !== 'string' || tag.length === 0) return undefined;
  const rawAssets = 'assets' in raw && Array.isArray(raw.assets) ? raw.assets : [];
  const assets: GithubReleaseAsset[] = [];
  for (const entry of rawAssets) {
    const asset = sanitizeAsset(entry);
    if (asset) assets.push(asset);
  }
  return {
    tag,
    draft: 'draft' in raw && raw.draft === true,
    prerelease: 'prerelease' in raw && raw.prerelease === true,
    assets
  };
}

function isRateLimited(response: HttpResponse, body: string): boolean {
  if (response.status === 429) return true;
  if (response.status !== 403) return false;
  return response.headers['x-ratelimit-remaining'] === '0' || /rate limit/i.test(body);
}

/**
 * Wait in milliseconds the server asks for: `retry-after` in seconds or as an
 * HTTP date, otherwise the `x-ratelimit-reset` epoch second.
 */
export function rateLimitWait(headers: Record<string, string>, now: number): number | undefined {
  const retryAfter = headers['retry-after']?.trim();
  if (retryAfter) {
    if (/^\d+$/.test(retryAfter)) return Number(retryAfter) * 1000;
    const at = Date.parse(retryAfter);
    if (!Number.isNaN(at)) return Math.max(0, at - now);
  }
  const reset = headers['x-ratelimit-reset']?.trim();
  if (reset && /^\d+$/.test(reset)) {
    return Math.max(0, Number(reset) * 1000 - now);
  }
  return undefined;
}

function isRetryableIndexError(error: unknown): boolean {
  if (error instanceof RateLimitedError) {
    return (error.retryAfterMs ?? 0) <= GITHUB.RATE_LIMIT_MAX_WAIT_MS;
  }
  return error instanceof IndexUnreachableError;
}

/**
 * Pages through `GET /repos/{owner}/{repo}/releases`. Each page is retried on
 * its own; pages already fetched are kept.
 */
export class ReleaseIndexClient {
  private readonly http: HttpClient;
  private readonly cache: ReleaseIndexCache;
  private readonly retry: RetryPolicy;
  private readonly token?: string;
  private readonly apiBaseUrl: string;
  private readonly perPage: number;
  private readonly signal?: AbortSignal;
  private readonly now: () => number;

  constructor(options: ReleaseIndexClientOptions) {
    this.http = options.http;
    this.cache = options.cache;
    this.retry = options.retry;
    this.token = options.token;
    this.apiBaseUrl = (options.apiBaseUrl ?? GITHUB.API_BASE_URL).replace(/\/+$/, '');
    this.perPage = options.perPage ?? GITHUB.PER_PAGE;
    this.signal = options.signal;
    this.now = options.now ?? Date.now;
  }

  listReleases(repository: RepositoryRef): Promise<GithubRelease[]> {
    return this.cache.getOrLoad(repository, () => this.fetchAllPages(repository));
  }

  private headers(): Record<string, string> {
    const headers: Record<string, string> = {
      Accept: GITHUB.ACCEPT,
      'X-GitHub-Api-Version': GITHUB.API_VERSION,
      'User-Agent': GITHUB.USER_AGENT
    };
    if (this.token) {
      headers.Authorization = `Bearer ${this.token}`;
    }
    return headers;
  }

  private async fetchAllPages(repository: RepositoryRef): Promise<GithubRelease[]> {
    const releases: GithubRelease[] = [];
    for (let page = 1; ; page++) {
      const url = `${this.apiBaseUrl}/repos/${repository.owner}/${repository.repo}/releases?per_page=${this.perPage}&page=${page}`;
      const entries = await this.fetchPageWithRetry(url);
      for (const entry of entries) {
        const release = sanitizeRelease(entry);
        if (release) releases.push(release);
      }
      if (entries.length < this.perPage) {
        break;
      }
    }
    logger.debug(`Fetched ${releases.length} releases of ${repositoryKey(repository)}`);
    return releases;
  }

  private async fetchPageWithRetry(url: string): Promise<unknown[]> {
    try {
      return await this.retry.run(() => this.fetchPage(url), {
        signal: this.signal,
        shouldRetry: isRetryableIndexError,
        requestedDelay: error => (error instanceof RateLimitedError ? error.retryAfterMs : undefined),
        onRetry: (error, attempt, delayMs) =>
          logger.warn(`Release index request failed (attempt ${attempt}), retrying in ${delayMs}ms`, { url, error })
      });
    } catch (error) {
      if (error instanceof RetryExhaustedError) {
        throw error.lastError;
      }
      throw error;
    }
  }

  private async fetchPage(url: string): Promise<unknown[]> {
    let response: HttpResponse;
    let body: string;
    try {
      response = await this.http.get(url, { headers: this.headers(), signal: this.signal });
      body = await response.text();
    } catch (error) {
      if (isAbortError(error)) throw error;
      throw new IndexUnreachableError(url, error);
    }

    if (response.status === 401 || (response.status === 403 && /bad credentials/i.test(body))) {
      throw new ConfigurationError('The GitHub token is invalid (Bad credentials). Check GITHUB_TOKEN or --github-token.', {
        url
      });
    }
    if (isRateLimited(response, body)) {
      throw new RateLimitedError(url, Boolean(this.token), rateLimitWait(response.headers, this.now()));
    }
    if (response.status === 404) {
      throw new NotFoundError(`Release index not found: ${url}`, { url });
    }
    if (response.status >= 500) {
      throw new IndexUnreachableError(url, `HTTP ${response.status}`);
    }
    if (response.status < 200 || response.status >= 300) {
      throw new IndexUnreachableError(url, `unexpected HTTP ${response.status}`);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(body);
    } catch (error) {
      throw new IndexUnreachableError(url, error);
    }
    if (!Array.isArray(parsed)) {
      throw new IndexUnreachableError(url, 'response is not a list of releases');
    }
    return parsed;
  }
}
