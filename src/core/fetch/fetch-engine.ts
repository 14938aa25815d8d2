import { createWriteStream, promises as fs } from 'fs';
import { join } from 'path';
import { pipeline } from 'stream/promises';
import type { ReleaseAsset } from '../../types/index.js';
import { GITHUB } from '../../constants/index.js';
import type { HttpClient } from '../../utils/http-client.js';
import { RetryPolicy, RetryExhaustedError } from '../../utils/retry.js';
import { DownloadFailedError, NotFoundError, isAbortError } from '../../utils/errors.js';
import { makeTempDir, movePath, remove } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';
import type { CommandRunner } from '../../utils/process.js';
import { extractArchive, singleRootDirectory, type XzDecoder } from './archive-extractor.js';

/**
 * Downloaded and unpacked content waiting to be moved into place
 */
export interface StagedArtifact {
  /** Private directory owning everything staged for this operation */
  stagingDir: string;
  /** Directory whose content becomes the destination */
  contentDir: string;
}

export interface StageOptions {
  signal?: AbortSignal;
  unwrapSingleRoot?: boolean;
}

export interface FetchEngineOptions {
  http: HttpClient;
  retry: RetryPolicy;
  stagingRoot: string;
  /** Runs the host tar for tar.xz archives */
  runCommand?: CommandRunner;
  xzDecoder?: XzDecoder;
}

class TruncatedDownloadError extends Error {
  constructor(expected: number, received: number) {
    super(`Truncated transfer: expected ${expected} bytes, received ${received}`);
    this.name = 'TruncatedDownloadError';
  }
}

class HttpStatusError extends Error {
  constructor(public readonly status: number, url: string) {
    super(`HTTP ${status} for ${url}`);
    this.name = 'HttpStatusError';
  }
}

/**
 * Stages release archives: download with retry, verify, unpack. Nothing outside
 * the staging root is touched until `promote`.
 */
export class ArchiveFetchEngine {
  private readonly http: HttpClient;
  private readonly retry: RetryPolicy;
  private readonly stagingRoot: string;
  private readonly runCommand?: CommandRunner;
  private readonly xzDecoder?: XzDecoder;

  constructor(options: FetchEngineOptions) {
    this.http = options.http;
    this.retry = options.retry;
    this.stagingRoot = options.stagingRoot;
    this.runCommand = options.runCommand;
    this.xzDecoder = options.xzDecoder;
  }

  async stage(asset: ReleaseAsset, options: StageOptions = {}): Promise<StagedArtifact> {
    const stagingDir = await makeTempDir(this.stagingRoot, `${asset.component}-`);
    try {
      const archivePath = join(stagingDir, asset.name);
      await this.download(asset.url, archivePath, options.signal);

      options.signal?.throwIfAborted();
      const contentDir = join(stagingDir, 'content');
      await extractArchive(archivePath, asset.archive, contentDir, {
        runCommand: this.runCommand,
        xzDecoder: this.xzDecoder,
        signal: options.signal
      });
      await remove(archivePath);

      const root = options.unwrapSingleRoot ? await singleRootDirectory(contentDir) : undefined;
      logger.debug(`Staged ${asset.name} in ${stagingDir}`);
      return { stagingDir, contentDir: root ?? contentDir };
    } catch (error) {
      await remove(stagingDir);
      throw error;
    }
  }

  /**
   * Reserve an empty staging area for content produced by something other than
   * a download, such as the SDK installer.
   */
  async createStagingArea(label: string): Promise<StagedArtifact> {
    const stagingDir = await makeTempDir(this.stagingRoot, `${label}-`);
    return { stagingDir, contentDir: join(stagingDir, 'content') };
  }

  /**
   * Replace `destination` with the staged content and release the staging area.
   */
  async promote(staged: StagedArtifact, destination: string): Promise<void> {
    await remove(destination);
    await movePath(staged.contentDir, destination);
    await remove(staged.stagingDir);
    logger.debug(`Promoted ${staged.contentDir} to ${destination}`);
  }

  async discard(staged: StagedArtifact): Promise<void> {
    await remove(staged.stagingDir);
  }

  private async download(url: string, filePath: string, signal?: AbortSignal): Promise<void> {
    try {
      await this.retry.run(() => this.downloadOnce(url, filePath, signal), {
        signal,
        shouldRetry: error => !(error instanceof NotFoundError) && !isAbortError(error),
        onRetry: (error, attempt, delayMs) =>
          logger.warn(`Download attempt ${attempt} of ${url} failed, retrying in ${delayMs}ms`, { error })
      });
    } catch (error) {
      if (error instanceof RetryExhaustedError) {
        throw new DownloadFailedError(url, error.attempts, error.lastError);
      }
      throw error;
    }
  }

  private async downloadOnce(url: string, filePath: string, signal?: AbortSignal): Promise<void> {
    const response = await this.http.get(url, { headers: { 'User-Agent': GITHUB.USER_AGENT }, signal });
    if (response.status < 200 || response.status >= 300) {
      await response.discard();
      if (response.status === 404) {
        throw new NotFoundError(`Asset not found: ${url}`, { url });
      }
      throw new HttpStatusError(response.status, url);
    }
    const body = response.stream();
    if (!body) {
      throw new Error(`Empty response body for ${url}`);
    }

    // Each attempt restarts from scratch
    await pipeline(body, createWriteStream(filePath), { signal });

    const expected = Number(response.headers['content-length']);
    if (Number.isFinite(expected) && expected > 0) {
      const { size } = await fs.stat(filePath);
      if (size !== expected) {
        throw new TruncatedDownloadError(expected, size);
      }
    }
  }
}
