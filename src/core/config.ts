import { join } from 'path';
import type { EspforgeConfig, EspforgeDirectories, RetryConfig } from '../types/index.js';
import { FILE_PATTERNS } from '../constants/index.js';
import { exists, readJsoncFile } from '../utils/fs.js';
import { logger } from '../utils/logger.js';
import { ConfigurationError } from '../utils/errors.js';
import { asRecord } from '../utils/records.js';

function positiveInteger(value: unknown, key: string, path: string): number | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 1) {
    throw new ConfigurationError(`Invalid '${key}' in ${path}: expected a positive integer`);
  }
  return value;
}

function nonNegativeNumber(value: unknown, key: string, path: string): number | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
    throw new ConfigurationError(`Invalid '${key}' in ${path}: expected a non-negative number`);
  }
  return value;
}

function optionalString(value: unknown, key: string, path: string): string | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== 'string') {
    throw new ConfigurationError(`Invalid '${key}' in ${path}: expected a string`);
  }
  return value.trim() || undefined;
}

/** Validate the parsed content of a config file. Unknown keys are ignored. */
export function parseConfig(data: unknown, path: string): EspforgeConfig {
  const record = asRecord(data);
  if (!record) {
    throw new ConfigurationError(`Configuration file ${path} must contain an object`);
  }

  const config: EspforgeConfig = {};
  const concurrency = positiveInteger(record.concurrency, 'concurrency', path);
  if (concurrency !== undefined) config.concurrency = concurrency;

  if (record.retry !== undefined) {
    const retry = asRecord(record.retry);
    if (!retry) {
      throw new ConfigurationError(`Invalid 'retry' in ${path}: expected an object`);
    }
    const parsed: RetryConfig = {};
    const maxAttempts = positiveInteger(retry.maxAttempts, 'retry.maxAttempts', path);
    const baseDelayMs = nonNegativeNumber(retry.baseDelayMs, 'retry.baseDelayMs', path);
    const maxDelayMs = nonNegativeNumber(retry.maxDelayMs, 'retry.maxDelayMs', path);
    const jitter = nonNegativeNumber(retry.jitter, 'retry.jitter', path);
    if (jitter !== undefined && jitter > 1) {
      throw new ConfigurationError(`Invalid 'retry.jitter' in ${path}: expected a number between 0 and 1`);
    }
    if (maxAttempts !== undefined) parsed.maxAttempts = maxAttempts;
    if (baseDelayMs !== undefined) parsed.baseDelayMs = baseDelayMs;
    if (maxDelayMs !== undefined) parsed.maxDelayMs = maxDelayMs;
    if (jitter !== undefined) parsed.jitter = jitter;
    config.retry = parsed;
  }

  const proxy = optionalString(record.proxy, 'proxy', path);
  if (proxy) config.proxy = proxy;
  const githubToken = optionalString(record.githubToken, 'githubToken', path);
  if (githubToken) config.githubToken = githubToken;
  const exportFile = optionalString(record.exportFile, 'exportFile', path);
  if (exportFile) config.exportFile = exportFile;

  return config;
}

/**
 * Reads `config.jsonc` (or `config.json`) from the espforge config directory
 * once per process. No file means every setting falls back to its default.
 */
export class ConfigManager {
  private loaded?: { config: EspforgeConfig; path: string | null };

  constructor(private readonly dirs: Pick<EspforgeDirectories, 'config'>) {}

  async load(): Promise<EspforgeConfig> {
    this.loaded ??= await this.read();
    return this.loaded.config;
  }

  /** Path the configuration came from, or null when none was found. */
  getConfigPath(): string | null {
    return this.loaded?.path ?? null;
  }

  private async read(): Promise<{ config: EspforgeConfig; path: string | null }> {
    const candidates = FILE_PATTERNS.CONFIG_FILES.map(name => join(this.dirs.config, name));
    for (const path of candidates) {
      if (!(await exists(path))) continue;
      logger.debug(`Loading config from ${path}`);
      const data = await readJsoncFile(path).catch((error: unknown) => {
        throw new ConfigurationError(`Failed to load configuration from ${path}`, { error });
      });
      return { config: parseConfig(data, path), path };
    }
    logger.debug('No config file, using defaults');
    return { config: {}, path: null };
  }
}
