/**
 * Shared constants for the espforge CLI application
 * This file provides a single source of truth for directory names,
 * file patterns, remote locations and other constants used throughout the application.
 */

export const DIR_PATTERNS = {
  ESPFORGE: '.espforge',
  RUSTUP: '.rustup',
  ESPRESSIF: '.espressif'
} as const;

export const ESPFORGE_DIRS = {
  MANIFESTS: 'manifests',
  STAGING: 'staging',
  TOOLCHAINS: 'toolchains',
  FRAMEWORKS: 'frameworks'
} as const;

export const FILE_PATTERNS = {
  MANIFEST_EXTENSION: '.yml',
  LOCK_EXTENSION: '.lock',
  CONFIG_FILES: ['config.jsonc', 'config.json'],
  POSIX_EXPORT_FILE: 'export-esp.sh',
  WINDOWS_EXPORT_FILE: 'export-esp.ps1'
} as const;

export const ENV_VARS = {
  HOME: 'ESPFORGE_HOME',
  LOG_LEVEL: 'ESPFORGE_LOG_LEVEL',
  VERBOSE: 'ESPFORGE_VERBOSE',
  EXPORT_FILE: 'ESPFORGE_EXPORT_FILE',
  RUSTUP_HOME: 'RUSTUP_HOME',
  IDF_TOOLS_PATH: 'IDF_TOOLS_PATH',
  GITHUB_TOKEN: 'GITHUB_TOKEN'
} as const;

/** Checked in this order, first match wins */
export const PROXY_ENV_VARS = ['https_proxy', 'HTTPS_PROXY', 'all_proxy', 'ALL_PROXY'] as const;

export const GITHUB = {
  API_BASE_URL: 'https://api.github.com',
  API_VERSION: '2022-11-28',
  ACCEPT: 'application/vnd.github+json',
  USER_AGENT: 'espforge',
  PER_PAGE: 100,
  /** Longer rate-limit waits are reported instead of slept through */
  RATE_LIMIT_MAX_WAIT_MS: 60_000
} as const;

export const REPOSITORIES = {
  TOOLCHAIN: { owner: 'esp-rs', repo: 'rust-build' },
  CROSS_COMPILER: { owner: 'espressif', repo: 'crosstool-NG' },
  SUPPORT_LIBRARY: { owner: 'espressif', repo: 'llvm-project' }
} as const;

export const SDK_REPOSITORY_URL = 'https://github.com/espressif/esp-idf';

export const DEFAULTS = {
  INSTALLATION_NAME: 'esp',
  /** rustup toolchain that receives the RISC-V targets */
  STABLE_TOOLCHAIN: 'nightly',
  CONCURRENCY: 4,
  RETRY_MAX_ATTEMPTS: 5,
  RETRY_BASE_DELAY_MS: 500,
  RETRY_MAX_DELAY_MS: 10_000,
  RETRY_JITTER: 0.2
} as const;

export const MANIFEST_SCHEMA_VERSION = 1 as const;

export const MANIFEST_HEADER = '# This file is managed by espforge. Do not edit manually.';

export type EspforgeDir = typeof ESPFORGE_DIRS[keyof typeof ESPFORGE_DIRS];
