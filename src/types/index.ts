/**
 * Common types and interfaces for the espforge CLI application
 */

import type { Target } from '../core/targets.js';
import type { HostTriple } from '../core/host-triple.js';

// Component types

export type ComponentKind = 'toolchain' | 'cross-compiler' | 'support-library' | 'sdk';

/**
 * Release-indexed component kinds. The SDK is pulled from source by its own
 * installer and has no release index.
 */
export type ReleasedComponentKind = Exclude<ComponentKind, 'sdk'>;

export type ArchiveKind = 'tar.gz' | 'tar.xz' | 'zip';

export type SourceRefType = 'commit' | 'tag' | 'branch';

export interface SourceRef {
  type: SourceRefType;
  value: string;
}

/**
 * A requested component version. Exactly one variant is active.
 * `source-ref` is only valid for the SDK.
 */
export type VersionSpec =
  | { kind: 'exact'; version: string }
  | { kind: 'incomplete'; prefix: string }
  | { kind: 'source-ref'; ref: SourceRef }
  | { kind: 'latest' };

export interface RepositoryRef {
  owner: string;
  repo: string;
}

export interface ReleaseAsset {
  component: ReleasedComponentKind;
  version: string;
  host: HostTriple;
  name: string;
  url: string;
  archive: ArchiveKind;
  size?: number;
}

export interface InstalledComponent {
  kind: ComponentKind;
  name: string;
  version: string;
  path: string;
  /** Installed once regardless of how many targets are requested */
  shared: boolean;
}

// Plan types

export interface SdkRequest {
  ref: SourceRef;
  /** Shallow checkout without history */
  minimal: boolean;
  repositoryUrl: string;
}

export interface PlannedOperation {
  id: string;
  kind: ComponentKind;
  name: string;
  version: string;
  destination: string;
  shared: boolean;
  /** Ids of operations whose destination encloses this one */
  dependsOn: string[];
  sdk?: SdkRequest;
}

export interface UnresolvedComponent {
  id: string;
  kind: ComponentKind;
  name: string;
}

export interface InstallPlan {
  operations: PlannedOperation[];
  /** Selected components whose version could not be resolved */
  unresolved: UnresolvedComponent[];
}

// Manifest types

export interface InstallOptionsRecord {
  stdOnly: boolean;
  extendedLlvm: boolean;
  sdkMinimal: boolean;
}

export interface ManifestPaths {
  toolchains: string;
  tools: string;
}

export interface Manifest {
  schemaVersion: number;
  name: string;
  host: HostTriple;
  targets: Target[];
  options: InstallOptionsRecord;
  paths: ManifestPaths;
  components: InstalledComponent[];
  activationFiles: string[];
  createdAt: string;
  updatedAt: string;
}

// Environment types

export type ShellDialect = 'posix' | 'fish' | 'powershell' | 'cmd';

export interface ActivationArtifact {
  dialect: ShellDialect;
  /** Extension appended to the export file basename */
  extension: string;
  content: string;
}

export interface ActivationPlan {
  /** PATH entries, in the order they end up at the front of PATH */
  pathEntries: string[];
  variables: Record<string, string>;
}

// Configuration types

export interface RetryConfig {
  maxAttempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  jitter?: number;
}

export interface EspforgeConfig {
  concurrency?: number;
  retry?: RetryConfig;
  proxy?: string;
  githubToken?: string;
  exportFile?: string;
}

export interface EspforgeDirectories {
  home: string;
  config: string;
  manifests: string;
  staging: string;
  toolchains: string;
  tools: string;
}

// Error types
export class EspforgeError extends Error {
  public code: string;
  public details?: Record<string, unknown>;

  constructor(message: string, code: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'EspforgeError';
    this.code = code;
    this.details = details;
  }
}

export enum ErrorCodes {
  CONFIGURATION_ERROR = 'CONFIGURATION_ERROR',
  UNRESOLVABLE_VERSION = 'UNRESOLVABLE_VERSION',
  NOT_FOUND = 'NOT_FOUND',
  RATE_LIMITED = 'RATE_LIMITED',
  INDEX_UNREACHABLE = 'INDEX_UNREACHABLE',
  DOWNLOAD_FAILED = 'DOWNLOAD_FAILED',
  MANIFEST_CORRUPT = 'MANIFEST_CORRUPT',
  NOT_INSTALLED = 'NOT_INSTALLED',
  CONCURRENT_INSTALL = 'CONCURRENT_INSTALL',
  PLAN_CONFLICT = 'PLAN_CONFLICT',
  SDK_INSTALL_FAILED = 'SDK_INSTALL_FAILED',
  TOOLCHAIN_INSTALL_FAILED = 'TOOLCHAIN_INSTALL_FAILED',
  FILE_SYSTEM_ERROR = 'FILE_SYSTEM_ERROR'
}

// Logger types
export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error'
}

export interface Logger {
  debug(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  error(message: string, meta?: unknown): void;
}
