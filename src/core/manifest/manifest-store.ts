import { promises as fs } from 'fs';
import { join } from 'path';
import * as yaml from 'js-yaml';
import type { ComponentKind, InstalledComponent, Manifest } from '../../types/index.js';
import { FILE_PATTERNS, MANIFEST_HEADER, MANIFEST_SCHEMA_VERSION } from '../../constants/index.js';
import {
  ConcurrentInstallError,
  ConfigurationError,
  FileSystemError,
  ManifestCorruptError,
  NotInstalledError,
  getErrorCode
} from '../../utils/errors.js';
import { ensureDir, exists, listFiles, readTextFile, remove, writeTextFileAtomic } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';
import { asRecord } from '../../utils/records.js';
import { isHostTriple } from '../host-triple.js';
import { isTarget, type Target } from '../targets.js';

const INSTALLATION_NAME = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

const COMPONENT_KINDS: readonly ComponentKind[] = ['toolchain', 'cross-compiler', 'support-library', 'sdk'];

export function assertInstallationName(name: string): void {
  if (!INSTALLATION_NAME.test(name)) {
    throw new ConfigurationError(
      `Invalid installation name '${name}': use letters, digits, '.', '_' or '-', starting with a letter or digit`
    );
  }
}

export interface ManifestLock {
  path: string;
  release(): Promise<void>;
}

function isComponentKind(value: unknown): value is ComponentKind {
  return COMPONENT_KINDS.some(kind => kind === value);
}

function requireString(record: Record<string, unknown>, key: string, problems: string[]): string {
  const value = record[key];
  if (typeof value !== 'string' || value.length === 0) {
    problems.push(`'${key}' must be a non-empty string`);
    return '';
  }
  return value;
}

function sanitizeComponent(raw: unknown, index: number, problems: string[]): InstalledComponent | undefined {
  const record = asRecord(raw);
  if (!record) {
    problems.push(`components[${index}] must be a mapping`);
    return undefined;
  }
  if (!isComponentKind(record.kind)) {
    problems.push(`components[${index}].kind is not a known component kind`);
    return undefined;
  }
  const entryProblems: string[] = [];
  const component: InstalledComponent = {
    kind: record.kind,
    name: requireString(record, 'name', entryProblems),
    version: requireString(record, 'version', entryProblems),
    path: requireString(record, 'path', entryProblems),
    shared: record.shared === true
  };
  problems.push(...entryProblems.map(problem => `components[${index}]: ${problem}`));
  return entryProblems.length === 0 ? component : undefined;
}

/**
 * Validate parsed manifest content. Returns the manifest or the list of problems.
 */
export function sanitizeManifest(data: unknown): { manifest?: Manifest; problems: string[] } {
  const record = asRecord(data);
  if (!record) {
    return { problems: ['document is not a mapping'] };
  }

  const schemaVersion = record.schemaVersion;
  if (typeof schemaVersion !== 'number') {
    return { problems: ['schemaVersion is missing'] };
  }
  if (schemaVersion > MANIFEST_SCHEMA_VERSION) {
    return { problems: [`schemaVersion ${schemaVersion} is newer than supported (${MANIFEST_SCHEMA_VERSION})`] };
  }
  if (schemaVersion !== MANIFEST_SCHEMA_VERSION) {
    return { problems: [`schemaVersion ${schemaVersion} is no longer supported`] };
  }

  const problems: string[] = [];
  const name = requireString(record, 'name', problems);

  const host = record.host;
  if (typeof host !== 'string' || !isHostTriple(host)) {
    problems.push(`'host' is not a supported host triple`);
  }

  const targets: Target[] = [];
  if (Array.isArray(record.targets)) {
    for (const target of record.targets) {
      if (typeof target === 'string' && isTarget(target)) {
        targets.push(target);
      } else {
        problems.push(`unknown target '${String(target)}'`);
      }
    }
  } else {
    problems.push(`'targets' must be a list`);
  }

  const options = asRecord(record.options) ?? {};
  const paths = asRecord(record.paths);
  if (!paths) {
    problems.push(`'paths' must be a mapping`);
  }

  const components: InstalledComponent[] = [];
  if (Array.isArray(record.components)) {
    record.components.forEach((entry, index) => {
      const component = sanitizeComponent(entry, index, problems);
      if (component) components.push(component);
    });
  } else {
    problems.push(`'components' must be a list`);
  }

  const activationFiles = Array.isArray(record.activationFiles)
    ? record.activationFiles.filter((file): file is string => typeof file === 'string' && file.length > 0)
    : [];

  const createdAt = requireString(record, 'createdAt', problems);
  const updatedAt = requireString(record, 'updatedAt', problems);

  if (problems.length > 0 || !paths || typeof host !== 'string' || !isHostTriple(host)) {
    return { problems };
  }

  const pathProblems: string[] = [];
  const manifestPaths = {
    toolchains: requireString(paths, 'toolchains', pathProblems),
    tools: requireString(paths, 'tools', pathProblems)
  };
  if (pathProblems.length > 0) {
    return { problems: pathProblems.map(problem => `paths: ${problem}`) };
  }

  return {
    manifest: {
      schemaVersion,
      name,
      host,
      targets,
      options: {
        stdOnly: options.stdOnly === true,
        extendedLlvm: options.extendedLlvm === true,
        sdkMinimal: options.sdkMinimal === true
      },
      paths: manifestPaths,
      components,
      activationFiles,
      createdAt,
      updatedAt
    },
    problems: []
  };
}

function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    return getErrorCode(error) === 'EPERM';
  }
}

const UNWRITTEN_LOCK_GRACE_MS = 10_000;

let pendingLockCount = 0;

type LockOwner = { state: 'gone' } | { state: 'held' } | { state: 'stale'; pid?: number };

/**
 * Publish a lock file holding our pid. Resolves false when the lock is taken.
 */
async function linkLockFile(path: string): Promise<boolean> {
  const pending = `${path}.${process.pid}.${pendingLockCount++}.tmp`;
  try {
    await fs.writeFile(pending, `${process.pid}\n`, 'utf8');
    await fs.link(pending, path);
    return true;
  } catch (error) {
    if (getErrorCode(error) === 'EEXIST') return false;
    throw new FileSystemError(`Failed to create lock file: ${path}`, { path, error });
  } finally {
    await fs.rm(pending, { force: true });
  }
}

async function readLockOwner(path: string, now: number = Date.now()): Promise<LockOwner> {
  try {
    const [content, stats] = await Promise.all([fs.readFile(path, 'utf8'), fs.stat(path)]);
    const pid = Number.parseInt(content.trim(), 10);
    if (Number.isInteger(pid) && pid > 0) {
      return isProcessAlive(pid) ? { state: 'held' } : { state: 'stale', pid };
    }
    return now - stats.mtimeMs < UNWRITTEN_LOCK_GRACE_MS ? { state: 'held' } : { state: 'stale' };
  } catch (error) {
    if (getErrorCode(error) === 'ENOENT') return { state: 'gone' };
    throw new FileSystemError(`Failed to read lock file: ${path}`, { path, error });
  }
}

/**
 * Persists one YAML manifest per named installation under `<home>/manifests`.
 */
export class ManifestStore {
  constructor(private readonly directory: string) {}

  manifestPath(name: string): string {
    return join(this.directory, `${name}${FILE_PATTERNS.MANIFEST_EXTENSION}`);
  }

  lockPath(name: string): string {
    return join(this.directory, `${name}${FILE_PATTERNS.LOCK_EXTENSION}`);
  }

  async exists(name: string): Promise<boolean> {
    return exists(this.manifestPath(name));
  }

  async load(name: string): Promise<Manifest> {
    assertInstallationName(name);
    const path = this.manifestPath(name);
    if (!(await exists(path))) {
      throw new NotInstalledError(name);
    }

    let parsed: unknown;
    try {
      parsed = yaml.load(await readTextFile(path));
    } catch (error) {
      if (error instanceof yaml.YAMLException) {
        throw new ManifestCorruptError(path, `invalid YAML: ${error.reason}`);
      }
      throw error;
    }

    const { manifest, problems } = sanitizeManifest(parsed);
    if (!manifest) {
      throw new ManifestCorruptError(path, problems.join('; '));
    }
    if (manifest.name !== name) {
      throw new ManifestCorruptError(path, `records installation '${manifest.name}' instead of '${name}'`);
    }
    return manifest;
  }

  async save(manifest: Manifest): Promise<void> {
    assertInstallationName(manifest.name);
    const body = yaml.dump(
      {
        schemaVersion: manifest.schemaVersion,
        name: manifest.name,
        host: manifest.host,
        targets: manifest.targets,
        options: manifest.options,
        paths: manifest.paths,
        components: manifest.components.map(component => ({
          kind: component.kind,
          name: component.name,
          version: component.version,
          path: component.path,
          shared: component.shared
        })),
        activationFiles: manifest.activationFiles,
        createdAt: manifest.createdAt,
        updatedAt: manifest.updatedAt
      },
      { lineWidth: 120, noRefs: true }
    );
    await writeTextFileAtomic(this.manifestPath(manifest.name), `${MANIFEST_HEADER}\n\n${body}`);
    logger.debug(`Saved manifest for installation '${manifest.name}'`);
  }

  async delete(name: string): Promise<void> {
    await remove(this.manifestPath(name));
  }

  /**
   * Names of recorded installations, sorted
   */
  async list(): Promise<string[]> {
    const files = await listFiles(this.directory);
    return files
      .filter(file => file.endsWith(FILE_PATTERNS.MANIFEST_EXTENSION))
      .map(file => file.slice(0, -FILE_PATTERNS.MANIFEST_EXTENSION.length))
      .sort();
  }

  /**
   * Take the exclusive lock for an installation name. A lock left by a process
   * that is no longer running is taken over. The lock file is linked into place
   * with its owner already written, so it never appears empty; an empty or
   * unparseable lock younger than a few seconds is treated as held.
   */
  async acquireLock(name: string): Promise<ManifestLock> {
    assertInstallationName(name);
    await ensureDir(this.directory);
    const path = this.lockPath(name);

    for (let attempt = 0; attempt < 3; attempt++) {
      if (await linkLockFile(path)) {
        logger.debug(`Acquired lock ${path}`);
        return {
          path,
          release: async () => {
            await remove(path);
            logger.debug(`Released lock ${path}`);
          }
        };
      }

      const owner = await readLockOwner(path);
      if (owner.state === 'gone') continue;
      if (owner.state === 'held') {
        throw new ConcurrentInstallError(name, path);
      }
      logger.warn(`Removing stale lock ${path} left by process ${owner.pid ?? 'unknown'}`);
      await remove(path);
    }

    throw new ConcurrentInstallError(name, path);
  }
}
