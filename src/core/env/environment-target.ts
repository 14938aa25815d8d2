import { execFile } from 'child_process';
import { homedir } from 'os';
import { basename, dirname, extname, join } from 'path';
import { promisify } from 'util';
import type { Manifest, ShellDialect } from '../../types/index.js';
import { FILE_PATTERNS } from '../../constants/index.js';
import { FileSystemError, getErrorCode } from '../../utils/errors.js';
import { remove, writeTextFile } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';
import { isWindowsHost, type HostTriple } from '../host-triple.js';
import { activationPlan, DIALECT_EXTENSIONS, synthesizeActivation } from './activation.js';

const execFileAsync = promisify(execFile);

/**
 * Where activation output goes for a host: script files, and on Windows the
 * current user's persistent environment as well.
 */
export interface EnvironmentTarget {
  readonly dialects: readonly ShellDialect[];
  /** Files `apply` writes for an export file; the default export file when omitted */
  activationFiles(exportFile?: string): string[];
  /** Write activation for the manifest; returns the files written */
  apply(manifest: Manifest, exportFile?: string): Promise<string[]>;
  /** Undo `apply` for a manifest */
  clean(manifest: Manifest): Promise<void>;
  /** How to activate the installation in the current shell */
  usage(files: readonly string[]): string;
}

/**
 * Export file paths for every dialect. Sibling files share the basename of
 * the chosen export file.
 */
export function activationFilePaths(exportFile: string, dialects: readonly ShellDialect[]): string[] {
  const stem = basename(exportFile, extname(exportFile));
  const dir = dirname(exportFile);
  return dialects.map(dialect => join(dir, `${stem}${DIALECT_EXTENSIONS[dialect]}`));
}

abstract class ScriptEnvironmentTarget implements EnvironmentTarget {
  abstract readonly dialects: readonly ShellDialect[];

  constructor(protected readonly defaultExportFile: string) {}

  activationFiles(exportFile: string = this.defaultExportFile): string[] {
    return activationFilePaths(exportFile, this.dialects);
  }

  async apply(manifest: Manifest, exportFile?: string): Promise<string[]> {
    const artifacts = synthesizeActivation(manifest, this.dialects);
    const files = this.activationFiles(exportFile);
    for (let i = 0; i < artifacts.length; i++) {
      await writeTextFile(files[i], artifacts[i].content);
    }
    logger.debug(`Wrote activation files: ${files.join(', ')}`);
    return files;
  }

  async clean(manifest: Manifest): Promise<void> {
    for (const file of manifest.activationFiles) {
      await remove(file);
    }
  }

  abstract usage(files: readonly string[]): string;
}

export class PosixEnvironmentTarget extends ScriptEnvironmentTarget {
  readonly dialects: readonly ShellDialect[] = ['posix', 'fish'];

  constructor(home: string = homedir()) {
    super(join(home, FILE_PATTERNS.POSIX_EXPORT_FILE));
  }

  usage(files: readonly string[]): string {
    const [sh, fish] = files;
    return fish ? `. ${sh}   (or '. ${fish}' for fish)` : `. ${sh}`;
  }
}

/**
 * Persistent per-user environment variables
 */
export interface UserEnvironmentStore {
  get(name: string): Promise<string | undefined>;
  set(name: string, value: string): Promise<void>;
  delete(name: string): Promise<void>;
}

const USER_ENVIRONMENT_KEY = 'HKCU\\Environment';

/**
 * Current user's environment in the Windows registry, through `reg.exe`.
 * Machine-wide variables are never touched.
 */
export class RegistryUserEnvironment implements UserEnvironmentStore {
  async get(name: string): Promise<string | undefined> {
    try {
      const { stdout } = await execFileAsync('reg', ['query', USER_ENVIRONMENT_KEY, '/v', name]);
      const pattern = new RegExp(`^\\s*${name}\\s+REG_\\w+\\s+(.*)$`, 'im');
      return pattern.exec(stdout)?.[1]?.trim();
    } catch (error) {
      // reg exits with 1 when the value does not exist
      if (getErrorCode(error) === 'ENOENT') {
        throw new FileSystemError('reg.exe is not available', { error });
      }
      return undefined;
    }
  }

  async set(name: string, value: string): Promise<void> {
    await execFileAsync('reg', ['add', USER_ENVIRONMENT_KEY, '/v', name, '/t', 'REG_EXPAND_SZ', '/d', value, '/f']);
  }

  async delete(name: string): Promise<void> {
    if ((await this.get(name)) === undefined) return;
    await execFileAsync('reg', ['delete', USER_ENVIRONMENT_KEY, '/v', name, '/f']);
  }
}

function splitWindowsPath(value: string | undefined): string[] {
  return (value ?? '').split(';').filter(entry => entry.length > 0);
}

export class WindowsEnvironmentTarget extends ScriptEnvironmentTarget {
  readonly dialects: readonly ShellDialect[] = ['powershell', 'cmd'];

  constructor(
    private readonly userEnvironment: UserEnvironmentStore = new RegistryUserEnvironment(),
    home: string = homedir()
  ) {
    super(join(home, FILE_PATTERNS.WINDOWS_EXPORT_FILE));
  }

  async apply(manifest: Manifest, exportFile?: string): Promise<string[]> {
    const files = await super.apply(manifest, exportFile);
    const plan = activationPlan(manifest);

    for (const [name, value] of Object.entries(plan.variables)) {
      await this.userEnvironment.set(name, value);
    }

    const current = splitWindowsPath(await this.userEnvironment.get('PATH'));
    const missing = plan.pathEntries.filter(entry => !current.includes(entry));
    if (missing.length > 0) {
      await this.userEnvironment.set('PATH', [...missing, ...current].join(';'));
    }
    return files;
  }

  async clean(manifest: Manifest): Promise<void> {
    await super.clean(manifest);
    const plan = activationPlan(manifest);

    for (const name of Object.keys(plan.variables)) {
      await this.userEnvironment.delete(name);
    }

    const current = splitWindowsPath(await this.userEnvironment.get('PATH'));
    const remaining = current.filter(entry => !plan.pathEntries.includes(entry));
    if (remaining.length !== current.length) {
      await this.userEnvironment.set('PATH', remaining.join(';'));
    }
  }

  usage(files: readonly string[]): string {
    const [ps1, bat] = files;
    return bat ? `. ${ps1}   (or '${bat}' for cmd)` : `. ${ps1}`;
  }
}

export function environmentTargetFor(host: HostTriple, userEnvironment?: UserEnvironmentStore): EnvironmentTarget {
  return isWindowsHost(host) ? new WindowsEnvironmentTarget(userEnvironment) : new PosixEnvironmentTarget();
}
