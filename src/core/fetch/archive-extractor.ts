import { promises as fs } from 'fs';
import { join, resolve } from 'path';
import * as tar from 'tar';
import extractZip from 'extract-zip';
import { xz } from '@napi-rs/lzma';
import type { ArchiveKind } from '../../types/index.js';
import { FileSystemError } from '../../utils/errors.js';
import { ensureDir, listMeaningfulEntries, isDirectory } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';
import { runCommand, type CommandInvocation, type CommandRunner } from '../../utils/process.js';

/**
 * `system-tar` streams the archive through the host's tar and xz, so memory
 * stays flat however large the toolchain is. `in-process` decodes the whole
 * archive in memory and is kept for hosts whose tar cannot read xz.
 */
export type XzDecoder = 'system-tar' | 'in-process';

export interface ExtractOptions {
  xzDecoder?: XzDecoder;
  runCommand?: CommandRunner;
  signal?: AbortSignal;
}

/** The tar shipped with Windows is built without liblzma. */
export function defaultXzDecoder(platform: NodeJS.Platform = process.platform): XzDecoder {
  return platform === 'win32' ? 'in-process' : 'system-tar';
}

export function tarXzCommand(archivePath: string, destination: string): CommandInvocation {
  return { command: 'tar', args: ['-x', '-J', '-p', '-f', archivePath, '-C', destination] };
}

async function extractTarXzInProcess(archivePath: string, destination: string): Promise<void> {
  const decoded = await xz.decompress(await fs.readFile(archivePath));
  await new Promise<void>((resolvePromise, reject) => {
    const unpack = tar.x({ cwd: destination });
    unpack.on('error', reject);
    unpack.on('close', () => resolvePromise());
    unpack.end(decoded);
  });
}

/**
 * Unpack an archive into `destination`. File modes recorded in the archive are kept.
 */
export async function extractArchive(
  archivePath: string,
  kind: ArchiveKind,
  destination: string,
  options: ExtractOptions = {}
): Promise<void> {
  await ensureDir(destination);
  logger.debug(`Extracting ${kind} archive ${archivePath} into ${destination}`);

  try {
    switch (kind) {
      case 'tar.gz':
        await tar.x({ file: archivePath, cwd: destination });
        break;
      case 'tar.xz':
        if ((options.xzDecoder ?? defaultXzDecoder()) === 'system-tar') {
          await (options.runCommand ?? runCommand)(tarXzCommand(archivePath, destination), options.signal);
        } else {
          await extractTarXzInProcess(archivePath, destination);
        }
        break;
      case 'zip':
        await extractZip(archivePath, { dir: resolve(destination) });
        break;
    }
  } catch (error) {
    if (options.signal?.aborted) throw error;
    throw new FileSystemError(`Failed to extract ${archivePath}`, { archivePath, kind, error });
  }
}

/**
 * When `dir` holds exactly one directory (ignoring junk files), return it.
 */
export async function singleRootDirectory(dir: string): Promise<string | undefined> {
  const entries = await listMeaningfulEntries(dir);
  if (entries.length !== 1) {
    return undefined;
  }
  const candidate = join(dir, entries[0]);
  return (await isDirectory(candidate)) ? candidate : undefined;
}
