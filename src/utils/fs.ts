import { promises as fs, type Dirent } from 'fs';
import { basename, dirname, join } from 'path';
import { parse as parseJsonc, printParseErrorCode, type ParseError } from 'jsonc-parser';
import { isJunk } from 'junk';
import { logger } from './logger.js';
import { FileSystemError, getErrorCode } from './errors.js';

/** Run `fn`, rethrowing any failure as a FileSystemError carrying `what`. */
async function attempt<T>(what: string, details: Record<string, unknown>, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    throw new FileSystemError(what, { ...details, error });
  }
}

export async function exists(path: string): Promise<boolean> {
  return fs.access(path).then(() => true, () => false);
}

export async function isDirectory(path: string): Promise<boolean> {
  return fs.stat(path).then(stats => stats.isDirectory(), () => false);
}

export function ensureDir(path: string): Promise<void> {
  return attempt(`Failed to locate or create directory: ${path}`, { path }, async () => {
    await fs.mkdir(path, { recursive: true });
  });
}

export function readTextFile(path: string): Promise<string> {
  return attempt(`Failed to read file: ${path}`, { path }, () => fs.readFile(path, 'utf8'));
}

export async function writeTextFile(path: string, content: string): Promise<void> {
  await ensureDir(dirname(path));
  await attempt(`Failed to write file: ${path}`, { path }, () => fs.writeFile(path, content, 'utf8'));
  logger.debug(`Wrote ${path}`);
}

/** Write through a sibling temp file and rename it over `path`. */
export async function writeTextFileAtomic(path: string, content: string): Promise<void> {
  await ensureDir(dirname(path));
  const temp = join(dirname(path), `.${basename(path)}.${process.pid}.tmp`);
  try {
    await fs.writeFile(temp, content, 'utf8');
    await fs.rename(temp, path);
  } catch (error) {
    await fs.rm(temp, { force: true });
    throw new FileSystemError(`Failed to write file: ${path}`, { path, error });
  }
  logger.debug(`Wrote ${path}`);
}

/** Recursive delete. A missing path is not an error. */
export async function remove(path: string): Promise<void> {
  await attempt(`Failed to remove: ${path}`, { path }, () => fs.rm(path, { recursive: true, force: true }));
  logger.debug(`Removed ${path}`);
}

/** Plain files directly under `dir`, junk excluded. Empty when `dir` is missing. */
export async function listFiles(dir: string): Promise<string[]> {
  const entries: Dirent[] = await fs.readdir(dir, { withFileTypes: true }).catch((error: unknown) => {
    if (getErrorCode(error) === 'ENOENT') return [];
    throw new FileSystemError(`Failed to list files in directory: ${dir}`, { dir, error });
  });
  return entries.filter(entry => entry.isFile() && !isJunk(entry.name)).map(entry => entry.name);
}

/** Names under `dir` other than OS clutter like .DS_Store or Thumbs.db. */
export async function listMeaningfulEntries(dir: string): Promise<string[]> {
  const names = await attempt(`Failed to read directory: ${dir}`, { dir }, () => fs.readdir(dir));
  return names.filter(name => !isJunk(name));
}

/** JSON with comments and trailing commas allowed. */
export async function readJsoncFile(path: string): Promise<unknown> {
  const errors: ParseError[] = [];
  const value: unknown = parseJsonc(await readTextFile(path), errors, { allowTrailingComma: true });
  const [first] = errors;
  if (first) {
    throw new FileSystemError(`Failed to parse JSONC file: ${path}`, {
      path,
      reason: printParseErrorCode(first.error),
      offset: first.offset
    });
  }
  return value;
}

/**
 * Rename `from` to `to`, creating the parent of `to`. Across devices the
 * tree is copied (symlinks kept as-is) and the source removed.
 */
export async function movePath(from: string, to: string): Promise<void> {
  await ensureDir(dirname(to));
  await attempt(`Failed to move: ${from} -> ${to}`, { from, to }, async () => {
    try {
      await fs.rename(from, to);
    } catch (error) {
      if (getErrorCode(error) !== 'EXDEV') throw error;
      await fs.cp(from, to, { recursive: true, verbatimSymlinks: true });
      await fs.rm(from, { recursive: true, force: true });
    }
  });
  logger.debug(`Moved ${from} -> ${to}`);
}

/** Fresh uniquely named directory under `parent`. */
export async function makeTempDir(parent: string, prefix: string): Promise<string> {
  await ensureDir(parent);
  return attempt(`Failed to create temporary directory in: ${parent}`, { parent }, () =>
    fs.mkdtemp(join(parent, prefix))
  );
}
