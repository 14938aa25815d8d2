import { homedir } from 'os';
import { isAbsolute, sep } from 'path';

/**
 * Formatting utilities for consistent display across commands
 */

/**
 * Format a file system path for display to the user: tilde notation for paths
 * under the home directory, unchanged otherwise.
 *
 * @example
 * formatPathForDisplay('/home/user/.rustup/toolchains/esp', '/home/user') // => '~/.rustup/toolchains/esp'
 */
export function formatPathForDisplay(path: string, home: string = homedir()): string {
  if (!isAbsolute(path) || !home) {
    return path;
  }
  if (path === home) {
    return '~';
  }
  const prefix = home.endsWith(sep) ? home : `${home}${sep}`;
  return path.startsWith(prefix) ? `~${sep}${path.slice(prefix.length)}` : path;
}

/**
 * Get tree connector for list items
 */
export function getTreeConnector(isLast: boolean): string {
  return isLast ? '└── ' : '├── ';
}

export function pluralize(count: number, singular: string, plural: string = `${singular}s`): string {
  return `${count} ${count === 1 ? singular : plural}`;
}
