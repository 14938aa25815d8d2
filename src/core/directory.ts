import * as os from 'os';
import * as path from 'path';
import type { EspforgeDirectories } from '../types/index.js';
import { DIR_PATTERNS, ENV_VARS, ESPFORGE_DIRS } from '../constants/index.js';
import { ensureDir } from '../utils/fs.js';
import { logger } from '../utils/logger.js';

/**
 * Cross-platform directory resolution
 */

/**
 * Resolve espforge directories.
 *
 * - home: `ESPFORGE_HOME` or `~/.espforge` (config, manifests, staging)
 * - toolchains: `$RUSTUP_HOME/toolchains` or `~/.rustup/toolchains`
 * - tools: `IDF_TOOLS_PATH` or `~/.espressif`
 *
 * Staging lives under home so promotion is a rename on the same device in the
 * common case.
 */
export function getEspforgeDirectories(
  env: NodeJS.ProcessEnv = process.env,
  homeDir: string = os.homedir()
): EspforgeDirectories {
  const home = path.resolve(env[ENV_VARS.HOME] || path.join(homeDir, DIR_PATTERNS.ESPFORGE));
  const rustupHome = path.resolve(env[ENV_VARS.RUSTUP_HOME] || path.join(homeDir, DIR_PATTERNS.RUSTUP));
  const tools = path.resolve(env[ENV_VARS.IDF_TOOLS_PATH] || path.join(homeDir, DIR_PATTERNS.ESPRESSIF));

  return {
    home,
    config: home,
    manifests: path.join(home, ESPFORGE_DIRS.MANIFESTS),
    staging: path.join(home, ESPFORGE_DIRS.STAGING),
    toolchains: path.join(rustupHome, ESPFORGE_DIRS.TOOLCHAINS),
    tools
  };
}

/**
 * Ensure the directories espforge writes into exist
 */
export async function ensureEspforgeDirectories(dirs: EspforgeDirectories): Promise<EspforgeDirectories> {
  try {
    await Promise.all([ensureDir(dirs.home), ensureDir(dirs.manifests), ensureDir(dirs.staging)]);
    logger.debug('espforge directories ensured', { directories: dirs });
    return dirs;
  } catch (error) {
    logger.error('Failed to create espforge directories', { error, directories: dirs });
    throw error;
  }
}
