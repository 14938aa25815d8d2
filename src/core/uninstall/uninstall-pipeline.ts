import { resolve, sep } from 'path';
import pico from 'picocolors';
import type { InstalledComponent } from '../../types/index.js';
import { describeError } from '../../utils/errors.js';
import { exists, remove } from '../../utils/fs.js';
import { formatPathForDisplay, getTreeConnector } from '../../utils/formatters.js';
import { logger } from '../../utils/logger.js';
import type { ExecutionContext } from '../execution-context.js';
import { assertInstallationName } from '../manifest/manifest-store.js';

export interface RemovalFailure {
  path: string;
  error: string;
}

export interface UninstallResult {
  name: string;
  removed: string[];
  failed: RemovalFailure[];
}

function depth(path: string): number {
  return resolve(path).split(sep).length;
}

/**
 * Nested components first, so a parent is never removed while a child removal
 * is still pending.
 */
function removalOrder(components: readonly InstalledComponent[]): InstalledComponent[] {
  return [...components].sort((a, b) => depth(b.path) - depth(a.path));
}

/**
 * Remove everything a named installation's manifest records, then its
 * activation output and the manifest itself. Other installation names are
 * never consulted: each manifest owns the paths it lists.
 *
 * When some path cannot be removed the manifest is rewritten with just the
 * components that are left, so a later uninstall can retry them.
 */
export async function runUninstallPipeline(ctx: ExecutionContext, name: string): Promise<UninstallResult> {
  assertInstallationName(name);
  const { manifests, output } = ctx;
  const lock = await manifests.acquireLock(name);

  try {
    const manifest = await manifests.load(name);
    const removed: string[] = [];
    const failed: RemovalFailure[] = [];
    const remaining: InstalledComponent[] = [];

    for (const component of removalOrder(manifest.components)) {
      try {
        if (await exists(component.path)) {
          await remove(component.path);
          removed.push(component.path);
        } else {
          logger.debug(`Already gone: ${component.path}`);
        }
      } catch (error) {
        failed.push({ path: component.path, error: describeError(error) });
        remaining.push(component);
      }
    }

    try {
      await ctx.environmentTarget(manifest.host).clean(manifest);
    } catch (error) {
      failed.push({ path: manifest.activationFiles.join(', ') || 'activation', error: describeError(error) });
    }

    if (failed.length === 0) {
      await manifests.delete(name);
      output.success(`Uninstalled '${name}'`);
    } else {
      await manifests.save({ ...manifest, components: remaining, updatedAt: new Date().toISOString() });
      output.error(`Uninstall of '${name}' incomplete, ${failed.length} failed:`);
      failed.forEach((failure, index) => {
        const connector = getTreeConnector(index === failed.length - 1);
        output.info(`  ${connector}${pico.red(`${formatPathForDisplay(failure.path)}: ${failure.error}`)}`);
      });
    }

    removed.forEach((path, index) => {
      output.info(`  ${getTreeConnector(index === removed.length - 1)}${pico.dim(formatPathForDisplay(path))}`);
    });

    logger.info(`Uninstall of '${name}' finished`, { removed: removed.length, failed: failed.length });
    return { name, removed, failed };
  } finally {
    await lock.release();
  }
}
