/**
 * Toolchain installer bundles. On Unix hosts the toolchain and its standard
 * library sources ship as archives carrying an `install.sh` that lays their
 * components out under a destination directory.
 */

import { join } from 'path';
import type { ReleaseAsset } from '../../types/index.js';
import { ToolchainInstallError } from '../../utils/errors.js';
import { ensureDir, exists } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';
import { commandFailureMessage, type CommandInvocation, type CommandRunner } from '../../utils/process.js';
import { singleRootDirectory } from '../fetch/archive-extractor.js';
import type { ArchiveFetchEngine, StagedArtifact } from '../fetch/fetch-engine.js';

export const BUNDLE_INSTALLER = 'install.sh';

/** Bundle components left out of every install */
export const EXCLUDED_BUNDLE_COMPONENTS = ['rust-docs-json-preview', 'rust-docs'] as const;

export type BundleStager = Pick<ArchiveFetchEngine, 'stage' | 'createStagingArea' | 'discard'>;

export interface BundleInstallOptions {
  stager: BundleStager;
  runCommand: CommandRunner;
  signal?: AbortSignal;
}

export function bundleInstallCommand(bundleRoot: string, destination: string): CommandInvocation {
  return {
    command: 'bash',
    args: [
      join(bundleRoot, BUNDLE_INSTALLER),
      `--destdir=${destination}`,
      '--prefix=',
      `--without=${EXCLUDED_BUNDLE_COMPONENTS.join(',')}`
    ]
  };
}

async function findBundleRoot(dir: string, assetName: string): Promise<string> {
  if (await exists(join(dir, BUNDLE_INSTALLER))) {
    return dir;
  }
  const root = await singleRootDirectory(dir);
  if (root && (await exists(join(root, BUNDLE_INSTALLER)))) {
    return root;
  }
  throw new ToolchainInstallError(`${assetName} contains no ${BUNDLE_INSTALLER}`, { assetName });
}

/**
 * Download each bundle and run its installer into one fresh staging area,
 * in order. The bundles themselves are discarded once installed.
 */
export async function stageFromBundles(
  assets: readonly ReleaseAsset[],
  options: BundleInstallOptions
): Promise<StagedArtifact> {
  const { stager, runCommand, signal } = options;
  const area = await stager.createStagingArea('toolchain');
  try {
    await ensureDir(area.contentDir);
    for (const asset of assets) {
      const bundle = await stager.stage(asset, { signal });
      try {
        const root = await findBundleRoot(bundle.contentDir, asset.name);
        logger.info(`Running the installer of ${asset.name}`);
        await runCommand(bundleInstallCommand(root, area.contentDir), signal);
      } catch (error) {
        if (signal?.aborted || error instanceof ToolchainInstallError) throw error;
        throw new ToolchainInstallError(`Installer of ${asset.name} failed: ${commandFailureMessage(error)}`, {
          assetName: asset.name,
          error
        });
      } finally {
        await stager.discard(bundle);
      }
    }
    return area;
  } catch (error) {
    await stager.discard(area);
    throw error;
  }
}
