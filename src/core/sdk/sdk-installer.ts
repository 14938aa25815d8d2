import { join } from 'path';
import type { SourceRef } from '../../types/index.js';
import { SdkInstallError, isAbortError } from '../../utils/errors.js';
import { remove } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';
import { commandFailureMessage, runCommand, type CommandInvocation, type CommandRunner } from '../../utils/process.js';
import type { Target } from '../targets.js';

export interface SdkInstallRequest {
  /** Must not exist yet; the checkout is created here */
  destination: string;
  ref: SourceRef;
  /** Shallow checkout without history, documentation or examples */
  minimal: boolean;
  repositoryUrl: string;
  targets: readonly Target[];
  signal?: AbortSignal;
}

/**
 * Builds the SDK source tree. The orchestrator only decides whether and with
 * which parameters to call it.
 */
export interface SdkInstaller {
  install(request: SdkInstallRequest): Promise<void>;
}

/** Directories dropped from a minimal checkout */
export const MINIMAL_PRUNED_PATHS = ['docs', 'examples', join('tools', 'esp_app_trace'), join('tools', 'test_idf_size')];

/**
 * Git commands producing a checkout of `ref` at `destination`
 */
export function buildSdkInstallCommands(request: SdkInstallRequest): CommandInvocation[] {
  const { ref, repositoryUrl, destination, minimal } = request;

  if (ref.type === 'commit') {
    return [
      { command: 'git', args: ['clone', repositoryUrl, destination] },
      { command: 'git', args: ['checkout', ref.value], cwd: destination },
      {
        command: 'git',
        args: ['submodule', 'update', '--init', '--recursive', ...(minimal ? ['--depth', '1'] : [])],
        cwd: destination
      }
    ];
  }

  const args = ['clone', '--branch', ref.value];
  if (minimal) {
    args.push('--depth', '1', '--shallow-submodules');
  }
  args.push('--recursive', repositoryUrl, destination);
  return [{ command: 'git', args }];
}

/**
 * SDK installer running git as a subprocess
 */
export class GitSdkInstaller implements SdkInstaller {
  constructor(private readonly run: CommandRunner = runCommand) {}

  async install(request: SdkInstallRequest): Promise<void> {
    logger.debug(`Checking out SDK ${request.ref.type} ${request.ref.value} for ${request.targets.join(', ')}`);
    for (const invocation of buildSdkInstallCommands(request)) {
      try {
        await this.run(invocation, request.signal);
      } catch (error) {
        if (isAbortError(error) || request.signal?.aborted) {
          throw error;
        }
        throw new SdkInstallError(`${invocation.command} ${invocation.args[0]} failed: ${commandFailureMessage(error)}`, {
          ref: request.ref,
          args: invocation.args
        });
      }
    }

    if (request.minimal) {
      for (const relativePath of MINIMAL_PRUNED_PATHS) {
        await remove(join(request.destination, relativePath));
      }
    }
  }
}
