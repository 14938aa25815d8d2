/**
 * Install Executor
 *
 * Runs an install plan in two phases:
 *  1. Staging: every operation that is not reused is downloaded/unpacked (or
 *     checked out, for the SDK, or run through its installer bundles, for the
 *     toolchain on Unix hosts) into a private staging area, concurrently and
 *     bounded by the configured limit. Nothing outside staging is touched.
 *  2. Promotion: staged content is moved into place in plan order. An
 *     operation whose prerequisite failed or could not be resolved is skipped
 *     and its staging discarded.
 *
 * Cancellation during staging discards all staging and raises
 * UserCancellationError with every destination untouched.
 */

import type { InstallPlan, PlannedOperation } from '../../types/index.js';
import { UserCancellationError, describeError, isAbortError } from '../../utils/errors.js';
import { mapWithConcurrency, type Settled } from '../../utils/concurrency.js';
import { pluralize } from '../../utils/formatters.js';
import { logger } from '../../utils/logger.js';
import type { CommandRunner } from '../../utils/process.js';
import type { OutputPort } from '../ports/output.js';
import { COMPONENTS } from '../components.js';
import type { HostTriple } from '../host-triple.js';
import type { Target } from '../targets.js';
import type { ArchiveFetchEngine, StagedArtifact } from '../fetch/fetch-engine.js';
import type { ReleaseLocator } from '../release/release-locator.js';
import type { SdkInstaller } from '../sdk/sdk-installer.js';
import { stageFromBundles } from '../toolchain/rust-bundle.js';

export type OperationStatus = 'installed' | 'reused' | 'failed' | 'skipped';

export interface OperationOutcome {
  id: string;
  kind: PlannedOperation['kind'];
  name: string;
  version?: string;
  destination?: string;
  status: OperationStatus;
  error?: string;
}

export const SKIPPED_DEPENDENCY_FAILURE = 'skipped due to dependency failure';

export type ArtifactStager = Pick<ArchiveFetchEngine, 'stage' | 'createStagingArea' | 'promote' | 'discard'>;

export interface InstallExecutorOptions {
  locator: Pick<ReleaseLocator, 'locate'>;
  stager: ArtifactStager;
  sdkInstaller: SdkInstaller;
  host: HostTriple;
  targets: readonly Target[];
  extendedLlvm: boolean;
  concurrency: number;
  output: OutputPort;
  /** Runs installer bundles */
  runCommand: CommandRunner;
}

export interface ExecuteOptions {
  /** Operation ids whose existing destination is kept as is */
  reuse?: ReadonlySet<string>;
  signal?: AbortSignal;
}

function operationLabel(operation: PlannedOperation): string {
  return `${operation.name}@${operation.version}`;
}

export class InstallExecutor {
  constructor(private readonly options: InstallExecutorOptions) {}

  async execute(plan: InstallPlan, executeOptions: ExecuteOptions = {}): Promise<OperationOutcome[]> {
    const { reuse = new Set<string>(), signal } = executeOptions;
    const toStage = plan.operations.filter(operation => !reuse.has(operation.id));

    const spinner = this.options.output.spinner();
    spinner.start(`Downloading ${pluralize(toStage.length, 'component')}`);
    let completed = 0;

    const staged = await mapWithConcurrency(toStage, this.options.concurrency, async operation => {
      const artifact = await this.stageOperation(operation, signal);
      completed++;
      spinner.message(`Downloaded ${completed}/${toStage.length}: ${operationLabel(operation)}`);
      return artifact;
    });
    spinner.stop(`Staged ${staged.filter(result => result.status === 'fulfilled').length}/${toStage.length} component(s)`);

    const stagedById = new Map<string, Settled<StagedArtifact>>();
    toStage.forEach((operation, index) => stagedById.set(operation.id, staged[index]));

    if (signal?.aborted) {
      await this.discardAll(staged);
      throw new UserCancellationError();
    }

    return this.promoteAll(plan, reuse, stagedById);
  }

  private async stageOperation(operation: PlannedOperation, signal?: AbortSignal): Promise<StagedArtifact> {
    const { stager, locator, host, extendedLlvm, targets, sdkInstaller } = this.options;

    if (operation.kind === 'sdk') {
      if (!operation.sdk) {
        throw new Error(`SDK operation ${operation.id} has no source reference`);
      }
      const area = await stager.createStagingArea('sdk');
      try {
        await sdkInstaller.install({
          destination: area.contentDir,
          ref: operation.sdk.ref,
          minimal: operation.sdk.minimal,
          repositoryUrl: operation.sdk.repositoryUrl,
          targets,
          signal
        });
        return area;
      } catch (error) {
        await stager.discard(area);
        throw error;
      }
    }

    const descriptor = COMPONENTS[operation.kind];
    const locateOptions = { name: operation.name, extendedLlvm };
    const asset = await locator.locate(operation.kind, operation.version, host, locateOptions);
    if (descriptor.installerBundle?.(host)) {
      const source = await locator.locate(operation.kind, operation.version, host, { ...locateOptions, source: true });
      return stageFromBundles([asset, source], { stager, runCommand: this.options.runCommand, signal });
    }
    return stager.stage(asset, { signal, unwrapSingleRoot: descriptor.unwrapSingleRoot });
  }

  private async promoteAll(
    plan: InstallPlan,
    reuse: ReadonlySet<string>,
    stagedById: Map<string, Settled<StagedArtifact>>
  ): Promise<OperationOutcome[]> {
    const { stager } = this.options;
    const blocked = new Set(plan.unresolved.map(component => component.id));
    const outcomes: OperationOutcome[] = [];

    for (const operation of plan.operations) {
      const base = {
        id: operation.id,
        kind: operation.kind,
        name: operation.name,
        version: operation.version,
        destination: operation.destination
      };
      const result = stagedById.get(operation.id);

      if (operation.dependsOn.some(dependency => blocked.has(dependency))) {
        if (result?.status === 'fulfilled') {
          await stager.discard(result.value);
        }
        blocked.add(operation.id);
        outcomes.push({ ...base, status: 'skipped', error: SKIPPED_DEPENDENCY_FAILURE });
        continue;
      }

      if (reuse.has(operation.id)) {
        logger.debug(`Reusing ${operationLabel(operation)} at ${operation.destination}`);
        outcomes.push({ ...base, status: 'reused' });
        continue;
      }

      if (!result || result.status === 'rejected') {
        const error = result ? result.reason : new Error('operation was not staged');
        logger.debug(`Staging failed for ${operation.id}`, { error });
        blocked.add(operation.id);
        outcomes.push({ ...base, status: 'failed', error: describeError(error) });
        continue;
      }

      try {
        await stager.promote(result.value, operation.destination);
        outcomes.push({ ...base, status: 'installed' });
      } catch (error) {
        await stager.discard(result.value);
        blocked.add(operation.id);
        outcomes.push({ ...base, status: 'failed', error: describeError(error) });
      }
    }

    return outcomes;
  }

  private async discardAll(results: Settled<StagedArtifact>[]): Promise<void> {
    for (const result of results) {
      if (result.status === 'fulfilled') {
        await this.options.stager.discard(result.value);
      } else if (!isAbortError(result.reason)) {
        logger.debug('Staging failed before cancellation', { error: result.reason });
      }
    }
  }
}
