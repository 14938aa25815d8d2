import { resolve } from 'path';
import type {
  InstalledComponent,
  Manifest,
  PlannedOperation,
  ReleasedComponentKind,
  SdkRequest,
  VersionSpec
} from '../../types/index.js';
import { DEFAULTS, MANIFEST_SCHEMA_VERSION, SDK_REPOSITORY_URL } from '../../constants/index.js';
import {
  ConfigurationError,
  UserCancellationError,
  describeError,
  isAbortError
} from '../../utils/errors.js';
import { mapWithConcurrency } from '../../utils/concurrency.js';
import { exists, remove } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';
import { COMPONENTS } from '../components.js';
import type { ExecutionContext } from '../execution-context.js';
import { ArchiveFetchEngine } from '../fetch/fetch-engine.js';
import { detectHostTriple, isWindowsHost, type HostTriple } from '../host-triple.js';
import { assertInstallationName, type ManifestStore } from '../manifest/manifest-store.js';
import { ReleaseIndexCache, ReleaseIndexClient } from '../release/release-index.js';
import { ReleaseLocator } from '../release/release-locator.js';
import { architectureOf, isAllTargets, type Target } from '../targets.js';
import { RustupClient, installRiscvTargets, isToolchainName, type RustTargetsOutcome } from '../toolchain/rustup.js';
import { describeVersionSpec, parseVersionSpec, resolveVersion } from '../version/version-resolver.js';
import { InstallExecutor, type OperationOutcome } from './install-executor.js';
import { displayInstallationResults } from './install-reporting.js';
import { isPathInside, planInstallation, type ResolvedVersions } from './installation-planner.js';

export type InstallMode = 'install' | 'update';

/** Raw version strings as given on the command line */
export interface RequestedVersions {
  toolchain?: string;
  supportLibrary?: string;
  crossCompiler?: string;
  sdk?: string;
}

/**
 * Parameters of an install or update. On update, every field left out keeps
 * the value recorded in the existing manifest.
 */
export interface InstallRequest {
  name: string;
  host?: HostTriple;
  targets?: readonly Target[];
  stdOnly?: boolean;
  extendedLlvm?: boolean;
  versions?: RequestedVersions;
  sdkMinimal?: boolean;
  exportFile?: string;
  skipVersionParse?: boolean;
  /** rustup toolchain that receives the RISC-V targets */
  stableVersion?: string;
}

export interface InstallResult {
  /** Absent when nothing could be installed */
  manifest?: Manifest;
  outcomes: OperationOutcome[];
  activationFiles: string[];
  /** Present when a RISC-V target was requested */
  riscvTargets?: RustTargetsOutcome;
}

interface ParsedSpecs {
  toolchain?: VersionSpec;
  supportLibrary?: VersionSpec;
  crossCompiler?: VersionSpec;
  sdk?: VersionSpec;
}

interface InstallSettings {
  host: HostTriple;
  targets: readonly Target[];
  stdOnly: boolean;
  extendedLlvm: boolean;
  sdkMinimal: boolean;
  stableVersion: string;
  specs: Required<Omit<ParsedSpecs, 'sdk'>> & Pick<ParsedSpecs, 'sdk'>;
}

const RELEASED_KEYS = [
  ['toolchain', 'toolchain'],
  ['supportLibrary', 'support-library'],
  ['crossCompiler', 'cross-compiler']
] as const satisfies ReadonlyArray<readonly [keyof ResolvedVersions, ReleasedComponentKind]>;

function parseRequestedVersions(request: InstallRequest): ParsedSpecs {
  const versions = request.versions ?? {};
  const parsed: ParsedSpecs = {};
  for (const [key, kind] of RELEASED_KEYS) {
    const raw = versions[key];
    // Only toolchain builds carry versions outside the usual shape
    const options = kind === 'toolchain' ? { skipVersionParse: request.skipVersionParse } : {};
    if (raw !== undefined) parsed[key] = parseVersionSpec(kind, raw, options);
  }
  if (versions.sdk !== undefined) {
    parsed.sdk = parseVersionSpec('sdk', versions.sdk);
  }
  return parsed;
}

function recordedSdkSpec(previous: Manifest | undefined): VersionSpec | undefined {
  const sdk = previous?.components.find(component => component.kind === 'sdk');
  return sdk ? parseVersionSpec('sdk', sdk.version) : undefined;
}

function settingsFor(request: InstallRequest, parsed: ParsedSpecs, previous?: Manifest): InstallSettings {
  const latest: VersionSpec = { kind: 'latest' };
  const settings: InstallSettings = {
    host: request.host ?? previous?.host ?? detectHostTriple(),
    targets: request.targets ?? previous?.targets ?? [],
    stdOnly: request.stdOnly ?? previous?.options.stdOnly ?? false,
    extendedLlvm: request.extendedLlvm ?? previous?.options.extendedLlvm ?? false,
    sdkMinimal: request.sdkMinimal ?? previous?.options.sdkMinimal ?? false,
    stableVersion: request.stableVersion ?? DEFAULTS.STABLE_TOOLCHAIN,
    specs: {
      toolchain: parsed.toolchain ?? latest,
      supportLibrary: parsed.supportLibrary ?? latest,
      crossCompiler: parsed.crossCompiler ?? latest,
      sdk: parsed.sdk ?? recordedSdkSpec(previous)
    }
  };

  if (settings.targets.length === 0) {
    throw new ConfigurationError('No targets given');
  }
  if (!isToolchainName(settings.stableVersion)) {
    throw new ConfigurationError(`Invalid rustup toolchain '${settings.stableVersion}'`);
  }
  if (settings.specs.sdk && isWindowsHost(settings.host) && !isAllTargets(settings.targets)) {
    throw new ConfigurationError("Installing the SDK on Windows requires '--targets all'");
  }
  return settings;
}

/**
 * Resolve every released component that takes part in the install. Failures
 * are returned per component so the others still go ahead.
 */
async function resolveVersions(
  settings: InstallSettings,
  locator: ReleaseLocator,
  signal?: AbortSignal
): Promise<{ versions: ResolvedVersions; failures: Map<ReleasedComponentKind, string> }> {
  const wanted = RELEASED_KEYS.filter(([, kind]) => kind !== 'cross-compiler' || !settings.stdOnly);

  const results = await mapWithConcurrency(wanted, wanted.length, async ([key, kind]) => {
    const spec = settings.specs[key];
    logger.debug(`Resolving ${COMPONENTS[kind].label} ${describeVersionSpec(spec)}`);
    return resolveVersion(kind, spec, locator);
  });

  if (signal?.aborted) {
    throw new UserCancellationError();
  }

  const versions: ResolvedVersions = {};
  const failures = new Map<ReleasedComponentKind, string>();
  results.forEach((result, index) => {
    const [key, kind] = wanted[index];
    if (result.status === 'fulfilled') {
      versions[key] = result.value;
      return;
    }
    // Bad credentials and the like affect every component the same way
    if (result.reason instanceof ConfigurationError) {
      throw result.reason;
    }
    if (isAbortError(result.reason)) {
      throw new UserCancellationError();
    }
    failures.set(kind, describeError(result.reason));
  });
  return { versions, failures };
}

async function reusableOperations(
  operations: readonly PlannedOperation[],
  previous: Manifest
): Promise<Set<string>> {
  const reuse = new Set<string>();
  for (const operation of operations) {
    const recorded = previous.components.some(
      component =>
        component.kind === operation.kind &&
        component.name === operation.name &&
        component.version === operation.version &&
        resolve(component.path) === resolve(operation.destination)
    );
    if (!recorded || !operation.dependsOn.every(dependency => reuse.has(dependency))) continue;
    if (await exists(operation.destination)) {
      reuse.add(operation.id);
    }
  }
  return reuse;
}

/**
 * Destinations that already exist on disk without any installation recording
 * them. Installing would wipe them, so a fresh install refuses.
 */
async function unmanagedDestinations(
  operations: readonly PlannedOperation[],
  manifests: ManifestStore
): Promise<string[]> {
  const recorded = new Set<string>();
  for (const name of await manifests.list()) {
    try {
      for (const component of (await manifests.load(name)).components) {
        recorded.add(resolve(component.path));
      }
    } catch (error) {
      logger.debug(`Ignoring unreadable manifest '${name}'`, { error });
    }
  }

  const unmanaged: string[] = [];
  for (const operation of operations) {
    if (!recorded.has(resolve(operation.destination)) && (await exists(operation.destination))) {
      unmanaged.push(operation.destination);
    }
  }
  return unmanaged;
}

/**
 * Components for the new manifest. On update, a component that failed keeps
 * its previous entry as long as that is still on disk.
 */
async function collectComponents(
  outcomes: readonly OperationOutcome[],
  shared: ReadonlyMap<string, boolean>,
  previous?: Manifest
): Promise<InstalledComponent[]> {
  const components: InstalledComponent[] = [];
  for (const outcome of outcomes) {
    if ((outcome.status === 'installed' || outcome.status === 'reused') && outcome.version && outcome.destination) {
      components.push({
        kind: outcome.kind,
        name: outcome.name,
        version: outcome.version,
        path: outcome.destination,
        shared: shared.get(outcome.id) ?? false
      });
      continue;
    }
    const carried = previous?.components.find(
      component => component.kind === outcome.kind && component.name === outcome.name
    );
    if (carried && (await exists(carried.path))) {
      logger.info(`Keeping previous ${carried.name}@${carried.version} after failed update`);
      components.push(carried);
    }
  }
  return components;
}

/**
 * Remove directories of the previous installation that the new manifest no
 * longer references. Directories enclosing a referenced path stay.
 */
async function removeStalePaths(previous: Manifest, components: readonly InstalledComponent[]): Promise<void> {
  const kept = components.map(component => resolve(component.path));
  for (const component of previous.components) {
    const path = resolve(component.path);
    if (kept.includes(path) || kept.some(keptPath => isPathInside(path, keptPath))) continue;
    logger.info(`Removing superseded ${component.name}@${component.version} at ${path}`);
    await remove(path);
  }
}

/**
 * Install a named toolchain, or update an existing one.
 *
 * Version resolution failures and failed operations are collected into the
 * outcomes; the manifest is written once every operation has finished and at
 * least one component is in place.
 */
export async function runInstallPipeline(
  ctx: ExecutionContext,
  request: InstallRequest,
  mode: InstallMode = 'install'
): Promise<InstallResult> {
  assertInstallationName(request.name);
  const parsed = parseRequestedVersions(request);
  if (mode === 'install') {
    // Surface argument problems before touching the disk
    settingsFor(request, parsed);
  }

  const { manifests, output, signal } = ctx;
  const lock = await manifests.acquireLock(request.name);
  try {
    let previous: Manifest | undefined;
    if (mode === 'update') {
      previous = await manifests.load(request.name);
    } else if (await manifests.exists(request.name)) {
      throw new ConfigurationError(
        `Installation '${request.name}' already exists. Use 'espforge update --name ${request.name}' to change it`
      );
    }

    const settings = settingsFor(request, parsed, previous);
    logger.info(`${mode === 'install' ? 'Installing' : 'Updating'} '${request.name}'`, {
      host: settings.host,
      targets: settings.targets,
      toolchain: describeVersionSpec(settings.specs.toolchain),
      supportLibrary: describeVersionSpec(settings.specs.supportLibrary),
      crossCompiler: settings.stdOnly ? 'skipped' : describeVersionSpec(settings.specs.crossCompiler),
      sdk: settings.specs.sdk ? describeVersionSpec(settings.specs.sdk) : 'none'
    });

    const retry = ctx.retry;
    const locator = new ReleaseLocator(
      new ReleaseIndexClient({ http: ctx.http, cache: new ReleaseIndexCache(), retry, token: ctx.githubToken, signal })
    );
    const { versions, failures } = await resolveVersions(settings, locator, signal);

    const sdk: SdkRequest | undefined =
      settings.specs.sdk?.kind === 'source-ref'
        ? { ref: settings.specs.sdk.ref, minimal: settings.sdkMinimal, repositoryUrl: SDK_REPOSITORY_URL }
        : undefined;
    const paths = previous?.paths ?? { toolchains: ctx.dirs.toolchains, tools: ctx.dirs.tools };
    const plan = planInstallation({
      name: request.name,
      targets: settings.targets,
      stdOnly: settings.stdOnly,
      paths,
      versions,
      sdk
    });

    if (!previous) {
      const [existing] = await unmanagedDestinations(plan.operations, manifests);
      if (existing) {
        throw new ConfigurationError(
          `Previous installation exists at ${existing}. Remove the directory before installing`,
          { path: existing }
        );
      }
    }

    const reuse = previous ? await reusableOperations(plan.operations, previous) : new Set<string>();
    const executor = new InstallExecutor({
      locator,
      stager: new ArchiveFetchEngine({
        http: ctx.http,
        retry,
        stagingRoot: ctx.dirs.staging,
        runCommand: ctx.runCommand
      }),
      sdkInstaller: ctx.sdkInstaller,
      host: settings.host,
      targets: settings.targets,
      extendedLlvm: settings.extendedLlvm,
      concurrency: ctx.concurrency,
      output,
      runCommand: ctx.runCommand
    });
    const executed = await executor.execute(plan, { reuse, signal });

    const riscvTargets = settings.targets.some(target => architectureOf(target) === 'riscv')
      ? await installRiscvTargets(new RustupClient(ctx.runCommand), settings.stableVersion, signal)
      : undefined;

    const unresolvedOutcomes: OperationOutcome[] = plan.unresolved.map(component => ({
      id: component.id,
      kind: component.kind,
      name: component.name,
      status: 'failed',
      error:
        component.kind === 'sdk'
          ? 'no SDK reference given'
          : failures.get(component.kind) ?? 'version could not be resolved'
    }));
    const outcomes = [...unresolvedOutcomes, ...executed];

    const shared = new Map(plan.operations.map(operation => [operation.id, operation.shared]));
    const components = await collectComponents(outcomes, shared, previous);

    if (components.length === 0) {
      displayInstallationResults(
        { action: mode, installationName: request.name, outcomes, activationFiles: [], riscvTargets },
        output
      );
      return { outcomes, activationFiles: [], riscvTargets };
    }

    if (previous) {
      await removeStalePaths(previous, components);
    }

    const target = ctx.environmentTarget(settings.host);
    const exportFile = request.exportFile ?? ctx.exportFile ?? previous?.activationFiles[0];
    const activationFiles = target.activationFiles(exportFile);
    const now = new Date().toISOString();
    const manifest: Manifest = {
      schemaVersion: MANIFEST_SCHEMA_VERSION,
      name: request.name,
      host: settings.host,
      targets: [...settings.targets],
      options: {
        stdOnly: settings.stdOnly,
        extendedLlvm: settings.extendedLlvm,
        sdkMinimal: settings.sdkMinimal
      },
      paths,
      components,
      activationFiles,
      createdAt: previous?.createdAt ?? now,
      updatedAt: now
    };
    await manifests.save(manifest);

    await target.apply(manifest, exportFile);
    for (const file of previous?.activationFiles ?? []) {
      if (!activationFiles.includes(file)) await remove(file);
    }

    displayInstallationResults(
      {
        action: mode,
        installationName: request.name,
        outcomes,
        activationFiles,
        activationUsage: target.usage(activationFiles),
        riscvTargets
      },
      output
    );
    return { manifest, outcomes, activationFiles, riscvTargets };
  } finally {
    await lock.release();
  }
}
