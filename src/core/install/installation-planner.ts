/**
 * Installation planning: turns targets, options and resolved versions into an
 * ordered list of install operations. Performs no I/O.
 */

import { isAbsolute, join, relative, resolve } from 'path';
import type {
  InstallPlan,
  ManifestPaths,
  PlannedOperation,
  SdkRequest,
  SourceRef,
  UnresolvedComponent
} from '../../types/index.js';
import { PlanConflictError } from '../../utils/errors.js';
import { ESPFORGE_DIRS } from '../../constants/index.js';
import { SDK_COMPONENT_NAME, SUPPORT_LIBRARY_DIR } from '../components.js';
import { crossCompilersFor, type Target } from '../targets.js';

export interface ResolvedVersions {
  toolchain?: string;
  supportLibrary?: string;
  crossCompiler?: string;
}

export interface PlanInput {
  name: string;
  targets: readonly Target[];
  /** Skip the cross-compilers */
  stdOnly: boolean;
  paths: ManifestPaths;
  /** Missing entries mark components whose version could not be resolved */
  versions: ResolvedVersions;
  sdk?: SdkRequest;
}

export const OPERATION_IDS = {
  TOOLCHAIN: 'toolchain',
  SUPPORT_LIBRARY: 'support-library',
  SDK: 'sdk'
} as const;

export function crossCompilerOperationId(name: string): string {
  return `cross-compiler:${name}`;
}

/**
 * True when `child` lies strictly inside `parent`
 */
export function isPathInside(parent: string, child: string): boolean {
  const rel = relative(resolve(parent), resolve(child));
  return rel !== '' && !rel.startsWith('..') && !isAbsolute(rel);
}

/**
 * Recorded version of an SDK checkout, e.g. `tag:v5.1`
 */
export function formatSourceRef(ref: SourceRef): string {
  return `${ref.type}:${ref.value}`;
}

export function sdkDirectoryName(refValue: string): string {
  return `esp-idf-${refValue.replace(/[/\\]/g, '-')}`;
}

interface Candidate {
  id: string;
  kind: PlannedOperation['kind'];
  name: string;
  version?: string;
  /** Known even without a version for the toolchain root */
  destination?: string;
  shared: boolean;
  sdk?: SdkRequest;
}

function candidatesFor(input: PlanInput): Candidate[] {
  const toolchainRoot = join(input.paths.toolchains, input.name);
  const { versions } = input;
  const candidates: Candidate[] = [];

  candidates.push({
    id: OPERATION_IDS.TOOLCHAIN,
    kind: 'toolchain',
    name: input.name,
    version: versions.toolchain,
    destination: toolchainRoot,
    shared: true
  });

  candidates.push({
    id: OPERATION_IDS.SUPPORT_LIBRARY,
    kind: 'support-library',
    name: SUPPORT_LIBRARY_DIR,
    version: versions.supportLibrary,
    destination: versions.supportLibrary ? join(toolchainRoot, SUPPORT_LIBRARY_DIR, versions.supportLibrary) : undefined,
    shared: true
  });

  if (!input.stdOnly) {
    for (const gcc of crossCompilersFor(input.targets)) {
      candidates.push({
        id: crossCompilerOperationId(gcc),
        kind: 'cross-compiler',
        name: gcc,
        version: versions.crossCompiler,
        destination: versions.crossCompiler ? join(toolchainRoot, gcc, versions.crossCompiler) : undefined,
        shared: false
      });
    }
  }

  if (input.sdk) {
    candidates.push({
      id: OPERATION_IDS.SDK,
      kind: 'sdk',
      name: SDK_COMPONENT_NAME,
      version: formatSourceRef(input.sdk.ref),
      destination: join(input.paths.tools, ESPFORGE_DIRS.FRAMEWORKS, sdkDirectoryName(input.sdk.ref.value)),
      shared: false,
      sdk: input.sdk
    });
  }

  return candidates;
}

/**
 * Build the install plan. Operations come out parent-first; an operation whose
 * destination lies inside another's depends on it, including on enclosing
 * components that could not be resolved.
 */
export function planInstallation(input: PlanInput): InstallPlan {
  const candidates = candidatesFor(input);

  const byDestination = new Map<string, string[]>();
  for (const candidate of candidates) {
    if (!candidate.destination) continue;
    const key = resolve(candidate.destination);
    byDestination.set(key, [...(byDestination.get(key) ?? []), candidate.id]);
  }
  for (const [destination, ids] of byDestination) {
    if (ids.length > 1) {
      throw new PlanConflictError(destination, ids);
    }
  }

  const operations: PlannedOperation[] = [];
  const unresolved: UnresolvedComponent[] = [];

  for (const candidate of candidates) {
    const { destination, version } = candidate;
    if (!destination || !version) {
      unresolved.push({ id: candidate.id, kind: candidate.kind, name: candidate.name });
      continue;
    }

    const dependsOn = candidates
      .filter(other => other.id !== candidate.id && other.destination && isPathInside(other.destination, destination))
      .map(other => other.id);

    operations.push({
      id: candidate.id,
      kind: candidate.kind,
      name: candidate.name,
      version,
      destination,
      shared: candidate.shared,
      dependsOn,
      ...(candidate.sdk ? { sdk: candidate.sdk } : {})
    });
  }

  return { operations: sortParentFirst(operations), unresolved };
}

function sortParentFirst(operations: PlannedOperation[]): PlannedOperation[] {
  const sorted: PlannedOperation[] = [];
  const placed = new Set<string>();
  const pending = [...operations];
  while (pending.length > 0) {
    const index = pending.findIndex(op =>
      op.dependsOn.every(dep => placed.has(dep) || !operations.some(other => other.id === dep))
    );
    // Nesting is acyclic; fall back to input order if that ever breaks
    const [next] = pending.splice(index === -1 ? 0 : index, 1);
    sorted.push(next);
    placed.add(next.id);
  }
  return sorted;
}
