/**
 * Component catalogue: where each released component is published, how its
 * versions and tags are spelled, and which asset carries it for a host.
 */

import type { ArchiveKind, ReleasedComponentKind, RepositoryRef } from '../types/index.js';
import { REPOSITORIES } from '../constants/index.js';
import { espressifArch, isWindowsHost, type HostTriple } from './host-triple.js';

/** Directory (under the toolchain root) holding the support library versions */
export const SUPPORT_LIBRARY_DIR = 'xtensa-esp32-elf-clang';

export const SDK_COMPONENT_NAME = 'esp-idf';

export interface AssetNameInput {
  /** Component name; the cross-compiler name for GCC packages */
  name: string;
  version: string;
  host: HostTriple;
  extendedLlvm?: boolean;
}

export interface ReleasedComponentDescriptor {
  kind: ReleasedComponentKind;
  label: string;
  repository: RepositoryRef;
  /** Prefix of release tags; stripped to obtain the version */
  tagPrefix: string;
  exactVersion: RegExp;
  assetName(input: AssetNameInput): string;
  archiveKind(host: HostTriple): ArchiveKind;
  /** Flatten the single top-level directory of the archive */
  unwrapSingleRoot: boolean;
  /** Companion archive with the standard library sources */
  sourceAssetName?(version: string): string;
  /** The archives are installer bundles to run rather than trees to unpack */
  installerBundle?(host: HostTriple): boolean;
}

const INCOMPLETE_VERSION = /^\d+(\.\d+){0,2}$/;

export function isIncompleteVersion(value: string): boolean {
  return INCOMPLETE_VERSION.test(value);
}

const toolchain: ReleasedComponentDescriptor = {
  kind: 'toolchain',
  label: 'Xtensa toolchain',
  repository: REPOSITORIES.TOOLCHAIN,
  tagPrefix: 'v',
  exactVersion: /^\d+\.\d+\.\d+\.\d+$/,
  archiveKind: host => (isWindowsHost(host) ? 'zip' : 'tar.xz'),
  assetName({ version, host }) {
    return `rust-${version}-${host}.${this.archiveKind(host)}`;
  },
  unwrapSingleRoot: true,
  sourceAssetName: version => `rust-src-${version}.tar.xz`,
  // The Windows zip already carries the sources and has no installer
  installerBundle: host => !isWindowsHost(host)
};

const crossCompiler: ReleasedComponentDescriptor = {
  kind: 'cross-compiler',
  label: 'GCC cross-compiler',
  repository: REPOSITORIES.CROSS_COMPILER,
  tagPrefix: 'esp-',
  exactVersion: /^\d+\.\d+\.\d+_\d{8}$/,
  archiveKind: host => (isWindowsHost(host) ? 'zip' : 'tar.xz'),
  assetName({ name, version, host }) {
    return `${name}-${version}-${espressifArch(host)}.${this.archiveKind(host)}`;
  },
  unwrapSingleRoot: false
};

const supportLibrary: ReleasedComponentDescriptor = {
  kind: 'support-library',
  label: 'LLVM support library',
  repository: REPOSITORIES.SUPPORT_LIBRARY,
  tagPrefix: 'esp-',
  exactVersion: /^\d+\.\d+\.\d+_\d{8}$/,
  archiveKind: () => 'tar.xz',
  assetName({ version, host, extendedLlvm }) {
    const prefix = extendedLlvm ? 'clang-esp' : 'libs-clang-esp';
    return `${prefix}-${version}-${espressifArch(host)}.${this.archiveKind(host)}`;
  },
  unwrapSingleRoot: false
};

export const COMPONENTS: Readonly<Record<ReleasedComponentKind, ReleasedComponentDescriptor>> = {
  toolchain,
  'cross-compiler': crossCompiler,
  'support-library': supportLibrary
};

/**
 * Version carried by a release tag, or undefined when the tag does not name
 * a release of this component.
 */
export function versionFromTag(kind: ReleasedComponentKind, tag: string): string | undefined {
  const descriptor = COMPONENTS[kind];
  if (!tag.startsWith(descriptor.tagPrefix)) {
    return undefined;
  }
  const version = tag.slice(descriptor.tagPrefix.length);
  return descriptor.exactVersion.test(version) ? version : undefined;
}

export function tagForVersion(kind: ReleasedComponentKind, version: string): string {
  return `${COMPONENTS[kind].tagPrefix}${version}`;
}
