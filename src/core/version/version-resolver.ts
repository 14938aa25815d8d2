import type { ComponentKind, ReleasedComponentKind, SourceRef, VersionSpec } from '../../types/index.js';
import { ConfigurationError, UnresolvableVersionError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { COMPONENTS, isIncompleteVersion } from '../components.js';
import { compareVersions, matchesPrefix } from './version-compare.js';

/**
 * Published versions of released components. Implemented by the release locator.
 */
export interface VersionSource {
  latestVersion(kind: ReleasedComponentKind): Promise<string>;
  publishedVersions(kind: ReleasedComponentKind): Promise<string[]>;
}

export interface ParseVersionOptions {
  /** Accept the raw string as an exact version without validating its shape */
  skipVersionParse?: boolean;
}

const SOURCE_REF = /^(commit|tag|branch):(.+)$/;
const SDK_RELEASE = /^v?(\d+\.\d+(?:\.\d+)?)$/;

function parseSourceRef(raw: string): SourceRef | undefined {
  const match = SOURCE_REF.exec(raw);
  if (!match) return undefined;
  const [, type, value] = match;
  if (type !== 'commit' && type !== 'tag' && type !== 'branch') return undefined;
  return { type, value: value.trim() };
}

function parseSdkVersion(raw: string): VersionSpec {
  const ref = parseSourceRef(raw);
  if (ref) {
    if (!ref.value) {
      throw new ConfigurationError(`Invalid SDK version '${raw}': empty ${ref.type}`);
    }
    return { kind: 'source-ref', ref };
  }

  const release = SDK_RELEASE.exec(raw);
  if (release) {
    return { kind: 'source-ref', ref: { type: 'tag', value: `v${release[1]}` } };
  }

  return { kind: 'source-ref', ref: { type: 'branch', value: raw } };
}

/**
 * Interpret a user supplied version string for a component.
 * Absent, empty and `latest` all mean the newest published release.
 */
export function parseVersionSpec(
  component: ComponentKind,
  raw: string | undefined,
  options: ParseVersionOptions = {}
): VersionSpec {
  const value = raw?.trim() ?? '';
  if (value === '' || value === 'latest') {
    if (component === 'sdk') {
      throw new ConfigurationError('The SDK needs an explicit version, tag, branch or commit');
    }
    return { kind: 'latest' };
  }

  if (component === 'sdk') {
    return parseSdkVersion(value);
  }

  if (parseSourceRef(value)) {
    throw new ConfigurationError(`Source references such as '${value}' are only accepted for the SDK`);
  }

  if (options.skipVersionParse) {
    return { kind: 'exact', version: value };
  }

  const descriptor = COMPONENTS[component];
  const stripped = value.startsWith(descriptor.tagPrefix) ? value.slice(descriptor.tagPrefix.length) : value;

  if (descriptor.exactVersion.test(stripped)) {
    return { kind: 'exact', version: stripped };
  }
  if (isIncompleteVersion(stripped)) {
    return { kind: 'incomplete', prefix: stripped };
  }

  throw new ConfigurationError(`Invalid ${descriptor.label} version '${value}'`, { component, value });
}

/**
 * Highest published version whose leading segments match `prefix`
 */
export function completeVersion(
  prefix: string,
  published: readonly string[],
  component: string = 'component'
): string {
  const candidates = published.filter(version => matchesPrefix(version, prefix)).sort(compareVersions);
  const best = candidates.pop();
  if (!best) {
    throw new UnresolvableVersionError(component, prefix, {
      availableVersions: [...published].sort(compareVersions).reverse()
    });
  }
  return best;
}

/**
 * Turn a parsed spec into a concrete version, consulting the release index
 * only for `latest` and incomplete specs.
 */
export async function resolveVersion(
  component: ReleasedComponentKind,
  spec: VersionSpec,
  source: VersionSource
): Promise<string> {
  const label = COMPONENTS[component].label;
  switch (spec.kind) {
    case 'exact':
      return spec.version;
    case 'latest': {
      const version = await source.latestVersion(component);
      logger.debug(`Resolved latest ${label} to ${version}`);
      return version;
    }
    case 'incomplete': {
      const version = completeVersion(spec.prefix, await source.publishedVersions(component), label);
      logger.debug(`Resolved ${label} ${spec.prefix} to ${version}`);
      return version;
    }
    case 'source-ref':
      throw new ConfigurationError(`Source references are only accepted for the SDK, not the ${label}`);
  }
}

export function describeVersionSpec(spec: VersionSpec): string {
  switch (spec.kind) {
    case 'exact':
      return spec.version;
    case 'incomplete':
      return `${spec.prefix}.*`;
    case 'latest':
      return 'latest';
    case 'source-ref':
      return `${spec.ref.type}:${spec.ref.value}`;
  }
}
