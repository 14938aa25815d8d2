import semver from 'semver';

/**
 * Numeric segments of a release version. `1.82.0.3` → [1, 82, 0, 3],
 * `17.0.1_20240419` → [17, 0, 1, 20240419].
 */
export function versionSegments(version: string): number[] {
  return version.split(/[._]/).map(segment => Number.parseInt(segment, 10));
}

/**
 * Compare two release versions: semver precedence on the first three segments,
 * then any remaining segments numerically.
 */
export function compareVersions(a: string, b: string): number {
  const left = versionSegments(a);
  const right = versionSegments(b);

  const leftCore = semver.coerce(left.slice(0, 3).join('.'));
  const rightCore = semver.coerce(right.slice(0, 3).join('.'));
  if (leftCore && rightCore) {
    const core = semver.compare(leftCore, rightCore);
    if (core !== 0) return core;
  }

  const length = Math.max(left.length, right.length);
  for (let i = 3; i < length; i++) {
    const diff = (left[i] ?? 0) - (right[i] ?? 0);
    if (diff !== 0) return diff < 0 ? -1 : 1;
  }
  return 0;
}

/**
 * True when the leading segments of `version` equal every segment of `prefix`
 */
export function matchesPrefix(version: string, prefix: string): boolean {
  const candidate = versionSegments(version);
  const wanted = versionSegments(prefix);
  return wanted.every((segment, index) => candidate[index] === segment);
}

export function highestVersion(versions: readonly string[]): string | undefined {
  return [...versions].sort(compareVersions).pop();
}
