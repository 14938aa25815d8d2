import type { ReleaseAsset, ReleasedComponentKind } from '../../types/index.js';
import { NotFoundError, UnresolvableVersionError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { COMPONENTS, tagForVersion, versionFromTag } from '../components.js';
import type { HostTriple } from '../host-triple.js';
import { compareVersions } from '../version/version-compare.js';
import type { VersionSource } from '../version/version-resolver.js';
import type { GithubRelease, ReleaseIndexClient } from './release-index.js';

export interface LocateOptions {
  /** Select the full LLVM distribution instead of the library-only one */
  extendedLlvm?: boolean;
  /** Cross-compiler name; required for cross-compiler lookups */
  name?: string;
  /** Locate the companion source archive instead of the component itself */
  source?: boolean;
}

/**
 * Maps components to their published versions and downloadable assets.
 */
export class ReleaseLocator implements VersionSource {
  constructor(private readonly index: Pick<ReleaseIndexClient, 'listReleases'>) {}

  private releases(kind: ReleasedComponentKind): Promise<GithubRelease[]> {
    return this.index.listReleases(COMPONENTS[kind].repository);
  }

  /**
   * Versions of every stable release, highest first
   */
  async publishedVersions(kind: ReleasedComponentKind): Promise<string[]> {
    const versions = new Set<string>();
    for (const release of await this.releases(kind)) {
      if (release.draft || release.prerelease) continue;
      const version = versionFromTag(kind, release.tag);
      if (version) versions.add(version);
    }
    return [...versions].sort(compareVersions).reverse();
  }

  async latestVersion(kind: ReleasedComponentKind): Promise<string> {
    const [latest] = await this.publishedVersions(kind);
    if (!latest) {
      throw new UnresolvableVersionError(COMPONENTS[kind].label, 'latest');
    }
    return latest;
  }

  async locate(
    kind: ReleasedComponentKind,
    version: string,
    host: HostTriple,
    options: LocateOptions = {}
  ): Promise<ReleaseAsset> {
    const descriptor = COMPONENTS[kind];
    const tag = tagForVersion(kind, version);
    const release = (await this.releases(kind)).find(candidate => candidate.tag === tag);
    if (!release) {
      throw new NotFoundError(`No ${descriptor.label} release tagged '${tag}'`, { kind, version });
    }

    let assetName: string;
    if (options.source) {
      if (!descriptor.sourceAssetName) {
        throw new NotFoundError(`${descriptor.label} publishes no source archive`, { kind, version });
      }
      assetName = descriptor.sourceAssetName(version);
    } else {
      assetName = descriptor.assetName({
        name: options.name ?? kind,
        version,
        host,
        extendedLlvm: options.extendedLlvm
      });
    }
    const asset = release.assets.find(candidate => candidate.name === assetName);
    if (!asset) {
      throw new NotFoundError(`Release '${tag}' has no asset '${assetName}' for host ${host}`, {
        kind,
        version,
        host,
        assetName
      });
    }

    logger.debug(`Located ${descriptor.label} ${version} for ${host}: ${asset.url}`);
    return {
      component: kind,
      version,
      host,
      name: asset.name,
      url: asset.url,
      archive: options.source ? 'tar.xz' : descriptor.archiveKind(host),
      size: asset.size
    };
  }
}
