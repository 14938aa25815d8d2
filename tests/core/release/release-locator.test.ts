import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import type { RepositoryRef } from '../../../src/types/index.js';
import type { GithubRelease } from '../../../src/core/release/release-index.js';
import { ReleaseLocator } from '../../../src/core/release/release-locator.js';
import { NotFoundError, UnresolvableVersionError } from '../../../src/utils/errors.js';

function release(tag: string, assets: string[] = [], flags: Partial<GithubRelease> = {}): GithubRelease {
  return {
    tag,
    draft: false,
    prerelease: false,
    assets: assets.map(name => ({ name, url: `https://downloads.test/${tag}/${name}`, size: 42 })),
    ...flags
  };
}

class StaticIndex {
  readonly lookups: string[] = [];

  constructor(private readonly byRepo: Record<string, GithubRelease[]>) {}

  async listReleases(repository: RepositoryRef): Promise<GithubRelease[]> {
    const key = `${repository.owner}/${repository.repo}`;
    this.lookups.push(key);
    return this.byRepo[key] ?? [];
  }
}

const INDEX = {
  'esp-rs/rust-build': [
    release('v1.83.0.1', [], { prerelease: true }),
    release('v1.82.0.3', [
      'rust-1.82.0.3-x86_64-unknown-linux-gnu.tar.xz',
      'rust-1.82.0.3-x86_64-pc-windows-msvc.zip',
      'rust-src-1.82.0.3.tar.xz'
    ]),
    release('v1.82.0.0'),
    release('v1.84.0.0', [], { draft: true }),
    release('nightly-2024-01-01')
  ],
  'espressif/crosstool-NG': [
    release('esp-13.2.0_20240530', ['xtensa-esp32-elf-13.2.0_20240530-x86_64-linux-gnu.tar.xz'])
  ],
  'espressif/llvm-project': [
    release('esp-17.0.1_20240419', [
      'libs-clang-esp-17.0.1_20240419-x86_64-linux-gnu.tar.xz',
      'clang-esp-17.0.1_20240419-x86_64-linux-gnu.tar.xz'
    ])
  ]
};

describe('ReleaseLocator', () => {
  it('lists stable versions, newest first', async () => {
    const locator = new ReleaseLocator(new StaticIndex(INDEX));
    assert.deepEqual(await locator.publishedVersions('toolchain'), ['1.82.0.3', '1.82.0.0']);
    assert.equal(await locator.latestVersion('toolchain'), '1.82.0.3');
  });

  it('fails latest when nothing is published', async () => {
    const locator = new ReleaseLocator(new StaticIndex({}));
    await assert.rejects(locator.latestVersion('cross-compiler'), UnresolvableVersionError);
  });

  it('locates the host asset of a release', async () => {
    const locator = new ReleaseLocator(new StaticIndex(INDEX));
    assert.deepEqual(await locator.locate('toolchain', '1.82.0.3', 'x86_64-pc-windows-msvc'), {
      component: 'toolchain',
      version: '1.82.0.3',
      host: 'x86_64-pc-windows-msvc',
      name: 'rust-1.82.0.3-x86_64-pc-windows-msvc.zip',
      url: 'https://downloads.test/v1.82.0.3/rust-1.82.0.3-x86_64-pc-windows-msvc.zip',
      archive: 'zip',
      size: 42
    });
  });

  it('locates cross-compilers by name and the LLVM variant by flag', async () => {
    const locator = new ReleaseLocator(new StaticIndex(INDEX));
    const gcc = await locator.locate('cross-compiler', '13.2.0_20240530', 'x86_64-unknown-linux-gnu', {
      name: 'xtensa-esp32-elf'
    });
    assert.equal(gcc.name, 'xtensa-esp32-elf-13.2.0_20240530-x86_64-linux-gnu.tar.xz');
    assert.equal(gcc.archive, 'tar.xz');

    const libs = await locator.locate('support-library', '17.0.1_20240419', 'x86_64-unknown-linux-gnu');
    const full = await locator.locate('support-library', '17.0.1_20240419', 'x86_64-unknown-linux-gnu', {
      extendedLlvm: true
    });
    assert.equal(libs.name, 'libs-clang-esp-17.0.1_20240419-x86_64-linux-gnu.tar.xz');
    assert.equal(full.name, 'clang-esp-17.0.1_20240419-x86_64-linux-gnu.tar.xz');
  });

  it('locates the toolchain source archive shared by every host', async () => {
    const locator = new ReleaseLocator(new StaticIndex(INDEX));
    const source = await locator.locate('toolchain', '1.82.0.3', 'aarch64-apple-darwin', { source: true });
    assert.equal(source.name, 'rust-src-1.82.0.3.tar.xz');
    assert.equal(source.url, 'https://downloads.test/v1.82.0.3/rust-src-1.82.0.3.tar.xz');
    assert.equal(source.archive, 'tar.xz');

    await assert.rejects(
      locator.locate('support-library', '17.0.1_20240419', 'x86_64-unknown-linux-gnu', { source: true }),
      { name: 'NotFoundError', message: 'LLVM support library publishes no source archive' }
    );
  });

  it('reports a missing release or asset', async () => {
    const locator = new ReleaseLocator(new StaticIndex(INDEX));
    await assert.rejects(locator.locate('toolchain', '1.70.0.0', 'x86_64-unknown-linux-gnu'), {
      name: 'NotFoundError',
      message: "No Xtensa toolchain release tagged 'v1.70.0.0'"
    });
    await assert.rejects(locator.locate('toolchain', '1.82.0.3', 'aarch64-apple-darwin'), NotFoundError);
  });
});
