import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { promises as fs } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import type { Manifest } from '../../../src/types/index.js';
import {
  PosixEnvironmentTarget,
  WindowsEnvironmentTarget,
  activationFilePaths,
  type UserEnvironmentStore
} from '../../../src/core/env/environment-target.js';
import { exists } from '../../../src/utils/fs.js';

class MemoryUserEnvironment implements UserEnvironmentStore {
  readonly values = new Map<string, string>();

  async get(name: string): Promise<string | undefined> {
    return this.values.get(name);
  }

  async set(name: string, value: string): Promise<void> {
    this.values.set(name, value);
  }

  async delete(name: string): Promise<void> {
    this.values.delete(name);
  }
}

const LIB_PATH = 'C:\\Users\\dev\\.rustup\\toolchains\\esp\\xtensa-esp32-elf-clang\\17.0.1_20240419';
const LIB_BIN = `${LIB_PATH}\\esp-clang\\bin`;
const GCC_BIN = 'C:\\Users\\dev\\.rustup\\toolchains\\esp\\riscv32-esp-elf\\13.2.0_20240530\\riscv32-esp-elf\\bin';

function windowsManifest(activationFiles: string[] = []): Manifest {
  return {
    schemaVersion: 1,
    name: 'esp',
    host: 'x86_64-pc-windows-msvc',
    targets: ['esp32c3'],
    options: { stdOnly: false, extendedLlvm: false, sdkMinimal: false },
    paths: { toolchains: 'C:\\Users\\dev\\.rustup\\toolchains', tools: 'C:\\Users\\dev\\.espressif' },
    components: [
      { kind: 'support-library', name: 'xtensa-esp32-elf-clang', version: '17.0.1_20240419', path: LIB_PATH, shared: true },
      {
        kind: 'cross-compiler',
        name: 'riscv32-esp-elf',
        version: '13.2.0_20240530',
        path: 'C:\\Users\\dev\\.rustup\\toolchains\\esp\\riscv32-esp-elf\\13.2.0_20240530',
        shared: false
      }
    ],
    activationFiles,
    createdAt: '2026-01-01T00:00:00.000Z',
    updatedAt: '2026-01-01T00:00:00.000Z'
  };
}

let home: string;

beforeEach(async () => {
  home = await fs.mkdtemp(join(tmpdir(), 'espforge-env-'));
});

afterEach(async () => {
  await fs.rm(home, { recursive: true, force: true });
});

describe('activationFilePaths', () => {
  it('names sibling files after the chosen export file', () => {
    assert.deepEqual(activationFilePaths('/work/env/export-esp.sh', ['posix', 'fish']), [
      '/work/env/export-esp.sh',
      '/work/env/export-esp.fish'
    ]);
  });
});

describe('PosixEnvironmentTarget', () => {
  it('defaults to export-esp files in the home directory', () => {
    const target = new PosixEnvironmentTarget(home);
    assert.deepEqual(target.activationFiles(), [join(home, 'export-esp.sh'), join(home, 'export-esp.fish')]);
    assert.equal(
      target.usage(target.activationFiles()),
      `. ${join(home, 'export-esp.sh')}   (or '. ${join(home, 'export-esp.fish')}' for fish)`
    );
  });
});

describe('WindowsEnvironmentTarget', () => {
  it('writes scripts and persists variables for the current user', async () => {
    const environment = new MemoryUserEnvironment();
    environment.values.set('PATH', 'C:\\Windows\\system32');
    const target = new WindowsEnvironmentTarget(environment, home);

    const files = await target.apply(windowsManifest());

    assert.deepEqual(files, [join(home, 'export-esp.ps1'), join(home, 'export-esp.bat')]);
    assert.equal(await exists(files[1]), true);
    assert.equal(environment.values.get('LIBCLANG_PATH'), LIB_BIN);
    assert.equal(environment.values.get('PATH'), `${LIB_BIN};${GCC_BIN};C:\\Windows\\system32`);
  });

  it('does not add PATH entries twice', async () => {
    const environment = new MemoryUserEnvironment();
    const target = new WindowsEnvironmentTarget(environment, home);

    await target.apply(windowsManifest());
    await target.apply(windowsManifest());

    assert.equal(environment.values.get('PATH'), `${LIB_BIN};${GCC_BIN}`);
  });

  it('removes what it added and nothing else', async () => {
    const environment = new MemoryUserEnvironment();
    environment.values.set('PATH', 'C:\\Tools');
    const target = new WindowsEnvironmentTarget(environment, home);
    const files = await target.apply(windowsManifest());

    await target.clean(windowsManifest(files));

    assert.equal(environment.values.get('PATH'), 'C:\\Tools');
    assert.equal(environment.values.has('LIBCLANG_PATH'), false);
    assert.equal(await exists(files[0]), false);
  });
});
