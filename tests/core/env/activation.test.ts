import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import type { Manifest } from '../../../src/types/index.js';
import {
  activationPlan,
  applyActivation,
  quoteFish,
  quotePosix,
  renderActivation,
  synthesizeActivation
} from '../../../src/core/env/activation.js';

const ROOT = '/home/dev/.rustup/toolchains/esp';

function manifest(overrides: Partial<Manifest> = {}): Manifest {
  return {
    schemaVersion: 1,
    name: 'esp',
    host: 'x86_64-unknown-linux-gnu',
    targets: ['esp32', 'esp32c6'],
    options: { stdOnly: false, extendedLlvm: false, sdkMinimal: false },
    paths: { toolchains: '/home/dev/.rustup/toolchains', tools: '/home/dev/.espressif' },
    components: [
      { kind: 'toolchain', name: 'esp', version: '1.82.0.3', path: ROOT, shared: true },
      {
        kind: 'support-library',
        name: 'xtensa-esp32-elf-clang',
        version: '17.0.1_20240419',
        path: `${ROOT}/xtensa-esp32-elf-clang/17.0.1_20240419`,
        shared: true
      },
      {
        kind: 'cross-compiler',
        name: 'xtensa-esp32-elf',
        version: '13.2.0_20240530',
        path: `${ROOT}/xtensa-esp32-elf/13.2.0_20240530`,
        shared: false
      },
      {
        kind: 'cross-compiler',
        name: 'riscv32-esp-elf',
        version: '13.2.0_20240530',
        path: `${ROOT}/riscv32-esp-elf/13.2.0_20240530`,
        shared: false
      }
    ],
    activationFiles: [],
    createdAt: '2026-01-01T00:00:00.000Z',
    updatedAt: '2026-01-01T00:00:00.000Z',
    ...overrides
  };
}

const XTENSA_BIN = `${ROOT}/xtensa-esp32-elf/13.2.0_20240530/xtensa-esp32-elf/bin`;
const RISCV_BIN = `${ROOT}/riscv32-esp-elf/13.2.0_20240530/riscv32-esp-elf/bin`;
const LIBCLANG = `${ROOT}/xtensa-esp32-elf-clang/17.0.1_20240419/esp-clang/lib`;

describe('activationPlan', () => {
  it('puts every cross-compiler on PATH and points at libclang', () => {
    assert.deepEqual(activationPlan(manifest()), {
      pathEntries: [XTENSA_BIN, RISCV_BIN],
      variables: { LIBCLANG_PATH: LIBCLANG }
    });
  });

  it('exports CLANG_PATH for the extended distribution', () => {
    const plan = activationPlan(manifest({ options: { stdOnly: false, extendedLlvm: true, sdkMinimal: false } }));
    assert.equal(plan.variables.CLANG_PATH, `${ROOT}/xtensa-esp32-elf-clang/17.0.1_20240419/esp-clang/bin/clang`);
  });

  it('adds the libclang directory to PATH on Windows', () => {
    const root = 'C:\\Users\\dev\\.rustup\\toolchains\\esp';
    const plan = activationPlan(
      manifest({
        host: 'x86_64-pc-windows-msvc',
        components: [
          {
            kind: 'support-library',
            name: 'xtensa-esp32-elf-clang',
            version: '17.0.1_20240419',
            path: `${root}\\xtensa-esp32-elf-clang\\17.0.1_20240419`,
            shared: true
          }
        ]
      })
    );
    const bin = `${root}\\xtensa-esp32-elf-clang\\17.0.1_20240419\\esp-clang\\bin`;
    assert.deepEqual(plan, { pathEntries: [bin], variables: { LIBCLANG_PATH: bin } });
  });

  it('sets the SDK variables', () => {
    const plan = activationPlan(
      manifest({
        components: [
          { kind: 'sdk', name: 'esp-idf', version: 'tag:v5.1', path: '/home/dev/.espressif/frameworks/esp-idf-v5.1', shared: false }
        ]
      })
    );
    assert.deepEqual(plan.variables, {
      IDF_PATH: '/home/dev/.espressif/frameworks/esp-idf-v5.1',
      IDF_TOOLS_PATH: '/home/dev/.espressif'
    });
  });
});

describe('applyActivation', () => {
  it('prepends missing entries in plan order', () => {
    const plan = activationPlan(manifest());
    assert.equal(applyActivation(plan, '/usr/bin:/bin'), `${XTENSA_BIN}:${RISCV_BIN}:/usr/bin:/bin`);
  });

  it('leaves PATH unchanged when applied twice', () => {
    const plan = activationPlan(manifest());
    const once = applyActivation(plan, '/usr/bin');
    assert.equal(applyActivation(plan, once), once);
  });

  it('keeps an entry that is already present where it is', () => {
    const plan = activationPlan(manifest());
    assert.equal(applyActivation(plan, `/usr/bin:${RISCV_BIN}`), `${XTENSA_BIN}:/usr/bin:${RISCV_BIN}`);
  });
});

describe('renderActivation', () => {
  const plan = { pathEntries: ['/opt/gcc/bin'], variables: { LIBCLANG_PATH: '/opt/clang/lib' } };

  it('renders a fish script', () => {
    assert.equal(
      renderActivation(plan, 'fish').content,
      [
        '# Generated by espforge. Source this file to activate the installation.',
        `if not contains -- '/opt/gcc/bin' $PATH`,
        `    set -gx PATH '/opt/gcc/bin' $PATH`,
        'end',
        `set -gx LIBCLANG_PATH '/opt/clang/lib'`,
        ''
      ].join('\n')
    );
  });

  it('renders a cmd script with CRLF line endings', () => {
    assert.equal(
      renderActivation(plan, 'cmd').content,
      [
        '@echo off',
        'rem Generated by espforge. Run this file to activate the installation.',
        'echo ;%PATH%; | find /I ";/opt/gcc/bin;" >nul || set "PATH=/opt/gcc/bin;%PATH%"',
        'set "LIBCLANG_PATH=/opt/clang/lib"',
        ''
      ].join('\r\n')
    );
  });

  it('renders a PowerShell script', () => {
    assert.equal(
      renderActivation(plan, 'powershell').content,
      [
        '# Generated by espforge. Dot-source this file to activate the installation.',
        `if (-not (($env:PATH -split ';') -contains '/opt/gcc/bin')) {`,
        `    $env:PATH = '/opt/gcc/bin;' + $env:PATH`,
        '}',
        `$env:LIBCLANG_PATH = '/opt/clang/lib'`,
        ''
      ].join('\r\n')
    );
  });

  it('produces one artifact per dialect', () => {
    assert.deepEqual(
      synthesizeActivation(manifest()).map(artifact => artifact.extension),
      ['.sh', '.fish', '.ps1', '.bat']
    );
  });
});

describe('quoting', () => {
  it('escapes single quotes for POSIX shells and fish', () => {
    assert.equal(quotePosix("/home/o'neil"), `'/home/o'\\''neil'`);
    assert.equal(quoteFish("/home/o'neil"), `'/home/o\\'neil'`);
  });
});
