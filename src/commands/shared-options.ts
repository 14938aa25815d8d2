import { Command, InvalidArgumentError, Option } from 'commander';
import { DEFAULTS } from '../constants/index.js';
import type { InstallRequest } from '../core/install/install-pipeline.js';
import { detectHostTriple, HOST_TRIPLES } from '../core/host-triple.js';
import { parseTargets } from '../core/targets.js';

/**
 * Options shared by `install` and `update`
 */
export interface InstallCommandOptions {
  name: string;
  logLevel?: string;
  targets?: string;
  toolchainVersion?: string;
  llvmVersion?: string;
  gccVersion?: string;
  espIdfVersion?: string;
  espIdfMinimal?: boolean;
  extendedLlvm?: boolean;
  std?: boolean;
  defaultHost?: string;
  exportFile?: string;
  skipVersionParse?: boolean;
  stableVersion?: string;
  githubToken?: string;
  concurrency?: number;
}

export function parsePositiveInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

export function addNameOption(command: Command): Command {
  return command.option('-a, --name <name>', 'installation name', DEFAULTS.INSTALLATION_NAME);
}

export function addLogLevelOption(command: Command): Command {
  return command.addOption(
    new Option('-l, --log-level <level>', 'log verbosity').choices(['debug', 'info', 'warn', 'error'])
  );
}

export function addInstallOptions(command: Command, defaultTargets?: string): Command {
  addNameOption(command);
  addLogLevelOption(command);
  const targets = new Option('-t, --targets <targets>', "comma or space separated targets, or 'all'");
  if (defaultTargets) targets.default(defaultTargets);
  return command
    .addOption(targets)
    .option('-v, --toolchain-version <version>', 'Xtensa toolchain version (exact or prefix, e.g. 1.82)')
    .option('--llvm-version <version>', 'LLVM support library version')
    .option('--gcc-version <version>', 'GCC cross-compiler version')
    .option('--esp-idf-version <version>', 'SDK version, tag:, branch: or commit: reference')
    .option('--esp-idf-minimal', 'shallow SDK checkout without documentation and examples')
    .option('-e, --extended-llvm', 'install the full LLVM distribution instead of the library only')
    .option('-s, --std', 'skip the GCC cross-compilers; the SDK provides them')
    .addOption(new Option('-d, --default-host <triple>', 'host triple to install for').choices(HOST_TRIPLES))
    .option('-f, --export-file <path>', 'where to write the activation script')
    .option('-k, --skip-version-parse', 'take the toolchain version as given')
    .option('-b, --stable-version <toolchain>', 'rustup toolchain that receives the RISC-V targets')
    .option('--github-token <token>', 'GitHub token for release lookups')
    .option('-c, --concurrency <count>', 'components downloaded at once', parsePositiveInteger);
}

/**
 * Turn parsed flags into a pipeline request. Flags left out stay undefined so
 * an update can keep what the manifest recorded.
 */
export function toInstallRequest(options: InstallCommandOptions): InstallRequest {
  return {
    name: options.name,
    host: options.defaultHost ? detectHostTriple(options.defaultHost) : undefined,
    targets: options.targets !== undefined ? parseTargets(options.targets) : undefined,
    stdOnly: options.std,
    extendedLlvm: options.extendedLlvm,
    sdkMinimal: options.espIdfMinimal,
    exportFile: options.exportFile,
    skipVersionParse: options.skipVersionParse,
    stableVersion: options.stableVersion,
    versions: {
      toolchain: options.toolchainVersion,
      supportLibrary: options.llvmVersion,
      crossCompiler: options.gccVersion,
      sdk: options.espIdfVersion
    }
  };
}
