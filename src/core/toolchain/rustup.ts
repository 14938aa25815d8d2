import { ToolchainInstallError, UserCancellationError, describeError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { commandFailureMessage, isCommandMissing, runCommand, type CommandRunner } from '../../utils/process.js';

export const RISCV_RUST_TARGETS = ['riscv32imc-unknown-none-elf', 'riscv32imac-unknown-none-elf'] as const;

export const RUSTUP_INSTALL_URL = 'https://rustup.rs';

const TOOLCHAIN_NAME = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

export function isToolchainName(value: string): boolean {
  return TOOLCHAIN_NAME.test(value);
}

export interface RustTargetsOutcome {
  toolchain: string;
  targets: readonly string[];
  status: 'installed' | 'failed';
  error?: string;
}

/**
 * Toolchain names from `rustup toolchain list`, without the
 * `(default)` and `(active)` markers.
 */
export function parseToolchainList(stdout: string): string[] {
  return stdout
    .split('\n')
    .map(line => line.trim().split(/\s+/)[0])
    .filter(name => name.length > 0);
}

/**
 * `nightly` is listed as `nightly-<host>`.
 */
export function hasToolchain(installed: readonly string[], toolchain: string): boolean {
  return installed.some(name => name === toolchain || name.startsWith(`${toolchain}-`));
}

export class RustupClient {
  constructor(private readonly run: CommandRunner = runCommand) {}

  private async rustup(args: string[], signal?: AbortSignal): Promise<string> {
    try {
      return await this.run({ command: 'rustup', args }, signal);
    } catch (error) {
      if (signal?.aborted) throw error;
      if (isCommandMissing(error)) {
        throw new ToolchainInstallError(`rustup was not found. Install it from ${RUSTUP_INSTALL_URL}`);
      }
      throw new ToolchainInstallError(`rustup ${args.join(' ')} failed: ${commandFailureMessage(error)}`, {
        args,
        error
      });
    }
  }

  async installedToolchains(signal?: AbortSignal): Promise<string[]> {
    return parseToolchainList(await this.rustup(['toolchain', 'list'], signal));
  }

  /**
   * Give `toolchain` the standard library sources and the bare-metal RISC-V
   * targets, installing the toolchain first when rustup does not have it.
   */
  async ensureRiscvTargets(toolchain: string, signal?: AbortSignal): Promise<void> {
    if (!hasToolchain(await this.installedToolchains(signal), toolchain)) {
      logger.info(`Installing the Rust ${toolchain} toolchain`);
      await this.rustup(['toolchain', 'install', toolchain, '--profile', 'minimal'], signal);
    }
    await this.rustup(['component', 'add', 'rust-src', '--toolchain', toolchain], signal);
    await this.rustup(['target', 'add', '--toolchain', toolchain, ...RISCV_RUST_TARGETS], signal);
  }
}

/**
 * Run `ensureRiscvTargets` and report the result instead of throwing, so the
 * components already in place still get recorded. Cancellation propagates.
 */
export async function installRiscvTargets(
  client: RustupClient,
  toolchain: string,
  signal?: AbortSignal
): Promise<RustTargetsOutcome> {
  const targets = [...RISCV_RUST_TARGETS];
  try {
    await client.ensureRiscvTargets(toolchain, signal);
    return { toolchain, targets, status: 'installed' };
  } catch (error) {
    if (signal?.aborted) throw new UserCancellationError();
    logger.debug(`RISC-V targets for ${toolchain} failed`, { error });
    return { toolchain, targets, status: 'failed', error: describeError(error) };
  }
}
