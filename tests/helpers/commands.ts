import { promises as fs } from 'fs';
import { dirname, join } from 'path';
import { extractArchive } from '../../src/core/fetch/archive-extractor.js';
import type { CommandInvocation, CommandRunner } from '../../src/utils/process.js';

function missingProgram(command: string): Error {
  return Object.assign(new Error(`spawn ${command} ENOENT`), { code: 'ENOENT' });
}

function flagValue(args: readonly string[], prefix: string): string {
  const arg = args.find(candidate => candidate.startsWith(prefix));
  if (arg === undefined) throw new Error(`missing ${prefix}`);
  return arg.slice(prefix.length);
}

/**
 * In-process stand-in for the programs espforge runs:
 *  - `tar` unpacks the archive in process;
 *  - `bash <bundle>/install.sh` copies every component listed in the bundle's
 *    `components` file, except the `--without` ones, into `--destdir`;
 *  - `rustup` answers `toolchain list` from `toolchains` and records the rest.
 */
export class FakeCommands {
  readonly invocations: CommandInvocation[] = [];
  toolchains: string[] = ['stable-x86_64-unknown-linux-gnu (default)'];
  rustupMissing = false;

  readonly run: CommandRunner = async (invocation, signal) => {
    signal?.throwIfAborted();
    this.invocations.push(invocation);
    switch (invocation.command) {
      case 'tar':
        return this.tar(invocation.args);
      case 'bash':
        return this.bundleInstaller(invocation.args);
      case 'rustup':
        return this.rustup(invocation.args);
      default:
        throw missingProgram(invocation.command);
    }
  };

  argsOf(command: string): string[][] {
    return this.invocations.filter(invocation => invocation.command === command).map(invocation => invocation.args);
  }

  private async tar(args: readonly string[]): Promise<string> {
    const archivePath = args[args.indexOf('-f') + 1];
    const destination = args[args.indexOf('-C') + 1];
    await extractArchive(archivePath, 'tar.xz', destination, { xzDecoder: 'in-process' });
    return '';
  }

  private async bundleInstaller([script, ...args]: readonly string[]): Promise<string> {
    const root = dirname(script);
    const destination = flagValue(args, '--destdir=');
    const without = flagValue(args, '--without=').split(',');
    const components = (await fs.readFile(join(root, 'components'), 'utf8')).split('\n').filter(Boolean);

    for (const component of components) {
      if (without.includes(component)) continue;
      await fs.cp(join(root, component), destination, { recursive: true });
    }
    return `install: installed ${components.filter(component => !without.includes(component)).join(', ')}\n`;
  }

  private async rustup(args: readonly string[]): Promise<string> {
    if (this.rustupMissing) throw missingProgram('rustup');
    if (args[0] === 'toolchain' && args[1] === 'list') {
      return `${this.toolchains.join('\n')}\n`;
    }
    if (args[0] === 'toolchain' && args[1] === 'install') {
      this.toolchains.push(`${args[2]}-x86_64-unknown-linux-gnu`);
    }
    return '';
  }
}
