#!/usr/bin/env node

import { realpathSync } from 'fs';
import { fileURLToPath } from 'url';
import { Command } from 'commander';
import { installSignalHandlers } from './cli/cancellation.js';
import { setupCompletionsCommand } from './commands/completions.js';
import { setupInstallCommand } from './commands/install.js';
import { setupUninstallCommand } from './commands/uninstall.js';
import { setupUpdateCommand } from './commands/update.js';
import { logger, parseLogLevel } from './utils/logger.js';
import { getVersion } from './utils/package.js';

const program = new Command();

program
  .name('espforge')
  .description('Toolchain installation manager for Espressif chips')
  .version(getVersion())
  .configureHelp({ sortSubcommands: true })
  .showHelpAfterError();

setupInstallCommand(program);
setupUpdateCommand(program);
setupUninstallCommand(program);
setupCompletionsCommand(program);

program.hook('preAction', (_thisCommand, actionCommand) => {
  const { logLevel } = actionCommand.opts<{ logLevel?: string }>();
  const level = parseLogLevel(logLevel);
  if (level) {
    logger.setLevel(level);
  }
  logger.debug(`Running '${actionCommand.name()}'`, { level: logger.getLevel() });
});

function crash(what: string, cause: unknown): never {
  logger.error(what, cause);
  console.error('error: espforge crashed. Run again with --log-level debug for details.');
  process.exit(1);
}

process.on('uncaughtException', error => crash('Uncaught exception', error));
process.on('unhandledRejection', reason => crash('Unhandled rejection', reason));

/** Parse `argv` and run the selected subcommand. Bare `espforge` prints help. */
export async function run(argv: string[] = process.argv): Promise<void> {
  installSignalHandlers();

  if (argv.length <= 2) {
    program.outputHelp();
    return;
  }

  await program.parseAsync(argv);
}

function isMainModule(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    // npm links the bin through a symlink
    return realpathSync(entry) === fileURLToPath(import.meta.url);
  } catch (error) {
    logger.debug('Could not resolve entry script', { entry, error });
    return false;
  }
}

if (isMainModule()) {
  run().catch((error: unknown) => crash('Fatal error in main execution', error));
}

export { program };
