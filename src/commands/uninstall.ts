import { Command } from 'commander';
import { cancellationSignal } from '../cli/cancellation.js';
import { createCliOutput } from '../cli/clack-output-adapter.js';
import { createExecutionContext } from '../core/execution-context.js';
import { runUninstallPipeline } from '../core/uninstall/uninstall-pipeline.js';
import { IncompleteOperationError, withErrorHandling } from '../utils/errors.js';
import { addLogLevelOption, addNameOption } from './shared-options.js';

interface UninstallCommandOptions {
  name: string;
  logLevel?: string;
}

export function setupUninstallCommand(program: Command): void {
  const command = program
    .command('uninstall')
    .description('Remove an installation and its activation scripts');

  addNameOption(command);
  addLogLevelOption(command);

  command.action(
    withErrorHandling(async (options: UninstallCommandOptions) => {
      const ctx = await createExecutionContext({ output: createCliOutput(), signal: cancellationSignal });
      const result = await runUninstallPipeline(ctx, options.name);
      if (result.failed.length > 0) {
        throw new IncompleteOperationError(`${result.failed.length} path(s) could not be removed`);
      }
    })
  );
}
