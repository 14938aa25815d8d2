import { Command } from 'commander';
import { cancellationSignal } from '../cli/cancellation.js';
import { createCliOutput } from '../cli/clack-output-adapter.js';
import { createExecutionContext } from '../core/execution-context.js';
import { runInstallPipeline } from '../core/install/install-pipeline.js';
import { hasFailures, summarizeOutcomes } from '../core/install/install-reporting.js';
import { IncompleteOperationError, withErrorHandling } from '../utils/errors.js';
import { addInstallOptions, toInstallRequest, type InstallCommandOptions } from './shared-options.js';

export function setupInstallCommand(program: Command): void {
  const command = program
    .command('install')
    .description('Install the Xtensa toolchain, LLVM support library, GCC cross-compilers and optionally the SDK');

  addInstallOptions(command, 'all').action(
    withErrorHandling(async (options: InstallCommandOptions) => {
      const request = toInstallRequest(options);
      const ctx = await createExecutionContext({
        output: createCliOutput(),
        githubToken: options.githubToken,
        concurrency: options.concurrency,
        signal: cancellationSignal
      });

      const result = await runInstallPipeline(ctx, request, 'install');
      if (hasFailures(result.outcomes, result.riscvTargets)) {
        throw new IncompleteOperationError(summarizeOutcomes(result.outcomes));
      }
    })
  );
}
