import { Argument, Command } from 'commander';
import { COMPLETION_SHELLS, generateCompletions } from '../cli/completions.js';
import { withErrorHandling } from '../utils/errors.js';
import { addLogLevelOption } from './shared-options.js';

export function setupCompletionsCommand(program: Command): void {
  const command = program
    .command('completions')
    .description('Print a shell completion script')
    .addArgument(new Argument('<shell>', 'target shell').choices(COMPLETION_SHELLS));

  addLogLevelOption(command);

  command.action(
    withErrorHandling(async (shell: string) => {
      process.stdout.write(generateCompletions(program, shell));
    })
  );
}
