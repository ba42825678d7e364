import { Argument, Command } from 'commander';
import { COMPLETION_KINDS, CompletionsCommand } from './completions-command';
import type { CompletionKind, CompletionsOptions } from './completions-command';

/**
 * Registers `completions`, used by shell completion scripts
 */
export function registerCompletionsCommands(program: Command): void {
  const completionsCommand = new CompletionsCommand();

  program
    .command('completions')
    .description('Print task slugs matching what has been typed so far')
    .addArgument(new Argument('<kind>', 'Which tasks to offer').choices(COMPLETION_KINDS))
    .argument('[current]', 'Text typed so far', '')
    .option('--json', 'Output in JSON format for automation')
    .option('-v, --verbose', 'Show detailed output')
    .option('-q, --quiet', 'Suppress output except errors')
    .action(async (kind: CompletionKind, current: string, options: CompletionsOptions) => {
      await completionsCommand.executeCompletions(kind, current, options);
    });
}
