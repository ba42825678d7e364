import { Command } from 'commander';
import { ConfigCommand } from './config-command';
import type { ConfigSetOptions, ConfigShowOptions } from './config-command';
import { parseCountOption } from '../../utils/option-parsers';

/**
 * Registers the `config` command group
 */
export function registerConfigCommands(program: Command): void {
  const configCommand = new ConfigCommand();

  const config = program
    .command('config')
    .description('Show or change how tasks are drawn');

  // dailydraw config show
  config
    .command('show')
    .description('Show document locations and selection settings')
    .option('--json', 'Output in JSON format for automation')
    .option('-v, --verbose', 'Also show when tasks were last drawn')
    .option('-q, --quiet', 'Suppress output except errors')
    .action(async (options: ConfigShowOptions) => {
      await configCommand.executeShow(options);
    });

  // dailydraw config set
  config
    .command('set')
    .description('Change the day cut-off or the daily selection')
    .option('--cut-off <HH:MM>', 'Time of day at which a new day starts')
    .option('--daily-tasks <count>', 'Draw this many tasks per day', parseCountOption)
    .option('--daily-spoons <count>', 'Draw tasks until this many spoons are spent', parseCountOption)
    .option('--json', 'Output in JSON format for automation')
    .option('-v, --verbose', 'Show detailed output')
    .option('-q, --quiet', 'Suppress output except errors')
    .addHelpText('after', `
EXAMPLES:
  dailydraw config set --cut-off 05:30
  dailydraw config set --daily-spoons 10
`)
    .action(async (options: ConfigSetOptions) => {
      await configCommand.executeSet(options);
    });
}
