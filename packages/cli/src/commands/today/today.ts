import { Command } from 'commander';
import { TodayCommand } from './today-command';
import type { TodayGetOptions, TodayRefreshOptions, TodayResetOptions } from './today-command';

/**
 * Registers the `today` command group
 */
export function registerTodayCommands(program: Command): void {
  const todayCommand = new TodayCommand();

  const today = program
    .command('today')
    .description("Draw and manage today's tasks");

  // dailydraw today get
  today
    .command('get', { isDefault: true })
    .description("Show today's tasks, drawing new ones when the day has turned over")
    .option('--json', 'Output in JSON format for automation')
    .option('-v, --verbose', 'Show task fields')
    .option('-q, --quiet', 'Print slugs only')
    .action(async (options: TodayGetOptions) => {
      await todayCommand.executeGet(options);
    });

  // dailydraw today refresh
  today
    .command('refresh [slugs...]')
    .description('Swap tasks for new draws (all uncompleted tasks when none given)')
    .option('--json', 'Output in JSON format for automation')
    .option('-v, --verbose', 'Show task fields')
    .option('-q, --quiet', 'Print slugs only')
    .action(async (slugs: string[], options: TodayRefreshOptions) => {
      await todayCommand.executeRefresh(slugs, options);
    });

  // dailydraw today reset
  today
    .command('reset [slugs...]')
    .description("Take tasks out of today's set without drawing replacements (all when none given)")
    .option('--json', 'Output in JSON format for automation')
    .option('-v, --verbose', 'Show detailed output')
    .option('-q, --quiet', 'Suppress output except errors')
    .action(async (slugs: string[], options: TodayResetOptions) => {
      await todayCommand.executeReset(slugs, options);
    });
}
