import { Command } from 'commander';
import { TasksCommand } from './tasks-command';
import type {
  TasksAddOptions,
  TasksCompleteOptions,
  TasksDetailsOptions,
  TasksDisableOptions,
  TasksEnableOptions,
  TasksImportOptions,
  TasksListOptions,
  TasksPruneOptions,
  TasksRemoveOptions,
  TasksUpdateOptions,
  TasksUpsertOptions,
} from './tasks-command';
import {
  collectOption,
  parseCountOption,
  parseDateOption,
  parseNumberOption,
  parseStatusOption,
} from '../../utils/option-parsers';

function addOutputOptions(command: Command): Command {
  return command
    .option('--json', 'Output in JSON format for automation')
    .option('-v, --verbose', 'Show detailed output')
    .option('-q, --quiet', 'Suppress output except errors');
}

function addTaskFieldOptions(command: Command): Command {
  return command
    .option('-d, --description <text>', 'Longer description of the task')
    .option('-w, --weight <weight>', 'Relative chance of being drawn (default 1)', parseNumberOption)
    .option('-s, --spoons <spoons>', 'Cost against a daily spoon budget (default 3)', parseCountOption)
    .option('-t, --tag <tag>', 'Tag the task (repeatable)', collectOption, [])
    .option('--max-occurrences <count>', 'Stop drawing the task after this many completions', parseCountOption)
    .option('--min-frequency <days>', 'Days that must pass before the task is drawn again', parseCountOption);
}

/**
 * Registers the `tasks` command group
 */
export function registerTasksCommands(program: Command): void {
  const tasksCommand = new TasksCommand();

  const tasks = program
    .command('tasks')
    .description('Manage the task catalog')
    .alias('t')
    .addHelpText('after', `
EXAMPLES:
  dailydraw tasks add "Water plants" --weight 2 --tag home
  dailydraw tasks disable water-plants --for 7
  dailydraw tasks complete water-plants
  dailydraw tasks import tasks.csv --update
`);

  // dailydraw tasks add
  addOutputOptions(addTaskFieldOptions(
    tasks
      .command('add <task>')
      .description('Add a task; its slug is derived from the title unless --slug is given')
      .alias('a')
      .option('--slug <slug>', 'Use this slug instead of deriving one'),
  )).action(async (title: string, options: TasksAddOptions) => {
    await tasksCommand.executeAdd(title, options);
  });

  // dailydraw tasks update
  addOutputOptions(addTaskFieldOptions(
    tasks
      .command('update <slug>')
      .description('Change fields of an existing task')
      .alias('u')
      .option('--task <title>', 'New title (the slug does not change)'),
  )).action(async (slug: string, options: TasksUpdateOptions) => {
    await tasksCommand.executeUpdate(slug, options);
  });

  // dailydraw tasks upsert
  addOutputOptions(addTaskFieldOptions(
    tasks
      .command('upsert <task>')
      .description('Add a task, or update the task with the same slug')
      .option('--slug <slug>', 'Use this slug instead of deriving one'),
  )).action(async (title: string, options: TasksUpsertOptions) => {
    await tasksCommand.executeUpsert(title, options);
  });

  // dailydraw tasks remove
  addOutputOptions(
    tasks
      .command('remove <slugs...>')
      .description('Remove tasks and their history')
      .aliases(['rm', 'delete']),
  ).action(async (slugs: string[], options: TasksRemoveOptions) => {
    await tasksCommand.executeRemove(slugs, options);
  });

  // dailydraw tasks list
  addOutputOptions(
    tasks
      .command('list')
      .description('List tasks with their status')
      .alias('ls')
      .option('--tag <tag>', 'Only tasks with this tag')
      .option('--status <status>', 'Only tasks with this status (disabled, complete, in-progress, inactive)', parseStatusOption),
  ).action(async (options: TasksListOptions) => {
    await tasksCommand.executeList(options);
  });

  // dailydraw tasks details
  addOutputOptions(
    tasks
      .command('details [slugs...]')
      .description('Show configuration and history of tasks (all when none given)')
      .alias('show'),
  ).action(async (slugs: string[], options: TasksDetailsOptions) => {
    await tasksCommand.executeDetails(slugs, options);
  });

  // dailydraw tasks enable
  addOutputOptions(
    tasks
      .command('enable <slugs...>')
      .description('Make tasks drawable again'),
  ).action(async (slugs: string[], options: TasksEnableOptions) => {
    await tasksCommand.executeEnable(slugs, options);
  });

  // dailydraw tasks disable
  addOutputOptions(
    tasks
      .command('disable <slugs...>')
      .description('Keep tasks out of the draw, indefinitely or for a while')
      .option('--until <date>', 'Disabled through this date (YYYY-MM-DD)', parseDateOption)
      .option('--for <days>', 'Disabled for this many days', parseCountOption),
  ).action(async (slugs: string[], options: TasksDisableOptions) => {
    await tasksCommand.executeDisable(slugs, options);
  });

  // dailydraw tasks complete
  addOutputOptions(
    tasks
      .command('complete [slugs...]')
      .description('Mark tasks as done')
      .aliases(['c', 'done'])
      .option('-a, --all', "Complete every task in today's set"),
  ).action(async (slugs: string[], options: TasksCompleteOptions) => {
    await tasksCommand.executeComplete(slugs, options);
  });

  // dailydraw tasks import
  addOutputOptions(
    tasks
      .command('import <file>')
      .description('Import tasks from .yaml, .yml, .csv, .tsv or .psv')
      .option('--update', 'Update tasks that already exist instead of skipping them'),
  ).action(async (file: string, options: TasksImportOptions) => {
    await tasksCommand.executeImport(file, options);
  });

  // dailydraw tasks prune
  addOutputOptions(
    tasks
      .command('prune')
      .description('Drop saved state of tasks that are no longer configured'),
  ).action(async (options: TasksPruneOptions) => {
    await tasksCommand.executePrune(options);
  });
}
