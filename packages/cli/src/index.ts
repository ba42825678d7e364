#!/usr/bin/env node

import * as dotenv from 'dotenv';
dotenv.config();

import { Command } from 'commander';
import { registerTasksCommands } from './commands/tasks/tasks';
import { registerTodayCommands } from './commands/today/today';
import { registerConfigCommands } from './commands/config/config';
import { registerCompletionsCommands } from './commands/completions/completions';
import { DependencyInjectionService } from './services/dependency-injection';

type GlobalOptions = {
  config?: string;
  state?: string;
};

const program = new Command();

program
  .name('dailydraw')
  .description('Draws a handful of recurring tasks for today, weighted by how much you want them')
  .version('0.1.0')
  .option('--config <path>', 'Config document (default: $DAILYDRAW_CONFIG or ~/.config/dailydraw/config.yaml)')
  .option('--state <path>', 'State document (default: $DAILYDRAW_STATE or ~/.cache/dailydraw/state.yaml)')
  .hook('preAction', (thisCommand) => {
    const { config, state } = thisCommand.opts<GlobalOptions>();
    DependencyInjectionService.getInstance().configure({
      ...(config !== undefined ? { config } : {}),
      ...(state !== undefined ? { state } : {}),
    });
  });

registerTasksCommands(program);
registerTodayCommands(program);
registerConfigCommands(program);
registerCompletionsCommands(program);

program.parseAsync().catch((error: unknown) => {
  console.error('❌ Fatal error:', error);
  process.exit(1);
});
