import {
  Eligibility,
  pickTodaysTasks,
  refreshTodaysTasks,
  type RuntimeState,
} from '@dailydraw/core';
import { BaseCommand } from '../../base/base-command';
import type { BaseCommandOptions } from '../../interfaces/command';
import { formatTaskFields, formatTaskLine } from '../../utils/task-format';

export type TodayGetOptions = BaseCommandOptions;
export type TodayRefreshOptions = BaseCommandOptions;
export type TodayResetOptions = BaseCommandOptions;

/**
 * Today's set: draw it, redraw parts of it, or clear it.
 */
export class TodayCommand extends BaseCommand {

  /**
   * Tops up today's set and prints it. Saves when the draw added tasks or a
   * new day emptied the previous set.
   */
  async executeGet(options: TodayGetOptions): Promise<void> {
    try {
      const runtime = await this.dependencyService.getRuntimeState();

      const before = runtime.todaysTasks();
      const added = pickTodaysTasks(runtime);
      const after = runtime.todaysTasks();
      if (added || before.join(',') !== after.join(',')) {
        await runtime.save();
      }

      this.showToday(runtime, options);
    } catch (error) {
      this.handleCommandError(error, options);
    }
  }

  /**
   * Replaces the given tasks (every uncompleted one when none given)
   */
  async executeRefresh(slugs: string[], options: TodayRefreshOptions): Promise<void> {
    try {
      const runtime = await this.dependencyService.getRuntimeState();

      refreshTodaysTasks(runtime, slugs.length > 0 ? { slugs } : {});
      await runtime.save();

      this.showToday(runtime, options);
    } catch (error) {
      this.handleCommandError(error, options);
    }
  }

  async executeReset(slugs: string[], options: TodayResetOptions): Promise<void> {
    try {
      const runtime = await this.dependencyService.getRuntimeState();

      const removed = runtime.resetTodaysTasks(slugs.length > 0 ? slugs : undefined);
      await runtime.save();

      const message = removed.length > 0
        ? `Removed from today: ${removed.join(', ')}`
        : 'Nothing to reset';
      this.handleSuccess({ removed }, options, message);
    } catch (error) {
      this.handleCommandError(error, options);
    }
  }

  private showToday(runtime: RuntimeState, options: BaseCommandOptions): void {
    const date = runtime.todaysDate();
    const selection = runtime.selection;
    const infos = runtime.resolveTodaysTasks().map(task => Eligibility.taskInfo(task, runtime));

    if (options.json) {
      this.handleSuccess({ date, selection, tasks: infos }, options);
      return;
    }

    if (options.quiet) {
      infos.forEach(info => console.log(info.slug));
      return;
    }

    if (infos.length === 0) {
      console.log('📭 Nothing drawn for today.');
      if (runtime.taskSlugs().length === 0) {
        console.log("💡 Add tasks with 'dailydraw tasks add <task>'.");
      }
      return;
    }

    console.log(`📅 Today (${date}):`);
    for (const info of infos) {
      console.log(formatTaskLine(info));
      if (options.verbose) {
        console.log(formatTaskFields(info));
      }
    }
    if (selection.mode === 'spoons') {
      console.log(`🥄 Spoons: ${runtime.todaysSpoons()}/${selection.dailySpoons}`);
    }
  }
}
