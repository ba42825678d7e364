import type { RuntimeState, SelectionPolicy } from '@dailydraw/core';
import { BaseCommand } from '../../base/base-command';
import type { BaseCommandOptions } from '../../interfaces/command';

export type ConfigShowOptions = BaseCommandOptions;

export interface ConfigSetOptions extends BaseCommandOptions {
  cutOff?: string;
  dailyTasks?: number;
  dailySpoons?: number;
}

export type ConfigSummary = {
  configPath: string;
  statePath: string;
  cutOff: string;
  selection: SelectionPolicy;
  today: string;
  lastGenerated: string;
};

export function describeSelection(selection: SelectionPolicy): string {
  return selection.mode === 'count'
    ? `${selection.dailyTasks} task(s) per day`
    : `${selection.dailySpoons} spoon(s) per day`;
}

/**
 * Selection settings and where the documents live
 */
export class ConfigCommand extends BaseCommand {

  async executeShow(options: ConfigShowOptions): Promise<void> {
    try {
      const runtime = await this.dependencyService.getRuntimeState();
      const summary = this.summarize(runtime);

      if (options.json) {
        this.handleSuccess(summary, options);
        return;
      }

      console.log(`📁 Config: ${summary.configPath}`);
      console.log(`💾 State: ${summary.statePath}`);
      console.log(`🕓 Cut-off: ${summary.cutOff}`);
      console.log(`🎯 Selection: ${describeSelection(summary.selection)}`);
      console.log(`📅 Today: ${summary.today}`);
      if (options.verbose) {
        console.log(`🔄 Last drawn: ${summary.lastGenerated}`);
      }
    } catch (error) {
      this.handleCommandError(error, options);
    }
  }

  async executeSet(options: ConfigSetOptions): Promise<void> {
    try {
      const { cutOff, dailyTasks, dailySpoons } = options;
      if (dailyTasks !== undefined && dailySpoons !== undefined) {
        this.handleError('Use either --daily-tasks or --daily-spoons, not both', options);
        return;
      }
      if (cutOff === undefined && dailyTasks === undefined && dailySpoons === undefined) {
        this.handleError('Nothing to set: pass --cut-off, --daily-tasks or --daily-spoons', options);
        return;
      }

      const runtime = await this.dependencyService.getRuntimeState();
      if (cutOff !== undefined) {
        runtime.setCutOff(cutOff);
      }
      if (dailyTasks !== undefined) {
        runtime.setSelection({ mode: 'count', dailyTasks });
      } else if (dailySpoons !== undefined) {
        runtime.setSelection({ mode: 'spoons', dailySpoons });
      }
      await runtime.save();

      const summary = this.summarize(runtime);
      this.handleSuccess(
        summary,
        options,
        `Config updated: cut-off ${summary.cutOff}, ${describeSelection(summary.selection)}`,
      );
    } catch (error) {
      this.handleCommandError(error, options);
    }
  }

  private summarize(runtime: RuntimeState): ConfigSummary {
    return {
      configPath: runtime.configLocation,
      statePath: runtime.stateLocation,
      cutOff: runtime.cutOff,
      selection: runtime.selection,
      today: runtime.todaysDate(),
      lastGenerated: runtime.lastGeneratedAt,
    };
  }
}
