import * as yaml from 'js-yaml';
import {
  Eligibility,
  createTaskConfig,
  type DisabledPolicy,
  type RuntimeState,
  type TaskConfigOverrides,
  type TaskStatus,
} from '@dailydraw/core';
import { BaseCommand } from '../../base/base-command';
import type { BaseCommandOptions } from '../../interfaces/command';
import { readTaskFile } from '../../services/task-import';
import { formatTaskFields, formatTaskLine, toTaskDetails, type TaskDetails } from '../../utils/task-format';

/**
 * Fields shared by add, update and upsert
 */
export interface TaskFieldOptions extends BaseCommandOptions {
  description?: string;
  weight?: number;
  spoons?: number;
  tag?: string[];
  maxOccurrences?: number;
  minFrequency?: number;
}

export interface TasksAddOptions extends TaskFieldOptions {
  slug?: string;
}

export interface TasksUpdateOptions extends TaskFieldOptions {
  task?: string;
}

export type TasksUpsertOptions = TasksAddOptions;

export type TasksRemoveOptions = BaseCommandOptions;

export interface TasksListOptions extends BaseCommandOptions {
  tag?: string;
  status?: TaskStatus;
}

export type TasksDetailsOptions = BaseCommandOptions;

export type TasksEnableOptions = BaseCommandOptions;

export interface TasksDisableOptions extends BaseCommandOptions {
  until?: string;
  for?: number;
}

export interface TasksCompleteOptions extends BaseCommandOptions {
  all?: boolean;
}

export interface TasksImportOptions extends BaseCommandOptions {
  update?: boolean;
}

export type TasksPruneOptions = BaseCommandOptions;

export type ImportSummary = {
  added: string[];
  updated: string[];
  skipped: string[];
};

/**
 * Catalog management: every subcommand loads the runtime state, applies one
 * operation and saves both documents.
 */
export class TasksCommand extends BaseCommand {

  async executeAdd(title: string, options: TasksAddOptions): Promise<void> {
    try {
      const runtime = await this.dependencyService.getRuntimeState();
      const overrides = this.toOverrides(options);
      if (options.slug !== undefined) {
        overrides.slug = options.slug;
      }

      const config = createTaskConfig(title, overrides);
      runtime.addTask(config);
      await runtime.save();

      this.reportTask(runtime, config.slug, options, `Task added: ${config.slug}`);
    } catch (error) {
      this.handleCommandError(error, options);
    }
  }

  async executeUpdate(slug: string, options: TasksUpdateOptions): Promise<void> {
    try {
      const runtime = await this.dependencyService.getRuntimeState();
      const overrides = this.toOverrides(options);
      if (options.task !== undefined) {
        overrides.task = options.task;
      }

      runtime.updateTask({ ...overrides, slug });
      await runtime.save();

      this.reportTask(runtime, slug, options, `Task updated: ${slug}`);
    } catch (error) {
      this.handleCommandError(error, options);
    }
  }

  async executeUpsert(title: string, options: TasksUpsertOptions): Promise<void> {
    try {
      const runtime = await this.dependencyService.getRuntimeState();
      const overrides = this.toOverrides(options);
      if (options.slug !== undefined) {
        overrides.slug = options.slug;
      }

      const config = createTaskConfig(title, overrides);
      const result = runtime.upsertTask(config);
      await runtime.save();

      this.reportTask(runtime, config.slug, options, `Task ${result}: ${config.slug}`);
    } catch (error) {
      this.handleCommandError(error, options);
    }
  }

  async executeRemove(slugs: string[], options: TasksRemoveOptions): Promise<void> {
    try {
      const runtime = await this.dependencyService.getRuntimeState();
      runtime.removeTasks(slugs);
      await runtime.save();

      this.handleSuccess({ removed: slugs }, options, `Removed ${slugs.length} task(s): ${slugs.join(', ')}`);
    } catch (error) {
      this.handleCommandError(error, options);
    }
  }

  async executeList(options: TasksListOptions): Promise<void> {
    try {
      const runtime = await this.dependencyService.getRuntimeState();
      let infos = runtime.tasks().map(task => Eligibility.taskInfo(task, runtime));

      const { tag, status } = options;
      if (tag !== undefined) {
        infos = infos.filter(info => info.tags.includes(tag));
      }
      if (status !== undefined) {
        infos = infos.filter(info => info.status === status);
      }

      if (options.json) {
        this.handleSuccess(infos, options);
        return;
      }

      if (options.quiet) {
        infos.forEach(info => console.log(info.slug));
        return;
      }

      if (infos.length === 0) {
        console.log("📋 No tasks found. Add one with 'dailydraw tasks add <task>'.");
        return;
      }

      console.log(`📋 Found ${infos.length} task(s):`);
      for (const info of infos) {
        console.log(formatTaskLine(info));
        if (options.verbose) {
          console.log(formatTaskFields(info));
        }
      }
    } catch (error) {
      this.handleCommandError(error, options);
    }
  }

  /**
   * All tasks when no slug is given
   */
  async executeDetails(slugs: string[], options: TasksDetailsOptions): Promise<void> {
    try {
      const runtime = await this.dependencyService.getRuntimeState();
      const tasks = slugs.length > 0 ? slugs.map(slug => runtime.getTask(slug)) : runtime.tasks();

      const details: Record<string, TaskDetails> = {};
      for (const task of tasks) {
        details[task.slug] = toTaskDetails(task, Eligibility.taskInfo(task, runtime));
      }

      if (options.json) {
        this.handleSuccess(details, options);
        return;
      }
      if (tasks.length === 0) {
        if (!options.quiet) {
          console.log('📋 No tasks found.');
        }
        return;
      }
      console.log(yaml.dump(details, { noRefs: true, lineWidth: 100 }).trimEnd());
    } catch (error) {
      this.handleCommandError(error, options);
    }
  }

  async executeEnable(slugs: string[], options: TasksEnableOptions): Promise<void> {
    try {
      const runtime = await this.dependencyService.getRuntimeState();
      runtime.enableTasks(slugs);
      await runtime.save();

      this.handleSuccess({ enabled: slugs }, options, `Enabled: ${slugs.join(', ')}`);
    } catch (error) {
      this.handleCommandError(error, options);
    }
  }

  async executeDisable(slugs: string[], options: TasksDisableOptions): Promise<void> {
    try {
      if (options.until !== undefined && options.for !== undefined) {
        this.handleError('Use either --until or --for, not both', options);
        return;
      }

      let policy: DisabledPolicy = { kind: 'disabled' };
      let suffix = '';
      if (options.until !== undefined) {
        policy = { kind: 'until', date: options.until };
        suffix = ` until ${options.until}`;
      } else if (options.for !== undefined) {
        policy = { kind: 'for', days: options.for };
        suffix = ` for ${options.for} day(s)`;
      }

      const runtime = await this.dependencyService.getRuntimeState();
      runtime.disableTasks(slugs, policy);
      await runtime.save();

      this.handleSuccess({ disabled: slugs, policy }, options, `Disabled${suffix}: ${slugs.join(', ')}`);
    } catch (error) {
      this.handleCommandError(error, options);
    }
  }

  async executeComplete(slugs: string[], options: TasksCompleteOptions): Promise<void> {
    try {
      if (!options.all && slugs.length === 0) {
        this.handleError('Name the tasks to complete, or pass --all for every task in today\'s set', options);
        return;
      }

      const runtime = await this.dependencyService.getRuntimeState();
      let completed = slugs;
      if (options.all) {
        completed = runtime.completeTodaysTasks();
      } else {
        runtime.completeTasks(slugs);
      }
      await runtime.save();

      const message = completed.length > 0
        ? `Completed: ${completed.join(', ')}`
        : 'Nothing left to complete today';
      this.handleSuccess({ completed }, options, message);
    } catch (error) {
      this.handleCommandError(error, options);
    }
  }

  /**
   * Without --update, slugs already in the catalog are skipped
   */
  async executeImport(filePath: string, options: TasksImportOptions): Promise<void> {
    try {
      const runtime = await this.dependencyService.getRuntimeState();

      const showProgress = !options.json && !options.quiet;
      if (showProgress) {
        this.logger.info(`Reading file: ${filePath}`);
      }
      const configs = await readTaskFile(filePath);
      if (showProgress) {
        this.logger.info(`Importing ${configs.length} task(s).`);
      }

      const summary: ImportSummary = { added: [], updated: [], skipped: [] };
      for (const config of configs) {
        if (options.update) {
          summary[runtime.upsertTask(config)].push(config.slug);
        } else if (runtime.hasTask(config.slug)) {
          if (showProgress) {
            this.logger.info(`Task ${config.slug} already exists; skipping.`);
          }
          summary.skipped.push(config.slug);
        } else {
          runtime.addTask(config);
          summary.added.push(config.slug);
        }
      }
      await runtime.save();

      this.handleSuccess(
        summary,
        options,
        `Imported ${filePath}: ${summary.added.length} added, ${summary.updated.length} updated, ${summary.skipped.length} skipped`,
      );
    } catch (error) {
      this.handleCommandError(error, options);
    }
  }

  /**
   * Drops state entries left behind by tasks no longer in the config
   */
  async executePrune(options: TasksPruneOptions): Promise<void> {
    try {
      const runtime = await this.dependencyService.getRuntimeState();
      const purged = runtime.purgeOrphans();
      await runtime.save();

      const message = purged.length > 0
        ? `Pruned state of ${purged.length} unknown task(s): ${purged.join(', ')}`
        : 'Nothing to prune';
      this.handleSuccess({ pruned: purged }, options, message);
    } catch (error) {
      this.handleCommandError(error, options);
    }
  }

  private toOverrides(options: TaskFieldOptions): TaskConfigOverrides {
    const overrides: TaskConfigOverrides = {};
    if (options.description !== undefined) overrides.description = options.description;
    if (options.weight !== undefined) overrides.weight = options.weight;
    if (options.spoons !== undefined) overrides.spoons = options.spoons;
    if (options.maxOccurrences !== undefined) overrides.maxOccurrences = options.maxOccurrences;
    if (options.minFrequency !== undefined) overrides.minFrequency = options.minFrequency;
    if (options.tag !== undefined && options.tag.length > 0) overrides.tags = [...options.tag];
    return overrides;
  }

  private reportTask(runtime: RuntimeState, slug: string, options: TaskFieldOptions, message: string): void {
    const info = Eligibility.taskInfo(runtime.getTask(slug), runtime);
    this.handleSuccess(info, options, message);
    if (options.verbose && !options.json) {
      console.log(formatTaskFields(info));
    }
  }
}
