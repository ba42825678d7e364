import type { RuntimeState, Task } from '@dailydraw/core';
import { BaseCommand } from '../../base/base-command';
import type { BaseCommandOptions } from '../../interfaces/command';
import { filterCandidates, type CompletionCandidate } from '../../services/completion-candidates';

export const COMPLETION_KINDS = ['all', 'today', 'uncompleted', 'completed', 'enabled', 'disabled'] as const;

export type CompletionKind = typeof COMPLETION_KINDS[number];

export type CompletionsOptions = BaseCommandOptions;

function tasksOfKind(runtime: RuntimeState, kind: CompletionKind): Task[] {
  switch (kind) {
    case 'all':
      return runtime.tasks();
    case 'today':
      return runtime.resolveTodaysTasks();
    case 'uncompleted':
      return runtime.uncompletedTasks();
    case 'completed':
      return runtime.completedTasks();
    case 'enabled':
      return runtime.enabledTasks();
    case 'disabled':
      return runtime.disabledTasks();
  }
}

/**
 * Slug candidates for shell completion scripts, one `slug<TAB>title` per line
 */
export class CompletionsCommand extends BaseCommand {

  async executeCompletions(kind: CompletionKind, current: string, options: CompletionsOptions): Promise<void> {
    try {
      const runtime = await this.dependencyService.getRuntimeState();
      const candidates: CompletionCandidate[] = tasksOfKind(runtime, kind)
        .map(task => ({ slug: task.slug, help: task.config.task }));
      const matches = filterCandidates(current, candidates);

      if (options.json) {
        this.handleSuccess(matches, options);
        return;
      }
      for (const match of matches) {
        console.log(`${match.slug}\t${match.help}`);
      }
    } catch (error) {
      this.handleCommandError(error, options);
    }
  }
}
