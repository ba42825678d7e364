import type { EligibilityContext, Task, TaskInfo, TaskStatus } from './eligibility.types';

/**
 * Whether the task's disabled policy currently keeps it out of the draw.
 *
 * `until` is inclusive of its date. `for` counts whole effective days from
 * `disabledOn`; without a recorded `disabledOn` it has nothing to count
 * from and the task is treated as enabled.
 */
export function isDisabled(task: Task, context: EligibilityContext): boolean {
  const policy = task.config.disabled;
  switch (policy.kind) {
    case 'enabled':
      return false;
    case 'disabled':
      return true;
    case 'until':
      return policy.date >= context.todaysDate();
    case 'for':
      if (task.state.disabledOn === undefined) {
        return false;
      }
      return context.daysSinceToday(task.state.disabledOn) < policy.days;
  }
}

/**
 * Whether the task may be drawn today.
 *
 * All of: not disabled, not already in today's set, under its completion
 * limit, and at least `minFrequency` days since it was last chosen.
 */
export function isChoosable(task: Task, context: EligibilityContext): boolean {
  if (isDisabled(task, context)) {
    return false;
  }
  if (context.isInTodaysTasks(task.slug)) {
    return false;
  }

  const { maxOccurrences, minFrequency } = task.config;
  if (maxOccurrences !== undefined && task.state.timesCompleted >= maxOccurrences) {
    return false;
  }
  if (minFrequency !== undefined && task.state.lastChosen !== undefined) {
    return context.daysSinceToday(task.state.lastChosen) >= minFrequency;
  }
  return true;
}

export function taskStatus(task: Task, context: EligibilityContext): TaskStatus {
  if (isDisabled(task, context)) {
    return 'disabled';
  }
  if (context.isInTodaysTasks(task.slug)) {
    return task.state.completed ? 'complete' : 'in-progress';
  }
  return 'inactive';
}

export function taskInfo(task: Task, context: EligibilityContext): TaskInfo {
  const { config } = task;
  const info: TaskInfo = {
    slug: task.slug,
    task: config.task,
    status: taskStatus(task, context),
    weight: config.weight,
    spoons: config.spoons,
    disabled: config.disabled,
    tags: [...config.tags],
  };
  if (config.description !== undefined) {
    info.description = config.description;
  }
  return info;
}
