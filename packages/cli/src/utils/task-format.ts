import type { DisabledPolicy, Task, TaskInfo, TaskStatus } from '@dailydraw/core';

export const STATUS_ICONS: Record<TaskStatus, string> = {
  'complete': '✅',
  'in-progress': '🔄',
  'disabled': '⏸️',
  'inactive': '⚪',
};

export function describeDisabled(policy: DisabledPolicy): string {
  switch (policy.kind) {
    case 'enabled':
      return 'enabled';
    case 'disabled':
      return 'disabled';
    case 'until':
      return `disabled until ${policy.date}`;
    case 'for':
      return `disabled for ${policy.days} day(s)`;
  }
}

export function formatTaskLine(info: TaskInfo): string {
  return `${STATUS_ICONS[info.status]} ${info.slug} - ${info.task}`;
}

export function formatTaskFields(info: TaskInfo): string {
  const tags = info.tags.length > 0 ? info.tags.join(', ') : 'none';
  return `   Weight: ${info.weight}, Spoons: ${info.spoons}, Tags: ${tags}`;
}

/**
 * Everything known about a task, as shown by `tasks details`
 */
export type TaskDetails = {
  task: string;
  status: TaskStatus;
  description?: string;
  weight: number;
  spoons: number;
  maxOccurrences?: number;
  minFrequency?: number;
  disabled: string;
  tags: string[];
  completed: boolean;
  timesCompleted: number;
  lastChosen?: string;
  disabledOn?: string;
};

export function toTaskDetails(task: Task, info: TaskInfo): TaskDetails {
  const { config, state } = task;
  const details: TaskDetails = {
    task: config.task,
    status: info.status,
    weight: config.weight,
    spoons: config.spoons,
    disabled: describeDisabled(config.disabled),
    tags: [...config.tags],
    completed: state.completed,
    timesCompleted: state.timesCompleted,
  };
  if (config.description !== undefined) details.description = config.description;
  if (config.maxOccurrences !== undefined) details.maxOccurrences = config.maxOccurrences;
  if (config.minFrequency !== undefined) details.minFrequency = config.minFrequency;
  if (state.lastChosen !== undefined) details.lastChosen = state.lastChosen;
  if (state.disabledOn !== undefined) details.disabledOn = state.disabledOn;
  return details;
}
