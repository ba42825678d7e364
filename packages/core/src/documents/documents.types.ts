import type { TaskConfig, TaskConfigOverrides } from '../task_config';
import type { TaskState } from '../task_state';

export const DEFAULT_CUT_OFF = '04:00';
export const DEFAULT_DAILY_TASKS = 1;

/**
 * How many tasks make up a day: a fixed count, or as many as fit a budget
 * of spoons.
 */
export type SelectionPolicy =
  | { mode: 'count'; dailyTasks: number }
  | { mode: 'spoons'; dailySpoons: number };

/**
 * The task catalog and its selection settings.
 */
export type ConfigDocument = {
  /** `HH:MM`; before this time the effective day is still yesterday */
  cutOff: string;
  selection: SelectionPolicy;
  tasks: TaskConfig[];
};

/**
 * Selection history and today's set.
 */
export type StateDocument = {
  /** ISO-8601 timestamp of the most recent draw */
  lastGenerated: string;
  tasks: Record<string, TaskState>;
  todaysTasks: string[];
};

/** A task entry as written in the config document; omitted fields take defaults */
export type TaskConfigRecord = TaskConfigOverrides & { task: string };

export type ConfigDocumentRecord = {
  cutOff?: string;
  selection?: SelectionPolicy;
  tasks?: TaskConfigRecord[];
};

export type TaskStateRecord = Partial<TaskState>;

export type StateDocumentRecord = {
  lastGenerated?: string;
  tasks?: Record<string, TaskStateRecord>;
  todaysTasks?: string[];
};
