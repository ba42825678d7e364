import type { DisabledPolicy, TaskConfig } from '../task_config';
import type { TaskState } from '../task_state';
import type { PlainDate } from '../utils/date_utils';

/**
 * Joined, read-only view of one task: both halves resolved by slug.
 */
export type Task = {
  readonly slug: string;
  readonly config: TaskConfig;
  readonly state: TaskState;
};

/**
 * What eligibility needs to know about the day and today's set.
 * Implemented by the runtime state.
 */
export interface EligibilityContext {
  todaysDate(): PlainDate;
  daysSinceToday(date: PlainDate): number;
  isInTodaysTasks(slug: string): boolean;
}

export type TaskStatus = 'disabled' | 'complete' | 'in-progress' | 'inactive';

/**
 * Display record of a task.
 */
export type TaskInfo = {
  slug: string;
  task: string;
  status: TaskStatus;
  description?: string;
  weight: number;
  spoons: number;
  disabled: DisabledPolicy;
  tags: string[];
};
