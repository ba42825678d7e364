import type { PlainDate } from '../utils/date_utils';

/**
 * Mutable per-task history, keyed by the slug of its TaskConfig.
 * Lives in the state document.
 */
export type TaskState = {
  /** Reset whenever the task is freshly chosen */
  completed: boolean;
  /** Never decremented */
  timesCompleted: number;
  lastChosen?: PlainDate;
  /** Effective day of the most recent disable action */
  disabledOn?: PlainDate;
};
