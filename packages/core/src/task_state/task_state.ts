import type { TaskState } from './task_state.types';
import type { PlainDate } from '../utils/date_utils';

export function createTaskState(): TaskState {
  return { completed: false, timesCompleted: 0 };
}

/**
 * Marks the task complete and counts the completion.
 *
 * Every call increments `timesCompleted`; callers invoke it once per
 * logical completion.
 */
export function completeTaskState(state: TaskState): void {
  state.completed = true;
  state.timesCompleted += 1;
}

export function resetTaskState(state: TaskState): void {
  state.completed = false;
}

/**
 * Records a fresh selection: clears the completion flag and stamps the day.
 */
export function chooseTaskState(state: TaskState, today: PlainDate): void {
  resetTaskState(state);
  state.lastChosen = today;
}

export function enableTaskState(state: TaskState): void {
  delete state.disabledOn;
}

export function disableTaskState(state: TaskState, today: PlainDate): void {
  state.disabledOn = today;
}
