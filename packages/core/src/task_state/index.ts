export {
  createTaskState,
  completeTaskState,
  resetTaskState,
  chooseTaskState,
  enableTaskState,
  disableTaskState,
} from './task_state';
export type { TaskState } from './task_state.types';
