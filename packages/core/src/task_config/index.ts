export {
  createTaskConfig,
  mergeTaskConfig,
  validateTaskConfig,
  enableTaskConfig,
  disableTaskConfig,
} from './task_config';
export { DEFAULT_WEIGHT, DEFAULT_SPOONS } from './task_config.types';
export type {
  DisabledPolicy,
  TaskConfig,
  TaskConfigOverrides,
  TaskConfigPatch,
} from './task_config.types';
