export { isDisabled, isChoosable, taskStatus, taskInfo } from './eligibility';
export type { Task, EligibilityContext, TaskStatus, TaskInfo } from './eligibility.types';
