export { TaskSet } from './task_set';
