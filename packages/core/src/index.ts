export * as Errors from "./errors";
export * as Logger from "./logger";
export * as Utils from "./utils";
export * as Schemas from "./schemas";
export * as Documents from "./documents";

// Task model
export * as TaskConfigs from "./task_config";
export * as TaskStates from "./task_state";
export * as Eligibility from "./eligibility";

// Engine
export * as Runtime from "./runtime_state";
export * as Picker from "./picker";

// Store interfaces (implementations live in ./fs and ./memory)
export type { ConfigStore } from "./config_store";
export type { StateStore } from "./state_store";

// Frequently used directly
export { RuntimeState } from "./runtime_state";
export { pickTodaysTasks, refreshTodaysTasks } from "./picker";
export { createTaskConfig } from "./task_config";
export { TaskSet } from "./task_set";
export type { TaskConfig, TaskConfigOverrides, TaskConfigPatch, DisabledPolicy } from "./task_config";
export type { TaskState } from "./task_state";
export type { Task, TaskInfo, TaskStatus } from "./eligibility";
export type { ConfigDocument, StateDocument, SelectionPolicy } from "./documents";
export type { Clock, PlainDate } from "./utils";
export type { RandomSource } from "./picker";
