import type { ErrorObject } from 'ajv';
import {
  DEFAULT_CUT_OFF,
  DEFAULT_DAILY_TASKS,
  type ConfigDocument,
  type ConfigDocumentRecord,
  type StateDocument,
  type StateDocumentRecord,
  type TaskConfigRecord,
  type TaskStateRecord,
} from './documents.types';
import { SchemaValidationCache, ConfigDocumentSchema, StateDocumentSchema } from '../schemas';
import { SerializationError, ValidationError, type FieldError } from '../errors';
import { createTaskConfig, DEFAULT_SPOONS, DEFAULT_WEIGHT, type TaskConfig } from '../task_config';
import { createTaskState, type TaskState } from '../task_state';

function toFieldErrors(errors: ErrorObject[] | null | undefined): FieldError[] {
  return (errors ?? []).map(error => ({
    field: error.instancePath || '/',
    message: error.message ?? 'is invalid',
  }));
}

export function createDefaultConfigDocument(): ConfigDocument {
  return {
    cutOff: DEFAULT_CUT_OFF,
    selection: { mode: 'count', dailyTasks: DEFAULT_DAILY_TASKS },
    tasks: [],
  };
}

/**
 * Empty state whose last draw is a day before `now`, so the first pick of a
 * fresh install always rolls over.
 */
export function createDefaultStateDocument(now: Date): StateDocument {
  return {
    lastGenerated: new Date(now.getTime() - 24 * 60 * 60 * 1000).toISOString(),
    tasks: {},
    todaysTasks: [],
  };
}

/**
 * Validates a parsed config document and materializes its tasks.
 *
 * @param source where the document came from, used in error messages
 * @throws SerializationError when the document does not match the schema,
 * a task is invalid or two tasks share a slug
 */
export function parseConfigDocument(data: unknown, source: string): ConfigDocument {
  const document = data ?? {};
  const validate = SchemaValidationCache.getValidatorFromSchema<ConfigDocumentRecord>(ConfigDocumentSchema);
  if (!validate(document)) {
    throw new SerializationError(source, 'does not match the config schema', toFieldErrors(validate.errors));
  }

  const defaults = createDefaultConfigDocument();
  const tasks: TaskConfig[] = [];
  const seen = new Set<string>();
  for (const [index, record] of (document.tasks ?? []).entries()) {
    let config: TaskConfig;
    try {
      config = createTaskConfig(record.task, record);
    } catch (error) {
      if (error instanceof ValidationError) {
        throw new SerializationError(source, `task ${index}: ${error.message}`, error.errors);
      }
      throw error;
    }
    if (seen.has(config.slug)) {
      throw new SerializationError(source, `duplicate task slug '${config.slug}'`);
    }
    seen.add(config.slug);
    tasks.push(config);
  }

  return {
    cutOff: document.cutOff ?? defaults.cutOff,
    selection: document.selection ?? defaults.selection,
    tasks,
  };
}

function toTaskState(record: TaskStateRecord): TaskState {
  const state = createTaskState();
  state.completed = record.completed ?? false;
  state.timesCompleted = record.timesCompleted ?? 0;
  if (record.lastChosen !== undefined) {
    state.lastChosen = record.lastChosen;
  }
  if (record.disabledOn !== undefined) {
    state.disabledOn = record.disabledOn;
  }
  return state;
}

/**
 * Validates a parsed state document and fills in defaults.
 *
 * @param now used for the default `lastGenerated`
 * @throws SerializationError when the document does not match the schema
 */
export function parseStateDocument(data: unknown, source: string, now: Date): StateDocument {
  const document = data ?? {};
  const validate = SchemaValidationCache.getValidatorFromSchema<StateDocumentRecord>(StateDocumentSchema);
  if (!validate(document)) {
    throw new SerializationError(source, 'does not match the state schema', toFieldErrors(validate.errors));
  }

  const tasks: Record<string, TaskState> = {};
  for (const [slug, record] of Object.entries(document.tasks ?? {})) {
    tasks[slug] = toTaskState(record);
  }

  return {
    lastGenerated: document.lastGenerated ?? createDefaultStateDocument(now).lastGenerated,
    tasks,
    todaysTasks: [...(document.todaysTasks ?? [])].sort(),
  };
}

/**
 * Writable form of a task config: default-valued fields are left out.
 */
export function toTaskConfigRecord(config: TaskConfig): TaskConfigRecord {
  const record: TaskConfigRecord = { slug: config.slug, task: config.task };
  if (config.description !== undefined) {
    record.description = config.description;
  }
  if (config.weight !== DEFAULT_WEIGHT) {
    record.weight = config.weight;
  }
  if (config.spoons !== DEFAULT_SPOONS) {
    record.spoons = config.spoons;
  }
  if (config.maxOccurrences !== undefined) {
    record.maxOccurrences = config.maxOccurrences;
  }
  if (config.minFrequency !== undefined) {
    record.minFrequency = config.minFrequency;
  }
  if (config.disabled.kind !== 'enabled') {
    record.disabled = { ...config.disabled };
  }
  if (config.tags.length > 0) {
    record.tags = [...config.tags];
  }
  return record;
}

export function serializeConfigDocument(document: ConfigDocument): ConfigDocumentRecord {
  return {
    cutOff: document.cutOff,
    selection: { ...document.selection },
    tasks: document.tasks.map(toTaskConfigRecord),
  };
}

export function serializeStateDocument(document: StateDocument): StateDocumentRecord {
  const tasks: Record<string, TaskStateRecord> = {};
  for (const slug of Object.keys(document.tasks).sort()) {
    const state = document.tasks[slug];
    if (state) {
      tasks[slug] = { ...state };
    }
  }
  return {
    lastGenerated: document.lastGenerated,
    tasks,
    todaysTasks: [...document.todaysTasks].sort(),
  };
}
