import {
  DEFAULT_SPOONS,
  DEFAULT_WEIGHT,
  type DisabledPolicy,
  type TaskConfig,
  type TaskConfigOverrides,
} from './task_config.types';
import { ValidationError, type FieldError } from '../errors';
import { isValidSlug, slugify } from '../utils/slug';
import { parsePlainDate } from '../utils/date_utils';

function isNonNegativeInteger(value: number): boolean {
  return Number.isInteger(value) && value >= 0;
}

function validateDisabledPolicy(policy: DisabledPolicy): FieldError | null {
  switch (policy.kind) {
    case 'enabled':
    case 'disabled':
      return null;
    case 'until':
      try {
        parsePlainDate(policy.date);
        return null;
      } catch (error) {
        return {
          field: 'disabled.date',
          message: error instanceof Error ? error.message : String(error),
          value: policy.date,
        };
      }
    case 'for':
      return Number.isInteger(policy.days) && policy.days > 0
        ? null
        : { field: 'disabled.days', message: 'must be a positive integer', value: policy.days };
  }
}

/**
 * Collects every field error of a fully-formed task config.
 */
export function validateTaskConfig(config: TaskConfig): FieldError[] {
  const errors: FieldError[] = [];

  if (!config.task.trim()) {
    errors.push({ field: 'task', message: 'must be a non-empty string', value: config.task });
  }
  if (!isValidSlug(config.slug)) {
    errors.push({ field: 'slug', message: 'must be lowercase ASCII words separated by single hyphens', value: config.slug });
  }
  if (!Number.isFinite(config.weight) || config.weight < 0) {
    errors.push({ field: 'weight', message: 'must be a non-negative number', value: config.weight });
  }
  if (!Number.isInteger(config.spoons) || config.spoons < 1) {
    errors.push({ field: 'spoons', message: 'must be a positive integer', value: config.spoons });
  }
  if (config.maxOccurrences !== undefined && !isNonNegativeInteger(config.maxOccurrences)) {
    errors.push({ field: 'maxOccurrences', message: 'must be a non-negative integer', value: config.maxOccurrences });
  }
  if (config.minFrequency !== undefined && !isNonNegativeInteger(config.minFrequency)) {
    errors.push({ field: 'minFrequency', message: 'must be a non-negative integer', value: config.minFrequency });
  }
  const policyError = validateDisabledPolicy(config.disabled);
  if (policyError) {
    errors.push(policyError);
  }

  return errors;
}

function uniqueTags(tags: readonly string[]): string[] {
  const result: string[] = [];
  for (const tag of tags) {
    const trimmed = tag.trim();
    if (trimmed && !result.includes(trimmed)) {
      result.push(trimmed);
    }
  }
  return result;
}

/**
 * Creates a new, fully-formed TaskConfig with validation.
 *
 * The slug is taken from `overrides.slug` when given, otherwise derived from
 * the title.
 *
 * @throws ValidationError when the title is empty, no slug can be derived or
 * any field is out of range
 */
export function createTaskConfig(title: string, overrides: TaskConfigOverrides = {}): TaskConfig {
  const task = (overrides.task ?? title).trim();
  const slug = overrides.slug?.trim() || slugify(task);

  if (!task) {
    throw new ValidationError('Task title cannot be empty', [
      { field: 'task', message: 'must be a non-empty string', value: title },
    ]);
  }
  if (!slug) {
    throw new ValidationError(`Cannot derive a slug from '${task}'`, [
      { field: 'slug', message: 'title has no alphanumeric characters', value: task },
    ]);
  }

  const config: TaskConfig = {
    slug,
    task,
    weight: overrides.weight ?? DEFAULT_WEIGHT,
    spoons: overrides.spoons ?? DEFAULT_SPOONS,
    disabled: overrides.disabled ?? { kind: 'enabled' },
    tags: uniqueTags(overrides.tags ?? []),
  };
  if (overrides.description !== undefined) {
    config.description = overrides.description;
  }
  if (overrides.maxOccurrences !== undefined) {
    config.maxOccurrences = overrides.maxOccurrences;
  }
  if (overrides.minFrequency !== undefined) {
    config.minFrequency = overrides.minFrequency;
  }

  const errors = validateTaskConfig(config);
  if (errors.length > 0) {
    throw new ValidationError(`Invalid task '${slug}'`, errors);
  }

  return config;
}

/**
 * Field-wise merge of `incoming` over `base`.
 *
 * Incoming values replace base values only when they differ from the
 * defaults: a non-empty title, a defined description or limit, a weight other
 * than 1, a spoon cost other than 3, a disabled policy other than enabled.
 * Tags are unioned in order. The slug is never altered.
 *
 * @returns a new config; `base` is left untouched
 * @throws ValidationError when the merged config is invalid
 */
export function mergeTaskConfig(base: TaskConfig, incoming: TaskConfigOverrides): TaskConfig {
  const merged: TaskConfig = { ...base, tags: [...base.tags] };

  if (incoming.task !== undefined && incoming.task.trim()) {
    merged.task = incoming.task.trim();
  }
  if (incoming.description !== undefined) {
    merged.description = incoming.description;
  }
  if (incoming.weight !== undefined && incoming.weight !== DEFAULT_WEIGHT) {
    merged.weight = incoming.weight;
  }
  if (incoming.spoons !== undefined && incoming.spoons !== DEFAULT_SPOONS) {
    merged.spoons = incoming.spoons;
  }
  if (incoming.maxOccurrences !== undefined) {
    merged.maxOccurrences = incoming.maxOccurrences;
  }
  if (incoming.minFrequency !== undefined) {
    merged.minFrequency = incoming.minFrequency;
  }
  if (incoming.disabled !== undefined && incoming.disabled.kind !== 'enabled') {
    merged.disabled = incoming.disabled;
  }
  merged.tags = uniqueTags([...base.tags, ...(incoming.tags ?? [])]);

  const errors = validateTaskConfig(merged);
  if (errors.length > 0) {
    throw new ValidationError(`Invalid task '${base.slug}'`, errors);
  }

  return merged;
}

/**
 * Clears any disabled policy.
 */
export function enableTaskConfig(config: TaskConfig): void {
  config.disabled = { kind: 'enabled' };
}

/**
 * Disables the task; `policy` defaults to an open-ended disable.
 */
export function disableTaskConfig(config: TaskConfig, policy: DisabledPolicy = { kind: 'disabled' }): void {
  const error = validateDisabledPolicy(policy);
  if (error) {
    throw new ValidationError(`Invalid disabled policy for '${config.slug}'`, [error]);
  }
  config.disabled = policy;
}
