import { InvalidArgumentError } from 'commander';
import { Errors, Utils, type TaskStatus } from '@dailydraw/core';

const TASK_STATUSES: readonly TaskStatus[] = ['disabled', 'complete', 'in-progress', 'inactive'];

export function parseNumberOption(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    throw new InvalidArgumentError('Not a number.');
  }
  return parsed;
}

export function parseCountOption(value: string): number {
  const parsed = parseNumberOption(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Not a non-negative integer.');
  }
  return parsed;
}

/**
 * `YYYY-MM-DD`, checked against the calendar
 */
export function parseDateOption(value: string): string {
  try {
    return Utils.parsePlainDate(value);
  } catch (error) {
    if (error instanceof Errors.ValidationError) {
      throw new InvalidArgumentError(error.message);
    }
    throw error;
  }
}

export function parseStatusOption(value: string): TaskStatus {
  const status = TASK_STATUSES.find(candidate => candidate === value);
  if (!status) {
    throw new InvalidArgumentError(`Expected one of: ${TASK_STATUSES.join(', ')}.`);
  }
  return status;
}

/** Repeatable option: `--tag a --tag b` */
export function collectOption(value: string, previous: string[]): string[] {
  return [...previous, value];
}
