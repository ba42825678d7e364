import type { PlainDate } from '../utils/date_utils';

export const DEFAULT_WEIGHT = 1.0;
export const DEFAULT_SPOONS = 3;

/**
 * How a task is kept out of the daily draw.
 *
 * - `enabled`: drawable
 * - `disabled`: never drawable until enabled again
 * - `until`: not drawable through `date` (inclusive)
 * - `for`: not drawable for `days` days counted from the day it was disabled
 */
export type DisabledPolicy =
  | { kind: 'enabled' }
  | { kind: 'disabled' }
  | { kind: 'until'; date: PlainDate }
  | { kind: 'for'; days: number };

/**
 * A catalog entry: identity plus the configured behaviour of a task.
 * Lives in the config document.
 */
export type TaskConfig = {
  /** Unique, URL-safe identifier; never changes once created */
  readonly slug: string;
  task: string;
  description?: string;
  /** Relative probability of being drawn */
  weight: number;
  /** Cost counted against the daily spoon budget */
  spoons: number;
  /** Completions after which the task is never drawn again */
  maxOccurrences?: number;
  /** Minimum days since it was last chosen before it is drawable again */
  minFrequency?: number;
  disabled: DisabledPolicy;
  tags: string[];
};

/**
 * All-optional form of a task config, used both to override defaults at
 * creation and as the incoming side of a merge.
 */
export type TaskConfigOverrides = {
  slug?: string;
  task?: string;
  description?: string;
  weight?: number;
  spoons?: number;
  maxOccurrences?: number;
  minFrequency?: number;
  disabled?: DisabledPolicy;
  tags?: string[];
};

/**
 * Overrides addressed to an existing task by slug.
 */
export type TaskConfigPatch = TaskConfigOverrides & { slug: string };
