import type { Clock } from '../utils/clock';

export type RuntimeStateOptions = {
  /** Defaults to the system clock */
  clock?: Clock;
};

/**
 * Entries that do not join across the two documents.
 */
export type Orphans = {
  /** State entries with no task in the catalog; kept on save until purged */
  states: string[];
  /** Slugs of today's set with no task in the catalog; dropped at load */
  todaysTasks: string[];
};

export type UpsertResult = 'added' | 'updated';
