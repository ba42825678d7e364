import type { RandomSource } from './weighted_sampling';

export type PickOptions = {
  /** Defaults to Math.random */
  random?: RandomSource;
  /** Slugs never drawn in this call */
  exclude?: Iterable<string>;
};

export type RefreshOptions = PickOptions & {
  /** Slugs to drop and redraw; defaults to the uncompleted tasks of today's set */
  slugs?: Iterable<string>;
};
