export { pickTodaysTasks, refreshTodaysTasks } from './picker';
export { weightedOrder } from './weighted_sampling';
export type { RandomSource } from './weighted_sampling';
export type { PickOptions, RefreshOptions } from './picker.types';
