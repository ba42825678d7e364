export { RuntimeState } from './runtime_state';
export type { RuntimeStateOptions, Orphans, UpsertResult } from './runtime_state.types';
