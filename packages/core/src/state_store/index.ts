/**
 * StateStore - State document persistence abstraction
 *
 * For implementations, use @dailydraw/core/fs (FsStateStore) or
 * @dailydraw/core/memory (MemoryStateStore).
 */
export type { StateStore } from './state_store';
