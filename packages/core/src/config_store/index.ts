/**
 * ConfigStore - Config document persistence abstraction
 *
 * IMPORTANT: This module only exports the interface.
 * For implementations, use:
 * - @dailydraw/core/fs for FsConfigStore
 * - @dailydraw/core/memory for MemoryConfigStore
 */

// Interface only - NO implementation re-exports
export type { ConfigStore } from './config_store';
