/**
 * Filesystem-dependent implementations
 *
 * This module exports all implementations that require filesystem access.
 * Use @dailydraw/core/memory for in-memory alternatives.
 */

// ConfigStore
export { FsConfigStore } from './config_store/fs';

// StateStore
export { FsStateStore } from './state_store/fs';

// Document locations + factory (for DI containers)
export { resolveDocumentPaths, createRuntimeState } from './runtime_state/fs';
export type { DocumentPaths, DocumentPathOverrides } from './runtime_state/fs';
