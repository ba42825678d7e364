/**
 * In-memory implementations (no filesystem required)
 *
 * Suitable for tests and for embedding the engine.
 */

// ConfigStore
export { MemoryConfigStore } from './config_store/memory';

// StateStore
export { MemoryStateStore } from './state_store/memory';
