export { MemoryStateStore } from './memory_state_store';
