/**
 * MemoryStateStore - In-memory implementation of StateStore
 */

import type { StateStore } from '../state_store';
import type { StateDocument } from '../../documents';

/**
 * In-memory StateStore implementation for tests.
 *
 * @example
 * ```typescript
 * const store = new MemoryStateStore();
 * store.setState({ lastGenerated: '2026-10-18T09:00:00.000Z', tasks: {}, todaysTasks: [] });
 * ```
 */
export class MemoryStateStore implements StateStore {
  readonly location = 'memory:state';
  private state: StateDocument | null = null;

  async loadState(_now: Date): Promise<StateDocument | null> {
    return this.state ? structuredClone(this.state) : null;
  }

  async saveState(state: StateDocument): Promise<void> {
    this.state = structuredClone(state);
  }

  // ==================== Test Helpers ====================

  setState(state: StateDocument | null): void {
    this.state = state ? structuredClone(state) : null;
  }

  getState(): StateDocument | null {
    return this.state;
  }

  clear(): void {
    this.state = null;
  }
}
