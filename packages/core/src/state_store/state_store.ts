import type { StateDocument } from '../documents';

/**
 * Interface for state document persistence.
 *
 * Implementations:
 * - FsStateStore: YAML file on disk
 * - MemoryStateStore: In-memory for tests
 */
export interface StateStore {
  readonly location: string;

  /**
   * Load the state document
   *
   * @param now fills `lastGenerated` when the document has none
   * @returns the document, or null when none has been saved yet
   */
  loadState(now: Date): Promise<StateDocument | null>;

  saveState(state: StateDocument): Promise<void>;
}
