/**
 * FsStateStore - Filesystem implementation of StateStore
 *
 * The state document is machine-local history; it is kept apart from the
 * config document so the catalog can be shared or versioned on its own.
 */

import type { StateStore } from '../state_store';
import {
  parseStateDocument,
  serializeStateDocument,
  type StateDocument,
} from '../../documents';
import { readYamlDocument, writeYamlDocument } from '../../utils/document_files';

export class FsStateStore implements StateStore {
  readonly location: string;

  constructor(statePath: string) {
    this.location = statePath;
  }

  async loadState(now: Date): Promise<StateDocument | null> {
    const data = await readYamlDocument(this.location);
    if (data === null) {
      return null;
    }
    return parseStateDocument(data, this.location, now);
  }

  async saveState(state: StateDocument): Promise<void> {
    await writeYamlDocument(this.location, serializeStateDocument(state));
  }
}
