/**
 * FsConfigStore - Filesystem implementation of ConfigStore
 *
 * Reads and writes the config document as YAML.
 */

import type { ConfigStore } from '../config_store';
import {
  parseConfigDocument,
  serializeConfigDocument,
  type ConfigDocument,
} from '../../documents';
import { readYamlDocument, writeYamlDocument } from '../../utils/document_files';

/**
 * Filesystem-based ConfigStore implementation.
 *
 * A missing file is not an error: `loadConfig` returns null and the runtime
 * state writes defaults. Unreadable or malformed files are.
 *
 * @example
 * ```typescript
 * const store = new FsConfigStore(resolveDocumentPaths().configPath);
 * const config = await store.loadConfig();
 * ```
 */
export class FsConfigStore implements ConfigStore {
  readonly location: string;

  constructor(configPath: string) {
    this.location = configPath;
  }

  async loadConfig(): Promise<ConfigDocument | null> {
    const data = await readYamlDocument(this.location);
    if (data === null) {
      return null;
    }
    return parseConfigDocument(data, this.location);
  }

  async saveConfig(config: ConfigDocument): Promise<void> {
    await writeYamlDocument(this.location, serializeConfigDocument(config));
  }
}
