/**
 * MemoryConfigStore Unit Tests
 */

import { MemoryConfigStore } from './memory_config_store';
import { createDefaultConfigDocument, type ConfigDocument } from '../../documents';
import { createTaskConfig } from '../../task_config';

describe('MemoryConfigStore', () => {
  let store: MemoryConfigStore;
  let mockConfig: ConfigDocument;

  beforeEach(() => {
    store = new MemoryConfigStore();
    mockConfig = createDefaultConfigDocument();
    mockConfig.tasks.push(createTaskConfig('Read'));
  });

  describe('ConfigStore interface', () => {
    it('should return null when nothing has been saved', async () => {
      await expect(store.loadConfig()).resolves.toBeNull();
    });

    it('should return the config after setConfig', async () => {
      store.setConfig(mockConfig);

      await expect(store.loadConfig()).resolves.toEqual(mockConfig);
    });

    it('should persist config on saveConfig', async () => {
      await store.saveConfig(mockConfig);

      expect(store.getConfig()).toEqual(mockConfig);
    });

    it('should not share objects with callers', async () => {
      await store.saveConfig(mockConfig);
      mockConfig.tasks.pop();

      const loaded = await store.loadConfig();
      loaded?.tasks.push(createTaskConfig('Walk'));

      expect(store.getConfig()?.tasks.map(t => t.slug)).toEqual(['read']);
    });
  });

  describe('Test helpers', () => {
    it('should clear the config with setConfig(null) and clear()', () => {
      store.setConfig(mockConfig);
      store.setConfig(null);
      expect(store.getConfig()).toBeNull();

      store.setConfig(mockConfig);
      store.clear();
      expect(store.getConfig()).toBeNull();
    });
  });
});
