import { SchemaValidationCache } from './schema_cache';
import { ConfigDocumentSchema, StateDocumentSchema, TaskConfigRecordSchema } from './index';

describe('SchemaValidationCache', () => {

  beforeEach(() => {
    SchemaValidationCache.clearCache();
  });

  afterEach(() => {
    SchemaValidationCache.clearCache();
  });

  it('should cache validators and avoid recompilation', () => {
    const validator1 = SchemaValidationCache.getValidatorFromSchema(ConfigDocumentSchema);
    const validator2 = SchemaValidationCache.getValidatorFromSchema(ConfigDocumentSchema);

    expect(typeof validator1).toBe('function');
    expect(validator2).toBe(validator1);
  });

  it('should handle multiple different schemas', () => {
    const configValidator = SchemaValidationCache.getValidatorFromSchema(ConfigDocumentSchema);
    const stateValidator = SchemaValidationCache.getValidatorFromSchema(StateDocumentSchema);

    expect(configValidator).not.toBe(stateValidator);
    const stats = SchemaValidationCache.getCacheStats();
    expect(stats.cachedSchemas).toBe(2);
    expect(stats.schemasLoaded).toEqual(['dailydraw/config-document', 'dailydraw/state-document']);
  });

  it('should validate task records', () => {
    const validator = SchemaValidationCache.getValidatorFromSchema(TaskConfigRecordSchema);

    expect(validator({ task: 'Read', weight: 2, disabled: { kind: 'until', date: '2026-11-01' } })).toBe(true);
    expect(validator({ task: 'Read', disabled: { kind: 'for', days: 0 } })).toBe(false);
    expect(validator({ task: 'Read', slug: 'Not Safe' })).toBe(false);
    expect(validator({ weight: 1 })).toBe(false);
  });

  it('should validate state documents', () => {
    const validator = SchemaValidationCache.getValidatorFromSchema(StateDocumentSchema);

    expect(validator({
      lastGenerated: '2026-10-19T10:00:00.000Z',
      tasks: { read: { completed: true, timesCompleted: 4, lastChosen: '2026-10-19' } },
      todaysTasks: ['read'],
    })).toBe(true);
    expect(validator({ lastGenerated: 'yesterday' })).toBe(false);
    expect(validator({ todaysTasks: ['read', 'read'] })).toBe(false);
  });

  it('should compile again after the cache is cleared', () => {
    const before = SchemaValidationCache.getValidatorFromSchema(ConfigDocumentSchema);
    SchemaValidationCache.clearCache();
    const after = SchemaValidationCache.getValidatorFromSchema(ConfigDocumentSchema);

    expect(after).not.toBe(before);
    expect(SchemaValidationCache.getCacheStats().cachedSchemas).toBe(1);
  });
});
