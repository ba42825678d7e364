import {
  createTaskConfig,
  disableTaskConfig,
  enableTaskConfig,
  mergeTaskConfig,
  validateTaskConfig,
} from './task_config';
import { DEFAULT_SPOONS, DEFAULT_WEIGHT, type TaskConfig } from './task_config.types';
import { ValidationError } from '../errors';

describe('createTaskConfig', () => {
  it('should derive the slug from the title and apply defaults', () => {
    const config = createTaskConfig('Water the Plants');

    expect(config).toEqual({
      slug: 'water-the-plants',
      task: 'Water the Plants',
      weight: DEFAULT_WEIGHT,
      spoons: DEFAULT_SPOONS,
      disabled: { kind: 'enabled' },
      tags: [],
    });
  });

  it('should use an explicit slug instead of deriving one', () => {
    const config = createTaskConfig('Water the Plants', { slug: 'plants' });

    expect(config.slug).toBe('plants');
  });

  it('should keep optional overrides and deduplicate tags', () => {
    const config = createTaskConfig('Stretch', {
      description: 'Ten minutes',
      weight: 2.5,
      spoons: 1,
      maxOccurrences: 4,
      minFrequency: 2,
      tags: ['health', 'morning', 'health'],
    });

    expect(config.description).toBe('Ten minutes');
    expect(config.weight).toBe(2.5);
    expect(config.spoons).toBe(1);
    expect(config.maxOccurrences).toBe(4);
    expect(config.minFrequency).toBe(2);
    expect(config.tags).toEqual(['health', 'morning']);
  });

  it('should reject an empty title', () => {
    expect(() => createTaskConfig('   ')).toThrow(ValidationError);
    expect(() => createTaskConfig('')).toThrow('Task title cannot be empty');
  });

  it('should reject a title that yields no slug', () => {
    expect(() => createTaskConfig('???')).toThrow("Cannot derive a slug from '???'");
  });

  it('should reject an unsafe explicit slug', () => {
    expect(() => createTaskConfig('Stretch', { slug: 'Not Safe' })).toThrow(ValidationError);
  });

  it('should reject out-of-range numbers with field errors', () => {
    let caught: unknown;
    try {
      createTaskConfig('Stretch', { weight: -1, spoons: 0 });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ValidationError);
    const fields = caught instanceof ValidationError ? caught.errors.map(e => e.field) : [];
    expect(fields).toEqual(['weight', 'spoons']);
  });

  it('should reject an impossible until date', () => {
    expect(() => createTaskConfig('Stretch', { disabled: { kind: 'until', date: '2026-02-31' } }))
      .toThrow(ValidationError);
  });
});

describe('mergeTaskConfig', () => {
  let base: TaskConfig;

  beforeEach(() => {
    base = createTaskConfig('Read', { weight: 2, tags: ['mind'], description: 'A chapter' });
  });

  it('should replace fields with non-default incoming values', () => {
    const merged = mergeTaskConfig(base, {
      task: 'Read a book',
      weight: 0.5,
      spoons: 5,
      maxOccurrences: 10,
      minFrequency: 3,
      disabled: { kind: 'for', days: 2 },
    });

    expect(merged.task).toBe('Read a book');
    expect(merged.weight).toBe(0.5);
    expect(merged.spoons).toBe(5);
    expect(merged.maxOccurrences).toBe(10);
    expect(merged.minFrequency).toBe(3);
    expect(merged.disabled).toEqual({ kind: 'for', days: 2 });
  });

  it('should ignore default incoming values', () => {
    const merged = mergeTaskConfig(base, {
      task: '',
      weight: DEFAULT_WEIGHT,
      spoons: DEFAULT_SPOONS,
      disabled: { kind: 'enabled' },
    });

    expect(merged.task).toBe('Read');
    expect(merged.weight).toBe(2);
    expect(merged.spoons).toBe(DEFAULT_SPOONS);
    expect(merged.description).toBe('A chapter');
  });

  it('should union tags instead of replacing them', () => {
    const merged = mergeTaskConfig(base, { tags: ['evening', 'mind'] });

    expect(merged.tags).toEqual(['mind', 'evening']);
  });

  it('should never alter the slug', () => {
    const merged = mergeTaskConfig(base, { slug: 'something-else', task: 'Something else' });

    expect(merged.slug).toBe('read');
  });

  it('should leave the base config untouched', () => {
    mergeTaskConfig(base, { weight: 9, tags: ['x'] });

    expect(base.weight).toBe(2);
    expect(base.tags).toEqual(['mind']);
  });
});

describe('enableTaskConfig / disableTaskConfig', () => {
  it('should toggle between the simple variants', () => {
    const config = createTaskConfig('Run');

    disableTaskConfig(config);
    expect(config.disabled).toEqual({ kind: 'disabled' });

    enableTaskConfig(config);
    expect(config.disabled).toEqual({ kind: 'enabled' });
  });

  it('should accept an explicit policy', () => {
    const config = createTaskConfig('Run');

    disableTaskConfig(config, { kind: 'until', date: '2026-11-01' });

    expect(config.disabled).toEqual({ kind: 'until', date: '2026-11-01' });
  });

  it('should reject a non-positive duration', () => {
    const config = createTaskConfig('Run');

    expect(() => disableTaskConfig(config, { kind: 'for', days: 0 })).toThrow(ValidationError);
    expect(config.disabled).toEqual({ kind: 'enabled' });
  });
});

describe('validateTaskConfig', () => {
  it('should return no errors for a valid config', () => {
    expect(validateTaskConfig(createTaskConfig('Run'))).toEqual([]);
  });
});
