jest.mock('fs', () => ({
  promises: {
    readFile: jest.fn(),
  },
}));

import { promises as fs } from 'fs';
import { Errors, createTaskConfig } from '@dailydraw/core';
import { parseDelimited, readTaskFile, rowsToTaskRecords } from './task-import';

const mockedFs = fs as jest.Mocked<typeof fs>;

describe('parseDelimited', () => {
  it('should split rows and cells', () => {
    expect(parseDelimited('task,weight\nRead,2\r\nWalk,1\n', ',')).toEqual([
      ['task', 'weight'],
      ['Read', '2'],
      ['Walk', '1'],
    ]);
  });

  it('should keep delimiters, quotes and line breaks inside quoted cells', () => {
    expect(parseDelimited('task|description\n"Read|Write"|"He said ""hi""\nthen left"', '|')).toEqual([
      ['task', 'description'],
      ['Read|Write', 'He said "hi"\nthen left'],
    ]);
  });

  it('should skip blank lines and keep empty cells', () => {
    expect(parseDelimited('task\tslug\n\nRead\t\n', '\t')).toEqual([
      ['task', 'slug'],
      ['Read', ''],
    ]);
  });
});

describe('rowsToTaskRecords', () => {
  it('should map header names to task fields', () => {
    const records = rowsToTaskRecords([
      ['Task', 'max_occurrences', 'Min-Frequency', 'tags', 'spoons'],
      ['Read', '5', '2', 'mind; evening', ''],
    ]);

    expect(records).toEqual([
      { task: 'Read', maxOccurrences: 5, minFrequency: 2, tags: ['mind', 'evening'] },
    ]);
  });

  it('should reject unknown columns', () => {
    expect(() => rowsToTaskRecords([['task', 'priority'], ['Read', 'high']])).toThrow("Unknown column 'priority'");
  });

  it('should reject non-numeric numbers with the row number', () => {
    expect(() => rowsToTaskRecords([['task', 'weight'], ['Read', '1'], ['Walk', 'heavy']]))
      .toThrow('Row 3: weight must be a number');
  });

  it('should return nothing for an empty table', () => {
    expect(rowsToTaskRecords([])).toEqual([]);
  });
});

describe('readTaskFile', () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  it('should read a YAML list of tasks', async () => {
    mockedFs.readFile.mockResolvedValue('- task: Read\n  weight: 2\n- task: Walk\n  tags: [body]\n');

    const tasks = await readTaskFile('/tmp/tasks.yml');

    expect(tasks).toEqual([
      createTaskConfig('Read', { weight: 2 }),
      createTaskConfig('Walk', { tags: ['body'] }),
    ]);
    expect(mockedFs.readFile).toHaveBeenCalledWith('/tmp/tasks.yml', 'utf-8');
  });

  it('should read a CSV table', async () => {
    mockedFs.readFile.mockResolvedValue('task,slug,weight\nWater the plants,plants,0.5\n');

    const tasks = await readTaskFile('/tmp/tasks.CSV');

    expect(tasks).toEqual([createTaskConfig('Water the plants', { slug: 'plants', weight: 0.5 })]);
  });

  it('should reject other extensions before reading', async () => {
    await expect(readTaskFile('/tmp/tasks.json')).rejects.toThrow('Unsupported file type: json');
    await expect(readTaskFile('/tmp/tasks')).rejects.toThrow(Errors.UnsupportedFileTypeError);
    expect(mockedFs.readFile).not.toHaveBeenCalled();
  });

  it('should reject records that are not valid tasks', async () => {
    mockedFs.readFile.mockResolvedValue('- weight: 2\n');

    await expect(readTaskFile('/tmp/tasks.yaml')).rejects.toThrow(Errors.SerializationError);
  });

  it('should wrap read failures', async () => {
    mockedFs.readFile.mockRejectedValue(new Error('EACCES: simulated'));

    await expect(readTaskFile('/tmp/tasks.yaml')).rejects.toThrow('Could not access /tmp/tasks.yaml: EACCES: simulated');
  });
});
