import { promises as fs } from 'fs';
import * as path from 'path';
import * as yaml from 'js-yaml';
import { Documents, Errors, type TaskConfig } from '@dailydraw/core';

const DELIMITERS: Record<string, string> = {
  csv: ',',
  tsv: '\t',
  psv: '|',
};

const TAG_SEPARATOR = ';';

type ColumnParser = (record: Documents.TaskConfigRecord, value: string, row: number) => void;

function parseNumberCell(column: string, value: string, row: number): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new Errors.ValidationError(`Row ${row}: ${column} must be a number`, [
      { field: column, message: 'must be a number', value },
    ]);
  }
  return parsed;
}

/** Header names are matched case-insensitively, ignoring `_` and `-` */
const COLUMNS: Record<string, ColumnParser> = {
  task: (record, value) => { record.task = value; },
  slug: (record, value) => { record.slug = value; },
  description: (record, value) => { record.description = value; },
  weight: (record, value, row) => { record.weight = parseNumberCell('weight', value, row); },
  spoons: (record, value, row) => { record.spoons = parseNumberCell('spoons', value, row); },
  maxoccurrences: (record, value, row) => { record.maxOccurrences = parseNumberCell('maxOccurrences', value, row); },
  minfrequency: (record, value, row) => { record.minFrequency = parseNumberCell('minFrequency', value, row); },
  tags: (record, value) => {
    record.tags = value.split(TAG_SEPARATOR).map(tag => tag.trim()).filter(tag => tag.length > 0);
  },
};

function normalizeColumn(name: string): string {
  return name.trim().toLowerCase().replace(/[_-]/g, '');
}

/**
 * Splits delimited text into rows of cells.
 *
 * Cells may be wrapped in double quotes; inside quotes the delimiter and
 * line breaks are literal and `""` is a quote. Blank lines are skipped.
 */
export function parseDelimited(content: string, delimiter: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let cell = '';
  let quoted = false;

  const endRow = () => {
    row.push(cell);
    if (row.length > 1 || row[0] !== '') {
      rows.push(row);
    }
    row = [];
    cell = '';
  };

  for (let i = 0; i < content.length; i++) {
    const char = content.charAt(i);
    if (quoted) {
      if (char === '"' && content.charAt(i + 1) === '"') {
        cell += '"';
        i++;
      } else if (char === '"') {
        quoted = false;
      } else {
        cell += char;
      }
    } else if (char === '"' && cell === '') {
      quoted = true;
    } else if (char === delimiter) {
      row.push(cell);
      cell = '';
    } else if (char === '\n') {
      endRow();
    } else if (char !== '\r') {
      cell += char;
    }
  }
  if (cell !== '' || row.length > 0) {
    endRow();
  }

  return rows;
}

/**
 * Turns delimited rows (header first) into task records.
 * @throws ValidationError for an unknown column or a non-numeric number cell
 */
export function rowsToTaskRecords(rows: string[][]): Documents.TaskConfigRecord[] {
  const [header, ...body] = rows;
  if (!header) {
    return [];
  }

  const parsers = header.map(name => {
    const parser = COLUMNS[normalizeColumn(name)];
    if (!parser) {
      throw new Errors.ValidationError(`Unknown column '${name.trim()}'`, [
        { field: name.trim(), message: 'is not a task field' },
      ]);
    }
    return parser;
  });

  return body.map((cells, index) => {
    const record: Documents.TaskConfigRecord = { task: '' };
    cells.forEach((raw, column) => {
      const value = raw.trim();
      const parser = parsers[column];
      if (parser && value !== '') {
        // header row is row 1
        parser(record, value, index + 2);
      }
    });
    return record;
  });
}

/**
 * Reads task definitions from a `.yaml`/`.yml` list or a `.csv`/`.tsv`/`.psv`
 * table, validated like the tasks of the config document.
 *
 * @throws UnsupportedFileTypeError for any other extension
 * @throws DocumentIoError when the file cannot be read
 * @throws SerializationError when a record is not a valid task
 */
export async function readTaskFile(filePath: string): Promise<TaskConfig[]> {
  const extension = path.extname(filePath).slice(1).toLowerCase();
  const delimiter = DELIMITERS[extension];
  if (extension !== 'yaml' && extension !== 'yml' && delimiter === undefined) {
    throw new Errors.UnsupportedFileTypeError(extension);
  }

  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    throw new Errors.DocumentIoError(filePath, error);
  }

  let records: unknown;
  if (delimiter === undefined) {
    try {
      records = yaml.load(content, { schema: yaml.CORE_SCHEMA, filename: filePath }) ?? [];
    } catch (error) {
      if (error instanceof yaml.YAMLException) {
        throw new Errors.SerializationError(filePath, error.reason || error.message);
      }
      throw error;
    }
  } else {
    records = rowsToTaskRecords(parseDelimited(content, delimiter));
  }

  return Documents.parseConfigDocument({ tasks: records }, filePath).tasks;
}
