import { promises as fs } from 'fs';
import * as path from 'path';
import * as yaml from 'js-yaml';
import { DocumentIoError, SerializationError } from '../errors';

function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Reads a YAML document.
 *
 * Uses the core YAML schema so unquoted dates stay strings.
 *
 * @returns the parsed value, or null when the file does not exist
 * @throws DocumentIoError for any other read failure
 * @throws SerializationError when the content is not valid YAML
 */
export async function readYamlDocument(filePath: string): Promise<unknown> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (isMissingFileError(error)) {
      return null;
    }
    throw new DocumentIoError(filePath, error);
  }

  try {
    return yaml.load(content, { schema: yaml.CORE_SCHEMA, filename: filePath }) ?? {};
  } catch (error) {
    if (error instanceof yaml.YAMLException) {
      throw new SerializationError(filePath, error.reason || error.message);
    }
    throw error;
  }
}

/**
 * Writes a document as YAML, creating missing parent directories.
 * @throws DocumentIoError when the directory or file cannot be written
 */
export async function writeYamlDocument(filePath: string, data: object): Promise<void> {
  const content = yaml.dump(data, { noRefs: true, lineWidth: 100 });
  try {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, content, 'utf-8');
  } catch (error) {
    throw new DocumentIoError(filePath, error);
  }
}
