export {
  createDefaultConfigDocument,
  createDefaultStateDocument,
  parseConfigDocument,
  parseStateDocument,
  serializeConfigDocument,
  serializeStateDocument,
  toTaskConfigRecord,
} from './documents';
export { DEFAULT_CUT_OFF, DEFAULT_DAILY_TASKS } from './documents.types';
export type {
  SelectionPolicy,
  ConfigDocument,
  StateDocument,
  TaskConfigRecord,
  ConfigDocumentRecord,
  TaskStateRecord,
  StateDocumentRecord,
} from './documents.types';
