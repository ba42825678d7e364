export {
  DailyDrawError,
  TaskNotFoundError,
  TaskAlreadyExistsError,
  ValidationError,
  UnsupportedFileTypeError,
  DocumentIoError,
  SerializationError,
  isDailyDrawError,
} from './errors';
export type { DailyDrawErrorCode, FieldError } from './errors';
