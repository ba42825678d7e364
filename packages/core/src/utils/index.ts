export {
  toPlainDate,
  parsePlainDate,
  addDays,
  daysBetween,
  parseTimeOfDay,
  dateWithCutOff,
} from './date_utils';
export type { PlainDate, TimeOfDay } from './date_utils';
export { slugify, isValidSlug } from './slug';
export { systemClock } from './clock';
export type { Clock } from './clock';
