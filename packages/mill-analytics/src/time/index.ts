export {
  parseTimestamp,
  tryParseTimestamp,
  timeKey,
  sortByTime,
  monthKeyOf,
  monthOrdinal,
  formatMonthKey,
} from './timestamps.js';
