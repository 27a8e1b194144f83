export { groupedMean, runningHours, DEFAULT_RUNNING_HOURS_LIMIT } from './breakdowns.js';
