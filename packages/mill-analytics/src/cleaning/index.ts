export { cleanReadings, nullProfile, type CleaningResult, type NullProfile } from './clean.js';
