export { analyzeBatch, attempt, OUTLIER_FIELDS, type BatchReport, type Outcome } from './batch.js';
