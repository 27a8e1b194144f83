export { evaluateAlert, resolveThresholds, matchesThreshold } from './threshold.js';
export { buildAlertCatalog, isAlertId, ALERT_IDS } from './catalog.js';
