export { rollingMean, DEFAULT_ROLLING_WINDOW } from './rolling-mean.js';
