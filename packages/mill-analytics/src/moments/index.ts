export { accumulateMoments } from './welford.js';
export { skewness, kurtosis } from './shape.js';
export { summarize, meanOf, fieldMeans } from './summary.js';
