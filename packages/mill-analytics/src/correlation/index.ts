export { pearson, pearsonCorrelation } from './pearson.js';
