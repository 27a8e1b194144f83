export { rankValues, rankPosition, orderStatistic, quartiles } from './order-statistic.js';
