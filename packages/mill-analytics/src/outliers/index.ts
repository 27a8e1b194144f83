export {
  computeFence,
  isOutside,
  detectOutliers,
  analyzeOutliers,
  removeOutliers,
  DEFAULT_IQR_MULTIPLIER,
} from './iqr-fence.js';
