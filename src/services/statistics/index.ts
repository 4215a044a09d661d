export {
  computeBaseline,
  ewma,
  median,
  medianAbsoluteDeviation,
  percentile,
  upperControlLimit,
  BASELINE_EWMA_ALPHA,
  MAD_CONSISTENCY,
} from './robustStatistics';
