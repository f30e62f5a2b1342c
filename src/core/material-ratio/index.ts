export { calculateCNRatio, getCNModifier, getCNRatioQualityText } from './material-ratio';
export { validateRatioConfig, isValidRatio, getRatioDistance } from './helpers';
export * from './types';
