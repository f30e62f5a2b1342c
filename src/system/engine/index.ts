export { createCompostEngine } from './engine';
export {
  calculateActivityLevel,
  calculateDecompositionRate,
  calculateRemainingHours,
  calculateTurnDrying,
  isProgressComplete,
  toProgressPercent
} from './helpers';
export type {
  CompostEngine,
  EngineDependencies,
  PileEnvironment,
  PileStatus,
  HarvestResult,
  PileTelemetry,
  RateModifiers
} from './types';
