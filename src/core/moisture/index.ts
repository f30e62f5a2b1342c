export {
  createMoistureState,
  resetMoisture,
  beginMoisture,
  updateMoisture,
  addWater,
  addDryMaterial,
  setMoistureLevel
} from './moisture';
export {
  getMoistureModifier,
  getMoistureState,
  calculateEvaporation,
  calculateRainGain,
  isRainingOnPile,
  isMoistureOptimal,
  isTooDry,
  isTooWet,
  isBoneDry,
  isWaterlogged
} from './helpers';
export * from './types';
