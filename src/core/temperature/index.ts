export {
  createTemperatureState,
  resetTemperature,
  beginTemperature,
  updateTemperature,
  applyTurningCooling,
  setInternalTemperature
} from './temperature';
export {
  calculateHeatGeneration,
  calculateHeatLoss,
  getTemperatureModifier,
  getTemperatureState,
  getEvaporationMultiplier,
  getTemperatureAboveAmbient,
  isThermophilic,
  isTooCold,
  isTooHot
} from './helpers';
export * from './types';
