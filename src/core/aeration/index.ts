export {
  createAerationState,
  resetAeration,
  beginAeration,
  updateAeration,
  aerate,
  turnAeration,
  setAerationLevel,
  getHoursSinceLastTurn
} from './aeration';
export {
  calculateCompactionLoss,
  calculateMoistureAerationLoss,
  getAerationModifier,
  getAerationState,
  isAerationOptimal,
  isAnaerobic,
  isOverAerated
} from './helpers';
export * from './types';
