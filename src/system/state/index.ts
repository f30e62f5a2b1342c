export {
  createInitialPileState,
  resetPileState,
  serializePileState,
  restorePileState
} from './state';
export type { PileState, SerializedPileState, RestoreResult } from './types';
