export { createMaterialStore } from './material-store';
export { classifyMaterial, validateMaterialStoreConfig, calculateAcceptedCount } from './helpers';
export type { MaterialStore, MaterialSource, MaterialStoreConfig } from './types';
