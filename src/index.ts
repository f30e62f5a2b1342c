/**
 * Compost pile simulation
 *
 * Public entry point: the engine, its collaborators, configuration and
 * the pure models it is built from.
 */

export { createCompostEngine } from './system/engine';
export type {
  CompostEngine,
  EngineDependencies,
  PileEnvironment,
  PileStatus,
  HarvestResult,
  PileTelemetry,
  RateModifiers
} from './system/engine';

export { createMaterialStore, classifyMaterial } from './features/material-store';
export type { MaterialStore, MaterialSource, MaterialStoreConfig } from './features/material-store';

export { default as CONFIG, USER_CONFIG, APP_CONSTANTS, resolveConfig } from './boot/config';
export { initialize } from './boot/init';
export { createNodeTimer } from './boot/timer';
export type { Runtime, RuntimeDependencies, BootConsole } from './boot/types';
export { validateConfig } from './validation';
export type { ValidationResult } from './validation';

export { createLogger, createConsoleSink } from './logging';
export type { Logger, LogLevel, ConsoleSink } from './logging';

export { EVENT_NAMES, describePileEvent } from './events';
export type { PileEvent, PileEventListener, LegacyResetReason } from './events';

export type { SerializedPileState, RestoreResult } from './system/state';

export * from './core';
export * from './types';
