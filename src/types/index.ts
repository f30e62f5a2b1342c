/**
 * Shared type barrel
 */

export type { Hours, MaterialKind, ClimateSample, TimerHandle, TimerAPI } from './common';
export type { CompostUserConfig, CompostAppConstants, CompostConfig } from './config';
export {
  ValidationError,
  ConfigValidationError,
  RatioConfigValidationError,
  MaterialStoreValidationError
} from './errors';
