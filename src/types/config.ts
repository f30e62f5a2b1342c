/**
 * Type definition for compost pile configuration
 */

import type { LogLevels } from '@logging';

/**
 * User-configurable settings
 * Everything a server owner might reasonably tune for pace, materials and observability
 */
export interface CompostUserConfig {
  // ───────── CAPACITY ─────────
  readonly MAX_CAPACITY: number;
  readonly BULK_ADD_AMOUNT: number;

  // ───────── TIMING ─────────
  readonly HOURS_TO_COMPLETE: number;
  readonly TURN_SPEEDUP_HOURS: number;
  readonly TURN_COOLDOWN_HOURS: number;

  // ───────── OUTPUT ─────────
  readonly OUTPUT_PER_ITEM: number;

  // ───────── CARBON:NITROGEN ─────────
  readonly GREEN_CN_RATIO: number;
  readonly BROWN_CN_RATIO: number;
  readonly OPTIMAL_CN_RATIO: number;
  readonly OPTIMAL_RATIO_BONUS: number;
  readonly POOR_RATIO_PENALTY: number;

  // ───────── MANUAL MOISTURE ─────────
  readonly WATER_AMOUNT: number;
  readonly DRY_MATERIAL_AMOUNT: number;

  // ───────── MATERIAL CLASSIFICATION ─────────
  readonly GREEN_ITEM_CODES: readonly string[];
  readonly GREEN_ITEM_PREFIXES: readonly string[];
  readonly BROWN_ITEM_CODES: readonly string[];
  readonly BROWN_ITEM_PREFIXES: readonly string[];

  // ───────── CONSOLE SETTINGS ─────────
  readonly CONSOLE_ENABLED: boolean;
  readonly CONSOLE_LOG_LEVEL: number;
  readonly CONSOLE_BUFFER_SIZE: number;
  readonly CONSOLE_INTERVAL_MS: number;

  // ───────── GLOBAL LOGGING SETTINGS ─────────
  readonly GLOBAL_LOG_LEVEL: number;
  readonly GLOBAL_LOG_AUTO_DEMOTE_HOURS: number;
}

/**
 * Application constants
 * Internal engine constants that should rarely change
 */
export interface CompostAppConstants {
  // ───────── LOGGING CONSTANTS ─────────
  readonly LOG_LEVELS: LogLevels;

  // ───────── SIMULATION CONSTANTS ─────────
  readonly REMAINING_HOURS_SENTINEL: number;
  readonly SMALL_PILE_FILL_RATIO: number;
  readonly MAX_VALID_CN_RATIO: number;

  // ───────── TURNING CONSTANTS ─────────
  readonly TURN_WET_DRYING: number;
  readonly TURN_DAMP_DRYING: number;
  readonly TURN_DAMP_THRESHOLD: number;
}

/**
 * Complete compost configuration
 * Combines user config and app constants
 */
export type CompostConfig = CompostUserConfig & CompostAppConstants;
