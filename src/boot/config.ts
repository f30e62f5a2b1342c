import type { CompostUserConfig, CompostAppConstants, CompostConfig } from '$types';

// ─────────────────────────────────────────────────────────────
// USER CONFIGURATION
//   Everything a server owner might reasonably tune for pace,
//   materials, and observability.
// ─────────────────────────────────────────────────────────────

export const USER_CONFIG: Readonly<CompostUserConfig> = {
  // MAX_CAPACITY
  //   Role: Maximum number of items one pile can hold.
  //   Critical: Integer in [1, 1024] (error outside).
  //   Recommended: 16–256; 64 fills a bin in a few trips.
  MAX_CAPACITY: 64,

  // BULK_ADD_AMOUNT
  //   Role: Items accepted per deposit action (sneak-click adds a handful at once).
  //   Critical: Integer in [1, MAX_CAPACITY].
  //   Recommended: 1–8; 4 keeps filling quick without skipping the ratio decision.
  BULK_ADD_AMOUNT: 4,

  // HOURS_TO_COMPLETE
  //   Role: In-game hours for a pile at all-neutral modifiers to reach 100%.
  //   Critical: 1–10000 h (error outside).
  //   Recommended: 120–480 h; 240 h is ten in-game days.
  HOURS_TO_COMPLETE: 240,

  // TURN_SPEEDUP_HOURS
  //   Role: Hours of progress granted directly by each turn.
  //   Critical: 0–HOURS_TO_COMPLETE h (error if negative).
  //   Recommended: 2–12 h; 5 h rewards turning without making it mandatory.
  TURN_SPEEDUP_HOURS: 5,

  // TURN_COOLDOWN_HOURS
  //   Role: Minimum in-game hours between turns, checked by callers through canTurn().
  //   Critical: 0–240 h (error if negative).
  //   Recommended: 4–24 h; 5 h matches TURN_SPEEDUP_HOURS.
  TURN_COOLDOWN_HOURS: 5,

  // OUTPUT_PER_ITEM
  //   Role: Finished compost produced per deposited item on harvest.
  //   Critical: 0–10 (error outside).
  //   Recommended: 0.25–1; 0.5 halves the volume as real compost does.
  OUTPUT_PER_ITEM: 0.5,

  // GREEN_CN_RATIO / BROWN_CN_RATIO
  //   Role: Carbon:nitrogen ratio contributed by each green and brown item.
  //   Critical: 1–100 each; BROWN_CN_RATIO must exceed GREEN_CN_RATIO.
  //   Recommended: green 10–25, brown 40–100; 15 and 60 match kitchen scraps and straw.
  GREEN_CN_RATIO: 15,
  BROWN_CN_RATIO: 60,

  // OPTIMAL_CN_RATIO
  //   Role: Pile ratio that earns the full OPTIMAL_RATIO_BONUS.
  //   Critical: Between GREEN_CN_RATIO and BROWN_CN_RATIO, otherwise unreachable.
  //   Recommended: 25–30; 27.5 is the textbook middle.
  OPTIMAL_CN_RATIO: 27.5,

  // OPTIMAL_RATIO_BONUS
  //   Role: Rate multiplier when the pile ratio is within 5 of optimal.
  //   Critical: 1–5 (error outside).
  //   Recommended: 1.2–2.0; 1.5 makes balancing worth the effort.
  OPTIMAL_RATIO_BONUS: 1.5,

  // POOR_RATIO_PENALTY
  //   Role: Rate multiplier when the pile ratio is more than 25 from optimal.
  //   Critical: 0.01–1 (error outside).
  //   Recommended: 0.3–0.8; 0.5 halves the pace of a single-material pile.
  POOR_RATIO_PENALTY: 0.5,

  // WATER_AMOUNT
  //   Role: Moisture added by one watering action.
  //   Critical: 0.01–1 (error outside).
  //   Recommended: 0.1–0.3; 0.2 moves a dry pile into the optimal band in two pours.
  WATER_AMOUNT: 0.2,

  // DRY_MATERIAL_AMOUNT
  //   Role: Moisture removed by one dry-material action.
  //   Critical: 0.01–1 (error outside).
  //   Recommended: 0.1–0.3.
  DRY_MATERIAL_AMOUNT: 0.15,

  // GREEN_ITEM_CODES / GREEN_ITEM_PREFIXES
  //   Role: Item codes classified as nitrogen-rich. Exact codes are checked before prefixes.
  //   Critical: Must not overlap the brown lists.
  //   Recommended: Fresh food waste and rot.
  GREEN_ITEM_CODES: ['rot'],
  GREEN_ITEM_PREFIXES: ['vegetable-', 'fruit-'],

  // BROWN_ITEM_CODES / BROWN_ITEM_PREFIXES
  //   Role: Item codes classified as carbon-rich.
  //   Critical: Must not overlap the green lists.
  //   Recommended: Dry plant matter, grain and sticks.
  BROWN_ITEM_CODES: ['stick'],
  BROWN_ITEM_PREFIXES: ['grain-', 'drygrass', 'papyrus'],

  // CONSOLE_ENABLED
  //   Role: Enable console logging output.
  //   Critical: Boolean only.
  //   Recommended: true.
  CONSOLE_ENABLED: true,

  // CONSOLE_LOG_LEVEL
  //   Role: Minimum level written to the console sink (0=DEBUG..3=CRITICAL).
  //   Critical: Must match one of the LOG_LEVELS values.
  //   Recommended: 1 (INFO).
  CONSOLE_LOG_LEVEL: 1,

  // CONSOLE_BUFFER_SIZE
  //   Role: Lines held before the console sink starts dropping.
  //   Critical: 10–1000 (error outside).
  //   Recommended: 100–300; long simulations log a line per day.
  CONSOLE_BUFFER_SIZE: 150,

  // CONSOLE_INTERVAL_MS
  //   Role: Delay between drained console lines.
  //   Critical: 1–200 ms (error outside).
  //   Recommended: 5–50 ms.
  CONSOLE_INTERVAL_MS: 10,

  // GLOBAL_LOG_LEVEL
  //   Role: Master log verbosity (0=DEBUG..3=CRITICAL).
  //   Critical: Must match one of the LOG_LEVELS values.
  //   Recommended: 1 (INFO) for normal runs, 0 (DEBUG) while tuning.
  GLOBAL_LOG_LEVEL: 1,

  // GLOBAL_LOG_AUTO_DEMOTE_HOURS
  //   Role: Wall-clock hours after which INFO lines are suppressed (0 disables).
  //   Critical: 0–720 h (error outside).
  //   Recommended: 24 h for long-running servers.
  GLOBAL_LOG_AUTO_DEMOTE_HOURS: 24,
};

// ─────────────────────────────────────────────────────────────
// APPLICATION CONSTANTS
//   Internal engine constants that should rarely change.
// ─────────────────────────────────────────────────────────────

export const APP_CONSTANTS: Readonly<CompostAppConstants> = {
  // LOG_LEVELS
  //   Role: Canonical mapping of log level names to numeric codes.
  //   Critical: Values must be distinct.
  //   Recommended: DEBUG=0, INFO=1, WARNING=2, CRITICAL=3.
  LOG_LEVELS: {
    DEBUG: 0,
    INFO: 1,
    WARNING: 2,
    CRITICAL: 3,
  },

  // REMAINING_HOURS_SENTINEL
  //   Role: Reported remaining hours when the current rate is zero.
  //   Critical: Must be a finite integer so telemetry stays representable.
  //   Recommended: Do not change; 9999 reads as "not progressing".
  REMAINING_HOURS_SENTINEL: 9999,

  // SMALL_PILE_FILL_RATIO
  //   Role: Fill ratio below which microbial activity ramps down linearly to zero.
  //   Critical: (0, 1].
  //   Recommended: Do not change; a pile needs critical mass to heat up.
  SMALL_PILE_FILL_RATIO: 0.3,

  // MAX_VALID_CN_RATIO
  //   Role: Ratios above this are treated as invalid and get a neutral modifier.
  //   Critical: Must exceed BROWN_CN_RATIO.
  //   Recommended: Do not change.
  MAX_VALID_CN_RATIO: 100,

  // ═══════════════════════════════════════════════════════════════
  // TURNING CONSTANTS
  // ═══════════════════════════════════════════════════════════════

  // TURN_WET_DRYING
  //   Role: Moisture removed by a turn when the pile is too wet.
  //   Recommended: Do not change.
  TURN_WET_DRYING: 0.1,

  // TURN_DAMP_DRYING
  //   Role: Moisture removed by a turn when the pile is above TURN_DAMP_THRESHOLD.
  //   Recommended: Do not change.
  TURN_DAMP_DRYING: 0.05,

  // TURN_DAMP_THRESHOLD
  //   Role: Moisture level above which turning dries the pile slightly.
  //   Recommended: Do not change.
  TURN_DAMP_THRESHOLD: 0.5,
};

// ─────────────────────────────────────────────────────────────
// COMBINED CONFIG (DEFAULT EXPORT)
//   Default value only; engines receive their config explicitly
// ─────────────────────────────────────────────────────────────

const CONFIG: CompostConfig = Object.assign({}, APP_CONSTANTS, USER_CONFIG);

/**
 * Build a complete config from user overrides
 *
 * Overrides that are `undefined` keep the default value.
 *
 * @param overrides - Partial user configuration
 * @returns Fresh config object combining defaults and overrides
 *
 * @example
 * ```typescript
 * const fast = resolveConfig({ HOURS_TO_COMPLETE: 48 });
 * ```
 */
export function resolveConfig(overrides: Partial<CompostUserConfig> = {}): CompostConfig {
  const defined: Partial<CompostUserConfig> = {};
  let key: keyof CompostUserConfig;
  for (key in overrides) {
    if (overrides[key] !== undefined) {
      Object.assign(defined, { [key]: overrides[key] });
    }
  }

  return Object.assign({}, APP_CONSTANTS, USER_CONFIG, defined);
}

export default CONFIG;
