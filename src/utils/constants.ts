/**
 * Global constants used throughout the application
 */

export const TIME_CONSTANTS = {
  HOURS_PER_DAY: 24,
  MINUTES_PER_HOUR: 60,
  SECONDS_PER_HOUR: 3600,
} as const;
