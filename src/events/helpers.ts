/**
 * Event formatting helpers
 */

import { formatGameTime } from '@utils/time';

import { EVENT_NAMES } from './types';
import type { PileEvent } from './types';

/**
 * One-line description of an event for logs
 *
 * @param event - Pile event
 * @returns Message prefixed with the game time
 *
 * @example
 * ```typescript
 * describePileEvent({ type: 'pile_started', timestamp: 30, itemCount: 4 });
 * // "day 2 06:00 pile started with 4 items"
 * ```
 */
export function describePileEvent(event: PileEvent): string {
  const at = formatGameTime(event.timestamp);

  switch (event.type) {
    case EVENT_NAMES.STARTED:
      return at + ' pile started with ' + event.itemCount + ' items';
    case EVENT_NAMES.TURNED:
      return at + ' pile turned (+' + event.speedupHours + 'h), progress ' +
        Math.floor(event.progress * 100) + '%';
    case EVENT_NAMES.FINISHED:
      return at + ' compost finished after ' + event.elapsedHours + 'h';
    case EVENT_NAMES.HARVESTED:
      return at + ' harvested ' + event.itemsRemoved + ' items, yield ' + event.compostYield;
    case EVENT_NAMES.LEGACY_RESET:
      return at + ' incompatible saved pile discarded (' + event.reason + ')';
  }
}
