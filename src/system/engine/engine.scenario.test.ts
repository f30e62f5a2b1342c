/**
 * Full-length run of a pile held at neutral conditions
 *
 * Every rate modifier is pinned to 1 so the pile decomposes at exactly
 * 1 / HOURS_TO_COMPLETE per hour.
 */

import { resolveConfig } from '@boot/config';
import { EVENT_NAMES } from '@events/types';
import type { PileEvent } from '@events/types';
import { createMaterialStore } from '@features/material-store';

import { createCompostEngine } from './engine';

vi.mock('@core/moisture', async (importOriginal) => {
  const actual = await importOriginal<typeof import('@core/moisture')>();
  return { ...actual, getMoistureModifier: () => 1 };
});

vi.mock('@core/aeration', async (importOriginal) => {
  const actual = await importOriginal<typeof import('@core/aeration')>();
  return { ...actual, getAerationModifier: () => 1 };
});

vi.mock('@core/temperature', async (importOriginal) => {
  const actual = await importOriginal<typeof import('@core/temperature')>();
  return { ...actual, getTemperatureModifier: () => 1 };
});

vi.mock('@core/material-ratio', async (importOriginal) => {
  const actual = await importOriginal<typeof import('@core/material-ratio')>();
  return { ...actual, getCNModifier: () => 1 };
});

describe('neutral pile', () => {
  it('should finish after HOURS_TO_COMPLETE hourly updates', () => {
    const config = resolveConfig({ BULK_ADD_AMOUNT: 16 });
    let clock = 100;
    const events: PileEvent[] = [];
    const engine = createCompostEngine(config, {
      environment: {
        now: () => clock,
        ambientClimate: () => ({ temperature: 20, rainfall: 0 }),
        isRainExposed: () => false
      },
      materials: createMaterialStore(config),
      onEvent: (event) => {
        events.push(event);
      }
    });

    engine.addMaterial(10, 'green');
    expect(engine.currentRate()).toBe(1 / 240);

    for (let hour = 1; hour < 240; hour++) {
      clock = 100 + hour;
      engine.update(clock);
    }
    expect(engine.isFinished()).toBe(false);
    expect(engine.progressPercent()).toBe(99);

    clock = 340;
    engine.update(clock);

    expect(engine.isFinished()).toBe(true);
    expect(engine.progressPercent()).toBe(100);
    expect(engine.getStatus()).toBe('finished');
    expect(events[events.length - 1]).toEqual({
      type: EVENT_NAMES.FINISHED,
      timestamp: 340,
      elapsedHours: 240
    });
  });
});
