/**
 * In-memory material store
 *
 * Holds aggregate green and brown counts for one pile. Individual items are
 * not tracked; decomposition depends only on the totals.
 */

import type { MaterialKind } from '$types';

import { calculateAcceptedCount, classifyMaterial, validateMaterialStoreConfig } from './helpers';
import type { MaterialStore, MaterialStoreConfig } from './types';

/**
 * Create a material store
 *
 * @param config - Capacity, bulk limit and classification lists
 * @returns Empty store
 * @throws {MaterialStoreValidationError} If the configuration is invalid
 *
 * @example
 * ```typescript
 * const store = createMaterialStore(CONFIG);
 * store.deposit('vegetable-carrot', 10); // 4 (bulk limit)
 * ```
 */
export function createMaterialStore(config: MaterialStoreConfig): MaterialStore {
  validateMaterialStoreConfig(config);

  let greens = 0;
  let browns = 0;

  function totalCount(): number {
    return greens + browns;
  }

  function remainingCapacity(): number {
    return Math.max(0, config.MAX_CAPACITY - totalCount());
  }

  function add(kind: MaterialKind, count: number): number {
    const accepted = calculateAcceptedCount(count, config.BULK_ADD_AMOUNT, remainingCapacity());

    if (kind === 'green') {
      greens += accepted;
    } else {
      browns += accepted;
    }

    return accepted;
  }

  function deposit(itemCode: string, count: number): number {
    const kind = classifyMaterial(itemCode, config);
    if (kind === null) return 0;
    return add(kind, count);
  }

  function clear(): number {
    const removed = totalCount();
    greens = 0;
    browns = 0;
    return removed;
  }

  return {
    capacity: config.MAX_CAPACITY,
    deposit: deposit,
    add: add,
    greenCount: () => greens,
    brownCount: () => browns,
    totalCount: totalCount,
    remainingCapacity: remainingCapacity,
    isFull: () => totalCount() >= config.MAX_CAPACITY,
    isEmpty: () => totalCount() === 0,
    fillRatio: () => totalCount() / config.MAX_CAPACITY,
    clear: clear
  };
}
