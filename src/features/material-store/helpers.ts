/**
 * Material store helpers
 */

import type { MaterialKind } from '$types';
import { MaterialStoreValidationError } from '$types/errors';
import { isFiniteNumber, isInteger } from '@utils/number';

import type { MaterialStoreConfig } from './types';

/**
 * Validate material store configuration
 * @throws {MaterialStoreValidationError} If limits are not positive integers or the lists overlap
 */
export function validateMaterialStoreConfig(config: MaterialStoreConfig): void {
  if (!isInteger(config.MAX_CAPACITY) || config.MAX_CAPACITY < 1) {
    throw new MaterialStoreValidationError(
      `MAX_CAPACITY must be a positive integer (got ${config.MAX_CAPACITY})`
    );
  }
  if (!isInteger(config.BULK_ADD_AMOUNT) || config.BULK_ADD_AMOUNT < 1) {
    throw new MaterialStoreValidationError(
      `BULK_ADD_AMOUNT must be a positive integer (got ${config.BULK_ADD_AMOUNT})`
    );
  }

  for (const code of config.GREEN_ITEM_CODES) {
    if (config.BROWN_ITEM_CODES.includes(code)) {
      throw new MaterialStoreValidationError(`Item code "${code}" is listed as both green and brown`);
    }
  }
  for (const prefix of config.GREEN_ITEM_PREFIXES) {
    if (config.BROWN_ITEM_PREFIXES.includes(prefix)) {
      throw new MaterialStoreValidationError(`Item prefix "${prefix}" is listed as both green and brown`);
    }
  }
}

/**
 * Classify an item code as green or brown
 *
 * Exact codes win over prefixes, so a specific brown item can sit under a
 * green prefix.
 *
 * @param itemCode - Item code path, e.g. "vegetable-carrot"
 * @param config - Classification lists
 * @returns Material kind, or null if the item is not compostable
 *
 * @example
 * ```typescript
 * classifyMaterial('fruit-apple', CONFIG); // 'green'
 * classifyMaterial('stick', CONFIG);       // 'brown'
 * classifyMaterial('stone', CONFIG);       // null
 * ```
 */
export function classifyMaterial(itemCode: string, config: MaterialStoreConfig): MaterialKind | null {
  if (config.GREEN_ITEM_CODES.includes(itemCode)) return 'green';
  if (config.BROWN_ITEM_CODES.includes(itemCode)) return 'brown';

  if (config.GREEN_ITEM_PREFIXES.some((prefix) => itemCode.startsWith(prefix))) return 'green';
  if (config.BROWN_ITEM_PREFIXES.some((prefix) => itemCode.startsWith(prefix))) return 'brown';

  return null;
}

/**
 * Number of items a single add can accept
 *
 * @param requested - Items offered
 * @param bulkLimit - Per-call limit
 * @param remaining - Free capacity
 * @returns Accepted count, 0 for non-positive or non-numeric requests
 */
export function calculateAcceptedCount(requested: number, bulkLimit: number, remaining: number): number {
  if (!isFiniteNumber(requested) || requested <= 0) return 0;
  return Math.max(0, Math.min(Math.floor(requested), bulkLimit, remaining));
}
