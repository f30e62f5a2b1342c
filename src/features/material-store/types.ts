/**
 * Material store type definitions
 */

import type { MaterialKind } from '$types';

/**
 * Material store configuration
 */
export interface MaterialStoreConfig {
  MAX_CAPACITY: number;
  BULK_ADD_AMOUNT: number;
  GREEN_ITEM_CODES: readonly string[];
  GREEN_ITEM_PREFIXES: readonly string[];
  BROWN_ITEM_CODES: readonly string[];
  BROWN_ITEM_PREFIXES: readonly string[];
}

/**
 * What the engine needs from whatever holds the pile's items
 */
export interface MaterialSource {
  readonly capacity: number;
  greenCount(): number;
  brownCount(): number;
  totalCount(): number;

  /**
   * Add items of a known kind
   * @returns Items actually accepted
   */
  add(kind: MaterialKind, count: number): number;

  /**
   * Remove everything
   * @returns Items removed
   */
  clear(): number;
}

/**
 * Reference in-memory material store
 */
export interface MaterialStore extends MaterialSource {
  /**
   * Classify an item code and add it
   * @returns Items accepted, 0 for codes that are not compostable
   */
  deposit(itemCode: string, count: number): number;
  remainingCapacity(): number;
  isFull(): boolean;
  isEmpty(): boolean;

  /** Total items over capacity, 0..1 */
  fillRatio(): number;
}
