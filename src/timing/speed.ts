/**
 * Speed-row conversion: author-facing rows to per-second rates
 */

import {
  FADE_RATE,
  MOVE_RATE,
  RATE_PRECISION,
  ROTATE_RATE,
  SCALE_RATE,
} from '../utils/constants.js';
import { clamp, roundTo } from '../utils/formatting.js';

export interface RateTable {
  /** Rate at row 1 */
  initial: number;
  /** Added per row above 1 */
  step: number;
  maxRow: number;
}

/**
 * Rate for a speed row; rows outside 1..maxRow clamp
 */
export function rateForRow(table: RateTable, row: number): number {
  const clampedRow = clamp(Math.trunc(row), 1, table.maxRow);
  return roundTo(table.initial + (clampedRow - 1) * table.step, RATE_PRECISION);
}

export type RateCategory = 'fade' | 'move' | 'scale' | 'rotate';

export const RATE_TABLES: Record<RateCategory, RateTable> = {
  fade: FADE_RATE,
  move: MOVE_RATE,
  scale: SCALE_RATE,
  rotate: ROTATE_RATE,
};

/**
 * Rate for a row of one animation category
 */
export function convertRow(category: RateCategory, row: number): number {
  return rateForRow(RATE_TABLES[category], row);
}
