/**
 * Shared formatting utilities
 */

import { SIZE_THRESHOLD_K, SIZE_THRESHOLD_M } from './constants.js';

/**
 * Format a byte count for display
 * @param bytes - Number of bytes
 * @returns Formatted string: "N bytes", "N.NK bytes", or "N.NM bytes"
 */
export function formatSize(bytes: number): string {
  if (bytes < SIZE_THRESHOLD_K) {
    return `${bytes} bytes`;
  } else if (bytes < SIZE_THRESHOLD_M) {
    return `${(bytes / SIZE_THRESHOLD_K).toFixed(1)}K bytes`;
  }
  return `${(bytes / SIZE_THRESHOLD_M).toFixed(1)}M bytes`;
}

/**
 * Shorten a script line for single-line display
 */
export function previewLine(line: string, max = 50): string {
  const cleaned = line.replace(/[\r\n]+/g, ' ').trim();
  return cleaned.length > max ? cleaned.slice(0, max) + '...' : cleaned;
}

/**
 * Clamp a number into an inclusive range
 */
export function clamp(value: number, min: number, max: number): number {
  if (value < min) return min;
  if (value > max) return max;
  return value;
}

/**
 * Round to a fixed number of decimal places
 */
export function roundTo(value: number, places: number): number {
  const factor = 10 ** places;
  return Math.round(value * factor) / factor;
}
