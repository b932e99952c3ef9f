/**
 * Centralized constants for the player runtime
 * Replaces magic numbers with descriptive names
 */

// === Container Layout ===
/** Total width of the footer that locates both headers */
export const FOOTER_WIDTH = 50;
/** Width of each padded "from-to" range inside the footer */
export const FOOTER_HALF_WIDTH = 25;
/** Filler character used to pad footer ranges */
export const FOOTER_PAD_CHAR = 'X';
/** Magic prefix written at the start of every container */
export const CONTAINER_MAGIC = 'VNPACK-';

// === Size Thresholds ===
/** Threshold for displaying size in K */
export const SIZE_THRESHOLD_K = 1000;
/** Threshold for displaying size in M */
export const SIZE_THRESHOLD_M = 1000000;

// === Instruction Fields ===
/** Smallest duration a clamped seconds field accepts */
export const MIN_DURATION_SECONDS = 0.01;
/** Largest duration a clamped seconds field accepts */
export const MAX_DURATION_SECONDS = 100.0;
/** Author-facing volume scale (0..100) */
export const VOLUME_SCALE = 100;

// === Variables ===
/** Maximum scan-and-rewrite passes when resolving nested variables */
export const MAX_VARIABLE_PASSES = 4;
/** Characters that may not appear in a variable name */
export const INVALID_VARIABLE_CHARS = '\\/,()$:<> ';

// === Screen ===
/** Fully opaque overlay */
export const OPACITY_MAX = 255;
/** Fully transparent overlay */
export const OPACITY_MIN = 0;

// === Speed Rows ===
/** Fade rate (opacity units per second): slowest, increment, highest row */
export const FADE_RATE = { initial: 5, step: 5, maxRow: 100 } as const;
/** Movement rate (pixels per second) */
export const MOVE_RATE = { initial: 10, step: 10, maxRow: 100 } as const;
/** Scale rate (scale units per second) */
export const SCALE_RATE = { initial: 0.01, step: 0.01, maxRow: 100 } as const;
/** Rotation rate (degrees per second) */
export const ROTATE_RATE = { initial: 5, step: 5, maxRow: 100 } as const;
/** Decimal places kept by speed-row conversion */
export const RATE_PRECISION = 4;

// === Time Constants ===
/** Milliseconds per second */
export const MS_PER_SECOND = 1000;
/** Seconds per minute */
export const SECONDS_PER_MINUTE = 60;
/** Seconds per hour */
export const SECONDS_PER_HOUR = 3600;

// === Default Configuration ===
/** Default headless frame rate */
export const DEFAULT_FPS = 60;
/** Default frame cap for a headless run (10 minutes at 60 fps) */
export const DEFAULT_MAX_FRAMES = 36000;
