/**
 * Player configuration and CLI types
 */

import { DEFAULT_FPS, DEFAULT_MAX_FRAMES } from '../utils/constants.js';

export type Verbosity = 'quiet' | 'normal' | 'verbose';

export type Subcommand = 'inspect' | 'play';

/**
 * Player configuration
 */
export interface PlayerConfig {
  verbosity: Verbosity;
  enableLog: boolean;
  logDir: string;
  /** Frame cadence of the headless loop */
  fps: number;
  /** Safety cap on frames for a headless run */
  maxFrames: number;
  /** Chapter to start in instead of the container's start script */
  startChapter: string | null;
  startScene: string | null;
  /** Base URL of the remote story server (null disables remote commands) */
  remoteAddress: string | null;
  remoteKey: string | null;
}

/**
 * Default player configuration
 */
export const DEFAULT_CONFIG: PlayerConfig = {
  verbosity: 'normal',
  enableLog: true,
  logDir: 'logs',
  fps: DEFAULT_FPS,
  maxFrames: DEFAULT_MAX_FRAMES,
  startChapter: null,
  startScene: null,
  remoteAddress: null,
  remoteKey: null,
};

/**
 * Parsed CLI arguments
 */
export interface ParsedArgs {
  subcommand: Subcommand;
  storyFile: string;
  config: Partial<PlayerConfig>;
}
