/**
 * Story log file: dialog lines as plain text, everything else as JSON events
 */

import * as fs from 'fs';
import * as path from 'path';

import { colors, stripAnsi } from './colors.js';

export type PlayerEventName =
  | 'story_start'
  | 'story_end'
  | 'scene_load'
  | 'condition'
  | 'variable_set'
  | 'sprite_loaded'
  | 'audio'
  | 'remote_response'
  | 'remote_verify'
  | 'warning';

/**
 * Event fields as passed by callers
 */
export interface PlayerEventInput {
  event: PlayerEventName;
  [key: string]: unknown;
}

/**
 * One JSON line in the log file
 */
export interface PlayerEvent extends PlayerEventInput {
  type: 'player';
  timestamp: string;
}

export interface Logger {
  log(msg: string): void;
  logEvent(event: PlayerEventInput): void;
  close(): void;
  filePath: string | null;
}

/**
 * Log file name for a story: its base name with anything outside [A-Za-z0-9_.-]
 * replaced, followed by a second-resolution timestamp
 */
export function logFileName(storyName: string, now: Date = new Date()): string {
  const base = path.basename(storyName, path.extname(storyName)).replace(/[^\w.-]+/g, '_') || 'story';
  const timestamp = now.toISOString().replace(/[:.]/g, '-').slice(0, 19);
  return `${base}-${timestamp}.log`;
}

/**
 * Create a logger that writes to a timestamped file in logDir
 *
 * A write error closes the log for the rest of the run and is reported once on stderr.
 */
export function createLogger(
  enabled: boolean,
  logDir: string,
  storyName: string
): Logger {
  if (!enabled) {
    return {
      log: () => undefined,
      logEvent: () => undefined,
      close: () => undefined,
      filePath: null,
    };
  }

  fs.mkdirSync(logDir, { recursive: true });

  const logFile = path.join(logDir, logFileName(storyName));
  const logStream = fs.createWriteStream(logFile, { flags: 'a' });
  let broken = false;

  logStream.on('error', (error) => {
    broken = true;
    console.error(`${colors.yellow}Log disabled:${colors.reset} ${error.message}`);
  });

  const write = (line: string): void => {
    if (!broken) logStream.write(line + '\n');
  };

  return {
    log(msg: string): void {
      write(stripAnsi(msg));
    },
    logEvent(eventData: PlayerEventInput): void {
      const fullEvent: PlayerEvent = {
        type: 'player',
        timestamp: new Date().toISOString(),
        ...eventData,
      };
      write(JSON.stringify(fullEvent));
    },
    close(): void {
      logStream.end();
    },
    filePath: logFile,
  };
}
