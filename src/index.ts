#!/usr/bin/env node
/**
 * vn-runtime - inspects and plays compiled visual novel story files
 * Playback is headless: dialog goes to the console, audio to a silent output
 */

import * as path from 'path';
import { setImmediate as nextTick } from 'timers/promises';

import { createSilentOutput, type AudioEvent } from './audio/silent.js';
import { parseArgs } from './cli/args.js';
import { loadContainer, type StoryContainer } from './container/reader.js';
import { CONTENT_TYPE_ORDER } from './container/types.js';
import { Player } from './core/player.js';
import {
  colors,
  formatDuration,
  printDialog,
  printPlayer,
  printPlayerInfo,
} from './output/colors.js';
import { createLogger, type Logger } from './output/logger.js';
import { createRemoteClient } from './remote/client.js';
import { DEFAULT_CONFIG, type PlayerConfig } from './types/player.js';
import { MS_PER_SECOND } from './utils/constants.js';
import { formatSize } from './utils/formatting.js';

/**
 * Print the general header and per-type asset counts
 */
function inspect(container: StoryContainer): void {
  const { general } = container;
  const { width, height } = container.windowSize;

  printPlayer(`Title: ${container.title || '(untitled)'}`);
  printPlayerInfo(`Window: ${width}x${height}`);
  printPlayerInfo(`Engine version: ${general.StoryEngineVersion ?? 'unknown'}`);
  printPlayerInfo(`Size: ${formatSize(container.byteLength)}`);

  const start = container.getStartScene();
  printPlayerInfo(`Start: ${start ? `${start.chapter}/${start.scene}` : 'none'}`);

  for (const contentType of CONTENT_TYPE_ORDER) {
    printPlayerInfo(`${contentType}: ${container.assetNames(contentType).length}`);
  }
}

function describeAudio(event: AudioEvent): string {
  return event.detail ? `${event.action} ${event.name} (${event.detail})` : `${event.action} ${event.name}`;
}

/**
 * Run the story on a fixed-delta frame loop
 * @returns true when the story finished before the frame cap
 */
async function play(container: StoryContainer, config: PlayerConfig, logger: Logger): Promise<boolean> {
  const { remoteAddress, remoteKey } = config;
  const remoteConfig =
    remoteAddress !== null && remoteKey !== null
      ? { address: remoteAddress, key: remoteKey, storyName: container.title }
      : null;

  const player = new Player({
    container,
    logger,
    verbosity: config.verbosity,
    audioOutput: createSilentOutput((event) => {
      logger.logEvent({ event: 'audio', ...event });
      if (config.verbosity === 'verbose') {
        printPlayerInfo(`${colors.magenta}Audio${colors.reset} ${describeAudio(event)}`);
      }
    }),
    host: {
      onDialog: (text) => {
        if (config.verbosity !== 'quiet') printDialog(text);
      },
    },
    remote: remoteConfig ? (responses) => createRemoteClient(remoteConfig, responses) : undefined,
  });

  if (player.context.remote) {
    player.context.remote.send('verify', {}, (receipt) => {
      logger.logEvent({ event: 'remote_verify', code: receipt.code });
      printPlayerInfo(`Remote: ${receipt.code}`);
    });
  }

  const scene =
    config.startChapter !== null && config.startScene !== null
      ? { chapter: config.startChapter, scene: config.startScene }
      : undefined;
  if (!player.start(scene)) {
    return false;
  }

  const delta = 1 / config.fps;
  let frames = 0;
  let finished = false;

  while (frames < config.maxFrames) {
    const result = await player.frame(delta);
    frames++;

    if (result.finished) {
      finished = true;
      break;
    }
    // Nobody presses "continue" in a headless run
    if (player.halted && player.context.halt.remaining === null) {
      player.resume();
    }
    // Let remote responses arrive
    await nextTick();
  }

  const seconds = player.context.clock.elapsed;
  logger.logEvent({ event: 'story_end', frames, seconds, finished });
  if (finished) {
    printPlayer(`Story finished after ${frames} frames (${formatDuration(Math.round(seconds * MS_PER_SECOND))})`);
  } else {
    printPlayer(`${colors.yellow}Stopped at the frame cap${colors.reset} (${frames} frames)`);
  }
  return finished;
}

async function main(): Promise<void> {
  const parsed = parseArgs(process.argv.slice(2));

  // Merge config with defaults
  const config: PlayerConfig = {
    ...DEFAULT_CONFIG,
    ...parsed.config,
  };

  const container = loadContainer(parsed.storyFile);

  if (parsed.subcommand === 'inspect') {
    inspect(container);
    return;
  }

  const storyName = path.basename(parsed.storyFile, path.extname(parsed.storyFile));
  const logger = createLogger(config.enableLog, config.logDir, parsed.storyFile);
  if (config.verbosity !== 'quiet') {
    printPlayerInfo(`Story: ${container.title || storyName} | Verbosity: ${config.verbosity}`);
    if (logger.filePath) {
      printPlayerInfo(`Log: ${logger.filePath}`);
    }
  }

  try {
    const finished = await play(container, config, logger);
    if (!finished) process.exitCode = 1;
  } finally {
    logger.close();
  }
}

// Run main
main().catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  console.error(`Error: ${message}`);
  process.exit(1);
});
