/**
 * CLI argument parsing
 */

import { createRequire } from 'module';

import type { ParsedArgs, PlayerConfig, Subcommand, Verbosity } from '../types/player.js';

const require = createRequire(import.meta.url);
const pkg = require('../../package.json') as { version: string };

const USAGE = 'Usage: vn-runtime [options] <inspect|play> <story-file>';

interface RawArgs {
  positionalArgs: string[];
  config: Partial<PlayerConfig>;
}

function fail(message: string): never {
  console.error(`Error: ${message}`);
  console.error(USAGE);
  process.exit(1);
}

function positiveInteger(flag: string, value: string | undefined): number {
  const parsed = Number(value);
  if (value === undefined || !Number.isInteger(parsed) || parsed <= 0) {
    fail(`${flag} requires a positive integer`);
  }
  return parsed;
}

function requireValue(flag: string, value: string | undefined): string {
  if (value === undefined || value === '') {
    fail(`${flag} requires a value`);
  }
  return value;
}

/**
 * Extract options from raw args, returning positional args and config
 */
function extractOptions(args: string[], env: NodeJS.ProcessEnv): RawArgs {
  // Handle --version early
  if (args.includes('--version') || args.includes('-V')) {
    console.log(pkg.version);
    process.exit(0);
  }
  if (args.includes('--help') || args.includes('-h')) {
    printUsage();
    process.exit(0);
  }

  let verbosity: Verbosity = 'normal';
  const config: Partial<PlayerConfig> = {
    remoteAddress: env['VN_REMOTE_ADDRESS'] ?? null,
    remoteKey: env['VN_REMOTE_KEY'] ?? null,
  };
  const positionalArgs: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? '';
    if (arg === '--quiet') {
      verbosity = 'quiet';
    } else if (arg === '--normal') {
      verbosity = 'normal';
    } else if (arg === '--verbose') {
      verbosity = 'verbose';
    } else if (arg === '--no-log') {
      config.enableLog = false;
    } else if (arg === '--fps') {
      config.fps = positiveInteger(arg, args[++i]);
    } else if (arg === '--max-frames') {
      config.maxFrames = positiveInteger(arg, args[++i]);
    } else if (arg === '--chapter') {
      config.startChapter = requireValue(arg, args[++i]);
    } else if (arg === '--scene') {
      config.startScene = requireValue(arg, args[++i]);
    } else if (arg === '--remote') {
      config.remoteAddress = requireValue(arg, args[++i]);
    } else if (arg.startsWith('--remote=')) {
      config.remoteAddress = requireValue('--remote', arg.slice(9));
    } else {
      positionalArgs.push(arg);
    }
  }

  config.verbosity = verbosity;
  return { positionalArgs, config };
}

const VALID_SUBCOMMANDS: readonly Subcommand[] = ['inspect', 'play'];

function isValidSubcommand(value: string): value is Subcommand {
  return VALID_SUBCOMMANDS.some((subcommand) => subcommand === value);
}

/**
 * Parse CLI arguments
 * Flags override VN_REMOTE_ADDRESS and VN_REMOTE_KEY from the environment.
 */
export function parseArgs(args: string[], env: NodeJS.ProcessEnv = process.env): ParsedArgs {
  const { positionalArgs, config } = extractOptions(args, env);
  const [subcommand, storyFile] = positionalArgs;

  if (!subcommand) {
    fail('subcommand required');
  }
  if (!isValidSubcommand(subcommand)) {
    fail(`unknown subcommand '${subcommand}'`);
  }
  if (!storyFile) {
    fail('story file required');
  }
  if ((config.startChapter ?? null) === null && (config.startScene ?? null) !== null) {
    fail('--scene requires --chapter');
  }
  if ((config.startChapter ?? null) !== null && (config.startScene ?? null) === null) {
    fail('--chapter requires --scene');
  }

  return { subcommand, storyFile, config };
}

/**
 * Print usage information
 */
export function printUsage(): void {
  console.log(`
vn-runtime - inspects and plays compiled visual novel story files

${USAGE}

Subcommands:
  inspect <story-file>   Print the story header and asset counts
  play <story-file>      Run the story headlessly, printing dialog

Options:
  --quiet              Minimal output (errors only)
  --normal             Default output level
  --verbose            Full output, including audio activity
  --no-log             Disable logging to file (enabled by default)
  --fps <n>            Frames per second of the headless loop (default 60)
  --max-frames <n>     Stop after this many frames
  --chapter <name>     Start in this chapter (with --scene)
  --scene <name>       Start in this scene (with --chapter)
  --remote <url>       Remote story server (or VN_REMOTE_ADDRESS; key from VN_REMOTE_KEY)
  --version, -V        Print the version
  --help, -h           Print this help
`);
}
