import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { createLogger, logFileName } from '../../src/output/logger.js';

describe('logFileName', () => {
  const now = new Date('2026-03-04T05:06:07.890Z');

  it('uses the story base name and a timestamp', () => {
    expect(logFileName('stories/my-story.vnpack', now)).toBe('my-story-2026-03-04T05-06-07.log');
  });

  it('replaces characters unsafe in file names', () => {
    expect(logFileName('My Story: Part 1.vnpack', now)).toBe('My_Story_Part_1-2026-03-04T05-06-07.log');
  });

  it('falls back to a generic name', () => {
    expect(logFileName('???', now)).toBe('_-2026-03-04T05-06-07.log');
    expect(logFileName('', now)).toBe('story-2026-03-04T05-06-07.log');
  });
});

describe('createLogger', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'vn-runtime-log-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('does nothing when disabled', () => {
    const logDir = path.join(dir, 'logs');
    const logger = createLogger(false, logDir, 'story');

    logger.log('Hello');
    logger.logEvent({ event: 'story_start' });
    logger.close();

    expect(logger.filePath).toBeNull();
    expect(fs.existsSync(logDir)).toBe(false);
  });

  it('creates the log directory and names the file after the story', async () => {
    const logDir = path.join(dir, 'logs');
    const logger = createLogger(true, logDir, path.join(dir, 'my-story.vnpack'));
    logger.close();

    await vi.waitFor(() => {
      expect(fs.existsSync(logger.filePath ?? '')).toBe(true);
    });

    expect(fs.existsSync(logDir)).toBe(true);
    expect(path.dirname(logger.filePath ?? '')).toBe(logDir);
    expect(path.basename(logger.filePath ?? '')).toMatch(
      /^my-story-\d{4}-\d{2}-\d{2}T\d{2}-\d{2}-\d{2}\.log$/
    );
  });

  it('stops writing and reports once when the file cannot be opened', async () => {
    const errors = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const logger = createLogger(true, dir, 'story');
    fs.mkdirSync(logger.filePath ?? '');

    logger.log('Hello');
    logger.logEvent({ event: 'story_start' });

    await vi.waitFor(() => {
      expect(errors).toHaveBeenCalledTimes(1);
    });
    logger.log('After');
    logger.close();

    expect(fs.statSync(logger.filePath ?? '').isDirectory()).toBe(true);
    errors.mockRestore();
  });

  it('writes plain lines and JSON events', async () => {
    const logger = createLogger(true, dir, 'story');
    const file = logger.filePath ?? '';

    logger.log('\x1b[32mHello\x1b[0m');
    logger.logEvent({ event: 'scene_load', chapter: 'Intro' });
    logger.close();

    await vi.waitFor(() => {
      expect(fs.readFileSync(file, 'utf-8').split('\n')).toHaveLength(3);
    });
    const [line, event] = fs.readFileSync(file, 'utf-8').split('\n');

    expect(line).toBe('Hello');
    expect(JSON.parse(event ?? '')).toEqual({
      type: 'player',
      timestamp: expect.any(String),
      event: 'scene_load',
      chapter: 'Intro',
    });
  });
});
