import { describe, expect, it, vi } from 'vitest';

import type { StoryContext } from '../../src/core/context.js';
import { StoryReader } from '../../src/core/reader.js';
import type { RemoteClient, RemotePurpose } from '../../src/remote/client.js';
import type { ResponseCode } from '../../src/remote/codes.js';
import type { ResponseQueue } from '../../src/remote/queue.js';
import { asset, createMockAudioOutput, createTestContext } from '../helpers/mocks.js';

async function runLines(context: StoryContext, ...lines: string[]): Promise<void> {
  const reader = new StoryReader({ name: 'test', lines }, 'main');
  while (!reader.finished && !context.pendingScene) {
    await reader.run(context, () => false);
  }
}

function lastWarning(context: StoryContext): unknown {
  const warnings = vi
    .mocked(context.logger.logEvent)
    .mock.calls.map(([event]) => event)
    .filter((event) => event.event === 'warning');
  return warnings.at(-1)?.message;
}

describe('execute', () => {
  describe('flow', () => {
    it('sends dialog to the host and the log', async () => {
      const context = createTestContext();

      await runLines(context, 'Hello there');

      expect(context.host.onDialog).toHaveBeenCalledWith('Hello there');
      expect(context.logger.log).toHaveBeenCalledWith('Hello there');
    });

    it('ignores dialog from a background reader', async () => {
      const context = createTestContext();
      const reader = new StoryReader({ name: 'bg', lines: ['Hidden'] }, 'background');

      await reader.run(context, () => false);

      expect(context.host.onDialog).not.toHaveBeenCalled();
    });

    it('halts until resumed or for a number of seconds', async () => {
      const context = createTestContext();

      await runLines(context, '<halt>');
      expect(context.halt).toEqual({ active: true, remaining: null });

      await runLines(context, '<halt_auto: 3>');
      expect(context.halt).toEqual({ active: true, remaining: 3 });
    });

    it('sets up a rest', async () => {
      const context = createTestContext();

      await runLines(context, '<rest: 2>');

      expect(context.rest.target).toBe(2);
      expect(context.rest.pauseRequired()).toBe(true);
    });

    it('queues reusable scripts to start', async () => {
      const context = createTestContext();

      await runLines(context, '<call: wave>', '<call: greet, name=Rave, mood=happy>');

      expect(context.scriptRequests).toEqual([
        { name: 'wave', args: null },
        { name: 'greet', args: 'name=Rave, mood=happy' },
      ]);
    });

    it('schedules and cancels timed scripts', async () => {
      const context = createTestContext();

      await runLines(context, '<after: 2, wave>', '<after: 3, blink, speed=2>');
      expect(context.timers.size).toBe(2);

      await runLines(context, '<after_cancel: wave>');
      expect(context.timers.has('wave')).toBe(false);
      expect(context.timers.has('blink')).toBe(true);

      await runLines(context, '<after_cancel_all>');
      expect(context.timers.size).toBe(0);
    });

    it('starts a scene transition behind a screen fade', async () => {
      const context = createTestContext();

      await runLines(context, '<scene_with_fade: #000000, 2, 3, 1, Intro, Next>');

      expect(context.sceneTransition).toBe(true);
      expect(context.fade.state).toBe('fading-in');
      expect(context.fade.draw()).toEqual({ color: '#000000', opacity: 0 });
      expect(context.pendingScene).toBeNull();
    });

    it('refuses a second transition while the fade is running', async () => {
      const context = createTestContext();

      await runLines(context, '<scene_with_fade: #000000, 2, 3, 1, Intro, Next>');
      context.sceneTransition = false;
      await runLines(context, '<scene_with_fade: #ffffff, 2, 3, 1, Intro, Other>');

      expect(context.sceneTransition).toBe(false);
      expect(lastWarning(context)).toBe('scene_with_fade: a screen fade is already running');
    });

    it('waits for the screen fade', async () => {
      const context = createTestContext();

      await runLines(context, '<wait_for_animation: fade screen>');

      expect(context.waitFor).toEqual({ kind: 'screen' });
    });

    it('warns when waiting on a sprite that is not loaded', async () => {
      const context = createTestContext();

      await runLines(context, '<wait_for_animation: character, Rave, fade>');

      expect(context.waitFor).toBeNull();
      expect(lastWarning(context)).toBe('wait_for_animation: no character loaded as "Rave"');
    });
  });

  describe('variables', () => {
    it('stores a variable and logs it', async () => {
      const context = createTestContext();

      await runLines(context, '<variable_set: score, 10>', 'Score: ($score)');

      expect(context.variables.get('score')).toBe('10');
      expect(context.logger.logEvent).toHaveBeenCalledWith({
        event: 'variable_set',
        name: 'score',
        value: '10',
      });
      expect(context.host.onDialog).toHaveBeenCalledWith('Score: 10');
    });

    it('refuses a name with reserved characters', async () => {
      const context = createTestContext();

      await runLines(context, '<variable_set: my score, 5>');

      expect(context.variables.has('my score')).toBe(false);
      expect(lastWarning(context)).toBe('variable_set: Variable name "my score" contains " "');
    });

    it('logs each evaluated condition', async () => {
      const context = createTestContext();

      await runLines(context, '<case: 3, less than, 5>', '<case_end>');

      expect(context.logger.logEvent).toHaveBeenCalledWith({
        event: 'condition',
        kind: 'case',
        value1: '3',
        operator: 'less than',
        value2: '5',
        outcome: true,
      });
    });
  });

  describe('audio', () => {
    const assets = {
      music: { theme: asset('THEME', '.ogg') },
      audio: { click: asset('CLICK', '.ogg') },
    };

    it('plays music from the story file', async () => {
      const output = createMockAudioOutput();
      const context = createTestContext({ assets }, { audioOutput: output });

      await runLines(context, '<play_music: theme, loop>');

      expect(output.sounds.map(({ name }) => name)).toEqual(['theme']);
      expect(output.sounds[0]?.sound.play).toHaveBeenCalledWith(true);
      expect(context.audio.snapshot('music')).toEqual({
        loadedName: 'theme',
        volume: 1,
        loop: true,
        playing: true,
      });
    });

    it('applies channel volume on a 0 to 100 scale', async () => {
      const output = createMockAudioOutput();
      const context = createTestContext({ assets }, { audioOutput: output });

      await runLines(context, '<play_sound: click>', '<volume_fx: 40>', '<volume_voice: 250>');

      expect(output.sounds[0]?.sound.setVolume).toHaveBeenLastCalledWith(0.4);
      expect(context.audio.snapshot('voice').volume).toBe(1);
    });

    it('plays the text sound with each dialog line', async () => {
      const output = createMockAudioOutput();
      const context = createTestContext({ assets }, { audioOutput: output });

      await runLines(context, '<dialog_text_sound: click>', 'Hi', '<dialog_text_sound_clear>', 'Bye');

      expect(output.sounds).toHaveLength(1);
      expect(output.sounds[0]?.sound.play).toHaveBeenCalledTimes(1);
      expect(context.dialog.textSound).toBeNull();
    });

    it('stops every channel', async () => {
      const output = createMockAudioOutput();
      const context = createTestContext({ assets }, { audioOutput: output });

      await runLines(context, '<play_music: theme>', '<stop_all_audio>');

      expect(context.audio.snapshot('music').playing).toBe(false);
    });

    it('warns about audio missing from the story file', async () => {
      const context = createTestContext({ assets });

      await runLines(context, '<play_voice: line1>');

      expect(lastWarning(context)).toBe('No audio named "line1" in the story file');
    });
  });

  describe('dialog text', () => {
    it('stores the text settings', async () => {
      const context = createTestContext();

      await runLines(
        context,
        '<font_text_delay: 0.5>',
        '<font_text_fade_speed: 7>',
        '<font_intro_animation: Gradual Letter>'
      );

      expect(context.dialog).toEqual({
        textDelay: 0.5,
        fadeRow: 7,
        introStyle: 'gradual letter',
        textSound: null,
      });
    });

    it('warns about an unknown intro style', async () => {
      const context = createTestContext();

      await runLines(context, '<font_intro_animation: bounce>');

      expect(context.dialog.introStyle).toBe('no animation');
      expect(lastWarning(context)).toBe('font_intro_animation: unknown style');
    });
  });

  describe('remote', () => {
    interface SentRequest {
      purpose: RemotePurpose;
      data: Record<string, string>;
    }

    function createFakeRemote(
      code: ResponseCode,
      text: string,
      value: string | null
    ): { sent: SentRequest[]; factory: (responses: ResponseQueue) => RemoteClient } {
      const sent: SentRequest[] = [];
      const factory = (responses: ResponseQueue): RemoteClient => ({
        send(purpose, data, callback) {
          sent.push({ purpose, data });
          responses.push({ code, text, value, callback, blocking: false });
          return { purpose, cancelled: false, done: Promise.resolve() };
        },
      });
      return { sent, factory };
    }

    it('warns when no remote is configured', async () => {
      const context = createTestContext();

      await runLines(context, '<remote_get: points>');

      expect(lastWarning(context)).toBe('remote_get: remote commands are disabled');
    });

    it('stores a fetched value once the response is drained', async () => {
      const remote = createFakeRemote('success', 'ok', '42');
      const context = createTestContext({}, { remote: remote.factory });

      await runLines(context, '<remote_get: points, score>');
      expect(context.variables.has('score')).toBe(false);

      context.responses.drain();

      expect(remote.sent).toEqual([{ purpose: 'remote_get', data: { key: 'points' } }]);
      expect(context.variables.get('score')).toBe('42');
      expect(context.logger.logEvent).toHaveBeenCalledWith({
        event: 'remote_response',
        purpose: 'remote_get',
        code: 'success',
        text: 'ok',
      });
    });

    it('sends save pairs and call commands', async () => {
      const remote = createFakeRemote('success', 'ok-save', null);
      const context = createTestContext({}, { remote: remote.factory });

      await runLines(context, '<remote_save: level=3, name=Rave>', '<remote_call: unlock, door=red>');

      expect(remote.sent).toEqual([
        { purpose: 'remote_save', data: { level: '3', name: 'Rave' } },
        { purpose: 'remote_call', data: { door: 'red', command: 'unlock' } },
      ]);
    });

    it('warns about a failed response', async () => {
      const remote = createFakeRemote('license_key_locked', 'error-license_key_locked', null);
      const context = createTestContext({}, { remote: remote.factory });

      await runLines(context, '<remote_get: points, score>');
      context.responses.drain();

      expect(context.variables.has('score')).toBe(false);
      expect(lastWarning(context)).toBe('remote_get failed: license_key_locked');
    });
  });
});
