/**
 * Instruction dispatch
 */

import type { AudioChannel } from '../audio/channels.js';
import type { ResponseReceipt } from '../remote/queue.js';
import type { RemotePurpose } from '../remote/client.js';
import type { Instruction } from '../script/types.js';
import { parseScriptArguments, validateVariableName } from '../script/variables.js';
import { convertRow } from '../timing/speed.js';
import { OPACITY_MIN } from '../utils/constants.js';
import { type StoryContext, warn } from './context.js';
import type { StoryReader } from './reader.js';
import { executeSprite, findSprite } from './sprite-commands.js';

function playAudio(
  context: StoryContext,
  channel: AudioChannel,
  name: string,
  loop = false
): void {
  const contentType = channel === 'music' ? 'music' : 'audio';
  const bytes = context.container.getAssetBytes(contentType, name);
  if (!bytes) {
    warn(context, `No ${contentType} named "${name}" in the story file`);
    return;
  }
  context.audio.play(channel, name, bytes, loop);
}

function sendRemote(
  context: StoryContext,
  purpose: RemotePurpose,
  data: Record<string, string>,
  onSuccess?: (receipt: ResponseReceipt) => void
): void {
  const { remote } = context;
  if (!remote) {
    warn(context, `${purpose}: remote commands are disabled`);
    return;
  }

  remote.send(purpose, data, (receipt) => {
    context.logger.logEvent({ event: 'remote_response', purpose, code: receipt.code, text: receipt.text });
    if (receipt.code === 'success') {
      onSuccess?.(receipt);
    } else {
      warn(context, `${purpose} failed: ${receipt.code}`);
    }
  });
}

/**
 * Run one bound instruction
 * @throws ConditionFormatError from a malformed range condition
 */
export async function execute(
  instruction: Instruction,
  context: StoryContext,
  reader: StoryReader
): Promise<void> {
  switch (instruction.type) {
    // === Flow ===
    case 'dialog':
      if (reader.kind !== 'main') return;
      context.logger.log(instruction.text);
      context.host.onDialog(instruction.text);
      if (context.dialog.textSound) {
        playAudio(context, 'text', context.dialog.textSound);
      }
      return;

    case 'scene':
      context.pendingScene = { chapter: instruction.chapter, scene: instruction.scene };
      return;

    case 'scene_with_fade': {
      const { chapter, scene } = instruction;
      const started = context.fade.start({
        color: instruction.color,
        initialOpacity: OPACITY_MIN,
        fadeInRate: convertRow('fade', instruction.fadeInRow),
        fadeOutRate: convertRow('fade', instruction.fadeOutRow),
        holdSeconds: instruction.holdSeconds,
        onHoldExpired: () => {
          context.pendingScene = { chapter, scene };
        },
      });
      if (started) {
        context.sceneTransition = true;
      } else {
        warn(context, `scene_with_fade: a screen fade is already running`);
      }
      return;
    }

    case 'call':
      context.scriptRequests.push({ name: instruction.name, args: instruction.args });
      return;

    case 'after':
      context.timers.add(instruction.name, instruction.seconds, instruction.args);
      return;

    case 'after_cancel':
      context.timers.cancel(instruction.name);
      return;

    case 'after_cancel_all':
      context.timers.cancelAll();
      return;

    case 'halt':
      context.halt = { active: true, remaining: null };
      return;

    case 'halt_auto':
      context.halt = { active: true, remaining: instruction.seconds };
      return;

    case 'rest':
      context.rest.setup(instruction.seconds);
      return;

    case 'wait_for_animation': {
      const { sprite: type, alias, animation } = instruction;
      if (type === 'unknown' || animation === 'unknown') {
        warn(context, `wait_for_animation: unknown sprite type or animation`);
        return;
      }
      const sprite = findSprite(context, type, alias);
      if (!sprite) {
        warn(context, `wait_for_animation: no ${type} loaded as "${alias}"`);
        return;
      }
      context.waitFor = { kind: 'sprite', sprite, animation };
      return;
    }

    case 'wait_for_screen':
      if (instruction.what === 'unknown') {
        warn(context, `wait_for_animation: expected "fade screen"`);
        return;
      }
      context.waitFor = { kind: 'screen' };
      return;

    // === Variables and conditions ===
    case 'variable_set': {
      const problem = validateVariableName(instruction.name);
      if (problem) {
        warn(context, `variable_set: ${problem}`);
        return;
      }
      context.variables.set(instruction.name, instruction.value);
      context.logger.logEvent({ event: 'variable_set', name: instruction.name, value: instruction.value });
      return;
    }

    case 'case':
    case 'or_case': {
      const outcome = reader.block.enterCase(instruction);
      context.logger.logEvent({
        event: 'condition',
        kind: instruction.type,
        value1: instruction.value1,
        operator: instruction.operator,
        value2: instruction.value2,
        outcome,
      });
      return;
    }

    case 'case_else':
      reader.block.enterElse();
      return;

    case 'case_end':
      reader.block.end();
      return;

    // === Audio ===
    case 'play_sound':
      playAudio(context, 'fx', instruction.name);
      return;

    case 'play_voice':
      playAudio(context, 'voice', instruction.name);
      return;

    case 'play_music':
      playAudio(context, 'music', instruction.name, instruction.loop);
      return;

    case 'dialog_text_sound':
      context.dialog.textSound = instruction.name;
      return;

    case 'dialog_text_sound_clear':
      context.dialog.textSound = null;
      return;

    case 'stop_fx':
      context.audio.stop('fx');
      return;

    case 'stop_voice':
      context.audio.stop('voice');
      return;

    case 'stop_music':
      context.audio.stop('music');
      return;

    case 'stop_all_audio':
      context.audio.stop('all');
      return;

    case 'volume':
      context.audio.setVolume(instruction.channel, instruction.volume);
      return;

    // === Sprites ===
    case 'load_sprite':
    case 'sprite_show':
    case 'sprite_hide':
    case 'sprite_hide_all':
    case 'sprite_flip':
    case 'sprite_set_center':
    case 'sprite_move':
    case 'sprite_stop_condition':
    case 'sprite_fade_speed':
    case 'sprite_fade_until':
    case 'sprite_fade_current_value':
    case 'sprite_scale_by':
    case 'sprite_scale_until':
    case 'sprite_rotate_speed':
    case 'sprite_rotate_until':
    case 'sprite_animate':
    case 'sprite_after_stop':
      await executeSprite(context, instruction);
      return;

    // === Dialog text ===
    case 'font_text_delay':
      context.dialog.textDelay = instruction.seconds;
      return;

    case 'font_text_fade_speed':
      context.dialog.fadeRow = instruction.row;
      return;

    case 'font_intro_animation':
      if (instruction.style === 'unknown') {
        warn(context, `font_intro_animation: unknown style`);
        return;
      }
      context.dialog.introStyle = instruction.style;
      return;

    // === Remote ===
    case 'remote_save':
      sendRemote(context, 'remote_save', Object.fromEntries(parseScriptArguments(instruction.args)));
      return;

    case 'remote_get': {
      const { key, variable } = instruction;
      sendRemote(context, 'remote_get', { key }, (receipt) => {
        if (variable !== null) {
          context.variables.set(variable, receipt.value ?? receipt.text);
        }
      });
      return;
    }

    case 'remote_call':
      sendRemote(context, 'remote_call', {
        ...Object.fromEntries(parseScriptArguments(instruction.args)),
        command: instruction.command,
      });
      return;
  }
}
