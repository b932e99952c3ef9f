/**
 * Logical audio channels: music, sound effects, voice and dialog text
 *
 * Music ignores a request for the track already playing; the other channels
 * always restart from the beginning.
 */

export type AudioChannel = 'music' | 'fx' | 'voice' | 'text';

export const AUDIO_CHANNELS: readonly AudioChannel[] = ['music', 'fx', 'voice', 'text'];

/** Stop target covering every channel */
export const ALL_CHANNELS = 'all';

/**
 * A decoded, playable sound provided by the host
 */
export interface Sound {
  play(loop: boolean): void;
  stop(): void;
  /** 0..1 */
  setVolume(volume: number): void;
  isPlaying(): boolean;
}

/**
 * Host audio backend
 */
export interface AudioOutput {
  load(name: string, bytes: Buffer): Sound;
}

interface ChannelState {
  loadedName: string | null;
  sound: Sound | null;
  volume: number;
  loop: boolean;
}

/**
 * Read-only view of a channel
 */
export interface ChannelSnapshot {
  loadedName: string | null;
  volume: number;
  loop: boolean;
  playing: boolean;
}

export class AudioChannels {
  private readonly output: AudioOutput;
  private readonly channels: Record<AudioChannel, ChannelState>;

  constructor(output: AudioOutput) {
    this.output = output;
    this.channels = {
      music: { loadedName: null, sound: null, volume: 1, loop: false },
      fx: { loadedName: null, sound: null, volume: 1, loop: false },
      voice: { loadedName: null, sound: null, volume: 1, loop: false },
      text: { loadedName: null, sound: null, volume: 1, loop: false },
    };
  }

  /**
   * Play a sound on a channel
   * @returns false when the request left playback untouched
   */
  play(channel: AudioChannel, name: string, bytes: Buffer, loop = false): boolean {
    const state = this.channels[channel];

    if (channel === 'music') {
      if (state.loadedName === name && state.sound?.isPlaying()) {
        return false;
      }
      state.loop = loop;
    }

    state.sound?.stop();
    if (state.loadedName !== name || !state.sound) {
      state.sound = this.output.load(name, bytes);
      state.loadedName = name;
    }

    state.sound.setVolume(state.volume);
    state.sound.play(channel === 'music' ? state.loop : false);
    return true;
  }

  stop(channel: AudioChannel | typeof ALL_CHANNELS): void {
    const targets = channel === ALL_CHANNELS ? AUDIO_CHANNELS : [channel];
    for (const target of targets) {
      this.channels[target].sound?.stop();
    }
  }

  /**
   * Set a channel's volume, applied to its current sound too
   */
  setVolume(channel: AudioChannel, volume: number): void {
    const state = this.channels[channel];
    state.volume = Math.min(Math.max(volume, 0), 1);
    state.sound?.setVolume(state.volume);
  }

  /**
   * Forget what a channel has loaded (stopping it first)
   */
  clear(channel: AudioChannel): void {
    const state = this.channels[channel];
    state.sound?.stop();
    state.sound = null;
    state.loadedName = null;
  }

  snapshot(channel: AudioChannel): ChannelSnapshot {
    const state = this.channels[channel];
    return {
      loadedName: state.loadedName,
      volume: state.volume,
      loop: state.loop,
      playing: state.sound?.isPlaying() ?? false,
    };
  }
}
