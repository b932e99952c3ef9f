/**
 * Audio output that plays nothing but keeps track of what would be heard
 */

import type { AudioOutput, Sound } from './channels.js';

export type AudioAction = 'load' | 'play' | 'stop' | 'volume';

export interface AudioEvent {
  action: AudioAction;
  name: string;
  detail?: string | undefined;
}

/**
 * Create a silent output, reporting each action to an optional listener
 */
export function createSilentOutput(onEvent?: (event: AudioEvent) => void): AudioOutput {
  return {
    load(name: string, bytes: Buffer): Sound {
      let playing = false;
      onEvent?.({ action: 'load', name, detail: `${bytes.length} bytes` });

      return {
        play(loop: boolean): void {
          playing = true;
          onEvent?.({ action: 'play', name, detail: loop ? 'loop' : undefined });
        },
        stop(): void {
          if (!playing) return;
          playing = false;
          onEvent?.({ action: 'stop', name });
        },
        setVolume(volume: number): void {
          onEvent?.({ action: 'volume', name, detail: String(volume) });
        },
        isPlaying(): boolean {
          return playing;
        },
      };
    },
  };
}
