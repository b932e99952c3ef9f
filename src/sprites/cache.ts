/**
 * Per-content-type caches of decoded sprites
 */

import type { SpriteContentType } from '../container/types.js';
import type { Sprite } from './sprite.js';

export class SpriteCache {
  private readonly maps: Record<SpriteContentType, Map<string, Sprite>> = {
    character: new Map(),
    object: new Map(),
    background: new Map(),
    dialogSprite: new Map(),
  };

  get(kind: SpriteContentType, name: string): Sprite | undefined {
    return this.maps[kind].get(name);
  }

  set(kind: SpriteContentType, name: string, sprite: Sprite): void {
    this.maps[kind].set(name, sprite);
  }

  has(kind: SpriteContentType, name: string): boolean {
    return this.maps[kind].has(name);
  }

  size(kind: SpriteContentType): number {
    return this.maps[kind].size;
  }

  /**
   * Drop every cached sprite (used when a new scene starts)
   */
  clear(): void {
    for (const map of Object.values(this.maps)) {
      map.clear();
    }
  }
}
