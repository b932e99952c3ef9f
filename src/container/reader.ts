/**
 * Compiled story container loading and asset extraction
 *
 * Layout: [magic][asset bytes ...][detail header JSON][general header JSON][footer]
 * The 50-byte footer holds two right-padded "from-to" ranges that locate the
 * detail and general headers.
 */

import * as fs from 'fs';
import type { z } from 'zod';

import { SpriteCache } from '../sprites/cache.js';
import { FontSprite, type Sprite, createSprite } from '../sprites/sprite.js';
import {
  FOOTER_HALF_WIDTH,
  FOOTER_PAD_CHAR,
  FOOTER_WIDTH,
} from '../utils/constants.js';
import { type ImageDecoder, decodeImage } from './decode.js';
import {
  type AssetLocation,
  type AssetRange,
  CONTENT_TYPES,
  ContainerError,
  type ContentType,
  type DetailHeader,
  DetailHeaderSchema,
  type GeneralHeader,
  GeneralHeaderSchema,
  type SpriteContentType,
} from './types.js';

const RANGE_PATTERN = /^(\d+)-(\d+)$/;
const PADDED_RANGE_PATTERN = new RegExp(
  `^(\\d+)-(\\d+)${FOOTER_PAD_CHAR}+$`
);

/**
 * Parse a "from-to" range string
 * Returns null for anything else, including from > to
 */
export function parseRange(text: string): AssetRange | null {
  const match = RANGE_PATTERN.exec(text);
  if (!match) return null;
  const from = Number(match[1]);
  const to = Number(match[2]);
  if (from > to) return null;
  return { from, to };
}

function parsePaddedRange(text: string): AssetRange | null {
  const match = PADDED_RANGE_PATTERN.exec(text);
  if (!match) return null;
  const from = Number(match[1]);
  const to = Number(match[2]);
  if (from > to) return null;
  return { from, to };
}

/**
 * Parse the footer into the detail and general header ranges
 * Each half must be exactly FOOTER_HALF_WIDTH characters: "from-to" then padding
 */
export function parseFooter(
  footer: string
): { detail: AssetRange; general: AssetRange } | null {
  if (footer.length !== FOOTER_WIDTH) return null;

  const detail = parsePaddedRange(footer.slice(0, FOOTER_HALF_WIDTH));
  const general = parsePaddedRange(footer.slice(FOOTER_HALF_WIDTH));
  if (!detail || !general) return null;

  return { detail, general };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseHeaderSlice<T>(
  buffer: Buffer,
  range: AssetRange,
  label: string,
  schema: z.ZodType<T>
): T {
  let parsed: unknown;
  try {
    parsed = JSON.parse(buffer.subarray(range.from, range.to).toString('utf-8'));
  } catch (error) {
    const msg = error instanceof Error ? error.message : String(error);
    throw new ContainerError('Corrupt', `Unreadable ${label} header: ${msg}`);
  }
  if (!isRecord(parsed)) {
    throw new ContainerError('Corrupt', `The ${label} header is not an object`);
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ContainerError(
      'Corrupt',
      `Malformed ${label} header at ${issue?.path.join('.') ?? ''}: ${issue?.message ?? 'invalid'}`
    );
  }
  return result.data;
}

export interface ContainerOptions {
  /** Image decoder (defaults to sharp) */
  decoder?: ImageDecoder | undefined;
  /** Sprite cache shared with the stage */
  cache?: SpriteCache | undefined;
}

/**
 * A loaded story container
 * Owns the whole file buffer; assets are views into it, never copies.
 */
export class StoryContainer {
  readonly detail: DetailHeader;
  readonly general: GeneralHeader;
  readonly cache: SpriteCache;
  private readonly buffer: Buffer;
  private readonly decoder: ImageDecoder;

  private constructor(
    buffer: Buffer,
    detail: DetailHeader,
    general: GeneralHeader,
    options: ContainerOptions
  ) {
    this.buffer = buffer;
    this.detail = detail;
    this.general = general;
    this.decoder = options.decoder ?? decodeImage;
    this.cache = options.cache ?? new SpriteCache();
  }

  /**
   * Parse a container from its bytes
   * @throws ContainerError with code Corrupt when the footer or headers are unreadable or malformed
   */
  static fromBuffer(buffer: Buffer, options: ContainerOptions = {}): StoryContainer {
    if (buffer.length < FOOTER_WIDTH) {
      throw new ContainerError('Corrupt', 'Invalid or corrupted story file.');
    }

    const footer = buffer.subarray(buffer.length - FOOTER_WIDTH).toString('utf-8');
    const ranges = parseFooter(footer);
    if (!ranges) {
      throw new ContainerError('Corrupt', 'Invalid or corrupted story file.');
    }

    const { detail, general } = ranges;
    if (detail.to > buffer.length || general.to > buffer.length) {
      throw new ContainerError('Corrupt', 'Header ranges exceed the story file.');
    }

    const detailHeader = parseHeaderSlice(buffer, detail, 'detail', DetailHeaderSchema);
    const generalHeader = parseHeaderSlice(buffer, general, 'general', GeneralHeaderSchema);

    return new StoryContainer(buffer, detailHeader, generalHeader, options);
  }

  get byteLength(): number {
    return this.buffer.length;
  }

  /**
   * Names of every asset of a content type
   */
  assetNames(contentType: ContentType): string[] {
    return Object.keys(this.detail[CONTENT_TYPES[contentType]] ?? {});
  }

  private location(contentType: ContentType, name: string): AssetLocation | null {
    const entries = this.detail[CONTENT_TYPES[contentType]];
    if (!entries || !Object.hasOwn(entries, name)) return null;
    return entries[name] ?? null;
  }

  /**
   * Byte range of an asset, or null when missing or out of bounds
   */
  getAssetRange(contentType: ContentType, name: string): AssetRange | null {
    const location = this.location(contentType, name);
    if (!location) return null;
    const range = parseRange(location[0]);
    if (!range || range.to > this.buffer.length) return null;
    return range;
  }

  /**
   * File extension recorded for an asset (e.g. ".png")
   */
  getAssetExtension(contentType: ContentType, name: string): string | null {
    return this.location(contentType, name)?.[1] ?? null;
  }

  /**
   * Bytes of an asset: exactly container[from:to], as a view
   */
  getAssetBytes(contentType: ContentType, name: string): Buffer | null {
    const range = this.getAssetRange(contentType, name);
    if (!range) return null;
    return this.buffer.subarray(range.from, range.to);
  }

  /**
   * Decode a sprite asset
   *
   * A plain request reuses the cached instance for that name, or decodes and
   * caches one. A request with loadAsName always decodes a fresh instance,
   * renamed, and leaves the cache untouched.
   */
  async getSprite(
    contentType: SpriteContentType,
    name: string,
    generalAlias?: string,
    loadAsName?: string
  ): Promise<Sprite | null> {
    if (!loadAsName) {
      const existing = this.cache.get(contentType, name);
      if (existing) return existing;
    }

    const bytes = this.getAssetBytes(contentType, name);
    const extension = this.getAssetExtension(contentType, name);
    if (!bytes || extension === null) return null;

    const image = await this.decoder(bytes, extension);
    const sprite = createSprite(contentType, name, image, generalAlias ?? name);

    if (loadAsName) {
      sprite.name = loadAsName;
      return sprite;
    }

    this.cache.set(contentType, name, sprite);
    return sprite;
  }

  /**
   * Decode a font sprite sheet with its letter layout
   * Returns null when the sheet or its FontSpriteProperties entry is missing
   */
  async getFontSprite(name: string): Promise<FontSprite | null> {
    const properties = this.detail.FontSpriteProperties?.[name];
    if (!properties) return null;

    const bytes = this.getAssetBytes('fontSheet', name);
    const extension = this.getAssetExtension('fontSheet', name);
    if (!bytes || extension === null) return null;

    const sheet = await this.decoder(bytes, extension);
    return new FontSprite(name, sheet, properties);
  }

  /**
   * Chapter script followed by the scene script
   */
  getSceneScript(chapter: string, scene: string): string | null {
    const scripts = this.detail.StoryScript;
    if (!scripts || !Object.hasOwn(scripts, chapter)) return null;
    const entry = scripts[chapter];
    if (!entry) return null;

    const [chapterScript, scenes] = entry;
    if (!Object.hasOwn(scenes, scene)) return null;
    return `${chapterScript}\n${scenes[scene] ?? ''}`;
  }

  /**
   * Chapter and scene the story starts in
   */
  getStartScene(): { chapter: string; scene: string } | null {
    const start = this.detail.StoryStartScript ?? {};
    for (const [chapter, scene] of Object.entries(start)) {
      return { chapter, scene };
    }
    return null;
  }

  getReusableScript(name: string): string | null {
    const reusables = this.detail.StoryReusables;
    if (!reusables || !Object.hasOwn(reusables, name)) return null;
    return reusables[name] ?? null;
  }

  /**
   * Initial variable table contents
   */
  initialVariables(): Map<string, string> {
    return new Map(Object.entries(this.detail.StoryVariables ?? {}));
  }

  get title(): string {
    return this.general.StoryInfo?.['Title'] ?? '';
  }

  get windowSize(): { width: number; height: number } {
    const [width, height] = this.general.StoryWindowSize ?? [640, 480];
    return { width, height };
  }
}

/**
 * Load a story container from disk
 * @throws ContainerError (NotFound, NotAFile, Corrupt); never retried
 */
export function loadContainer(
  filePath: string,
  options: ContainerOptions = {}
): StoryContainer {
  if (!fs.existsSync(filePath)) {
    throw new ContainerError('NotFound', `Story file not found: ${filePath}`);
  }
  if (!fs.statSync(filePath).isFile()) {
    throw new ContainerError(
      'NotAFile',
      `Expected a story file, got a directory instead: ${filePath}`
    );
  }

  return StoryContainer.fromBuffer(fs.readFileSync(filePath), options);
}
