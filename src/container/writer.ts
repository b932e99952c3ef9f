/**
 * Story container compilation
 */

import {
  CONTAINER_MAGIC,
  FOOTER_HALF_WIDTH,
  FOOTER_PAD_CHAR,
} from '../utils/constants.js';
import {
  type AssetLocation,
  CONTENT_TYPES,
  CONTENT_TYPE_ORDER,
  type ContentType,
  type DetailHeader,
  type FontSpriteProperties,
  type GeneralHeader,
  type StoryScripts,
} from './types.js';

/**
 * One asset to embed
 */
export interface AssetInput {
  bytes: Buffer;
  /** File extension including the dot, e.g. ".png" */
  extension: string;
}

/**
 * Everything a container is compiled from
 */
export interface ContainerInput {
  assets?: Partial<Record<ContentType, Record<string, AssetInput>>> | undefined;
  startScript?: Record<string, string> | undefined;
  scripts?: StoryScripts | undefined;
  reusables?: Record<string, string> | undefined;
  variables?: Record<string, string> | undefined;
  fontSprites?: Record<string, FontSpriteProperties> | undefined;
  general?: GeneralHeader | undefined;
}

/**
 * Right-pad a "from-to" range to its fixed footer width
 * @throws Error when the range fills the whole width, leaving no pad character
 */
export function padRange(from: number, to: number): string {
  const range = `${from}-${to}`;
  if (range.length >= FOOTER_HALF_WIDTH) {
    throw new Error(`Header range too long for the footer: ${range}`);
  }
  return range.padEnd(FOOTER_HALF_WIDTH, FOOTER_PAD_CHAR);
}

/**
 * Compile assets, scripts and metadata into a single container buffer
 */
export function compileContainer(input: ContainerInput): Buffer {
  const chunks: Buffer[] = [];
  let offset = 0;

  const push = (chunk: Buffer): { from: number; to: number } => {
    const from = offset;
    chunks.push(chunk);
    offset += chunk.length;
    return { from, to: offset };
  };

  push(Buffer.from(CONTAINER_MAGIC + '\0', 'utf-8'));

  const detail: DetailHeader = {};
  for (const contentType of CONTENT_TYPE_ORDER) {
    const assets = input.assets?.[contentType];
    if (!assets) continue;

    const locations: Record<string, AssetLocation> = {};
    for (const [name, asset] of Object.entries(assets)) {
      const { from, to } = push(asset.bytes);
      locations[name] = [`${from}-${to}`, asset.extension];
    }
    detail[CONTENT_TYPES[contentType]] = locations;
  }

  detail.StoryStartScript = input.startScript ?? {};
  detail.StoryScript = input.scripts ?? {};
  detail.StoryReusables = input.reusables ?? {};
  detail.StoryVariables = input.variables ?? {};
  detail.FontSpriteProperties = input.fontSprites ?? {};

  const detailRange = push(Buffer.from(JSON.stringify(detail), 'utf-8'));
  const generalRange = push(Buffer.from(JSON.stringify(input.general ?? {}), 'utf-8'));

  const footer =
    padRange(detailRange.from, detailRange.to) +
    padRange(generalRange.from, generalRange.to);
  push(Buffer.from(footer, 'utf-8'));

  return Buffer.concat(chunks);
}
