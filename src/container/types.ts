/**
 * Types and header schemas for compiled story containers
 */

import { z } from 'zod';

/**
 * Content-type tags used as keys in the detail header
 */
export const CONTENT_TYPES = {
  character: 'StoryCharacter_ImageLocations',
  background: 'StoryBackground_ImageLocations',
  object: 'StoryObject_ImageLocations',
  fontSheet: 'StoryFontSprite_ImageLocations',
  dialogSprite: 'StoryDialog_ImageLocations',
  audio: 'StoryAudio_Locations',
  music: 'StoryMusic_Locations',
} as const;

export type ContentType = keyof typeof CONTENT_TYPES;

/** Content types whose assets are decoded into sprites */
export type SpriteContentType = 'character' | 'object' | 'background' | 'dialogSprite';

/** Content types in the order their bytes are laid out in a container */
export const CONTENT_TYPE_ORDER: readonly ContentType[] = [
  'character',
  'background',
  'object',
  'fontSheet',
  'dialogSprite',
  'audio',
  'music',
];

/**
 * A half-open byte range into the container buffer
 */
export interface AssetRange {
  from: number;
  to: number;
}

/**
 * Serialized asset location: ["from-to", ".ext"]
 */
export const AssetLocationSchema = z.tuple([z.string(), z.string()]);
export type AssetLocation = z.infer<typeof AssetLocationSchema>;

const AssetLocationsSchema = z.record(z.string(), AssetLocationSchema).optional();

/**
 * Rectangle of a single letter on a font sprite sheet
 */
export const LetterRectSchema = z.object({
  x: z.number(),
  y: z.number(),
  width: z.number(),
  height: z.number(),
});
export type LetterRect = z.infer<typeof LetterRectSchema>;

/**
 * Letter layout of a font sprite sheet
 */
export const FontSpritePropertiesSchema = z.object({
  Width: z.number(),
  Height: z.number(),
  PaddingLetters: z.number(),
  PaddingLines: z.number(),
  Letters: z.record(z.string(), LetterRectSchema),
});
export type FontSpriteProperties = z.infer<typeof FontSpritePropertiesSchema>;

/** Chapter name -> [chapter script, { scene name -> scene script }] */
export const StoryScriptsSchema = z.record(
  z.string(),
  z.tuple([z.string(), z.record(z.string(), z.string())])
);
export type StoryScripts = z.infer<typeof StoryScriptsSchema>;

/**
 * Per-asset byte ranges plus the story's scripts
 */
export const DetailHeaderSchema = z.object({
  StoryCharacter_ImageLocations: AssetLocationsSchema,
  StoryBackground_ImageLocations: AssetLocationsSchema,
  StoryObject_ImageLocations: AssetLocationsSchema,
  StoryFontSprite_ImageLocations: AssetLocationsSchema,
  StoryDialog_ImageLocations: AssetLocationsSchema,
  StoryAudio_Locations: AssetLocationsSchema,
  StoryMusic_Locations: AssetLocationsSchema,
  /** { chapter name: scene name } */
  StoryStartScript: z.record(z.string(), z.string()).optional(),
  StoryScript: StoryScriptsSchema.optional(),
  StoryReusables: z.record(z.string(), z.string()).optional(),
  StoryVariables: z.record(z.string(), z.string()).optional(),
  FontSpriteProperties: z.record(z.string(), FontSpritePropertiesSchema).optional(),
});
export type DetailHeader = z.infer<typeof DetailHeaderSchema>;

/**
 * Story-level metadata
 */
export const GeneralHeaderSchema = z.object({
  StoryInfo: z.record(z.string(), z.string()).optional(),
  StoryWindowSize: z.tuple([z.number(), z.number()]).optional(),
  StoryEngineVersion: z.union([z.string(), z.number()]).optional(),
  StoryCompileMode: z.string().optional(),
  StoryChapterAndSceneNames: z.record(z.string(), z.array(z.string())).optional(),
  PosterTitleImageLocation: AssetLocationSchema.nullable().optional(),
});
export type GeneralHeader = z.infer<typeof GeneralHeaderSchema>;

export type ContainerErrorCode = 'NotFound' | 'NotAFile' | 'Corrupt';

/**
 * Raised when a story container cannot be loaded
 */
export class ContainerError extends Error {
  readonly code: ContainerErrorCode;

  constructor(code: ContainerErrorCode, message: string) {
    super(message);
    this.name = 'ContainerError';
    this.code = code;
  }
}
