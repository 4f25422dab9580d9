// src/core/export/json.ts
import { z } from 'zod';
import { ParseError } from '../errors.js';
import type { MediaMapping } from '../types/index.js';

export const MediaMappingFileSchema = z.record(
  z.string(),
  z.object({
    image_ids: z.array(z.string()),
    video_urls: z.array(z.string()),
  })
);

export type MediaMappingFile = z.infer<typeof MediaMappingFileSchema>;

/** JSON keys must be strings, so post ids are written in decimal. */
export function serializeMediaMapping(media: MediaMapping): MediaMappingFile {
  const out: MediaMappingFile = {};
  for (const [tweetId, refs] of media) {
    out[tweetId.toString()] = {
      image_ids: [...refs.imageIds],
      video_urls: [...refs.videoUrls],
    };
  }
  return out;
}

export function parseMediaMapping(content: string, source: string): MediaMappingFile {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new ParseError(source, error instanceof Error ? error.message : String(error));
  }

  const result = MediaMappingFileSchema.safeParse(parsed);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ParseError(source, `${issue?.path.join('.') || 'root'}: ${issue?.message ?? 'invalid media lookup'}`);
  }
  return result.data;
}

export function formatJsonOutput(value: unknown): string {
  return JSON.stringify(value, null, 2);
}
