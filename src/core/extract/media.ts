// src/core/extract/media.ts
import {
  IMAGE_FETCH_TEMPLATE,
  IMAGE_HOST_PREFIX,
  VIDEO_HOST_PREFIXES,
} from '../config/constants.js';
import { InvalidReferenceError } from '../errors.js';
import type { MediaReference } from '../types/index.js';

/**
 * Classify an attached-media URL.
 *
 * Images are reduced to the id pbs.twimg.com serves them under, so they can be
 * fetched again from {@link imageFetchUrl}. Videos have no such id in scraped
 * data and are kept as the full URL.
 *
 * @throws InvalidReferenceError for any other host, or when no id can be read
 */
export function classifyMediaUrl(url: string): MediaReference {
  try {
    if (url.startsWith(IMAGE_HOST_PREFIX)) {
      return { kind: 'image', id: extractImageId(url) };
    }
    if (VIDEO_HOST_PREFIXES.some(prefix => url.startsWith(prefix))) {
      return { kind: 'video', url };
    }
  } catch (error) {
    if (error instanceof InvalidReferenceError) {
      throw error;
    }
    throw new InvalidReferenceError(url, error instanceof Error ? error.message : String(error));
  }

  throw new InvalidReferenceError(url, 'unrecognised media host');
}

function extractImageId(url: string): string {
  const queryStart = url.indexOf('?');
  const path = queryStart === -1 ? url : url.slice(0, queryStart);
  const id = path.slice(path.lastIndexOf('/') + 1);

  if (id.length === 0) {
    throw new InvalidReferenceError(url, 'no image id in path');
  }
  return id;
}

export function imageFetchUrl(imageId: string): string {
  return IMAGE_FETCH_TEMPLATE.replace('{id}', imageId);
}
