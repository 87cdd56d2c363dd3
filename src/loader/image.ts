import { readFileSync } from 'fs';
import { MEMORY_SIZE } from '../constants/memory';
import { ImageLoadError } from '../errors';
import type { Memory } from '../hardware/memory';

export interface LoadedImage {
  origin: number;
  /** number of words written, after truncation at the end of memory */
  length: number;
}

export type LoadResult =
  | ({ ok: true; path: string } & LoadedImage)
  | { ok: false; path: string; error: ImageLoadError };

/**
 * Copies an object image into memory. The first big-endian word is the
 * origin; the remaining words land at consecutive addresses from there and
 * are cut off at the top of the address space.
 */
export function loadImage(memory: Memory, image: Uint8Array): LoadedImage {
  if (image.length < 2) {
    throw new ImageLoadError(
      `image is ${image.length} byte(s); an origin word needs 2`
    );
  }

  const view = new DataView(image.buffer, image.byteOffset, image.byteLength);
  /* the origin tells us where in memory to place the image */
  const origin = view.getUint16(0);
  const maxWords = MEMORY_SIZE - origin;

  let pos = 0;
  while (pos < maxWords && (pos + 2) * 2 <= image.length) {
    memory.write(origin + pos, view.getUint16((pos + 1) * 2));
    pos++;
  }

  return { origin, length: pos };
}

/**
 * Reads and loads one image file. I/O and format failures are returned, not
 * thrown.
 */
export function loadImageFile(memory: Memory, path: string): LoadResult {
  let image: Buffer;
  try {
    image = readFileSync(path);
  } catch (err) {
    return {
      ok: false,
      path,
      error: new ImageLoadError(`cannot read ${path}`, path, { cause: err }),
    };
  }

  try {
    return { ok: true, path, ...loadImage(memory, image) };
  } catch (err) {
    if (err instanceof ImageLoadError) {
      return {
        ok: false,
        path,
        error: new ImageLoadError(`${path}: ${err.message}`, path, {
          cause: err,
        }),
      };
    }
    throw err;
  }
}
