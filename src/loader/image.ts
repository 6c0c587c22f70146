import { readFileSync } from 'fs';
import { MEMORY_SIZE } from '../constants/memory';
import { ImageLoadError } from '../errors';
import { type Memory } from '../hardware/memory';

export interface LoadedImage {
  origin: number;
  /** number of words placed in memory */
  length: number;
}

/**
 * Copies an object image into memory. The first big-endian word is the
 * origin; the words after it are placed from there upward until the data or
 * the address space runs out. A trailing odd byte is ignored.
 */
export function loadImage(memory: Memory, image: Buffer, source = '<buffer>'): LoadedImage {
  if (image.length < 2) {
    throw new ImageLoadError(source, 'missing origin');
  }

  /* the origin tells us where in memory to place the image */
  const origin = image.readUInt16BE(0);
  const maxRead = MEMORY_SIZE - origin;
  let pos = 0;

  while (pos < maxRead && (pos + 2) * 2 <= image.length) {
    memory.write(origin + pos, image.readUInt16BE((pos + 1) * 2));
    pos++;
  }

  return { origin, length: pos };
}

export function readImageFile(memory: Memory, imagePath: string): LoadedImage {
  let image: Buffer;
  try {
    image = readFileSync(imagePath);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ImageLoadError(imagePath, reason, { cause: err });
  }
  return loadImage(memory, image, imagePath);
}
