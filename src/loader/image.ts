import { readFileSync } from 'fs';
import { MEMORY_SIZE } from '../constants/memory';
import { ImageLoadError } from '../errors';

export interface ProgramImage {
  /* where in memory to place the image */
  origin: number;
  words: Uint16Array;
}

/**
 * Decodes an object file: big-endian 16-bit words, the first of which is
 * the load origin.
 */
export function parseImage(image: Uint8Array, path = '<memory>'): ProgramImage {
  if (image.length < 2) {
    throw new ImageLoadError(path, 'missing origin word');
  }
  if (image.length % 2 !== 0) {
    throw new ImageLoadError(path, `odd byte length ${image.length}`);
  }

  const origin = (image[0] << 8) | image[1];
  const words = new Uint16Array(image.length / 2 - 1);

  if (origin + words.length > MEMORY_SIZE) {
    throw new ImageLoadError(path, 'image runs past the end of memory');
  }

  for (let pos = 0; pos < words.length; pos++) {
    const at = (pos + 1) * 2;
    words[pos] = (image[at] << 8) | image[at + 1];
  }

  return { origin, words };
}

export function readImageFile(
  imagePath: string,
  readFile: (path: string) => Uint8Array = readFileSync
): ProgramImage {
  let image: Uint8Array;
  try {
    image = readFile(imagePath);
  } catch (err) {
    throw new ImageLoadError(imagePath, err instanceof Error ? err.message : String(err));
  }
  return parseImage(image, imagePath);
}
