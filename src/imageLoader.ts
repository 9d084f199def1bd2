import fs from 'fs/promises';
import sharp from 'sharp';
import { ImageDecodeError, toError } from './errors.js';
import type { ImageTarget } from './types.js';

export interface OpenedImage {
  target: ImageTarget;
  /** Encoded file contents; every pipeline starts from this and never writes back to it. */
  buffer: Buffer;
  metadata: sharp.Metadata;
}

/**
 * Read and probe one image. The buffer is the only handle kept, so nothing
 * stays open on disk once this resolves.
 */
export async function openImage(target: ImageTarget): Promise<OpenedImage> {
  const buffer = await fs.readFile(target.path);
  let metadata: sharp.Metadata;
  try {
    metadata = await sharp(buffer).metadata();
  } catch (error) {
    throw new ImageDecodeError(target.name, toError(error));
  }

  if (!metadata.width || !metadata.height) {
    throw new ImageDecodeError(target.name);
  }

  return { target, buffer, metadata };
}
