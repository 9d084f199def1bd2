import os from 'os';
import path from 'path';
import fs from 'fs/promises';
import sharp from 'sharp';

export interface CaptureTags {
  dateTimeOriginal?: string;
  dateTime?: string;
}

export async function makeTempDir(prefix = 'datestamp-tests-'): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

function blankImage(width: number, height: number, channels: 3 | 4) {
  return sharp({
    create: {
      width,
      height,
      channels,
      background: channels === 4 ? { r: 40, g: 90, b: 160, alpha: 0.5 } : { r: 40, g: 90, b: 160 }
    }
  });
}

/** JPEG with the given EXIF date tags; no EXIF block at all when none are given. */
export async function writeJpeg(filePath: string, tags: CaptureTags = {}, width = 320, height = 240): Promise<string> {
  let image = blankImage(width, height, 3);
  if (tags.dateTime || tags.dateTimeOriginal) {
    image = image.withExif({
      ...(tags.dateTime ? { IFD0: { DateTime: tags.dateTime } } : {}),
      ...(tags.dateTimeOriginal ? { IFD2: { DateTimeOriginal: tags.dateTimeOriginal } } : {})
    });
  }
  await image.jpeg().toFile(filePath);
  return filePath;
}

export async function writePng(filePath: string, withAlpha = false, width = 200, height = 160): Promise<string> {
  await blankImage(width, height, withAlpha ? 4 : 3).png().toFile(filePath);
  return filePath;
}

/** Source colour layouts the renderer must hand back unchanged. */
export type SourceMode = 'palette' | 'grey' | 'grey16' | 'rgb16' | 'cmyk';

export async function writeModeImage(filePath: string, mode: SourceMode, width = 200, height = 100): Promise<string> {
  const image = blankImage(width, height, 3);
  switch (mode) {
    case 'palette':
      await image.png({ palette: true }).toFile(filePath);
      break;
    case 'grey':
      await image.toColourspace('b-w').png().toFile(filePath);
      break;
    case 'grey16':
      await image.toColourspace('grey16').png().toFile(filePath);
      break;
    case 'rgb16':
      await image.toColourspace('rgb16').png().toFile(filePath);
      break;
    case 'cmyk':
      await image.toColourspace('cmyk').jpeg().toFile(filePath);
      break;
  }
  return filePath;
}
