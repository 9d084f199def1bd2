import exifr from 'exifr';
import type { OpenedImage } from './imageLoader.js';
import type { DateStamp } from './types.js';

/** DateTimeOriginal (0x9003) first, then DateTime (0x0132, "ModifyDate" in exifr). */
export const CAPTURE_TAGS = ['DateTimeOriginal', 'ModifyDate'] as const;

const EXIF_PREAMBLE = Buffer.from('Exif\0\0', 'latin1');

/** Returns a tag dictionary, or anything else when it finds none. */
export type TagAccessor = (image: OpenedImage) => Promise<unknown>;

export function readTagsFromFile(image: OpenedImage): Promise<unknown> {
  return exifr.parse(image.buffer, { pick: [...CAPTURE_TAGS], reviveValues: false });
}

/** The raw EXIF block sharp exposes, parsed as a bare TIFF structure. */
export async function readTagsFromExifBlock(image: OpenedImage): Promise<unknown> {
  const block = image.metadata.exif;
  if (!block || block.length === 0) {
    return undefined;
  }
  const tiff = block.subarray(0, EXIF_PREAMBLE.length).equals(EXIF_PREAMBLE)
    ? block.subarray(EXIF_PREAMBLE.length)
    : block;
  return exifr.parse(tiff, { pick: [...CAPTURE_TAGS], reviveValues: false });
}

export const TAG_ACCESSORS: readonly TagAccessor[] = [readTagsFromFile, readTagsFromExifBlock];

function pickTag(tags: unknown, tag: string): string | null {
  if (typeof tags !== 'object' || tags === null || !(tag in tags)) {
    return null;
  }
  const value: unknown = Reflect.get(tags, tag);
  if (typeof value === 'string') {
    return value.trim() || null;
  }
  if (typeof value === 'number') {
    return String(value);
  }
  return null;
}

/**
 * First non-empty capture-time value across the accessors, in tag preference order.
 * A reader that fails counts as having found nothing.
 */
export async function readRawCaptureTime(
  image: OpenedImage,
  accessors: readonly TagAccessor[] = TAG_ACCESSORS
): Promise<string | null> {
  for (const accessor of accessors) {
    let tags: unknown;
    try {
      tags = await accessor(image);
    } catch {
      tags = undefined;
    }

    for (const tag of CAPTURE_TAGS) {
      const value = pickTag(tags, tag);
      if (value) {
        return value;
      }
    }
  }
  return null;
}

function splitDate(datePart: string, separator: string): DateStamp {
  const parts = datePart.split(separator);
  if (parts.length !== 3 || parts.some(part => !/^\d+$/.test(part))) {
    return null;
  }
  const [year, month, day] = parts.map(part => Number.parseInt(part, 10));
  // Cameras write 0000:00:00 when the clock was never set; that is not a date.
  if (month === 0 || day === 0) {
    return null;
  }
  return [
    String(year).padStart(4, '0'),
    String(month).padStart(2, '0'),
    String(day).padStart(2, '0')
  ].join('-');
}

/**
 * `YYYY:MM:DD HH:MM:SS` or `YYYY-MM-DD HH:MM:SS` to `YYYY-MM-DD`; null when neither fits.
 */
export function normalizeCaptureDate(raw: string): DateStamp {
  const datePart = raw.trim().split(/[\sT]/)[0];
  return splitDate(datePart, ':') ?? splitDate(datePart, '-');
}

export async function extractCaptureDate(image: OpenedImage): Promise<DateStamp> {
  const raw = await readRawCaptureTime(image);
  return raw ? normalizeCaptureDate(raw) : null;
}
