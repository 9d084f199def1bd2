import sharp from 'sharp';
import { toPangoFont, type FontSpec } from './fontResolver.js';
import type { OpenedImage } from './imageLoader.js';
import { computePosition, DEFAULT_MARGIN } from './placement.js';
import type { Anchor, Point, Size } from './types.js';

const OUTLINE_COLOR = '#000000';

export interface TextLayer extends Size {
  buffer: Buffer;
  stroked: boolean;
}

export interface StampOptions {
  font: FontSpec;
  color: string;   // #RRGGBB
  anchor: Anchor;
  margin?: number;
  strokeWidth?: number;
  jpegQuality?: number;
}

export interface StampResult {
  buffer: Buffer;
  position: Point;
  textSize: Size;
  stroked: boolean;
}

export function escapeMarkup(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

export type GlyphRenderer = (text: string, font: FontSpec, color: string) => Promise<TextLayer>;

export const renderGlyphs: GlyphRenderer = async (text, font, color) => {
  const { data, info } = await sharp({
    text: {
      text: `<span foreground="${color}">${escapeMarkup(text)}</span>`,
      font: toPangoFont(font),
      fontfile: font.file,
      dpi: 72,
      rgba: true
    }
  })
    .png()
    .toBuffer({ resolveWithObject: true });

  return { buffer: data, width: info.width, height: info.height, stroked: false };
};

/** Integer offsets within `radius` of the origin, origin excluded. */
export function strokeOffsets(radius: number): Point[] {
  const offsets: Point[] = [];
  for (let y = -radius; y <= radius; y++) {
    for (let x = -radius; x <= radius; x++) {
      if ((x !== 0 || y !== 0) && x * x + y * y <= radius * radius) {
        offsets.push({ x, y });
      }
    }
  }
  return offsets;
}

/**
 * Fill-coloured text over a dark outline, on a transparent layer padded by
 * the stroke width on every side. Falls back to the bare fill layer when the
 * outline cannot be composited.
 */
export async function buildTextLayer(
  text: string,
  font: FontSpec,
  color: string,
  strokeWidth: number,
  render: GlyphRenderer = renderGlyphs
): Promise<TextLayer> {
  const fill = await render(text, font, color);
  if (strokeWidth <= 0) {
    return fill;
  }

  try {
    const outline = await render(text, font, OUTLINE_COLOR);
    const width = fill.width + strokeWidth * 2;
    const height = fill.height + strokeWidth * 2;
    const buffer = await sharp({
      create: { width, height, channels: 4, background: { r: 0, g: 0, b: 0, alpha: 0 } }
    })
      .composite([
        ...strokeOffsets(strokeWidth).map(offset => ({
          input: outline.buffer,
          left: strokeWidth + offset.x,
          top: strokeWidth + offset.y
        })),
        { input: fill.buffer, left: strokeWidth, top: strokeWidth }
      ])
      .png()
      .toBuffer();
    return { buffer, width, height, stroked: true };
  } catch {
    return fill;
  }
}

/** Trim a layer that would not fit on the canvas; composite rejects oversized overlays. */
async function fitLayer(layer: TextLayer, canvas: Size): Promise<TextLayer> {
  if (layer.width <= canvas.width && layer.height <= canvas.height) {
    return layer;
  }
  const width = Math.min(layer.width, canvas.width);
  const height = Math.min(layer.height, canvas.height);
  const buffer = await sharp(layer.buffer).extract({ left: 0, top: 0, width, height }).png().toBuffer();
  return { ...layer, buffer, width, height };
}

/**
 * Put the composited RGBA pipeline back into the source's channel layout:
 * alpha only when the source had it, greyscale or CMYK where the source was,
 * and 16 bits per sample for 16-bit PNGs.
 */
function restoreColourMode(output: sharp.Sharp, metadata: sharp.Metadata, png: boolean): sharp.Sharp {
  if (!metadata.hasAlpha) {
    output = output.removeAlpha();
  }
  const wide = png && metadata.depth === 'ushort';
  if (metadata.space === 'b-w' || metadata.space === 'grey16') {
    return output.toColourspace(wide ? 'grey16' : 'b-w');
  }
  if (metadata.space === 'cmyk' && !png) {
    return output.toColourspace('cmyk');
  }
  return wide ? output.toColourspace('rgb16') : output;
}

/** Palette sources are re-quantized to a palette of the same bit depth. */
function pngOptions(metadata: sharp.Metadata): sharp.PngOptions {
  if (!metadata.paletteBitDepth) {
    return {};
  }
  return { palette: true, colours: 2 ** metadata.paletteBitDepth };
}

/**
 * Draw `text` onto a copy of `image` and encode it in the source's format.
 * The source buffer is only read.
 */
export async function stampDate(image: OpenedImage, text: string, options: StampOptions): Promise<StampResult> {
  const { metadata, target } = image;
  const canvas: Size = { width: metadata.width ?? 0, height: metadata.height ?? 0 };
  const margin = options.margin ?? DEFAULT_MARGIN;

  const layer = await fitLayer(
    await buildTextLayer(text, options.font, options.color, options.strokeWidth ?? 2),
    canvas
  );
  const position = computePosition(canvas, layer, options.anchor, margin);

  const composited = await sharp(image.buffer)
    .ensureAlpha()
    .composite([{ input: layer.buffer, left: position.x, top: position.y }])
    .png()
    .toBuffer();

  const png = target.extension === '.png';
  const output = restoreColourMode(sharp(composited), metadata, png);
  const buffer = png
    ? await output.png(pngOptions(metadata)).toBuffer()
    : await output.jpeg({ quality: options.jpegQuality ?? 95 }).toBuffer();

  return {
    buffer,
    position,
    textSize: { width: layer.width, height: layer.height },
    stroked: layer.stroked
  };
}
