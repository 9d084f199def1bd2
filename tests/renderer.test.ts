import path from 'path';
import fs from 'fs/promises';
import sharp from 'sharp';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import { runBatch } from '../src/batchRunner.js';
import { resolveFont, type FontSpec } from '../src/fontResolver.js';
import { openImage } from '../src/imageLoader.js';
import { listImageFiles, toImageTarget } from '../src/inputResolver.js';
import { computePosition } from '../src/placement.js';
import {
  buildTextLayer,
  escapeMarkup,
  stampDate,
  strokeOffsets,
  type GlyphRenderer,
  type TextLayer
} from '../src/renderer.js';
import { makeTempDir, writeJpeg, writeModeImage, writePng, type SourceMode } from './helpers/fixtures.js';
import { RecordingReporter } from './helpers/recordingReporter.js';

describe('strokeOffsets', () => {
  it('covers a disc of the stroke radius without the centre', () => {
    const offsets = strokeOffsets(2);
    expect(offsets).toHaveLength(12);
    expect(offsets).toContainEqual({ x: 2, y: 0 });
    expect(offsets).toContainEqual({ x: -1, y: -1 });
    expect(offsets).not.toContainEqual({ x: 0, y: 0 });
    expect(offsets).not.toContainEqual({ x: 2, y: 2 });
  });

  it('is empty for a zero radius', () => {
    expect(strokeOffsets(0)).toEqual([]);
  });
});

describe('escapeMarkup', () => {
  it('escapes Pango markup characters', () => {
    expect(escapeMarkup('a<b>&c')).toBe('a&lt;b&gt;&amp;c');
  });
});

describe('buildTextLayer', () => {
  const font: FontSpec = { size: 24, degraded: false, source: 'test' };

  async function solidLayer(width: number, height: number): Promise<TextLayer> {
    const buffer = await sharp({
      create: { width, height, channels: 4, background: { r: 255, g: 255, b: 255, alpha: 1 } }
    })
      .png()
      .toBuffer();
    return { buffer, width, height, stroked: false };
  }

  it('falls back to the fill layer when the outline cannot be drawn', async () => {
    const colors: string[] = [];
    const render: GlyphRenderer = async (_text, _font, color) => {
      colors.push(color);
      if (color === '#000000') {
        throw new Error('outline unavailable');
      }
      return solidLayer(40, 12);
    };

    const layer = await buildTextLayer('2023-07-04', font, '#FFFFFF', 2, render);

    expect(colors).toEqual(['#FFFFFF', '#000000']);
    expect(layer.stroked).toBe(false);
    expect(layer.width).toBe(40);
    expect(layer.height).toBe(12);
  });

  it('outlines the fill when both layers render', async () => {
    const layer = await buildTextLayer('2023-07-04', font, '#FFFFFF', 2, () => solidLayer(40, 12));
    expect(layer.stroked).toBe(true);
    expect(layer.width).toBe(44);
    expect(layer.height).toBe(16);
  });
});

describe('stampDate', () => {
  let tempDir: string;
  let font: FontSpec;

  beforeAll(async () => {
    tempDir = await makeTempDir();
    font = await resolveFont(24);
  });

  afterAll(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('pads the text layer by the stroke width on each side', async () => {
    const plain = await buildTextLayer('2023-07-04', font, '#FFFFFF', 0);
    const stroked = await buildTextLayer('2023-07-04', font, '#FFFFFF', 2);
    expect(plain.stroked).toBe(false);
    expect(stroked.stroked).toBe(true);
    expect(stroked.width).toBe(plain.width + 4);
    expect(stroked.height).toBe(plain.height + 4);
  });

  it('keeps a JPEG a three-channel JPEG of the same size', async () => {
    const file = await writeJpeg(path.join(tempDir, 'photo.jpg'));
    const image = await openImage({ path: file, name: 'photo.jpg', extension: '.jpg' });
    const original = Buffer.from(image.buffer);

    const result = await stampDate(image, '2023-07-04', { font, color: '#FFFFFF', anchor: 'right_bottom' });
    const meta = await sharp(result.buffer).metadata();

    expect(meta.format).toBe('jpeg');
    expect(meta.width).toBe(320);
    expect(meta.height).toBe(240);
    expect(meta.channels).toBe(3);
    expect(result.position).toEqual(computePosition({ width: 320, height: 240 }, result.textSize, 'right_bottom', 12));
    expect(image.buffer.equals(original)).toBe(true);
  });

  it('keeps the alpha channel of a transparent PNG', async () => {
    const file = await writePng(path.join(tempDir, 'overlay.png'), true);
    const image = await openImage({ path: file, name: 'overlay.png', extension: '.png' });

    const result = await stampDate(image, '2023-07-04', { font, color: '#FF0000', anchor: 'center' });
    const meta = await sharp(result.buffer).metadata();

    expect(meta.format).toBe('png');
    expect(meta.channels).toBe(4);
    expect(meta.hasAlpha).toBe(true);
  });

  async function stampMode(mode: SourceMode, name: string) {
    const file = await writeModeImage(path.join(tempDir, name), mode);
    const target = toImageTarget(file);
    if (!target) {
      throw new Error(`not an image path: ${file}`);
    }
    const image = await openImage(target);
    const result = await stampDate(image, '2023-07-04', { font, color: '#FFFFFF', anchor: 'left_top' });
    return { before: image.metadata, after: await sharp(result.buffer).metadata() };
  }

  it('keeps a palette PNG a palette PNG', async () => {
    const { before, after } = await stampMode('palette', 'palette.png');
    expect(before.paletteBitDepth).toBe(8);
    expect(after.format).toBe('png');
    expect(after.paletteBitDepth).toBe(8);
    expect(after.hasAlpha).toBe(false);
  });

  it('keeps a greyscale PNG single-channel', async () => {
    const { before, after } = await stampMode('grey', 'grey.png');
    expect(before.space).toBe('b-w');
    expect(after.space).toBe('b-w');
    expect(after.channels).toBe(1);
    expect(after.depth).toBe('uchar');
  });

  it('keeps 16 bits per sample in a 16-bit PNG', async () => {
    const rgb = await stampMode('rgb16', 'deep.png');
    expect(rgb.before.depth).toBe('ushort');
    expect(rgb.after.depth).toBe('ushort');
    expect(rgb.after.channels).toBe(3);

    const grey = await stampMode('grey16', 'deep-grey.png');
    expect(grey.before.depth).toBe('ushort');
    expect(grey.after.depth).toBe('ushort');
    expect(grey.after.channels).toBe(1);
  });

  it('keeps a CMYK JPEG in CMYK', async () => {
    const { before, after } = await stampMode('cmyk', 'print.jpg');
    expect(before.space).toBe('cmyk');
    expect(after.format).toBe('jpeg');
    expect(after.space).toBe('cmyk');
    expect(after.channels).toBe(4);
  });

  it('stamps a folder end to end', async () => {
    const photosDir = path.join(tempDir, 'trip');
    const outputDir = path.join(tempDir, 'trip_watermark');
    await fs.mkdir(photosDir);
    await writeJpeg(path.join(photosDir, 'beach.jpg'), { dateTimeOriginal: '2023:07:04 10:11:12' });
    await writePng(path.join(photosDir, 'map.png'));

    const summary = await runBatch(
      {
        fontSize: 24,
        color: { input: 'white', canonical: 'white', hex: '#FFFFFF' },
        anchor: 'left_bottom',
        targets: await listImageFiles(photosDir),
        outputDir
      },
      { reporter: new RecordingReporter() }
    );

    expect(summary.processed).toBe(1);
    expect(summary.skipped.no_date).toBe(1);
    expect(await fs.readdir(outputDir)).toEqual(['beach.jpg']);
    const meta = await sharp(path.join(outputDir, 'beach.jpg')).metadata();
    expect(meta.format).toBe('jpeg');
    expect(meta.width).toBe(320);
  });
});
