import fs from 'fs/promises';
import path from 'path';
import { DEFAULT_CONFIG, type WatermarkConfig } from './config.js';
import { toError } from './errors.js';
import { extractCaptureDate } from './exifDate.js';
import { resolveFont, withExtraFonts, type FontSpec } from './fontResolver.js';
import { openImage, type OpenedImage } from './imageLoader.js';
import { ensureOutputDir } from './inputResolver.js';
import { stampDate, type StampOptions, type StampResult } from './renderer.js';
import type { Reporter } from './reporter.js';
import type { DateStamp, ImageTarget, RunSummary, WatermarkRequest } from './types.js';

export interface BatchDependencies {
  reporter: Reporter;
  config?: WatermarkConfig;
  resolveFont?: (size: number) => Promise<FontSpec>;
  openImage?: (target: ImageTarget) => Promise<OpenedImage>;
  extractDate?: (image: OpenedImage) => Promise<DateStamp>;
  stamp?: (image: OpenedImage, text: string, options: StampOptions) => Promise<StampResult>;
}

export function emptySummary(outputDir: string): RunSummary {
  return {
    processed: 0,
    skipped: { no_date: 0 },
    failed: 0,
    outputDir,
    outputs: [],
    failures: []
  };
}

/**
 * Stamp every target in order, one image at a time. A failing image is
 * recorded and the run moves on; only the process being interrupted stops it.
 */
export async function runBatch(request: WatermarkRequest, deps: BatchDependencies): Promise<RunSummary> {
  const { reporter } = deps;
  const config = deps.config ?? DEFAULT_CONFIG;
  const open = deps.openImage ?? openImage;
  const extractDate = deps.extractDate ?? extractCaptureDate;
  const stamp = deps.stamp ?? stampDate;

  const summary = emptySummary(request.outputDir);
  const total = request.targets.length;

  reporter.start(total, request.outputDir);
  if (total === 0) {
    reporter.finish(summary);
    return summary;
  }

  await ensureOutputDir(request.outputDir);

  const font = deps.resolveFont
    ? await deps.resolveFont(request.fontSize)
    : await resolveFont(request.fontSize, { candidates: withExtraFonts(config.extraFontPaths) });
  if (font.degraded) {
    reporter.warn(`No scalable font found; using the default font at ${font.size}pt instead of ${request.fontSize}pt`);
  }

  let warnedPlainText = false;

  for (const [index, target] of request.targets.entries()) {
    reporter.item(target, index, total);
    try {
      const image = await open(target);
      const date = await extractDate(image);
      if (!date) {
        summary.skipped.no_date++;
        reporter.skipped(target, 'no_date');
        continue;
      }

      const result = await stamp(image, date, {
        font,
        color: request.color.hex,
        anchor: request.anchor,
        margin: config.margin,
        strokeWidth: config.strokeWidth,
        jpegQuality: config.jpegQuality
      });

      if (!result.stroked && config.strokeWidth > 0 && !warnedPlainText) {
        warnedPlainText = true;
        reporter.warn('Outline rendering is unavailable; drawing fill-only text');
      }

      const outputPath = path.join(request.outputDir, target.name);
      await fs.writeFile(outputPath, result.buffer);
      summary.processed++;
      summary.outputs.push(outputPath);
      reporter.saved(target, outputPath);
    } catch (error) {
      const err = toError(error);
      const failure = { file: target.name, errorName: err.name, message: err.message };
      summary.failed++;
      summary.failures.push(failure);
      reporter.failed(failure);
    }
  }

  reporter.finish(summary);
  return summary;
}
