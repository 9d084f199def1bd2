import fs from 'fs/promises';
import path from 'path';
import type { Stats } from 'fs';
import { InvalidPathError, hasErrorCode } from './errors.js';
import type { ImageExtension, ImageTarget } from './types.js';

const IMAGE_EXTENSIONS: ReadonlySet<string> = new Set<ImageExtension>(['.jpg', '.jpeg', '.png']);

export interface ResolvedInput {
  kind: 'file' | 'directory';
  sourceDir: string;
  outputDir: string;
  targets: ImageTarget[];
  /** Set when a single file was given whose extension is not supported. */
  unsupportedExtension?: string;
}

function isImageExtension(extension: string): extension is ImageExtension {
  return IMAGE_EXTENSIONS.has(extension);
}

export function toImageTarget(filePath: string): ImageTarget | null {
  const extension = path.extname(filePath).toLowerCase();
  if (!isImageExtension(extension)) {
    return null;
  }
  return { path: filePath, name: path.basename(filePath), extension };
}

/** Strip whitespace and the quotes a terminal adds to dragged-in paths. */
export function cleanPathInput(raw: string): string {
  return raw.trim().replace(/^(['"])(.*)\1$/, '$2').trim();
}

/** `<parent>/<dirname>_watermark`, next to the source directory. */
export function getOutputDir(sourceDir: string): string {
  const resolved = path.resolve(sourceDir);
  return path.join(path.dirname(resolved), `${path.basename(resolved)}_watermark`);
}

async function statPath(inputPath: string): Promise<Stats> {
  try {
    return await fs.stat(inputPath);
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT') || hasErrorCode(error, 'ENOTDIR')) {
      throw new InvalidPathError(inputPath, 'no such file or directory');
    }
    throw error;
  }
}

export async function listImageFiles(dir: string): Promise<ImageTarget[]> {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  return entries
    .filter(entry => entry.isFile())
    .map(entry => toImageTarget(path.join(dir, entry.name)))
    .filter((target): target is ImageTarget => target !== null)
    .sort((a, b) => a.name.localeCompare(b.name));
}

export async function resolveInput(rawPath: string): Promise<ResolvedInput> {
  const cleaned = cleanPathInput(rawPath);
  if (!cleaned) {
    throw new InvalidPathError(rawPath, 'path is empty');
  }

  const inputPath = path.resolve(cleaned);
  const info = await statPath(inputPath);

  if (info.isDirectory()) {
    return {
      kind: 'directory',
      sourceDir: inputPath,
      outputDir: getOutputDir(inputPath),
      targets: await listImageFiles(inputPath)
    };
  }

  if (info.isFile()) {
    const sourceDir = path.dirname(inputPath);
    const target = toImageTarget(inputPath);
    return {
      kind: 'file',
      sourceDir,
      outputDir: getOutputDir(sourceDir),
      targets: target ? [target] : [],
      unsupportedExtension: target ? undefined : path.extname(inputPath) || '(none)'
    };
  }

  throw new InvalidPathError(inputPath, 'not a regular file or directory');
}

export async function ensureOutputDir(outputDir: string): Promise<string> {
  await fs.mkdir(outputDir, { recursive: true });
  return outputDir;
}
