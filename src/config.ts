import fs from 'fs/promises';
import path from 'path';
import { hasErrorCode } from './errors.js';

export interface WatermarkConfig {
  margin: number;
  strokeWidth: number;
  jpegQuality: number;
  extraFontPaths: string[];
}

export const DEFAULT_CONFIG: WatermarkConfig = {
  margin: 12,
  strokeWidth: 2,
  jpegQuality: 95,
  extraFontPaths: []
};

/**
 * Copy KEY=value pairs from a .env file into the environment.
 * Variables that are already set win; a missing file is not an error.
 */
export async function loadDotEnv(envPath: string = path.join(process.cwd(), '.env')): Promise<void> {
  let content: string;
  try {
    content = await fs.readFile(envPath, 'utf-8');
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT')) {
      return;
    }
    throw error;
  }

  for (const [key, value] of parseDotEnv(content)) {
    if (process.env[key] === undefined) {
      process.env[key] = value;
    }
  }
}

export function parseDotEnv(content: string): Map<string, string> {
  const values = new Map<string, string>();
  for (const line of content.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) {
      continue;
    }
    const idx = trimmed.indexOf('=');
    if (idx <= 0) {
      continue;
    }
    const key = trimmed.slice(0, idx).trim();
    const value = trimmed.slice(idx + 1).trim().replace(/^(['"])(.*)\1$/, '$2');
    values.set(key, value);
  }
  return values;
}

function readInt(raw: string | undefined, fallback: number, min: number, max: number): number {
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const parsed = Number.parseInt(raw, 10);
  if (Number.isNaN(parsed)) {
    return fallback;
  }
  return Math.min(Math.max(parsed, min), max);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): WatermarkConfig {
  return {
    margin: readInt(env.WATERMARK_MARGIN, DEFAULT_CONFIG.margin, 0, 10_000),
    strokeWidth: readInt(env.WATERMARK_STROKE_WIDTH, DEFAULT_CONFIG.strokeWidth, 0, 32),
    jpegQuality: readInt(env.WATERMARK_JPEG_QUALITY, DEFAULT_CONFIG.jpegQuality, 1, 100),
    extraFontPaths: (env.WATERMARK_FONT_PATHS || '')
      .split(path.delimiter)
      .map(entry => entry.trim())
      .filter(Boolean)
  };
}
