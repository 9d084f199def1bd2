import fs from 'fs/promises';
import path from 'path';
import sharp from 'sharp';

export interface FontSpec {
  /** Pango family name; undefined means the backend default. */
  family?: string;
  /** Font file registered with the backend before `family` is looked up. */
  file?: string;
  size: number;
  /** True when the requested size could not be honoured. */
  degraded: boolean;
  source: string;
}

export interface FontCandidate {
  file: string;
  family: string;
}

/** libvips renders text with "sans 12" when no font is given. */
export const FALLBACK_FONT_SIZE = 12;

export const FONT_CANDIDATES: readonly FontCandidate[] = [
  { file: 'C:/Windows/Fonts/arial.ttf', family: 'Arial' },
  { file: 'C:/Windows/Fonts/msyh.ttc', family: 'Microsoft YaHei' },
  { file: '/usr/share/fonts/truetype/dejavu/DejaVuSans.ttf', family: 'DejaVu Sans' },
  { file: '/usr/share/fonts/opentype/noto/NotoSansCJK-Regular.ttc', family: 'Noto Sans CJK SC' },
  { file: '/Library/Fonts/Arial.ttf', family: 'Arial' },
  { file: '/System/Library/Fonts/PingFang.ttc', family: 'PingFang SC' }
];

export const DEFAULT_FAMILY = 'Arial';

export type FontProbe = (font: FontSpec) => Promise<void>;
export type FileExists = (file: string) => Promise<boolean>;

/** Pango font description, e.g. "DejaVu Sans 36". */
export function toPangoFont(font: FontSpec): string | undefined {
  return font.family ? `${font.family} ${font.size}` : undefined;
}

/** Render a short sample; rejects when the backend cannot load the font. */
export const renderProbe: FontProbe = async font => {
  await sharp({
    text: {
      text: 'Ag',
      font: toPangoFont(font),
      fontfile: font.file,
      dpi: 72
    }
  })
    .png()
    .toBuffer();
};

const fileExists: FileExists = async file => {
  try {
    await fs.access(file);
    return true;
  } catch {
    return false;
  }
};

/** User-supplied font files, tried before the built-in list. The family is the file's base name. */
export function withExtraFonts(files: readonly string[]): FontCandidate[] {
  return [
    ...files.map(file => ({ file, family: path.basename(file, path.extname(file)) })),
    ...FONT_CANDIDATES
  ];
}

export interface ResolveFontOptions {
  candidates?: readonly FontCandidate[];
  probe?: FontProbe;
  exists?: FileExists;
}

/**
 * Known font files first, then a family name from the system search path,
 * then the backend's fixed-size default. The last step cannot fail.
 */
export async function resolveFont(size: number, options: ResolveFontOptions = {}): Promise<FontSpec> {
  const candidates = options.candidates ?? FONT_CANDIDATES;
  const probe = options.probe ?? renderProbe;
  const exists = options.exists ?? fileExists;

  const attempts: Array<() => Promise<FontSpec | null>> = [
    ...candidates.map(candidate => async () => {
      if (!(await exists(candidate.file))) {
        return null;
      }
      const font: FontSpec = { ...candidate, size, degraded: false, source: candidate.file };
      await probe(font);
      return font;
    }),
    async () => {
      const font: FontSpec = { family: DEFAULT_FAMILY, size, degraded: false, source: `family:${DEFAULT_FAMILY}` };
      await probe(font);
      return font;
    }
  ];

  for (const attempt of attempts) {
    try {
      const font = await attempt();
      if (font) {
        return font;
      }
    } catch {
      continue;
    }
  }

  return { size: FALLBACK_FONT_SIZE, degraded: true, source: 'default' };
}
