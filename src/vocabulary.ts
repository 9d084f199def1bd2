import Color from 'color';
import { InvalidParameterError } from './errors.js';
import { ANCHORS, isAnchor } from './placement.js';
import type { Anchor, ResolvedColor } from './types.js';

/** Simplified Chinese colour names accepted at the colour prompt. */
export const COLOR_ALIASES: Readonly<Record<string, string>> = {
  '白色': 'white',
  '白': 'white',
  '黑色': 'black',
  '黑': 'black',
  '红色': 'red',
  '绿色': 'green',
  '蓝色': 'blue',
  '黄色': 'yellow',
  '灰色': 'gray',
  '橙色': 'orange',
  '紫色': 'purple',
  '粉色': 'pink',
  '金色': 'gold',
  '银色': 'silver'
};

export const POSITION_ALIASES: Readonly<Record<string, Anchor>> = {
  '左上': 'left_top',
  '左上角': 'left_top',
  '左下': 'left_bottom',
  '左下角': 'left_bottom',
  '右上': 'right_top',
  '右上角': 'right_top',
  '右下': 'right_bottom',
  '右下角': 'right_bottom',
  '居中': 'center',
  '中间': 'center',
  '中心': 'center',
  '上中': 'top_center',
  '顶部居中': 'top_center',
  '下中': 'bottom_center',
  '底部居中': 'bottom_center'
};

export function parseFontSize(raw: string): number {
  const value = raw.trim();
  if (!/^\+?\d+$/.test(value) || Number.parseInt(value, 10) <= 0) {
    throw new InvalidParameterError('fontSize', 'Font size must be a positive integer, e.g. 36');
  }
  return Number.parseInt(value, 10);
}

function lookupAlias<T extends string>(aliases: Readonly<Record<string, T>>, key: string): T | undefined {
  return Object.prototype.hasOwnProperty.call(aliases, key) ? aliases[key] : undefined;
}

/**
 * Resolve a colour given as a Chinese name, a CSS colour name or a hex triple.
 * Aliases are translated first; anything else goes to the colour parser as typed.
 */
export function resolveColor(raw: string): ResolvedColor {
  const input = raw.trim();
  const canonical = lookupAlias(COLOR_ALIASES, input) ?? input.toLowerCase();

  let parsed: Color;
  try {
    parsed = Color(canonical);
  } catch {
    throw new InvalidParameterError(
      'color',
      `Unknown colour "${input}". Use a colour name (white, black, 白色) or a hex value such as #FFFFFF`
    );
  }

  return { input, canonical, hex: parsed.hex() };
}

export function resolveAnchor(raw: string): Anchor {
  const input = raw.trim().toLowerCase();
  const candidate = lookupAlias(POSITION_ALIASES, input) ?? input;
  if (!isAnchor(candidate)) {
    throw new InvalidParameterError(
      'position',
      `Unknown position "${raw.trim()}". Choose one of ${ANCHORS.join(' / ')} or 左上 / 右下 / 居中 ...`
    );
  }
  return candidate;
}
