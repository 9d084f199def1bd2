import type { Anchor, Point, Size } from './types.js';

export const DEFAULT_MARGIN = 12;

export const ANCHORS: readonly Anchor[] = [
  'left_top',
  'left_bottom',
  'right_top',
  'right_bottom',
  'center',
  'top_center',
  'bottom_center'
];

export function isAnchor(value: string): value is Anchor {
  return (ANCHORS as readonly string[]).includes(value);
}

/**
 * Top-left corner for a text box of size `text` placed on `canvas`.
 * Edge-aligned coordinates are clamped at 0; centred ones are floored.
 * Unknown anchors are placed at left_top.
 */
export function computePosition(
  canvas: Size,
  text: Size,
  anchor: string,
  margin: number = DEFAULT_MARGIN
): Point {
  const centerX = Math.floor((canvas.width - text.width) / 2);
  const centerY = Math.floor((canvas.height - text.height) / 2);
  const right = Math.max(canvas.width - text.width - margin, 0);
  const bottom = Math.max(canvas.height - text.height - margin, 0);

  switch (anchor) {
    case 'left_bottom':
      return { x: margin, y: bottom };
    case 'right_top':
      return { x: right, y: margin };
    case 'right_bottom':
      return { x: right, y: bottom };
    case 'center':
      return { x: centerX, y: centerY };
    case 'top_center':
      return { x: centerX, y: margin };
    case 'bottom_center':
      return { x: centerX, y: bottom };
    case 'left_top':
    default:
      return { x: margin, y: margin };
  }
}
