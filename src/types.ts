export type Anchor =
  | 'left_top'
  | 'left_bottom'
  | 'right_top'
  | 'right_bottom'
  | 'center'
  | 'top_center'
  | 'bottom_center';

export type ImageExtension = '.jpg' | '.jpeg' | '.png';

export interface ImageTarget {
  path: string;
  name: string;
  extension: ImageExtension;
}

export interface ResolvedColor {
  input: string;
  canonical: string; // English colour name or normalized hex literal
  hex: string;       // #RRGGBB
}

export interface WatermarkRequest {
  readonly fontSize: number;
  readonly color: ResolvedColor;
  readonly anchor: Anchor;
  readonly targets: readonly ImageTarget[];
  readonly outputDir: string;
}

/** `YYYY-MM-DD`, or null when the image carries no usable capture time. */
export type DateStamp = string | null;

export type SkipReason = 'no_date';

export interface ItemFailure {
  file: string;
  errorName: string;
  message: string;
}

export interface RunSummary {
  processed: number;
  skipped: Record<SkipReason, number>;
  failed: number;
  outputDir: string;
  outputs: string[];
  failures: ItemFailure[];
}

export interface Size {
  width: number;
  height: number;
}

export interface Point {
  x: number;
  y: number;
}
