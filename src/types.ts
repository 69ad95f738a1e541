/** An RGB triple, each channel an integer in 0-255 */
export type Rgb = [number, number, number];

/**
 * One rendered item: a normalised value plus the identity of the item
 * it was computed for.
 * - word metrics: `key` is the token
 * - bigram metrics: `key` is `"w1 w2"`
 */
export interface Sample {
  value: number;
  key: string;
}

/** Maps a sample to a pixel colour */
export type ColorMapper = (sample: Sample) => Rgb;

/** Turns a token sequence into one sample per rendered item */
export type Metric = (tokens: readonly string[]) => Sample[];

export interface MetricEntry {
  metric: Metric;
  description: string;
}

export interface ColorEntry {
  mapper: ColorMapper;
  description: string;
}

/** Row-major RGB pixels of a `size x size` image */
export interface Canvas {
  size: number;
  pixels: Buffer;
}

export interface GridCoord {
  row: number;
  col: number;
}

/** Which metric and colour scheme a run uses */
export interface VisualizeOptions {
  metric: string;
  color: string;
  background: Rgb;
}

export interface VisualizeResult {
  canvas: Canvas;
  /** Number of items rendered (tokens or bigrams) */
  count: number;
}
