import sharp from 'sharp';
import { lookupColor } from './colors.js';
import { EmptyInputError, UsageError } from './errors.js';
import { indexToCoord, sideLength } from './grid.js';
import { lookupMetric } from './metrics.js';
import type {
  Canvas,
  ColorMapper,
  Rgb,
  Sample,
  VisualizeOptions,
  VisualizeResult,
} from './types.js';

const CHANNELS = 3;

export const DEFAULT_BACKGROUND: Rgb = [0, 0, 0];

/** Allocate a `size x size` canvas filled with `background`. */
export function createCanvas(size: number, background: Rgb = DEFAULT_BACKGROUND): Canvas {
  const pixels = Buffer.alloc(size * size * CHANNELS);
  for (let offset = 0; offset < pixels.length; offset += CHANNELS) {
    pixels[offset] = background[0];
    pixels[offset + 1] = background[1];
    pixels[offset + 2] = background[2];
  }
  return { size, pixels };
}

export function putPixel(canvas: Canvas, row: number, col: number, [r, g, b]: Rgb): void {
  const offset = (row * canvas.size + col) * CHANNELS;
  canvas.pixels[offset] = r;
  canvas.pixels[offset + 1] = g;
  canvas.pixels[offset + 2] = b;
}

export function getPixel(canvas: Canvas, row: number, col: number): Rgb {
  const offset = (row * canvas.size + col) * CHANNELS;
  return [
    canvas.pixels[offset] ?? 0,
    canvas.pixels[offset + 1] ?? 0,
    canvas.pixels[offset + 2] ?? 0,
  ];
}

/**
 * Paint one pixel per sample, row-major in sample order, on the smallest
 * square canvas that fits them. Cells past the last sample keep the
 * background colour.
 */
export function buildCanvas(
  samples: readonly Sample[],
  color: ColorMapper,
  background: Rgb = DEFAULT_BACKGROUND,
): Canvas {
  if (samples.length === 0) {
    throw new EmptyInputError();
  }

  const canvas = createCanvas(sideLength(samples.length), background);
  samples.forEach((sample, i) => {
    const { row, col } = indexToCoord(i, canvas.size);
    putPixel(canvas, row, col, color(sample));
  });
  return canvas;
}

function toSharp(canvas: Canvas): sharp.Sharp {
  return sharp(canvas.pixels, {
    raw: { width: canvas.size, height: canvas.size, channels: CHANNELS },
  }).png();
}

export async function encodePng(canvas: Canvas): Promise<Buffer> {
  return toSharp(canvas).toBuffer();
}

/** Write the canvas as PNG, replacing any file already at `outputPath`. */
export async function writePng(canvas: Canvas, outputPath: string): Promise<void> {
  await toSharp(canvas).toFile(outputPath);
}

/**
 * Run a metric over the tokens and paint the result.
 * Throws UsageError for an unknown metric or colour name.
 */
export function visualize(tokens: readonly string[], options: VisualizeOptions): VisualizeResult {
  const metricEntry = lookupMetric(options.metric);
  if (!metricEntry) {
    throw new UsageError(`Unknown metric: ${options.metric}`);
  }
  const colorEntry = lookupColor(options.color);
  if (!colorEntry) {
    throw new UsageError(`Unknown color scheme: ${options.color}`);
  }

  const samples = metricEntry.metric(tokens);
  const canvas = buildCanvas(samples, colorEntry.mapper, options.background);
  return { canvas, count: samples.length };
}
