/**
 * Defaults for the CLI, read from the environment.
 *
 * A `.env` file in the working directory is loaded first; variables
 * already set in the environment win over it. Command-line flags win
 * over both.
 */

import path from 'node:path';
import { config as loadDotenv } from 'dotenv';
import { lookupColor, parseHexColor } from './colors.js';
import { UsageError } from './errors.js';
import { lookupMetric } from './metrics.js';
import type { Rgb } from './types.js';

export interface BookPngConfig {
  metric: string;
  color: string;
  /** Appended to the input file stem: `<stem>-<suffix>.png` */
  suffix: string;
  background: Rgb;
}

export const DEFAULT_CONFIG: BookPngConfig = {
  metric: 'word-freq',
  color: 'red-blue',
  suffix: 'lenbig',
  background: [0, 0, 0],
};

type Env = Record<string, string | undefined>;

/** Build the config from an environment map (no file access). */
export function configFromEnv(env: Env): BookPngConfig {
  const metric = env['BOOK_PNG_METRIC'] || DEFAULT_CONFIG.metric;
  if (!lookupMetric(metric)) {
    throw new UsageError(`BOOK_PNG_METRIC: unknown metric "${metric}"`);
  }

  const color = env['BOOK_PNG_COLOR'] || DEFAULT_CONFIG.color;
  if (!lookupColor(color)) {
    throw new UsageError(`BOOK_PNG_COLOR: unknown color scheme "${color}"`);
  }

  const suffix = env['BOOK_PNG_SUFFIX'] || DEFAULT_CONFIG.suffix;
  if (/[\\/]/.test(suffix)) {
    throw new UsageError(`BOOK_PNG_SUFFIX must not contain path separators: "${suffix}"`);
  }

  let background = DEFAULT_CONFIG.background;
  const rawBackground = env['BOOK_PNG_BACKGROUND'];
  if (rawBackground) {
    const parsed = parseHexColor(rawBackground);
    if (!parsed) {
      throw new UsageError(`BOOK_PNG_BACKGROUND must be #rrggbb, got "${rawBackground}"`);
    }
    background = parsed;
  }

  return { metric, color, suffix, background };
}

/** Load `.env` from `cwd` into process.env, then read the config. */
export function loadConfig(cwd: string = process.cwd()): BookPngConfig {
  loadDotenv({ path: path.join(cwd, '.env') });
  return configFromEnv(process.env);
}
