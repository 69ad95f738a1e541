import fs from 'node:fs';
import path from 'node:path';
import { COLOR_MAPPERS, lookupColor } from './colors.js';
import type { BookPngConfig } from './config.js';
import { UsageError } from './errors.js';
import { METRICS, lookupMetric } from './metrics.js';
import { visualize, writePng } from './renderer.js';
import { tokenize } from './tokenizer.js';

export interface CliArgs {
  file: string | null;
  metric: string;
  color: string;
  output: string | null;
  list: boolean;
  help: boolean;
}

const VALUE_FLAGS = new Map<string, 'metric' | 'color' | 'output'>([
  ['-m', 'metric'],
  ['--metric', 'metric'],
  ['-c', 'color'],
  ['--color', 'color'],
  ['-o', 'output'],
  ['--output', 'output'],
]);

const SWITCHES = new Set(['--list', '--help', '-h']);

function isFlag(arg: string): boolean {
  return VALUE_FLAGS.has(arg) || SWITCHES.has(arg);
}

export function usage(): string {
  return `Usage:
  book-png <text-file>
  book-png <text-file> --metric <metric> --color <color>
  book-png <text-file> -m bigram-diversity -c rainbow -o output.png
  book-png --list

Options:
  -m, --metric <name>   Metric to visualize (default: word-freq)
  -c, --color <name>    Color scheme (default: red-blue)
  -o, --output <file>   Output filename (default: <input>-<suffix>.png)
      --list            List available metrics and colors
  -h, --help            Show this message`;
}

/**
 * Parse argv (without the node and script entries).
 * Flags not given fall back to `defaults`.
 */
export function parseArgs(args: readonly string[], defaults: BookPngConfig): CliArgs {
  const parsed: CliArgs = {
    file: null,
    metric: defaults.metric,
    color: defaults.color,
    output: null,
    list: false,
    help: false,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === undefined) break;

    if (arg === '--list') {
      parsed.list = true;
      continue;
    }
    if (arg === '--help' || arg === '-h') {
      parsed.help = true;
      continue;
    }

    const field = VALUE_FLAGS.get(arg);
    if (field) {
      const value = args[i + 1];
      if (value === undefined || isFlag(value)) {
        throw new UsageError(`Missing value for ${arg}`);
      }
      parsed[field] = value;
      i++;
      continue;
    }

    if (arg.startsWith('-')) {
      throw new UsageError(`Unknown option: ${arg}`);
    }
    if (parsed.file !== null) {
      throw new UsageError(`Unexpected argument: ${arg}`);
    }
    parsed.file = arg;
  }

  if (!lookupMetric(parsed.metric)) {
    throw new UsageError(
      `Unknown metric "${parsed.metric}" (choose from ${Object.keys(METRICS).join(', ')})`,
    );
  }
  if (!lookupColor(parsed.color)) {
    throw new UsageError(
      `Unknown color scheme "${parsed.color}" (choose from ${Object.keys(COLOR_MAPPERS).join(', ')})`,
    );
  }

  return parsed;
}

function padRight(s: string, width: number): string {
  return s.length >= width ? s : s + ' '.repeat(width - s.length);
}

/** Lines printed by --list */
export function listOptions(): string[] {
  const lines = ['Available metrics:'];
  for (const [name, { description }] of Object.entries(METRICS)) {
    lines.push(`  ${padRight(name, 20)} ${description}`);
  }
  lines.push('', 'Available color schemes:');
  for (const [name, { description }] of Object.entries(COLOR_MAPPERS)) {
    lines.push(`  ${padRight(name, 20)} ${description}`);
  }
  return lines;
}

/** `<stem>-<suffix>.png` in the working directory */
export function defaultOutputPath(inputFile: string, suffix: string, cwd: string): string {
  const stem = path.parse(inputFile).name;
  return path.join(cwd, `${stem}-${suffix}.png`);
}

export interface RunResult {
  outputPath: string;
  size: number;
  count: number;
}

/**
 * Read, tokenize, render and save. Returns null when only usage or the
 * option list was printed.
 */
export async function run(
  args: readonly string[],
  config: BookPngConfig,
  cwd: string = process.cwd(),
): Promise<RunResult | null> {
  const parsed = parseArgs(args, config);

  if (parsed.list) {
    for (const line of listOptions()) console.log(line);
    return null;
  }
  if (parsed.help || parsed.file === null) {
    console.log(usage());
    return null;
  }

  const inputPath = path.resolve(cwd, parsed.file);
  if (!fs.existsSync(inputPath)) {
    throw new UsageError(`File not found: ${parsed.file}`);
  }

  // Invalid UTF-8 sequences decode to U+FFFD
  const text = fs.readFileSync(inputPath).toString('utf-8');
  const words = tokenize(text);
  console.log(`Loaded ${words.length} words from ${parsed.file}`);

  const outputPath = parsed.output !== null
    ? path.resolve(cwd, parsed.output)
    : defaultOutputPath(inputPath, config.suffix, cwd);

  const { canvas, count } = visualize(words, {
    metric: parsed.metric,
    color: parsed.color,
    background: config.background,
  });
  await writePng(canvas, outputPath);
  console.log(`Saved: ${outputPath} (${canvas.size}x${canvas.size} pixels, ${count} values)`);

  return { outputPath, size: canvas.size, count };
}
