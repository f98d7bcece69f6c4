#!/usr/bin/env node

/**
 * barrace CLI
 * Animated bar race videos and stills from market probability histories
 */

import { Command, InvalidArgumentError } from 'commander';
import { mkdir, writeFile } from 'node:fs/promises';
import { basename, dirname, extname, resolve } from 'node:path';
import chalk from 'chalk';
import { createBarRaceVideo, createPreviewImage } from './animator.js';
import type { AssetPaths } from './animator.js';
import { getDefaultTitle, isChartFormat } from './config.js';
import type { RenderOptions } from './config.js';
import { loadInputFile } from './data/loader.js';
import { tableTimeRange } from './data/table.js';
import { isFfmpegAvailable } from './encoder/ffmpeg.js';
import { formatTimestamp } from './layout/format.js';
import { resolveOutputPath } from './output.js';
import type { AssetUnavailableError } from './utils/errors.js';
import { describeError, InvalidConfigurationError } from './utils/errors.js';

// ─── Option parsing ──────────────────────────────────────────────────

interface StyleFlags {
  title?: string;
  seriesTicker?: string;
  select?: string[];
  maxCandidates?: number;
  fps?: number;
  duration?: number;
  format: string;
  gridlines: boolean;
  font?: string;
  logo?: string;
  attribution?: string;
}

interface RenderFlags extends StyleFlags {
  output?: string;
  outputDir?: string;
  ffmpeg: string;
}

interface PreviewFlags extends StyleFlags {
  output?: string;
  frame?: number;
}

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return parsed;
}

function parseDecimal(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new InvalidArgumentError('Not a number.');
  }
  return parsed;
}

function addStyleOptions(command: Command): Command {
  return command
    .option('-t, --title <title>', 'Chart title (default: from --series-ticker or the file name)')
    .option('--series-ticker <ticker>', 'Market series ticker, used for the default title and file name')
    .option('--select <names...>', 'Series to display, in this order')
    .option('--max-candidates <n>', 'Maximum number of bars', parseInteger)
    .option('--fps <n>', 'Frames per second', parseInteger)
    .option('--duration <seconds>', 'Animation length in seconds', parseDecimal)
    .option('--format <name>', 'Canvas format', 'square')
    .option('--no-gridlines', 'Hide vertical gridlines')
    .option('--font <path>', 'Display font file (TTF/OTF)')
    .option('--logo <path>', 'Logo image drawn bottom-left')
    .option('--attribution <text>', 'Footer attribution line');
}

function toRenderOptions(input: string, flags: StyleFlags): RenderOptions & AssetPaths {
  if (!isChartFormat(flags.format)) {
    throw new InvalidConfigurationError([`format: unknown format "${flags.format}"`]);
  }
  const title =
    flags.title ??
    (flags.seriesTicker
      ? getDefaultTitle(flags.seriesTicker)
      : basename(input, extname(input)).replace(/[_-]+/g, ' '));
  return {
    title,
    series: flags.select,
    maxCandidates: flags.maxCandidates,
    fps: flags.fps,
    duration: flags.duration,
    format: flags.format,
    showGridlines: flags.gridlines,
    attribution: flags.attribution,
    fontPath: flags.font,
    logoPath: flags.logo,
  };
}

function reportAssetIssues(issues: AssetUnavailableError[]): void {
  issues.forEach(issue => console.log(chalk.yellow(`Warning: ${issue.message}`)));
}

function fail(error: unknown): never {
  console.error(chalk.red(`Error: ${describeError(error)}`));
  process.exit(1);
}

// ─── Commands ────────────────────────────────────────────────────────

const program = new Command();

program
  .name('barrace')
  .description('Render animated bar race videos from probability time series')
  .version('1.0.0');

// Render command
addStyleOptions(
  program
    .command('render')
    .description('Render the full animation to a video file')
    .argument('<input>', 'JSON observations or market history file')
    .option('-o, --output <file>', 'Output video (default: <ticker>_<timestamp>.mp4)')
    .option('--output-dir <dir>', 'Directory for the output video', '.')
    .option('--ffmpeg <path>', 'ffmpeg executable', 'ffmpeg')
).action(async (input: string, flags: RenderFlags) => {
  try {
    if (!isFfmpegAvailable(flags.ffmpeg)) {
      console.error(chalk.red(`Error: ffmpeg not found (${flags.ffmpeg})`));
      process.exit(1);
    }

    const options = toRenderOptions(input, flags);
    console.log(chalk.blue(`Loading ${input}...`));
    const table = await loadInputFile(input);
    console.log(chalk.gray(`  ${table.series.length} series, ${table.rows.length} timestamps`));

    const outputPath = resolveOutputPath({
      output: flags.output,
      seriesTicker: flags.seriesTicker,
      directory: resolve(flags.outputDir ?? '.'),
    });
    await mkdir(dirname(outputPath), { recursive: true });

    console.log(chalk.blue(`Rendering "${options.title}"...`));
    let lastDecile = -1;
    const result = await createBarRaceVideo(table, {
      ...options,
      outputPath,
      ffmpegPath: flags.ffmpeg,
      onProgress: (done, total) => {
        const decile = Math.floor((done / total) * 10);
        if (decile > lastDecile) {
          lastDecile = decile;
          console.log(chalk.gray(`  ${decile * 10}% (${done}/${total} frames)`));
        }
      },
    });

    reportAssetIssues(result.assetIssues);
    console.log(chalk.green(`\nCreated: ${result.outputPath}`));
    console.log(chalk.gray(`  ${result.frameCount} frames, ${result.series.length} bars`));
  } catch (error) {
    fail(error);
  }
});

// Preview command
addStyleOptions(
  program
    .command('preview')
    .description('Render a single frame as PNG')
    .argument('<input>', 'JSON observations or market history file')
    .option('-o, --output <file>', 'Output image (default: <input>_preview.png)')
    .option('--frame <index>', 'Frame to render (default: 80% through)', parseInteger)
).action(async (input: string, flags: PreviewFlags) => {
  try {
    const options = toRenderOptions(input, flags);
    const table = await loadInputFile(input);
    const result = await createPreviewImage(table, { ...options, frameIndex: flags.frame });

    const outputPath = resolve(
      flags.output ?? `${basename(input, extname(input))}_preview.png`
    );
    await mkdir(dirname(outputPath), { recursive: true });
    await writeFile(outputPath, result.png);

    reportAssetIssues(result.assetIssues);
    if (result.frameIndex === null) {
      console.log(chalk.yellow('No frames to show; wrote the no-data placeholder'));
    } else {
      console.log(chalk.gray(`Frame ${result.frameIndex}`));
    }
    console.log(chalk.green(`Created: ${outputPath}`));
  } catch (error) {
    fail(error);
  }
});

// Inspect command
program
  .command('inspect')
  .description('Show the series and time range of an input file')
  .argument('<input>', 'JSON observations or market history file')
  .action(async (input: string) => {
    try {
      const table = await loadInputFile(input);
      const range = tableTimeRange(table);

      console.log(chalk.blue(`Series (${table.series.length}):`));
      table.series.forEach(name => console.log(`  - ${name}`));
      console.log(chalk.blue(`Timestamps: ${table.rows.length}`));
      if (range) {
        console.log(
          chalk.blue(`Range: ${formatTimestamp(range.start)} to ${formatTimestamp(range.end)}`)
        );
      }
    } catch (error) {
      fail(error);
    }
  });

await program.parseAsync();
