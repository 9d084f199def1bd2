#!/usr/bin/env node

import chalk from 'chalk';
import gradient from 'gradient-string';
import { runBatch } from './batchRunner.js';
import { loadConfig, loadDotEnv } from './config.js';
import { UserCancellationError } from './errors.js';
import { describeRequest, promptForRequest } from './prompts.js';
import { ConsoleReporter } from './reporter.js';

function showBanner(): void {
  const title = gradient.pastel.multiline([
    '╔═══════════════════════════════════════════════╗',
    '║                                               ║',
    '║     PHOTO DATESTAMP                           ║',
    '║     Capture date watermarks from EXIF         ║',
    '║                                               ║',
    '╚═══════════════════════════════════════════════╝'
  ].join('\n'));

  console.log('\n' + title + '\n');
}

function printHelp(): void {
  console.log(`
Usage: photo-datestamp

Prompts for an image file or folder, a font size, a colour and a position,
then writes date-stamped copies into <folder>_watermark next to the source folder.

Positions: left_top, left_bottom, right_top, right_bottom, center, top_center, bottom_center
           (左上, 左下, 右上, 右下, 居中, 上中, 下中)
Colours:   CSS names (white, black, ...), 白色 / 黑色 / 红色 ..., or hex (#FFFFFF)

Environment (.env is read from the working directory):
  WATERMARK_MARGIN        distance from the edge in pixels (12)
  WATERMARK_STROKE_WIDTH  outline thickness in pixels (2)
  WATERMARK_JPEG_QUALITY  JPEG quality 1-100 (95)
  WATERMARK_FONT_PATHS    extra font files to try first
`.trim());
  console.log('');
}

function cancel(): never {
  console.log(chalk.yellow('\nCancelled.'));
  process.exit(1);
}

async function main(): Promise<void> {
  await loadDotEnv();
  const config = loadConfig();

  showBanner();
  const request = await promptForRequest();
  const { input, fontSize, color, anchor } = request;

  if (input.unsupportedExtension) {
    console.log(chalk.yellow(`Unsupported file type ${input.unsupportedExtension}; expected .jpg, .jpeg or .png.`));
  }

  const [source, style] = describeRequest(request);
  console.log(chalk.cyan(`📂 ${source}`));
  console.log(chalk.dim(`   ${style}\n`));

  await runBatch(
    {
      fontSize,
      color,
      anchor,
      targets: input.targets,
      outputDir: input.outputDir
    },
    { reporter: new ConsoleReporter(), config }
  );
}

process.on('SIGINT', cancel);

const args = process.argv.slice(2).map(arg => arg.toLowerCase());
if (args.includes('-h') || args.includes('--help')) {
  printHelp();
  process.exit(0);
} else {
  main().catch(error => {
    if (error instanceof UserCancellationError) {
      cancel();
    }
    console.error(chalk.red.bold('\n❌ Fatal error:'), error);
    process.exit(1);
  });
}
