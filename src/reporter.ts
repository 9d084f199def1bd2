import chalk from 'chalk';
import ora, { type Ora } from 'ora';
import boxen from 'boxen';
import Table from 'cli-table3';
import type { ImageTarget, ItemFailure, RunSummary, SkipReason } from './types.js';

export const SKIP_REASONS: readonly SkipReason[] = ['no_date'];

const SKIP_LABELS: Record<SkipReason, string> = {
  no_date: 'no capture date'
};

/** Events the batch runner emits while it works through the targets. */
export interface Reporter {
  start(total: number, outputDir: string): void;
  item(target: ImageTarget, index: number, total: number): void;
  saved(target: ImageTarget, outputPath: string): void;
  skipped(target: ImageTarget, reason: SkipReason): void;
  failed(failure: ItemFailure): void;
  warn(message: string): void;
  finish(summary: RunSummary): void;
}

export class ConsoleReporter implements Reporter {
  private spinner: Ora | null = null;

  start(total: number, outputDir: string): void {
    if (total === 0) {
      console.log(chalk.yellow('No images to process (jpg / jpeg / png).'));
      return;
    }
    console.log(chalk.dim(`Stamping ${total} image(s) into ${outputDir}\n`));
    this.spinner = ora({ text: 'Starting...', color: 'cyan' }).start();
  }

  item(target: ImageTarget, index: number, total: number): void {
    if (this.spinner) {
      this.spinner.text = `[${index + 1}/${total}] ${target.name}`;
    }
  }

  saved(_target: ImageTarget, outputPath: string): void {
    this.persist(spinner => spinner.succeed(chalk.green(`Saved: ${outputPath}`)));
  }

  skipped(target: ImageTarget, reason: SkipReason): void {
    this.persist(spinner => spinner.warn(chalk.yellow(`Skipped (${SKIP_LABELS[reason]}): ${target.name}`)));
  }

  failed(failure: ItemFailure): void {
    this.persist(spinner =>
      spinner.fail(chalk.red(`Failed ${failure.file}: ${failure.errorName}: ${failure.message}`))
    );
  }

  warn(message: string): void {
    this.persist(spinner => spinner.warn(chalk.yellow(message)));
  }

  finish(summary: RunSummary): void {
    this.spinner?.stop();
    this.spinner = null;

    const table = new Table({
      style: { head: ['cyan'] },
      colWidths: [24, 12]
    });
    table.push(
      ['✅ Processed', chalk.green(String(summary.processed))],
      ...SKIP_REASONS.map(reason => [
        `⏭️  Skipped (${SKIP_LABELS[reason]})`,
        chalk.yellow(String(summary.skipped[reason]))
      ]),
      ['❌ Failed', summary.failed > 0 ? chalk.red(String(summary.failed)) : chalk.dim('0')]
    );

    console.log('');
    console.log(table.toString());
    console.log(boxen(
      `${chalk.bold.white('Done.')}\n${chalk.cyan(`Output directory: ${summary.outputDir}`)}`,
      {
        padding: { top: 0, bottom: 0, left: 1, right: 1 },
        borderStyle: 'round',
        borderColor: summary.failed > 0 ? 'yellow' : 'green'
      }
    ));
    console.log('');
  }

  private persist(write: (spinner: Ora) => void): void {
    const spinner = this.spinner ?? ora();
    write(spinner);
    if (this.spinner) {
      this.spinner.start();
    }
  }
}
