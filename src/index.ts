#!/usr/bin/env node

import chalk from 'chalk';
import boxen from 'boxen';
import Table from 'cli-table3';
import ora from 'ora';
import { CliOptions, CliUsageError, HELP_TEXT, parseCliArgs } from './cliArgs.js';
import { AppConfig, loadConfig, loadDotEnv } from './config.js';
import { resolveInputFiles } from './csvInput.js';
import { LabelSheetError, describeError } from './errors.js';
import { GenerationSummary, LabelSheetGenerator, defaultOutputPath } from './labelSheetGenerator.js';

function printSummary(summary: GenerationSummary, dryRun: boolean): void {
  const filesTable = new Table({
    head: ['Source file', 'Barcodes'],
    style: { head: ['cyan'], border: ['grey'] },
    colWidths: [40, 12]
  });
  for (const file of summary.files) {
    filesTable.push([file.source, chalk.cyan(String(file.labels))]);
  }
  console.log(filesTable.toString());

  if (summary.skipped.length > 0) {
    console.log(chalk.yellow(`⚠ ${summary.skipped.length} row(s) skipped without a barcode value`));
  }

  const lines = [
    `${chalk.bold('Labels')}        ${summary.labels}`,
    `${chalk.bold('Pages')}         ${summary.pages}`,
    `${chalk.bold('Sheets needed')} ${summary.pages}`
  ];
  if (summary.outputPath) {
    lines.push(`${chalk.bold('Output')}        ${chalk.green(summary.outputPath)}`);
  }

  console.log(boxen(lines.join('\n'), {
    padding: { top: 0, bottom: 0, left: 1, right: 1 },
    borderStyle: 'round',
    borderColor: dryRun ? 'yellow' : 'green',
    title: dryRun ? 'DRY RUN' : 'PDF CREATED',
    titleAlignment: 'center'
  }));
}

async function run(options: CliOptions, config: AppConfig): Promise<void> {
  const files = await resolveInputFiles({
    files: options.files,
    directory: options.directory,
    pattern: options.pattern,
    defaultDir: config.inputDir
  });
  console.log(chalk.cyan(`Found ${files.length} CSV file(s) to process`));

  const outputPath = options.output ?? defaultOutputPath(files, config.outputDir);
  const generator = new LabelSheetGenerator({
    texts: config.texts,
    rasterDensity: config.rasterDensity,
    log: message => console.log(chalk.dim(message))
  });

  const spinner = ora(options.dryRun ? 'Laying out label sheets...' : 'Rendering label sheets...').start();
  let summary: GenerationSummary;
  try {
    summary = await generator.generate(files, outputPath, options.render, options.dryRun);
  } catch (error) {
    spinner.fail(chalk.red('Generation failed'));
    throw error;
  }

  if (summary.labels === 0) {
    spinner.warn(chalk.yellow('No barcodes found; no PDF written'));
  } else {
    spinner.succeed(chalk.green(options.dryRun ? 'Layout complete' : 'PDF created'));
  }
  printSummary(summary, options.dryRun);
}

async function main(): Promise<void> {
  let options: CliOptions;
  try {
    options = parseCliArgs(process.argv.slice(2));
  } catch (error) {
    if (error instanceof CliUsageError) {
      console.error(chalk.red(error.message));
      console.log(HELP_TEXT);
      process.exitCode = 1;
      return;
    }
    throw error;
  }

  if (options.help) {
    console.log(HELP_TEXT);
    return;
  }

  await loadDotEnv();
  await run(options, loadConfig());
}

main().catch(error => {
  if (error instanceof LabelSheetError) {
    console.error(chalk.red.bold(`\n❌ ${error.message}`));
  } else {
    console.error(chalk.red.bold('\n❌ Fatal error:'), describeError(error));
  }
  process.exitCode = 1;
});
