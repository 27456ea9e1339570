#!/usr/bin/env node
/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * CLI for STB → IFC conversion
 *
 * Converts JSON structural models to IFC4, compares conversion strategies
 * and shows the effective configuration.
 */

import { Command } from 'commander';
import { errorMessage } from '@stb-ifc/data';
import { compareCommand, configCommand, convertCommand, type CommandResult } from './commands.js';

const program = new Command();

function report(run: () => CommandResult): void {
  try {
    const { lines, exitCode } = run();
    for (const line of lines) console.log(line);
    process.exitCode = exitCode;
  } catch (error) {
    console.error(`Error: ${errorMessage(error)}`);
    process.exit(1);
  }
}

program
  .name('stb-ifc')
  .description('Convert STB structural models to IFC4')
  .version('0.1.0')
  .option('-v, --verbose', 'Log conversion progress', false)
  .hook('preAction', () => {
    if (program.opts<{ verbose: boolean }>().verbose) {
      process.env.STB_IFC_DEBUG = 'true';
    }
  });

program
  .command('convert')
  .description('Convert a JSON model to an IFC file')
  .argument('<model>', 'Path to JSON model file')
  .option('-o, --output <file>', 'Output IFC file (default: model name with .ifc)')
  .option('-m, --mode <mode>', 'Conversion mode: legacy, element-centric, hybrid or auto')
  .option('-c, --config <file>', 'JSON config file')
  .option('--no-fallback', 'Keep the element-centric result even when it fails the quality gate')
  .action((model: string, options: { output?: string; mode?: string; config?: string; fallback: boolean }) => {
    report(() => convertCommand(model, options));
  });

program
  .command('compare')
  .description('Run legacy and element-centric conversion and compare them')
  .argument('<model>', 'Path to JSON model file')
  .option('-c, --config <file>', 'JSON config file')
  .action((model: string, options: { config?: string }) => {
    report(() => compareCommand(model, options));
  });

program
  .command('config')
  .description('Print the effective configuration')
  .option('-c, --config <file>', 'JSON config file')
  .option('-m, --mode <mode>', 'Conversion mode override')
  .action((options: { config?: string; mode?: string }) => {
    report(() => configCommand(options));
  });

program.parse();
