/**
 * Command Definitions
 */

import chalk from 'chalk';
import { Command } from 'commander';
import { setLogLevel } from '@metadata-check/utils';
import { checkCommand } from './commands/check.js';
import type { CliConfig } from './config/index.js';

export function createProgram(config: CliConfig): Command {
  const program = new Command();

  program
    .name('metadata-check')
    .description('Validate digitized-file metadata and write an annotated report')
    .version('1.0.0')
    .option('--debug', 'Enable debug logging')
    .hook('preAction', (command) => {
      setLogLevel(command.opts<{ debug?: boolean }>().debug ? 'debug' : config.logLevel);
    })
    .exitOverride((err) => {
      if (err.code === 'commander.unknownCommand' || err.code === 'commander.unknownOption') {
        console.log('Run', chalk.cyan('metadata-check --help'), 'for available options');
      }
      process.exit(err.exitCode);
    });

  program
    .command('check', { isDefault: true })
    .description('Check every row of the metadata table')
    .option('-i, --input <path>', 'Metadata table to read', config.inputPath)
    .option('-o, --output <path>', 'Report file to write', config.outputPath)
    .option('--json', 'Print the summary as JSON')
    .option('--strict', 'Exit with code 1 when any row has issues')
    .action(checkCommand);

  return program;
}
