/**
 * Check Command
 * 
 * Validate a metadata table and write the annotated report.
 */

import ora from 'ora';
import { isMetadataCheckError } from '@metadata-check/core';
import { createLogger } from '@metadata-check/utils';
import { formatSummary, runCheck } from '@metadata-check/validation';
import { printError, printInfo, printJson, printSuccess, printWarning } from '../lib/output.js';

const log = createLogger({ module: 'cli' });

export interface CheckCommandOptions {
  input: string;
  output: string;
  json?: boolean;
  strict?: boolean;
  cwd?: string;
}

/**
 * Run a check and return the process exit code
 */
export async function runCheckCommand(options: CheckCommandOptions): Promise<number> {
  const spinner = ora({ text: `Reading ${options.input}...`, isSilent: Boolean(options.json) });

  try {
    spinner.start();
    const { summary } = await runCheck({
      inputPath: options.input,
      outputPath: options.output,
      cwd: options.cwd,
      onLoaded: (table) => {
        spinner.stop();
        if (!options.json) {
          printInfo(`Loaded ${table.rows.length} rows.`);
        }
        spinner.start(`Writing ${options.output}...`);
      },
    });
    spinner.stop();

    if (options.json) {
      printJson({
        input: summary.inputPath,
        output: summary.outputPath,
        total: summary.total,
        withIssues: summary.withIssues,
      });
    } else if (summary.withIssues > 0) {
      printWarning(formatSummary(options.output, summary));
    } else {
      printSuccess(formatSummary(options.output, summary));
    }

    return options.strict && summary.withIssues > 0 ? 1 : 0;
  } catch (error) {
    spinner.fail('Check failed');

    if (isMetadataCheckError(error)) {
      log.debug({ code: error.code, details: error.details, cause: error.cause }, 'Check aborted');
      printError(error.message);
    } else {
      log.error({ err: error }, 'Unexpected error');
      printError(error instanceof Error ? error.message : 'Unknown error');
    }

    return 1;
  }
}

export async function checkCommand(options: CheckCommandOptions): Promise<void> {
  process.exitCode = await runCheckCommand(options);
}
