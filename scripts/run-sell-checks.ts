/**
 * Evaluate exit rules over live positions and print the result as JSON
 *
 * Usage: npm run sell-checks -- [--date YYYY-MM-DD] [--execute] [--log-level warn]
 */

import dotenv from 'dotenv';
import { Command } from 'commander';
import { loadSettings } from '../src/config/settings';
import { buildServices } from '../src/bootstrap';
import { logger } from '../src/utils/logger';
import { getErrorMessage } from '../src/utils/errors';
import { applyLogLevel, parseDateOption, printResult } from './cli-options';

dotenv.config();

interface SellCheckCliOptions {
  date?: string;
  execute: boolean;
  logLevel?: string;
}

const program = new Command()
  .name('run-sell-checks')
  .description('Check stop-loss, take-profit and hold-period rules for every strategy')
  .option('-d, --date <date>', 'date to evaluate as (YYYY-MM-DD)', parseDateOption)
  .option('-x, --execute', 'submit sell orders for every signal', false)
  .option('-l, --log-level <level>', 'winston log level');

async function main(): Promise<void> {
  program.parse();
  const options = program.opts<SellCheckCliOptions>();
  applyLogLevel(options.logLevel);

  const services = await buildServices(loadSettings());
  const result = await services.sellChecks.run({ today: options.date, execute: options.execute });

  printResult(result);
  const failed = result.executions.filter(e => e.status === 'failed').length;
  process.exitCode = failed > 0 ? 2 : 0;
}

main().catch((error: unknown) => {
  logger.error('Sell checks failed', { error: getErrorMessage(error) });
  process.exitCode = 1;
});
