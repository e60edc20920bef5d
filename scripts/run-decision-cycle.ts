/**
 * Run one decision cycle and print the result as JSON
 *
 * Usage: npm run cycle -- [--date YYYY-MM-DD] [--force] [--interactive] [--log-level warn]
 *
 * Exit code 0 for ok or skipped, 2 when the cycle hit its timeout.
 */

import dotenv from 'dotenv';
import { Command } from 'commander';
import { loadSettings } from '../src/config/settings';
import { buildServices } from '../src/bootstrap';
import { logger } from '../src/utils/logger';
import { getErrorMessage } from '../src/utils/errors';
import { applyLogLevel, parseDateOption, printResult, terminalApprovalGate } from './cli-options';

dotenv.config();

interface CycleOptions {
  date?: string;
  force: boolean;
  interactive: boolean;
  logLevel?: string;
}

const program = new Command()
  .name('run-decision-cycle')
  .description('Merge signals, decide and execute one cycle for every strategy')
  .option('-d, --date <date>', 'trading date to run as (YYYY-MM-DD)', parseDateOption)
  .option('-f, --force', 'skip the trading-day and spacing checks', false)
  .option('-i, --interactive', 'approve picks on the terminal before buying', false)
  .option('-l, --log-level <level>', 'winston log level');

async function main(): Promise<void> {
  program.parse();
  const options = program.opts<CycleOptions>();
  applyLogLevel(options.logLevel);

  const settings = loadSettings();
  const approve = options.interactive
    ? terminalApprovalGate(settings.approval.timeoutMs, settings.approval.timeoutAction)
    : undefined;

  const services = await buildServices(settings, { approve });
  const result = await services.cycle.run({ today: options.date, force: options.force });

  printResult(result);
  process.exitCode = result.status === 'aborted' ? 2 : 0;
}

main().catch((error: unknown) => {
  logger.error('Decision cycle failed', { error: getErrorMessage(error) });
  process.exitCode = 1;
});
