import { createInterface } from 'readline';
import { InvalidArgumentError } from 'commander';
import { isIsoDate } from '../src/utils/dates';
import { logger } from '../src/utils/logger';
import { promptApprovalGate } from '../src/orchestrator';
import type { ApprovalGate, ApprovalTimeoutAction } from '../src/orchestrator';

export function parseDateOption(value: string): string {
  if (!isIsoDate(value)) {
    throw new InvalidArgumentError('Expected a date as YYYY-MM-DD.');
  }
  return value;
}

/**
 * Keep stdout readable for the JSON result unless asked for more.
 */
export function applyLogLevel(level: string | undefined): void {
  if (level) {
    logger.level = level;
  }
}

export function printResult(result: unknown): void {
  console.log(JSON.stringify(result, null, 2));
}

/**
 * Ask on the terminal. Prompts go to stderr so stdout stays pure JSON.
 */
export function terminalApprovalGate(timeoutMs: number, timeoutAction: ApprovalTimeoutAction): ApprovalGate {
  return promptApprovalGate({
    timeoutMs,
    timeoutAction,
    print: line => console.error(line),
    ask: (question, signal) =>
      new Promise<string>(resolve => {
        const rl = createInterface({ input: process.stdin, output: process.stderr });
        const close = () => rl.close();
        signal.addEventListener('abort', close, { once: true });
        rl.question(question, answer => {
          signal.removeEventListener('abort', close);
          rl.close();
          resolve(answer);
        });
      }),
  });
}
