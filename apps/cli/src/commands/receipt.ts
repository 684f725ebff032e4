import chalk from 'chalk';
import ora from 'ora';
import type { TransactionReceipt } from '@token-relay/chain-adapter';
import { openSession, resolveTarget, type TargetOptions } from '../context.js';
import type { CliEnv } from '../env.js';
import { validateHashArg } from './arguments.js';

export interface ReceiptOptions extends TargetOptions {
  timeout?: number;
}

export function formatReceipt(receipt: TransactionReceipt): string[] {
  const lines = [
    `Status: ${receipt.status}`,
    `Block: ${receipt.blockNumber} (${receipt.blockHash})`,
    `From: ${receipt.from}`,
  ];
  if (receipt.to) lines.push(`To: ${receipt.to}`);
  if (receipt.contractAddress) lines.push(`Contract: ${receipt.contractAddress}`);
  lines.push(`Gas used: ${receipt.gasUsed}`, `Logs: ${receipt.logs.length}`);
  return lines;
}

export function printReceipt(receipt: TransactionReceipt): void {
  const color = receipt.status === 'success' ? chalk.green : chalk.red;
  console.log(color.bold(`\nTransaction ${receipt.transactionHash}`));
  for (const line of formatReceipt(receipt)) {
    console.log(chalk.gray(`  ${line}`));
  }
}

export async function receiptCommand(hash: string, options: ReceiptOptions, env: CliEnv): Promise<void> {
  const transactionHash = validateHashArg(hash);
  const target = await resolveTarget(options, env);

  const spinner = ora('Waiting for the receipt').start();
  const controller = new AbortController();
  const onInterrupt = () => controller.abort();
  process.once('SIGINT', onInterrupt);

  try {
    const session = await openSession(target, env);
    const receipt = await session.orchestrator.awaitConfirmation(transactionHash, {
      timeoutSeconds: options.timeout,
      signal: controller.signal,
    });
    spinner.stop();
    printReceipt(receipt);
  } catch (error) {
    spinner.fail('No receipt');
    throw error;
  } finally {
    process.off('SIGINT', onInterrupt);
  }
}
