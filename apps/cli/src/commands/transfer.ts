import chalk from 'chalk';
import ora from 'ora';
import { openSession, resolveTarget, type TargetOptions } from '../context.js';
import type { CliEnv } from '../env.js';
import { validateAddressArg } from './arguments.js';
import { printReceipt } from './receipt.js';

export interface TransferOptions extends TargetOptions {
  wait?: boolean;
  timeout?: number;
}

export async function transferCommand(
  token: string,
  to: string,
  amount: string,
  options: TransferOptions,
  env: CliEnv
): Promise<void> {
  const tokenAddress = validateAddressArg(token, 'token');
  const recipient = validateAddressArg(to, 'recipient');
  const target = await resolveTarget(options, env);

  const spinner = ora(`Sending ${amount} to ${recipient}`).start();
  try {
    const session = await openSession(target, env);
    const hash = await session.tokens.transfer({ token: tokenAddress, to: recipient, amount });
    spinner.succeed(`Transaction broadcast: ${chalk.green(hash)}`);

    if (!options.wait) {
      console.log(chalk.gray(`Check it later with: token-relay receipt ${hash}`));
      return;
    }

    spinner.start('Waiting for confirmation');
    const receipt = await session.orchestrator.awaitConfirmation(hash, { timeoutSeconds: options.timeout });
    spinner.stop();
    printReceipt(receipt);
  } catch (error) {
    spinner.fail('Transfer failed');
    throw error;
  }
}
