import chalk from 'chalk';
import ora from 'ora';
import { validateAddressArg } from './arguments.js';
import { openReadSession, resolveTarget, type TargetOptions } from '../context.js';
import type { CliEnv } from '../env.js';

export async function balanceCommand(token: string, holder: string, options: TargetOptions, env: CliEnv): Promise<void> {
  const tokenAddress = validateAddressArg(token, 'token');
  const holderAddress = validateAddressArg(holder, 'holder');
  const target = await resolveTarget(options, env);

  const spinner = ora('Reading balance').start();
  try {
    const session = await openReadSession(target, env);
    const balance = await session.tokens.balanceOf(tokenAddress, holderAddress);
    spinner.succeed(`${chalk.bold(balance.formatted)} (raw ${balance.raw}, ${balance.decimals} decimals)`);
  } catch (error) {
    spinner.fail('Balance lookup failed');
    throw error;
  }
}
