#!/usr/bin/env tsx

import 'dotenv/config';
import { Command } from 'commander';
import chalk from 'chalk';
import { errorMessage, isTokenRelayError } from '@token-relay/core';
import { getCliEnv } from './env.js';
import { balanceCommand } from './commands/balance.js';
import { deployCommand, type DeployOptions } from './commands/deploy.js';
import { faucetCommand, type FaucetOptions } from './commands/faucet.js';
import { receiptCommand, type ReceiptOptions } from './commands/receipt.js';
import { transferCommand, type TransferOptions } from './commands/transfer.js';
import { parsePositiveInt } from './commands/arguments.js';
import type { TargetOptions } from './context.js';

function fail(error: unknown): void {
  const prefix = isTokenRelayError(error) ? `[${error.code}] ` : '';
  console.error(chalk.red(`Error: ${prefix}${errorMessage(error)}`));
  process.exitCode = 1;
}

function withTarget(command: Command): Command {
  return command
    .option('-c, --chain <chain>', 'Chain name (default: CHAIN or prompt)')
    .option('-n, --network <network>', 'Network type (default: NETWORK or prompt)');
}

const program = new Command();

program
  .name('token-relay')
  .description('Deploy and move ERC-20 tokens on Ethereum')
  .version('1.0.0');

withTarget(program.command('deploy'))
  .description('Deploy a compiled contract artifact ({ abi, bytecode } JSON)')
  .requiredOption('-a, --artifact <file>', 'Path to the compiled artifact')
  .option('-t, --timeout <seconds>', 'Seconds to wait for the receipt', parsePositiveInt)
  .action(async (options: DeployOptions) => {
    await deployCommand(options, getCliEnv()).catch(fail);
  });

withTarget(program.command('faucet'))
  .description('Request testnet funds from the network faucet')
  .option('--address <address>', 'Recipient (default: WALLET_ADDRESS)')
  .action(async (options: FaucetOptions) => {
    await faucetCommand(options, getCliEnv()).catch(fail);
  });

withTarget(program.command('balance'))
  .description('Show the token balance of an address')
  .argument('<token>', 'Token contract address')
  .argument('<holder>', 'Holder address')
  .action(async (token: string, holder: string, options: TargetOptions) => {
    await balanceCommand(token, holder, options, getCliEnv()).catch(fail);
  });

withTarget(program.command('transfer'))
  .description('Transfer tokens from the configured key')
  .argument('<token>', 'Token contract address')
  .argument('<to>', 'Recipient address')
  .argument('<amount>', 'Decimal amount, e.g. 12.5')
  .option('-w, --wait', 'Wait for the receipt')
  .option('-t, --timeout <seconds>', 'Seconds to wait with --wait', parsePositiveInt)
  .action(async (token: string, to: string, amount: string, options: TransferOptions) => {
    await transferCommand(token, to, amount, options, getCliEnv()).catch(fail);
  });

withTarget(program.command('receipt'))
  .description('Wait for a transaction receipt')
  .argument('<hash>', 'Transaction hash')
  .option('-t, --timeout <seconds>', 'Seconds to wait', parsePositiveInt)
  .action(async (hash: string, options: ReceiptOptions) => {
    await receiptCommand(hash, options, getCliEnv()).catch(fail);
  });

program.parseAsync().catch(fail);
