import chalk from 'chalk';
import ora from 'ora';
import { FaucetClient, resolveNetworkEndpoint } from '@token-relay/chain-adapter';
import { AddressSchema, ConfigurationError } from '@token-relay/core';
import { networkLabel, resolveTarget, type TargetOptions } from '../context.js';
import type { CliEnv } from '../env.js';

export interface FaucetOptions extends TargetOptions {
  address?: string;
}

export async function faucetCommand(options: FaucetOptions, env: CliEnv): Promise<void> {
  const address = AddressSchema.safeParse(options.address ?? env.WALLET_ADDRESS);
  if (!address.success) {
    throw new ConfigurationError('Pass --address or set WALLET_ADDRESS to a valid address');
  }

  const target = await resolveTarget(options, env);
  const endpoint = resolveNetworkEndpoint(target.chain, target.network, {
    alchemyApiKey: env.ALCHEMY_API_KEY,
    rpcUrl: env.RPC_URL,
  });

  const spinner = ora(`Requesting ${networkLabel(endpoint.network)} funds for ${address.data}`).start();
  const result = await new FaucetClient(endpoint).requestTestnetTokens(address.data).catch((error: unknown) => {
    spinner.fail('Faucet request failed');
    throw error;
  });

  if (result.success) {
    spinner.succeed(`Faucet accepted the request for ${chalk.green(address.data)}`);
  } else {
    spinner.fail(`Faucet refused the request (HTTP ${result.status})`);
    process.exitCode = 1;
  }
}
