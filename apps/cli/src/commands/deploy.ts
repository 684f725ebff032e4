import chalk from 'chalk';
import ora from 'ora';
import type { AbiParameter } from 'viem';
import { constructorInputs, coerceConstructorArg, hasFunction, loadArtifact } from '../artifact.js';
import { openSession, resolveTarget, type TargetOptions } from '../context.js';
import type { CliEnv } from '../env.js';
import { askText } from '../prompts.js';

export interface DeployOptions extends TargetOptions {
  artifact: string;
  timeout?: number;
}

async function promptForArgs(inputs: readonly AbiParameter[]): Promise<unknown[]> {
  if (inputs.length > 0) {
    console.log(chalk.blue('\nConstructor arguments:'));
  }

  const args: unknown[] = [];
  for (const [index, param] of inputs.entries()) {
    const label = `${param.name || `arg${index}`} (${param.type}) >`;
    const raw = await askText(label, {
      validate: (input) => {
        try {
          coerceConstructorArg(param, input);
          return true;
        } catch (error) {
          return error instanceof Error ? error.message : String(error);
        }
      },
    });
    args.push(coerceConstructorArg(param, raw));
  }
  return args;
}

export async function deployCommand(options: DeployOptions, env: CliEnv): Promise<void> {
  const artifact = await loadArtifact(options.artifact);
  const target = await resolveTarget(options, env);
  const args = await promptForArgs(constructorInputs(artifact.abi));

  const spinner = ora('Connecting').start();
  try {
    const session = await openSession(target, env);
    const timeoutSeconds = options.timeout ?? env.CONFIRMATION_TIMEOUT_SECONDS;
    spinner.text = `Deploying from ${session.credential.address}; waiting up to ${timeoutSeconds}s for the receipt`;

    const result = await session.orchestrator.deployContract({
      abi: artifact.abi,
      bytecode: artifact.bytecode,
      args,
      timeoutSeconds,
    });
    spinner.succeed(`Contract deployed at ${chalk.green(result.contractAddress)}`);
    console.log(chalk.gray(`Transaction: ${result.transactionHash}`));
    console.log(chalk.gray(`Block: ${result.receipt.blockNumber} | Gas used: ${result.receipt.gasUsed}`));

    if (hasFunction(artifact.abi, 'balanceOf') && hasFunction(artifact.abi, 'decimals')) {
      const balance = await session.tokens.balanceOf(result.contractAddress, session.credential.address);
      console.log(
        `An initial supply of ${chalk.bold(balance.formatted)} for token ${result.contractAddress} ` +
          `has been added to deployer wallet ${session.credential.address}`
      );
    }
  } catch (error) {
    spinner.fail('Deployment failed');
    throw error;
  }
}
