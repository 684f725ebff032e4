import { readFile } from 'node:fs/promises';
import { isAddress, isHex, type Abi, type AbiParameter, type Hex } from 'viem';
import { z } from 'zod';
import { ConfigurationError, errorMessage, formatZodIssues } from '@token-relay/core';

export interface ContractArtifact {
  abi: Abi;
  bytecode: Hex;
}

const AbiSchema = z.custom<Abi>(
  (value) =>
    Array.isArray(value) &&
    value.every((item) => typeof item === 'object' && item !== null && 'type' in item),
  { message: 'abi must be an array of ABI items' }
);

// solc emits bytecode without the 0x prefix
const BytecodeSchema = z
  .string()
  .transform((value) => (value.startsWith('0x') ? value : `0x${value}`))
  .refine((value): value is Hex => isHex(value) && value.length > 2, { message: 'bytecode must be non-empty hex' });

const ArtifactSchema = z.object({
  abi: AbiSchema,
  // Hardhat writes a string, Foundry `{ object }`
  bytecode: z.union([BytecodeSchema, z.object({ object: BytecodeSchema }).transform((value) => value.object)]),
});

export function parseArtifact(json: unknown): ContractArtifact {
  const result = ArtifactSchema.safeParse(json);
  if (!result.success) {
    throw new ConfigurationError(`Invalid contract artifact: ${formatZodIssues(result.error)}`, 'INVALID_ARTIFACT');
  }
  return result.data;
}

export async function loadArtifact(path: string): Promise<ContractArtifact> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (error) {
    throw new ConfigurationError(`Cannot read artifact ${path}: ${errorMessage(error)}`, 'INVALID_ARTIFACT');
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    throw new ConfigurationError(`Artifact ${path} is not valid JSON: ${errorMessage(error)}`, 'INVALID_ARTIFACT');
  }
  return parseArtifact(json);
}

export function constructorInputs(abi: Abi): readonly AbiParameter[] {
  for (const item of abi) {
    if (item.type === 'constructor') {
      return item.inputs;
    }
  }
  return [];
}

export function hasFunction(abi: Abi, name: string): boolean {
  return abi.some((item) => item.type === 'function' && item.name === name);
}

function invalid(param: AbiParameter, raw: string, expected: string): ConfigurationError {
  return new ConfigurationError(
    `Invalid value "${raw}" for ${param.name ?? 'argument'} (${param.type}): expected ${expected}`,
    'INVALID_ARGUMENT'
  );
}

/**
 * Turn a typed-in string into the value viem expects for an ABI parameter.
 * Arrays and tuples are entered as JSON.
 */
export function coerceConstructorArg(param: AbiParameter, raw: string): unknown {
  const value = raw.trim();
  const type = param.type;

  if (type.endsWith(']') || type === 'tuple') {
    try {
      return JSON.parse(value);
    } catch {
      throw invalid(param, raw, 'a JSON value');
    }
  }
  if (/^u?int\d*$/.test(type)) {
    const pattern = type.startsWith('u') ? /^\d+$/ : /^-?\d+$/;
    if (!pattern.test(value)) {
      throw invalid(param, raw, 'an integer');
    }
    return BigInt(value);
  }
  if (type === 'bool') {
    if (value !== 'true' && value !== 'false') {
      throw invalid(param, raw, 'true or false');
    }
    return value === 'true';
  }
  if (type === 'address') {
    if (!isAddress(value)) {
      throw invalid(param, raw, 'an address');
    }
    return value;
  }
  if (type.startsWith('bytes')) {
    if (!isHex(value)) {
      throw invalid(param, raw, 'hex data');
    }
    return value;
  }
  return raw;
}
