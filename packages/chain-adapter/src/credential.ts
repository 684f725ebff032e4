import { privateKeyToAccount, type PrivateKeyAccount } from 'viem/accounts';
import type { Address, TransactionSerializable, TransactionSerialized } from 'viem';
import { SigningError } from '@token-relay/core';

const PRIVATE_KEY_PATTERN = /^0x[0-9a-fA-F]{64}$/;

/**
 * A signing key and the address derived from it. Serializes to the address
 * only, so it is safe to pass to the logger.
 */
export class Credential {
  readonly address: Address;
  private readonly account: PrivateKeyAccount;

  private constructor(account: PrivateKeyAccount) {
    this.account = account;
    this.address = account.address;
  }

  static fromPrivateKey(privateKey: string): Credential {
    const normalized = privateKey.startsWith('0x') ? privateKey : `0x${privateKey}`;
    if (!PRIVATE_KEY_PATTERN.test(normalized)) {
      throw new SigningError('Private key must be 32 bytes of hex');
    }

    try {
      return new Credential(privateKeyToAccount(`0x${normalized.slice(2)}`));
    } catch (error) {
      throw new SigningError('Private key is not a valid secp256k1 key', { cause: error });
    }
  }

  async signTransaction(transaction: TransactionSerializable): Promise<TransactionSerialized> {
    return this.account.signTransaction(transaction);
  }

  toJSON(): { address: Address } {
    return { address: this.address };
  }

  toString(): string {
    return `Credential(${this.address})`;
  }
}
