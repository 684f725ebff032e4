import type { TokenBalance, TransactionReceipt } from '@token-relay/chain-adapter';

// JSON has no bigint: quantities go out as decimal strings

export function serializeBalance(balance: TokenBalance) {
  return { ...balance, raw: balance.raw.toString() };
}

export function serializeReceipt(receipt: TransactionReceipt) {
  return {
    ...receipt,
    blockNumber: receipt.blockNumber.toString(),
    gasUsed: receipt.gasUsed.toString(),
    effectiveGasPrice: receipt.effectiveGasPrice.toString(),
  };
}
