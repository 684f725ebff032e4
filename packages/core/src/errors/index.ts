export interface ErrorOptions {
  context?: Record<string, unknown>;
  cause?: unknown;
}

export class TokenRelayError extends Error {
  public readonly context?: Record<string, unknown>;
  public override readonly cause?: unknown;

  constructor(
    message: string,
    public readonly code: string,
    public readonly statusCode: number = 500,
    options: ErrorOptions = {}
  ) {
    super(message);
    this.name = 'TokenRelayError';
    this.context = options.context;
    this.cause = options.cause;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      ...(this.cause instanceof Error ? { cause: this.cause.message } : {}),
    };
  }
}

/**
 * Caller mistakes detected before any network I/O.
 */
export class ConfigurationError extends TokenRelayError {
  constructor(message: string, code = 'CONFIGURATION_ERROR', options: ErrorOptions = {}) {
    super(message, code, 400, options);
    this.name = 'ConfigurationError';
  }
}

export class UnsupportedChainError extends ConfigurationError {
  constructor(public readonly chain: string, supported: readonly string[]) {
    super(`Unsupported chain "${chain}". Supported chains are: ${supported.join(', ')}.`, 'UNSUPPORTED_CHAIN', {
      context: { chain, supported },
    });
    this.name = 'UnsupportedChainError';
  }
}

export class UnsupportedNetworkError extends ConfigurationError {
  constructor(public readonly network: string, supported: readonly string[]) {
    super(
      `Unsupported network type "${network}". Supported networks are: ${supported.join(', ')}.`,
      'UNSUPPORTED_NETWORK',
      { context: { network, supported } }
    );
    this.name = 'UnsupportedNetworkError';
  }
}

export class InvalidTransactionFieldError extends ConfigurationError {
  /**
   * @param invalidFields - the offending keys with the values that were passed for them
   * @param receivedFields - every key the caller passed, valid or not
   */
  constructor(
    public readonly invalidFields: Record<string, unknown>,
    public readonly receivedFields: string[],
    allowed: readonly string[]
  ) {
    super(
      `One or more transaction fields are invalid: ${Object.keys(invalidFields).join(', ')}. ` +
        `Received: ${receivedFields.join(', ')}. Allowed: ${allowed.join(', ')}.`,
      'INVALID_TRANSACTION_FIELD',
      { context: { invalidFields: Object.keys(invalidFields), receivedFields } }
    );
    this.name = 'InvalidTransactionFieldError';
  }
}

export class InvalidAmountError extends ConfigurationError {
  constructor(public readonly amount: string, reason: string) {
    super(`Invalid token amount "${amount}": ${reason}`, 'INVALID_AMOUNT', { context: { amount } });
    this.name = 'InvalidAmountError';
  }
}

export class ConnectivityError extends TokenRelayError {
  constructor(message: string, options: ErrorOptions = {}) {
    super(message, 'CONNECTIVITY_ERROR', 503, options);
    this.name = 'ConnectivityError';
  }
}

/**
 * The node refused the transaction. Terminal for this attempt: the caller
 * has to rebuild with a fresh or bumped nonce.
 */
export class NetworkRejectionError extends TokenRelayError {
  constructor(message: string, public readonly transactionHash?: string, options: ErrorOptions = {}) {
    super(message, 'NETWORK_REJECTION', 422, {
      ...options,
      context: { transactionHash, ...options.context },
    });
    this.name = 'NetworkRejectionError';
  }
}

/**
 * No receipt arrived before the deadline. The transaction may still be
 * pending or confirm later, so this is an unknown outcome, not a failure.
 */
export class ConfirmationTimeoutError extends TokenRelayError {
  constructor(public readonly transactionHash: string, public readonly timeoutSeconds: number) {
    super(
      `Transaction ${transactionHash} was not confirmed within ${timeoutSeconds} seconds; it may still be pending.`,
      'CONFIRMATION_TIMEOUT',
      504,
      { context: { transactionHash, timeoutSeconds } }
    );
    this.name = 'ConfirmationTimeoutError';
  }
}

export class ConfirmationCancelledError extends TokenRelayError {
  constructor(public readonly transactionHash: string, options: ErrorOptions = {}) {
    super(`Stopped waiting for transaction ${transactionHash}; its outcome is unknown.`, 'CONFIRMATION_CANCELLED', 499, {
      ...options,
      context: { transactionHash },
    });
    this.name = 'ConfirmationCancelledError';
  }
}

export class SigningError extends TokenRelayError {
  constructor(message: string, options: ErrorOptions = {}) {
    super(message, 'SIGNING_ERROR', 422, options);
    this.name = 'SigningError';
  }
}

export class ContractDeploymentError extends TokenRelayError {
  constructor(message: string, public readonly transactionHash: string) {
    super(message, 'CONTRACT_DEPLOYMENT_FAILED', 502, { context: { transactionHash } });
    this.name = 'ContractDeploymentError';
  }
}

export function isTokenRelayError(error: unknown): error is TokenRelayError {
  return error instanceof TokenRelayError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
