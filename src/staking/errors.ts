/**
 * Invalid command-line arguments or environment configuration.
 */
export class StakingConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StakingConfigError';
  }
}

/**
 * The owner key file could not be read or decrypted.
 */
export class CredentialError extends Error {
  constructor(message: string, public keyPath: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CredentialError';
  }
}

/**
 * Signing, broadcasting or waiting for a receipt failed. Transactions of the
 * same batch that were confirmed before this one stay on-chain.
 */
export class TransactionFailedError extends Error {
  constructor(
    message: string,
    public description: string,
    public txHash: string | null,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'TransactionFailedError';
  }
}
