/**
 * Owner-signed transaction submission with blocking receipt confirmation.
 *
 * A batch is sent strictly in order: the next transaction is only signed after
 * the previous one has a successful receipt. Nothing is retried; the first
 * failure is thrown and earlier confirmations stand.
 */

import { txLogger, serializeError } from '../logging/index.js';
import { TransactionFailedError } from './errors.js';
import type { TransactionBatch, UnsignedStakingTransaction } from './transactions.js';

export interface ConfirmableReceipt {
  hash: string;
  status: number | null;
  blockNumber: number;
  gasUsed: bigint;
}

export interface PendingTransaction {
  hash: string;
  wait(confirms?: number, timeout?: number): Promise<ConfirmableReceipt | null>;
}

/**
 * The part of an ethers signer the submitter needs; `Wallet` satisfies it.
 */
export interface TransactionSender {
  sendTransaction(tx: { to: string; data: string; value: bigint }): Promise<PendingTransaction>;
}

export interface ConfirmedTransaction {
  kind: UnsignedStakingTransaction['kind'];
  description: string;
  hash: string;
  blockNumber: number;
  gasUsed: bigint;
}

export interface TransactionSubmitter {
  submitAndConfirm(tx: UnsignedStakingTransaction): Promise<ConfirmedTransaction>;
}

export interface SubmitterOptions {
  confirmations: number;
  receiptTimeoutMs: number;
}

export class OwnerTransactionSubmitter implements TransactionSubmitter {
  constructor(
    private readonly sender: TransactionSender,
    private readonly options: SubmitterOptions,
  ) {}

  async submitAndConfirm(tx: UnsignedStakingTransaction): Promise<ConfirmedTransaction> {
    let pending: PendingTransaction;
    try {
      pending = await this.sender.sendTransaction({ to: tx.to, data: tx.data, value: tx.value });
    } catch (error) {
      txLogger.error({ description: tx.description, error: serializeError(error) }, 'Failed to sign or broadcast transaction');
      throw new TransactionFailedError(`Failed to send transaction (${tx.description})`, tx.description, null, { cause: error });
    }

    txLogger.info({ txHash: pending.hash, description: tx.description }, 'Transaction sent, waiting for receipt');

    let receipt: ConfirmableReceipt | null;
    try {
      receipt = await pending.wait(this.options.confirmations, this.options.receiptTimeoutMs);
    } catch (error) {
      txLogger.error({ txHash: pending.hash, error: serializeError(error) }, 'Waiting for receipt failed');
      throw new TransactionFailedError(
        `Transaction ${pending.hash} was not confirmed (${tx.description})`,
        tx.description,
        pending.hash,
        { cause: error },
      );
    }

    if (!receipt) {
      throw new TransactionFailedError(`No receipt for transaction ${pending.hash} (${tx.description})`, tx.description, pending.hash);
    }

    if (receipt.status !== 1) {
      throw new TransactionFailedError(`Transaction ${receipt.hash} reverted (${tx.description})`, tx.description, receipt.hash);
    }

    txLogger.info({
      txHash: receipt.hash,
      block: receipt.blockNumber,
      gasUsed: receipt.gasUsed.toString(),
    }, 'Transaction confirmed');

    return {
      kind: tx.kind,
      description: tx.description,
      hash: receipt.hash,
      blockNumber: receipt.blockNumber,
      gasUsed: receipt.gasUsed,
    };
  }
}

/**
 * Submit every transaction of `batch` in order, waiting for each receipt.
 */
export async function submitBatch(
  submitter: TransactionSubmitter,
  batch: TransactionBatch,
): Promise<ConfirmedTransaction[]> {
  const confirmed: ConfirmedTransaction[] = [];
  for (const tx of batch) {
    confirmed.push(await submitter.submitAndConfirm(tx));
  }
  return confirmed;
}
