import type { Identity } from '../domain/types.js';
import { badRequest } from '../core/errors.js';

export type TransferFailureReason =
  | 'INSUFFICIENT_BALANCE'
  | 'SENDER_IS_RECIPIENT'
  | 'NON_POSITIVE_AMOUNT';

export type TransferResult =
  | { ok: true }
  | { ok: false; reason: TransferFailureReason };

/** Moves currency between parties. Either the whole amount moves or nothing does. */
export interface TransferGateway {
  transfer(amount: bigint, from: Identity, to: Identity): Promise<TransferResult>;
  balanceOf(account: Identity): Promise<bigint>;
}

/**
 * Balance book kept in process memory. Accounts are funded through `credit`,
 * which stands in for whatever currency issuance backs a real deployment.
 */
export class InMemoryTransferGateway implements TransferGateway {
  private readonly balances = new Map<Identity, bigint>();

  constructor(initialBalances: Record<Identity, bigint> = {}) {
    for (const [account, amount] of Object.entries(initialBalances)) {
      this.credit(account, amount);
    }
  }

  async transfer(amount: bigint, from: Identity, to: Identity): Promise<TransferResult> {
    if (amount <= 0n) {
      return { ok: false, reason: 'NON_POSITIVE_AMOUNT' };
    }
    if (from === to) {
      return { ok: false, reason: 'SENDER_IS_RECIPIENT' };
    }

    const available = this.balances.get(from) ?? 0n;
    if (available < amount) {
      return { ok: false, reason: 'INSUFFICIENT_BALANCE' };
    }

    this.balances.set(from, available - amount);
    this.balances.set(to, (this.balances.get(to) ?? 0n) + amount);
    return { ok: true };
  }

  async balanceOf(account: Identity): Promise<bigint> {
    return this.balances.get(account) ?? 0n;
  }

  credit(account: Identity, amount: bigint): bigint {
    if (amount <= 0n) {
      throw badRequest('INVALID_CREDIT_AMOUNT', 'Credit amount must be positive.');
    }
    const next = (this.balances.get(account) ?? 0n) + amount;
    this.balances.set(account, next);
    return next;
  }
}
