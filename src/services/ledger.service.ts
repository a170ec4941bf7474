import type { BaseLogger } from 'pino';

import { LedgerErrorKind, conflict, isLedgerError, ledgerError } from '../core/errors.js';
import {
  CLAIM_DESCRIPTION_MAX_LENGTH,
  type ClaimRecord,
  type CreatePolicyRequest,
  type Identity,
  type LedgerStats,
  type PolicyRecord,
  type ProcessClaimRequest,
  type SubmitClaimRequest
} from '../domain/types.js';
import { ManualHeightClock, type HeightClock } from '../integrations/height-clock.js';
import type { TransferGateway } from '../integrations/transfer-gateway.js';
import type { LedgerRepository, LedgerTransaction } from '../repositories/ledger.repository.js';
import { SerialQueue } from '../utils/serial-queue.js';

export interface LedgerServiceDeps {
  repository: LedgerRepository;
  transfers: TransferGateway;
  clock: HeightClock;
  logger: BaseLogger;
}

/** A policy is usable while administratively active and not past its end height. */
export function isPolicyUsable(policy: PolicyRecord, height: number): boolean {
  return policy.isActive && height <= policy.endHeight;
}

export class LedgerService {
  private readonly queue = new SerialQueue();

  constructor(private readonly deps: LedgerServiceDeps) {}

  async setAdministrator(caller: Identity, newAdministrator: Identity): Promise<boolean> {
    return this.mutate('setAdministrator', caller, async (tx) => {
      const state = await tx.getState();
      this.assertAdministrator(caller, state.administrator);

      await tx.saveState({ ...state, administrator: newAdministrator });
      return true;
    });
  }

  async createPolicy(caller: Identity, request: CreatePolicyRequest): Promise<number> {
    return this.mutate('createPolicy', caller, async (tx) => {
      if (request.coverageAmount <= 0n) {
        throw ledgerError(LedgerErrorKind.InvalidCoverage, 'Coverage amount must be greater than zero.');
      }
      if (request.premiumAmount <= 0n) {
        throw ledgerError(LedgerErrorKind.InvalidPremium, 'Premium amount must be greater than zero.');
      }
      if (!Number.isSafeInteger(request.duration) || request.duration <= 0) {
        throw ledgerError(LedgerErrorKind.InvalidDuration, 'Duration must be a positive number of blocks.');
      }
      const startHeight = await this.deps.clock.currentHeight();
      if (!Number.isSafeInteger(startHeight + request.duration)) {
        throw ledgerError(
          LedgerErrorKind.InvalidDuration,
          `Duration of ${request.duration} blocks from height ${startHeight} exceeds the largest representable height.`
        );
      }

      const state = await tx.getState();
      const policyId = state.nextPolicyId;
      if (await tx.findPolicy(policyId)) {
        throw ledgerError(LedgerErrorKind.PolicyExists, `Policy ${policyId} already exists.`);
      }

      await tx.insertPolicy({
        policyId,
        owner: caller,
        coverageAmount: request.coverageAmount,
        premiumAmount: request.premiumAmount,
        startHeight,
        endHeight: startHeight + request.duration,
        isActive: true
      });
      await tx.saveState({ ...state, nextPolicyId: policyId + 1 });

      return policyId;
    });
  }

  async payPremium(caller: Identity, policyId: number): Promise<boolean> {
    return this.mutate('payPremium', caller, async (tx) => {
      const state = await tx.getState();
      const policy = await this.requireOwnedPolicy(tx, caller, policyId);
      await this.assertUsable(policy);

      // Writes stay uncommitted until the unit resolves; funds move last.
      await tx.saveState({
        ...state,
        cumulativePremiums: state.cumulativePremiums + policy.premiumAmount
      });
      await this.transfer(policy.premiumAmount, caller, state.administrator);

      return true;
    });
  }

  async submitClaim(caller: Identity, request: SubmitClaimRequest): Promise<number> {
    return this.mutate('submitClaim', caller, async (tx) => {
      const policy = await this.requireOwnedPolicy(tx, caller, request.policyId);
      await this.assertUsable(policy);

      if (request.amount < 0n || request.amount > policy.coverageAmount) {
        throw ledgerError(
          LedgerErrorKind.InvalidClaim,
          `Claim amount ${request.amount} exceeds coverage of ${policy.coverageAmount}.`
        );
      }
      if (request.description.length > CLAIM_DESCRIPTION_MAX_LENGTH) {
        throw ledgerError(
          LedgerErrorKind.InvalidClaim,
          `Claim description exceeds ${CLAIM_DESCRIPTION_MAX_LENGTH} characters.`
        );
      }

      const state = await tx.getState();
      const claimId = state.nextClaimId;
      await tx.insertClaim({
        claimId,
        policyId: policy.policyId,
        amount: request.amount,
        description: request.description,
        status: 'PENDING',
        processed: false
      });
      await tx.saveState({ ...state, nextClaimId: claimId + 1 });

      return claimId;
    });
  }

  async processClaim(caller: Identity, request: ProcessClaimRequest): Promise<boolean> {
    return this.mutate('processClaim', caller, async (tx) => {
      const state = await tx.getState();
      this.assertAdministrator(caller, state.administrator);

      const claim = await tx.findClaim(request.claimId);
      if (!claim || claim.policyId !== request.policyId) {
        throw ledgerError(
          LedgerErrorKind.InvalidClaim,
          `Claim ${request.claimId} was not found for policy ${request.policyId}.`
        );
      }
      if (claim.processed) {
        throw ledgerError(
          LedgerErrorKind.ClaimAlreadyProcessed,
          `Claim ${claim.claimId} has already been ${claim.status.toLowerCase()}.`
        );
      }

      // Owner comes from the stored record, not from who is calling.
      const policy = await tx.findPolicy(claim.policyId);
      if (!policy) {
        throw ledgerError(LedgerErrorKind.PolicyNotFound, `Policy ${claim.policyId} was not found.`);
      }

      if (request.approved) {
        await tx.saveClaimDecision(claim.claimId, 'APPROVED', true);
        await tx.saveState({
          ...state,
          cumulativeClaimsPaid: state.cumulativeClaimsPaid + claim.amount
        });
        await this.transfer(claim.amount, state.administrator, policy.owner);
      } else {
        await tx.saveClaimDecision(claim.claimId, 'REJECTED', true);
      }

      return true;
    });
  }

  async getPolicy(caller: Identity, policyId: number): Promise<PolicyRecord | null> {
    return this.read(async (tx) => {
      const policy = await tx.findPolicy(policyId);
      return policy && policy.owner === caller ? policy : null;
    });
  }

  async getClaim(claimId: number): Promise<ClaimRecord | null> {
    return this.read((tx) => tx.findClaim(claimId));
  }

  async getPolicyOwner(policyId: number): Promise<Identity> {
    return this.read(async (tx) => {
      const policy = await tx.findPolicy(policyId);
      if (!policy) {
        throw ledgerError(LedgerErrorKind.PolicyNotFound, `Policy ${policyId} was not found.`);
      }
      return policy.owner;
    });
  }

  async isPolicyActive(caller: Identity, policyId: number): Promise<boolean> {
    return this.read(async (tx) => {
      const policy = await this.requireOwnedPolicy(tx, caller, policyId);
      return isPolicyUsable(policy, await this.deps.clock.currentHeight());
    });
  }

  async listPolicies(caller: Identity): Promise<PolicyRecord[]> {
    return this.read((tx) => tx.listPoliciesByOwner(caller));
  }

  async listClaimsForPolicy(caller: Identity, policyId: number): Promise<ClaimRecord[]> {
    return this.read(async (tx) => {
      const state = await tx.getState();
      const policy = await tx.findPolicy(policyId);
      if (!policy || (policy.owner !== caller && state.administrator !== caller)) {
        throw ledgerError(LedgerErrorKind.PolicyNotFound, `Policy ${policyId} was not found.`);
      }
      return tx.listClaimsByPolicy(policyId);
    });
  }

  async getStats(): Promise<LedgerStats> {
    return this.read(async (tx) => ({
      ...(await tx.getState()),
      currentHeight: await this.deps.clock.currentHeight()
    }));
  }

  async getBalance(account: Identity): Promise<bigint> {
    return this.deps.transfers.balanceOf(account);
  }

  /** Moves an operator-driven clock forward, persisting the new height before it takes effect. */
  async advanceClock(blocks: number): Promise<number> {
    const { clock, repository, logger } = this.deps;
    if (!(clock instanceof ManualHeightClock)) {
      throw conflict('CLOCK_NOT_MANUAL', 'The height clock is not operator-driven.');
    }

    return this.queue.run(async () => {
      const height = clock.heightAfter(blocks);
      await repository.saveHeight(height);
      clock.advance(blocks);
      logger.info({ operation: 'advanceClock', blocks, height }, 'Height clock advanced');
      return height;
    });
  }

  private read<T>(work: (tx: LedgerTransaction) => Promise<T>): Promise<T> {
    return this.queue.run(() => this.deps.repository.transaction(work));
  }

  private mutate<T>(
    operation: string,
    caller: Identity,
    work: (tx: LedgerTransaction) => Promise<T>
  ): Promise<T> {
    return this.queue.run(async () => {
      try {
        const result = await this.deps.repository.transaction(work);
        this.deps.logger.info({ operation, caller, result }, 'Ledger transition committed');
        return result;
      } catch (error) {
        if (isLedgerError(error)) {
          this.deps.logger.debug(
            { operation, caller, kind: error.kind },
            'Ledger transition rejected'
          );
        }
        throw error;
      }
    });
  }

  private assertAdministrator(caller: Identity, administrator: Identity): void {
    if (caller !== administrator) {
      throw ledgerError(LedgerErrorKind.NotAuthorized, 'Only the administrator may perform this operation.');
    }
  }

  private async requireOwnedPolicy(
    tx: LedgerTransaction,
    caller: Identity,
    policyId: number
  ): Promise<PolicyRecord> {
    const policy = await tx.findPolicy(policyId);
    if (!policy || policy.owner !== caller) {
      throw ledgerError(LedgerErrorKind.PolicyNotFound, `Policy ${policyId} was not found.`);
    }
    return policy;
  }

  private async assertUsable(policy: PolicyRecord): Promise<void> {
    const height = await this.deps.clock.currentHeight();
    if (!isPolicyUsable(policy, height)) {
      throw ledgerError(
        LedgerErrorKind.PolicyExpired,
        `Policy ${policy.policyId} is not active at height ${height}.`
      );
    }
  }

  private async transfer(amount: bigint, from: Identity, to: Identity): Promise<void> {
    const outcome = await this.deps.transfers.transfer(amount, from, to);
    if (!outcome.ok) {
      throw ledgerError(LedgerErrorKind.TransferFailed, `Transfer of ${amount} failed: ${outcome.reason}.`, {
        reason: outcome.reason
      });
    }
  }
}
