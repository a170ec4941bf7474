import type {
  ClaimRecord,
  ClaimStatus,
  Identity,
  LedgerState,
  PolicyRecord
} from '../domain/types.js';
import type { HeightStore } from '../integrations/height-clock.js';

/**
 * View of the ledger stores inside one atomic unit. Writes become visible
 * to other units only once the unit's work resolves.
 */
export interface LedgerTransaction {
  getState(): Promise<LedgerState>;
  saveState(state: LedgerState): Promise<void>;

  findPolicy(policyId: number): Promise<PolicyRecord | null>;
  insertPolicy(policy: PolicyRecord): Promise<void>;
  listPoliciesByOwner(owner: Identity): Promise<PolicyRecord[]>;

  findClaim(claimId: number): Promise<ClaimRecord | null>;
  insertClaim(claim: ClaimRecord): Promise<void>;
  saveClaimDecision(claimId: number, status: ClaimStatus, processed: boolean): Promise<void>;
  listClaimsByPolicy(policyId: number): Promise<ClaimRecord[]>;
}

/** Ledger stores plus the persisted height of an operator-driven clock. */
export interface LedgerRepository extends HeightStore {
  /** Seeds the ledger globals on first start; a no-op when they already exist. */
  initialize(administrator: Identity): Promise<void>;
  transaction<T>(work: (tx: LedgerTransaction) => Promise<T>): Promise<T>;
}

export function initialLedgerState(administrator: Identity): LedgerState {
  return {
    administrator,
    nextPolicyId: 1,
    nextClaimId: 1,
    cumulativePremiums: 0n,
    cumulativeClaimsPaid: 0n
  };
}
