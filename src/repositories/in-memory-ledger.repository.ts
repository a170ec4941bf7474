import type {
  ClaimRecord,
  ClaimStatus,
  Identity,
  LedgerState,
  PolicyRecord
} from '../domain/types.js';
import {
  initialLedgerState,
  type LedgerRepository,
  type LedgerTransaction
} from './ledger.repository.js';

class StagedLedgerTransaction implements LedgerTransaction {
  stagedState: LedgerState | null = null;
  readonly stagedPolicies = new Map<number, PolicyRecord>();
  readonly stagedClaims = new Map<number, ClaimRecord>();

  constructor(
    private readonly state: LedgerState,
    private readonly policies: ReadonlyMap<number, PolicyRecord>,
    private readonly claims: ReadonlyMap<number, ClaimRecord>
  ) {}

  async getState(): Promise<LedgerState> {
    return { ...(this.stagedState ?? this.state) };
  }

  async saveState(state: LedgerState): Promise<void> {
    this.stagedState = { ...state };
  }

  async findPolicy(policyId: number): Promise<PolicyRecord | null> {
    const policy = this.stagedPolicies.get(policyId) ?? this.policies.get(policyId);
    return policy ? { ...policy } : null;
  }

  async insertPolicy(policy: PolicyRecord): Promise<void> {
    if (this.stagedPolicies.has(policy.policyId) || this.policies.has(policy.policyId)) {
      throw new Error(`Policy ${policy.policyId} is already stored.`);
    }
    this.stagedPolicies.set(policy.policyId, { ...policy });
  }

  async listPoliciesByOwner(owner: Identity): Promise<PolicyRecord[]> {
    return this.mergedPolicies()
      .filter((policy) => policy.owner === owner)
      .sort((a, b) => a.policyId - b.policyId);
  }

  async findClaim(claimId: number): Promise<ClaimRecord | null> {
    const claim = this.stagedClaims.get(claimId) ?? this.claims.get(claimId);
    return claim ? { ...claim } : null;
  }

  async insertClaim(claim: ClaimRecord): Promise<void> {
    if (this.stagedClaims.has(claim.claimId) || this.claims.has(claim.claimId)) {
      throw new Error(`Claim ${claim.claimId} is already stored.`);
    }
    this.stagedClaims.set(claim.claimId, { ...claim });
  }

  async saveClaimDecision(claimId: number, status: ClaimStatus, processed: boolean): Promise<void> {
    const claim = await this.findClaim(claimId);
    if (!claim) {
      throw new Error(`Claim ${claimId} is not stored.`);
    }
    this.stagedClaims.set(claimId, { ...claim, status, processed });
  }

  async listClaimsByPolicy(policyId: number): Promise<ClaimRecord[]> {
    const merged = new Map(this.claims);
    for (const [claimId, claim] of this.stagedClaims) {
      merged.set(claimId, claim);
    }
    return [...merged.values()]
      .filter((claim) => claim.policyId === policyId)
      .sort((a, b) => a.claimId - b.claimId)
      .map((claim) => ({ ...claim }));
  }

  private mergedPolicies(): PolicyRecord[] {
    const merged = new Map(this.policies);
    for (const [policyId, policy] of this.stagedPolicies) {
      merged.set(policyId, policy);
    }
    return [...merged.values()].map((policy) => ({ ...policy }));
  }
}

/** Process-lifetime ledger stores. Staged writes are applied only when a unit succeeds. */
export class InMemoryLedgerRepository implements LedgerRepository {
  private state: LedgerState | null = null;
  private readonly policies = new Map<number, PolicyRecord>();
  private readonly claims = new Map<number, ClaimRecord>();
  private height: number | null = null;

  async initialize(administrator: Identity): Promise<void> {
    if (!this.state) {
      this.state = initialLedgerState(administrator);
    }
  }

  async loadHeight(): Promise<number | null> {
    return this.height;
  }

  async saveHeight(height: number): Promise<void> {
    this.height = Math.max(this.height ?? 0, height);
  }

  async transaction<T>(work: (tx: LedgerTransaction) => Promise<T>): Promise<T> {
    if (!this.state) {
      throw new Error('Ledger repository has not been initialized.');
    }

    const tx = new StagedLedgerTransaction(this.state, this.policies, this.claims);
    const result = await work(tx);

    if (tx.stagedState) {
      this.state = tx.stagedState;
    }
    for (const [policyId, policy] of tx.stagedPolicies) {
      this.policies.set(policyId, policy);
    }
    for (const [claimId, claim] of tx.stagedClaims) {
      this.claims.set(claimId, claim);
    }

    return result;
  }
}
