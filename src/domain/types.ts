/** Opaque identity of the party invoking an operation (a checksummed wallet address over HTTP). */
export type Identity = string;

export type ClaimStatus = 'PENDING' | 'APPROVED' | 'REJECTED';

export const CLAIM_DESCRIPTION_MAX_LENGTH = 256;

export interface PolicyRecord {
  policyId: number;
  owner: Identity;
  coverageAmount: bigint;
  premiumAmount: bigint;
  startHeight: number;
  endHeight: number;
  isActive: boolean;
}

export interface ClaimRecord {
  claimId: number;
  policyId: number;
  amount: bigint;
  description: string;
  status: ClaimStatus;
  processed: boolean;
}

export interface LedgerState {
  administrator: Identity;
  nextPolicyId: number;
  nextClaimId: number;
  cumulativePremiums: bigint;
  cumulativeClaimsPaid: bigint;
}

export interface CreatePolicyRequest {
  coverageAmount: bigint;
  premiumAmount: bigint;
  duration: number;
}

export interface SubmitClaimRequest {
  policyId: number;
  amount: bigint;
  description: string;
}

export interface ProcessClaimRequest {
  claimId: number;
  policyId: number;
  approved: boolean;
}

export interface LedgerStats extends LedgerState {
  currentHeight: number;
}

// Wire shapes: amounts travel as decimal strings.

export interface PolicyView {
  policyId: number;
  owner: Identity;
  coverageAmount: string;
  premiumAmount: string;
  startHeight: number;
  endHeight: number;
  isActive: boolean;
}

export interface ClaimView {
  claimId: number;
  policyId: number;
  amount: string;
  description: string;
  status: ClaimStatus;
  processed: boolean;
}

export interface LedgerStatsView {
  administrator: Identity;
  nextPolicyId: number;
  nextClaimId: number;
  cumulativePremiums: string;
  cumulativeClaimsPaid: string;
  currentHeight: number;
}

export function toPolicyView(policy: PolicyRecord): PolicyView {
  return {
    ...policy,
    coverageAmount: policy.coverageAmount.toString(),
    premiumAmount: policy.premiumAmount.toString()
  };
}

export function toClaimView(claim: ClaimRecord): ClaimView {
  return {
    ...claim,
    amount: claim.amount.toString()
  };
}

export function toLedgerStatsView(stats: LedgerStats): LedgerStatsView {
  return {
    ...stats,
    cumulativePremiums: stats.cumulativePremiums.toString(),
    cumulativeClaimsPaid: stats.cumulativeClaimsPaid.toString()
  };
}
