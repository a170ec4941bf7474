import type { BaseLogger } from 'pino';

import type { ConnectionSource, DatabaseConnection } from '../core/database.js';

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

export type LedgerStateRow = {
  administrator: string;
  next_policy_id: string;
  next_claim_id: string;
  cumulative_premiums: string;
  cumulative_claims_paid: string;
};

type ClockHeightRow = {
  clock_height: string | null;
};

export type PolicyRow = {
  policy_id: string;
  owner: string;
  coverage_amount: string;
  premium_amount: string;
  start_height: string;
  end_height: string;
  is_active: boolean;
};

export type ClaimRow = {
  claim_id: string;
  policy_id: string;
  amount: string;
  description: string;
  status: ClaimStatus;
  processed: boolean;
};

const SEED_STATE = `
INSERT INTO ledger_state (
  id,
  administrator,
  next_policy_id,
  next_claim_id,
  cumulative_premiums,
  cumulative_claims_paid
) VALUES (1,$1,$2,$3,$4,$5)
ON CONFLICT (id) DO NOTHING
`;

// Row lock serialises writers across processes sharing the database.
const SELECT_STATE = 'SELECT * FROM ledger_state WHERE id = 1 FOR UPDATE';
const UPDATE_STATE = `
UPDATE ledger_state
SET administrator = $1,
    next_policy_id = $2,
    next_claim_id = $3,
    cumulative_premiums = $4,
    cumulative_claims_paid = $5,
    updated_at = NOW()
WHERE id = 1
`;

const SELECT_CLOCK_HEIGHT = 'SELECT clock_height FROM ledger_state WHERE id = 1';
const SAVE_CLOCK_HEIGHT = `
UPDATE ledger_state
SET clock_height = GREATEST(COALESCE(clock_height, 0), $1),
    updated_at = NOW()
WHERE id = 1
`;

const INSERT_POLICY = `
INSERT INTO ledger_policies (
  policy_id,
  owner,
  coverage_amount,
  premium_amount,
  start_height,
  end_height,
  is_active
) VALUES ($1,$2,$3,$4,$5,$6,$7)
`;
const SELECT_POLICY = 'SELECT * FROM ledger_policies WHERE policy_id = $1';
const SELECT_POLICIES_BY_OWNER = 'SELECT * FROM ledger_policies WHERE owner = $1 ORDER BY policy_id ASC';

const INSERT_CLAIM = `
INSERT INTO ledger_claims (
  claim_id,
  policy_id,
  amount,
  description,
  status,
  processed
) VALUES ($1,$2,$3,$4,$5,$6)
`;
const SELECT_CLAIM = 'SELECT * FROM ledger_claims WHERE claim_id = $1';
const SELECT_CLAIMS_BY_POLICY = 'SELECT * FROM ledger_claims WHERE policy_id = $1 ORDER BY claim_id ASC';
const UPDATE_CLAIM_DECISION = 'UPDATE ledger_claims SET status = $2, processed = $3 WHERE claim_id = $1';

export function mapStateRow(row: LedgerStateRow): LedgerState {
  return {
    administrator: row.administrator,
    nextPolicyId: Number(row.next_policy_id),
    nextClaimId: Number(row.next_claim_id),
    cumulativePremiums: BigInt(row.cumulative_premiums),
    cumulativeClaimsPaid: BigInt(row.cumulative_claims_paid)
  };
}

export function mapPolicyRow(row: PolicyRow): PolicyRecord {
  return {
    policyId: Number(row.policy_id),
    owner: row.owner,
    coverageAmount: BigInt(row.coverage_amount),
    premiumAmount: BigInt(row.premium_amount),
    startHeight: Number(row.start_height),
    endHeight: Number(row.end_height),
    isActive: row.is_active
  };
}

export function mapClaimRow(row: ClaimRow): ClaimRecord {
  return {
    claimId: Number(row.claim_id),
    policyId: Number(row.policy_id),
    amount: BigInt(row.amount),
    description: row.description,
    status: row.status,
    processed: row.processed
  };
}

class PostgresLedgerTransaction implements LedgerTransaction {
  constructor(private readonly client: DatabaseConnection) {}

  async getState(): Promise<LedgerState> {
    const result = await this.client.query<LedgerStateRow>(SELECT_STATE);
    const row = result.rows[0];
    if (!row) {
      throw new Error('Ledger state row is missing. Was the repository initialized?');
    }
    return mapStateRow(row);
  }

  async saveState(state: LedgerState): Promise<void> {
    await this.client.query(UPDATE_STATE, [
      state.administrator,
      state.nextPolicyId,
      state.nextClaimId,
      state.cumulativePremiums.toString(),
      state.cumulativeClaimsPaid.toString()
    ]);
  }

  async findPolicy(policyId: number): Promise<PolicyRecord | null> {
    const result = await this.client.query<PolicyRow>(SELECT_POLICY, [policyId]);
    const row = result.rows[0];
    return row ? mapPolicyRow(row) : null;
  }

  async insertPolicy(policy: PolicyRecord): Promise<void> {
    await this.client.query(INSERT_POLICY, [
      policy.policyId,
      policy.owner,
      policy.coverageAmount.toString(),
      policy.premiumAmount.toString(),
      policy.startHeight,
      policy.endHeight,
      policy.isActive
    ]);
  }

  async listPoliciesByOwner(owner: Identity): Promise<PolicyRecord[]> {
    const result = await this.client.query<PolicyRow>(SELECT_POLICIES_BY_OWNER, [owner]);
    return result.rows.map(mapPolicyRow);
  }

  async findClaim(claimId: number): Promise<ClaimRecord | null> {
    const result = await this.client.query<ClaimRow>(SELECT_CLAIM, [claimId]);
    const row = result.rows[0];
    return row ? mapClaimRow(row) : null;
  }

  async insertClaim(claim: ClaimRecord): Promise<void> {
    await this.client.query(INSERT_CLAIM, [
      claim.claimId,
      claim.policyId,
      claim.amount.toString(),
      claim.description,
      claim.status,
      claim.processed
    ]);
  }

  async saveClaimDecision(claimId: number, status: ClaimStatus, processed: boolean): Promise<void> {
    await this.client.query(UPDATE_CLAIM_DECISION, [claimId, status, processed]);
  }

  async listClaimsByPolicy(policyId: number): Promise<ClaimRecord[]> {
    const result = await this.client.query<ClaimRow>(SELECT_CLAIMS_BY_POLICY, [policyId]);
    return result.rows.map(mapClaimRow);
  }
}

export class PostgresLedgerRepository implements LedgerRepository {
  constructor(
    private readonly connect: ConnectionSource,
    private readonly logger: BaseLogger
  ) {}

  async initialize(administrator: Identity): Promise<void> {
    const seed = initialLedgerState(administrator);
    await this.withConnection((client) =>
      client.query(SEED_STATE, [
        seed.administrator,
        seed.nextPolicyId,
        seed.nextClaimId,
        seed.cumulativePremiums.toString(),
        seed.cumulativeClaimsPaid.toString()
      ])
    );
  }

  async loadHeight(): Promise<number | null> {
    const result = await this.withConnection((client) =>
      client.query<ClockHeightRow>(SELECT_CLOCK_HEIGHT)
    );
    const height = result.rows[0]?.clock_height;
    return height === null || height === undefined ? null : Number(height);
  }

  async saveHeight(height: number): Promise<void> {
    await this.withConnection((client) => client.query(SAVE_CLOCK_HEIGHT, [height]));
  }

  /**
   * Runs `work` inside BEGIN/COMMIT on one connection and rolls back when it rejects.
   * A failed ROLLBACK is logged; the caller still sees the error that caused it.
   */
  async transaction<T>(work: (tx: LedgerTransaction) => Promise<T>): Promise<T> {
    return this.withConnection(async (client) => {
      await client.query('BEGIN');
      try {
        const result = await work(new PostgresLedgerTransaction(client));
        await client.query('COMMIT');
        return result;
      } catch (error) {
        try {
          await client.query('ROLLBACK');
        } catch (rollbackError) {
          this.logger.error({ err: rollbackError }, 'Ledger transaction rollback failed');
        }
        throw error;
      }
    });
  }

  private async withConnection<T>(use: (client: DatabaseConnection) => Promise<T>): Promise<T> {
    const client = await this.connect();
    try {
      return await use(client);
    } finally {
      client.release();
    }
  }
}
