import { describe, expect, it, vi } from 'vitest';
import type pg from 'pg';
import pino from 'pino';

import type { DatabaseConnection } from '../core/database.js';
import { initialLedgerState } from './ledger.repository.js';
import {
  PostgresLedgerRepository,
  mapClaimRow,
  mapPolicyRow,
  mapStateRow
} from './postgres-ledger.repository.js';

/** Records the leading keyword of each statement and fails the one named in `failOn`. */
class RecordingConnection implements DatabaseConnection {
  readonly statements: string[] = [];
  released = 0;

  constructor(private readonly failOn?: string) {}

  async query<R extends pg.QueryResultRow = pg.QueryResultRow>(
    text: string
  ): Promise<pg.QueryResult<R>> {
    const command = text.trim().split(/\s+/)[0] ?? '';
    this.statements.push(command);
    if (command === this.failOn) {
      throw new Error(`${command} refused`);
    }
    return { command, rowCount: 0, oid: 0, fields: [], rows: [] };
  }

  release(): void {
    this.released += 1;
  }
}

function repositoryOver(connection: RecordingConnection) {
  const logger = pino({ level: 'silent' });
  const repository = new PostgresLedgerRepository(async () => connection, logger);
  return { repository, logger };
}

describe('postgres row mapping', () => {
  it('maps NUMERIC and BIGINT columns to bigint amounts and numeric heights', () => {
    expect(
      mapPolicyRow({
        policy_id: '7',
        owner: '0xOwner',
        coverage_amount: '123456789012345678901234567890',
        premium_amount: '50',
        start_height: '10',
        end_height: '110',
        is_active: true
      })
    ).toEqual({
      policyId: 7,
      owner: '0xOwner',
      coverageAmount: 123456789012345678901234567890n,
      premiumAmount: 50n,
      startHeight: 10,
      endHeight: 110,
      isActive: true
    });
  });

  it('maps claim rows', () => {
    expect(
      mapClaimRow({
        claim_id: '3',
        policy_id: '7',
        amount: '400',
        description: 'Flood',
        status: 'REJECTED',
        processed: true
      })
    ).toEqual({
      claimId: 3,
      policyId: 7,
      amount: 400n,
      description: 'Flood',
      status: 'REJECTED',
      processed: true
    });
  });

  it('maps the ledger state row', () => {
    expect(
      mapStateRow({
        administrator: '0xAdmin',
        next_policy_id: '8',
        next_claim_id: '4',
        cumulative_premiums: '150',
        cumulative_claims_paid: '0'
      })
    ).toEqual({
      administrator: '0xAdmin',
      nextPolicyId: 8,
      nextClaimId: 4,
      cumulativePremiums: 150n,
      cumulativeClaimsPaid: 0n
    });
  });
});

describe('PostgresLedgerRepository transactions', () => {
  it('commits the work on one connection and releases it', async () => {
    const connection = new RecordingConnection();
    const { repository } = repositoryOver(connection);

    await expect(
      repository.transaction(async (tx) => {
        await tx.saveState(initialLedgerState('0xAdmin'));
        return 'done';
      })
    ).resolves.toBe('done');

    expect(connection.statements).toEqual(['BEGIN', 'UPDATE', 'COMMIT']);
    expect(connection.released).toBe(1);
  });

  it('rolls back and rethrows when the work rejects', async () => {
    const connection = new RecordingConnection();
    const { repository } = repositoryOver(connection);

    await expect(
      repository.transaction(async () => {
        throw new Error('guard failed');
      })
    ).rejects.toThrow('guard failed');

    expect(connection.statements).toEqual(['BEGIN', 'ROLLBACK']);
    expect(connection.released).toBe(1);
  });

  it('rolls back when the commit itself fails', async () => {
    const connection = new RecordingConnection('COMMIT');
    const { repository } = repositoryOver(connection);

    await expect(repository.transaction(async () => 'done')).rejects.toThrow('COMMIT refused');

    expect(connection.statements).toEqual(['BEGIN', 'COMMIT', 'ROLLBACK']);
    expect(connection.released).toBe(1);
  });

  it('rethrows the failure from the work when the rollback fails too', async () => {
    const connection = new RecordingConnection('ROLLBACK');
    const { repository, logger } = repositoryOver(connection);
    const error = vi.spyOn(logger, 'error');

    await expect(
      repository.transaction(async () => {
        throw new Error('guard failed');
      })
    ).rejects.toThrow('guard failed');

    expect(error).toHaveBeenCalledWith(
      { err: expect.objectContaining({ message: 'ROLLBACK refused' }) },
      'Ledger transaction rollback failed'
    );
    expect(connection.released).toBe(1);
  });

  it('reads no clock height before one is stored', async () => {
    const connection = new RecordingConnection();
    const { repository } = repositoryOver(connection);

    await expect(repository.loadHeight()).resolves.toBeNull();
    expect(connection.statements).toEqual(['SELECT']);
    expect(connection.released).toBe(1);
  });
});
