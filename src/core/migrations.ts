import type { ConnectionSource } from './database.js';

const MIGRATIONS: string[] = [
  `
  CREATE TABLE IF NOT EXISTS ledger_state (
    id SMALLINT PRIMARY KEY CHECK (id = 1),
    administrator TEXT NOT NULL,
    next_policy_id BIGINT NOT NULL,
    next_claim_id BIGINT NOT NULL,
    cumulative_premiums NUMERIC(78, 0) NOT NULL,
    cumulative_claims_paid NUMERIC(78, 0) NOT NULL,
    updated_at TIMESTAMPTZ DEFAULT NOW() NOT NULL
  );
  `,
  `
  CREATE TABLE IF NOT EXISTS ledger_policies (
    policy_id BIGINT PRIMARY KEY,
    owner TEXT NOT NULL,
    coverage_amount NUMERIC(78, 0) NOT NULL CHECK (coverage_amount > 0),
    premium_amount NUMERIC(78, 0) NOT NULL CHECK (premium_amount > 0),
    start_height BIGINT NOT NULL,
    end_height BIGINT NOT NULL CHECK (end_height > start_height),
    is_active BOOLEAN NOT NULL,
    created_at TIMESTAMPTZ DEFAULT NOW() NOT NULL
  );
  CREATE INDEX IF NOT EXISTS ledger_policies_owner_idx ON ledger_policies (owner);
  `,
  `
  CREATE TABLE IF NOT EXISTS ledger_claims (
    claim_id BIGINT PRIMARY KEY,
    policy_id BIGINT NOT NULL REFERENCES ledger_policies (policy_id),
    amount NUMERIC(78, 0) NOT NULL,
    description VARCHAR(256) NOT NULL,
    status TEXT NOT NULL CHECK (status IN ('PENDING', 'APPROVED', 'REJECTED')),
    processed BOOLEAN NOT NULL,
    created_at TIMESTAMPTZ DEFAULT NOW() NOT NULL,
    CHECK (processed = (status <> 'PENDING'))
  );
  CREATE INDEX IF NOT EXISTS ledger_claims_policy_idx ON ledger_claims (policy_id);
  `,
  `
  ALTER TABLE ledger_state ADD COLUMN IF NOT EXISTS clock_height BIGINT;
  `
];

export async function runMigrations(connect: ConnectionSource): Promise<void> {
  const client = await connect();

  try {
    await client.query(
      `CREATE TABLE IF NOT EXISTS migrations (
        id SERIAL PRIMARY KEY,
        name TEXT UNIQUE NOT NULL,
        created_at TIMESTAMPTZ DEFAULT NOW() NOT NULL
      )`
    );

    for (const [index, migration] of MIGRATIONS.entries()) {
      const name = `migration_${index + 1}`;

      const { rows } = await client.query('SELECT 1 FROM migrations WHERE name = $1', [name]);
      if (rows.length > 0) {
        continue;
      }

      try {
        await client.query('BEGIN');
        await client.query(migration);
        await client.query('INSERT INTO migrations (name) VALUES ($1)', [name]);
        await client.query('COMMIT');
      } catch (error) {
        await client.query('ROLLBACK');
        throw error;
      }
    }
  } finally {
    client.release();
  }
}
