import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { getAddress } from 'ethers';

import { buildApp, createHeightClock, type HeightClockSettings } from './app.js';
import { ManualHeightClock } from './integrations/height-clock.js';
import { InMemoryTransferGateway } from './integrations/transfer-gateway.js';
import { InMemoryLedgerRepository } from './repositories/in-memory-ledger.repository.js';

const ADMIN_RAW = '0x' + 'a'.repeat(40);
const ALICE_RAW = '0x' + 'b'.repeat(40);
const BOB_RAW = '0x' + 'c'.repeat(40);
const ADMIN = getAddress(ADMIN_RAW);
const ALICE = getAddress(ALICE_RAW);
const BOB = getAddress(BOB_RAW);
const OPERATOR_KEY = 'test-operator-key';

function asCaller(wallet: string) {
  return { 'x-wallet-address': wallet };
}

describe('ledger HTTP API', () => {
  let app: FastifyInstance;
  let transfers: InMemoryTransferGateway;
  let clock: ManualHeightClock;

  beforeEach(async () => {
    transfers = new InMemoryTransferGateway({ [ADMIN]: 10_000n, [ALICE]: 1_000n });
    clock = new ManualHeightClock(10);
    app = await buildApp({
      logger: false,
      repository: new InMemoryLedgerRepository(),
      transfers,
      clock,
      administrator: ADMIN,
      operatorApiKey: OPERATOR_KEY
    });
  });

  afterEach(async () => {
    await app.close();
  });

  async function createStandardPolicy(): Promise<void> {
    const response = await app.inject({
      method: 'POST',
      url: '/v1/policies',
      headers: asCaller(ALICE_RAW),
      payload: { coverageAmount: '1000', premiumAmount: '50', duration: 100 }
    });
    expect(response.statusCode).toBe(201);
  }

  it('reports health', async () => {
    const response = await app.inject({ method: 'GET', url: '/health' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toMatchObject({ status: 'ok', version: '0.1.0' });
  });

  describe('caller identity', () => {
    it('requires the wallet header', async () => {
      const response = await app.inject({ method: 'GET', url: '/v1/policies' });

      expect(response.statusCode).toBe(401);
      expect(response.json()).toMatchObject({ error: 'CALLER_REQUIRED' });
    });

    it('rejects malformed wallet addresses', async () => {
      const response = await app.inject({
        method: 'GET',
        url: '/v1/policies',
        headers: asCaller('not-a-wallet')
      });

      expect(response.statusCode).toBe(401);
      expect(response.json()).toMatchObject({ error: 'CALLER_INVALID' });
    });
  });

  describe('policies', () => {
    it('creates a policy and returns it to its owner', async () => {
      const created = await app.inject({
        method: 'POST',
        url: '/v1/policies',
        headers: asCaller(ALICE_RAW),
        payload: { coverageAmount: '1000', premiumAmount: '50', duration: 100 }
      });
      expect(created.statusCode).toBe(201);
      expect(created.json()).toEqual({ policyId: 1 });

      const fetched = await app.inject({
        method: 'GET',
        url: '/v1/policies/1',
        headers: asCaller(ALICE_RAW)
      });
      expect(fetched.statusCode).toBe(200);
      expect(fetched.json()).toEqual({
        policyId: 1,
        owner: ALICE,
        coverageAmount: '1000',
        premiumAmount: '50',
        startHeight: 10,
        endHeight: 110,
        isActive: true
      });
    });

    it('hides the policy from other callers', async () => {
      await createStandardPolicy();

      const response = await app.inject({
        method: 'GET',
        url: '/v1/policies/1',
        headers: asCaller(BOB_RAW)
      });

      expect(response.statusCode).toBe(404);
      expect(response.json()).toMatchObject({ error: 'POLICY_NOT_FOUND' });
    });

    it('maps zero inputs to their ledger error kinds', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/v1/policies',
        headers: asCaller(ALICE_RAW),
        payload: { coverageAmount: '0', premiumAmount: '50', duration: 100 }
      });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toMatchObject({
        statusCode: 400,
        error: 'INVALID_COVERAGE',
        message: 'Coverage amount must be greater than zero.'
      });
    });

    it('rejects amounts that are not unsigned integers', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/v1/policies',
        headers: asCaller(ALICE_RAW),
        payload: { coverageAmount: '-5', premiumAmount: '50', duration: 100 }
      });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toMatchObject({ error: 'Bad Request' });
    });

    it('resolves the owner for any caller', async () => {
      await createStandardPolicy();

      const owner = await app.inject({ method: 'GET', url: '/v1/policies/1/owner' });
      expect(owner.json()).toEqual({ policyId: 1, owner: ALICE });

      const missing = await app.inject({ method: 'GET', url: '/v1/policies/9/owner' });
      expect(missing.statusCode).toBe(404);
    });

    it('collects premiums into the ledger totals', async () => {
      await createStandardPolicy();

      const paid = await app.inject({
        method: 'POST',
        url: '/v1/policies/1/premium',
        headers: asCaller(ALICE_RAW)
      });
      expect(paid.json()).toEqual({ success: true });

      const stats = await app.inject({ method: 'GET', url: '/v1/ledger/stats' });
      expect(stats.json()).toEqual({
        administrator: ADMIN,
        nextPolicyId: 2,
        nextClaimId: 1,
        cumulativePremiums: '50',
        cumulativeClaimsPaid: '0',
        currentHeight: 10
      });

      const balance = await app.inject({
        method: 'GET',
        url: `/v1/accounts/${ALICE_RAW}/balance`
      });
      expect(balance.json()).toEqual({ account: ALICE, balance: '950' });
    });

    it('reports transfer failures with their reason', async () => {
      const created = await app.inject({
        method: 'POST',
        url: '/v1/policies',
        headers: asCaller(BOB_RAW),
        payload: { coverageAmount: '1000', premiumAmount: '50', duration: 100 }
      });
      expect(created.json()).toEqual({ policyId: 1 });

      const response = await app.inject({
        method: 'POST',
        url: '/v1/policies/1/premium',
        headers: asCaller(BOB_RAW)
      });

      expect(response.statusCode).toBe(402);
      expect(response.json()).toMatchObject({
        error: 'TRANSFER_FAILED',
        details: { reason: 'INSUFFICIENT_BALANCE' }
      });
    });
  });

  describe('claims', () => {
    beforeEach(async () => {
      await createStandardPolicy();
    });

    it('runs a claim from submission to approval', async () => {
      const tooLarge = await app.inject({
        method: 'POST',
        url: '/v1/claims',
        headers: asCaller(ALICE_RAW),
        payload: { policyId: 1, amount: '1500', description: 'Roof' }
      });
      expect(tooLarge.statusCode).toBe(400);
      expect(tooLarge.json()).toMatchObject({ error: 'INVALID_CLAIM' });

      const submitted = await app.inject({
        method: 'POST',
        url: '/v1/claims',
        headers: asCaller(ALICE_RAW),
        payload: { policyId: 1, amount: '400', description: 'Roof' }
      });
      expect(submitted.statusCode).toBe(201);
      expect(submitted.json()).toEqual({ claimId: 1 });

      const pending = await app.inject({ method: 'GET', url: '/v1/claims/1' });
      expect(pending.json()).toEqual({
        claimId: 1,
        policyId: 1,
        amount: '400',
        description: 'Roof',
        status: 'PENDING',
        processed: false
      });

      const byOwner = await app.inject({
        method: 'POST',
        url: '/v1/claims/1/decision',
        headers: asCaller(ALICE_RAW),
        payload: { policyId: 1, approved: true }
      });
      expect(byOwner.statusCode).toBe(403);
      expect(byOwner.json()).toMatchObject({ error: 'NOT_AUTHORIZED' });

      const approved = await app.inject({
        method: 'POST',
        url: '/v1/claims/1/decision',
        headers: asCaller(ADMIN_RAW),
        payload: { policyId: 1, approved: true }
      });
      expect(approved.json()).toEqual({ success: true });

      const again = await app.inject({
        method: 'POST',
        url: '/v1/claims/1/decision',
        headers: asCaller(ADMIN_RAW),
        payload: { policyId: 1, approved: false }
      });
      expect(again.statusCode).toBe(409);
      expect(again.json()).toMatchObject({ error: 'CLAIM_ALREADY_PROCESSED' });

      const settled = await app.inject({ method: 'GET', url: '/v1/claims/1' });
      expect(settled.json()).toMatchObject({ status: 'APPROVED', processed: true });
      expect(await transfers.balanceOf(ALICE)).toBe(1_400n);

      const stats = await app.inject({ method: 'GET', url: '/v1/ledger/stats' });
      expect(stats.json()).toMatchObject({ cumulativeClaimsPaid: '400' });
    });

    it('lists a policy\'s claims for the administrator', async () => {
      await app.inject({
        method: 'POST',
        url: '/v1/claims',
        headers: asCaller(ALICE_RAW),
        payload: { policyId: 1, amount: '10' }
      });

      const response = await app.inject({
        method: 'GET',
        url: '/v1/policies/1/claims',
        headers: asCaller(ADMIN_RAW)
      });

      expect(response.json()).toEqual([
        {
          claimId: 1,
          policyId: 1,
          amount: '10',
          description: '',
          status: 'PENDING',
          processed: false
        }
      ]);
    });

    it('returns 404 for unknown claims', async () => {
      const response = await app.inject({ method: 'GET', url: '/v1/claims/3' });

      expect(response.statusCode).toBe(404);
      expect(response.json()).toMatchObject({ error: 'CLAIM_NOT_FOUND' });
    });
  });

  describe('administrator', () => {
    it('lets the administrator hand over its rights', async () => {
      const response = await app.inject({
        method: 'PUT',
        url: '/v1/administrator',
        headers: asCaller(ADMIN_RAW),
        payload: { administrator: BOB_RAW }
      });
      expect(response.json()).toEqual({ success: true, administrator: BOB });

      const stats = await app.inject({ method: 'GET', url: '/v1/ledger/stats' });
      expect(stats.json()).toMatchObject({ administrator: BOB });
    });

    it('refuses anyone else', async () => {
      const response = await app.inject({
        method: 'PUT',
        url: '/v1/administrator',
        headers: asCaller(ALICE_RAW),
        payload: { administrator: ALICE_RAW }
      });

      expect(response.statusCode).toBe(403);
    });
  });

  describe('operator controls', () => {
    it('requires the operator API key', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/v1/operator/clock/advance',
        payload: { blocks: 1 }
      });

      expect(response.statusCode).toBe(401);
      expect(response.json()).toMatchObject({ error: 'UNAUTHORIZED' });
      expect(await clock.currentHeight()).toBe(10);
    });

    it('advances the clock past a policy window', async () => {
      await createStandardPolicy();

      const advanced = await app.inject({
        method: 'POST',
        url: '/v1/operator/clock/advance',
        headers: { authorization: `Bearer ${OPERATOR_KEY}` },
        payload: { blocks: 101 }
      });
      expect(advanced.json()).toEqual({ height: 111 });

      const active = await app.inject({
        method: 'GET',
        url: '/v1/policies/1/active',
        headers: asCaller(ALICE_RAW)
      });
      expect(active.json()).toEqual({ policyId: 1, active: false });

      const premium = await app.inject({
        method: 'POST',
        url: '/v1/policies/1/premium',
        headers: asCaller(ALICE_RAW)
      });
      expect(premium.statusCode).toBe(422);
      expect(premium.json()).toMatchObject({ error: 'POLICY_EXPIRED' });
    });

    it('credits accounts in the in-process balance book', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/v1/operator/accounts/credit',
        headers: { authorization: `Bearer ${OPERATOR_KEY}` },
        payload: { account: BOB_RAW, amount: '500' }
      });

      expect(response.json()).toEqual({ account: BOB, balance: '500' });
      expect(await transfers.balanceOf(BOB)).toBe(500n);
    });
  });
});

describe('createHeightClock', () => {
  const persistentManual: HeightClockSettings = {
    HEIGHT_CLOCK: 'manual',
    BLOCK_INTERVAL_SECONDS: 600,
    GENESIS_UNIX_TIME: undefined,
    INITIAL_HEIGHT: 3,
    hasDatabaseConfig: true
  };

  it('resumes a manual clock from the stored height', async () => {
    const store = new InMemoryLedgerRepository();
    await store.saveHeight(42);

    const clock = await createHeightClock(store, persistentManual);

    expect(await clock.currentHeight()).toBe(42);
  });

  it('starts a fresh manual clock at the configured height', async () => {
    const clock = await createHeightClock(new InMemoryLedgerRepository(), persistentManual);

    expect(clock).toBeInstanceOf(ManualHeightClock);
    expect(await clock.currentHeight()).toBe(3);
  });

  it('requires a fixed genesis for block time when the ledger is in a database', async () => {
    await expect(
      createHeightClock(new InMemoryLedgerRepository(), {
        ...persistentManual,
        HEIGHT_CLOCK: 'block-time'
      })
    ).rejects.toThrow(
      'GENESIS_UNIX_TIME is required for the block-time clock when the ledger is stored in a database.'
    );
  });

  it('counts block time from a configured genesis', async () => {
    const clock = await createHeightClock(new InMemoryLedgerRepository(), {
      ...persistentManual,
      HEIGHT_CLOCK: 'block-time',
      GENESIS_UNIX_TIME: 0
    });

    expect(await clock.currentHeight()).toBeGreaterThan(3);
  });
});
