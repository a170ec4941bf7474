import type { FastifyInstance } from 'fastify';
import { z } from 'zod';

import { toLedgerStatsView } from '../../../domain/types.js';
import type { RouteDeps } from '../../routes.js';
import { walletAddressSchema } from '../../middleware/caller-identity.js';

const balanceParamsSchema = z.object({
  account: walletAddressSchema
});

export async function ledgerRoutes(
  app: FastifyInstance,
  { ledger }: RouteDeps
): Promise<void> {
  app.get(
    '/ledger/stats',
    {
      schema: {
        tags: ['ledger'],
        summary: 'Ledger counters, accumulators and current height'
      }
    },
    async () => toLedgerStatsView(await ledger.getStats())
  );

  app.get(
    '/accounts/:account/balance',
    {
      schema: {
        tags: ['ledger'],
        summary: 'Settlement balance of an account',
        params: {
          type: 'object',
          required: ['account'],
          properties: {
            account: { type: 'string' }
          }
        }
      }
    },
    async (request) => {
      const { account } = balanceParamsSchema.parse(request.params);
      const balance = await ledger.getBalance(account);
      return { account, balance: balance.toString() };
    }
  );
}
