import type { FastifyInstance } from 'fastify';
import { z } from 'zod';

import { conflict } from '../../../core/errors.js';
import type { RouteDeps } from '../../routes.js';
import { walletAddressSchema } from '../../middleware/caller-identity.js';
import { operatorAuthMiddleware } from '../../middleware/operator-auth.js';
import { amountJsonSchema, uintAmountSchema } from '../../schemas.js';

const advanceClockSchema = z.object({
  blocks: z.number().int().positive().default(1)
});

const creditSchema = z.object({
  account: walletAddressSchema,
  amount: uintAmountSchema
});

export async function operatorRoutes(
  app: FastifyInstance,
  { ledger, faucet, operatorApiKey }: RouteDeps
): Promise<void> {
  const preHandler = operatorAuthMiddleware(operatorApiKey);

  app.post(
    '/operator/clock/advance',
    {
      preHandler,
      schema: {
        tags: ['operator'],
        summary: 'Advance a manually driven height clock',
        body: {
          type: 'object',
          properties: {
            blocks: { type: 'integer', minimum: 1 }
          }
        }
      }
    },
    async (request) => {
      const body = advanceClockSchema.parse(request.body ?? {});
      return { height: await ledger.advanceClock(body.blocks) };
    }
  );

  app.post(
    '/operator/accounts/credit',
    {
      preHandler,
      schema: {
        tags: ['operator'],
        summary: 'Credit an account in the in-process balance book',
        body: {
          type: 'object',
          required: ['account', 'amount'],
          properties: {
            account: { type: 'string' },
            amount: amountJsonSchema
          }
        }
      }
    },
    async (request) => {
      if (!faucet) {
        throw conflict('FAUCET_UNAVAILABLE', 'Transfers do not settle against an in-process balance book.');
      }
      const body = creditSchema.parse(request.body);
      const balance = faucet.credit(body.account, body.amount);
      return { account: body.account, balance: balance.toString() };
    }
  );
}
