import type { FastifyInstance } from 'fastify';
import { z } from 'zod';

import type { RouteDeps } from '../../routes.js';
import { requireCaller, walletAddressSchema } from '../../middleware/caller-identity.js';
import { callerHeaderJsonSchema } from '../../schemas.js';

const setAdministratorSchema = z.object({
  administrator: walletAddressSchema
});

export async function administratorRoutes(
  app: FastifyInstance,
  { ledger }: RouteDeps
): Promise<void> {
  app.put(
    '/administrator',
    {
      schema: {
        tags: ['admin'],
        summary: 'Hand administrator rights to another identity',
        headers: callerHeaderJsonSchema,
        body: {
          type: 'object',
          required: ['administrator'],
          properties: {
            administrator: { type: 'string' }
          }
        }
      }
    },
    async (request) => {
      const caller = requireCaller(request);
      const body = setAdministratorSchema.parse(request.body);
      const success = await ledger.setAdministrator(caller, body.administrator);
      return { success, administrator: body.administrator };
    }
  );
}
