import type { FastifyInstance } from 'fastify';
import { z } from 'zod';

import { notFound } from '../../../core/errors.js';
import { CLAIM_DESCRIPTION_MAX_LENGTH, toClaimView } from '../../../domain/types.js';
import type { RouteDeps } from '../../routes.js';
import { requireCaller } from '../../middleware/caller-identity.js';
import {
  amountJsonSchema,
  callerHeaderJsonSchema,
  claimIdParamsJsonSchema,
  recordIdSchema,
  uintAmountSchema
} from '../../schemas.js';

const submitClaimSchema = z.object({
  policyId: recordIdSchema,
  amount: uintAmountSchema,
  description: z.string().max(CLAIM_DESCRIPTION_MAX_LENGTH).default('')
});

const claimParamsSchema = z.object({
  claimId: recordIdSchema
});

const decisionBodySchema = z.object({
  policyId: recordIdSchema,
  approved: z.boolean()
});

export async function claimsRoutes(
  app: FastifyInstance,
  { ledger }: RouteDeps
): Promise<void> {
  app.post(
    '/claims',
    {
      schema: {
        tags: ['claims'],
        summary: 'Submit a claim against one of the caller\'s policies',
        headers: callerHeaderJsonSchema,
        body: {
          type: 'object',
          required: ['policyId', 'amount'],
          properties: {
            policyId: { type: 'integer', minimum: 0 },
            amount: amountJsonSchema,
            description: { type: 'string', maxLength: CLAIM_DESCRIPTION_MAX_LENGTH }
          }
        }
      }
    },
    async (request, reply) => {
      const caller = requireCaller(request);
      const body = submitClaimSchema.parse(request.body);
      const claimId = await ledger.submitClaim(caller, body);
      reply.code(201);
      return { claimId };
    }
  );

  app.get(
    '/claims/:claimId',
    {
      schema: {
        tags: ['claims'],
        summary: 'Fetch a claim by id',
        params: claimIdParamsJsonSchema
      }
    },
    async (request) => {
      const { claimId } = claimParamsSchema.parse(request.params);
      const claim = await ledger.getClaim(claimId);
      if (!claim) {
        throw notFound('CLAIM_NOT_FOUND', `Claim ${claimId} was not found.`);
      }
      return toClaimView(claim);
    }
  );

  app.post(
    '/claims/:claimId/decision',
    {
      schema: {
        tags: ['claims', 'admin'],
        summary: 'Approve or reject a pending claim',
        headers: callerHeaderJsonSchema,
        params: claimIdParamsJsonSchema,
        body: {
          type: 'object',
          required: ['policyId', 'approved'],
          properties: {
            policyId: { type: 'integer', minimum: 0 },
            approved: { type: 'boolean' }
          }
        }
      }
    },
    async (request) => {
      const caller = requireCaller(request);
      const { claimId } = claimParamsSchema.parse(request.params);
      const body = decisionBodySchema.parse(request.body);
      const success = await ledger.processClaim(caller, { claimId, ...body });
      return { success };
    }
  );
}
