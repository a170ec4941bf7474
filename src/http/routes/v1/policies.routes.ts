import type { FastifyInstance } from 'fastify';
import { z } from 'zod';

import { notFound } from '../../../core/errors.js';
import { toClaimView, toPolicyView } from '../../../domain/types.js';
import type { RouteDeps } from '../../routes.js';
import { requireCaller } from '../../middleware/caller-identity.js';
import {
  amountJsonSchema,
  callerHeaderJsonSchema,
  heightSchema,
  policyIdParamsJsonSchema,
  recordIdSchema,
  uintAmountSchema
} from '../../schemas.js';

const createPolicySchema = z.object({
  coverageAmount: uintAmountSchema,
  premiumAmount: uintAmountSchema,
  duration: heightSchema
});

const policyParamsSchema = z.object({
  policyId: recordIdSchema
});

export async function policiesRoutes(
  app: FastifyInstance,
  { ledger }: RouteDeps
): Promise<void> {
  app.post(
    '/policies',
    {
      schema: {
        tags: ['policies'],
        summary: 'Create a policy owned by the caller',
        headers: callerHeaderJsonSchema,
        body: {
          type: 'object',
          required: ['coverageAmount', 'premiumAmount', 'duration'],
          properties: {
            coverageAmount: amountJsonSchema,
            premiumAmount: amountJsonSchema,
            duration: { type: 'integer', minimum: 0 }
          }
        }
      }
    },
    async (request, reply) => {
      const caller = requireCaller(request);
      const body = createPolicySchema.parse(request.body);
      const policyId = await ledger.createPolicy(caller, body);
      reply.code(201);
      return { policyId };
    }
  );

  app.get(
    '/policies',
    {
      schema: {
        tags: ['policies'],
        summary: 'List policies owned by the caller',
        headers: callerHeaderJsonSchema
      }
    },
    async (request) => {
      const caller = requireCaller(request);
      const policies = await ledger.listPolicies(caller);
      return policies.map(toPolicyView);
    }
  );

  app.get(
    '/policies/:policyId',
    {
      schema: {
        tags: ['policies'],
        summary: 'Fetch one of the caller\'s policies',
        headers: callerHeaderJsonSchema,
        params: policyIdParamsJsonSchema
      }
    },
    async (request) => {
      const caller = requireCaller(request);
      const { policyId } = policyParamsSchema.parse(request.params);
      const policy = await ledger.getPolicy(caller, policyId);
      if (!policy) {
        throw notFound('POLICY_NOT_FOUND', `Policy ${policyId} was not found.`);
      }
      return toPolicyView(policy);
    }
  );

  app.post(
    '/policies/:policyId/premium',
    {
      schema: {
        tags: ['policies'],
        summary: 'Pay the policy premium to the administrator',
        headers: callerHeaderJsonSchema,
        params: policyIdParamsJsonSchema
      }
    },
    async (request) => {
      const caller = requireCaller(request);
      const { policyId } = policyParamsSchema.parse(request.params);
      const success = await ledger.payPremium(caller, policyId);
      return { success };
    }
  );

  app.get(
    '/policies/:policyId/owner',
    {
      schema: {
        tags: ['policies'],
        summary: 'Resolve the owner of a policy',
        params: policyIdParamsJsonSchema
      }
    },
    async (request) => {
      const { policyId } = policyParamsSchema.parse(request.params);
      const owner = await ledger.getPolicyOwner(policyId);
      return { policyId, owner };
    }
  );

  app.get(
    '/policies/:policyId/active',
    {
      schema: {
        tags: ['policies'],
        summary: 'Whether the caller\'s policy is active at the current height',
        headers: callerHeaderJsonSchema,
        params: policyIdParamsJsonSchema
      }
    },
    async (request) => {
      const caller = requireCaller(request);
      const { policyId } = policyParamsSchema.parse(request.params);
      const active = await ledger.isPolicyActive(caller, policyId);
      return { policyId, active };
    }
  );

  app.get(
    '/policies/:policyId/claims',
    {
      schema: {
        tags: ['policies', 'claims'],
        summary: 'List claims filed against a policy',
        headers: callerHeaderJsonSchema,
        params: policyIdParamsJsonSchema
      }
    },
    async (request) => {
      const caller = requireCaller(request);
      const { policyId } = policyParamsSchema.parse(request.params);
      const claims = await ledger.listClaimsForPolicy(caller, policyId);
      return claims.map(toClaimView);
    }
  );
}
