import type { FastifyInstance } from 'fastify';

import type { InMemoryTransferGateway } from '../integrations/transfer-gateway.js';
import type { LedgerService } from '../services/ledger.service.js';
import { healthRoutes } from './routes/health.routes.js';
import { apiV1Routes } from './routes/v1/index.js';

export type RouteDeps = {
  ledger: LedgerService;
  /** Present only when transfers settle against the in-process balance book. */
  faucet: InMemoryTransferGateway | null;
  operatorApiKey: string | undefined;
};

export async function registerRoutes(app: FastifyInstance, deps: RouteDeps): Promise<void> {
  await app.register(healthRoutes);
  await app.register(apiV1Routes, { prefix: '/v1', ...deps });
}
