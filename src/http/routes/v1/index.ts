import type { FastifyInstance } from 'fastify';

import type { RouteDeps } from '../../routes.js';
import { administratorRoutes } from './administrator.routes.js';
import { claimsRoutes } from './claims.routes.js';
import { ledgerRoutes } from './ledger.routes.js';
import { operatorRoutes } from './operator.routes.js';
import { policiesRoutes } from './policies.routes.js';

export async function apiV1Routes(app: FastifyInstance, deps: RouteDeps): Promise<void> {
  await app.register(administratorRoutes, deps);
  await app.register(policiesRoutes, deps);
  await app.register(claimsRoutes, deps);
  await app.register(ledgerRoutes, deps);
  await app.register(operatorRoutes, deps);
}
