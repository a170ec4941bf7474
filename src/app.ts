import Fastify, { type FastifyInstance, type FastifyServerOptions } from 'fastify';
import cors from '@fastify/cors';
import sensible from '@fastify/sensible';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import { ZodError } from 'zod';

import { appConfig, type AppConfig } from './core/env.js';
import { ServiceError } from './core/errors.js';
import { closePool, getPool, pooledConnections } from './core/database.js';
import { runMigrations } from './core/migrations.js';
import type { Identity } from './domain/types.js';
import { registerRoutes } from './http/routes.js';
import { SERVICE_VERSION } from './http/routes/health.routes.js';
import { walletAddressSchema } from './http/middleware/caller-identity.js';
import {
  BlockTimeHeightClock,
  ManualHeightClock,
  type HeightClock,
  type HeightStore
} from './integrations/height-clock.js';
import {
  InMemoryTransferGateway,
  type TransferGateway
} from './integrations/transfer-gateway.js';
import { InMemoryLedgerRepository } from './repositories/in-memory-ledger.repository.js';
import type { LedgerRepository } from './repositories/ledger.repository.js';
import { PostgresLedgerRepository } from './repositories/postgres-ledger.repository.js';
import { LedgerService } from './services/ledger.service.js';
import { currentUnixTime } from './utils/datetime.js';

export interface BuildAppOptions {
  logger?: FastifyServerOptions['logger'];
  repository?: LedgerRepository;
  transfers?: TransferGateway;
  clock?: HeightClock;
  administrator?: Identity;
  operatorApiKey?: string;
}

function defaultLogger(): FastifyServerOptions['logger'] {
  return {
    level: appConfig.LOG_LEVEL,
    transport:
      appConfig.NODE_ENV === 'development'
        ? {
            target: 'pino-pretty',
            options: {
              translateTime: 'SYS:standard',
              ignore: 'pid,hostname'
            }
          }
        : undefined
  };
}

export type HeightClockSettings = Pick<
  AppConfig,
  'HEIGHT_CLOCK' | 'BLOCK_INTERVAL_SECONDS' | 'GENESIS_UNIX_TIME' | 'INITIAL_HEIGHT' | 'hasDatabaseConfig'
>;

export async function createHeightClock(
  store: HeightStore,
  settings: HeightClockSettings = appConfig
): Promise<HeightClock> {
  if (settings.HEIGHT_CLOCK === 'block-time') {
    if (settings.GENESIS_UNIX_TIME === undefined && settings.hasDatabaseConfig) {
      throw new Error(
        'GENESIS_UNIX_TIME is required for the block-time clock when the ledger is stored in a database.'
      );
    }
    return new BlockTimeHeightClock({
      genesisUnixTime: settings.GENESIS_UNIX_TIME ?? currentUnixTime(),
      blockIntervalSeconds: settings.BLOCK_INTERVAL_SECONDS,
      initialHeight: settings.INITIAL_HEIGHT
    });
  }
  return ManualHeightClock.restore(store, settings.INITIAL_HEIGHT);
}

function resolveAdministrator(override: Identity | undefined): Identity {
  if (override) {
    return override;
  }
  if (!appConfig.LEDGER_ADMINISTRATOR) {
    throw new Error('LEDGER_ADMINISTRATOR is not configured.');
  }
  return walletAddressSchema.parse(appConfig.LEDGER_ADMINISTRATOR);
}

export async function buildApp(options: BuildAppOptions = {}): Promise<FastifyInstance> {
  const app = Fastify({
    logger: options.logger ?? defaultLogger()
  });

  await app.register(sensible);
  await app.register(cors, {
    origin: appConfig.corsOrigins
  });

  await app.register(swagger, {
    openapi: {
      info: {
        title: 'Insurance Ledger API',
        description:
          'Policy and claim ledger with premium accounting and guarded claim settlement.',
        version: SERVICE_VERSION
      },
      servers: [
        {
          url: 'http://localhost:3000',
          description: 'Local development'
        }
      ],
      tags: [
        { name: 'system', description: 'Infrastructure and status endpoints' },
        { name: 'policies', description: 'Policy lifecycle and premiums' },
        { name: 'claims', description: 'Claim submission and decisions' },
        { name: 'ledger', description: 'Ledger totals and balances' },
        { name: 'admin', description: 'Administrator operations' },
        { name: 'operator', description: 'Clock and faucet controls for non-production setups' }
      ]
    }
  });

  await app.register(swaggerUi, {
    routePrefix: '/docs',
    staticCSP: true
  });

  let repository = options.repository;
  if (!repository) {
    if (appConfig.hasDatabaseConfig) {
      try {
        const connect = pooledConnections(getPool());
        await runMigrations(connect);
        app.log.info('Database migrations completed');
        app.addHook('onClose', async () => {
          await closePool();
        });
        repository = new PostgresLedgerRepository(connect, app.log.child({ module: 'ledger-store' }));
      } catch (error) {
        app.log.error({ err: error }, 'Database initialization failed');
        throw error;
      }
    } else {
      app.log.warn('Database configuration not provided. Running in in-memory mode.');
      repository = new InMemoryLedgerRepository();
    }
  }

  await repository.initialize(resolveAdministrator(options.administrator));

  const transfers = options.transfers ?? new InMemoryTransferGateway();
  const clock = options.clock ?? (await createHeightClock(repository));
  const ledger = new LedgerService({
    repository,
    transfers,
    clock,
    logger: app.log.child({ module: 'ledger' })
  });

  app.setErrorHandler((error, request, reply) => {
    if (error instanceof ServiceError) {
      reply.status(error.statusCode).send({
        statusCode: error.statusCode,
        error: error.code,
        message: error.message,
        details: error.details
      });
      return;
    }

    if (error instanceof ZodError) {
      reply.status(400).send({
        statusCode: 400,
        error: 'Bad Request',
        message: 'Validation failed',
        issues: error.issues
      });
      return;
    }

    if (error.validation) {
      reply.status(400).send({
        statusCode: 400,
        error: 'Bad Request',
        message: error.message,
        details: error.validation
      });
      return;
    }

    request.log.error({ err: error }, 'Unhandled error');
    reply.status(error.statusCode ?? 500).send({
      statusCode: error.statusCode ?? 500,
      error: error.code ?? 'Internal Server Error',
      message:
        appConfig.NODE_ENV === 'production'
          ? 'Internal Server Error'
          : error.message
    });
  });

  await registerRoutes(app, {
    ledger,
    faucet: transfers instanceof InMemoryTransferGateway ? transfers : null,
    operatorApiKey: options.operatorApiKey ?? appConfig.ADMIN_API_KEY
  });

  return app;
}
