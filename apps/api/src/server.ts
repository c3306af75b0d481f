import Fastify, { type FastifyInstance, type FastifyServerOptions } from 'fastify';
import helmet from '@fastify/helmet';
import cors from '@fastify/cors';
import {
  serializerCompiler,
  validatorCompiler,
} from 'fastify-type-provider-zod';
import { randomUUID } from 'node:crypto';
import { pathToFileURL } from 'node:url';
import { getEnv, toGatewayConfig, type GatewayConfig } from './lib/env.js';
import { registerErrorHandler } from './lib/error-handler.js';
import { authPluginFp } from './plugins/auth.plugin.js';
import { createTokenService, type TokenService } from './domains/auth/token.service.js';
import { authRoutes } from './domains/auth/auth.routes.js';
import { recordsRoutes } from './domains/records/records.routes.js';
import { HttpPortalClient } from './domains/portal/portal.client.js';
import { type PortalClient } from './domains/portal/portal.types.js';

export interface AppDeps {
  config: GatewayConfig;
  portal: PortalClient;
  /** Built from config when omitted. */
  tokenService?: TokenService;
  logger?: FastifyServerOptions['logger'];
}

export function buildLoggerOptions(config: GatewayConfig) {
  return {
    name: config.appName,
    level: config.logLevel,
    redact: ['req.headers.authorization'],
  };
}

export async function buildApp(deps: AppDeps): Promise<FastifyInstance> {
  const { config, portal } = deps;

  const app = Fastify({
    logger: deps.logger ?? buildLoggerOptions(config),
    genReqId: () => randomUUID(),
  });

  app.setValidatorCompiler(validatorCompiler);
  app.setSerializerCompiler(serializerCompiler);
  registerErrorHandler(app);

  // Register plugins
  await app.register(helmet);
  await app.register(cors, { origin: config.corsOrigin });

  const tokenService =
    deps.tokenService ??
    createTokenService({
      secretKey: config.secretKey,
      algorithm: config.algorithm,
      ttlMinutes: config.accessTokenExpireMinutes,
    });
  await app.register(authPluginFp, { tokenService });

  // Health check
  app.get('/health', async () => ({
    status: 'healthy',
    version: config.appVersion,
  }));

  await app.register(authRoutes, {
    deps: { loginDeps: { portal, tokenService } },
  });
  await app.register(recordsRoutes, {
    deps: {
      serviceDeps: { portal, defaultFacilityCode: config.defaultFacilityCode },
    },
  });

  return app;
}

async function start(): Promise<void> {
  const env = getEnv();
  const app = await buildApp({
    config: toGatewayConfig(env),
    portal: new HttpPortalClient({ baseUrl: env.PORTAL_BASE_URL }),
  });

  try {
    await app.listen({ port: env.API_PORT, host: env.API_HOST });
  } catch (err) {
    app.log.error(err);
    process.exit(1);
  }
}

/** True when `moduleUrl` is the script Node (or tsx) was asked to run. */
export function isEntryModule(moduleUrl: string, entryPath: string | undefined): boolean {
  return entryPath !== undefined && moduleUrl === pathToFileURL(entryPath).href;
}

// Start server when run directly
if (isEntryModule(import.meta.url, process.argv[1])) {
  start().catch((err: unknown) => {
    console.error(err);
    process.exit(1);
  });
}
