// ============================================
// MELIAPP - Fastify App Setup
// ============================================

import Fastify, { FastifyInstance, FastifyServerOptions } from 'fastify';
import fastifyStatic from '@fastify/static';
import path from 'path';
import { env, isDevelopment, isTest } from './config/env.js';
import { getDrizzleDb, type DrizzleDb } from './db/drizzle.js';
import { corsPlugin, errorHandlerPlugin, authPlugin } from './plugins/index.js';
import { registerControllers } from './controllers/index.js';
import { SupabaseIdentityProvider, type IdentityProvider } from './services/identity.provider.js';
import { BotanicalService } from './services/botanical.service.js';

// Extend Fastify types
declare module 'fastify' {
  interface FastifyInstance {
    db: DrizzleDb;
    identity: IdentityProvider;
    botanical: BotanicalService;
  }
}

export interface AppOptions {
  logger?: boolean;
  db?: DrizzleDb;
  identity?: IdentityProvider;
  botanical?: BotanicalService;
}

function loggerOptions(enabled: boolean | undefined): FastifyServerOptions['logger'] {
  if (enabled === false || (enabled === undefined && isTest())) {
    return false;
  }
  if (isDevelopment()) {
    return {
      transport: {
        target: 'pino-pretty',
        options: {
          translateTime: 'HH:MM:ss Z',
          ignore: 'pid,hostname',
        },
      },
    };
  }
  return true;
}

export async function buildApp(options: AppOptions = {}): Promise<FastifyInstance> {
  const fastify = Fastify({ logger: loggerOptions(options.logger) });

  fastify.decorate('db', options.db ?? getDrizzleDb());
  fastify.decorate('identity', options.identity ?? new SupabaseIdentityProvider());
  // One instance so the reference table is parsed once per process
  fastify.decorate('botanical', options.botanical ?? new BotanicalService());

  // Register plugins
  await fastify.register(errorHandlerPlugin);
  await fastify.register(corsPlugin);
  await fastify.register(authPlugin);

  // Page shells and styles (decorateReply enables sendFile)
  await fastify.register(fastifyStatic, {
    root: path.resolve(process.cwd(), 'client'),
    prefix: '/static/',
  });

  // Compiled browser modules; /shared/ keeps their relative imports working
  await fastify.register(fastifyStatic, {
    root: path.resolve(process.cwd(), 'dist/client'),
    prefix: '/js/',
    decorateReply: false,
  });

  await fastify.register(fastifyStatic, {
    root: path.resolve(process.cwd(), 'dist/shared'),
    prefix: '/shared/',
    decorateReply: false,
  });

  // Health check
  fastify.get('/health', async () => {
    return { status: 'ok', timestamp: new Date().toISOString() };
  });

  // API version info
  fastify.get('/api', async () => {
    return {
      name: 'Meliapp API',
      version: '1.0.0',
      framework: 'Fastify',
    };
  });

  await registerControllers(fastify);

  return fastify;
}

export async function startApp(): Promise<FastifyInstance> {
  const app = await buildApp();

  try {
    const address = await app.listen({
      host: env.HOST,
      port: env.PORT,
    });
    app.log.info(`🐝 Meliapp server running at ${address}`);
    return app;
  } catch (err) {
    app.log.error(err);
    throw err;
  }
}
