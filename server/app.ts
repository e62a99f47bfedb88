import { fastify } from 'fastify';
import type { FastifyInstance } from 'fastify';
import type { LogLevel } from '../src/config.js';
import { treeRoutes } from './routes/tree.js';
import type { TreeRouteOptions } from './routes/tree.js';

export interface ServerOptions extends TreeRouteOptions {
  logLevel?: LogLevel | false;
}

export async function buildServer(options: ServerOptions): Promise<FastifyInstance> {
  const app = fastify({
    logger: options.logLevel === false ? false : { level: options.logLevel ?? 'warn' },
    connectionTimeout: 30000,
    keepAliveTimeout: 5000,
  });

  await app.register(treeRoutes, { prefix: '/api', snapshot: options.snapshot });
  return app;
}
