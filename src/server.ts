import Fastify, { type FastifyInstance, type FastifyServerOptions } from 'fastify';
import cors from '@fastify/cors';
import type { FilterBandModel } from './services/filterbands/filter-band-model.js';
import { filterRoutes } from './routes/api/filters.js';

export interface ServerOptions {
  logger?: FastifyServerOptions['logger'];
}

/**
 * Read-only HTTP view over a compiled filter table. The model is looked up
 * per request so a watcher can swap in a recompiled one.
 */
export async function createServer(
  getModel: () => FilterBandModel | null,
  options: ServerOptions = {}
): Promise<FastifyInstance> {
  const app = Fastify({ logger: options.logger ?? true });

  await app.register(cors, { origin: true });
  await app.register(filterRoutes({ getModel }));

  return app;
}
