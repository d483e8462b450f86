import { fastify, FastifyInstance } from 'fastify';
import cors from '@fastify/cors';

import type { NoteStore } from '../repositories/note-store.js';
import { registerRoutes } from './routes.js';

export async function buildServer(store: NoteStore): Promise<FastifyInstance> {
  const app = fastify({
    logger: false, // Using pino logger directly
  });

  await app.register(cors, {
    origin: true,
  });

  await registerRoutes(app, store);
  return app;
}
