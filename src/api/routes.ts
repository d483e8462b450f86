import { FastifyInstance, FastifyReply } from 'fastify';

import type { NoteStore } from '../repositories/note-store.js';
import { NotebookError, NotebookErrorCode } from '../core/errors.js';
import logger from '../utils/logger.js';

const STATUS_BY_CODE: Record<NotebookErrorCode, number> = {
  NAME_ALREADY_TAKEN: 409,
  NOT_FOUND: 404,
  STORAGE_FAILURE: 500,
  INPUT_FAILURE: 400,
  CONFIG_ERROR: 500,
};

interface NameParams {
  name: string;
}

interface CreateBody {
  noteName?: unknown;
  note?: unknown;
}

interface UpdateBody {
  note?: unknown;
}

interface RenameBody {
  noteName?: unknown;
}

function badRequest(reply: FastifyReply, message: string) {
  reply.code(400);
  return { error: message, code: 'BAD_REQUEST' };
}

export async function registerRoutes(app: FastifyInstance, store: NoteStore) {
  app.setErrorHandler((error, request, reply) => {
    if (error instanceof NotebookError) {
      const status = STATUS_BY_CODE[error.code];
      if (status >= 500) {
        logger.error({ code: error.code, err: error.cause, url: request.url }, error.message);
      }
      reply.code(status).send({ error: error.message, code: error.code });
      return;
    }
    logger.error({ err: error, url: request.url }, 'Unhandled request error');
    reply
      .code(error.statusCode ?? 500)
      .send({ error: error.message, code: 'INTERNAL_ERROR' });
  });

  // Health check
  app.get('/health', async () => {
    return { status: 'ok', timestamp: new Date().toISOString() };
  });

  // Get all notes
  app.get('/notes', async () => {
    return store.getAll();
  });

  // Get specific note
  app.get<{ Params: NameParams }>('/notes/:name', async (request) => {
    return store.get(request.params.name);
  });

  // Create note
  app.post<{ Body: CreateBody | undefined }>('/notes', async (request, reply) => {
    const body: CreateBody = request.body ?? {};
    const { noteName, note = '' } = body;
    if (typeof noteName !== 'string' || noteName.trim() === '') {
      return badRequest(reply, 'Field "noteName" is required');
    }
    if (typeof note !== 'string') {
      return badRequest(reply, 'Field "note" must be a string');
    }
    const created = await store.create(noteName, note);
    reply.code(201);
    return created;
  });

  // Replace note content
  app.put<{ Params: NameParams; Body: UpdateBody | undefined }>(
    '/notes/:name',
    async (request, reply) => {
      const note = request.body?.note;
      if (typeof note !== 'string') {
        return badRequest(reply, 'Field "note" is required');
      }
      return store.update(request.params.name, note);
    }
  );

  // Rename note
  app.patch<{ Params: NameParams; Body: RenameBody | undefined }>(
    '/notes/:name',
    async (request, reply) => {
      const newNoteName = request.body?.noteName;
      if (typeof newNoteName !== 'string' || newNoteName.trim() === '') {
        return badRequest(reply, 'Field "noteName" is required');
      }
      return store.rename(request.params.name, newNoteName);
    }
  );

  // Clear note content
  app.post<{ Params: NameParams }>('/notes/:name/clear', async (request, reply) => {
    await store.clear(request.params.name);
    return reply.code(204).send();
  });

  // Delete one note
  app.delete<{ Params: NameParams }>('/notes/:name', async (request, reply) => {
    await store.delete(request.params.name);
    return reply.code(204).send();
  });

  // Delete every note
  app.delete('/notes', async () => {
    const deleted = await store.deleteAll();
    return { deleted };
  });
}
