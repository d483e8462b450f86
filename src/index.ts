#!/usr/bin/env node
import { loadConfig } from './utils/config.js';
import { createNoteEventBus, type Unsubscribe } from './core/event-bus.js';
import { NotebookError } from './core/errors.js';
import { SqliteNoteStore } from './repositories/sqlite-note-store.js';
import { CommandDispatcher } from './services/command-dispatcher.js';
import { ReadlineLineSource } from './cli/note-reader.js';
import { createStreamReport } from './cli/report.js';
import { parseInvocation, ServeOptions } from './cli/program.js';
import { buildServer } from './api/server.js';
import type { AppConfig } from './types/index.js';
import logger from './utils/logger.js';

async function serve(
  store: SqliteNoteStore,
  config: AppConfig,
  options: ServeOptions,
  stopChangeLog: Unsubscribe
) {
  const app = await buildServer(store);
  const port = options.port ?? config.server.port;
  const host = options.host ?? config.server.host;

  try {
    await app.listen({ port, host });
    logger.info({ port, host }, 'Server started successfully');
  } catch (error) {
    logger.error({ err: error }, 'Failed to start server');
    stopChangeLog();
    store.close();
    process.exit(1);
  }

  // Graceful shutdown
  const shutdown = async () => {
    logger.info('Shutting down...');
    await app.close();
    stopChangeLog();
    store.close();
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((error) => {
      logger.error({ err: error }, 'Shutdown failed');
      process.exit(1);
    });
  };

  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);
}

async function main() {
  // commander exits by itself on --help, --version and usage errors
  const invocation = parseInvocation(process.argv.slice(2));

  const config = loadConfig();
  logger.level = config.logLevel;

  const eventBus = createNoteEventBus();
  const stopChangeLog = eventBus.subscribe('*', (event) => {
    logger.info(
      { eventType: event.type, payload: event.payload, source: event.source },
      'Notebook changed'
    );
  });

  const store = SqliteNoteStore.open(config.database.path, { eventBus });
  logger.debug({ database: config.database.path }, 'Connected to notebook database');

  if (invocation.mode === 'serve') {
    await serve(store, config, invocation.options, stopChangeLog);
    return;
  }

  const input = new ReadlineLineSource(process.stdin);
  const dispatcher = new CommandDispatcher(store, {
    input,
    report: createStreamReport(process.stdout),
  });

  try {
    await dispatcher.execute(invocation.command);
    logger.debug('Command executed');
  } finally {
    stopChangeLog();
    input.close();
    store.close();
  }
}

main().catch((error) => {
  if (error instanceof NotebookError) {
    logger.error({ code: error.code, err: error.cause }, error.message);
  } else {
    logger.error({ err: error }, 'Fatal error');
  }
  process.exit(1);
});
