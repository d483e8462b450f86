import dotenv from 'dotenv';
import { AppConfig } from '../types/index.js';
import { ConfigError } from '../core/errors.js';

dotenv.config();

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const databasePath = env.NOTEBOOK_DATABASE?.trim();
  if (!databasePath) {
    throw new ConfigError(
      'Database for the notebook is not specified; ' +
        'set NOTEBOOK_DATABASE (e.g. `export NOTEBOOK_DATABASE=./notebook.db`) before starting'
    );
  }

  return {
    database: {
      path: databasePath,
    },
    server: {
      port: parseInt(env.PORT || '3000', 10),
      host: env.HOST || '0.0.0.0',
    },
    logLevel: env.LOG_LEVEL || 'info',
  };
}
