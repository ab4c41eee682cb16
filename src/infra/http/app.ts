import express, { Express } from 'express';
import cors from 'cors';
import type { DatabaseProvider } from '../db/client.js';
import { createCredentialRoutes } from './routes/credentials.js';
import { createSystemRoutes } from './routes/system.js';
import { createSwaggerRoutes } from './routes/swagger.js';
import { errorHandler } from './middleware/errorHandler.js';

export interface AppDependencies {
  getDatabase: DatabaseProvider;
  /** Environment inspected by the /test diagnostic. Defaults to process.env. */
  env?: NodeJS.ProcessEnv;
}

export function createApp({ getDatabase, env = process.env }: AppDependencies): Express {
  const app = express();

  // Any origin (reflected), any header, credentialed requests allowed
  app.use(cors({ origin: true, credentials: true }));
  app.use(express.json());

  app.use(createSystemRoutes(getDatabase, env));

  // Swagger/OpenAPI docs
  app.use(createSwaggerRoutes());

  app.use('/api', createCredentialRoutes(getDatabase));

  // Error handler (must be last)
  app.use(errorHandler);

  return app;
}
