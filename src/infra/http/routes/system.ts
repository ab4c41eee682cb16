import { Router } from 'express';
import { DatabaseDiagnosticsQuery } from '../../../application/diagnostics/databaseStatus.js';
import type { DatabaseProvider } from '../../db/client.js';
import { asyncHandler } from '../middleware/asyncHandler.js';

/**
 * @openapi
 * /:
 *   get:
 *     tags: [System]
 *     summary: Greeting
 *     responses:
 *       200: { description: OK }
 *
 * /api/hello:
 *   get:
 *     tags: [System]
 *     summary: Greeting
 *     responses:
 *       200: { description: OK }
 *
 * /test:
 *   get:
 *     tags: [System]
 *     summary: Database connectivity diagnostic
 *     description: Always answers 200; failures are reported in the payload.
 *     responses:
 *       200:
 *         description: Diagnostic report
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/DatabaseDiagnostics' }
 */
export function createSystemRoutes(getDatabase: DatabaseProvider, env: NodeJS.ProcessEnv) {
  const router = Router();
  const diagnostics = new DatabaseDiagnosticsQuery(getDatabase, env);

  router.get('/', (_req, res) => {
    res.json({ message: 'Hello from FastAPI Backend!' });
  });

  router.get('/api/hello', (_req, res) => {
    res.json({ message: 'Hello from the backend API!' });
  });

  router.get(
    '/test',
    asyncHandler(async (_req, res) => {
      res.json(await diagnostics.run());
    })
  );

  return router;
}
