import { Router } from 'express';
import { z } from 'zod';
import { CreateCredentialUseCase } from '../../../application/credentials/createCredential.js';
import { CredentialQueries } from '../../../application/credentials/queries.js';
import type { DatabaseProvider } from '../../db/client.js';
import { asyncHandler } from '../middleware/asyncHandler.js';
import { validate } from '../middleware/validate.js';

/**
 * @openapi
 * /api/credentials:
 *   post:
 *     tags: [Credentials]
 *     summary: Store a credential
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema: { $ref: '#/components/schemas/Credential' }
 *     responses:
 *       200:
 *         description: Created
 *         content:
 *           application/json:
 *             schema:
 *               type: object
 *               required: [id]
 *               properties:
 *                 id: { type: string, example: 65a1f0c2e4b0a1b2c3d4e5f6 }
 *       422:
 *         description: Validation error
 *       500:
 *         description: Store failure
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *   get:
 *     tags: [Credentials]
 *     summary: List or search credentials
 *     parameters:
 *       - in: query
 *         name: q
 *         required: false
 *         description: Search text for title or username
 *         schema: { type: string }
 *     responses:
 *       200:
 *         description: OK
 *         content:
 *           application/json:
 *             schema:
 *               type: array
 *               items: { $ref: '#/components/schemas/CredentialOut' }
 *       500:
 *         description: Store failure
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 */

const createCredentialBodySchema = z.object({
  title: z.string(),
  username: z.string(),
  password: z.string(),
  url: z.string().nullish(),
  note: z.string().nullish(),
});

// Single text parameter: a repeated q keeps its last value, a nested one is ignored
const listCredentialsQuerySchema = z.object({
  q: z.preprocess(
    (value) => (Array.isArray(value) ? value[value.length - 1] : value),
    z.unknown().transform((value) => (typeof value === 'string' ? value : undefined))
  ),
});

export function createCredentialRoutes(getDatabase: DatabaseProvider) {
  const router = Router();
  const createCredentialUseCase = new CreateCredentialUseCase(getDatabase);
  const queries = new CredentialQueries(getDatabase);

  // Create credential
  router.post(
    '/credentials',
    validate({ body: createCredentialBodySchema }),
    asyncHandler(async (req, res) => {
      const result = await createCredentialUseCase.execute(req.body);
      res.json(result);
    })
  );

  // List / search credentials
  router.get(
    '/credentials',
    validate({ query: listCredentialsQuerySchema }),
    asyncHandler(async (req, res) => {
      const q = typeof req.query.q === 'string' ? req.query.q : undefined;
      const credentials = await queries.listCredentials(q);
      res.json(credentials);
    })
  );

  return router;
}
