import { describe, it, expect, beforeEach } from 'vitest';
import request from 'supertest';
import express from 'express';
import { z } from 'zod';
import { asyncHandler } from '../middleware/asyncHandler.js';
import { errorHandler } from '../middleware/errorHandler.js';

describe('errorHandler', () => {
  let app: express.Express;

  beforeEach(() => {
    app = express();
    app.use(express.json());

    app.get(
      '/string-rejection',
      asyncHandler(async () => {
        await Promise.reject('socket hang up');
      })
    );

    app.get('/zod', () => {
      z.object({ name: z.string() }).parse({});
    });

    app.get('/not-found', () => {
      throw Object.assign(new Error('no such thing'), { statusCode: 404 });
    });

    app.get('/server-status', () => {
      throw Object.assign(new Error('upstream broke'), { status: 502 });
    });

    app.post('/echo', (req, res) => {
      res.json(req.body);
    });

    app.use(errorHandler);
  });

  it('maps a non-Error rejection to 500 with its text', async () => {
    const res = await request(app).get('/string-rejection');

    expect(res.status).toBe(500);
    expect(res.body).toEqual({ detail: 'socket hang up' });
  });

  it('maps a ZodError to 422 with its issues', async () => {
    const res = await request(app).get('/zod');

    expect(res.status).toBe(422);
    expect(res.body).toEqual({ detail: [{ path: 'name', message: 'Required' }] });
  });

  it('keeps a 4xx status carried by the error', async () => {
    const res = await request(app).get('/not-found');

    expect(res.status).toBe(404);
    expect(res.body).toEqual({ detail: 'no such thing' });
  });

  it('does not trust a 5xx status carried by the error', async () => {
    const res = await request(app).get('/server-status');

    expect(res.status).toBe(500);
    expect(res.body).toEqual({ detail: 'upstream broke' });
  });

  it('answers 400 for malformed JSON', async () => {
    const res = await request(app)
      .post('/echo')
      .set('Content-Type', 'application/json')
      .send('{"name": ');

    expect(res.status).toBe(400);
    expect(typeof res.body.detail).toBe('string');
  });
});
