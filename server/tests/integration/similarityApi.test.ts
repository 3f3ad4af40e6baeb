/**
 * Similarity API Integration Tests
 * Exercises the HTTP surface end to end with supertest; no port is bound
 */

import { describe, it, expect, beforeAll } from 'vitest';
import express, { type Express } from 'express';
import request from 'supertest';
import { registerRoutes } from '../../routes';

const corpus = [
  { text: 'The cat sat on the mat.' },
  { text: 'The cat sat on the rug!' },
  { text: 'Completely unrelated text about space travel' },
];

describe('Similarity API', () => {
  let app: Express;

  beforeAll(() => {
    app = express();
    app.use(express.json());
    app.use((_req, res, next) => {
      res.locals.requestId = 'req-test';
      next();
    });
    registerRoutes(app);
  });

  describe('GET /api/healthz', () => {
    it('should report status and uptime', async () => {
      const res = await request(app).get('/api/healthz');

      expect(res.status).toBe(200);
      expect(res.body.status).toBe('ok');
      expect(typeof res.body.uptimeSec).toBe('number');
    });
  });

  describe('GET /metrics', () => {
    it('should be hidden outside development', async () => {
      const res = await request(app).get('/metrics');
      expect(res.status).toBe(404);
    });
  });

  describe('POST /api/similarity', () => {
    it('should estimate pairwise similarity for a seeded request', async () => {
      const res = await request(app)
        .post('/api/similarity')
        .send({ documents: corpus, shingleSize: 3, numHashes: 100, seed: 42 });

      expect(res.status).toBe(200);
      expect(res.body).toMatchObject({
        shingleSize: 3,
        numHashes: 100,
        similarityThreshold: 0.5,
        documents: [
          { id: 1, shingleCount: 4 },
          { id: 2, shingleCount: 4 },
          { id: 3, shingleCount: 4 },
        ],
        results: [
          { indexA: 0, indexB: 1, similarity: 0.65 },
          { indexA: 0, indexB: 2, similarity: 0 },
          { indexA: 1, indexB: 2, similarity: 0 },
        ],
        report: ['Document 1 is similar to Document 2 with similarity 0.65000000'],
      });
      expect(res.body.stats).toMatchObject({ documentCount: 3, pairCount: 3, emptyDocuments: 0 });
    });

    it('should return the same results for the same seed', async () => {
      const body = { documents: corpus, numHashes: 32, seed: 9 };
      const first = await request(app).post('/api/similarity').send(body);
      const second = await request(app).post('/api/similarity').send(body);

      expect(second.body.results).toEqual(first.body.results);
    });

    it('should label report lines with caller-supplied ids', async () => {
      const res = await request(app)
        .post('/api/similarity')
        .send({
          documents: [
            { id: 10, text: 'one two three four' },
            { id: 20, text: 'one two three four' },
          ],
          shingleSize: 2,
          seed: 1,
        });

      expect(res.status).toBe(200);
      expect(res.body.report).toEqual([
        'Document 10 is similar to Document 20 with similarity 1.00000000',
      ]);
    });

    it('should keep punctuation when normalization is off', async () => {
      const res = await request(app)
        .post('/api/similarity')
        .send({
          documents: [{ text: 'Alpha, beta' }, { text: 'alpha beta' }],
          shingleSize: 2,
          numHashes: 16,
          seed: 3,
          normalize: false,
        });

      expect(res.status).toBe(200);
      expect(res.body.results).toEqual([{ indexA: 0, indexB: 1, similarity: 0 }]);
    });

    it('should answer 422 for an empty corpus', async () => {
      const res = await request(app).post('/api/similarity').send({ documents: [] });

      expect(res.status).toBe(422);
      expect(res.body.error).toMatchObject({
        code: 'EMPTY_CORPUS',
        message: 'Corpus contains no documents',
        requestId: 'req-test',
      });
    });

    it('should answer 400 for an invalid payload', async () => {
      const res = await request(app)
        .post('/api/similarity')
        .send({ documents: [{ text: 'a' }], numHashes: 0 });

      expect(res.status).toBe(400);
      expect(res.body.error).toBe('Invalid payload');
      expect(res.body.code).toBe('VALIDATION_ERROR');
    });

    it('should answer 400 for duplicate ids', async () => {
      const res = await request(app)
        .post('/api/similarity')
        .send({ documents: [{ id: 1, text: 'a b c' }, { id: 1, text: 'd e f' }] });

      expect(res.status).toBe(400);
      expect(res.body.details[0].message).toBe('Document ids must be unique');
    });
  });
});
