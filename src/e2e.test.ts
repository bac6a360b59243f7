import request from 'supertest';
import path from 'path';
import { Express } from 'express';
import { app as defaultApp, createApp } from './index';
import { CompetitionService } from './competition';
import { MemoryStore } from './memoryStore';
import { applySeed, loadSeedFile } from './seed';
import { createCategoryRuleSet } from './categoryRules';
import { createScoringEngine } from './scoring';
import { TEST_NOW } from './testData';

describe('E2E API Tests', () => {
  const seedPath = path.join(__dirname, '../test/seed.json');
  let store: MemoryStore;
  let app: Express;

  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);

    store = new MemoryStore(1000);
    applySeed(store, loadSeedFile(seedPath));
    const service = new CompetitionService({
      store,
      rules: createCategoryRuleSet(),
      scoring: createScoringEngine(),
      defaultMaxRuns: 5,
      prizeDiscountPercent: 5,
      transactionTimeoutMs: 1000,
      clock: () => TEST_NOW,
      random: () => 0.999999,
    });
    app = createApp(service, { storeStats: () => store.stats() });
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('GET /health', () => {
    it('should report status and store counts', async () => {
      const response = await request(app).get('/health').expect(200);
      expect(response.body.status).toBe('ok');
      expect(response.body.store.competitors).toBe(7);
      expect(response.body.store.quotas).toBe(0);
    });

    it('should be served by the default application', async () => {
      const response = await request(defaultApp).get('/health').expect(200);
      expect(response.body.status).toBe('ok');
    });
  });

  describe('POST /api/trios/validate', () => {
    it('should accept an eligible trio', async () => {
      const response = await request(app)
        .post('/api/trios/validate')
        .send({ categoryId: 6, competitorIds: [1, 2, 3] })
        .expect(200);
      expect(response.body).toEqual({ valid: true, reason: 'Trio is eligible for the category' });
    });

    it('should answer a rejected composition with 200 and a reason', async () => {
      const response = await request(app)
        .post('/api/trios/validate')
        .send({ categoryId: 6, competitorIds: [1, 2, 4] })
        .expect(200);
      expect(response.body).toEqual({ valid: false, reason: 'Combined handicap 12 exceeds limit 11' });
    });

    it('should reject a malformed body', async () => {
      const response = await request(app)
        .post('/api/trios/validate')
        .send({ categoryId: 6, competitorIds: 'x' })
        .expect(400);
      expect(response.body.error).toBe("'competitorIds' must be a list of ids");
      expect(response.body.code).toBe('VALIDATION_ERROR');
      expect(response.body.timestamp).toBeDefined();
    });
  });

  describe('Full flow: quotas -> trio -> runs -> placements -> scores', () => {
    it('should run a SOMA11 trio through an event', async () => {
      for (const competitorId of [1, 2, 3]) {
        const provisioned = await request(app).post(`/api/quotas/auto-provision/${competitorId}`).expect(200);
        expect(provisioned.body).toHaveLength(1);
        expect(provisioned.body[0]).toMatchObject({ eventId: 1, categoryId: 6, maxRunsAllowed: 2 });
      }

      const trio = await request(app)
        .post('/api/trios')
        .send({ eventId: 1, categoryId: 6, competitorIds: [1, 2, 3] })
        .expect(201);
      expect(trio.body.number).toBe(1);
      expect(trio.body.handicapTotal).toBe(11);

      const result = await request(app).post('/api/results').send({ trioId: trio.body.id, prize: 1200 }).expect(201);
      expect(result.body.netPrize).toBeCloseTo(1140);

      const run = await request(app)
        .put(`/api/results/${result.body.id}/run`)
        .send({ attempts: [8.5, 9.5] })
        .expect(200);
      expect(run.body.averageTime).toBe(9);

      const decision = await request(app).get('/api/quotas/can-compete/1/1/6').expect(200);
      expect(decision.body).toMatchObject({ mayCompete: true, state: 'ACTIVE', runsRemaining: 1 });

      await request(app).put(`/api/results/${result.body.id}/run`).send({ attempts: [9] }).expect(200);
      const refused = await request(app)
        .put(`/api/results/${result.body.id}/run`)
        .send({ attempts: [9] })
        .expect(409);
      expect(refused.body.code).toBe('QUOTA_EXHAUSTED');

      const placements = await request(app).post('/api/events/1/placements?categoryId=6').expect(200);
      expect(placements.body).toHaveLength(1);
      expect(placements.body[0].placement).toBe(1);

      const scores = await request(app).post('/api/events/1/scores?categoryId=6').expect(200);
      expect(scores.body).toHaveLength(4);
      expect(scores.body[0]).toMatchObject({ competitorId: null, placement: 1, placementPoints: 10 });
      expect(scores.body.slice(1).map((s: { competitorId: number }) => s.competitorId)).toEqual([1, 2, 3]);

      const report = await request(app).get('/api/events/1/consistency').expect(200);
      expect(report.body).toEqual({ eventId: 1, totalResults: 1, issues: [], valid: true });
    });
  });

  describe('Quota routes', () => {
    it('should create a quota and refuse a duplicate', async () => {
      const created = await request(app)
        .post('/api/quotas')
        .send({ competitorId: 4, eventId: 2, categoryId: 5 })
        .expect(201);
      expect(created.body.maxRunsAllowed).toBe(5);

      const duplicate = await request(app)
        .post('/api/quotas')
        .send({ competitorId: 4, eventId: 2, categoryId: 5 })
        .expect(409);
      expect(duplicate.body.code).toBe('DUPLICATE_QUOTA');
    });

    it('should block a competitor', async () => {
      const created = await request(app)
        .post('/api/quotas')
        .send({ competitorId: 4, eventId: 2, categoryId: 5 })
        .expect(201);
      const updated = await request(app)
        .put(`/api/quotas/${created.body.id}`)
        .send({ mayCompete: false, blockReason: 'Unpaid entry' })
        .expect(200);
      expect(updated.body).toMatchObject({ mayCompete: false, blockReason: 'Unpaid entry', version: 2 });
    });

    it('should validate ids and report missing quotas', async () => {
      const invalid = await request(app).put('/api/quotas/abc').send({ mayCompete: true }).expect(400);
      expect(invalid.body.error).toBe('Invalid parameter format: id must be numeric');

      const missing = await request(app).put('/api/quotas/999').send({ mayCompete: true }).expect(404);
      expect(missing.body).toMatchObject({ error: 'Quota 999 not found', code: 'NOT_FOUND' });
    });
  });

  describe('Trio routes', () => {
    it('should draw FEMININA trios', async () => {
      const response = await request(app)
        .post('/api/trios/draw')
        .send({ eventId: 1, categoryId: 4, competitorIds: [3, 5, 6], runsPerCompetitor: 1 })
        .expect(201);
      expect(response.body.trios).toHaveLength(1);
      expect(response.body.trios[0].memberIds).toEqual([3, 5, 6]);
      expect(response.body.trios[0].drawn).toBe(true);
    });

    it('should draw as many trios as the run limit allows by default', async () => {
      const response = await request(app)
        .post('/api/trios/draw')
        .send({ eventId: 1, categoryId: 4, competitorIds: [3, 5, 6] })
        .expect(201);
      expect(response.body.trios).toHaveLength(5);
      expect(response.body.shortfall).toEqual([]);
    });

    it('should refuse a trio that breaks the category rules', async () => {
      const response = await request(app)
        .post('/api/trios')
        .send({ eventId: 1, categoryId: 4, competitorIds: [1, 5, 6] })
        .expect(400);
      expect(response.body.error).toBe('Category FEMININA only accepts sex F; Rider One is M');
    });

    it('should soft-delete a trio', async () => {
      const trio = await request(app)
        .post('/api/trios')
        .send({ eventId: 1, categoryId: 5, competitorIds: [1, 2, 4] })
        .expect(201);
      const deleted = await request(app).delete(`/api/trios/${trio.body.id}`).expect(200);
      expect(deleted.body.deletedAt).not.toBeNull();
      await request(app).delete(`/api/trios/${trio.body.id}`).expect(404);
    });
  });

  describe('Event routes', () => {
    it('should validate the category query parameter', async () => {
      const response = await request(app).post('/api/events/1/placements?categoryId=x').expect(400);
      expect(response.body.error).toBe('Invalid parameter format: categoryId must be numeric');
    });

    it('should return an empty ranking for an event without results', async () => {
      const response = await request(app).post('/api/events/2/placements').expect(200);
      expect(response.body).toEqual([]);
    });

    it('should report unknown events', async () => {
      const response = await request(app).get('/api/events/99/consistency').expect(404);
      expect(response.body.code).toBe('NOT_FOUND');
    });
  });
});
