import { describe, it, expect, beforeEach } from 'vitest';
import request from 'supertest';
import type { Express } from 'express';
import { createTestApp, isoAt, kyusuPayload, senchaPayload } from '../testing';
import type { MemoryStore } from '../store';

describe('Brew routes', () => {
  let app: Express;
  let store: MemoryStore;
  let teapotId: string;
  let teaId: string;

  beforeEach(async () => {
    ({ app, store } = createTestApp());
    // These take clock ticks 0 and 1
    teapotId = (await request(app).post('/teapots').send(kyusuPayload)).body.id;
    teaId = (await request(app).post('/teas').send(senchaPayload)).body.id;
  });

  const createBrew = async (overrides: Record<string, unknown> = {}) => {
    const response = await request(app).post('/brews').send({ teapotId, teaId, ...overrides });
    expect(response.status).toBe(201);
    return response.body;
  };

  describe('POST /brews', () => {
    it('should start a brew in the preparing state', async () => {
      const response = await request(app).post('/brews').send({ teapotId, teaId, notes: 'First flush' });

      expect(response.status).toBe(201);
      expect(response.body).toEqual({
        id: expect.any(String),
        teapotId,
        teaId,
        status: 'preparing',
        waterTempCelsius: 75,
        notes: 'First flush',
        startedAt: isoAt(2),
        completedAt: null,
        createdAt: isoAt(2),
        updatedAt: isoAt(2),
      });
    });

    it("should default the water temperature to the tea's steep temperature", async () => {
      const brew = await createBrew();

      expect(brew.waterTempCelsius).toBe(75);
    });

    it('should keep an explicit water temperature', async () => {
      const brew = await createBrew({ waterTempCelsius: 90 });

      expect(brew.waterTempCelsius).toBe(90);
    });

    it('should accept references that do not exist', async () => {
      const response = await request(app).post('/brews').send({ teapotId: 'no-such-teapot', teaId: 'no-such-tea' });

      expect(response.status).toBe(201);
      expect(response.body.teapotId).toBe('no-such-teapot');
      expect(response.body.waterTempCelsius).toBe(85);
    });

    it('should require teapotId and teaId', async () => {
      const response = await request(app).post('/brews').send({ waterTempCelsius: 80 });

      expect(response.status).toBe(400);
      expect(response.body.details).toEqual({ teapotId: 'Required', teaId: 'Required' });
    });

    it('should reject empty teapot and tea ids', async () => {
      const response = await request(app).post('/brews').send({ teapotId: '', teaId: '' });

      expect(response.status).toBe(400);
      expect(response.body.details).toEqual({
        teapotId: 'String must contain at least 1 character(s)',
        teaId: 'String must contain at least 1 character(s)',
      });
      expect(store.count('brews')).toBe(0);
    });

    it('should reject a water temperature below 60', async () => {
      const response = await request(app).post('/brews').send({ teapotId, teaId, waterTempCelsius: 40 });

      expect(response.status).toBe(400);
      expect(response.body.details).toEqual({ waterTempCelsius: 'Number must be greater than or equal to 60' });
    });
  });

  describe('GET /brews', () => {
    it('should filter by status, teapot and tea', async () => {
      const first = await createBrew();
      await createBrew({ teaId: 'other-tea' });
      await request(app).patch(`/brews/${first.id}`).send({ status: 'ready' });

      const ready = await request(app).get('/brews').query({ status: 'ready' });
      const byTea = await request(app).get('/brews').query({ teaId, teapotId });

      expect(ready.body.data.map((b: { id: string }) => b.id)).toEqual([first.id]);
      expect(byTea.body.pagination.total).toBe(1);
    });

    it('should reject an unknown status', async () => {
      const response = await request(app).get('/brews').query({ status: 'burnt' });

      expect(response.status).toBe(400);
      expect(response.body.details).toHaveProperty('status');
    });
  });

  describe('GET /brews/:id', () => {
    it('should return the brew', async () => {
      const brew = await createBrew();

      const response = await request(app).get(`/brews/${brew.id}`);

      expect(response.status).toBe(200);
      expect(response.body).toEqual(brew);
    });

    it('should return 404 for an unknown id', async () => {
      const response = await request(app).get('/brews/unknown-id');

      expect(response.status).toBe(404);
      expect(response.body).toEqual({ code: 'NOT_FOUND', message: 'Brew not found' });
    });
  });

  describe('GET /brews/:id/details', () => {
    it('should embed the teapot and tea', async () => {
      const brew = await createBrew();
      const teapot = (await request(app).get(`/teapots/${teapotId}`)).body;
      const tea = (await request(app).get(`/teas/${teaId}`)).body;

      const response = await request(app).get(`/brews/${brew.id}/details`);

      expect(response.status).toBe(200);
      expect(response.body).toEqual({ ...brew, teapot, tea });
    });

    it('should return null for a reference that dangles', async () => {
      const brew = await createBrew({ teaId: 'no-such-tea' });

      const response = await request(app).get(`/brews/${brew.id}/details`);

      expect(response.body.tea).toBeNull();
      expect(response.body.teapot.id).toBe(teapotId);
    });
  });

  describe('PATCH /brews/:id', () => {
    it('should update status, notes and completedAt', async () => {
      const brew = await createBrew({ notes: 'Rinse leaves' });

      const response = await request(app)
        .patch(`/brews/${brew.id}`)
        .send({ status: 'served', notes: null, completedAt: '2025-01-01T00:10:00Z' });

      expect(response.status).toBe(200);
      expect(response.body).toEqual({
        ...brew,
        status: 'served',
        notes: null,
        completedAt: '2025-01-01T00:10:00.000Z',
        updatedAt: isoAt(3),
      });
    });

    it('should leave the teapot and tea alone', async () => {
      const brew = await createBrew();

      const response = await request(app).patch(`/brews/${brew.id}`).send({ teapotId: 'swapped', status: 'steeping' });

      expect(response.status).toBe(200);
      expect(response.body.teapotId).toBe(teapotId);
      expect(response.body.status).toBe('steeping');
    });

    it('should reject a completedAt that is not a timestamp', async () => {
      const brew = await createBrew();

      const response = await request(app).patch(`/brews/${brew.id}`).send({ completedAt: 'yesterday' });

      expect(response.status).toBe(400);
      expect(response.body.details).toEqual({ completedAt: 'Invalid datetime, expected ISO 8601' });
    });

    it('should return 404 for an unknown id', async () => {
      const response = await request(app).patch('/brews/unknown-id').send({ status: 'cold' });

      expect(response.status).toBe(404);
    });
  });

  describe('DELETE /brews/:id', () => {
    it('should delete the brew and its steeps', async () => {
      const brew = await createBrew();
      await request(app).post(`/brews/${brew.id}/steeps`).send({ durationSeconds: 20 });

      const first = await request(app).delete(`/brews/${brew.id}`);
      const second = await request(app).delete(`/brews/${brew.id}`);

      expect(first.status).toBe(204);
      expect(second.status).toBe(404);
      expect(store.count('steeps')).toBe(0);
    });
  });

  describe('steeps', () => {
    it('should number steeps in order', async () => {
      const brew = await createBrew();

      const first = await request(app).post(`/brews/${brew.id}/steeps`).send({ durationSeconds: 20, rating: 4 });
      const second = await request(app)
        .post(`/brews/${brew.id}/steeps`)
        .send({ durationSeconds: 30, notes: 'Sweeter' });

      expect(first.status).toBe(201);
      expect(first.body).toEqual({
        id: expect.any(String),
        brewId: brew.id,
        steepNumber: 1,
        durationSeconds: 20,
        rating: 4,
        notes: null,
        createdAt: isoAt(3),
      });
      expect(second.body.steepNumber).toBe(2);
      expect(second.body.rating).toBeNull();
    });

    it('should return 404 when the brew does not exist', async () => {
      const response = await request(app).post('/brews/unknown-brew/steeps').send({ durationSeconds: 20 });

      expect(response.status).toBe(404);
      expect(response.body).toEqual({ code: 'NOT_FOUND', message: 'Brew not found' });
      expect(store.count('steeps')).toBe(0);
    });

    it('should reject a rating outside 1-5', async () => {
      const brew = await createBrew();

      const response = await request(app).post(`/brews/${brew.id}/steeps`).send({ durationSeconds: 20, rating: 6 });

      expect(response.status).toBe(400);
      expect(response.body.details).toEqual({ rating: 'Number must be less than or equal to 5' });
    });

    it('should list the steeps of one brew', async () => {
      const brew = await createBrew();
      const other = await createBrew();
      await request(app).post(`/brews/${brew.id}/steeps`).send({ durationSeconds: 15 });
      await request(app).post(`/brews/${other.id}/steeps`).send({ durationSeconds: 25 });
      await request(app).post(`/brews/${brew.id}/steeps`).send({ durationSeconds: 35 });

      const response = await request(app).get(`/brews/${brew.id}/steeps`);

      expect(response.status).toBe(200);
      expect(response.body.data.map((s: { durationSeconds: number }) => s.durationSeconds)).toEqual([15, 35]);
      expect(response.body.data.map((s: { steepNumber: number }) => s.steepNumber)).toEqual([1, 2]);
      expect(response.body.pagination.total).toBe(2);
    });

    it('should return 404 listing steeps of an unknown brew', async () => {
      const response = await request(app).get('/brews/unknown-brew/steeps');

      expect(response.status).toBe(404);
    });
  });
});
