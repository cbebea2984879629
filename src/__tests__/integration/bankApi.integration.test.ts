/**
 * Integration Tests — Bank REST API
 *
 * The whole stack: Express middleware, controller, BankService and
 * KnexBankRepository over a fresh in-memory SQLite database per test
 * (registered in the DI container by useTestDatabase before the app is built).
 *
 *   GET     /api/banks        list
 *   POST    /api/banks        create
 *   GET     /api/banks/:id    read
 *   PUT     /api/banks/:id    partial update (PATCH behaves the same)
 *   DELETE  /api/banks/:id    delete
 */
import { createApp } from '@interfaces/http/app';
import type { Express } from 'express';
import request from 'supertest';

import { useTestDatabase } from '../helpers/testDatabase';

describe('Bank API', () => {
  useTestDatabase();

  let app: Express;

  beforeEach(() => {
    app = createApp();
  });

  async function createBank(name: string, location: string): Promise<number> {
    const res = await request(app).post('/api/banks').send({ name, location });
    expect(res.status).toBe(201);
    return res.body.id;
  }

  describe('POST /api/banks', () => {
    it('should return 201 with the stored bank and its new id', async () => {
      const res = await request(app)
        .post('/api/banks')
        .send({ name: 'Test Bank', location: 'Test City' });

      expect(res.status).toBe(201);
      expect(res.body).toEqual({ id: expect.any(Number), name: 'Test Bank', location: 'Test City' });
    });

    it('should echo names and locations exactly as sent, whitespace included', async () => {
      const res = await request(app)
        .post('/api/banks')
        .send({ name: '  Test Bank ', location: 'Test City\n' });

      expect(res.status).toBe(201);
      expect(res.body.name).toBe('  Test Bank ');
      expect(res.body.location).toBe('Test City\n');

      const stored = await request(app).get(`/api/banks/${res.body.id}`);
      expect(stored.body).toEqual({ id: res.body.id, name: '  Test Bank ', location: 'Test City\n' });
    });

    it('should make the new bank retrievable straight away', async () => {
      const id = await createBank('Single Bank', 'Single City');

      const res = await request(app).get(`/api/banks/${id}`);

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ id, name: 'Single Bank', location: 'Single City' });
    });

    it('should return 400 and store nothing when name is missing', async () => {
      const res = await request(app).post('/api/banks').send({ location: 'Test City' });

      expect(res.status).toBe(400);
      expect(res.body).toEqual({ status: 'error', message: 'name is required' });

      const list = await request(app).get('/api/banks');
      expect(list.body).toEqual([]);
    });

    it('should return 400 when location is empty', async () => {
      const res = await request(app).post('/api/banks').send({ name: 'Test Bank', location: '' });

      expect(res.status).toBe(400);
      expect(res.body.message).toBe('location is required');
    });

    it('should return 400 when there is no body at all', async () => {
      const res = await request(app).post('/api/banks');

      expect(res.status).toBe(400);
      expect(res.body.message).toBe('name is required; location is required');
    });

    it('should return 400 for malformed JSON', async () => {
      const res = await request(app)
        .post('/api/banks')
        .set('Content-Type', 'application/json')
        .send('{"name": ');

      expect(res.status).toBe(400);
      expect(res.body).toEqual({ status: 'error', message: 'Request body is not valid JSON' });
    });
  });

  describe('GET /api/banks', () => {
    it('should return an empty array when there are no banks', async () => {
      const res = await request(app).get('/api/banks');

      expect(res.status).toBe(200);
      expect(res.body).toEqual([]);
    });

    it('should return exactly one entry per successful create', async () => {
      await createBank('Bank A', 'City A');
      await createBank('Bank B', 'City B');
      await request(app).post('/api/banks').send({ name: 'No Location' });

      const res = await request(app).get('/api/banks');

      expect(res.status).toBe(200);
      expect(res.body).toHaveLength(2);
      expect(res.body.map((bank: { name: string }) => bank.name)).toEqual(['Bank A', 'Bank B']);
    });
  });

  describe('GET /api/banks/:id', () => {
    it('should return 404 for an id that was never created', async () => {
      const res = await request(app).get('/api/banks/999');

      expect(res.status).toBe(404);
      expect(res.body).toEqual({ status: 'error', message: 'Bank not found: 999' });
    });

    it('should return 404 for an id that is not a number', async () => {
      const res = await request(app).get('/api/banks/abc');

      expect(res.status).toBe(404);
      expect(res.body.message).toBe('Bank not found: abc');
    });

    it('should return 404 for an id past the range of the id column', async () => {
      const res = await request(app).get('/api/banks/2147483648');

      expect(res.status).toBe(404);
      expect(res.body).toEqual({ status: 'error', message: 'Bank not found: 2147483648' });
    });
  });

  describe('PUT/PATCH /api/banks/:id', () => {
    it('should update only the location and keep the name', async () => {
      const id = await createBank('Old Name', 'Old City');

      const res = await request(app).put(`/api/banks/${id}`).send({ location: 'New City' });

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ id, name: 'Old Name', location: 'New City' });
    });

    it('should accept PATCH with the same partial semantics', async () => {
      const id = await createBank('Old Name', 'Old City');

      const res = await request(app).patch(`/api/banks/${id}`).send({ name: 'New Name' });

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ id, name: 'New Name', location: 'Old City' });
    });

    it('should ignore an id in the body', async () => {
      const id = await createBank('Old Name', 'Old City');

      const res = await request(app).put(`/api/banks/${id}`).send({ id: 500, name: 'Renamed' });

      expect(res.body.id).toBe(id);
      expect((await request(app).get('/api/banks/500')).status).toBe(404);
    });

    it('should return 400 and keep the record when a field is blanked', async () => {
      const id = await createBank('Old Name', 'Old City');

      const res = await request(app).put(`/api/banks/${id}`).send({ location: '' });

      expect(res.status).toBe(400);
      expect(res.body.message).toBe('location is required');

      const after = await request(app).get(`/api/banks/${id}`);
      expect(after.body).toEqual({ id, name: 'Old Name', location: 'Old City' });
    });

    it('should return 404 for an unknown id', async () => {
      const res = await request(app).put('/api/banks/999').send({ name: 'Nobody' });

      expect(res.status).toBe(404);
    });
  });

  describe('DELETE /api/banks/:id', () => {
    it('should delete the bank so it can no longer be fetched', async () => {
      const id = await createBank('Delete Me', 'Somewhere');

      const res = await request(app).delete(`/api/banks/${id}`);

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ message: 'Bank deleted' });
      expect((await request(app).get(`/api/banks/${id}`)).status).toBe(404);
    });

    it('should return 404 every time the same id is deleted again', async () => {
      const id = await createBank('Delete Me', 'Somewhere');
      await request(app).delete(`/api/banks/${id}`);

      const second = await request(app).delete(`/api/banks/${id}`);
      const third = await request(app).delete(`/api/banks/${id}`);

      expect(second.status).toBe(404);
      expect(third.status).toBe(404);
    });

    it('should not hand a deleted id to the next bank', async () => {
      await createBank('Bank A', 'City A');
      const deletedId = await createBank('Bank B', 'City B');
      await request(app).delete(`/api/banks/${deletedId}`);

      const nextId = await createBank('Bank C', 'City C');

      expect(nextId).not.toBe(deletedId);
    });
  });

  it('should answer unknown API routes with a JSON 404', async () => {
    const res = await request(app).get('/api/accounts');

    expect(res.status).toBe(404);
    expect(res.body).toEqual({ status: 'error', message: 'Route not found: GET /api/accounts' });
  });
});
