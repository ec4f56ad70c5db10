/**
 * Integration Tests — Health Endpoints
 *
 *   GET /api/v1/health        liveness, no I/O
 *   GET /api/v1/health/ready  readiness, pings storage
 *
 * Nothing is mocked here: the container's real KnexPostRepository pings the
 * in-memory SQLite database configured in jest.setup.ts. Supertest drives the
 * app in process, so no port is bound.
 */
import { destroyDbConnection } from '@infrastructure/database/connection';
import { createApp } from '@interfaces/http/app';
import request from 'supertest';

describe('health endpoints', () => {
  const app = createApp();

  afterAll(async () => {
    await destroyDbConnection();
  });

  describe('GET /api/v1/health', () => {
    it('should return 200 with status "ok"', async () => {
      const res = await request(app).get('/api/v1/health');

      expect(res.status).toBe(200);
      expect(res.body.status).toBe('ok');
    });

    it('should include uptime in seconds and an ISO 8601 timestamp', async () => {
      const res = await request(app).get('/api/v1/health');

      expect(res.body.uptime).toBeGreaterThanOrEqual(0);
      expect(new Date(res.body.timestamp).toISOString()).toBe(res.body.timestamp);
    });
  });

  describe('GET /api/v1/health/ready', () => {
    it('should return 200 once SQLite answers', async () => {
      const res = await request(app).get('/api/v1/health/ready');

      expect(res.status).toBe(200);
      expect(res.body.status).toBe('ok');
      expect(res.body.database.client).toBe('sqlite');
      expect(res.body.database.latencyMs).toBeGreaterThanOrEqual(0);
    });

    it('should set security headers', async () => {
      const res = await request(app).get('/api/v1/health/ready');

      expect(res.headers['x-content-type-options']).toBe('nosniff');
    });
  });

  describe('unknown routes', () => {
    it('should return a JSON 404', async () => {
      const res = await request(app).get('/api/v1/comments');

      expect(res.status).toBe(404);
      expect(res.body).toEqual({ status: 'error', message: 'Route not found: GET /api/v1/comments' });
    });
  });
});
