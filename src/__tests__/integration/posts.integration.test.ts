/**
 * Integration Tests — Post Search Endpoints
 *
 *   GET /api/v1/posts/search?q=&city=&lat=&lng=&radius=&page=&limit=
 *   GET /api/v1/posts/nearby?lat=&lng=&radius=&page=&limit=
 *   GET /api/v1/posts/city/:cityName?page=&limit=
 *
 * The real middleware chain, controller, query schemas and PostSearchService
 * run; only IPostRepository is replaced by a mock through the DI container.
 * That pins down the HTTP contract (status codes, response shape, error
 * bodies) and exactly which storage call each request turns into.
 *
 * The app is created inside `beforeAll`, after the override: route modules
 * resolve their controller (and through it the service and repository) when
 * they are first imported.
 */
import { TOKENS } from '@core/types';
import type { IPostRepository } from '@domain/interfaces/IPostRepository';
import { destroyDbConnection } from '@infrastructure/database/connection';
import { StorageUnavailableError } from '@shared/errors/AppError';
import type { Express } from 'express';
import request from 'supertest';
import { container } from 'tsyringe';

import { BASE_TIME, samplePost } from '../helpers/fixtures';
import { createMockRepository, MockPostRepository } from '../helpers/mockRepository';

let app: Express;
let mockRepo: MockPostRepository;

beforeAll(async () => {
  await import('@core/container');

  mockRepo = createMockRepository();
  container.register<IPostRepository>(TOKENS.PostRepository, { useValue: mockRepo });

  const { createApp } = await import('@interfaces/http/app');
  app = createApp();
});

beforeEach(() => {
  mockRepo.listByCity.mockResolvedValue([]);
  mockRepo.findNearby.mockResolvedValue([]);
  mockRepo.searchByText.mockResolvedValue([]);
});

afterEach(() => {
  jest.resetAllMocks();
});

afterAll(async () => {
  await destroyDbConnection();
});

describe('GET /api/v1/posts/search', () => {
  it('should return 200 with a page of posts and timing metadata', async () => {
    mockRepo.searchByText.mockResolvedValue([samplePost()]);

    const res = await request(app).get('/api/v1/posts/search?q=coffee');

    expect(res.status).toBe(200);
    expect(res.headers['content-type']).toMatch(/application\/json/);
    expect(res.body.status).toBe('success');
    expect(res.body.data).toEqual([
      {
        id: 'post-sample',
        userId: 'user-1',
        content: 'Coffee by the water',
        imageUrl: null,
        city: 'San Francisco',
        location: { latitude: 37.7749, longitude: -122.4194 },
        metadata: { mood: 'calm' },
        createdAt: BASE_TIME.toISOString(),
        updatedAt: BASE_TIME.toISOString(),
      },
    ]);
    expect(res.body.pagination).toEqual({ page: 1, limit: 20, offset: 0, count: 1 });
    expect(res.body.meta.path).toBe('text');
    expect(typeof res.body.meta.queryTimeMs).toBe('number');
    expect(typeof res.body.meta.totalTimeMs).toBe('number');
    expect(mockRepo.searchByText).toHaveBeenCalledWith('coffee', 20, 0);
  });

  it('should route coordinates to findNearby ahead of city and text', async () => {
    const res = await request(app).get(
      '/api/v1/posts/search?lat=37.7749&lng=-122.4194&radius=5&city=Oakland',
    );

    expect(res.status).toBe(200);
    expect(res.body.meta.path).toBe('nearby');
    expect(mockRepo.findNearby).toHaveBeenCalledWith(37.7749, -122.4194, 5, 20, 0);
    expect(mockRepo.listByCity).not.toHaveBeenCalled();
  });

  it('should read a city search with a text filter in batches', async () => {
    const res = await request(app).get('/api/v1/posts/search?city=San%20Francisco&q=tea');

    expect(res.status).toBe(200);
    expect(res.body.meta.path).toBe('city');
    expect(mockRepo.listByCity).toHaveBeenCalledWith('San Francisco', 100, 0);
  });

  it('should clamp limit and floor page instead of rejecting them', async () => {
    const res = await request(app).get('/api/v1/posts/search?q=x&limit=500&page=0');

    expect(res.status).toBe(200);
    expect(res.body.pagination).toEqual({ page: 1, limit: 100, offset: 0, count: 0 });
    expect(mockRepo.searchByText).toHaveBeenCalledWith('x', 100, 0);
  });

  it.each([
    ['', 'At least one search criterion (q, city, or lat/lng) is required'],
    ['?lat=abc&lng=1', 'lat must be a number'],
    ['?lat=95&lng=0', 'lat must be between -90 and 90'],
    ['?lat=10', 'lat and lng must be supplied together'],
    ['?lat=1&lng=1&radius=0', 'radius must be greater than 0'],
    ['?q=%20%20', 'q must not be empty'],
  ])('should return 400 for "%s"', async (query, message) => {
    const res = await request(app).get(`/api/v1/posts/search${query}`);

    expect(res.status).toBe(400);
    expect(res.body).toEqual({ status: 'error', message });
    expect(mockRepo.findNearby).not.toHaveBeenCalled();
    expect(mockRepo.listByCity).not.toHaveBeenCalled();
    expect(mockRepo.searchByText).not.toHaveBeenCalled();
  });

  it('should return 503 when storage is unavailable', async () => {
    mockRepo.findNearby.mockRejectedValue(
      new StorageUnavailableError('findNearby', new Error('connect ECONNREFUSED')),
    );

    const res = await request(app).get('/api/v1/posts/search?lat=1&lng=1');

    expect(res.status).toBe(503);
    expect(res.body).toEqual({ status: 'error', message: 'Storage unavailable: findNearby failed' });
  });

  it('should hide unexpected errors behind a generic 500', async () => {
    mockRepo.searchByText.mockRejectedValue(new Error('column "contnet" does not exist'));

    const res = await request(app).get('/api/v1/posts/search?q=x');

    expect(res.status).toBe(500);
    expect(res.body).toEqual({ status: 'error', message: 'Internal server error' });
  });
});

describe('GET /api/v1/posts/nearby', () => {
  it('should apply the default 10 km radius', async () => {
    mockRepo.findNearby.mockResolvedValue([samplePost()]);

    const res = await request(app).get('/api/v1/posts/nearby?lat=37.7749&lng=-122.4194&limit=5');

    expect(res.status).toBe(200);
    expect(res.body.data).toHaveLength(1);
    expect(mockRepo.findNearby).toHaveBeenCalledWith(37.7749, -122.4194, 10, 5, 0);
  });

  it('should return 400 when a coordinate is missing', async () => {
    const res = await request(app).get('/api/v1/posts/nearby?lat=37.7749');

    expect(res.status).toBe(400);
    expect(res.body.message).toBe('lat and lng query parameters are required');
  });
});

describe('GET /api/v1/posts/city/:cityName', () => {
  it.each([
    ['San%20Francisco'],
    ['San+Francisco'],
    ['San%2520Francisco'],
  ])('should decode %s to "San Francisco"', async (segment) => {
    const res = await request(app).get(`/api/v1/posts/city/${segment}`);

    expect(res.status).toBe(200);
    expect(res.body.meta.path).toBe('city');
    expect(mockRepo.listByCity).toHaveBeenCalledWith('San Francisco', 20, 0);
  });

  it('should pass pagination through', async () => {
    const res = await request(app).get('/api/v1/posts/city/Paris?page=2&limit=5');

    expect(res.status).toBe(200);
    expect(res.body.pagination).toEqual({ page: 2, limit: 5, offset: 5, count: 0 });
    expect(mockRepo.listByCity).toHaveBeenCalledWith('Paris', 5, 5);
  });

  it('should return 400 for a malformed percent-encoding', async () => {
    const res = await request(app).get('/api/v1/posts/city/%E0%A4%A');

    expect(res.status).toBe(400);
    expect(res.body.status).toBe('error');
    expect(mockRepo.listByCity).not.toHaveBeenCalled();
  });
});

describe('GET /api/v1/health/ready', () => {
  it('should report the storage latency', async () => {
    mockRepo.ping.mockResolvedValue(3);

    const res = await request(app).get('/api/v1/health/ready');

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ status: 'ok', database: { client: 'sqlite', latencyMs: 3 } });
  });

  it('should return 503 while storage is unreachable', async () => {
    mockRepo.ping.mockRejectedValue(new StorageUnavailableError('ping'));

    const res = await request(app).get('/api/v1/health/ready');

    expect(res.status).toBe(503);
    expect(res.body).toEqual({
      status: 'unavailable',
      database: { client: 'sqlite', message: 'Storage unavailable: ping failed' },
    });
  });
});
