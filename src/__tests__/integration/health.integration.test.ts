/**
 * Integration Tests — Health Endpoint
 *
 * Runs `GET /health` through the full Express middleware chain with
 * Supertest (in-memory connection, no port bound). The repository's ping is
 * mocked through the DI container, so both the healthy and the unreachable
 * database cases run without PostgreSQL.
 */
import { TOKENS } from '@core/types';
import type { IEstablishmentRepository } from '@domain/interfaces/IEstablishmentRepository';
import type { Express } from 'express';
import request from 'supertest';

import { createMockRepository, MockEstablishmentRepository } from '../helpers/mockRepository';

let app: Express;
let mockRepo: MockEstablishmentRepository;

beforeAll(async () => {
  const { container } = await import('@core/container');

  mockRepo = createMockRepository();
  container.register<IEstablishmentRepository>(TOKENS.EstablishmentRepository, {
    useValue: mockRepo,
  });

  const { createApp } = await import('@interfaces/http/app');
  app = createApp();
});

afterEach(() => {
  jest.clearAllMocks();
});

describe('GET /health', () => {
  it('should return 200 with the database latency when the store answers', async () => {
    mockRepo.ping.mockResolvedValue(3);

    const res = await request(app).get('/health');

    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({ status: 'ok', database: 'connected', latencyMs: 3 });
  });

  it('should include an uptime value (number of seconds)', async () => {
    mockRepo.ping.mockResolvedValue(1);

    const res = await request(app).get('/health');

    expect(typeof res.body.uptime).toBe('number');
    expect(res.body.uptime).toBeGreaterThanOrEqual(0);
  });

  it('should include a valid ISO 8601 timestamp', async () => {
    mockRepo.ping.mockResolvedValue(1);

    const res = await request(app).get('/health');

    const parsed = new Date(res.body.timestamp);
    expect(parsed.toISOString()).toBe(res.body.timestamp);
  });

  it('should return 503 when the database is unreachable', async () => {
    mockRepo.ping.mockRejectedValue(new Error('connect ECONNREFUSED 127.0.0.1:5432'));

    const res = await request(app).get('/health');

    expect(res.status).toBe(503);
    expect(res.body).toMatchObject({ status: 'unhealthy', database: 'disconnected' });
    expect(res.body.latencyMs).toBeUndefined();
  });

  it('should be served under /api as well', async () => {
    mockRepo.ping.mockResolvedValue(2);

    const res = await request(app).get('/api/health');

    expect(res.status).toBe(200);
    expect(res.headers['content-type']).toMatch(/application\/json/);
  });
});
