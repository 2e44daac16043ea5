import { describe, it, expect } from 'vitest';
import request from 'supertest';
import { createApp } from '../../src/app';
import { createTestWorker } from '../helpers/worker.fixtures';

describe('Health Routes', () => {
  it('should report basic health', async () => {
    const { worker } = createTestWorker();

    const response = await request(createApp(worker)).get('/api/health').expect(200);

    expect(response.body.success).toBe(true);
    expect(response.body.data.status).toBe('healthy');
    expect(typeof response.body.data.uptime).toBe('number');
  });

  it('should answer the liveness probe', async () => {
    const { worker } = createTestWorker();

    const response = await request(createApp(worker)).get('/api/health/liveness').expect(200);

    expect(response.body.status).toBe('ok');
  });

  it('should be ready while every breaker is closed', async () => {
    const { worker } = createTestWorker();

    const response = await request(createApp(worker)).get('/api/health/readiness').expect(200);

    expect(response.body).toMatchObject({ ready: true, openBreakers: [], queueOverThreshold: false });
    expect(response.body.breakers).toHaveLength(5);
  });

  it('should not be ready once a platform breaker opens', async () => {
    const { worker, platformB } = createTestWorker({ breakerThreshold: 1, breakerCooldownMs: 60000 });
    platformB.failFetch(new Error('HTTP 503'));
    await worker.runOnce();

    const response = await request(createApp(worker)).get('/api/health/readiness').expect(503);

    expect(response.body.ready).toBe(false);
    expect(response.body.openBreakers).toEqual(['platform-B-fetch']);
  });
});
