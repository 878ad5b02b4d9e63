import { describe, it, expect, beforeEach } from 'vitest';
import request from 'supertest';
import type { Express } from 'express';
import type { GenerationQueue } from '@/queue/index.js';
import type { SqliteRepository } from '@/repository/sqlite.js';
import { createTestApp } from '../../fixtures/app.js';
import { seedAccount, seedContentItem } from '../../fixtures/db.js';
import { makeJob } from '../../fixtures/fakes.js';

// POST /batches sits behind a 5-per-minute limiter shared by every test in this file.

let app: Express;
let queue: GenerationQueue;
let repository: SqliteRepository;

beforeEach(() => {
  ({ app, queue, repository } = createTestApp());
});

describe('GET /', () => {
  it('returns the service banner', async () => {
    const res = await request(app).get('/');
    expect(res.status).toBe(200);
    expect(res.body).toEqual({ message: 'Avatar Content Studio API' });
  });
});

// ─── POST /batches ───────────────────────────────────────────────────────────

describe('POST /batches', () => {
  it('queues a job with default tier ratios', async () => {
    const res = await request(app).post('/batches').send({ count: 10, platform: 'instagram', nicheHint: 'fitness' });

    expect(res.status).toBe(202);
    expect(res.body.status).toBe('pending');

    const job = queue.get(res.body.id);
    expect(job?.spec).toEqual({
      count: 10,
      platform: 'instagram',
      nicheHint: 'fitness',
      tierRatios: { tier1: 0.6, tier2: 0.3, tier3: 0.1 },
      caption: true,
      moderate: true,
      upload: true,
    });
  });

  it('returns 400 for an invalid body', async () => {
    const res = await request(app).post('/batches').send({ count: 'ten', platform: 'instagram' });

    expect(res.status).toBe(400);
    expect(res.body.error).toBe('Validation failed');
    expect(queue.countByStatus()).toEqual({});
  });

  it('returns 404 when the auto-schedule account does not exist', async () => {
    const res = await request(app)
      .post('/batches')
      .send({ count: 2, platform: 'instagram', autoSchedule: { accountId: 'nope' } });

    expect(res.status).toBe(404);
    expect(res.body.error).toBe("Account 'nope' not found");
  });

  it('returns 400 when the auto-schedule account is on another platform', async () => {
    const account = seedAccount(repository, { platform: 'twitter' });
    const res = await request(app)
      .post('/batches')
      .send({ count: 2, platform: 'instagram', autoSchedule: { accountId: account.id } });

    expect(res.status).toBe(400);
    expect(res.body.error).toBe(`Account '${account.id}' is a twitter account, batch targets instagram`);
  });

  it('returns 400 for malformed JSON', async () => {
    const res = await request(app)
      .post('/batches')
      .set('Content-Type', 'application/json')
      .send('{"count": 5,');

    expect(res.status).toBe(400);
  });
});

// ─── GET /batches/:id ────────────────────────────────────────────────────────

describe('GET /batches/:id', () => {
  it('reports a queued job', async () => {
    const id = queue.enqueue(makeJob());
    const res = await request(app).get(`/batches/${id}`);

    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({
      id,
      status: 'pending',
      current_stage: null,
      stages: [],
      stats: null,
      error: null,
    });
  });

  it('returns 404 for an unknown batch', async () => {
    const res = await request(app).get('/batches/nope');
    expect(res.status).toBe(404);
    expect(res.body.error).toBe('Batch not found');
  });

  it('lists the items of a batch', async () => {
    const id = queue.enqueue(makeJob());
    const item = seedContentItem(repository, {}, id);

    const res = await request(app).get(`/batches/${id}/items`);

    expect(res.status).toBe(200);
    expect(res.body.items.map((i: { id: string }) => i.id)).toEqual([item.id]);
  });

  it('returns 404 for the items of an unknown batch', async () => {
    const res = await request(app).get('/batches/nope/items');
    expect(res.status).toBe(404);
  });
});
