import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtempSync, writeFileSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import type { Server } from 'http';
import { createApp } from '../app.ts';
import { LotCache } from '../services/lot-cache.ts';
import type {
  CategoryBucket, EstimateComparison, HistogramBin, Lot, Page, SummaryStats,
} from '../types.ts';

interface Envelope<T> {
  success: boolean;
  data: T;
  error?: string;
  details?: string[];
}

interface Readiness {
  status: string;
  checks: Record<string, { status: string }>;
}

const RAW = [
  { 'Title': 'Oak dining table', 'Sold Price': '$1,200', 'Estimated Price': '$800-1,200', 'Item URL': 'https://auction.example/1', 'Item Image': 'https://auction.example/1.jpg' },
  { 'Title': 'Signed poster', 'Sold Price': '$450', 'Estimated Price': '$300-500', 'Item URL': 'https://auction.example/2', 'Item Image': 'https://auction.example/2.jpg' },
  { 'Title': 'Bass guitar', 'Sold Price': 'Passed', 'Estimated Price': '$2,000-3,000', 'Item URL': 'https://auction.example/3', 'Item Image': 'https://auction.example/3.jpg' },
  { 'Title': 'Leather armchair', 'Sold Price': '$300', 'Estimated Price': '$400', 'Item URL': 'https://auction.example/4', 'Item Image': 'https://auction.example/4.jpg' },
];

function listen(server: Server): Promise<string> {
  return new Promise((resolve, reject) => {
    server.once('listening', () => {
      const addr = server.address();
      if (addr && typeof addr === 'object') resolve(`http://127.0.0.1:${addr.port}`);
      else reject(new Error('Server has no TCP address'));
    });
  });
}

async function getJson<T>(url: string, init?: RequestInit): Promise<{ status: number; body: T }> {
  const res = await fetch(url, init);
  return { status: res.status, body: (await res.json()) as T };
}

function close(server: Server): Promise<void> {
  return new Promise((resolve, reject) => server.close(err => (err ? reject(err) : resolve())));
}

describe('HTTP API', () => {
  let dir: string;
  let path: string;
  let server: Server;
  let base: string;

  beforeAll(async () => {
    dir = mkdtempSync(join(tmpdir(), 'lots-api-'));
    path = join(dir, 'lots.json');
    writeFileSync(path, JSON.stringify(RAW));
    const app = createApp({ source: { path }, cache: new LotCache(), apiBase: '/api' });
    server = app.listen(0, '127.0.0.1');
    base = await listen(server);
  });

  afterAll(async () => {
    await close(server);
    rmSync(dir, { recursive: true, force: true });
  });

  const get = <T>(url: string) => getJson<Envelope<T>>(`${base}${url}`);

  it('GET /api/lots returns every lot in file order', async () => {
    const { status, body } = await get<Page<Lot>>('/api/lots');
    expect(status).toBe(200);
    expect(body.success).toBe(true);
    expect(body.data.total).toBe(4);
    expect(body.data.results.map(l => l.title))
      .toEqual(['Oak dining table', 'Signed poster', 'Bass guitar', 'Leather armchair']);
  });

  it('GET /api/lots filters, sorts and pages', async () => {
    const { body } = await get<Page<Lot>>('/api/lots?categories=Furniture&sort=price_asc&limit=1&page=2');
    expect(body.data).toMatchObject({ total: 2, page: 2, pages: 2, limit: 1 });
    expect(body.data.results[0]?.title).toBe('Oak dining table');
  });

  it('GET /api/lots drops unpriced lots once a price bound is set', async () => {
    const { body } = await get<Page<Lot>>('/api/lots?minPrice=0');
    expect(body.data.total).toBe(3);
  });

  it('GET /api/lots/summary summarizes the filtered subset', async () => {
    const { status, body } = await get<SummaryStats>('/api/lots/summary?q=E');
    expect(status).toBe(200);
    expect(body.data).toMatchObject({ lotCount: 3, count: 3, total: 1950, median: 450, min: 300, max: 1200 });
    expect(body.data.mostCommonCategory).toBe('Furniture');
  });

  it('GET /api/lots/summary returns the empty result when nothing matches', async () => {
    const { status, body } = await get<SummaryStats>('/api/lots/summary?q=zzz');
    expect(status).toBe(200);
    expect(body.data).toMatchObject({ lotCount: 0, count: 0, total: 0, mean: null, median: null });
  });

  it('rejects min > max with 400 Invalid criteria', async () => {
    const { status, body } = await get<never>('/api/lots?minPrice=500&maxPrice=100');
    expect(status).toBe(400);
    expect(body).toEqual({
      success: false,
      error: 'Invalid criteria',
      details: ['minPrice (500) must not exceed maxPrice (100)'],
    });
  });

  it('rejects unknown categories with 400 Validation failed', async () => {
    const { status, body } = await get<never>('/api/lots?categories=Spaceships');
    expect(status).toBe(400);
    expect(body.error).toBe('Validation failed');
  });

  it('GET /api/lots/top returns the most expensive lots', async () => {
    const { body } = await get<Lot[]>('/api/lots/top?n=2');
    expect(body.data.map(l => l.title)).toEqual(['Oak dining table', 'Signed poster']);
  });

  it('GET /api/lots/estimates compares estimate and sold price', async () => {
    const { body } = await get<EstimateComparison[]>('/api/lots/estimates?n=1');
    expect(body.data).toEqual([
      { title: 'Oak dining table', category: 'Furniture', estimateMid: 1000, soldPrice: 1200, delta: 200, ratio: 1.2 },
    ]);
  });

  it('GET /api/lots/histogram bins sold prices', async () => {
    const { body } = await get<HistogramBin[]>('/api/lots/histogram?bins=2&scale=linear');
    expect(body.data).toEqual([
      { from: 300, to: 750, count: 2 },
      { from: 750, to: 1200, count: 1 },
    ]);
  });

  it('GET /api/categories lists categories and the breakdown', async () => {
    const { body } = await get<{ categories: string[]; breakdown: CategoryBucket[] }>('/api/categories');
    expect(body.data.categories).toHaveLength(11);
    expect(body.data.categories[10]).toBe('Uncategorized');
    expect(body.data.breakdown[0]).toEqual({ category: 'Furniture', count: 2, priced: 2, total: 1500, mean: 750 });
  });

  it('POST /api/refresh reloads the dataset', async () => {
    writeFileSync(path, JSON.stringify([...RAW, { 'Title': 'Espresso cup', 'Sold Price': '$40' }]));
    const { status, body } = await getJson<Envelope<{ lots: number }>>(`${base}/api/refresh`, { method: 'POST' });
    expect(status).toBe(200);
    expect(body.data.lots).toBe(5);
  });

  it('GET /api/health reports liveness', async () => {
    const { status, body } = await getJson<{ status: string }>(`${base}/api/health`);
    expect(status).toBe(200);
    expect(body.status).toBe('ok');
  });

  it('answers 404 for unknown API routes', async () => {
    const { status, body } = await get<never>('/api/nope');
    expect(status).toBe(404);
    expect(body).toEqual({ success: false, error: 'Not found' });
  });
});

describe('HTTP API with an unreadable dataset', () => {
  let server: Server;
  let base: string;

  beforeAll(async () => {
    const app = createApp({ source: { path: join(tmpdir(), 'lots-api-missing', 'nope.json') } });
    server = app.listen(0, '127.0.0.1');
    base = await listen(server);
  });

  afterAll(async () => {
    await close(server);
  });

  it('answers 503 Could not load data', async () => {
    const { status, body } = await getJson<Envelope<never>>(`${base}/api/lots`);
    expect(status).toBe(503);
    expect(body).toEqual({ success: false, error: 'Could not load data' });
  });

  it('reports the dataset as degraded on readiness', async () => {
    const { status, body } = await getJson<Readiness>(`${base}/api/health/ready`);
    expect(status).toBe(503);
    expect(body.status).toBe('degraded');
    expect(body.checks.dataset?.status).toBe('error');
  });
});
