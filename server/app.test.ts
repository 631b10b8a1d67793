import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { z } from 'zod';
import { createApp, createDeps, type AppDeps } from './app.js';
import { loadConfig } from './config.js';
import { AnalysisJobStore } from './jobs/store.js';
import type { Article, NewsSource } from './news/types.js';
import { PortfolioScanner, type PortfolioAnalysisWire } from './scanner.js';

const TCS_DOWN = 'Title: TCS slides after results\nContent: TCS announces disappointing earnings, stock falls 8%\n';
const RELIANCE_UP = 'Title: Reliance rallies\nContent: Reliance Industries reports strong Q3 results with 15% growth in revenue\n';

const startedBody = z.object({ analysis_id: z.string(), status: z.string(), message: z.string() });
const insightsBody = z
  .object({
    source: z.string(),
    stock_insights: z.array(z.object({ symbol: z.string(), mentions: z.number(), sentiment: z.string() })),
    risk_breakdown: z.record(z.number()),
  })
  .passthrough();
const newsBody = z.object({
  total_articles: z.number(),
  articles: z.array(z.object({ title: z.string(), content: z.string(), sentiment: z.string(), confidence: z.number() })),
});

const sourceOf = (articles: Article[]): NewsSource => ({ fetch: async () => articles });

function setup(source: NewsSource = sourceOf([TCS_DOWN, RELIANCE_UP])) {
  const deps: AppDeps = {
    scanner: new PortfolioScanner(source, { clock: () => new Date('2024-05-01T09:30:00Z') }),
    jobs: new AnalysisJobStore<PortfolioAnalysisWire>(60),
  };
  return { deps, app: createApp(deps) };
}

const post = (body: unknown) => ({
  method: 'POST',
  headers: { 'content-type': 'application/json' },
  body: typeof body === 'string' ? body : JSON.stringify(body),
});

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => {});
  vi.spyOn(console, 'warn').mockImplementation(() => {});
  vi.spyOn(console, 'error').mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('GET /api/health', () => {
  it('reports status and version', async () => {
    const res = await setup().app.request('/api/health');
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ status: 'healthy', version: '1.0.0' });
  });
});

describe('portfolio analysis', () => {
  it('runs a background scan and reports its result', async () => {
    const { app, deps } = setup();
    const res = await app.request('/api/scan-portfolio', post({ stocks: ['tcs', 'RELIANCE'] }));
    expect(res.status).toBe(200);
    const started = startedBody.parse(await res.json());
    expect(started).toMatchObject({ status: 'started', message: 'Portfolio analysis started' });
    expect(started.analysis_id).toMatch(/^analysis_/);

    await vi.waitFor(() => expect(deps.jobs.get(started.analysis_id)?.status).toBe('completed'));

    const status = await app.request(`/api/analysis-status/${started.analysis_id}`);
    expect(status.status).toBe(200);
    const body = insightsBody.parse(await status.json());
    expect(body).toMatchObject({
      analysis_id: started.analysis_id,
      status: 'completed',
      progress: 100,
      message: 'Analysis completed successfully',
      source: 'news',
      articles_analyzed: 2,
      total_stocks_analyzed: 2,
    });
    expect(body.stock_insights.map(i => i.symbol)).toEqual(['TCS', 'RELIANCE']);
  });

  it('answers 404 for unknown analyses', async () => {
    const res = await setup().app.request('/api/analysis-status/analysis_missing');
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ status: 'not_found', message: 'Analysis not found' });
  });

  it('rejects bad bodies', async () => {
    const { app } = setup();
    expect((await app.request('/api/scan-portfolio', post({}))).status).toBe(400);
    expect((await app.request('/api/scan-portfolio', post({ stocks: [] }))).status).toBe(400);
    expect((await app.request('/api/analyze-stocks', post('not json'))).status).toBe(400);
  });

  it('analyzes synchronously', async () => {
    const res = await setup().app.request('/api/analyze-stocks', post({ stocks: ['WIPRO'] }));
    expect(res.status).toBe(200);
    const body = insightsBody.parse(await res.json());
    expect(body.source).toBe('fallback');
    expect(body.stock_insights[0]).toMatchObject({ symbol: 'WIPRO', mentions: 0, sentiment: 'neutral' });
    expect(body.risk_breakdown).toEqual({ high_risk: 0, medium_risk: 0, low_risk: 1 });
  });

  it('turns source failures into a 500', async () => {
    const failing: NewsSource = { fetch: async () => Promise.reject(new Error('feed down')) };
    const res = await setup(failing).app.request('/api/analyze-stocks', post({ stocks: ['TCS'] }));
    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({ error: 'feed down' });
  });
});

describe('GET /api/news', () => {
  it('returns scored articles', async () => {
    const res = await setup().app.request('/api/news?limit=1');
    expect(res.status).toBe(200);
    const body = newsBody.parse(await res.json());
    expect(body.total_articles).toBe(1);
    expect(body.articles[0]).toMatchObject({
      title: 'TCS slides after results',
      content: 'TCS announces disappointing earnings, stock falls 8%',
      sentiment: 'negative',
    });
    expect(body.articles[0].confidence).toBeCloseTo(4 / 13);
  });

  it('validates the limit', async () => {
    expect((await setup().app.request('/api/news?limit=0')).status).toBe(400);
  });
});

describe('createDeps', () => {
  it('wires the configured scanner and job store', () => {
    const deps = createDeps(loadConfig({}), sourceOf([]));
    expect(deps.scanner).toBeInstanceOf(PortfolioScanner);
    expect(deps.jobs.size).toBe(0);
  });
});

it('answers unknown routes with a JSON 404', async () => {
  const res = await setup().app.request('/nope');
  expect(res.status).toBe(404);
  expect(await res.json()).toEqual({ error: 'not found' });
});
