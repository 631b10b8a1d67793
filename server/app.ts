import { Hono } from 'hono';
import { cors } from 'hono/cors';
import type { Config } from './config.js';
import { AnalysisJobStore } from './jobs/store.js';
import { NewsApiSource } from './news/fetchers/newsapi.js';
import type { NewsSource } from './news/types.js';
import { newsRoute } from './routes/news.js';
import { portfolioRoute } from './routes/portfolio.js';
import { PortfolioScanner, type PortfolioAnalysisWire } from './scanner.js';

export const VERSION = '1.0.0';

export type AppDeps = {
  scanner: PortfolioScanner;
  jobs: AnalysisJobStore<PortfolioAnalysisWire>;
};

export function createDeps(config: Config, source?: NewsSource): AppDeps {
  const news = source ?? new NewsApiSource({ apiKey: config.newsApiKey, baseUrl: config.newsApiBase });
  return {
    scanner: new PortfolioScanner(news, { country: config.country, maxArticles: config.maxArticles }),
    jobs: new AnalysisJobStore<PortfolioAnalysisWire>(config.jobTtlSec),
  };
}

export function createApp(deps: AppDeps) {
  const app = new Hono();
  app.use('*', cors());

  app.get('/api/health', (c) =>
    c.json({ status: 'healthy', timestamp: new Date().toISOString(), version: VERSION }),
  );

  app.route('/', portfolioRoute(deps));
  app.route('/', newsRoute(deps.scanner));

  app.notFound((c) => c.json({ error: 'not found' }, 404));
  app.onError((err, c) => {
    console.error('[server] request failed:', err);
    return c.json({ error: err.message || 'internal error' }, 500);
  });

  return app;
}
