import { Hono } from 'hono';
import { z } from 'zod';
import type { AnalysisJobStore } from '../jobs/store.js';
import { normalizeStocks, toPortfolioAnalysisWire, type PortfolioAnalysisWire, type PortfolioScanner } from '../scanner.js';

const schema = z.object({
  stocks: z.array(z.string().trim().min(1).max(20)).min(1).max(50),
});

export type PortfolioRouteDeps = {
  scanner: PortfolioScanner;
  jobs: AnalysisJobStore<PortfolioAnalysisWire>;
};

async function readStocks(req: { json(): Promise<unknown> }) {
  const body = await req.json().catch(() => ({}));
  return schema.safeParse(body);
}

export function portfolioRoute({ scanner, jobs }: PortfolioRouteDeps) {
  const route = new Hono();

  route.post('/api/scan-portfolio', async (c) => {
    const parse = await readStocks(c.req);
    if (!parse.success) return c.json({ error: parse.error.flatten() }, 400);

    const stocks = normalizeStocks(parse.data.stocks);
    const job = jobs.create(stocks);
    console.log(`[server] analysis ${job.id} queued for ${stocks.length} stocks`);

    // Settles on its own; failures land on the job record.
    void jobs.run(job.id, async (progress) => {
      const analysis = await scanner.analyzePortfolio(stocks, { onProgress: progress });
      return toPortfolioAnalysisWire(analysis);
    });

    return c.json({ analysis_id: job.id, status: 'started', message: 'Portfolio analysis started' });
  });

  route.get('/api/analysis-status/:id', (c) => {
    const job = jobs.get(c.req.param('id'));
    if (!job) return c.json({ status: 'not_found', message: 'Analysis not found' }, 404);
    return c.json({
      analysis_id: job.id,
      status: job.status,
      progress: job.progress,
      message: job.message,
      ...(job.result ?? {}),
      ...(job.error ? { error: job.error } : {}),
    });
  });

  route.post('/api/analyze-stocks', async (c) => {
    const parse = await readStocks(c.req);
    if (!parse.success) return c.json({ error: parse.error.flatten() }, 400);

    const analysis = await scanner.analyzePortfolio(parse.data.stocks);
    return c.json(toPortfolioAnalysisWire(analysis));
  });

  return route;
}
