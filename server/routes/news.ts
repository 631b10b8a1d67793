import { Hono } from 'hono';
import { z } from 'zod';
import { classifyArticles } from '../news/classify.js';
import { parseArticle } from '../news/fetchers/newsapi.js';
import { DEFAULT_KEYWORDS, type PortfolioScanner } from '../scanner.js';

const query = z.object({
  limit: z.coerce.number().int().min(1).max(20).default(10),
});

export function newsRoute(scanner: PortfolioScanner) {
  const route = new Hono();

  route.get('/api/news', async (c) => {
    const parse = query.safeParse({ limit: c.req.query('limit') });
    if (!parse.success) return c.json({ error: parse.error.flatten() }, 400);

    const batch = await scanner.fetchArticles({ keywords: [...DEFAULT_KEYWORDS], maxArticles: parse.data.limit });
    const items = classifyArticles(batch).map((s, i) => ({
      ...parseArticle(batch[i], i),
      sentiment: s.classification,
      confidence: s.confidence,
    }));

    return c.json({ articles: items, total_articles: items.length });
  });

  return route;
}
