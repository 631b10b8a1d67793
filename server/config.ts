import { z } from 'zod';

const intFrom = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const schema = z.object({
  PORT: intFrom(8787),
  NEWS_API_KEY: z.string().trim().optional().transform(v => v || undefined),
  NEWS_API_BASE: z.string().url().default('https://newsapi.org/v2'),
  SCAN_COUNTRY: z.string().trim().min(2).default('India'),
  SCAN_MAX_ARTICLES: intFrom(100),
  JOB_TTL_SEC: intFrom(60 * 60),
});

export type Config = {
  port: number;
  newsApiKey?: string;
  newsApiBase: string;
  country: string;
  maxArticles: number;
  jobTtlSec: number;
};

export function loadConfig(env: Record<string, string | undefined> = process.env): Config {
  const parse = schema.safeParse(env);
  if (!parse.success) {
    const fields = Object.entries(parse.error.flatten().fieldErrors)
      .map(([k, msgs]) => `${k}: ${(msgs ?? []).join(', ')}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${fields}`);
  }
  const e = parse.data;
  return {
    port: e.PORT,
    newsApiKey: e.NEWS_API_KEY,
    newsApiBase: e.NEWS_API_BASE.replace(/\/+$/, ''),
    country: e.SCAN_COUNTRY,
    maxArticles: e.SCAN_MAX_ARTICLES,
    jobTtlSec: e.JOB_TTL_SEC,
  };
}
