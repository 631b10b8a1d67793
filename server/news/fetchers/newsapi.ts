import { z } from "zod";
import type { Article, NewsSource, RawNewsItem } from "../types.js";

const USER_AGENT = "news-portfolio-scanner/1.0";
const MAX_QUERY_LENGTH = 500; // NewsAPI limit for `q`

const COUNTRY_CODES: ReadonlyMap<string, string> = new Map([
  ["india", "in"],
  ["united states", "us"],
  ["usa", "us"],
  ["us", "us"],
  ["united kingdom", "gb"],
  ["uk", "gb"],
  ["australia", "au"],
  ["canada", "ca"],
  ["singapore", "sg"],
]);

const responseSchema = z.object({
  status: z.string(),
  message: z.string().optional(),
  articles: z
    .array(
      z.object({
        title: z.string().nullish(),
        description: z.string().nullish(),
        url: z.string().nullish(),
        publishedAt: z.string().nullish(),
        source: z.object({ name: z.string().nullish() }).nullish(),
      }),
    )
    .default([]),
});

export type NewsApiOptions = {
  apiKey?: string;
  baseUrl?: string;
};

type Attempt = { name: string; url: string };

export function countryCode(country: string): string {
  const key = country.trim().toLowerCase();
  const code = COUNTRY_CODES.get(key);
  if (code) return code;
  return /^[a-z]{2}$/.test(key) ? key : "us";
}

export function buildQuery(keywords: string[], country: string): string {
  const suffix = country ? ` AND "${country}"` : "";
  let q = "";
  for (const kw of keywords.map(k => k.trim()).filter(Boolean)) {
    const term = kw.includes(" ") ? `"${kw}"` : kw;
    const next = q ? `${q} OR ${term}` : term;
    if (`(${next})${suffix}`.length > MAX_QUERY_LENGTH) break;
    q = next;
  }
  return q ? `(${q})${suffix}` : "";
}

/** The article text the scanner consumes. */
export function formatArticle(item: Pick<RawNewsItem, "title" | "description">): Article {
  return `Title: ${item.title}\nContent: ${item.description}\n`;
}

export function parseArticle(article: Article, index = 0): { title: string; content: string } {
  const [first = "", second] = article.split("\n");
  const title = first.startsWith("Title: ") ? first.slice("Title: ".length) : `News Item ${index + 1}`;
  const content =
    second !== undefined && second.startsWith("Content: ") ? second.slice("Content: ".length) : "No content available";
  return { title, content };
}

function dedupeKey(item: RawNewsItem) {
  return `${item.title.trim().toLowerCase()}|${item.url ?? ""}`;
}

export class NewsApiSource implements NewsSource {
  private readonly apiKey?: string;
  private readonly baseUrl: string;

  constructor(opts: NewsApiOptions = {}) {
    this.apiKey = opts.apiKey;
    this.baseUrl = (opts.baseUrl ?? "https://newsapi.org/v2").replace(/\/+$/, "");
  }

  attempts(keywords: string[], country: string): Attempt[] {
    const code = countryCode(country);
    const out: Attempt[] = [];
    const q = buildQuery(keywords, country);
    if (q) {
      const params = new URLSearchParams({ q, language: "en", sortBy: "publishedAt", pageSize: "100" });
      out.push({ name: `${country} keywords`, url: `${this.baseUrl}/everything?${params}` });
    }
    out.push(
      { name: `${country} business`, url: `${this.baseUrl}/top-headlines?country=${code}&category=business&pageSize=100` },
      { name: `${country} general`, url: `${this.baseUrl}/top-headlines?country=${code}&pageSize=100` },
    );
    if (code !== "us") {
      out.push({ name: "US business", url: `${this.baseUrl}/top-headlines?country=us&category=business&pageSize=100` });
    }
    return out;
  }

  async fetchItems(keywords: string[], country: string): Promise<RawNewsItem[]> {
    if (!this.apiKey) {
      console.warn("[news] NEWS_API_KEY not set. Skipping.");
      return [];
    }

    for (const attempt of this.attempts(keywords, country)) {
      try {
        const r = await fetch(attempt.url, { headers: { "user-agent": USER_AGENT, "x-api-key": this.apiKey } });
        if (!r.ok) {
          console.warn(`[news] ${attempt.name} fetch failed:`, r.status, r.statusText);
          continue;
        }
        const parsed = responseSchema.safeParse(await r.json());
        if (!parsed.success) {
          console.warn(`[news] ${attempt.name} returned an unexpected payload`);
          continue;
        }
        if (parsed.data.status !== "ok") {
          console.warn(`[news] ${attempt.name} error:`, parsed.data.message ?? parsed.data.status);
          continue;
        }

        const seen = new Set<string>();
        const items: RawNewsItem[] = [];
        for (const a of parsed.data.articles) {
          if (!a.title || !a.description) continue;
          const item: RawNewsItem = {
            title: a.title,
            description: a.description,
            url: a.url ?? undefined,
            source: a.source?.name ?? undefined,
            publishedAt: a.publishedAt ?? undefined,
          };
          const key = dedupeKey(item);
          if (seen.has(key)) continue;
          seen.add(key);
          items.push(item);
        }
        if (items.length) return items;
      } catch (e) {
        console.warn(`[news] ${attempt.name} fetch error:`, e instanceof Error ? e.message : String(e));
      }
    }

    console.warn("[news] all news sources failed");
    return [];
  }

  async fetch(keywords: string[], country: string): Promise<Article[]> {
    const items = await this.fetchItems(keywords, country);
    return items.map(formatArticle);
  }
}
