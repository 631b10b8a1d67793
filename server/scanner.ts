import { isKnownSymbol } from "./lexicon/index.js";
import { aggregateStockSentiment } from "./news/aggregate.js";
import { extractFromArticles, symbolFrequency, topSymbols } from "./news/extract.js";
import type { Article, NewsSource, StockSentimentAggregate, SymbolCandidate, SymbolCount } from "./news/types.js";
import { generatePortfolioInsight, type PortfolioInsight } from "./insights/portfolio.js";
import { formatInsightsReport, formatScanSummary } from "./insights/report.js";
import {
  frequencyToObject,
  toPortfolioInsightWire,
  toStockInsightWire,
  type PortfolioInsightWire,
  type StockInsightWire,
} from "./insights/serialize.js";
import { generateStockInsight, generateStockInsights, type StockInsight } from "./insights/stock.js";

export const DEFAULT_KEYWORDS: readonly string[] = [
  "stock market",
  "earnings",
  "quarterly results",
  "IPO",
  "mergers",
  "Sensex",
  "Nifty",
  "Indian stocks",
  "dividend",
  "RBI",
  "banking",
];

export type ScanOptions = {
  keywords?: string[];
  country?: string;
  maxArticles?: number;
};

export type ScanAnalysis = {
  articlesAnalyzed: number;
  stocksFound: number;
  symbols: string[];
  stockFrequency: Map<string, number>;
  stockSentiments: Map<string, StockSentimentAggregate>;
  topStocks: SymbolCount[];
  analyzedAt: string;
};

export type Insights = {
  stockInsights: StockInsight[];
  portfolioInsight: PortfolioInsight;
};

export type PortfolioAnalysis = Insights & {
  source: "news" | "fallback";
  articlesAnalyzed: number;
};

export type FullScan = Insights & {
  articles: Article[];
  analysis: ScanAnalysis;
  summary: string;
  report: string;
};

/** Known company, or high confidence, or a medium-confidence symbol of four or more characters. */
export function passesQualityGate(c: SymbolCandidate): boolean {
  return (
    c.company !== "Unknown" ||
    isKnownSymbol(c.symbol) ||
    c.confidence === "high" ||
    (c.confidence === "medium" && c.symbol.length >= 4)
  );
}

/** Gated symbols across a batch, in discovery order. */
export function gateSymbols(byArticle: Map<number, SymbolCandidate[]>): string[] {
  const out = new Set<string>();
  for (const candidates of byArticle.values()) {
    for (const c of candidates) {
      if (passesQualityGate(c)) out.add(c.symbol);
    }
  }
  return [...out];
}

/** Core pipeline over a batch that is already in hand. */
export function analyzeArticles(articles: Article[], now: Date = new Date()): ScanAnalysis {
  const symbols = gateSymbols(extractFromArticles(articles));
  return {
    articlesAnalyzed: articles.length,
    stocksFound: symbols.length,
    symbols,
    stockFrequency: symbolFrequency(articles),
    stockSentiments: aggregateStockSentiment(articles, symbols),
    topStocks: topSymbols(articles, 10),
    analyzedAt: now.toISOString(),
  };
}

export function generateInsights(analysis: Pick<ScanAnalysis, "stockSentiments">): Insights {
  const stockInsights = generateStockInsights(analysis.stockSentiments);
  return { stockInsights, portfolioInsight: generatePortfolioInsight(stockInsights) };
}

/** Every requested stock as a neutral, unmentioned name; used when the news has none of them. */
export function fallbackAnalysis(stocks: string[]): Insights {
  const stockInsights = stocks.map(symbol =>
    generateStockInsight(symbol, { mentions: 0, overallSentiment: "neutral", confidence: 0 }),
  );
  return { stockInsights, portfolioInsight: generatePortfolioInsight(stockInsights) };
}

export function normalizeStocks(stocks: string[]): string[] {
  return Array.from(new Set(stocks.map(s => s.trim().toUpperCase()).filter(Boolean)));
}

export type ScanAnalysisWire = {
  articles_analyzed: number;
  stocks_found: number;
  stock_frequency: Record<string, number>;
  stock_sentiments: Record<
    string,
    {
      total_mentions: number;
      positive_articles: number;
      negative_articles: number;
      neutral_articles: number;
      overall_sentiment: string;
      confidence: number;
      proportion_confidence: number;
    }
  >;
  top_stocks: SymbolCount[];
  analysis_timestamp: string;
};

export function toAnalysisWire(a: ScanAnalysis): ScanAnalysisWire {
  const sentiments: ScanAnalysisWire["stock_sentiments"] = {};
  for (const [symbol, s] of a.stockSentiments) {
    sentiments[symbol] = {
      total_mentions: s.mentions,
      positive_articles: s.positiveArticles,
      negative_articles: s.negativeArticles,
      neutral_articles: s.neutralArticles,
      overall_sentiment: s.overallSentiment,
      confidence: s.confidence,
      proportion_confidence: s.proportionConfidence,
    };
  }
  return {
    articles_analyzed: a.articlesAnalyzed,
    stocks_found: a.stocksFound,
    stock_frequency: frequencyToObject(a.stockFrequency),
    stock_sentiments: sentiments,
    top_stocks: a.topStocks,
    analysis_timestamp: a.analyzedAt,
  };
}

export type PortfolioAnalysisWire = {
  source: PortfolioAnalysis["source"];
  articles_analyzed: number;
  stock_insights: StockInsightWire[];
} & PortfolioInsightWire;

export function toPortfolioAnalysisWire(p: PortfolioAnalysis): PortfolioAnalysisWire {
  return {
    source: p.source,
    articles_analyzed: p.articlesAnalyzed,
    ...toPortfolioInsightWire(p.portfolioInsight),
    stock_insights: p.stockInsights.map(toStockInsightWire),
  };
}

export class PortfolioScanner {
  private readonly country: string;
  private readonly maxArticles: number;
  private readonly clock: () => Date;

  constructor(
    private readonly source: NewsSource,
    opts: { country?: string; maxArticles?: number; clock?: () => Date } = {},
  ) {
    this.country = opts.country ?? "India";
    this.maxArticles = opts.maxArticles ?? 100;
    this.clock = opts.clock ?? (() => new Date());
  }

  /** Fetch and cap only; no extraction. */
  async fetchArticles(opts: ScanOptions = {}): Promise<Article[]> {
    const keywords = opts.keywords?.length ? opts.keywords : [...DEFAULT_KEYWORDS];
    const country = opts.country ?? this.country;
    const max = Math.max(0, opts.maxArticles ?? this.maxArticles);

    console.log(`[scanner] fetching news for ${keywords.length} keywords (${country}, max ${max})`);
    const fetched = await this.source.fetch(keywords, country);
    if (!fetched.length) {
      console.warn("[scanner] no articles found");
      return [];
    }
    if (fetched.length > max) console.log(`[scanner] limited to first ${max} articles`);
    return fetched.slice(0, max);
  }

  async scanNews(opts: ScanOptions = {}): Promise<{ articles: Article[]; analysis: ScanAnalysis | null }> {
    const articles = await this.fetchArticles(opts);
    if (!articles.length) return { articles, analysis: null };

    const analysis = analyzeArticles(articles, this.clock());
    console.log(`[scanner] ${articles.length} articles, ${analysis.stocksFound} symbols after quality gate`);
    return { articles, analysis };
  }

  async analyzePortfolio(
    stocks: string[],
    opts: Omit<ScanOptions, "keywords"> & { onProgress?: (progress: number, message: string) => void } = {},
  ): Promise<PortfolioAnalysis> {
    const { onProgress, ...scan } = opts;
    const wanted = normalizeStocks(stocks);

    onProgress?.(25, "Fetching news articles...");
    const articles = await this.fetchArticles({ ...scan, keywords: [...DEFAULT_KEYWORDS, ...wanted] });

    onProgress?.(50, "Analyzing stock mentions...");
    const sentiments = aggregateStockSentiment(articles, wanted);
    if (!sentiments.size) {
      console.log(`[scanner] none of ${wanted.length} stocks in the news, using fallback analysis`);
      return { source: "fallback", articlesAnalyzed: articles.length, ...fallbackAnalysis(wanted) };
    }

    onProgress?.(75, "Generating insights...");
    return { source: "news", articlesAnalyzed: articles.length, ...generateInsights({ stockSentiments: sentiments }) };
  }

  async runFullScan(opts: ScanOptions = {}): Promise<FullScan | null> {
    const { articles, analysis } = await this.scanNews(opts);
    if (!analysis) return null;

    const insights = generateInsights(analysis);
    return {
      articles,
      analysis,
      ...insights,
      summary: formatScanSummary(analysis, insights.portfolioInsight),
      report: formatInsightsReport(insights.stockInsights, insights.portfolioInsight, { generatedAt: this.clock() }),
    };
  }
}
