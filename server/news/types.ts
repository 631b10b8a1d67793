export type Confidence = "high" | "medium" | "low";

export type Sentiment = "positive" | "negative" | "neutral";

/** Article text as handed over by the news source, usually `Title: ...\nContent: ...\n`. */
export type Article = string;

export type SymbolCandidate = {
  symbol: string;
  company: string; // "Unknown" for pattern matches
  confidence: Confidence;
};

export type SentimentResult = {
  classification: Sentiment;
  confidence: number;
  positiveScore: number;
  negativeScore: number;
  positiveCount: number;
  negativeCount: number;
};

export type StockSentimentAggregate = {
  mentions: number;
  positiveArticles: number;
  negativeArticles: number;
  neutralArticles: number;
  overallSentiment: Sentiment;
  /** Mean of the per-article confidences. */
  confidence: number;
  /** Majority share before the mean overwrites it; 0.5 on a tie. */
  proportionConfidence: number;
  articleConfidences: number[];
};

export type SymbolCount = { symbol: string; count: number };

export type RawNewsItem = {
  title: string;
  description: string;
  url?: string;
  source?: string;
  publishedAt?: string; // ISO
};

export interface NewsSource {
  fetch(keywords: string[], country: string): Promise<Article[]>;
}
