import { scoreSentiment } from "./classify.js";
import type { Article, Sentiment, StockSentimentAggregate } from "./types.js";

function emptyAggregate(): StockSentimentAggregate {
  return {
    mentions: 0,
    positiveArticles: 0,
    negativeArticles: 0,
    neutralArticles: 0,
    overallSentiment: "neutral",
    confidence: 0,
    proportionConfidence: 0,
    articleConfidences: [],
  };
}

/**
 * Per-symbol sentiment across an article batch. A symbol is mentioned by an article
 * when it occurs in the text case-insensitively; symbols nobody mentions are absent
 * from the result, which keeps first-mention order.
 *
 * `confidence` ends up as the mean of the per-article confidences and replaces the
 * majority share computed just before it. The share is kept as `proportionConfidence`.
 */
export function aggregateStockSentiment(articles: Article[], symbols: string[]): Map<string, StockSentimentAggregate> {
  const out = new Map<string, StockSentimentAggregate>();
  const wanted = Array.from(new Set(symbols.filter(Boolean)));

  for (const article of articles) {
    const upper = article.toUpperCase();
    const sentiment = scoreSentiment(article);

    for (const symbol of wanted) {
      if (!upper.includes(symbol.toUpperCase())) continue;

      let agg = out.get(symbol);
      if (!agg) {
        agg = emptyAggregate();
        out.set(symbol, agg);
      }
      agg.mentions++;
      agg.articleConfidences.push(sentiment.confidence);

      if (sentiment.classification === "positive") agg.positiveArticles++;
      else if (sentiment.classification === "negative") agg.negativeArticles++;
      else agg.neutralArticles++;
    }
  }

  for (const agg of out.values()) {
    if (agg.positiveArticles > agg.negativeArticles) {
      agg.overallSentiment = "positive";
      agg.proportionConfidence = agg.positiveArticles / agg.mentions;
    } else if (agg.negativeArticles > agg.positiveArticles) {
      agg.overallSentiment = "negative";
      agg.proportionConfidence = agg.negativeArticles / agg.mentions;
    } else {
      agg.overallSentiment = "neutral";
      agg.proportionConfidence = 0.5;
    }
    agg.confidence = agg.proportionConfidence;

    if (agg.articleConfidences.length) {
      agg.confidence = agg.articleConfidences.reduce((s, c) => s + c, 0) / agg.articleConfidences.length;
    }
  }

  return out;
}

export type SentimentSummaryEntry = {
  symbol: string;
  confidence: number;
  mentions: number;
  positiveArticles: number;
  negativeArticles: number;
};

export type SentimentSummary = Record<Sentiment, SentimentSummaryEntry[]>;

/** Symbols grouped by overall sentiment, most confident first. */
export function summarizeSentiment(aggregates: Map<string, StockSentimentAggregate>): SentimentSummary {
  const summary: SentimentSummary = { positive: [], negative: [], neutral: [] };

  for (const [symbol, agg] of aggregates) {
    if (agg.mentions <= 0) continue;
    summary[agg.overallSentiment].push({
      symbol,
      confidence: agg.confidence,
      mentions: agg.mentions,
      positiveArticles: agg.positiveArticles,
      negativeArticles: agg.negativeArticles,
    });
  }

  for (const list of Object.values(summary)) {
    list.sort((a, b) => b.confidence - a.confidence);
  }
  return summary;
}
