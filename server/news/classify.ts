// server/news/classify.ts
import { SENTIMENT_LEXICON, type SentimentLexicon } from "../lexicon/index.js";
import type { Article, SentimentResult } from "./types.js";

// Phrases are stronger signals than single words.
const PHRASE_WEIGHT = 2;
const NEUTRAL_CONFIDENCE = 0.5;

const TOKEN = /[\p{L}\p{M}\p{N}_]+/gu;

export function tokenize(text: string): string[] {
  return text.toLowerCase().match(TOKEN) ?? [];
}

function countPhrases(text: string, phrases: ReadonlyArray<string>) {
  return phrases.filter(p => text.includes(p)).length;
}

export function scoreSentiment(text: string, lexicon: SentimentLexicon = SENTIMENT_LEXICON): SentimentResult {
  const lower = text.toLowerCase();
  const words = tokenize(lower);

  let positiveCount = 0;
  let negativeCount = 0;
  for (const w of words) {
    if (lexicon.positiveWords.has(w)) positiveCount++;
    else if (lexicon.negativeWords.has(w)) negativeCount++;
  }

  positiveCount += countPhrases(lower, lexicon.positivePhrases) * PHRASE_WEIGHT;
  negativeCount += countPhrases(lower, lexicon.negativePhrases) * PHRASE_WEIGHT;

  // Phrase weight can push a count past the token total on short texts. The class comes
  // from the raw ratios (same denominator, so the counts); the reported scores are capped
  // to [0, 1], so a capped tie can still carry a positive or negative class.
  const total = words.length;
  const positiveScore = total > 0 ? Math.min(1, positiveCount / total) : 0;
  const negativeScore = total > 0 ? Math.min(1, negativeCount / total) : 0;

  let classification: SentimentResult["classification"] = "neutral";
  let confidence = NEUTRAL_CONFIDENCE;
  if (total > 0 && positiveCount > negativeCount) {
    classification = "positive";
    confidence = positiveScore;
  } else if (total > 0 && negativeCount > positiveCount) {
    classification = "negative";
    confidence = negativeScore;
  }

  return { classification, confidence, positiveScore, negativeScore, positiveCount, negativeCount };
}

export function classifyArticles(articles: Article[]): SentimentResult[] {
  return articles.map(a => scoreSentiment(a));
}
