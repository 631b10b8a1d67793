import { describe, expect, it } from "vitest";
import type { SentimentLexicon } from "../lexicon/index.js";
import { classifyArticles, scoreSentiment, tokenize } from "./classify.js";

describe("tokenize", () => {
  it("lowercases and splits on non-word characters", () => {
    expect(tokenize("Stock falls 8%, TCS says")).toEqual(["stock", "falls", "8", "tcs", "says"]);
    expect(tokenize("")).toEqual([]);
  });
});

describe("scoreSentiment", () => {
  it("scores a positive headline", () => {
    const r = scoreSentiment("Reliance Industries reports strong Q3 results with 15% growth in revenue");
    // strong + growth as words, then the "growth" and "revenue" phrases at weight 2
    expect(r).toMatchObject({ classification: "positive", positiveCount: 6, negativeCount: 0, negativeScore: 0 });
    expect(r.confidence).toBeCloseTo(6 / 11);
    expect(r.positiveScore).toBeCloseTo(6 / 11);
  });

  it("scores a negative headline", () => {
    const r = scoreSentiment("TCS announces disappointing earnings, stock falls 8%");
    expect(r.classification).toBe("negative");
    expect(r.positiveCount).toBe(2);
    expect(r.negativeCount).toBe(4);
    expect(r.confidence).toBeCloseTo(4 / 7);
  });

  it("caps scores at 1 when phrases outweigh the text", () => {
    const r = scoreSentiment("rally");
    expect(r.positiveCount).toBe(3);
    expect(r.positiveScore).toBe(1);
    expect(r.confidence).toBe(1);
  });

  it("classifies by raw counts when both capped scores hit 1", () => {
    expect(scoreSentiment("strong profit, loss")).toEqual({
      classification: "positive",
      confidence: 1,
      positiveScore: 1,
      negativeScore: 1,
      positiveCount: 4,
      negativeCount: 3,
    });
  });

  it("is neutral with no tokens", () => {
    expect(scoreSentiment("")).toEqual({
      classification: "neutral",
      confidence: 0.5,
      positiveScore: 0,
      negativeScore: 0,
      positiveCount: 0,
      negativeCount: 0,
    });
  });

  it("is neutral on a tie", () => {
    const r = scoreSentiment("up down");
    expect(r.classification).toBe("neutral");
    expect(r.confidence).toBe(0.5);
    expect(r.positiveScore).toBe(0.5);
    expect(r.negativeScore).toBe(0.5);
  });

  it("accepts a custom lexicon", () => {
    const lexicon: SentimentLexicon = {
      positiveWords: new Set(["good"]),
      negativeWords: new Set(["bad"]),
      positivePhrases: [],
      negativePhrases: ["very bad"],
    };
    const r = scoreSentiment("good bad very bad", lexicon);
    expect(r.positiveCount).toBe(1);
    expect(r.negativeCount).toBe(4);
    expect(r.classification).toBe("negative");
    expect(r.confidence).toBe(1);
  });
});

describe("classifyArticles", () => {
  it("keeps article order", () => {
    expect(classifyArticles(["rally", "", "up down"]).map(r => r.classification)).toEqual([
      "positive",
      "neutral",
      "neutral",
    ]);
  });
});
