import { SECTORS, UNKNOWN_SECTOR, companyForSymbol, type SectorRule } from "../lexicon/index.js";
import type { Sentiment, StockSentimentAggregate } from "../news/types.js";
import { allMatches, always, firstMatch, type Rule, type Signal } from "./rules.js";

export type RiskLevel = "low" | "medium" | "high";
export type TimeHorizon = "short" | "medium";

export type StockInsight = {
  symbol: string;
  company: string;
  mentions: number;
  sentiment: Sentiment;
  confidence: number;
  recommendation: string;
  riskLevel: RiskLevel;
  timeHorizon: TimeHorizon;
  priceOutlook: string;
  keyFactors: string[];
  actionItems: string[];
  sector: string;
  sectorImpact: string;
};

export type InsightInput = Pick<StockSentimentAggregate, "mentions" | "overallSentiment" | "confidence">;

const positive = (s: Signal) => s.sentiment === "positive";
const negative = (s: Signal) => s.sentiment === "negative";

export const RECOMMENDATION_RULES: ReadonlyArray<Rule<Signal, string>> = [
  {
    name: "strong-buy",
    when: s => positive(s) && s.confidence > 0.7 && s.mentions >= 3,
    then: "BUY - Strong positive sentiment with high confidence",
  },
  { name: "buy", when: s => positive(s) && s.confidence > 0.5, then: "BUY - Positive sentiment, consider for portfolio" },
  {
    name: "strong-sell",
    when: s => negative(s) && s.confidence > 0.7 && s.mentions >= 3,
    then: "SELL - Strong negative sentiment, consider exiting",
  },
  { name: "watch", when: s => negative(s) && s.confidence > 0.5, then: "HOLD - Negative sentiment, monitor closely" },
  { name: "busy", when: s => s.mentions >= 5, then: "HOLD - High news volume, wait for clearer direction" },
  { name: "hold", when: always, then: "HOLD - Neutral sentiment, maintain current position" },
];

// High attention with a confident signal reads as a crowded, fast-moving name.
export const RISK_RULES: ReadonlyArray<Rule<Signal, RiskLevel>> = [
  { name: "high", when: s => s.mentions >= 5 && s.confidence > 0.8, then: "high" },
  { name: "medium", when: s => s.mentions >= 3 && s.confidence > 0.6, then: "medium" },
  { name: "low", when: always, then: "low" },
];

export const HORIZON_RULES: ReadonlyArray<Rule<Signal, TimeHorizon>> = [
  { name: "short", when: s => (positive(s) || negative(s)) && s.confidence > 0.7, then: "short" },
  { name: "medium", when: always, then: "medium" },
];

export const OUTLOOK_RULES: ReadonlyArray<Rule<Signal, string>> = [
  {
    name: "bullish",
    when: s => positive(s) && s.confidence > 0.7 && s.mentions >= 5,
    then: "Bullish - Strong positive momentum expected",
  },
  { name: "moderately-bullish", when: s => positive(s) && s.confidence > 0.7, then: "Moderately Bullish - Positive trend developing" },
  {
    name: "bearish",
    when: s => negative(s) && s.confidence > 0.7 && s.mentions >= 5,
    then: "Bearish - Strong negative pressure expected",
  },
  { name: "moderately-bearish", when: s => negative(s) && s.confidence > 0.7, then: "Moderately Bearish - Negative trend developing" },
  { name: "neutral", when: always, then: "Neutral - Mixed signals, sideways movement likely" },
];

export const KEY_FACTOR_RULES: ReadonlyArray<Rule<Signal, string[]>> = [
  { name: "attention", when: s => s.mentions >= 5, then: ["High media attention"] },
  { name: "strength", when: s => s.confidence > 0.7, then: ["Strong sentiment signal"] },
  { name: "upside", when: positive, then: ["Positive news flow", "Potential upside opportunity"] },
  { name: "downside", when: negative, then: ["Negative news flow", "Downside risk present"] },
  { name: "confirmed", when: s => s.mentions >= 3, then: ["Multiple news sources confirming trend"] },
];

const bullishBranch = (s: Signal) => positive(s) && s.confidence > 0.6;
const bearishBranch = (s: Signal) => negative(s) && s.confidence > 0.6;

export const ACTION_ITEM_RULES: ReadonlyArray<Rule<Signal, string[]>> = [
  {
    name: "accumulate",
    when: bullishBranch,
    then: ["Consider adding to portfolio if not already held", "Set stop-loss at 5-10% below current price"],
  },
  {
    name: "high-conviction",
    when: s => bullishBranch(s) && s.confidence > 0.8,
    then: ["Consider increasing position size for high conviction"],
  },
  {
    name: "reduce",
    when: bearishBranch,
    then: ["Review current position and consider reducing exposure", "Set tighter stop-loss to protect capital"],
  },
  {
    name: "exit",
    when: s => bearishBranch(s) && s.confidence > 0.8,
    then: ["Consider exiting position if risk tolerance is low"],
  },
  {
    name: "monitor",
    when: s => !bullishBranch(s) && !bearishBranch(s),
    then: ["Monitor news flow for clearer direction", "Maintain current position size"],
  },
  {
    name: "busy",
    when: s => s.mentions >= 5,
    then: ["Set up price alerts for significant moves", "Monitor earnings calendar for upcoming events"],
  },
  {
    name: "closing",
    when: always,
    then: ["Review quarterly results and management commentary", "Check analyst upgrades/downgrades"],
  },
];

export function toSignal(input: InsightInput): Signal {
  return { sentiment: input.overallSentiment, confidence: input.confidence, mentions: input.mentions };
}

export function recommend(s: Signal): string {
  return firstMatch(RECOMMENDATION_RULES, s, "HOLD - Neutral sentiment, maintain current position");
}

export function assessRisk(s: Signal): RiskLevel {
  return firstMatch(RISK_RULES, s, "low");
}

export function timeHorizon(s: Signal): TimeHorizon {
  return firstMatch(HORIZON_RULES, s, "medium");
}

export function priceOutlook(s: Signal): string {
  return firstMatch(OUTLOOK_RULES, s, "Neutral - Mixed signals, sideways movement likely");
}

export function keyFactors(s: Signal): string[] {
  return allMatches(KEY_FACTOR_RULES, s).flat();
}

export function actionItems(s: Signal): string[] {
  return allMatches(ACTION_ITEM_RULES, s).flat();
}

export function resolveSector(symbol: string, sectors: ReadonlyArray<SectorRule> = SECTORS): string {
  const upper = symbol.toUpperCase();
  return sectors.find(r => upper.includes(r.key))?.sector ?? UNKNOWN_SECTOR;
}

export function sectorImpact(sector: string, s: Signal): string {
  if (s.mentions >= 3) {
    if (positive(s)) return `Positive sector impact expected in ${sector}`;
    if (negative(s)) return `Negative sector impact possible in ${sector}`;
  }
  return `Monitor ${sector} sector for broader trends`;
}

export function generateStockInsight(symbol: string, aggregate: InsightInput): StockInsight {
  const s = toSignal(aggregate);
  const sector = resolveSector(symbol);
  return {
    symbol,
    company: companyForSymbol(symbol),
    mentions: s.mentions,
    sentiment: s.sentiment,
    confidence: s.confidence,
    recommendation: recommend(s),
    riskLevel: assessRisk(s),
    timeHorizon: timeHorizon(s),
    priceOutlook: priceOutlook(s),
    keyFactors: keyFactors(s),
    actionItems: actionItems(s),
    sector,
    sectorImpact: sectorImpact(sector, s),
  };
}

export function generateStockInsights(aggregates: Map<string, InsightInput>): StockInsight[] {
  const out: StockInsight[] = [];
  for (const [symbol, agg] of aggregates) {
    if (agg.mentions > 0) out.push(generateStockInsight(symbol, agg));
  }
  return out;
}
