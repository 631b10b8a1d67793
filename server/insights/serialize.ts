import type { Sentiment } from "../news/types.js";
import type { PortfolioInsight } from "./portfolio.js";
import type { RiskLevel, StockInsight, TimeHorizon } from "./stock.js";

// snake_case shapes handed to HTTP clients and written to scan result files.

export type StockInsightWire = {
  symbol: string;
  company: string;
  mentions: number;
  sentiment: Sentiment;
  confidence: number;
  recommendation: string;
  risk_level: RiskLevel;
  time_horizon: TimeHorizon;
  price_outlook: string;
  key_factors: string[];
  action_items: string[];
  sector_impact: string;
};

export type PortfolioInsightWire = {
  portfolio_sentiment: Sentiment;
  total_stocks_analyzed: number;
  sentiment_breakdown: Record<Sentiment, number>;
  risk_breakdown: { high_risk: number; medium_risk: number; low_risk: number };
  top_buy_recommendations: StockInsightWire[];
  top_sell_recommendations: StockInsightWire[];
  portfolio_recommendation: string;
  key_risks: string[];
  opportunities: string[];
};

export function toStockInsightWire(i: StockInsight): StockInsightWire {
  return {
    symbol: i.symbol,
    company: i.company,
    mentions: i.mentions,
    sentiment: i.sentiment,
    confidence: i.confidence,
    recommendation: i.recommendation,
    risk_level: i.riskLevel,
    time_horizon: i.timeHorizon,
    price_outlook: i.priceOutlook,
    key_factors: [...i.keyFactors],
    action_items: [...i.actionItems],
    sector_impact: i.sectorImpact,
  };
}

export function toPortfolioInsightWire(p: PortfolioInsight): PortfolioInsightWire {
  return {
    portfolio_sentiment: p.portfolioSentiment,
    total_stocks_analyzed: p.totalStocksAnalyzed,
    sentiment_breakdown: { ...p.sentimentBreakdown },
    risk_breakdown: {
      high_risk: p.riskBreakdown.high,
      medium_risk: p.riskBreakdown.medium,
      low_risk: p.riskBreakdown.low,
    },
    top_buy_recommendations: p.topBuyRecommendations.map(toStockInsightWire),
    top_sell_recommendations: p.topSellRecommendations.map(toStockInsightWire),
    portfolio_recommendation: p.portfolioRecommendation,
    key_risks: [...p.keyRisks],
    opportunities: [...p.opportunities],
  };
}

/** Symbols always contain a letter, so object key order follows the map's descending order. */
export function frequencyToObject(frequency: Map<string, number>): Record<string, number> {
  return Object.fromEntries(frequency);
}
