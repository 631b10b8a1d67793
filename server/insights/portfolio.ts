import type { Sentiment } from "../news/types.js";
import { firstMatch, type Rule } from "./rules.js";
import type { RiskLevel, StockInsight } from "./stock.js";

const TOP_N = 5;

export type PortfolioInsight = {
  portfolioSentiment: Sentiment;
  totalStocksAnalyzed: number;
  sentimentBreakdown: Record<Sentiment, number>;
  riskBreakdown: Record<RiskLevel, number>;
  topBuyRecommendations: StockInsight[];
  topSellRecommendations: StockInsight[];
  portfolioRecommendation: string;
  keyRisks: string[];
  opportunities: string[];
};

type AllocationInput = { sentiment: Sentiment; highRiskRatio: number };

export const ALLOCATION_RULES: ReadonlyArray<Rule<AllocationInput, string>> = [
  {
    name: "increase",
    when: a => a.sentiment === "positive" && a.highRiskRatio < 0.3,
    then: "Consider increasing equity allocation - positive sentiment with manageable risk",
  },
  {
    name: "reduce",
    when: a => a.sentiment === "negative" && a.highRiskRatio > 0.5,
    then: "Consider reducing equity allocation - negative sentiment with high risk",
  },
  {
    name: "diversify",
    when: a => a.highRiskRatio > 0.6,
    then: "High risk exposure - consider diversification and risk management",
  },
];

const MAINTAIN = "Maintain current allocation - balanced risk-reward profile";

export function portfolioRecommendation(sentiment: Sentiment, highRisk: number, total: number): string {
  const highRiskRatio = total > 0 ? highRisk / total : 0;
  return firstMatch(ALLOCATION_RULES, { sentiment, highRiskRatio }, MAINTAIN);
}

function majority(b: Record<Sentiment, number>): Sentiment {
  if (b.positive > b.negative) return "positive";
  if (b.negative > b.positive) return "negative";
  return "neutral";
}

export function identifyPortfolioRisks(insights: StockInsight[]): string[] {
  const risks: string[] = [];
  const total = insights.length;

  const highRisk = insights.filter(i => i.riskLevel === "high").length;
  const negatives = insights.filter(i => i.sentiment === "negative").length;

  if (highRisk > 3) risks.push("High concentration of high-risk stocks");
  if (negatives > total * 0.4) risks.push("High proportion of negative sentiment stocks");

  const sectors = new Map<string, number>();
  for (const i of insights) sectors.set(i.sector, (sectors.get(i.sector) ?? 0) + 1);
  const largest = Math.max(0, ...sectors.values());
  if (largest > total * 0.5) risks.push("High sector concentration - consider diversification");

  return risks;
}

export function identifyPortfolioOpportunities(insights: StockInsight[]): string[] {
  const opportunities: string[] = [];
  const total = insights.length;

  const positives = insights.filter(i => i.sentiment === "positive").length;
  const highConfidence = insights.filter(i => i.confidence > 0.7).length;

  if (positives > total * 0.6) opportunities.push("Strong positive sentiment across portfolio");
  if (highConfidence > 3) opportunities.push("Multiple high-confidence opportunities identified");
  if (insights.some(i => i.sentiment === "positive" && i.mentions < 3)) {
    opportunities.push("Potential undervalued opportunities with positive sentiment");
  }

  return opportunities;
}

export function generatePortfolioInsight(insights: StockInsight[]): PortfolioInsight {
  const sentimentBreakdown: Record<Sentiment, number> = { positive: 0, negative: 0, neutral: 0 };
  const riskBreakdown: Record<RiskLevel, number> = { high: 0, medium: 0, low: 0 };
  for (const i of insights) {
    sentimentBreakdown[i.sentiment]++;
    riskBreakdown[i.riskLevel]++;
  }
  const portfolioSentiment = majority(sentimentBreakdown);

  return {
    portfolioSentiment,
    totalStocksAnalyzed: insights.length,
    sentimentBreakdown,
    riskBreakdown,
    topBuyRecommendations: insights.filter(i => i.recommendation.includes("BUY")).slice(0, TOP_N),
    topSellRecommendations: insights.filter(i => i.recommendation.includes("SELL")).slice(0, TOP_N),
    portfolioRecommendation: portfolioRecommendation(portfolioSentiment, riskBreakdown.high, insights.length),
    keyRisks: identifyPortfolioRisks(insights),
    opportunities: identifyPortfolioOpportunities(insights),
  };
}
