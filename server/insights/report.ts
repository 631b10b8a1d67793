import { companyForSymbol } from "../lexicon/index.js";
import type { SymbolCount } from "../news/types.js";
import type { PortfolioInsight } from "./portfolio.js";
import type { StockInsight } from "./stock.js";

export const DISCLAIMER =
  "DISCLAIMER: This analysis is based on news sentiment and should not be considered as financial advice. " +
  "Please consult with a financial advisor before making investment decisions.";

const RULE = "=".repeat(50);

/** `YYYY-MM-DD HH:MM:SS`, UTC. */
export function formatTimestamp(d: Date): string {
  return d.toISOString().slice(0, 19).replace("T", " ");
}

function section(title: string): string[] {
  return [title, "-".repeat(title.length)];
}

function bullets(items: string[]): string[] {
  return items.length ? items.map(i => `• ${i}`) : ["• None identified"];
}

function recommendationBlock(stocks: StockInsight[]): string[] {
  if (!stocks.length) return ["• None", ""];
  return stocks.flatMap(s => [
    `• ${s.symbol} (${s.company})`,
    `  ${s.recommendation}`,
    `  Risk: ${s.riskLevel.toUpperCase()}, Confidence: ${s.confidence.toFixed(2)}`,
    "",
  ]);
}

function stockBlock(s: StockInsight): string[] {
  const lines = [
    `${s.symbol} (${s.company})`,
    `   Mentions: ${s.mentions}`,
    `   Sentiment: ${s.sentiment.toUpperCase()} (Confidence: ${s.confidence.toFixed(2)})`,
    `   Recommendation: ${s.recommendation}`,
    `   Risk Level: ${s.riskLevel.toUpperCase()}`,
    `   Time Horizon: ${s.timeHorizon}`,
    `   Price Outlook: ${s.priceOutlook}`,
    `   Sector Impact: ${s.sectorImpact}`,
  ];
  if (s.keyFactors.length) lines.push(`   Key Factors: ${s.keyFactors.join(", ")}`);
  if (s.actionItems.length) {
    lines.push("   Action Items:");
    for (const item of s.actionItems) lines.push(`     • ${item}`);
  }
  lines.push("");
  return lines;
}

export function formatInsightsReport(
  stocks: StockInsight[],
  portfolio: PortfolioInsight,
  opts: { generatedAt?: Date } = {},
): string {
  const { sentimentBreakdown: sb, riskBreakdown: rb } = portfolio;

  const lines = [
    "PORTFOLIO SCANNER INSIGHTS REPORT",
    RULE,
    `Generated on: ${formatTimestamp(opts.generatedAt ?? new Date())}`,
    "",
    ...section("PORTFOLIO OVERVIEW"),
    `Total Stocks Analyzed: ${portfolio.totalStocksAnalyzed}`,
    `Overall Sentiment: ${portfolio.portfolioSentiment.toUpperCase()}`,
    `Portfolio Recommendation: ${portfolio.portfolioRecommendation}`,
    "",
    ...section("SENTIMENT BREAKDOWN"),
    `Positive: ${sb.positive} stocks`,
    `Negative: ${sb.negative} stocks`,
    `Neutral: ${sb.neutral} stocks`,
    "",
    ...section("RISK ASSESSMENT"),
    `High Risk: ${rb.high} stocks`,
    `Medium Risk: ${rb.medium} stocks`,
    `Low Risk: ${rb.low} stocks`,
    "",
    ...section("TOP BUY RECOMMENDATIONS"),
    ...recommendationBlock(portfolio.topBuyRecommendations),
    ...section("TOP SELL RECOMMENDATIONS"),
    ...recommendationBlock(portfolio.topSellRecommendations),
    ...section("INDIVIDUAL STOCK ANALYSIS"),
    ...(stocks.length ? stocks.flatMap(stockBlock) : ["No stocks analyzed", ""]),
    ...section("KEY PORTFOLIO RISKS"),
    ...bullets(portfolio.keyRisks),
    "",
    ...section("PORTFOLIO OPPORTUNITIES"),
    ...bullets(portfolio.opportunities),
    "",
    RULE,
    DISCLAIMER,
  ];
  return lines.join("\n");
}

export type ScanSummaryInput = {
  articlesAnalyzed: number;
  stocksFound: number;
  analyzedAt: string;
  topStocks: SymbolCount[];
};

/** Short console summary printed ahead of the full report. */
export function formatScanSummary(analysis: ScanSummaryInput, portfolio: PortfolioInsight): string {
  const lines = [
    "PORTFOLIO SCANNER SUMMARY",
    "=".repeat(40),
    `Articles Analyzed: ${analysis.articlesAnalyzed}`,
    `Stocks Found: ${analysis.stocksFound}`,
    `Analysis Time: ${analysis.analyzedAt}`,
    "",
  ];

  if (analysis.topStocks.length) {
    lines.push(...section("TOP 10 MOST MENTIONED STOCKS"));
    analysis.topStocks.slice(0, 10).forEach(({ symbol, count }, i) => {
      const company = companyForSymbol(symbol);
      lines.push(`${String(i + 1).padStart(2)}. ${symbol.padEnd(12)} (${company.padEnd(25)}) - ${count} mentions`);
    });
    lines.push("");
  }

  const sb = portfolio.sentimentBreakdown;
  lines.push(...section("SENTIMENT OVERVIEW"), `Positive: ${sb.positive} stocks`, `Negative: ${sb.negative} stocks`, `Neutral:  ${sb.neutral} stocks`, "");

  const buys = portfolio.topBuyRecommendations.slice(0, 3);
  if (buys.length) {
    lines.push(...section("TOP BUY RECOMMENDATIONS"), ...buys.map(s => `• ${s.symbol} - ${s.recommendation}`), "");
  }
  const sells = portfolio.topSellRecommendations.slice(0, 3);
  if (sells.length) {
    lines.push(...section("TOP SELL RECOMMENDATIONS"), ...sells.map(s => `• ${s.symbol} - ${s.recommendation}`), "");
  }

  lines.push(`Portfolio Recommendation: ${portfolio.portfolioRecommendation}`);
  return lines.join("\n");
}
