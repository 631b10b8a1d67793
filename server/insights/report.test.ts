import { describe, expect, it } from "vitest";
import { generatePortfolioInsight } from "./portfolio.js";
import { DISCLAIMER, formatInsightsReport, formatScanSummary, formatTimestamp } from "./report.js";
import { generateStockInsight } from "./stock.js";

const heading = (title: string) => [title, "-".repeat(title.length)];

const tcs = generateStockInsight("TCS", { mentions: 1, overallSentiment: "negative", confidence: 4 / 7 });
const reliance = generateStockInsight("RELIANCE", { mentions: 6, overallSentiment: "positive", confidence: 0.9 });
const at = new Date("2024-05-01T09:30:00Z");

describe("formatTimestamp", () => {
  it("renders UTC seconds", () => {
    expect(formatTimestamp(at)).toBe("2024-05-01 09:30:00");
  });
});

describe("formatInsightsReport", () => {
  it("renders every section for a single stock", () => {
    const report = formatInsightsReport([tcs], generatePortfolioInsight([tcs]), { generatedAt: at });
    expect(report.split("\n")).toEqual([
      "PORTFOLIO SCANNER INSIGHTS REPORT",
      "=".repeat(50),
      "Generated on: 2024-05-01 09:30:00",
      "",
      ...heading("PORTFOLIO OVERVIEW"),
      "Total Stocks Analyzed: 1",
      "Overall Sentiment: NEGATIVE",
      "Portfolio Recommendation: Maintain current allocation - balanced risk-reward profile",
      "",
      ...heading("SENTIMENT BREAKDOWN"),
      "Positive: 0 stocks",
      "Negative: 1 stocks",
      "Neutral: 0 stocks",
      "",
      ...heading("RISK ASSESSMENT"),
      "High Risk: 0 stocks",
      "Medium Risk: 0 stocks",
      "Low Risk: 1 stocks",
      "",
      ...heading("TOP BUY RECOMMENDATIONS"),
      "• None",
      "",
      ...heading("TOP SELL RECOMMENDATIONS"),
      "• None",
      "",
      ...heading("INDIVIDUAL STOCK ANALYSIS"),
      "TCS (Tata Consultancy Services)",
      "   Mentions: 1",
      "   Sentiment: NEGATIVE (Confidence: 0.57)",
      "   Recommendation: HOLD - Negative sentiment, monitor closely",
      "   Risk Level: LOW",
      "   Time Horizon: medium",
      "   Price Outlook: Neutral - Mixed signals, sideways movement likely",
      "   Sector Impact: Monitor IT Services sector for broader trends",
      "   Key Factors: Negative news flow, Downside risk present",
      "   Action Items:",
      "     • Monitor news flow for clearer direction",
      "     • Maintain current position size",
      "     • Review quarterly results and management commentary",
      "     • Check analyst upgrades/downgrades",
      "",
      ...heading("KEY PORTFOLIO RISKS"),
      "• High proportion of negative sentiment stocks",
      "• High sector concentration - consider diversification",
      "",
      ...heading("PORTFOLIO OPPORTUNITIES"),
      "• None identified",
      "",
      "=".repeat(50),
      DISCLAIMER,
    ]);
  });

  it("lists buy recommendations with risk and confidence", () => {
    const lines = formatInsightsReport([reliance], generatePortfolioInsight([reliance]), { generatedAt: at }).split("\n");
    const start = lines.indexOf("• RELIANCE (Reliance)");
    expect(lines.slice(start, start + 4)).toEqual([
      "• RELIANCE (Reliance)",
      "  BUY - Strong positive sentiment with high confidence",
      "  Risk: HIGH, Confidence: 0.90",
      "",
    ]);
  });

  it("notes an empty analysis", () => {
    const lines = formatInsightsReport([], generatePortfolioInsight([]), { generatedAt: at }).split("\n");
    const start = lines.indexOf("INDIVIDUAL STOCK ANALYSIS");
    expect(lines.slice(start + 2, start + 4)).toEqual(["No stocks analyzed", ""]);
  });
});

describe("formatScanSummary", () => {
  it("prints counts, top mentions and the allocation call", () => {
    const summary = formatScanSummary(
      {
        articlesAnalyzed: 2,
        stocksFound: 1,
        analyzedAt: "2024-05-01T09:30:00.000Z",
        topStocks: [{ symbol: "TCS", count: 2 }],
      },
      generatePortfolioInsight([tcs]),
    );
    expect(summary.split("\n")).toEqual([
      "PORTFOLIO SCANNER SUMMARY",
      "=".repeat(40),
      "Articles Analyzed: 2",
      "Stocks Found: 1",
      "Analysis Time: 2024-05-01T09:30:00.000Z",
      "",
      ...heading("TOP 10 MOST MENTIONED STOCKS"),
      " 1. TCS          (Tata Consultancy Services) - 2 mentions",
      "",
      ...heading("SENTIMENT OVERVIEW"),
      "Positive: 0 stocks",
      "Negative: 1 stocks",
      "Neutral:  0 stocks",
      "",
      "Portfolio Recommendation: Maintain current allocation - balanced risk-reward profile",
    ]);
  });
});
