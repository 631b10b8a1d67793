import { writeFile } from 'node:fs/promises';
import { loadConfig } from '../server/config.js';
import { NewsApiSource } from '../server/news/fetchers/newsapi.js';
import { PortfolioScanner, toAnalysisWire } from '../server/scanner.js';
import { toPortfolioInsightWire, toStockInsightWire } from '../server/insights/serialize.js';

const args = process.argv.slice(2);
const SAVE = !args.includes('--no-save');
const KEYWORDS = args.filter(a => !a.startsWith('--'));

function stamp(d: Date): string {
  // 20260101_093000
  return d.toISOString().slice(0, 19).replace(/[-:]/g, '').replace('T', '_');
}

async function run() {
  const config = loadConfig();
  const source = new NewsApiSource({ apiKey: config.newsApiKey, baseUrl: config.newsApiBase });
  const scanner = new PortfolioScanner(source, { country: config.country, maxArticles: config.maxArticles });

  const scan = await scanner.runFullScan({ keywords: KEYWORDS });
  if (!scan) {
    console.error('[scan] no articles to analyze');
    process.exitCode = 1;
    return;
  }

  console.log(scan.summary);
  console.log();
  console.log(scan.report);

  if (!SAVE) return;
  const outPath = `portfolio_scan_${stamp(new Date(scan.analysis.analyzedAt))}.json`;
  const payload = {
    scan_results: toAnalysisWire(scan.analysis),
    stock_insights: scan.stockInsights.map(toStockInsightWire),
    portfolio_insights: toPortfolioInsightWire(scan.portfolioInsight),
    report: scan.report,
  };
  await writeFile(outPath, JSON.stringify(payload, null, 2), 'utf8');
  console.log(`[scan] results written to ${outPath}`);
}

run().catch((e) => {
  console.error(e);
  process.exit(1);
});
