import { COMPANIES, STOPWORDS, UNKNOWN_COMPANY } from "../lexicon/index.js";
import type { Article, Confidence, SymbolCandidate, SymbolCount } from "./types.js";

const SYMBOL_PATTERNS = [
  /\b[A-Z]{2,6}\b/g, // plain tickers
  /\b[A-Z]{1,2}[0-9]{1,4}\b/g, // alphanumeric
] as const;

const TIER: Record<Confidence, number> = { high: 0, medium: 1, low: 2 };

export function isValidSymbol(symbol: string): boolean {
  if (symbol.length < 2 || symbol.length > 10) return false;
  if (!/[A-Z]/.test(symbol)) return false;
  if (/^\d+$/.test(symbol)) return false;
  if (!/^[A-Z0-9\-.]+$/.test(symbol)) return false;
  return !STOPWORDS.has(symbol);
}

export function extractSymbols(text: string): SymbolCandidate[] {
  const upper = text.toUpperCase();
  const found: SymbolCandidate[] = [];
  const seen = new Set<string>();

  const push = (c: SymbolCandidate) => {
    if (seen.has(c.symbol)) return;
    seen.add(c.symbol);
    found.push(c);
  };

  for (const { company, aliases } of COMPANIES) {
    for (const alias of aliases) {
      if (upper.includes(alias)) {
        push({ symbol: alias, company, confidence: alias.length > 3 ? "high" : "medium" });
      }
    }
  }

  for (const pattern of SYMBOL_PATTERNS) {
    for (const [match] of upper.matchAll(pattern)) {
      if (seen.has(match) || !isValidSymbol(match)) continue;
      if (/\d/.test(match) || match.length >= 4) {
        push({ symbol: match, company: UNKNOWN_COMPANY, confidence: "low" });
      }
    }
  }

  // Array.prototype.sort is stable, so discovery order holds within a tier.
  return found.sort((a, b) => TIER[a.confidence] - TIER[b.confidence]);
}

/** Candidates per article index; articles without any candidate are left out. */
export function extractFromArticles(articles: Article[]): Map<number, SymbolCandidate[]> {
  const out = new Map<number, SymbolCandidate[]>();
  articles.forEach((article, i) => {
    const stocks = extractSymbols(article);
    if (stocks.length) out.set(i, stocks);
  });
  return out;
}

export function symbolFrequency(articles: Article[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const article of articles) {
    for (const { symbol } of extractSymbols(article)) {
      counts.set(symbol, (counts.get(symbol) ?? 0) + 1);
    }
  }
  // Map keeps first-seen order and the sort is stable, so ties stay in that order.
  return new Map([...counts.entries()].sort((a, b) => b[1] - a[1]));
}

export function topSymbols(articles: Article[], n = 10): SymbolCount[] {
  return [...symbolFrequency(articles)]
    .slice(0, Math.max(0, n))
    .map(([symbol, count]) => ({ symbol, count }));
}
