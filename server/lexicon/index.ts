import { readFileSync } from 'node:fs';
import { z } from 'zod';

// Declarative lexicon data. Read and validated once when this module loads;
// a broken file stops the process instead of surfacing on some later request.

export class LexiconError extends Error {
  constructor(file: string, detail: string) {
    super(`Invalid lexicon file ${file}: ${detail}`);
    this.name = 'LexiconError';
  }
}

const alias = z.string().trim().min(1).transform(s => s.toUpperCase());

const companiesSchema = z.object({
  companies: z
    .array(z.object({ company: z.string().trim().min(1), aliases: z.array(alias).min(1) }))
    .superRefine((rows, ctx) => {
      const seen = new Set<string>();
      for (const row of rows) {
        if (seen.has(row.company)) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, message: `duplicate company "${row.company}"` });
        }
        seen.add(row.company);
      }
    }),
});

const stopwordsSchema = z.object({ words: z.array(alias) });

const wordList = z.array(z.string().trim().min(1).transform(s => s.toLowerCase()));

const sentimentSchema = z.object({
  positiveWords: wordList,
  negativeWords: wordList,
  positivePhrases: wordList,
  negativePhrases: wordList,
});

const sectorsSchema = z.object({
  sectors: z.array(z.object({ key: alias, sector: z.string().trim().min(1) })),
});

export function parseLexicon<S extends z.ZodTypeAny>(file: string, raw: string, schema: S): z.output<S> {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (e) {
    throw new LexiconError(file, e instanceof Error ? e.message : String(e));
  }
  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new LexiconError(file, `${issue.path.join('.') || '(root)'}: ${issue.message}`);
  }
  return parsed.data;
}

function load<S extends z.ZodTypeAny>(file: string, schema: S): z.output<S> {
  const raw = readFileSync(new URL(`./${file}`, import.meta.url), 'utf8');
  return parseLexicon(file, raw, schema);
}

export type CompanyRecord = { readonly company: string; readonly aliases: readonly string[] };

export type SentimentLexicon = {
  readonly positiveWords: ReadonlySet<string>;
  readonly negativeWords: ReadonlySet<string>;
  readonly positivePhrases: readonly string[];
  readonly negativePhrases: readonly string[];
};

export type SectorRule = { readonly key: string; readonly sector: string };

export const UNKNOWN_COMPANY = 'Unknown';
export const UNKNOWN_SECTOR = 'Unknown';

export const COMPANIES: readonly CompanyRecord[] = Object.freeze(
  load('companies.json', companiesSchema).companies.map(c =>
    Object.freeze({ company: c.company, aliases: Object.freeze(Array.from(new Set(c.aliases))) }),
  ),
);

const aliasToCompany = new Map<string, string>();
for (const { company, aliases } of COMPANIES) {
  for (const a of aliases) aliasToCompany.set(a, company);
}

export function companyForSymbol(symbol: string): string {
  return aliasToCompany.get(symbol.toUpperCase()) ?? UNKNOWN_COMPANY;
}

export function isKnownSymbol(symbol: string): boolean {
  return aliasToCompany.has(symbol.toUpperCase());
}

export const STOPWORDS: ReadonlySet<string> = new Set(load('stopwords.json', stopwordsSchema).words);

const sentiment = load('sentiment.json', sentimentSchema);

export const SENTIMENT_LEXICON: SentimentLexicon = Object.freeze({
  positiveWords: new Set(sentiment.positiveWords),
  negativeWords: new Set(sentiment.negativeWords),
  positivePhrases: Object.freeze(Array.from(new Set(sentiment.positivePhrases))),
  negativePhrases: Object.freeze(Array.from(new Set(sentiment.negativePhrases))),
});

// Declared order is the lookup priority.
export const SECTORS: readonly SectorRule[] = Object.freeze(load('sectors.json', sectorsSchema).sectors);
