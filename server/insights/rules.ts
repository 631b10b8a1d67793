import type { Sentiment } from "../news/types.js";

export type Signal = {
  sentiment: Sentiment;
  confidence: number;
  mentions: number;
};

/** One row of a decision table. */
export type Rule<I, O> = {
  name: string;
  when: (input: I) => boolean;
  then: O;
};

/** Top-down evaluation; the first row that matches wins. Tables end in a catch-all row. */
export function firstMatch<I, O>(rules: ReadonlyArray<Rule<I, O>>, input: I, fallback: O): O {
  for (const rule of rules) {
    if (rule.when(input)) return rule.then;
  }
  return fallback;
}

/** Every row that matches, in table order. */
export function allMatches<I, O>(rules: ReadonlyArray<Rule<I, O>>, input: I): O[] {
  return rules.filter(r => r.when(input)).map(r => r.then);
}

export const always = () => true;
