/**
 * @file src/lib/utils.ts
 * @description Utility functions
 */

const ordinalRules = new Intl.PluralRules('en-US', { type: 'ordinal' });

const ordinalSuffixes: Record<Intl.LDMLPluralRule, string> = {
  zero: 'th',
  one: 'st',
  two: 'nd',
  few: 'rd',
  many: 'th',
  other: 'th',
};

// 1 -> "1st", 12 -> "12th", 23 -> "23rd"
export const ordinal = (n: number): string =>
  `${n}${ordinalSuffixes[ordinalRules.select(n)]}`;

export const errorMessage = (err: unknown): string =>
  err instanceof Error ? err.message : String(err);
