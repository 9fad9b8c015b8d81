// ═══════════════════════════════════════════════════════════════════════════════
// REFERENCE DATA — Versioned tables maintained outside the engine code
// ═══════════════════════════════════════════════════════════════════════════════
//
//   nse-holidays.json          Year-keyed exchange holidays (refresh every year)
//   institution-keywords.json  FII / DII client-name fragments
//   fallback-stocks.json       Last-resort institutionally active securities
//
// The tables are validated once on load. The engine never reads the JSON
// directly: each component receives its table through its constructor or
// function parameters, so callers can inject an updated version.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { z } from 'zod';

import holidaysJson from './nse-holidays.json';
import keywordsJson from './institution-keywords.json';
import fallbackJson from './fallback-stocks.json';

import type { InstitutionalStock } from '../types/market';
import { ConfigError } from '../engine/config';

const IsoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'expected YYYY-MM-DD');
const CashActionSchema = z.enum(['buy', 'sell', 'neutral']);

export const HolidayTableSchema = z.object({
  exchange: z.string(),
  version: z.string(),
  holidays: z.record(z.string().regex(/^\d{4}$/), z.array(IsoDate)),
});

export const InstitutionKeywordsSchema = z.object({
  version: z.string(),
  fii: z.array(z.string().min(1)).min(1),
  dii: z.array(z.string().min(1)).min(1),
});

export const FallbackTableSchema = z.object({
  version: z.string(),
  stocks: z.array(z.object({
    symbol: z.string().min(1),
    name: z.string().min(1),
    fii_cash: CashActionSchema,
    dii_cash: CashActionSchema,
  })).min(1, 'fallback table must never be empty'),
});

export type HolidayTable = z.infer<typeof HolidayTableSchema>;
export type InstitutionKeywords = z.infer<typeof InstitutionKeywordsSchema>;

function validate<T>(schema: z.ZodType<T>, raw: unknown, file: string): T {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map(issue => `${file}:${issue.path.join('.')}: ${issue.message}`),
    );
  }
  return parsed.data;
}

export function loadHolidayTable(raw: unknown = holidaysJson): HolidayTable {
  return validate(HolidayTableSchema, raw, 'nse-holidays.json');
}

/** Flatten every year of the table into one ISO-date set */
export function holidaySet(table: HolidayTable = loadHolidayTable()): ReadonlySet<string> {
  return new Set(Object.values(table.holidays).flat());
}

export function loadInstitutionKeywords(raw: unknown = keywordsJson): InstitutionKeywords {
  return validate(InstitutionKeywordsSchema, raw, 'institution-keywords.json');
}

export function loadFallbackStocks(raw: unknown = fallbackJson): InstitutionalStock[] {
  return validate(FallbackTableSchema, raw, 'fallback-stocks.json').stocks;
}
