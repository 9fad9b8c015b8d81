// ═══════════════════════════════════════════════════════════════════════════════
// DEAL COLUMN MAPPING — Canonical schema for every deal provider
// ═══════════════════════════════════════════════════════════════════════════════
//
// Providers disagree on field names ("BD_CLIENT_NAME", "Client Name",
// "clientName", ...). Every header is resolved to one canonical column:
//
//   SYMBOL · COMPANY · CLIENT · BUYSELL · QTY · PRICE · DATE
//
// Resolution order per header:
//   1. Exact lookup in DEAL_COLUMN_ALIASES (after trim + upper-case)
//   2. Substring rules in DEAL_COLUMN_RULES, first match wins
//
// A canonical target is claimed at most once per header set; later headers
// that resolve to an already-claimed target keep their raw name.
// CLIENT is checked before any NAME-like rule so BD_CLIENT_NAME never lands
// on COMPANY.
//
// ═══════════════════════════════════════════════════════════════════════════════

export const CANONICAL_DEAL_COLUMNS = [
  'SYMBOL', 'COMPANY', 'CLIENT', 'BUYSELL', 'QTY', 'PRICE', 'DATE',
] as const;

export type CanonicalDealColumn = typeof CANONICAL_DEAL_COLUMNS[number];

/** Bookkeeping targets; the classifier never reads them */
export type AuxiliaryDealColumn = 'ORDER_DATE' | 'REMARKS';

/** Exact header → target, as observed from the deal endpoint */
export const DEAL_COLUMN_ALIASES: Readonly<Record<string, CanonicalDealColumn | AuxiliaryDealColumn>> = {
  BD_SYMBOL:      'SYMBOL',
  BD_SCRIP_NAME:  'COMPANY',
  BD_CLIENT_NAME: 'CLIENT',
  BD_BUY_SELL:    'BUYSELL',
  BD_QTY_TRD:     'QTY',
  BD_DT_DATE:     'DATE',
  BD_DT_ORDER:    'ORDER_DATE',
  BD_TP_WATP:     'PRICE',
  BD_REMARKS:     'REMARKS',
  // block-deal / CSV variants
  SYMBOL:         'SYMBOL',
  SCRIP_NAME:     'COMPANY',
  CLIENT_NAME:    'CLIENT',
  BUY_SELL:       'BUYSELL',
  QTY_TRD:        'QTY',
  TRADE_DATE:     'DATE',
  TRADE_PRICE:    'PRICE',
  // canonical names map to themselves (normalization is idempotent)
  COMPANY:        'COMPANY',
  CLIENT:         'CLIENT',
  BUYSELL:        'BUYSELL',
  QTY:            'QTY',
  PRICE:          'PRICE',
  DATE:           'DATE',
};

/** Substring fallback rules, evaluated in order */
export const DEAL_COLUMN_RULES: ReadonlyArray<{ contains: string; target: CanonicalDealColumn }> = [
  { contains: 'CLIENT',     target: 'CLIENT' },
  { contains: 'PARTY',      target: 'CLIENT' },
  { contains: 'SYMBOL',     target: 'SYMBOL' },
  { contains: 'SCRIP_NAME', target: 'COMPANY' },
  { contains: 'COMP',       target: 'COMPANY' },
  { contains: 'SECURITY',   target: 'COMPANY' },
  { contains: 'BUY_SELL',   target: 'BUYSELL' },
  { contains: 'BUY/SELL',   target: 'BUYSELL' },
  { contains: 'QTY',        target: 'QTY' },
  { contains: 'QUANTITY',   target: 'QTY' },
  { contains: 'PRICE',      target: 'PRICE' },
];

function normalizeKey(header: string): string {
  return header.trim().toUpperCase();
}

/**
 * Resolve raw headers to their targets.
 * Returns raw header → target for every header that was claimed.
 */
export function resolveDealColumns(headers: readonly string[]): Map<string, string> {
  const rename = new Map<string, string>();
  const claimed = new Set<string>();

  for (const header of headers) {
    const key = normalizeKey(header);

    const exact = DEAL_COLUMN_ALIASES[key];
    if (exact) {
      if (!claimed.has(exact)) {
        rename.set(header, exact);
        claimed.add(exact);
      }
      continue;
    }

    const rule = DEAL_COLUMN_RULES.find(r => key.includes(r.contains) && !claimed.has(r.target));
    if (rule) {
      rename.set(header, rule.target);
      claimed.add(rule.target);
    }
  }

  return rename;
}

/** Rename a header list; unclaimed headers are kept trimmed */
export function normalizeDealHeaders(headers: readonly string[]): string[] {
  const rename = resolveDealColumns(headers);
  return headers.map(h => rename.get(h) ?? h.trim());
}

/** Apply a resolved mapping to one raw row */
export function renameRow(
  row: Readonly<Record<string, unknown>>,
  rename: ReadonlyMap<string, string>,
): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(row)) {
    const target = rename.get(key) ?? key.trim();
    // A claimed target always wins over an unclaimed raw header of the same name
    if (target in out && !rename.has(key)) continue;
    out[target] = value;
  }
  return out;
}
