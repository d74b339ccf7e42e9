import { MissingParameterError, UnresolvedIntentError } from "../errors";
import { extractBrand } from "./brand";
import { windowDays } from "./duration";
import type { IntentKind, ResolvedIntent, ResolverDefaults } from "./intent-model";
import { TRIGGER_TERMS } from "./vocabulary";

const MS_PER_DAY = 86_400_000;

const supplierIdPattern = /\b(?:supplier|vendor)(?:\s+(?:id|no\.?|number))?[\s:#-]*([a-z0-9-]*\d[a-z0-9-]*)\b/i;
const skuPattern = /\bsku\b[:\s#-]*([a-z0-9-]*\d[a-z0-9-]*)\b/i;

type ExtractionContext = {
  text: string;
  brand?: string;
  defaults: ResolverDefaults;
  today: Date;
};

type RuleFor<K extends IntentKind> = {
  kind: K;
  triggers: ReadonlySet<string>;
  extract: (context: ExtractionContext) => Extract<ResolvedIntent, { kind: K }>["parameters"];
};

type IntentRule = RuleFor<"supplier_stock"> | RuleFor<"sales_history">;

function rule<K extends IntentKind>(definition: RuleFor<K>): RuleFor<K> {
  return definition;
}

function utcCalendarDate(now: Date): Date {
  return new Date(Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate()));
}

export function tokenize(query: string): string[] {
  return query
    .trim()
    .toLowerCase()
    .split(/[^a-z0-9']+/)
    .map((token) => token.replace(/^'+|'+$/g, ""))
    .filter((token) => token.length > 0);
}

export function extractSupplierId(text: string): string | undefined {
  return text.match(supplierIdPattern)?.[1];
}

export function extractSku(text: string): string | undefined {
  return text.match(skuPattern)?.[1]?.toUpperCase();
}

/** Declaration order is priority order: a query naming stock is a stock lookup. */
export const INTENT_RULES: readonly IntentRule[] = [
  rule({
    kind: "supplier_stock",
    triggers: new Set(TRIGGER_TERMS.supplier_stock),
    extract: ({ text, brand, defaults }) => {
      const supplierId = extractSupplierId(text) ?? defaults.supplierId?.trim();
      if (!supplierId) {
        throw new MissingParameterError(
          "supplierId",
          "Supplier ID is required for inventory queries. Set EWEB_DEFAULT_SUPPLIER_ID or provide one in the request."
        );
      }
      return { supplierId, ...(brand ? { brand } : {}) };
    }
  }),
  rule({
    kind: "sales_history",
    triggers: new Set(TRIGGER_TERMS.sales_history),
    extract: ({ text, brand, today }) => {
      const sku = extractSku(text);
      return {
        startDate: new Date(today.getTime() - windowDays(text) * MS_PER_DAY),
        endDate: today,
        ...(brand ? { brand } : {}),
        ...(sku ? { sku } : {})
      };
    }
  })
];

function buildIntent(matched: IntentRule, context: ExtractionContext): ResolvedIntent {
  switch (matched.kind) {
    case "supplier_stock":
      return { kind: matched.kind, parameters: Object.freeze(matched.extract(context)) };
    case "sales_history":
      return { kind: matched.kind, parameters: Object.freeze(matched.extract(context)) };
  }
}

/**
 * Maps free text to an intent and its parameters. Pure apart from `now`, which
 * anchors the sales window and is the only input tests need to freeze.
 */
export function resolveIntent(query: string, defaults: ResolverDefaults = {}, now: Date = new Date()): ResolvedIntent {
  const tokens = new Set(tokenize(query));
  const matched = INTENT_RULES.find((candidate) => [...candidate.triggers].some((term) => tokens.has(term)));
  if (!matched) {
    throw new UnresolvedIntentError(query);
  }

  const text = query.trim();
  const context: ExtractionContext = {
    text,
    brand: extractBrand(text),
    defaults,
    today: utcCalendarDate(now)
  };
  return Object.freeze(buildIntent(matched, context));
}
