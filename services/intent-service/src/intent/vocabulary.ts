import type { IntentKind } from "./intent-model";

export const NUMBER_WORDS: Readonly<Record<string, number>> = {
  one: 1,
  two: 2,
  three: 3,
  four: 4,
  five: 5,
  six: 6,
  seven: 7,
  eight: 8,
  nine: 9,
  ten: 10,
  eleven: 11,
  twelve: 12
};

/** Trigger terms per kind, matched against whole lower-cased tokens. */
export const TRIGGER_TERMS: Readonly<Record<IntentKind, readonly string[]>> = {
  supplier_stock: ["stock", "stocks", "inventory", "inventories", "availability"],
  sales_history: ["sale", "sales", "sold", "sell", "selling", "history", "historical", "revenue"]
};

export const ALL_TRIGGER_TERMS: ReadonlySet<string> = new Set(Object.values(TRIGGER_TERMS).flat());

/** Capitalized words that open or shape a request but never name a brand. */
export const BRAND_STOP_WORDS: ReadonlySet<string> = new Set([
  "show",
  "get",
  "list",
  "give",
  "fetch",
  "find",
  "pull",
  "check",
  "what",
  "how",
  "which",
  "many",
  "is",
  "are",
  "do",
  "does",
  "can",
  "could",
  "please",
  "total",
  "top",
  "we",
  "have",
  "me",
  "the",
  "for",
  "last",
  "past",
  "status",
  "supplier",
  "vendor",
  "sku",
  "id",
  "day",
  "week",
  "month",
  "year"
]);
