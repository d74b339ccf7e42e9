import { ALL_TRIGGER_TERMS, BRAND_STOP_WORDS, NUMBER_WORDS } from "./vocabulary";

const capitalizedTokenPattern = /\b([A-Z][A-Za-z0-9&'-]+)/g;

function isStopPart(part: string): boolean {
  const stem = part.replace(/s$/, "");
  return (
    part.length === 0 ||
    BRAND_STOP_WORDS.has(part) ||
    BRAND_STOP_WORDS.has(stem) ||
    ALL_TRIGGER_TERMS.has(part) ||
    Object.hasOwn(NUMBER_WORDS, part)
  );
}

/**
 * Proper-noun heuristic: the first capitalized token that carries no digit and is not
 * a command word, trigger term, duration word or identifier label. Later candidates in
 * multi-brand queries are ignored.
 */
export function extractBrand(text: string): string | undefined {
  for (const match of text.matchAll(capitalizedTokenPattern)) {
    const token = match[1]?.replace(/'s$/i, "").replace(/['-]+$/, "");
    if (!token || token.length < 2 || /\d/.test(token)) {
      continue;
    }
    if (token.toLowerCase().split("-").every(isStopPart)) {
      continue;
    }
    return token;
  }
  return undefined;
}
