import { NUMBER_WORDS } from "./vocabulary";

export type DurationUnit = "day" | "week" | "month" | "year";

export type Duration = {
  quantity: number;
  unit: DurationUnit;
  days: number;
};

export const DEFAULT_WINDOW_DAYS = 180;
export const MAX_WINDOW_DAYS = 3650;

const DAYS_PER_UNIT: Record<DurationUnit, number> = {
  day: 1,
  week: 7,
  month: 30,
  year: 365
};

const quantityUnitPattern = new RegExp(
  `\\b(\\d+|${Object.keys(NUMBER_WORDS).join("|")})[-\\s]*(day|week|month|year)s?\\b`,
  "i"
);
const lastUnitPattern = /\blast\s+(day|week|month|year)\b/i;

function isUnit(value: string): value is DurationUnit {
  return value in DAYS_PER_UNIT;
}

function parseQuantity(raw: string): number {
  const lowered = raw.toLowerCase();
  return /^\d+$/.test(lowered) ? Number(lowered) : NUMBER_WORDS[lowered] ?? Number.NaN;
}

function toDuration(quantity: number, unit: DurationUnit): Duration | undefined {
  const days = quantity * DAYS_PER_UNIT[unit];
  if (!Number.isInteger(quantity) || quantity < 1 || days > MAX_WINDOW_DAYS) {
    return undefined;
  }
  return { quantity, unit, days };
}

/**
 * Reads a `quantity unit` phrase ("six-month", "30 days", "2 weeks") or a
 * "last week|month|year" phrase. Zero or over-long windows yield undefined so the
 * caller falls back to the default window.
 */
export function parseDuration(text: string): Duration | undefined {
  const match = text.match(quantityUnitPattern);
  if (match?.[1] && match[2]) {
    const unit = match[2].toLowerCase();
    return isUnit(unit) ? toDuration(parseQuantity(match[1]), unit) : undefined;
  }
  const last = text.match(lastUnitPattern);
  if (last?.[1]) {
    const unit = last[1].toLowerCase();
    return isUnit(unit) ? toDuration(1, unit) : undefined;
  }
  return undefined;
}

export function windowDays(text: string): number {
  return parseDuration(text)?.days ?? DEFAULT_WINDOW_DAYS;
}
