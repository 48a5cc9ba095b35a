import { pageVar } from "../content/pages";

export type ParseResult<T> = { ok: true; value: T } | { ok: false; error: string };

const NUMBER = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

export function parseNumber(text: string): ParseResult<number> {
  const trimmed = text.trim();
  if (!NUMBER.test(trimmed)) {
    return { ok: false, error: `not a number: "${text}"` };
  }
  return { ok: true, value: Number(trimmed) };
}

/** Square root of a textual number, rounded to two decimals. */
export function sqrtRounded(text: string): ParseResult<number> {
  const parsed = parseNumber(text);
  if (!parsed.ok) return parsed;
  if (parsed.value < 0) {
    return { ok: false, error: `cannot take the square root of ${parsed.value}` };
  }
  return { ok: true, value: Math.round(Math.sqrt(parsed.value) * 100) / 100 };
}

export function upper(text: string): string {
  return text.toUpperCase();
}

export function indexVar(name: string): string | undefined {
  return pageVar("Home", name);
}
