import type { Result } from "lib/metrics/types.js";

export interface NormalizationError {
  value: string;
  message: string;
}

const NUMERIC_LITERAL = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;
const TRUE_WORDS = new Set(["true", "True", "TRUE", "t", "T"]);
const FALSE_WORDS = new Set(["false", "False", "FALSE", "f", "F"]);

function stripQuotes(text: string): string {
  const trimmed = text.trim();
  if (trimmed.length >= 2) {
    const first = trimmed[0];
    if ((first === "\"" || first === "'") && trimmed.endsWith(first)) {
      return trimmed.slice(1, -1).trim();
    }
  }
  return trimmed;
}

export function sanitizeValue(text: string): Result<number, NormalizationError> {
  const candidate = stripQuotes(text);

  if (NUMERIC_LITERAL.test(candidate)) {
    const value = Number(candidate);
    if (Number.isFinite(value)) {
      return { ok: true, value };
    }
    return { ok: false, error: { value: text, message: `${candidate} is out of range` } };
  }

  if (TRUE_WORDS.has(candidate)) {
    return { ok: true, value: 1 };
  }
  if (FALSE_WORDS.has(candidate)) {
    return { ok: true, value: 0 };
  }

  return { ok: false, error: { value: text, message: `${JSON.stringify(text)} is not a number` } };
}

export function sanitizeEpochMillis(text: string): Result<number, NormalizationError> {
  const candidate = stripQuotes(text);
  if (!NUMERIC_LITERAL.test(candidate)) {
    return { ok: false, error: { value: text, message: `${JSON.stringify(text)} is not an epoch timestamp` } };
  }
  const value = Math.trunc(Number(candidate));
  if (!Number.isSafeInteger(value)) {
    return { ok: false, error: { value: text, message: `${candidate} is out of range` } };
  }
  return { ok: true, value };
}
