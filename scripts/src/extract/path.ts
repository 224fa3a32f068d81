import jp from "jsonpath";

import type { JsonPath, JsonValue, Result } from "lib/metrics/types.js";

export type ExtractionFailureReason = "invalid-document" | "invalid-path" | "no-match" | "evaluation-error";

export interface ExtractionError {
  reason: ExtractionFailureReason;
  path: JsonPath;
  message: string;
}

export type JsonDocument = JsonValue | Uint8Array;

export interface ExtractOptions {
  /** Render the match as JSON instead of scalar text. */
  json?: boolean;
}

const decoder = new TextDecoder("utf-8", { fatal: true });

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function parseDocument(input: string | Uint8Array): Result<JsonValue, ExtractionError> {
  try {
    const text = typeof input === "string" ? input : decoder.decode(input);
    const parsed: JsonValue = JSON.parse(text);
    return { ok: true, value: parsed };
  } catch (error) {
    return {
      ok: false,
      error: { reason: "invalid-document", path: "", message: describeError(error) }
    };
  }
}

/**
 * Accepts JSONPath plus the template forms used in mapping files:
 * `{.a.b}`, `.a.b`, `[0]`, `@.a` and bare member names such as `a.b`.
 */
export function normalizePathExpression(path: JsonPath): string {
  let expression = path.trim();
  if (expression.startsWith("{") && expression.endsWith("}")) {
    expression = expression.slice(1, -1).trim();
  }
  if (expression.startsWith("$")) {
    return expression;
  }
  if (expression.startsWith("@")) {
    return `$${expression.slice(1)}`;
  }
  if (expression.startsWith(".") || expression.startsWith("[")) {
    return `$${expression}`;
  }
  return `$.${expression}`;
}

/** Member access (`.name`, `['name']`) or the bare root; these select a value rather than a set of values. */
function selectsSingleValue(component: unknown): boolean {
  if (typeof component !== "object" || component === null || !("expression" in component)) {
    return false;
  }
  const { expression } = component;
  if (typeof expression !== "object" || expression === null || !("type" in expression)) {
    return false;
  }
  if (expression.type === "root") {
    return true;
  }
  const scope = "scope" in component ? component.scope : undefined;
  return scope === "child" && (expression.type === "identifier" || expression.type === "string_literal");
}

export function renderText(value: unknown): string {
  if (typeof value === "string") {
    return value;
  }
  if (typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }
  return JSON.stringify(value) ?? "";
}

export function extractValue(
  document: JsonDocument,
  path: JsonPath,
  options: ExtractOptions = {}
): Result<string, ExtractionError> {
  let data: JsonValue;
  if (document instanceof Uint8Array) {
    const parsed = parseDocument(document);
    if (!parsed.ok) {
      return { ok: false, error: { ...parsed.error, path } };
    }
    data = parsed.value;
  } else {
    data = document;
  }

  const expression = normalizePathExpression(path);
  let components: unknown[];
  try {
    components = jp.parse(expression);
  } catch (error) {
    return { ok: false, error: { reason: "invalid-path", path, message: describeError(error) } };
  }

  let matches: unknown[];
  if (data === null || typeof data !== "object") {
    // jsonpath only walks objects and arrays; a scalar scope matches the root alone.
    matches = expression === "$" ? [data] : [];
  } else {
    try {
      matches = jp.query(data, expression);
    } catch (error) {
      return { ok: false, error: { reason: "evaluation-error", path, message: describeError(error) } };
    }
  }

  if (matches.length === 0) {
    return { ok: false, error: { reason: "no-match", path, message: `no match for ${expression}` } };
  }

  if (options.json) {
    const [first] = matches;
    const unwrap = matches.length === 1 && Array.isArray(first) && selectsSingleValue(components.at(-1));
    const rendered = unwrap ? first : matches;
    return { ok: true, value: JSON.stringify(rendered) };
  }

  return { ok: true, value: matches.map(renderText).join(" ") };
}
