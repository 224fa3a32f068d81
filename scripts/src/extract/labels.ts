import { ROOT_ANCHOR, ROOT_ANCHOR_WINDOW } from "../constants.js";
import { logger as defaultLogger, type Logger } from "../utils/logger.js";
import { extractValue } from "./path.js";
import { sanitizeEpochMillis } from "./normalize.js";

import type { JsonPath, JsonValue } from "lib/metrics/types.js";

export interface ScopeContext {
  readonly current: JsonValue;
  readonly root: JsonValue;
}

export interface ResolveOptions {
  logger?: Logger;
  metric?: string;
}

export function usesRootScope(path: JsonPath): boolean {
  return path.replaceAll(" ", "").slice(0, ROOT_ANCHOR_WINDOW).includes(ROOT_ANCHOR);
}

export function selectScope(scopes: ScopeContext, path: JsonPath): JsonValue {
  return usesRootScope(path) ? scopes.root : scopes.current;
}

export function resolveLabels(
  labelPaths: readonly JsonPath[],
  scopes: ScopeContext,
  options: ResolveOptions = {}
): string[] {
  const log = options.logger ?? defaultLogger;
  return labelPaths.map((path) => {
    const scope = usesRootScope(path) ? "root" : "current";
    log.debug("Resolving label value", { path, scope, metric: options.metric });
    const result = extractValue(selectScope(scopes, path), path);
    if (result.ok) {
      return result.value;
    }
    log.error("Failed to extract label value", {
      path,
      scope,
      metric: options.metric,
      reason: result.error.reason,
      err: result.error.message
    });
    return "";
  });
}

export function resolveTimestamp(
  path: JsonPath | undefined,
  scopes: ScopeContext,
  options: ResolveOptions = {}
): number | undefined {
  if (path === undefined) {
    return undefined;
  }
  const log = options.logger ?? defaultLogger;
  const extracted = extractValue(selectScope(scopes, path), path);
  if (!extracted.ok) {
    log.error("Failed to extract timestamp for metric", {
      path,
      metric: options.metric,
      reason: extracted.error.reason,
      err: extracted.error.message
    });
    return undefined;
  }
  const parsed = sanitizeEpochMillis(extracted.value);
  if (!parsed.ok) {
    log.error("Failed to parse timestamp for metric", {
      path,
      metric: options.metric,
      value: extracted.value,
      err: parsed.error.message
    });
    return undefined;
  }
  return parsed.value;
}
