import { STATUS_METRIC } from "../constants.js";
import { logger as defaultLogger, type Logger } from "../utils/logger.js";
import { extractValue, parseDocument, type ExtractionError } from "../extract/path.js";
import { sanitizeValue, type NormalizationError } from "../extract/normalize.js";
import { convertValue } from "../extract/convert.js";
import { resolveLabels, resolveTimestamp, type ScopeContext } from "../extract/labels.js";

import type {
  JsonPath,
  JsonValue,
  MetricDescriptor,
  MetricIdentity,
  ObjectScrapeDescriptor,
  Observation,
  Result,
  ValueScrapeDescriptor
} from "lib/metrics/types.js";

export const STATUS_DESCRIPTOR: MetricIdentity = Object.freeze({
  name: STATUS_METRIC.name,
  help: STATUS_METRIC.help,
  labelNames: Object.freeze([]),
  valueType: "gauge"
});

export interface CollectOptions {
  logger?: Logger;
}

interface ScrapeFailure {
  message: string;
  path: JsonPath;
  value?: string;
  cause: ExtractionError | NormalizationError;
}

type ScrapeOutcome = Result<Observation, ScrapeFailure>;

export function describeMetrics(descriptors: readonly MetricDescriptor[]): MetricIdentity[] {
  return [
    STATUS_DESCRIPTOR,
    ...descriptors.map(({ name, help, labelNames, valueType }) => ({ name, help, labelNames, valueType }))
  ];
}

/**
 * Turns one JSON payload into observations for the given descriptors.
 * The status observation always comes first; failures only shorten the sequence.
 */
export function* collect(
  descriptors: readonly MetricDescriptor[],
  payload: string | Uint8Array,
  options: CollectOptions = {}
): Generator<Observation, void, undefined> {
  const log = options.logger ?? defaultLogger;

  yield { descriptor: STATUS_DESCRIPTOR, value: STATUS_METRIC.value, labels: [] };

  const parsed = parseDocument(payload);
  if (!parsed.ok) {
    log.error("Failed to parse JSON payload", { err: parsed.error.message });
    return;
  }
  const root = parsed.value;

  for (const descriptor of descriptors) {
    switch (descriptor.type) {
      case "value": {
        log.info(`Extracting value via value scrape for: ${descriptor.keyPath}`, { metric: descriptor.name });
        const outcome = scrapeValue(descriptor, root, log);
        if (outcome.ok) {
          yield outcome.value;
        } else {
          reportFailure(log, descriptor, outcome.error);
        }
        break;
      }
      case "object": {
        log.info(`Extracting value via object scrape for: ${descriptor.keyPath}`, { metric: descriptor.name });
        const elements = extractElements(descriptor, root, log);
        if (elements === null) {
          break;
        }
        for (const outcome of scrapeElements(descriptor, elements, root, log)) {
          if (outcome.ok) {
            yield outcome.value;
          } else {
            reportFailure(log, descriptor, outcome.error);
          }
        }
        break;
      }
      default:
        log.error("Unknown scrape config type", describeAnomaly(descriptor));
    }
  }
}

function scrapeValue(descriptor: ValueScrapeDescriptor, root: JsonValue, log: Logger): ScrapeOutcome {
  const extracted = extractValue(root, descriptor.keyPath);
  if (!extracted.ok) {
    return fail("Failed to extract value for metric", descriptor.keyPath, extracted.error);
  }

  const value = sanitizeValue(extracted.value);
  if (!value.ok) {
    return fail("Failed to convert extracted value to a number", descriptor.keyPath, value.error, extracted.value);
  }

  const scopes: ScopeContext = { current: root, root };
  return { ok: true, value: observe(descriptor, value.value, scopes, log) };
}

function extractElements(descriptor: ObjectScrapeDescriptor, root: JsonValue, log: Logger): JsonValue[] | null {
  const extracted = extractValue(root, descriptor.keyPath, { json: true });
  if (!extracted.ok) {
    log.error("Failed to extract json objects for metric", {
      path: descriptor.keyPath,
      metric: descriptor.name,
      reason: extracted.error.reason,
      err: extracted.error.message
    });
    return null;
  }

  const parsed = parseDocument(extracted.value);
  if (!parsed.ok || !Array.isArray(parsed.value)) {
    log.error("Failed to convert extracted objects to a json array", {
      path: descriptor.keyPath,
      metric: descriptor.name
    });
    return null;
  }
  log.debug(`Extracted ${parsed.value.length} elements for ${descriptor.keyPath}`, { metric: descriptor.name });
  return parsed.value;
}

function* scrapeElements(
  descriptor: ObjectScrapeDescriptor,
  elements: readonly JsonValue[],
  root: JsonValue,
  log: Logger
): Generator<ScrapeOutcome, void, undefined> {
  for (const element of elements) {
    const extracted = extractValue(element, descriptor.valuePath);
    if (!extracted.ok) {
      yield fail("Failed to extract value for metric", descriptor.valuePath, extracted.error);
      continue;
    }

    const converted = convertValue(descriptor, extracted.value);
    log.debug(`Value for ${descriptor.keyPath} is ${converted}`, { metric: descriptor.name });

    const value = sanitizeValue(converted);
    if (!value.ok) {
      yield fail("Failed to convert extracted value to a number", descriptor.valuePath, value.error, converted);
      continue;
    }

    const scopes: ScopeContext = { current: element, root };
    yield { ok: true, value: observe(descriptor, value.value, scopes, log) };
  }
}

function observe(descriptor: MetricDescriptor, value: number, scopes: ScopeContext, log: Logger): Observation {
  const resolveOptions = { logger: log, metric: descriptor.name };
  const labels = resolveLabels(descriptor.labelPaths, scopes, resolveOptions);
  const timestampMs = resolveTimestamp(descriptor.epochTimestampPath, scopes, resolveOptions);
  return timestampMs === undefined
    ? { descriptor, value, labels }
    : { descriptor, value, labels, timestampMs };
}

function fail(
  message: string,
  path: JsonPath,
  cause: ExtractionError | NormalizationError,
  value?: string
): ScrapeOutcome {
  return { ok: false, error: { message, path, cause, value } };
}

function reportFailure(log: Logger, descriptor: MetricDescriptor, failure: ScrapeFailure): void {
  log.error(failure.message, {
    path: failure.path,
    metric: descriptor.name,
    ...(failure.value === undefined ? {} : { value: failure.value }),
    ...("reason" in failure.cause ? { reason: failure.cause.reason } : {}),
    err: failure.cause.message
  });
}

function describeAnomaly(descriptor: unknown): Record<string, unknown> {
  if (typeof descriptor !== "object" || descriptor === null) {
    return { type: typeof descriptor };
  }
  return {
    type: "type" in descriptor ? descriptor.type : undefined,
    metric: "name" in descriptor ? descriptor.name : undefined
  };
}
