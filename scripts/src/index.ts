export { collect, describeMetrics, STATUS_DESCRIPTOR, type CollectOptions } from "./metrics/collector.js";
export {
  extractValue,
  normalizePathExpression,
  parseDocument,
  type ExtractionError,
  type ExtractionFailureReason,
  type JsonDocument
} from "./extract/path.js";
export { sanitizeEpochMillis, sanitizeValue, type NormalizationError } from "./extract/normalize.js";
export { convertValue } from "./extract/convert.js";
export { resolveLabels, resolveTimestamp, selectScope, usesRootScope, type ScopeContext } from "./extract/labels.js";
export {
  ConfigError,
  createDescriptor,
  createDescriptors,
  defaultSchemaPath,
  loadConfig,
  parseConfig,
  selectModule,
  validateConfig
} from "./config/loader.js";
export { resolveRuntimeConfig, type RuntimeConfig } from "./config/env.js";
export { createLogger, logger, type Logger, type LogLevel } from "./utils/logger.js";
export type {
  JsonValue,
  MetricDescriptor,
  MetricIdentity,
  ObjectScrapeDescriptor,
  Observation,
  ValueScrapeDescriptor
} from "lib/metrics/types.js";
