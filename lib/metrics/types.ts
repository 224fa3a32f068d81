export type JsonPath = string;

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type ScrapeType = "value" | "object";

export type ValueType = "gauge" | "counter";

/** Replacement tables keyed by value path, then by the lowercased extracted value. */
export type ValueConverter = ReadonlyMap<JsonPath, ReadonlyMap<string, string>>;

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export interface MetricIdentity {
  readonly name: string;
  readonly help: string;
  readonly labelNames: readonly string[];
  readonly valueType: ValueType;
}

interface ScrapeDescriptorBase extends MetricIdentity {
  readonly keyPath: JsonPath;
  /** Aligned index-for-index with `labelNames`. */
  readonly labelPaths: readonly JsonPath[];
  readonly epochTimestampPath?: JsonPath;
}

export interface ValueScrapeDescriptor extends ScrapeDescriptorBase {
  readonly type: "value";
}

export interface ObjectScrapeDescriptor extends ScrapeDescriptorBase {
  readonly type: "object";
  readonly valuePath: JsonPath;
  readonly valueConverter?: ValueConverter;
}

export type MetricDescriptor = ValueScrapeDescriptor | ObjectScrapeDescriptor;

export interface Observation {
  readonly descriptor: MetricIdentity;
  readonly value: number;
  readonly labels: readonly string[];
  /** Milliseconds since the Unix epoch; absent means "now" to the exposition layer. */
  readonly timestampMs?: number;
}

export interface MetricConfig {
  name: string;
  help?: string;
  type?: ScrapeType;
  value_type?: ValueType;
  path: JsonPath;
  value_path?: JsonPath;
  labels?: Record<string, JsonPath>;
  value_converter?: Record<JsonPath, Record<string, string | number>>;
  epoch_timestamp?: JsonPath;
}

export interface ModuleConfig {
  metrics: MetricConfig[];
}

export interface ExporterConfig {
  modules: Record<string, ModuleConfig>;
}
