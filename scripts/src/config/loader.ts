import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";

import { load } from "js-yaml";
import { Ajv, type ErrorObject, type SchemaObject, type ValidateFunction } from "ajv";

import { DEFAULT_MODULE, SCHEMA_PATH } from "../constants.js";
import { findUpward, readTextFile } from "../utils/fs.js";

import type {
  ExporterConfig,
  MetricConfig,
  MetricDescriptor,
  ModuleConfig,
  ObjectScrapeDescriptor,
  ValueConverter,
  ValueScrapeDescriptor,
  ValueType
} from "lib/metrics/types.js";

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

export interface ConfigOptions {
  schemaPath?: string;
}

const moduleDir = dirname(fileURLToPath(import.meta.url));

/** The schema shipped with the package, found from this module whether it runs from sources or from dist/. */
export async function defaultSchemaPath(): Promise<string> {
  return (await findUpward(moduleDir, SCHEMA_PATH)) ?? resolve(moduleDir, "../../..", SCHEMA_PATH);
}

const ajv = new Ajv({ allErrors: true, strict: false });
const validators = new Map<string, ValidateFunction<ExporterConfig>>();

async function getValidator(schemaPath: string): Promise<ValidateFunction<ExporterConfig>> {
  const cached = validators.get(schemaPath);
  if (cached) {
    return cached;
  }
  const raw = await readTextFile(schemaPath);
  if (raw === null) {
    throw new ConfigError(`Schema file missing at ${schemaPath}`);
  }
  const schema: SchemaObject = JSON.parse(raw);
  const validator = ajv.compile<ExporterConfig>(schema);
  validators.set(schemaPath, validator);
  return validator;
}

function formatErrors(errors: ErrorObject[] | null | undefined): string[] {
  if (!errors) {
    return ["Unknown validation error"];
  }
  return errors.map((error) => `${error.instancePath || "/"} ${error.message ?? "invalid"}`);
}

// Converter keys are matched case-insensitively, so `Up` and `up` would shadow each other.
function converterCollisions(metric: MetricConfig, pointer: string): string[] {
  const issues: string[] = [];
  for (const [valuePath, mappings] of Object.entries(metric.value_converter ?? {})) {
    const seen = new Map<string, string>();
    for (const key of Object.keys(mappings)) {
      const folded = key.toLowerCase();
      const previous = seen.get(folded);
      if (previous !== undefined) {
        issues.push(`${pointer}/value_converter/${valuePath} keys "${previous}" and "${key}" differ only in case`);
      } else {
        seen.set(folded, key);
      }
    }
  }
  return issues;
}

function checkSemantics(config: ExporterConfig): string[] {
  const issues: string[] = [];
  for (const [moduleName, module] of Object.entries(config.modules)) {
    const seen = new Set<string>();
    module.metrics.forEach((metric, index) => {
      if (seen.has(metric.name)) {
        issues.push(`/modules/${moduleName}/metrics/${index}/name duplicate metric name "${metric.name}"`);
      }
      seen.add(metric.name);
      issues.push(...converterCollisions(metric, `/modules/${moduleName}/metrics/${index}`));
    });
  }
  return issues;
}

export async function validateConfig(raw: unknown, options: ConfigOptions = {}): Promise<ExporterConfig> {
  const validate = await getValidator(options.schemaPath ?? (await defaultSchemaPath()));
  if (!validate(raw)) {
    throw new ConfigError("Invalid configuration", formatErrors(validate.errors));
  }
  const issues = checkSemantics(raw);
  if (issues.length > 0) {
    throw new ConfigError("Invalid configuration", issues);
  }
  return raw;
}

export async function parseConfig(text: string, options: ConfigOptions = {}): Promise<ExporterConfig> {
  let raw: unknown;
  try {
    raw = load(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError("Configuration is not valid YAML", [reason]);
  }
  return validateConfig(raw ?? {}, options);
}

export async function loadConfig(path: string, options: ConfigOptions = {}): Promise<ExporterConfig> {
  const text = await readTextFile(path);
  if (text === null) {
    throw new ConfigError(`Configuration file missing at ${path}`);
  }
  return parseConfig(text, options);
}

export function selectModule(config: ExporterConfig, name: string = DEFAULT_MODULE): ModuleConfig {
  const module = Object.hasOwn(config.modules, name) ? config.modules[name] : undefined;
  if (!module) {
    throw new ConfigError(`Unknown module "${name}"`);
  }
  return module;
}

function buildConverter(table: MetricConfig["value_converter"]): ValueConverter | undefined {
  if (!table) {
    return undefined;
  }
  const converter = new Map<string, ReadonlyMap<string, string>>();
  for (const [valuePath, mappings] of Object.entries(table)) {
    converter.set(
      valuePath,
      new Map(Object.entries(mappings).map(([from, to]): [string, string] => [from.toLowerCase(), String(to)]))
    );
  }
  return converter;
}

export function createDescriptor(metric: MetricConfig): MetricDescriptor {
  const labels = Object.entries(metric.labels ?? {}).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  const valueType: ValueType = metric.value_type ?? "gauge";
  const base = {
    name: metric.name,
    help: metric.help ?? metric.name,
    labelNames: Object.freeze(labels.map(([name]) => name)),
    labelPaths: Object.freeze(labels.map(([, path]) => path)),
    valueType,
    keyPath: metric.path,
    ...(metric.epoch_timestamp === undefined ? {} : { epochTimestampPath: metric.epoch_timestamp })
  };

  if (metric.type === "object") {
    if (metric.value_path === undefined) {
      throw new ConfigError(`Object metric "${metric.name}" has no value_path`);
    }
    const valueConverter = buildConverter(metric.value_converter);
    return Object.freeze<ObjectScrapeDescriptor>({
      ...base,
      type: "object",
      valuePath: metric.value_path,
      ...(valueConverter === undefined ? {} : { valueConverter })
    });
  }
  return Object.freeze<ValueScrapeDescriptor>({ ...base, type: "value" });
}

export function createDescriptors(module: ModuleConfig): MetricDescriptor[] {
  return module.metrics.map(createDescriptor);
}
