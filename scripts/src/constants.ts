export const CONFIG_PATH = "config.yml";
// Relative to the package root.
export const SCHEMA_PATH = "lib/config.schema.json";
export const DEFAULT_MODULE = "default";

export const STATUS_METRIC = {
	name: "json_exporter_status",
	help: "Up/Down Status of JSON Exporter. Should always be 0.",
	value: 0
} as const;

export const ROOT_ANCHOR = "$";
// Template-style paths such as "{ $.x }" put the anchor behind a brace.
export const ROOT_ANCHOR_WINDOW = 4;

export const RUNTIME_ENV_VARIABLES = {
	logLevel: "LOG_LEVEL",
	logFormat: "LOG_FORMAT",
	configPath: "JSON_METRICS_CONFIG",
	schemaPath: "JSON_METRICS_SCHEMA_PATH"
} as const;
