#!/usr/bin/env node
import { parseArgs } from "node:util";
import { realpathSync } from "node:fs";
import { pathToFileURL } from "node:url";

import { resolveRuntimeConfig, type RuntimeConfig } from "./config/env.js";
import { ConfigError, createDescriptors, loadConfig, selectModule } from "./config/loader.js";
import { collect } from "./metrics/collector.js";
import { readBinaryFile, writeJsonFile } from "./utils/fs.js";
import { createLogger, type Logger, type LogSink } from "./utils/logger.js";

import type { Observation } from "lib/metrics/types.js";

export interface ObservationRecord {
  name: string;
  type: string;
  value: number;
  labels: Record<string, string>;
  timestamp_ms?: number;
}

export interface CliOptions {
  env?: NodeJS.ProcessEnv;
  write?: (line: string) => void;
  logSink?: LogSink;
}

export function toRecord(observation: Observation): ObservationRecord {
  const { descriptor } = observation;
  const labels = Object.fromEntries(descriptor.labelNames.map((name, index): [string, string] => [name, observation.labels[index] ?? ""]));
  const record: ObservationRecord = {
    name: descriptor.name,
    type: descriptor.valueType,
    value: observation.value,
    labels
  };
  if (observation.timestampMs !== undefined) {
    record.timestamp_ms = observation.timestampMs;
  }
  return record;
}

function parseCliArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    options: {
      config: { type: "string", short: "c" },
      module: { type: "string", short: "m" },
      check: { type: "boolean" },
      input: { type: "string", short: "i" },
      output: { type: "string", short: "o" }
    }
  }).values;
}

async function execute(argv: string[], options: CliOptions, runtime: RuntimeConfig, logger: Logger): Promise<number> {
  const write = options.write ?? ((line: string) => console.log(line));
  const args = parseCliArgs(argv);
  const configPath = args.config ?? runtime.configPath;

  logger.info("Loading config file", { file: configPath });
  const config = await loadConfig(configPath, { schemaPath: runtime.schemaPath });
  const module = selectModule(config, args.module);
  const descriptors = createDescriptors(module);
  logger.info("Loaded config file", { file: configPath, metrics: descriptors.length });

  if (args.check) {
    return 0;
  }

  if (!args.input) {
    logger.error("Missing --input");
    return 1;
  }

  const payload = await readBinaryFile(args.input);
  if (payload === null) {
    logger.error("Input file not found", { file: args.input });
    return 1;
  }

  const records = Array.from(collect(descriptors, payload, { logger }), toRecord);
  if (args.output) {
    await writeJsonFile(args.output, records);
    logger.info(`Observations written to ${args.output}`, { count: records.length });
  } else {
    records.forEach((record) => write(JSON.stringify(record)));
  }
  return 0;
}

export async function run(argv: string[], options: CliOptions = {}): Promise<number> {
  const runtime = resolveRuntimeConfig(options.env);
  const logger = createLogger({ level: runtime.logLevel, format: runtime.logFormat, sink: options.logSink });

  try {
    return await execute(argv, options, runtime, logger);
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.error("Error loading config", { err: error.message, issues: error.issues });
      return 1;
    }
    logger.error("json-metrics failed", { err: error instanceof Error ? error.message : String(error) });
    return 1;
  }
}

function isEntrypoint(): boolean {
  const entry = process.argv[1];
  if (entry === undefined) {
    return false;
  }
  try {
    return import.meta.url === pathToFileURL(realpathSync(entry)).href;
  } catch {
    return false;
  }
}

if (isEntrypoint()) {
  run(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error(error);
      process.exitCode = 1;
    });
}
