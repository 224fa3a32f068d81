import { CONFIG_PATH, RUNTIME_ENV_VARIABLES } from "../constants.js";
import { parseLogFormat, parseLogLevel, type LogFormat, type LogLevel } from "../utils/logger.js";

export interface RuntimeConfig {
  logLevel: LogLevel;
  logFormat: LogFormat;
  configPath: string;
  /** Unset means the schema shipped with the package. */
  schemaPath?: string;
}

function nonEmpty(value: string | undefined): string | null {
  if (value === undefined) {
    return null;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}

export function resolveRuntimeConfig(env: NodeJS.ProcessEnv = process.env): RuntimeConfig {
  return {
    logLevel: parseLogLevel(env[RUNTIME_ENV_VARIABLES.logLevel]),
    logFormat: parseLogFormat(env[RUNTIME_ENV_VARIABLES.logFormat]),
    configPath: nonEmpty(env[RUNTIME_ENV_VARIABLES.configPath]) ?? CONFIG_PATH,
    schemaPath: nonEmpty(env[RUNTIME_ENV_VARIABLES.schemaPath]) ?? undefined
  };
}
