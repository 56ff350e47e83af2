import { existsSync, readFileSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";
import type { Config, ConfigResolution, ConfigSources } from "@twincol/core";
import {
  ConfigValidationError,
  decodeConfigInput,
  decodeConfigInputJson,
  defaultConfig,
  defaultSources,
  mergeConfig,
} from "@twincol/core";
import { Effect } from "effect";

const truthyValues = new Set(["1", "true", "yes", "on"]);
const falsyValues = new Set(["0", "false", "no", "off"]);

function parseBooleanEnv(
  value: string | undefined,
  key: string
): boolean | undefined {
  if (value === undefined) {
    return undefined;
  }
  const normalized = value.trim().toLowerCase();
  if (truthyValues.has(normalized)) {
    return true;
  }
  if (falsyValues.has(normalized)) {
    return false;
  }
  throw new ConfigValidationError({
    source: "env",
    message: `Invalid boolean for ${key}: ${value}`,
  });
}

function parseIntegerEnv(
  value: string | undefined,
  key: string
): number | undefined {
  if (!value) {
    return undefined;
  }
  const parsed = Number(value.trim());
  if (!Number.isInteger(parsed)) {
    throw new ConfigValidationError({
      source: "env",
      message: `Invalid integer for ${key}: ${value}`,
    });
  }
  return parsed;
}

// Literal values are checked by the config schema.
function parseChoiceEnv(value: string | undefined): string | undefined {
  if (!value) {
    return undefined;
  }
  const normalized = value.trim().toLowerCase();
  return normalized.length > 0 ? normalized : undefined;
}

function parseTelemetryEndpoint(value: string | undefined): string | undefined {
  if (!value) {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function readConfigFile(path: string, source: string) {
  if (!existsSync(path)) {
    return null;
  }
  return decodeConfigInputJson(source, readFileSync(path, "utf8"));
}

function stripUndefined(input: Record<string, unknown>) {
  const output: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(input)) {
    if (value !== undefined) {
      output[key] = value;
    }
  }
  return output;
}

export function readEnvConfig(env: NodeJS.ProcessEnv) {
  const display = stripUndefined({
    width: parseIntegerEnv(env.TWINCOL_DISPLAY_WIDTH, "TWINCOL_DISPLAY_WIDTH"),
    color: parseChoiceEnv(env.TWINCOL_COLOR),
    background: parseChoiceEnv(env.TWINCOL_BACKGROUND),
    mode: parseChoiceEnv(env.TWINCOL_DISPLAY),
    syntaxHighlight: parseBooleanEnv(
      env.TWINCOL_SYNTAX_HIGHLIGHT,
      "TWINCOL_SYNTAX_HIGHLIGHT"
    ),
  });

  const telemetry = stripUndefined({
    enabled: parseBooleanEnv(
      env.TWINCOL_TELEMETRY_ENABLED,
      "TWINCOL_TELEMETRY_ENABLED"
    ),
    exporter: parseChoiceEnv(env.TWINCOL_TELEMETRY_EXPORTER),
    endpoint: parseTelemetryEndpoint(env.TWINCOL_TELEMETRY_ENDPOINT),
  });

  const raw: Record<string, unknown> = {};
  if (Object.keys(display).length > 0) {
    raw.display = display;
  }
  if (Object.keys(telemetry).length > 0) {
    raw.telemetry = telemetry;
  }

  return decodeConfigInput("env", raw);
}

export interface ResolvedConfigOutput {
  config: Config;
  sources: ConfigSources;
  paths: {
    project: string;
    user: string;
  };
}

export interface ConfigLocations {
  cwd: string;
  home: string;
  env: NodeJS.ProcessEnv;
}

/**
 * Layer defaults, the project file, the user file and the environment, in
 * that order. Throws {@link ConfigValidationError} for any invalid layer.
 */
export function resolveConfigFrom(
  locations: ConfigLocations
): ResolvedConfigOutput {
  const projectPath = join(locations.cwd, "twincol.config.json");
  const userPath = join(locations.home, ".config", "twincol", "config.json");

  let resolution: ConfigResolution = {
    value: defaultConfig,
    sources: defaultSources,
  };

  const projectConfig = readConfigFile(projectPath, "project");
  if (projectConfig) {
    resolution = mergeConfig(resolution, projectConfig, "project");
  }

  const userConfig = readConfigFile(userPath, "user");
  if (userConfig) {
    resolution = mergeConfig(resolution, userConfig, "user");
  }

  resolution = mergeConfig(resolution, readEnvConfig(locations.env), "env");

  return {
    config: resolution.value,
    sources: resolution.sources,
    paths: {
      project: projectPath,
      user: userPath,
    },
  };
}

export const resolveConfig = Effect.try({
  try: () =>
    resolveConfigFrom({
      cwd: process.cwd(),
      home: homedir(),
      env: process.env,
    }),
  catch: (error) =>
    error instanceof ConfigValidationError
      ? error
      : new ConfigValidationError({
          source: "config",
          message: error instanceof Error ? error.message : String(error),
        }),
});
