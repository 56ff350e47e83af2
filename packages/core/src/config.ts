import { Schema } from "effect";

export class ConfigValidationError extends Schema.TaggedError<ConfigValidationError>()(
  "ConfigValidationError",
  {
    source: Schema.String,
    message: Schema.String,
  }
) {}

export const ColorModeSchema = Schema.Literal("auto", "always", "never");
export const BackgroundSchema = Schema.Literal("dark", "light");
export const DisplayModeSchema = Schema.Literal(
  "side-by-side",
  "side-by-side-show-both"
);

const DisplayConfigSchema = Schema.Struct({
  width: Schema.optional(Schema.Int.pipe(Schema.positive())),
  color: ColorModeSchema,
  background: BackgroundSchema,
  mode: DisplayModeSchema,
  syntaxHighlight: Schema.Boolean,
});

const TelemetryConfigSchema = Schema.Struct({
  enabled: Schema.Boolean,
  exporter: Schema.Literal("console", "otlp-http"),
  endpoint: Schema.optional(Schema.String),
});

export const ConfigSchema = Schema.Struct({
  display: DisplayConfigSchema,
  telemetry: TelemetryConfigSchema,
});
const DisplayConfigInputSchema = Schema.partial(DisplayConfigSchema);
const TelemetryConfigInputSchema = Schema.partial(TelemetryConfigSchema);

export const ConfigInputSchema = Schema.Struct({
  display: Schema.optional(DisplayConfigInputSchema),
  telemetry: Schema.optional(TelemetryConfigInputSchema),
});
const ConfigInputJsonSchema = Schema.parseJson(ConfigInputSchema);

export type Config = Schema.Schema.Type<typeof ConfigSchema>;
export type ConfigInput = Schema.Schema.Type<typeof ConfigInputSchema>;
export type DisplayConfig = Config["display"];
export type ColorMode = Schema.Schema.Type<typeof ColorModeSchema>;
export type Background = Schema.Schema.Type<typeof BackgroundSchema>;
export type DisplayMode = Schema.Schema.Type<typeof DisplayModeSchema>;

export type ConfigSource = "default" | "project" | "user" | "env";

export interface ConfigSources {
  display: Record<keyof DisplayConfig, ConfigSource>;
  telemetry: Record<keyof Config["telemetry"], ConfigSource>;
}

export interface ConfigResolution {
  value: Config;
  sources: ConfigSources;
}

type Writable<T> = { -readonly [K in keyof T]: T[K] };

export const defaultConfig: Config = {
  display: {
    color: "auto",
    background: "dark",
    mode: "side-by-side",
    syntaxHighlight: true,
  },
  telemetry: {
    enabled: false,
    exporter: "console",
  },
};

export const defaultSources: ConfigSources = {
  display: {
    width: "default",
    color: "default",
    background: "default",
    mode: "default",
    syntaxHighlight: "default",
  },
  telemetry: {
    enabled: "default",
    exporter: "default",
    endpoint: "default",
  },
};

export function decodeConfigInput(source: string, input: unknown): ConfigInput {
  try {
    return Schema.decodeUnknownSync(ConfigInputSchema)(input, {
      onExcessProperty: "error",
    });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigValidationError({ source, message });
  }
}

export function decodeConfigInputJson(
  source: string,
  input: string
): ConfigInput {
  try {
    return Schema.decodeUnknownSync(ConfigInputJsonSchema)(input, {
      onExcessProperty: "error",
    });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigValidationError({ source, message });
  }
}

export function mergeConfig(
  current: ConfigResolution,
  overrides: ConfigInput,
  source: ConfigSource
): ConfigResolution {
  const display: Writable<DisplayConfig> = { ...current.value.display };
  const telemetry: Writable<Config["telemetry"]> = {
    ...current.value.telemetry,
  };
  const sources: ConfigSources = {
    display: { ...current.sources.display },
    telemetry: { ...current.sources.telemetry },
  };

  const applyDisplay = <K extends keyof DisplayConfig>(
    key: K,
    value: DisplayConfig[K] | undefined
  ) => {
    if (value !== undefined) {
      display[key] = value;
      sources.display[key] = source;
    }
  };
  const applyTelemetry = <K extends keyof Config["telemetry"]>(
    key: K,
    value: Config["telemetry"][K] | undefined
  ) => {
    if (value !== undefined) {
      telemetry[key] = value;
      sources.telemetry[key] = source;
    }
  };

  if (overrides.display) {
    applyDisplay("width", overrides.display.width);
    applyDisplay("color", overrides.display.color);
    applyDisplay("background", overrides.display.background);
    applyDisplay("mode", overrides.display.mode);
    applyDisplay("syntaxHighlight", overrides.display.syntaxHighlight);
  }

  if (overrides.telemetry) {
    applyTelemetry("enabled", overrides.telemetry.enabled);
    applyTelemetry("exporter", overrides.telemetry.exporter);
    applyTelemetry("endpoint", overrides.telemetry.endpoint);
  }

  return { value: { display, telemetry }, sources };
}
