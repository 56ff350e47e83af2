import { readFileSync } from "node:fs";
import { Args, Command, Options } from "@effect/cli";
import type {
  Background,
  ColorMode,
  Config,
  DisplayMode,
} from "@twincol/core";
import {
  ConfigSchema,
  decodeComparisonJson,
  PayloadDecodeError,
  Telemetry,
  TelemetryLive,
} from "@twincol/core";
import type { DisplayOptions } from "@twincol/render-terminal";
import { renderSideBySide } from "@twincol/render-terminal";
import { Console, Effect, Option, Schema } from "effect";
import { resolveConfig } from "./config/resolve.js";

export const MIN_DISPLAY_WIDTH = 20;
const DEFAULT_DISPLAY_WIDTH = 80;

export class CliSystemError extends Schema.TaggedError<CliSystemError>()(
  "CliSystemError",
  {
    operation: Schema.String,
    error: Schema.Defect,
  }
) {}

function readInput(path: string): string {
  if (path === "-") {
    return readFileSync(0, "utf8");
  }
  return readFileSync(path, "utf8");
}

const ConfigSourceSchema = Schema.Literal("default", "project", "user", "env");
const ConfigSourcesSchema = Schema.Struct({
  display: Schema.Struct({
    width: ConfigSourceSchema,
    color: ConfigSourceSchema,
    background: ConfigSourceSchema,
    mode: ConfigSourceSchema,
    syntaxHighlight: ConfigSourceSchema,
  }),
  telemetry: Schema.Struct({
    enabled: ConfigSourceSchema,
    exporter: ConfigSourceSchema,
    endpoint: ConfigSourceSchema,
  }),
});
const ResolvedConfigOutputSchema = Schema.Struct({
  config: ConfigSchema,
  sources: ConfigSourcesSchema,
  paths: Schema.Struct({
    project: Schema.String,
    user: Schema.String,
  }),
});
const ResolvedConfigOutputJson = Schema.parseJson(ResolvedConfigOutputSchema, {
  space: 2,
});

export interface RenderFlags {
  width?: number;
  color?: ColorMode;
  background?: Background;
  display?: DisplayMode;
  inVcs: boolean;
}

export interface TerminalInfo {
  columns: number | undefined;
  isTTY: boolean;
  noColor: boolean;
}

export function currentTerminal(): TerminalInfo {
  return {
    columns: process.stdout.columns,
    isTTY: process.stdout.isTTY === true,
    noColor: (process.env.NO_COLOR ?? "") !== "",
  };
}

/**
 * Flags win over config, config over the terminal. The width is clamped so
 * both number columns always fit.
 */
export function resolveDisplayOptions(
  config: Config,
  flags: RenderFlags,
  terminal: TerminalInfo
): DisplayOptions {
  const width =
    flags.width ??
    config.display.width ??
    terminal.columns ??
    DEFAULT_DISPLAY_WIDTH;
  const color = flags.color ?? config.display.color;
  return {
    displayWidth: Math.max(MIN_DISPLAY_WIDTH, width),
    useColor:
      color === "always" ||
      (color === "auto" && terminal.isTTY && !terminal.noColor),
    background: flags.background ?? config.display.background,
    displayMode: flags.display ?? config.display.mode,
    syntaxHighlight: config.display.syntaxHighlight,
    inVcs: flags.inVcs,
  };
}

/** Decode a payload and render it, reporting each stage to telemetry. */
export function runRender(params: {
  source: string;
  raw: string;
  flags: RenderFlags;
  config: Config;
  terminal: TerminalInfo;
}) {
  return Effect.gen(function* () {
    const telemetry = yield* Telemetry;
    const comparison = yield* telemetry.span(
      "decode",
      { source: params.source, sizeBytes: Buffer.byteLength(params.raw) },
      Effect.try({
        try: () => decodeComparisonJson(params.source, params.raw),
        catch: (error) =>
          error instanceof PayloadDecodeError
            ? error
            : new PayloadDecodeError({
                source: params.source,
                message: String(error),
              }),
      })
    );
    const options = resolveDisplayOptions(
      params.config,
      { ...params.flags, inVcs: params.flags.inVcs || comparison.inVcs },
      params.terminal
    );
    const lines = yield* telemetry.span(
      "render",
      {
        hunks: comparison.hunks.length,
        width: options.displayWidth,
        color: options.useColor,
      },
      Effect.sync(() => renderSideBySide(comparison, options))
    );
    yield* telemetry.metric("twincol.render.lines", lines.length, {
      language: comparison.language,
    });
    yield* telemetry.log("render_complete", {
      path: comparison.newPath,
      language: comparison.language,
      hunkCount: comparison.hunks.length,
      lineCount: lines.length,
    });
    return lines;
  });
}

const widthOption = Options.integer("width").pipe(
  Options.optional,
  Options.withDescription("Display width in columns (default: terminal).")
);
const colorOption = Options.choice("color", [
  "auto",
  "always",
  "never",
] as const).pipe(Options.optional, Options.withDescription("Colour output."));
const backgroundOption = Options.choice("background", [
  "dark",
  "light",
] as const).pipe(
  Options.optional,
  Options.withDescription("Terminal background brightness.")
);
const displayOption = Options.choice("display", [
  "side-by-side",
  "side-by-side-show-both",
] as const).pipe(
  Options.optional,
  Options.withDescription("Always show both columns with side-by-side-show-both.")
);
const inVcsOption = Options.boolean("in-vcs").pipe(
  Options.withDescription("Invoked by a version control system.")
);

const renderCommand = Command.make(
  "render",
  {
    payload: Args.text({ name: "payload" }),
    width: widthOption,
    color: colorOption,
    background: backgroundOption,
    display: displayOption,
    inVcs: inVcsOption,
  },
  ({ payload, width, color, background, display, inVcs }) =>
    resolveConfig.pipe(
      Effect.flatMap((resolved) => {
        const telemetryLayer = TelemetryLive({
          enabled: resolved.config.telemetry.enabled,
          exporter: resolved.config.telemetry.exporter,
          ...(resolved.config.telemetry.endpoint
            ? { endpoint: resolved.config.telemetry.endpoint }
            : {}),
        });
        return Effect.gen(function* () {
          const telemetry = yield* Telemetry;
          const raw = yield* telemetry.span(
            "read",
            { path: payload },
            Effect.try({
              try: () => readInput(payload),
              catch: (error) =>
                new CliSystemError({ operation: "read-payload", error }),
            })
          );
          const lines = yield* runRender({
            source: payload === "-" ? "stdin" : payload,
            raw,
            flags: {
              width: Option.getOrUndefined(width),
              color: Option.getOrUndefined(color),
              background: Option.getOrUndefined(background),
              display: Option.getOrUndefined(display),
              inVcs,
            },
            config: resolved.config,
            terminal: currentTerminal(),
          });
          yield* Console.log(lines.join("\n"));
        }).pipe(Effect.provide(telemetryLayer));
      })
    )
).pipe(
  Command.withDescription("Render a comparison payload as two columns.")
);

const configCommand = Command.make("config", {}, () =>
  Effect.gen(function* () {
    const resolved = yield* resolveConfig;
    const json = yield* Schema.encode(ResolvedConfigOutputJson)(resolved).pipe(
      Effect.orDie
    );
    yield* Console.log(json);
  })
).pipe(Command.withDescription("Print resolved config with provenance."));

export const app = Command.make("twincol", {}, () => Effect.void).pipe(
  Command.withSubcommands([renderCommand, configCommand])
);

export const cli = Command.run(app, {
  name: "twincol",
  version: "0.1.0",
});
