import { describe, expect, test } from "vitest";
import type { ConfigResolution } from "../src/config.js";
import {
  ConfigValidationError,
  decodeConfigInput,
  decodeConfigInputJson,
  defaultConfig,
  defaultSources,
  mergeConfig,
} from "../src/config.js";

function clone<T>(value: T): T {
  return JSON.parse(JSON.stringify(value)) as T;
}

function expectValidationFailure(
  callback: () => unknown
): ConfigValidationError {
  try {
    callback();
  } catch (error) {
    if (error instanceof ConfigValidationError) {
      return error;
    }
    throw error;
  }
  throw new Error("Expected ConfigValidationError");
}

describe("config decoding", () => {
  test("decodeConfigInput reports validation failures", () => {
    const error = expectValidationFailure(() =>
      decodeConfigInput("env", {
        display: { background: "sepia" },
      })
    );
    expect(error.source).toBe("env");
    expect(error.message).toContain("background");
  });

  test("decodeConfigInputJson reports validation failures", () => {
    const error = expectValidationFailure(() =>
      decodeConfigInputJson(
        "project",
        JSON.stringify({
          display: { mode: "stacked" },
        })
      )
    );
    expect(error.source).toBe("project");
    expect(error.message).toContain("mode");
  });

  test("rejects non-positive widths", () => {
    const error = expectValidationFailure(() =>
      decodeConfigInput("user", { display: { width: 0 } })
    );
    expect(error.source).toBe("user");
  });

  test("rejects unknown sections", () => {
    expectValidationFailure(() =>
      decodeConfigInput("project", { renderer: { format: "ansi" } })
    );
  });
});

describe("mergeConfig", () => {
  test("tracks sources per field across layered overrides", () => {
    const initial: ConfigResolution = {
      value: clone(defaultConfig),
      sources: clone(defaultSources),
    };

    const withProject = mergeConfig(
      initial,
      decodeConfigInput("project", {
        display: { background: "light", width: 120 },
        telemetry: {
          enabled: true,
          endpoint: "https://collector.example.com",
        },
      }),
      "project"
    );

    const merged = mergeConfig(
      withProject,
      decodeConfigInput("env", {
        display: { mode: "side-by-side-show-both", width: 100 },
      }),
      "env"
    );

    expect(merged.sources.display.background).toBe("project");
    expect(merged.sources.display.width).toBe("env");
    expect(merged.sources.display.mode).toBe("env");
    expect(merged.sources.display.color).toBe("default");
    expect(merged.sources.telemetry.enabled).toBe("project");
    expect(merged.sources.telemetry.exporter).toBe("default");

    expect(merged.value.display).toEqual({
      width: 100,
      color: "auto",
      background: "light",
      mode: "side-by-side-show-both",
      syntaxHighlight: true,
    });
    expect(merged.value.telemetry.endpoint).toBe(
      "https://collector.example.com"
    );
  });

  test("does not mutate the previous resolution", () => {
    const initial: ConfigResolution = {
      value: clone(defaultConfig),
      sources: clone(defaultSources),
    };
    mergeConfig(
      initial,
      decodeConfigInput("env", { display: { color: "never" } }),
      "env"
    );
    expect(initial.value.display.color).toBe("auto");
    expect(initial.sources.display.color).toBe("default");
  });
});
