export type {
  Background,
  ColorMode,
  Config,
  ConfigInput,
  ConfigResolution,
  ConfigSource,
  ConfigSources,
  DisplayConfig,
  DisplayMode,
} from "./config.js";
export {
  ConfigInputSchema,
  ConfigSchema,
  ConfigValidationError,
  decodeConfigInput,
  decodeConfigInputJson,
  defaultConfig,
  defaultSources,
  mergeConfig,
} from "./config.js";
export {
  codepointLength,
  formatLineNum,
  sourceLines,
  splitOnNewlines,
} from "./lines.js";
export type {
  AlignedLinePair,
  Comparison,
  Hunk,
  LineNumber,
  MatchedPos,
  MatchKind,
  Side,
  SingleLineSpan,
  TokenKind,
} from "./model.js";
export { isNovel } from "./model.js";
export type { ComparisonPayload } from "./payload.js";
export {
  ComparisonPayloadSchema,
  DEFAULT_LANGUAGE,
  decodeComparison,
  decodeComparisonJson,
  PayloadDecodeError,
} from "./payload.js";
export type {
  TelemetryAttributes,
  TelemetryOptions,
  TelemetryService,
} from "./telemetry.js";
export { Telemetry, TelemetryLive, TelemetryNoopLive } from "./telemetry.js";
