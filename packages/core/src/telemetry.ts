import { Context, Effect, Exit, Layer, Schema } from "effect";

export type TelemetryAttributes = Record<string, unknown>;

export interface TelemetryService {
  span: <A, E, R>(
    name: string,
    attributes: TelemetryAttributes,
    effect: Effect.Effect<A, E, R>
  ) => Effect.Effect<A, E, R>;
  log: (
    message: string,
    attributes?: TelemetryAttributes
  ) => Effect.Effect<void>;
  metric: (
    name: string,
    value: number,
    attributes?: TelemetryAttributes
  ) => Effect.Effect<void>;
}

export class Telemetry extends Context.Tag("@twincol/Telemetry")<
  Telemetry,
  TelemetryService
>() {}

const TelemetryNoop: TelemetryService = {
  span: (_name, _attributes, effect) => effect,
  log: () => Effect.void,
  metric: () => Effect.void,
};

export const TelemetryNoopLive = Layer.succeed(Telemetry, TelemetryNoop);

export interface TelemetryOptions {
  enabled: boolean;
  exporter: "console" | "otlp-http";
  endpoint?: string;
}

type OTelAttributeValue =
  | { stringValue: string }
  | { boolValue: boolean }
  | { intValue: string }
  | { doubleValue: number };

interface OTelAttribute {
  key: string;
  value: OTelAttributeValue;
}

const SERVICE_NAME = "twincol";

const JsonUnknown = Schema.parseJson(Schema.Unknown);
const encodeJson = (value: unknown) =>
  Schema.encode(JsonUnknown)(value).pipe(Effect.orDie);
const encodeJsonSync = (value: unknown) => {
  try {
    return Schema.encodeSync(JsonUnknown)(value);
  } catch (error) {
    return String(error);
  }
};

function toAttributeValue(value: unknown): OTelAttributeValue {
  if (typeof value === "string") {
    return { stringValue: value };
  }
  if (typeof value === "boolean") {
    return { boolValue: value };
  }
  if (typeof value === "number") {
    if (Number.isInteger(value)) {
      return { intValue: String(value) };
    }
    return { doubleValue: value };
  }
  return { stringValue: encodeJsonSync(value) };
}

function toOtelAttributes(attributes: TelemetryAttributes): OTelAttribute[] {
  return Object.entries(attributes)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => ({ key, value: toAttributeValue(value) }));
}

const resource = {
  attributes: [{ key: "service.name", value: { stringValue: SERVICE_NAME } }],
};
const scope = { name: SERVICE_NAME };

function buildSpanPayload(params: {
  name: string;
  startTimeUnixNano: string;
  endTimeUnixNano: string;
  attributes: TelemetryAttributes;
  status: "ok" | "error";
}) {
  return {
    resourceSpans: [
      {
        resource,
        scopeSpans: [
          {
            scope,
            spans: [
              {
                name: params.name,
                startTimeUnixNano: params.startTimeUnixNano,
                endTimeUnixNano: params.endTimeUnixNano,
                attributes: [
                  {
                    key: "twincol.status",
                    value: { stringValue: params.status },
                  },
                  ...toOtelAttributes(params.attributes),
                ],
              },
            ],
          },
        ],
      },
    ],
  };
}

function buildLogPayload(params: {
  message: string;
  timeUnixNano: string;
  attributes: TelemetryAttributes;
}) {
  return {
    resourceLogs: [
      {
        resource,
        scopeLogs: [
          {
            scope,
            logRecords: [
              {
                timeUnixNano: params.timeUnixNano,
                body: { stringValue: params.message },
                attributes: toOtelAttributes(params.attributes),
              },
            ],
          },
        ],
      },
    ],
  };
}

function buildMetricPayload(params: {
  name: string;
  timeUnixNano: string;
  value: number;
  attributes: TelemetryAttributes;
}) {
  return {
    resourceMetrics: [
      {
        resource,
        scopeMetrics: [
          {
            scope,
            metrics: [
              {
                name: params.name,
                gauge: {
                  dataPoints: [
                    {
                      timeUnixNano: params.timeUnixNano,
                      attributes: toOtelAttributes(params.attributes),
                      asDouble: params.value,
                    },
                  ],
                },
              },
            ],
          },
        ],
      },
    ],
  };
}

export function deriveEndpoint(
  base: string,
  kind: "traces" | "logs" | "metrics"
) {
  if (base.includes("/v1/traces")) {
    return base.replace("/v1/traces", `/v1/${kind}`);
  }
  if (base.endsWith("/")) {
    return `${base}v1/${kind}`;
  }
  return `${base}/v1/${kind}`;
}

const nowNano = () => String(Date.now() * 1_000_000);

export function TelemetryLive(options: TelemetryOptions) {
  let warned = false;
  const resolveEndpoint = () => {
    if (options.endpoint) {
      return options.endpoint;
    }
    if (!warned) {
      warned = true;
      console.warn(
        "Telemetry exporter enabled without endpoint; skipping OTLP export."
      );
    }
    return null;
  };

  const post = (url: string, payload: unknown) =>
    encodeJson(payload).pipe(
      Effect.flatMap((body) =>
        Effect.tryPromise((signal) =>
          fetch(url, {
            method: "POST",
            headers: { "content-type": "application/json" },
            body,
            signal,
          })
        )
      ),
      Effect.ignore
    );

  // Console export writes one JSON document per line; OTLP export posts the
  // matching resource payload and ignores transport failures.
  const emit = (
    consoleRecord: Record<string, unknown>,
    kind: "traces" | "logs" | "metrics",
    payload: () => unknown
  ) => {
    if (options.exporter === "console") {
      return encodeJson(consoleRecord).pipe(
        Effect.flatMap((json) => Effect.sync(() => console.log(json)))
      );
    }
    const endpoint = resolveEndpoint();
    if (!endpoint) {
      return Effect.void;
    }
    return post(deriveEndpoint(endpoint, kind), payload());
  };

  const service: TelemetryService = {
    span: <A, E, R>(
      name: string,
      attributes: TelemetryAttributes,
      effect: Effect.Effect<A, E, R>
    ) => {
      if (!options.enabled) {
        return effect;
      }
      return Effect.suspend(() => {
        const start = Date.now();
        const handleExit = (exit: Exit.Exit<A, E>) => {
          const end = Date.now();
          const status = Exit.isFailure(exit) ? "error" : "ok";
          return emit(
            { span: name, durationMs: end - start, attributes, status },
            "traces",
            () =>
              buildSpanPayload({
                name,
                startTimeUnixNano: String(start * 1_000_000),
                endTimeUnixNano: String(end * 1_000_000),
                attributes,
                status,
              })
          );
        };
        return effect.pipe(Effect.onExit(handleExit));
      });
    },
    log: (message, attributes = {}) => {
      if (!options.enabled) {
        return Effect.void;
      }
      return Effect.suspend(() => {
        const timestamp = nowNano();
        return emit({ log: message, timestamp, attributes }, "logs", () =>
          buildLogPayload({ message, timeUnixNano: timestamp, attributes })
        );
      });
    },
    metric: (name, value, attributes = {}) => {
      if (!options.enabled) {
        return Effect.void;
      }
      return Effect.suspend(() => {
        const timestamp = nowNano();
        return emit(
          { metric: name, value, timestamp, attributes },
          "metrics",
          () =>
            buildMetricPayload({
              name,
              timeUnixNano: timestamp,
              value,
              attributes,
            })
        );
      });
    },
  };

  return Layer.succeed(Telemetry, service);
}
