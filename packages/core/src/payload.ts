import { Schema } from "effect";
import { splitOnNewlines } from "./lines.js";
import type {
  AlignedLinePair,
  Comparison,
  Hunk,
  LineNumber,
  MatchedPos,
} from "./model.js";

export class PayloadDecodeError extends Schema.TaggedError<PayloadDecodeError>()(
  "PayloadDecodeError",
  {
    source: Schema.String,
    message: Schema.String,
  }
) {}

const LineNumberSchema = Schema.Int.pipe(Schema.nonNegative());

export const SingleLineSpanSchema = Schema.Struct({
  line: LineNumberSchema,
  startCol: LineNumberSchema,
  endCol: LineNumberSchema,
});

const TokenKindSchema = Schema.Literal(
  "normal",
  "string",
  "type",
  "comment",
  "keyword",
  "delimiter",
  "error"
);

export const MatchedPosSchema = Schema.Struct({
  kind: Schema.Struct({
    type: Schema.Literal("unchanged", "novel", "novelWord"),
    highlight: TokenKindSchema,
  }),
  pos: SingleLineSpanSchema,
});

const LineSlotSchema = Schema.NullOr(LineNumberSchema);

export const HunkSchema = Schema.Struct({
  lines: Schema.Array(Schema.Tuple(LineSlotSchema, LineSlotSchema)),
  novelLhs: Schema.Array(LineNumberSchema),
  novelRhs: Schema.Array(LineNumberSchema),
});

export const ComparisonPayloadSchema = Schema.Struct({
  oldPath: Schema.String,
  newPath: Schema.String,
  language: Schema.optional(Schema.String),
  inVcs: Schema.optional(Schema.Boolean),
  oldText: Schema.String,
  newText: Schema.String,
  hunks: Schema.Array(HunkSchema),
  lhsPositions: Schema.Array(MatchedPosSchema),
  rhsPositions: Schema.Array(MatchedPosSchema),
});
const ComparisonPayloadJson = Schema.parseJson(ComparisonPayloadSchema);

export type ComparisonPayload = Schema.Schema.Type<
  typeof ComparisonPayloadSchema
>;
type HunkPayload = Schema.Schema.Type<typeof HunkSchema>;

export const DEFAULT_LANGUAGE = "Text";

function checkLine(
  source: string,
  lineNum: LineNumber,
  lineCount: number,
  what: string
) {
  if (lineNum >= lineCount) {
    throw new PayloadDecodeError({
      source,
      message: `${what} references line ${lineNum + 1} but the source has ${lineCount} lines`,
    });
  }
}

function toHunk(
  source: string,
  hunk: HunkPayload,
  index: number,
  lhsLineCount: number,
  rhsLineCount: number
): Hunk {
  const label = `hunk ${index + 1}`;
  const presentLhs = new Set<LineNumber>();
  const presentRhs = new Set<LineNumber>();
  const lines = hunk.lines.map(([lhs, rhs]): AlignedLinePair => {
    if (lhs === null && rhs === null) {
      throw new PayloadDecodeError({
        source,
        message: `${label} has a row with neither an old nor a new line`,
      });
    }
    if (lhs !== null) {
      checkLine(source, lhs, lhsLineCount, `${label} (old side)`);
      presentLhs.add(lhs);
    }
    if (rhs !== null) {
      checkLine(source, rhs, rhsLineCount, `${label} (new side)`);
      presentRhs.add(rhs);
    }
    return [lhs ?? undefined, rhs ?? undefined];
  });

  const novelSet = (
    values: readonly LineNumber[],
    present: ReadonlySet<LineNumber>,
    side: string
  ) => {
    for (const value of values) {
      if (!present.has(value)) {
        throw new PayloadDecodeError({
          source,
          message: `${label} marks ${side} line ${value + 1} as novel but never shows it`,
        });
      }
    }
    return new Set(values);
  };

  return {
    lines,
    novelLhs: novelSet(hunk.novelLhs, presentLhs, "old"),
    novelRhs: novelSet(hunk.novelRhs, presentRhs, "new"),
  };
}

function toPositions(
  source: string,
  positions: readonly MatchedPos[],
  lineCount: number,
  side: string
): MatchedPos[] {
  return positions.map((position) => {
    checkLine(source, position.pos.line, lineCount, `${side} position`);
    return {
      kind: { ...position.kind },
      pos: { ...position.pos },
    };
  });
}

/**
 * Convert a decoded payload into the in-memory model, checking every line
 * reference against the line tables of both sources.
 */
function toComparison(
  source: string,
  payload: ComparisonPayload
): Comparison {
  const lhsLineCount = splitOnNewlines(payload.oldText).length;
  const rhsLineCount = splitOnNewlines(payload.newText).length;
  return {
    oldPath: payload.oldPath,
    newPath: payload.newPath,
    language: payload.language ?? DEFAULT_LANGUAGE,
    inVcs: payload.inVcs ?? false,
    oldText: payload.oldText,
    newText: payload.newText,
    hunks: payload.hunks.map((hunk, index) =>
      toHunk(source, hunk, index, lhsLineCount, rhsLineCount)
    ),
    lhsPositions: toPositions(
      source,
      payload.lhsPositions,
      lhsLineCount,
      "old"
    ),
    rhsPositions: toPositions(
      source,
      payload.rhsPositions,
      rhsLineCount,
      "new"
    ),
  };
}

export function decodeComparison(source: string, input: unknown): Comparison {
  let payload: ComparisonPayload;
  try {
    payload = Schema.decodeUnknownSync(ComparisonPayloadSchema)(input, {
      onExcessProperty: "error",
    });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new PayloadDecodeError({ source, message });
  }
  return toComparison(source, payload);
}

export function decodeComparisonJson(
  source: string,
  input: string
): Comparison {
  let payload: ComparisonPayload;
  try {
    payload = Schema.decodeUnknownSync(ComparisonPayloadJson)(input, {
      onExcessProperty: "error",
    });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new PayloadDecodeError({ source, message });
  }
  return toComparison(source, payload);
}
