import type {
  Background,
  LineNumber,
  MatchedPos,
  Side,
  SingleLineSpan,
} from "@twincol/core";
import type { Style, StyledText } from "./ansi.js";
import { NO_STYLE } from "./ansi.js";
import { applySpans } from "./wrap.js";

export interface StyleSpan {
  span: SingleLineSpan;
  style: Style;
}

/** Row background for changed lines: pale red on the left, pale green on the right. */
export const NOVEL_BACKGROUND: Record<Side, number> = {
  lhs: 224,
  rhs: 194,
};

export function novelStyle(side: Side, background: Background): Style {
  if (background === "dark") {
    return { fg: side === "lhs" ? "brightRed" : "brightGreen" };
  }
  return { fg: side === "lhs" ? "red" : "green" };
}

function unchangedStyle(
  mp: MatchedPos,
  background: Background,
  syntaxHighlight: boolean
): Style {
  if (!syntaxHighlight) {
    return NO_STYLE;
  }
  switch (mp.kind.highlight) {
    case "string":
      return { fg: "magenta" };
    case "type":
      return { fg: background === "dark" ? "brightYellow" : "yellow" };
    case "comment":
      return { italic: true };
    case "keyword":
      return { bold: true };
    case "error":
      return { fg: "red" };
    default:
      return NO_STYLE;
  }
}

function novelTokenStyle(
  mp: MatchedPos,
  side: Side,
  background: Background,
  syntaxHighlight: boolean
): Style {
  const base = novelStyle(side, background);
  if (mp.kind.type === "novelWord") {
    return { ...base, bold: true, underline: true };
  }
  const highlight = mp.kind.highlight;
  if (highlight === "comment") {
    return { ...base, italic: true };
  }
  if (
    syntaxHighlight &&
    (highlight === "keyword" ||
      highlight === "type" ||
      highlight === "delimiter")
  ) {
    return { ...base, bold: true };
  }
  return base;
}

/**
 * Resolve every matched position to a display style, combining syntax
 * colouring with added/removed colouring.
 */
export function colorPositions(
  side: Side,
  background: Background,
  syntaxHighlight: boolean,
  mps: readonly MatchedPos[]
): StyleSpan[] {
  return mps.map((mp) => ({
    span: mp.pos,
    style:
      mp.kind.type === "unchanged"
        ? unchangedStyle(mp, background, syntaxHighlight)
        : novelTokenStyle(mp, side, background, syntaxHighlight),
  }));
}

export function bucketByLine(
  spans: readonly StyleSpan[]
): Map<LineNumber, StyleSpan[]> {
  const byLine = new Map<LineNumber, StyleSpan[]>();
  for (const entry of spans) {
    const existing = byLine.get(entry.span.line) ?? [];
    existing.push(entry);
    byLine.set(entry.span.line, existing);
  }
  for (const entries of byLine.values()) {
    entries.sort((a, b) => a.span.startCol - b.span.startCol);
  }
  return byLine;
}

/** Fully coloured copy of a line table, one styled line per line. */
export function applyColors(
  lines: readonly string[],
  highlights: ReadonlyMap<LineNumber, readonly StyleSpan[]>
): StyledText[] {
  return lines.map((line, lineNum) =>
    applySpans(line, highlights.get(lineNum) ?? [])
  );
}
