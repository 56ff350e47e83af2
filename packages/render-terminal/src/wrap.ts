import { codepointLength } from "@twincol/core";
import type { Segment, StyledText } from "./ansi.js";
import { NO_STYLE, padEnd } from "./ansi.js";
import type { StyleSpan } from "./style.js";

/**
 * Split `line` into windows of at most `width` codepoints, never fewer than
 * one. An empty line is one empty window.
 */
export function splitByWidth(line: string, width: number): string[] {
  const chars = Array.from(line);
  if (chars.length === 0) {
    return [""];
  }
  const step = Math.max(1, width);
  const parts: string[] = [];
  for (let start = 0; start < chars.length; start += step) {
    parts.push(chars.slice(start, start + step).join(""));
  }
  return parts;
}

/**
 * Style `text`, the window of its line that starts at column `windowStart`.
 * Spans are half-open and must be ordered by start column; each one is
 * clipped to the window, so a span crossing a window edge contributes to both
 * neighbouring windows.
 */
export function applySpans(
  text: string,
  spans: readonly StyleSpan[],
  windowStart = 0
): StyledText {
  const chars = Array.from(text);
  const windowEnd = windowStart + chars.length;
  const slice = (from: number, to: number) =>
    chars.slice(from - windowStart, to - windowStart).join("");

  const segments: Segment[] = [];
  let cursor = windowStart;
  for (const { span, style } of spans) {
    const start = Math.max(span.startCol, cursor);
    const end = Math.min(span.endCol, windowEnd);
    if (end <= start) {
      continue;
    }
    if (start > cursor) {
      segments.push({ text: slice(cursor, start), style: NO_STYLE });
    }
    segments.push({ text: slice(start, end), style });
    cursor = end;
  }
  if (cursor < windowEnd) {
    segments.push({ text: slice(cursor, windowEnd), style: NO_STYLE });
  }
  return segments;
}

/**
 * Wrap `line` to `width` columns, re-applying its spans to every fragment.
 * Fragments are padded to exactly `width` visible columns.
 */
export function splitAndApply(
  line: string,
  width: number,
  spans: readonly StyleSpan[]
): StyledText[] {
  let offset = 0;
  return splitByWidth(line, width).map((part) => {
    const fragment = applySpans(part, spans, offset);
    offset += codepointLength(part);
    return padEnd(fragment, width);
  });
}
