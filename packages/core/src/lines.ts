import type { LineNumber } from "./model.js";

const TRAILING_CR_RE = /\r$/;

/**
 * Split `text` on `\n` or `\r\n`. Always returns at least one line, so `""`
 * is one empty line and `"foo\n"` is `["foo", ""]`.
 */
export function splitOnNewlines(text: string): string[] {
  return text.split("\n").map((line) => line.replace(TRAILING_CR_RE, ""));
}

/**
 * Lines as an editor would count them: no lines for `""`, and a trailing
 * newline does not start another line.
 */
export function sourceLines(text: string): string[] {
  if (text.length === 0) {
    return [];
  }
  const lines = splitOnNewlines(text);
  if (text.endsWith("\n")) {
    lines.pop();
  }
  return lines;
}

/** One-indexed line number followed by its separator column. */
export function formatLineNum(lineNum: LineNumber) {
  return `${lineNum + 1} `;
}

export function codepointLength(text: string) {
  return Array.from(text).length;
}
