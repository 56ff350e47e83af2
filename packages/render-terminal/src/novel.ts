import type { LineNumber, MatchedPos } from "@twincol/core";
import { isNovel } from "@twincol/core";

export function linesWithNovel(mps: readonly MatchedPos[]): Set<LineNumber> {
  const lines = new Set<LineNumber>();
  for (const mp of mps) {
    if (isNovel(mp.kind)) {
      lines.add(mp.pos.line);
    }
  }
  return lines;
}

/**
 * Whether this side of a row is drawn as changed. Besides lines holding a
 * novel token, a blank line with nothing opposite it counts, so inserted or
 * removed blank lines stand out from blank context.
 */
export function highlightAsNovel(
  lineNum: LineNumber | undefined,
  lines: readonly string[],
  oppositeLineNum: LineNumber | undefined,
  novelLines: ReadonlySet<LineNumber>
) {
  if (lineNum === undefined) {
    return false;
  }
  if (novelLines.has(lineNum)) {
    return true;
  }
  return lines[lineNum]?.trim() === "" && oppositeLineNum === undefined;
}
