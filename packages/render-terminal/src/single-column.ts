import type { LineNumber, MatchedPos, Side } from "@twincol/core";
import { formatLineNum, sourceLines } from "@twincol/core";
import type { Style, StyledText } from "./ansi.js";
import { NO_STYLE, styled } from "./ansi.js";
import type { HeaderOptions } from "./header.js";
import { header } from "./header.js";
import { formatLineNumPadded } from "./line-numbers.js";
import type { StyleSpan } from "./style.js";
import { bucketByLine, colorPositions, novelStyle } from "./style.js";
import { applySpans } from "./wrap.js";

export interface SingleColumnParams {
  lhsPath: string;
  rhsPath: string;
  languageName: string;
  src: string;
  side: Side;
  positions: readonly MatchedPos[];
}

export interface SingleColumnOptions extends HeaderOptions {
  syntaxHighlight: boolean;
}

function underlay(text: StyledText, base: Style): StyledText {
  return text.map((segment) => ({
    text: segment.text,
    style: { ...base, ...segment.style },
  }));
}

/**
 * Whole-file addition or removal: the surviving side as one numbered
 * column, all of it in the side's added/removed colour.
 */
export function displaySingleColumn(
  params: SingleColumnParams,
  options: SingleColumnOptions
): StyledText[] {
  const lines = sourceLines(params.src);
  const columnWidth = formatLineNum(lines.length).length;
  const highlights: ReadonlyMap<LineNumber, readonly StyleSpan[]> =
    options.useColor
      ? bucketByLine(
          colorPositions(
            params.side,
            options.background,
            options.syntaxHighlight,
            params.positions
          )
        )
      : new Map();
  const base = options.useColor
    ? novelStyle(params.side, options.background)
    : NO_STYLE;

  const rows = lines.map((line, lineNum) => [
    ...styled(formatLineNumPadded(lineNum, columnWidth), base),
    ...underlay(applySpans(line, highlights.get(lineNum) ?? []), base),
  ]);

  return [
    ...header(
      {
        lhsPath: params.lhsPath,
        rhsPath: params.rhsPath,
        hunkNum: 1,
        hunkTotal: 1,
        languageName: params.languageName,
      },
      options
    ),
    ...rows,
    [],
  ];
}
