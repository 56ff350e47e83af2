import type { Background, LineNumber, Side } from "@twincol/core";
import type { StyledText } from "./ansi.js";
import { NO_STYLE, styled } from "./ansi.js";
import type { SourceDimensions } from "./dimensions.js";
import { novelStyle } from "./style.js";

export interface LineNumberStyle {
  useColor: boolean;
  background: Background;
}

export function formatLineNumPadded(lineNum: LineNumber, columnWidth: number) {
  return `${String(lineNum + 1).padStart(columnWidth - 1)} `;
}

/**
 * Placeholder for a row with no line on `side`. Dots mean the side has more
 * lines further down; blanks mean the gap is past its last line.
 */
export function formatMissingLineNum(
  prevNum: LineNumber,
  dims: SourceDimensions,
  side: Side,
  useColor: boolean
): StyledText {
  const { lineNumsWidth, maxLine } = dims[side];
  const afterEnd = prevNum >= maxLine;
  const numDigits = String(prevNum + 1).length;
  const glyphs = (afterEnd ? " " : ".").repeat(numDigits);
  return styled(
    `${glyphs.padStart(lineNumsWidth - 1)} `,
    useColor ? { dim: true } : NO_STYLE
  );
}

/**
 * Number cell for one side of a row. An absent line falls back to a
 * placeholder keyed on the last number shown for that side.
 */
export function displayLineNum(
  side: Side,
  lineNum: LineNumber | undefined,
  prevNum: LineNumber | undefined,
  novel: boolean,
  dims: SourceDimensions,
  options: LineNumberStyle
): StyledText {
  if (lineNum === undefined) {
    return formatMissingLineNum(prevNum ?? 1, dims, side, options.useColor);
  }
  const text = formatLineNumPadded(lineNum, dims[side].lineNumsWidth);
  if (novel && options.useColor) {
    return styled(text, novelStyle(side, options.background));
  }
  return styled(text, NO_STYLE);
}
