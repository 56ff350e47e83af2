export type { Color, Segment, Style, StyledText } from "./ansi.js";
export {
  NO_STYLE,
  padEnd,
  plain,
  restyle,
  styled,
  toAnsi,
  toPlain,
  visibleWidth,
  withBackground,
} from "./ansi.js";
export type { SideDimensions, SourceDimensions } from "./dimensions.js";
export { planDimensions, SPACER } from "./dimensions.js";
export type { HeaderOptions, HeaderParams } from "./header.js";
export { header } from "./header.js";
export type { LineNumberStyle } from "./line-numbers.js";
export {
  displayLineNum,
  formatLineNumPadded,
  formatMissingLineNum,
} from "./line-numbers.js";
export { highlightAsNovel, linesWithNovel } from "./novel.js";
export type { DisplayOptions } from "./side-by-side.js";
export { renderSideBySide, renderSideBySideStyled } from "./side-by-side.js";
export type {
  SingleColumnOptions,
  SingleColumnParams,
} from "./single-column.js";
export { displaySingleColumn } from "./single-column.js";
export type { StyleSpan } from "./style.js";
export {
  applyColors,
  bucketByLine,
  colorPositions,
  NOVEL_BACKGROUND,
  novelStyle,
} from "./style.js";
export { applySpans, splitAndApply, splitByWidth } from "./wrap.js";
