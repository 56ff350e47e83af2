import type { AlignedLinePair, LineNumber, Side } from "@twincol/core";
import { formatLineNum } from "@twincol/core";

export const SPACER = " ";

export interface SideDimensions {
  contentWidth: number;
  lineNumsWidth: number;
  maxLine: LineNumber;
}

export type SourceDimensions = Record<Side, SideDimensions>;

/**
 * Column sizes for one hunk. The two columns plus the spacer fill
 * `terminalWidth` exactly, and the right column takes any odd column.
 * Widths too small for both number columns are not checked.
 */
export function planDimensions(
  terminalWidth: number,
  lineNums: readonly AlignedLinePair[]
): SourceDimensions {
  let lhsMaxLine: LineNumber = 1;
  let rhsMaxLine: LineNumber = 1;
  for (const [lhsLineNum, rhsLineNum] of lineNums) {
    if (lhsLineNum !== undefined) {
      lhsMaxLine = Math.max(lhsMaxLine, lhsLineNum);
    }
    if (rhsLineNum !== undefined) {
      rhsMaxLine = Math.max(rhsMaxLine, rhsLineNum);
    }
  }

  const lhsLineNumsWidth = formatLineNum(lhsMaxLine).length;
  const rhsLineNumsWidth = formatLineNum(rhsMaxLine).length;

  const lhsTotalWidth = Math.floor((terminalWidth - SPACER.length) / 2);
  return {
    lhs: {
      contentWidth: lhsTotalWidth - lhsLineNumsWidth,
      lineNumsWidth: lhsLineNumsWidth,
      maxLine: lhsMaxLine,
    },
    rhs: {
      contentWidth:
        terminalWidth - lhsTotalWidth - SPACER.length - rhsLineNumsWidth,
      lineNumsWidth: rhsLineNumsWidth,
      maxLine: rhsMaxLine,
    },
  };
}
