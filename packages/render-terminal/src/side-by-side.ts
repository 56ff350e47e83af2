import type {
  AlignedLinePair,
  Background,
  Comparison,
  DisplayMode,
  Hunk,
  LineNumber,
  MatchedPos,
  Side,
} from "@twincol/core";
import { splitOnNewlines } from "@twincol/core";
import type { StyledText } from "./ansi.js";
import { padEnd, plain, restyle, toAnsi, withBackground } from "./ansi.js";
import type { SourceDimensions } from "./dimensions.js";
import { planDimensions, SPACER } from "./dimensions.js";
import { header } from "./header.js";
import { displayLineNum, formatMissingLineNum } from "./line-numbers.js";
import { highlightAsNovel, linesWithNovel } from "./novel.js";
import { displaySingleColumn } from "./single-column.js";
import type { StyleSpan } from "./style.js";
import {
  applyColors,
  bucketByLine,
  colorPositions,
  NOVEL_BACKGROUND,
  novelStyle,
} from "./style.js";
import { splitAndApply } from "./wrap.js";

export interface DisplayOptions {
  displayWidth: number;
  useColor: boolean;
  background: Background;
  displayMode: DisplayMode;
  syntaxHighlight: boolean;
  inVcs: boolean;
}

/** Everything the row routines need to know about one column. */
interface SideContext {
  side: Side;
  lines: readonly string[];
  coloredLines: readonly StyledText[];
  highlights: ReadonlyMap<LineNumber, readonly StyleSpan[]>;
  novelLines: ReadonlySet<LineNumber>;
}

type PerSide<T> = Record<Side, T>;

/** Last line number shown on each side, threaded from row to row. */
type RowState = PerSide<LineNumber | undefined>;

const INITIAL_STATE: RowState = { lhs: undefined, rhs: undefined };

const lineOn = (pair: AlignedLinePair, side: Side) =>
  side === "lhs" ? pair[0] : pair[1];

const opposite = (side: Side): Side => (side === "lhs" ? "rhs" : "lhs");

function sideContext(
  side: Side,
  src: string,
  positions: readonly MatchedPos[],
  options: DisplayOptions
): SideContext {
  const lines = splitOnNewlines(src);
  const highlights: ReadonlyMap<LineNumber, readonly StyleSpan[]> =
    options.useColor
      ? bucketByLine(
          colorPositions(
            side,
            options.background,
            options.syntaxHighlight,
            positions
          )
        )
      : new Map();
  return {
    side,
    lines,
    coloredLines: applyColors(lines, highlights),
    highlights,
    novelLines: linesWithNovel(positions),
  };
}

interface RowInput {
  pair: AlignedLinePair;
  cells: PerSide<StyledText>;
  novel: PerSide<boolean>;
}

/**
 * One side carries no changes in this hunk, so only the other side's content
 * is printed. `shown` is the side whose content appears.
 */
function fastPathRow(
  shown: SideContext,
  row: RowInput,
  sameNumbers: boolean,
  options: DisplayOptions
): StyledText {
  const lineNum = lineOn(row.pair, shown.side);
  if (lineNum === undefined) {
    return [...row.cells.lhs, ...row.cells.rhs];
  }
  const content = shown.coloredLines[lineNum] ?? [];
  const text = sameNumbers
    ? [...row.cells[shown.side], ...content]
    : [...row.cells.lhs, ...row.cells.rhs, ...content];
  if (!row.novel[shown.side]) {
    return text;
  }
  const padded = padEnd(text, options.displayWidth);
  return options.useColor
    ? withBackground(padded, NOVEL_BACKGROUND[shown.side])
    : padded;
}

function blankFragment(width: number) {
  return plain(" ".repeat(width));
}

function wrapSide(
  ctx: SideContext,
  lineNum: LineNumber | undefined,
  dims: SourceDimensions
): StyledText[] {
  const width = dims[ctx.side].contentWidth;
  if (lineNum === undefined) {
    return [blankFragment(width)];
  }
  return splitAndApply(
    ctx.lines[lineNum] ?? "",
    width,
    ctx.highlights.get(lineNum) ?? []
  );
}

function continuationCell(
  ctx: SideContext,
  lineNum: LineNumber | undefined,
  prevNum: LineNumber | undefined,
  novel: boolean,
  dims: SourceDimensions,
  options: DisplayOptions
) {
  const cell = formatMissingLineNum(
    lineNum ?? prevNum ?? 10,
    dims,
    ctx.side,
    options.useColor
  );
  return novel && options.useColor
    ? restyle(cell, novelStyle(ctx.side, options.background))
    : cell;
}

/**
 * Both sides changed: wrap each to its own content width and zip the
 * fragments, padding the shorter side with blank fragments.
 */
function generalPathRows(
  contexts: PerSide<SideContext>,
  row: RowInput,
  prev: RowState,
  dims: SourceDimensions,
  options: DisplayOptions
): StyledText[] {
  const fragments = {
    lhs: wrapSide(contexts.lhs, row.pair[0], dims),
    rhs: wrapSide(contexts.rhs, row.pair[1], dims),
  };
  const height = Math.max(fragments.lhs.length, fragments.rhs.length);

  const cellAt = (side: Side, index: number): StyledText => {
    const ctx = contexts[side];
    const numberCell =
      index === 0
        ? row.cells[side]
        : continuationCell(
            ctx,
            lineOn(row.pair, side),
            prev[side],
            row.novel[side],
            dims,
            options
          );
    const fragment =
      fragments[side][index] ?? blankFragment(dims[side].contentWidth);
    const cell = [...numberCell, ...fragment];
    return row.novel[side] && options.useColor
      ? withBackground(cell, NOVEL_BACKGROUND[side])
      : cell;
  };

  return Array.from({ length: height }, (_, index) => [
    ...cellAt("lhs", index),
    ...plain(SPACER),
    ...cellAt("rhs", index),
  ]);
}

function renderHunk(
  hunk: Hunk,
  hunkIndex: number,
  hunkTotal: number,
  comparison: Comparison,
  contexts: PerSide<SideContext>,
  state: RowState,
  options: DisplayOptions
): { output: StyledText[]; state: RowState } {
  const dims = planDimensions(options.displayWidth, hunk.lines);
  const showBoth = options.displayMode === "side-by-side-show-both";
  const noLhsChanges = hunk.novelLhs.size === 0;
  const noRhsChanges = hunk.novelRhs.size === 0;
  const sameNumbers = hunk.lines.every(([lhs, rhs]) => lhs === rhs);
  // Unchanged left means the right side is the one worth showing.
  const fastSide: SideContext | undefined = showBoth
    ? undefined
    : noLhsChanges
      ? contexts.rhs
      : noRhsChanges
        ? contexts.lhs
        : undefined;

  const rowGroups: StyledText[][] = [];
  const finalState = hunk.lines.reduce((prev: RowState, pair) => {
    const novelOn = (side: Side) =>
      highlightAsNovel(
        lineOn(pair, side),
        contexts[side].lines,
        lineOn(pair, opposite(side)),
        contexts[side].novelLines
      );
    const novel = { lhs: novelOn("lhs"), rhs: novelOn("rhs") };
    const cellOn = (side: Side) =>
      displayLineNum(
        side,
        lineOn(pair, side),
        prev[side],
        novel[side],
        dims,
        options
      );
    const row: RowInput = {
      pair,
      cells: { lhs: cellOn("lhs"), rhs: cellOn("rhs") },
      novel,
    };

    rowGroups.push(
      fastSide
        ? [fastPathRow(fastSide, row, sameNumbers, options)]
        : generalPathRows(contexts, row, prev, dims, options)
    );
    return {
      lhs: pair[0] ?? prev.lhs,
      rhs: pair[1] ?? prev.rhs,
    };
  }, state);

  const title = header(
    {
      lhsPath: comparison.oldPath,
      rhsPath: comparison.newPath,
      hunkNum: hunkIndex + 1,
      hunkTotal,
      languageName: comparison.language,
    },
    options
  );
  return {
    output: [...title, ...rowGroups.flat(), []],
    state: finalState,
  };
}

/**
 * Render a comparison as two aligned columns, one block per hunk. When one
 * side is empty the other is printed alone as a single numbered column.
 */
export function renderSideBySideStyled(
  comparison: Comparison,
  options: DisplayOptions
): StyledText[] {
  if (comparison.oldText === "") {
    return displaySingleColumn(
      {
        lhsPath: comparison.oldPath,
        rhsPath: comparison.newPath,
        languageName: comparison.language,
        src: comparison.newText,
        side: "rhs",
        positions: comparison.rhsPositions,
      },
      options
    );
  }
  if (comparison.newText === "") {
    return displaySingleColumn(
      {
        lhsPath: comparison.oldPath,
        rhsPath: comparison.newPath,
        languageName: comparison.language,
        src: comparison.oldText,
        side: "lhs",
        positions: comparison.lhsPositions,
      },
      options
    );
  }

  const contexts: PerSide<SideContext> = {
    lhs: sideContext("lhs", comparison.oldText, comparison.lhsPositions, options),
    rhs: sideContext("rhs", comparison.newText, comparison.rhsPositions, options),
  };
  const hunkTotal = comparison.hunks.length;
  const blocks: StyledText[][] = [];
  comparison.hunks.reduce((state: RowState, hunk, index) => {
    const rendered = renderHunk(
      hunk,
      index,
      hunkTotal,
      comparison,
      contexts,
      state,
      options
    );
    blocks.push(rendered.output);
    return rendered.state;
  }, INITIAL_STATE);
  return blocks.flat();
}

/** {@link renderSideBySideStyled} as terminal lines, escaped when colour is on. */
export function renderSideBySide(
  comparison: Comparison,
  options: DisplayOptions
): string[] {
  return renderSideBySideStyled(comparison, options).map(toAnsi);
}
