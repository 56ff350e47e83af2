/**
 * Zero-based index into one side's line table. Rendered one-indexed.
 */
export type LineNumber = number;

/**
 * One output row. Either side may be absent (an insertion or deletion row),
 * never both.
 */
export type AlignedLinePair = readonly [
  LineNumber | undefined,
  LineNumber | undefined,
];

export interface Hunk {
  lines: readonly AlignedLinePair[];
  novelLhs: ReadonlySet<LineNumber>;
  novelRhs: ReadonlySet<LineNumber>;
}

/** Half-open codepoint column range on a single line. */
export interface SingleLineSpan {
  line: LineNumber;
  startCol: number;
  endCol: number;
}

export type TokenKind =
  | "normal"
  | "string"
  | "type"
  | "comment"
  | "keyword"
  | "delimiter"
  | "error";

export interface MatchKind {
  type: "unchanged" | "novel" | "novelWord";
  highlight: TokenKind;
}

export interface MatchedPos {
  kind: MatchKind;
  pos: SingleLineSpan;
}

export type Side = "lhs" | "rhs";

export function isNovel(kind: MatchKind) {
  return kind.type !== "unchanged";
}

export interface Comparison {
  oldPath: string;
  newPath: string;
  language: string;
  inVcs: boolean;
  oldText: string;
  newText: string;
  hunks: readonly Hunk[];
  lhsPositions: readonly MatchedPos[];
  rhsPositions: readonly MatchedPos[];
}
