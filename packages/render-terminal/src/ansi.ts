import { codepointLength } from "@twincol/core";

export type Color =
  | "red"
  | "green"
  | "yellow"
  | "magenta"
  | "brightRed"
  | "brightGreen"
  | "brightYellow";

export interface Style {
  readonly fg?: Color;
  /** xterm 256-colour palette index. */
  readonly bg?: number;
  readonly bold?: boolean;
  readonly dim?: boolean;
  readonly italic?: boolean;
  readonly underline?: boolean;
}

export interface Segment {
  readonly text: string;
  readonly style: Style;
}

/**
 * Text as a run of styled segments. Escape sequences are only produced by
 * {@link toAnsi}, so widths are always measured on the visible text.
 */
export type StyledText = readonly Segment[];

export const NO_STYLE: Style = {};

const RESET = "\u001b[0m";

const foregroundCodes: Record<Color, number> = {
  red: 31,
  green: 32,
  yellow: 33,
  magenta: 35,
  brightRed: 91,
  brightGreen: 92,
  brightYellow: 93,
};

export function styled(text: string, style: Style): StyledText {
  return text.length > 0 ? [{ text, style }] : [];
}

export function plain(text: string): StyledText {
  return styled(text, NO_STYLE);
}

export function visibleWidth(text: StyledText) {
  return text.reduce(
    (width, segment) => width + codepointLength(segment.text),
    0
  );
}

/** Pad with unstyled spaces up to `width` visible columns. */
export function padEnd(text: StyledText, width: number): StyledText {
  const missing = width - visibleWidth(text);
  if (missing <= 0) {
    return text;
  }
  return [...text, ...plain(" ".repeat(missing))];
}

/** Layer `extra` over every segment's own style. */
export function restyle(text: StyledText, extra: Style): StyledText {
  return text.map((segment) => ({
    text: segment.text,
    style: { ...segment.style, ...extra },
  }));
}

export function withBackground(text: StyledText, bg: number): StyledText {
  return restyle(text, { bg });
}

function sgrCodes(style: Style) {
  const codes: string[] = [];
  if (style.bold) {
    codes.push("1");
  }
  if (style.dim) {
    codes.push("2");
  }
  if (style.italic) {
    codes.push("3");
  }
  if (style.underline) {
    codes.push("4");
  }
  if (style.fg) {
    codes.push(String(foregroundCodes[style.fg]));
  }
  if (style.bg !== undefined) {
    codes.push(`48;5;${style.bg}`);
  }
  return codes;
}

export function toAnsi(text: StyledText) {
  return text
    .map((segment) => {
      const codes = sgrCodes(segment.style);
      if (codes.length === 0) {
        return segment.text;
      }
      return `\u001b[${codes.join(";")}m${segment.text}${RESET}`;
    })
    .join("");
}

export function toPlain(text: StyledText) {
  return text.map((segment) => segment.text).join("");
}
