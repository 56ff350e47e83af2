import type { Comparison, MatchedPos } from "@twincol/core";
import { decodeComparisonJson } from "@twincol/core";
import { describe, expect, test } from "vitest";
import { toPlain, visibleWidth } from "../src/ansi.js";
import type { DisplayOptions } from "../src/side-by-side.js";
import {
  renderSideBySide,
  renderSideBySideStyled,
} from "../src/side-by-side.js";

const plainOptions: DisplayOptions = {
  displayWidth: 20,
  useColor: false,
  background: "dark",
  displayMode: "side-by-side",
  syntaxHighlight: true,
  inVcs: false,
};

const colorOptions: DisplayOptions = { ...plainOptions, useColor: true };

const novelAt = (line: number, startCol: number, endCol: number): MatchedPos => ({
  kind: { type: "novel", highlight: "normal" },
  pos: { line, startCol, endCol },
});

const comparison = (overrides: Partial<Comparison>): Comparison => ({
  oldPath: "notes.txt",
  newPath: "notes.txt",
  language: "Text",
  inVcs: false,
  oldText: "",
  newText: "",
  hunks: [],
  lhsPositions: [],
  rhsPositions: [],
  ...overrides,
});

const fooBar = comparison({
  oldText: "foo",
  newText: "bar",
  hunks: [{ lines: [[0, 0]], novelLhs: new Set([0]), novelRhs: new Set([0]) }],
  lhsPositions: [novelAt(0, 0, 3)],
  rhsPositions: [novelAt(0, 0, 3)],
});

const insertion = comparison({
  oldText: "a\nb\n",
  newText: "a\nx\nb\n",
  hunks: [
    {
      lines: [
        [0, 0],
        [undefined, 1],
        [1, 2],
      ],
      novelLhs: new Set(),
      novelRhs: new Set([1]),
    },
  ],
  rhsPositions: [novelAt(1, 0, 1)],
});

describe("renderSideBySide", () => {
  test("pairs a changed line with its replacement", () => {
    expect(renderSideBySide(fooBar, plainOptions)).toEqual([
      "notes.txt --- Text",
      `1 foo${" ".repeat(5)}1 bar${" ".repeat(5)}`,
      "",
    ]);
  });

  test("paints both sides of a changed row with their backgrounds", () => {
    const [, row] = renderSideBySide(fooBar, colorOptions);
    expect(row).toBe(
      [
        "\u001b[91;48;5;224m1 \u001b[0m",
        "\u001b[91;48;5;224mfoo\u001b[0m",
        "\u001b[48;5;224m    \u001b[0m",
        " ",
        "\u001b[92;48;5;194m1 \u001b[0m",
        "\u001b[92;48;5;194mbar\u001b[0m",
        "\u001b[48;5;194m     \u001b[0m",
      ].join("")
    );
  });

  test("shows a file added from nothing as one numbered column", () => {
    const added = comparison({
      oldPath: "hello.py",
      newPath: "hello.py",
      language: "Python",
      newText: "print(123)\n",
    });
    expect(renderSideBySide(added, plainOptions)).toEqual([
      "hello.py --- Python",
      "1 print(123)",
      "",
    ]);
  });

  test("colours a removed file in the removal colour", () => {
    const removed = comparison({ oldText: "gone\n" });
    expect(renderSideBySide(removed, colorOptions)).toEqual([
      "\u001b[1;93mnotes.txt\u001b[0m --- Text",
      "\u001b[91m1 \u001b[0m\u001b[91mgone\u001b[0m",
      "",
    ]);
  });

  test("widens the single column for longer files", () => {
    const text = Array.from({ length: 10 }, (_, i) => `line ${i}`).join("\n");
    const lines = renderSideBySide(comparison({ newText: text }), plainOptions);
    expect(lines[1]).toBe(" 1 line 0");
    expect(lines[10]).toBe("10 line 9");
  });

  test("prints only the new side when the old side is unchanged", () => {
    expect(renderSideBySide(insertion, { ...plainOptions, displayWidth: 30 })).toEqual([
      "notes.txt --- Text",
      "1 1 a",
      `. 2 x${" ".repeat(25)}`,
      "2 3 b",
      "",
    ]);
  });

  test("a highlighted fast-path row spans the whole terminal", () => {
    const rows = renderSideBySideStyled(insertion, {
      ...colorOptions,
      displayWidth: 30,
    });
    const inserted = rows[2] ?? [];
    expect(toPlain(inserted)).toBe(`. 2 x${" ".repeat(25)}`);
    expect(visibleWidth(inserted)).toBe(30);
    expect(inserted.every((segment) => segment.style.bg === 194)).toBe(true);
  });

  test("a pure context hunk shares one number cell", () => {
    const context = comparison({
      oldText: "a\nb",
      newText: "a\nb",
      hunks: [
        {
          lines: [
            [0, 0],
            [1, 1],
          ],
          novelLhs: new Set(),
          novelRhs: new Set(),
        },
      ],
    });
    expect(renderSideBySide(context, plainOptions)).toEqual([
      "notes.txt --- Text",
      "1 a",
      "2 b",
      "",
    ]);
  });

  test("show-both mode keeps both columns for one-sided changes", () => {
    const rows = renderSideBySide(insertion, {
      ...plainOptions,
      displayWidth: 30,
      displayMode: "side-by-side-show-both",
    });
    expect(rows[1]).toBe(`1 a${" ".repeat(11)} 1 a${" ".repeat(12)}`);
    expect(rows[2]).toBe(`. ${" ".repeat(12)} 2 x${" ".repeat(12)}`);
  });

  test("wraps long lines and pads the shorter side", () => {
    const wrapped = comparison({
      oldText: "abcdefghij",
      newText: "xy",
      hunks: [
        { lines: [[0, 0]], novelLhs: new Set([0]), novelRhs: new Set([0]) },
      ],
      lhsPositions: [novelAt(0, 0, 10)],
      rhsPositions: [novelAt(0, 0, 2)],
    });
    expect(renderSideBySide(wrapped, plainOptions)).toEqual([
      "notes.txt --- Text",
      `1 abcdefg 1 xy${" ".repeat(6)}`,
      `. hij${" ".repeat(4)} . ${" ".repeat(8)}`,
      "",
    ]);

    const styledRows = renderSideBySideStyled(wrapped, colorOptions);
    for (const row of styledRows.slice(1, 3)) {
      expect(visibleWidth(row)).toBe(20);
    }
  });

  test("carries the last shown line number into the next hunk", () => {
    const twoHunks = comparison({
      oldText: "a\nb\nc",
      newText: "a\nb\nc\nd",
      hunks: [
        { lines: [[0, 0]], novelLhs: new Set(), novelRhs: new Set() },
        {
          lines: [
            [2, 2],
            [undefined, 3],
          ],
          novelLhs: new Set(),
          novelRhs: new Set([3]),
        },
      ],
      rhsPositions: [novelAt(3, 0, 1)],
    });
    expect(renderSideBySide(twoHunks, plainOptions)).toEqual([
      "notes.txt --- 1/2 --- Text",
      "1 a",
      "",
      "notes.txt --- 2/2 --- Text",
      "3 3 c",
      `  4 d${" ".repeat(15)}`,
      "",
    ]);
  });

  test("renders a decoded payload", () => {
    const decoded = decodeComparisonJson(
      "inline",
      JSON.stringify({
        oldPath: "a.txt",
        newPath: "b.txt",
        inVcs: true,
        oldText: "foo",
        newText: "bar",
        hunks: [{ lines: [[0, 0]], novelLhs: [0], novelRhs: [0] }],
        lhsPositions: [
          {
            kind: { type: "novel", highlight: "normal" },
            pos: { line: 0, startCol: 0, endCol: 3 },
          },
        ],
        rhsPositions: [
          {
            kind: { type: "novel", highlight: "normal" },
            pos: { line: 0, startCol: 0, endCol: 3 },
          },
        ],
      })
    );
    expect(
      renderSideBySide(decoded, { ...plainOptions, inVcs: decoded.inVcs })
    ).toEqual([
      "Renamed a.txt to b.txt",
      "b.txt --- Text",
      `1 foo${" ".repeat(5)}1 bar${" ".repeat(5)}`,
      "",
    ]);
  });

  test("colours each side of a wrapped row independently", () => {
    const wrapped = comparison({
      oldText: "abcdefghij\nq",
      newText: "xy\nr",
      hunks: [
        {
          lines: [
            [0, 0],
            [1, 1],
          ],
          novelLhs: new Set([0, 1]),
          novelRhs: new Set([1]),
        },
      ],
      lhsPositions: [novelAt(0, 0, 10), novelAt(1, 0, 1)],
      rhsPositions: [
        {
          kind: { type: "unchanged", highlight: "normal" },
          pos: { line: 0, startCol: 0, endCol: 2 },
        },
        novelAt(1, 0, 1),
      ],
    });
    const rows = renderSideBySideStyled(wrapped, colorOptions);
    expect(rows[1]).toEqual([
      { text: "1 ", style: { fg: "brightRed", bg: 224 } },
      { text: "abcdefg", style: { fg: "brightRed", bg: 224 } },
      { text: " ", style: {} },
      { text: "1 ", style: {} },
      { text: "xy", style: {} },
      { text: "      ", style: {} },
    ]);
    expect(rows[2]).toEqual([
      { text: ". ", style: { dim: true, fg: "brightRed", bg: 224 } },
      { text: "hij", style: { fg: "brightRed", bg: 224 } },
      { text: "    ", style: { bg: 224 } },
      { text: " ", style: {} },
      { text: ". ", style: { dim: true } },
      { text: "        ", style: {} },
    ]);
  });

  test("prints only the old side when the new side is unchanged", () => {
    const deletion = comparison({
      oldText: "a\nx\nb",
      newText: "a\nb\nc",
      hunks: [
        {
          lines: [
            [0, 0],
            [1, undefined],
            [2, 1],
            [undefined, 2],
          ],
          novelLhs: new Set([1]),
          novelRhs: new Set(),
        },
      ],
      lhsPositions: [novelAt(1, 0, 1)],
    });
    expect(renderSideBySide(deletion, plainOptions)).toEqual([
      "notes.txt --- Text",
      "1 1 a",
      `2 . x${" ".repeat(15)}`,
      "3 2 b",
      "  3 ",
      "",
    ]);

    const rows = renderSideBySideStyled(deletion, colorOptions);
    const removed = rows[2] ?? [];
    expect(toPlain(removed)).toBe(`2 . x${" ".repeat(15)}`);
    expect(removed.every((segment) => segment.style.bg === 224)).toBe(true);
    expect(rows[4]).toEqual([
      { text: "  ", style: { dim: true } },
      { text: "3 ", style: {} },
    ]);
  });

  test("renders very large hunks", () => {
    const count = 40_000;
    const text = Array.from({ length: count }, (_, i) => `line ${i}`).join(
      "\n"
    );
    const large = comparison({
      oldText: text,
      newText: text,
      hunks: [
        {
          lines: Array.from({ length: count }, (_, i) => [i, i] as const),
          novelLhs: new Set(),
          novelRhs: new Set(),
        },
      ],
    });
    const rows = renderSideBySide(large, { ...plainOptions, displayWidth: 80 });
    expect(rows).toHaveLength(count + 2);
    expect(rows[1]).toBe("    1 line 0");
    expect(rows[count]).toBe("40000 line 39999");
  });
});
