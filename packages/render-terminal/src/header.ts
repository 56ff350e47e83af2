import type { Background } from "@twincol/core";
import type { StyledText } from "./ansi.js";
import { NO_STYLE, plain, styled } from "./ansi.js";

export interface HeaderOptions {
  useColor: boolean;
  background: Background;
  inVcs: boolean;
}

export interface HeaderParams {
  lhsPath: string;
  rhsPath: string;
  hunkNum: number;
  hunkTotal: number;
  languageName: string;
}

function pathText(path: string, hunkNum: number, options: HeaderOptions) {
  if (!options.useColor) {
    return styled(path, NO_STYLE);
  }
  return styled(path, {
    fg: options.background === "dark" ? "brightYellow" : "yellow",
    bold: hunkNum === 1,
  });
}

/**
 * Header lines for one hunk. A rename line comes first when a version
 * control system hands over two different paths.
 */
export function header(
  params: HeaderParams,
  options: HeaderOptions
): StyledText[] {
  const divider =
    params.hunkTotal === 1 ? "" : `${params.hunkNum}/${params.hunkTotal} --- `;
  const rhsPath = pathText(params.rhsPath, params.hunkNum, options);
  const title = [...rhsPath, ...plain(` --- ${divider}${params.languageName}`)];

  if (
    params.hunkNum === 1 &&
    options.inVcs &&
    params.lhsPath !== params.rhsPath
  ) {
    const lhsPath = pathText(params.lhsPath, params.hunkNum, options);
    const renamed = [
      ...plain("Renamed "),
      ...lhsPath,
      ...plain(" to "),
      ...rhsPath,
    ];
    return [renamed, title];
  }
  return [title];
}
