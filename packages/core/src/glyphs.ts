/**
 * Glyph tables used by the drawing tools.
 */

export type BorderStyle = "single" | "double" | "heavy" | "rounded" | "ascii" | "dotted";

export const BORDER_STYLES: readonly BorderStyle[] = [
  "single",
  "double",
  "heavy",
  "rounded",
  "ascii",
  "dotted",
];

export interface BorderChars {
  topLeft: string;
  topRight: string;
  bottomLeft: string;
  bottomRight: string;
  horizontal: string;
  vertical: string;
}

export const BORDER_CHARS: Readonly<Record<BorderStyle, BorderChars>> = {
  single: {
    topLeft: "┌",
    topRight: "┐",
    bottomLeft: "└",
    bottomRight: "┘",
    horizontal: "─",
    vertical: "│",
  },
  double: {
    topLeft: "╔",
    topRight: "╗",
    bottomLeft: "╚",
    bottomRight: "╝",
    horizontal: "═",
    vertical: "║",
  },
  heavy: {
    topLeft: "┏",
    topRight: "┓",
    bottomLeft: "┗",
    bottomRight: "┛",
    horizontal: "━",
    vertical: "┃",
  },
  rounded: {
    topLeft: "╭",
    topRight: "╮",
    bottomLeft: "╰",
    bottomRight: "╯",
    horizontal: "─",
    vertical: "│",
  },
  ascii: {
    topLeft: "+",
    topRight: "+",
    bottomLeft: "+",
    bottomRight: "+",
    horizontal: "-",
    vertical: "|",
  },
  dotted: {
    topLeft: "*",
    topRight: "*",
    bottomLeft: "*",
    bottomRight: "*",
    horizontal: "*",
    vertical: "*",
  },
};

export function parseBorderStyle(name: string): BorderStyle | undefined {
  const lower = name.toLowerCase();
  return BORDER_STYLES.find((style) => style === lower);
}

/** Straight-segment glyphs shared by the line, arrow and diamond tools. */
export const LINE_CHARS = {
  horizontal: "─",
  vertical: "│",
  /** Down-right / up-left. */
  backslash: "\\",
  /** Up-right / down-left. */
  slash: "/",
} as const;

export const ARROWHEADS = {
  up: "▲",
  down: "▼",
  right: "►",
  left: "◄",
  /** Steep diagonals. */
  steepBackslash: "╲",
  steepSlash: "╱",
  /** 3:10–7:10 band, plain ASCII. */
  right45: ">",
  left45: "<",
  /** Zero-length arrow. */
  dot: "•",
} as const;

export const DIAMOND_POINT = "◆";

export const DEFAULT_FREEHAND_CHAR = "*";
