/**
 * Glyphcaster - Terminal Display
 *
 * Blits a character grid to an ANSI terminal: one write per frame, cursor
 * homed, style tags mapped to SGR foreground colors.
 */

import type { CharGrid, StyleTag } from "../core/types";

// ============================================================
// ANSI sequences
// ============================================================

const ESC = "\x1b[";
export const CURSOR_HOME = `${ESC}H`;
export const SGR_RESET = `${ESC}0m`;
const ALT_SCREEN_ON = `${ESC}?1049h`;
const ALT_SCREEN_OFF = `${ESC}?1049l`;
const CURSOR_HIDE = `${ESC}?25l`;
const CURSOR_SHOW = `${ESC}?25h`;
const CLEAR_SCREEN = `${ESC}2J`;

const STYLE_CODES: Record<string, number> = {
  black: 30,
  red: 31,
  green: 32,
  yellow: 33,
  blue: 34,
  magenta: 35,
  cyan: 36,
  white: 37,
  gray: 90,
  grey: 90,
  brightRed: 91,
  brightGreen: 92,
  brightYellow: 93,
  brightBlue: 94,
  brightMagenta: 95,
  brightCyan: 96,
  brightWhite: 97,
};

/** SGR sequence for a style tag, or "" for tags with no color. */
export function sgrFor(style: StyleTag | undefined): string {
  if (style === undefined) return "";
  const code = STYLE_CODES[style];
  return code === undefined ? "" : `${ESC}${code}m`;
}

// ============================================================
// Frame formatting
// ============================================================

/**
 * Serialize a grid as one frame: cursor home, then rows joined by "\n".
 * With colors on, a color change emits its SGR code and every colored run
 * is reset before the next plain cell and at the end of its row.
 */
export function formatFrame(grid: CharGrid, colors: boolean): string {
  const lines: string[] = [];
  for (const row of grid.cells) {
    let line = "";
    let active = "";
    for (const cell of row) {
      if (colors) {
        const sgr = sgrFor(cell.style);
        if (sgr !== active) {
          line += sgr === "" ? SGR_RESET : sgr;
          active = sgr;
        }
      }
      line += cell.glyph;
    }
    if (active !== "") line += SGR_RESET;
    lines.push(line);
  }
  return CURSOR_HOME + lines.join("\n");
}

// ============================================================
// Display
// ============================================================

/** The parts of a TTY write stream the display uses. */
export interface TerminalOutput {
  write(chunk: string): boolean;
  columns?: number;
  rows?: number;
}

export class TerminalDisplay {
  private entered = false;

  constructor(
    private readonly out: TerminalOutput,
    private readonly colors: boolean,
  ) {}

  /** Switch to the alternate screen and hide the cursor. */
  enter(): void {
    if (this.entered) return;
    this.out.write(ALT_SCREEN_ON + CURSOR_HIDE + CLEAR_SCREEN);
    this.entered = true;
  }

  /** Undo enter(); safe to call more than once. */
  restore(): void {
    if (!this.entered) return;
    this.out.write(SGR_RESET + CURSOR_SHOW + ALT_SCREEN_OFF);
    this.entered = false;
  }

  draw(grid: CharGrid): void {
    this.out.write(formatFrame(grid, this.colors));
  }

  /** Current terminal size, or `fallback` where the stream reports none. */
  size(fallback: { columns: number; rows: number }): { columns: number; rows: number } {
    const columns = this.out.columns;
    const rows = this.out.rows;
    if (!columns || !rows) return fallback;
    return { columns, rows };
  }
}
