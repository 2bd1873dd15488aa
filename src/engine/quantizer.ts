// ============================================================================
// quantizer.ts - Intensity to glyph mapping
// ============================================================================

import { ConfigError, RenderInvariantError } from "../core/errors";
import { INTENSITY_MAX, INTENSITY_MIN } from "../core/types";

const LEVELS = INTENSITY_MAX - INTENSITY_MIN + 1;

/**
 * Maps intensities 0-9 onto a palette ordered dark to bright. A palette of
 * n glyphs gives intensity v the glyph at round(v * (n - 1) / 9): 0 is the
 * first glyph, 9 the last, and the mapping never decreases.
 */
export class GlyphTable {
  readonly palette: readonly string[];
  private readonly table: string[];

  constructor(palette: string) {
    // Array.from keeps astral-plane glyphs in one piece
    this.palette = Array.from(palette);
    const n = this.palette.length;
    if (n === 0) {
      throw new ConfigError("palette must not be empty");
    }

    this.table = new Array<string>(LEVELS);
    for (let v = 0; v < LEVELS; v++) {
      this.table[v] = this.palette[Math.round((v * (n - 1)) / (LEVELS - 1))];
    }
  }

  glyphFor(value: number): string {
    if (!Number.isInteger(value) || value < INTENSITY_MIN || value > INTENSITY_MAX) {
      throw new RenderInvariantError(`intensity ${value} is outside ${INTENSITY_MIN}-${INTENSITY_MAX}`);
    }
    return this.table[value - INTENSITY_MIN];
  }
}
