/**
 * Fixed, ordered set of invisible markers used to keep tied rows
 * in a stable order on the client.
 */
export interface MarkerPalette {
  /** Number of distinct markers available */
  readonly size: number;

  /**
   * Marker for the `index`-th entry of a tie run.
   * Markers must sort lexically in index order.
   *
   * @throws RangeError when `index` is outside the palette
   */
  markerForIndex(index: number): string;
}

/** Formatting escape used by the client's text renderer */
export const FORMAT_ESCAPE = "§";

/**
 * Palette built from formatting codes: each marker switches to a color
 * and immediately resets, so nothing of it is drawn.
 */
export class FormatCodePalette implements MarkerPalette {
  private readonly markers: readonly string[];

  constructor(codes: string) {
    if (new Set(codes).size !== codes.length) {
      throw new Error(`Marker codes must be distinct, got "${codes}"`);
    }
    this.markers = Array.from(codes, (code) => `${FORMAT_ESCAPE}${code}${FORMAT_ESCAPE}r`);
  }

  get size(): number {
    return this.markers.length;
  }

  markerForIndex(index: number): string {
    if (!Number.isInteger(index) || index < 0 || index >= this.markers.length) {
      throw new RangeError(`Marker index ${index} out of range [0, ${this.markers.length})`);
    }
    return this.markers[index];
  }
}

/**
 * The sixteen color codes, in sort order. Enough for a full sidebar of 15 rows;
 * keep this in mind if the row limit is ever raised.
 */
export const COLOR_CODE_MARKERS: MarkerPalette = new FormatCodePalette("0123456789abcdef");
