export type { MarkerPalette } from "./marker-palette";
export { COLOR_CODE_MARKERS, FORMAT_ESCAPE, FormatCodePalette } from "./marker-palette";
