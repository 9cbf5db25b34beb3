import { describe, it, expect } from "vitest";
import { COLOR_CODE_MARKERS, FormatCodePalette } from "./marker-palette";

describe("COLOR_CODE_MARKERS", () => {
  it("should cover a full sidebar", () => {
    expect(COLOR_CODE_MARKERS.size).toBe(16);
  });

  it("should wrap each code in a reset", () => {
    expect(COLOR_CODE_MARKERS.markerForIndex(0)).toBe("§0§r");
    expect(COLOR_CODE_MARKERS.markerForIndex(10)).toBe("§a§r");
    expect(COLOR_CODE_MARKERS.markerForIndex(15)).toBe("§f§r");
  });

  it("should sort in index order", () => {
    const markers = Array.from({ length: COLOR_CODE_MARKERS.size }, (_, i) =>
      COLOR_CODE_MARKERS.markerForIndex(i)
    );

    expect([...markers].sort()).toEqual(markers);
  });

  it("should throw outside the palette", () => {
    expect(() => COLOR_CODE_MARKERS.markerForIndex(16)).toThrow("Marker index 16 out of range [0, 16)");
    expect(() => COLOR_CODE_MARKERS.markerForIndex(-1)).toThrow(RangeError);
    expect(() => COLOR_CODE_MARKERS.markerForIndex(1.5)).toThrow(RangeError);
  });
});

describe("FormatCodePalette", () => {
  it("should reject repeated codes", () => {
    expect(() => new FormatCodePalette("0120")).toThrow('Marker codes must be distinct, got "0120"');
  });
});
