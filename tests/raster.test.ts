import { describe, it, expect } from "vitest";
import { Raster, TRANSPARENT, parseColor, sameColor } from "../src/raster/raster.js";
import { decodePng, encodePng } from "../src/raster/png.js";
import { WHITE, RED } from "./helpers/images.js";

describe("parseColor", () => {
  it("parses #rrggbb as opaque", () => {
    expect(parseColor("#c8102e")).toEqual({ r: 200, g: 16, b: 46, a: 255 });
  });

  it("parses #rrggbbaa with alpha", () => {
    expect(parseColor("#00006680")).toEqual({ r: 0, g: 0, b: 102, a: 128 });
  });

  it("rejects other formats", () => {
    expect(parseColor("red")).toBeUndefined();
    expect(parseColor("#fff")).toBeUndefined();
    expect(parseColor("c8102e")).toBeUndefined();
  });
});

describe("Raster", () => {
  it("rejects non-integer or empty sizes", () => {
    expect(() => new Raster(0, 10)).toThrow(RangeError);
    expect(() => new Raster(2.5, 10)).toThrow(RangeError);
  });

  it("rejects a pixel buffer of the wrong length", () => {
    expect(() => new Raster(2, 2, new Uint8ClampedArray(15))).toThrow(RangeError);
  });

  it("starts fully transparent", () => {
    const raster = new Raster(3, 3);
    expect(raster.getPixel(1, 1)).toEqual(TRANSPARENT);
  });

  it("fillRect clips to the raster bounds", () => {
    const raster = Raster.filled(4, 4, WHITE);
    raster.fillRect(2, 2, 10, 10, RED);
    expect(raster.getPixel(1, 1)).toEqual(WHITE);
    expect(raster.getPixel(2, 2)).toEqual(RED);
    expect(raster.getPixel(3, 3)).toEqual(RED);
    expect(raster.getPixel(3, 1)).toEqual(WHITE);
  });

  it("ignores out-of-bounds setPixel and throws on out-of-bounds getPixel", () => {
    const raster = Raster.filled(2, 2, WHITE);
    raster.setPixel(5, 5, RED);
    expect(() => raster.getPixel(5, 5)).toThrow(RangeError);
  });

  it("clone is independent of the original", () => {
    const raster = Raster.filled(2, 2, WHITE);
    const copy = raster.clone();
    copy.setPixel(0, 0, RED);
    expect(raster.getPixel(0, 0)).toEqual(WHITE);
    expect(copy.getPixel(0, 0)).toEqual(RED);
  });
});

describe("Raster.composite", () => {
  it("copies opaque source pixels", () => {
    const dst = Raster.filled(4, 4, WHITE);
    dst.composite(Raster.filled(2, 2, RED), 1, 1);
    expect(dst.getPixel(0, 0)).toEqual(WHITE);
    expect(dst.getPixel(1, 1)).toEqual(RED);
    expect(dst.getPixel(2, 2)).toEqual(RED);
    expect(dst.getPixel(3, 3)).toEqual(WHITE);
  });

  it("leaves the destination untouched under transparent source pixels", () => {
    const dst = Raster.filled(2, 2, WHITE);
    dst.composite(new Raster(2, 2), 0, 0);
    expect(dst.getPixel(0, 0)).toEqual(WHITE);
  });

  it("blends semi-transparent pixels source-over", () => {
    const dst = Raster.filled(1, 1, WHITE);
    dst.composite(Raster.filled(1, 1, { r: 255, g: 0, b: 0, a: 128 }), 0, 0);
    expect(dst.getPixel(0, 0)).toEqual({ r: 255, g: 127, b: 127, a: 255 });
  });

  it("keeps source color and alpha over a transparent destination", () => {
    const dst = new Raster(1, 1);
    dst.composite(Raster.filled(1, 1, { r: 10, g: 20, b: 30, a: 128 }), 0, 0);
    expect(dst.getPixel(0, 0)).toEqual({ r: 10, g: 20, b: 30, a: 128 });
  });

  it("clips a source that hangs over the edge", () => {
    const dst = Raster.filled(3, 3, WHITE);
    dst.composite(Raster.filled(3, 3, RED), -2, -2);
    expect(dst.getPixel(0, 0)).toEqual(RED);
    expect(dst.getPixel(1, 0)).toEqual(WHITE);
    expect(dst.getPixel(0, 1)).toEqual(WHITE);
  });
});

describe("Raster.paste", () => {
  it("replaces covered pixels including alpha", () => {
    const dst = Raster.filled(3, 3, WHITE);
    dst.paste(new Raster(1, 1), 1, 1);
    expect(dst.getPixel(1, 1)).toEqual(TRANSPARENT);
    expect(dst.getPixel(0, 0)).toEqual(WHITE);
  });
});

describe("PNG codec", () => {
  it("keeps size and pixels through encode and decode", () => {
    const raster = Raster.filled(5, 3, WHITE);
    raster.setPixel(4, 2, RED);
    const decoded = decodePng(encodePng(raster));
    expect(decoded.width).toBe(5);
    expect(decoded.height).toBe(3);
    expect(sameColor(decoded.getPixel(4, 2), RED)).toBe(true);
    expect(decoded.getPixel(0, 0)).toEqual(WHITE);
  });

  it("throws on bytes that are not a PNG", () => {
    expect(() => decodePng(Buffer.from("definitely not a png"))).toThrow();
  });
});
