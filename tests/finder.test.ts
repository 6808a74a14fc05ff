import { describe, it, expect } from "vitest";
import { QrcodeEncoder, createQRSpecification } from "../src/qr/encoder.js";
import { finderOrigin, finderPatternSpecs, paintFinderPatterns, FINDER_POSITIONS } from "../src/qr/finder.js";
import { createMemorySink } from "../src/logger.js";
import type { QRMatrix } from "../src/qr/types.js";
import { NAVY, RED, WHITE } from "./helpers/images.js";

// Version 1 (21 modules), 4px modules, 2-module quiet zone: a 100px raster.
function versionOneMatrix(): QRMatrix {
  const encoder = new QrcodeEncoder({ dark: NAVY, light: WHITE });
  const result = encoder.encode(createQRSpecification("aaaaaaa", { modulePixelSize: 4, borderModules: 2 }));
  if (!result.ok) throw result.error;
  return result.value;
}

describe("finderOrigin", () => {
  it("offsets the near corner by the quiet zone and the far corner by moduleCount - 7", () => {
    const matrix = versionOneMatrix();
    expect(finderOrigin(matrix, "top-left")).toEqual({ x: 8, y: 8 });
    expect(finderOrigin(matrix, "top-right")).toEqual({ x: 64, y: 8 });
    expect(finderOrigin(matrix, "bottom-left")).toEqual({ x: 8, y: 64 });
  });
});

describe("finderPatternSpecs", () => {
  it("returns one 7/5/3 spec per corner", () => {
    const specs = finderPatternSpecs(RED, WHITE);
    expect(specs.map((s) => s.position)).toEqual([...FINDER_POSITIONS]);
    for (const spec of specs) {
      expect(spec.outerSideModules).toBe(7);
      expect(spec.innerSideModules).toBe(5);
      expect(spec.centerSideModules).toBe(3);
      expect(spec.outerColor).toEqual(RED);
      expect(spec.innerColor).toEqual(WHITE);
      expect(spec.centerColor).toEqual(RED);
    }
  });
});

describe("paintFinderPatterns", () => {
  it("draws concentric accent, background and accent squares", () => {
    const matrix = versionOneMatrix();
    paintFinderPatterns(matrix, finderPatternSpecs(RED, WHITE), createMemorySink());
    const { raster } = matrix;

    for (const { x, y } of [
      { x: 8, y: 8 },
      { x: 64, y: 8 },
      { x: 8, y: 64 },
    ]) {
      // outer ring: first module of the 28px box
      expect(raster.getPixel(x, y)).toEqual(RED);
      expect(raster.getPixel(x + 27, y + 27)).toEqual(RED);
      expect(raster.getPixel(x + 3, y + 14)).toEqual(RED);
      // background ring: 4..23 minus the center
      expect(raster.getPixel(x + 4, y + 4)).toEqual(WHITE);
      expect(raster.getPixel(x + 23, y + 14)).toEqual(WHITE);
      expect(raster.getPixel(x + 14, y + 7)).toEqual(WHITE);
      // center: 8..19
      expect(raster.getPixel(x + 8, y + 8)).toEqual(RED);
      expect(raster.getPixel(x + 14, y + 14)).toEqual(RED);
      expect(raster.getPixel(x + 19, y + 19)).toEqual(RED);
    }
  });

  it("leaves every pixel outside the three finder boxes unchanged", () => {
    const matrix = versionOneMatrix();
    const before = matrix.raster.clone();
    paintFinderPatterns(matrix, finderPatternSpecs(RED, WHITE), createMemorySink());

    const boxes = FINDER_POSITIONS.map((p) => finderOrigin(matrix, p));
    const inBox = (px: number, py: number) =>
      boxes.some(({ x, y }) => px >= x && px < x + 28 && py >= y && py < y + 28);

    for (let py = 0; py < before.height; py++) {
      for (let px = 0; px < before.width; px++) {
        if (inBox(px, py)) continue;
        expect(matrix.raster.getPixel(px, py)).toEqual(before.getPixel(px, py));
      }
    }
  });

  it("leaves the bottom-right corner without a finder", () => {
    const matrix = versionOneMatrix();
    paintFinderPatterns(matrix, finderPatternSpecs(RED, WHITE), createMemorySink());
    expect(matrix.raster.getPixel(64, 64)).not.toEqual(RED);
  });

  it("logs the number of patterns painted", () => {
    const sink = createMemorySink();
    paintFinderPatterns(versionOneMatrix(), finderPatternSpecs(RED, WHITE), sink);
    expect(sink.messages("info")).toEqual(["Painted 3 custom finder patterns."]);
  });
});
