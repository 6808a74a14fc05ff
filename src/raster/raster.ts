// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
/**
 * A single RGBA color, each channel 0-255.
 */
export interface Rgba {
  readonly r: number;
  readonly g: number;
  readonly b: number;
  readonly a: number;
}

export const TRANSPARENT: Rgba = Object.freeze({ r: 0, g: 0, b: 0, a: 0 });

const HEX_COLOR = /^#([0-9a-f]{2})([0-9a-f]{2})([0-9a-f]{2})([0-9a-f]{2})?$/i;

/**
 * Parse a `#rrggbb` or `#rrggbbaa` color string.
 * Returns undefined for anything else.
 */
export function parseColor(hex: string): Rgba | undefined {
  const match = HEX_COLOR.exec(hex);
  if (!match) return undefined;
  const [, r, g, b, a] = match;
  return Object.freeze({
    r: parseInt(r, 16),
    g: parseInt(g, 16),
    b: parseInt(b, 16),
    a: a === undefined ? 255 : parseInt(a, 16),
  });
}

/** True when both colors have identical channels. */
export function sameColor(x: Rgba, y: Rgba): boolean {
  return x.r === y.r && x.g === y.g && x.b === y.b && x.a === y.a;
}

/**
 * Row-major RGBA pixel grid with straight (non-premultiplied) alpha.
 *
 * Drawing calls clip to the raster bounds, so callers may pass shapes that
 * extend past the edges.
 */
export class Raster {
  readonly width: number;
  readonly height: number;
  readonly data: Uint8ClampedArray;

  constructor(width: number, height: number, data?: Uint8ClampedArray) {
    if (!Number.isInteger(width) || !Number.isInteger(height) || width < 1 || height < 1) {
      throw new RangeError(`Invalid raster size ${width}x${height}`);
    }
    const length = width * height * 4;
    if (data && data.length !== length) {
      throw new RangeError(`Pixel buffer has ${data.length} bytes, expected ${length}`);
    }
    this.width = width;
    this.height = height;
    this.data = data ?? new Uint8ClampedArray(length);
  }

  /** Create a raster filled with a single color. */
  static filled(width: number, height: number, color: Rgba): Raster {
    const raster = new Raster(width, height);
    raster.fillRect(0, 0, width, height, color);
    return raster;
  }

  clone(): Raster {
    return new Raster(this.width, this.height, new Uint8ClampedArray(this.data));
  }

  contains(x: number, y: number): boolean {
    return x >= 0 && y >= 0 && x < this.width && y < this.height;
  }

  getPixel(x: number, y: number): Rgba {
    if (!this.contains(x, y)) {
      throw new RangeError(`Pixel (${x}, ${y}) is outside ${this.width}x${this.height}`);
    }
    const i = (y * this.width + x) * 4;
    const d = this.data;
    return { r: d[i], g: d[i + 1], b: d[i + 2], a: d[i + 3] };
  }

  /** Overwrite one pixel. Out-of-bounds writes are ignored. */
  setPixel(x: number, y: number, color: Rgba): void {
    if (!this.contains(x, y)) return;
    const i = (y * this.width + x) * 4;
    this.data[i] = color.r;
    this.data[i + 1] = color.g;
    this.data[i + 2] = color.b;
    this.data[i + 3] = color.a;
  }

  /** Overwrite an axis-aligned rectangle (no blending). */
  fillRect(x: number, y: number, width: number, height: number, color: Rgba): void {
    const x0 = Math.max(0, Math.floor(x));
    const y0 = Math.max(0, Math.floor(y));
    const x1 = Math.min(this.width, Math.floor(x + width));
    const y1 = Math.min(this.height, Math.floor(y + height));
    for (let py = y0; py < y1; py++) {
      for (let px = x0; px < x1; px++) {
        this.setPixel(px, py, color);
      }
    }
  }

  /**
   * Composite `source` over this raster with its top-left corner at
   * (dx, dy), using the source alpha channel as the blend mask.
   */
  composite(source: Raster, dx: number, dy: number): void {
    for (let sy = 0; sy < source.height; sy++) {
      const ty = sy + dy;
      if (ty < 0 || ty >= this.height) continue;
      for (let sx = 0; sx < source.width; sx++) {
        const tx = sx + dx;
        if (tx < 0 || tx >= this.width) continue;
        const si = (sy * source.width + sx) * 4;
        const sa = source.data[si + 3];
        if (sa === 0) continue;
        const ti = (ty * this.width + tx) * 4;
        if (sa === 255) {
          this.data[ti] = source.data[si];
          this.data[ti + 1] = source.data[si + 1];
          this.data[ti + 2] = source.data[si + 2];
          this.data[ti + 3] = 255;
          continue;
        }
        blendOver(this.data, ti, source.data, si);
      }
    }
  }

  /** Copy `source` onto this raster at (dx, dy), replacing every covered pixel. */
  paste(source: Raster, dx: number, dy: number): void {
    for (let sy = 0; sy < source.height; sy++) {
      const ty = sy + dy;
      if (ty < 0 || ty >= this.height) continue;
      const x0 = Math.max(0, dx);
      const x1 = Math.min(this.width, dx + source.width);
      if (x1 <= x0) continue;
      const from = (sy * source.width + (x0 - dx)) * 4;
      const to = from + (x1 - x0) * 4;
      this.data.set(source.data.subarray(from, to), (ty * this.width + x0) * 4);
    }
  }
}

/** Porter-Duff source-over of one straight-alpha pixel onto another. */
function blendOver(
  dst: Uint8ClampedArray,
  di: number,
  src: Uint8ClampedArray,
  si: number,
): void {
  const sa = src[si + 3] / 255;
  const da = dst[di + 3] / 255;
  const outA = sa + da * (1 - sa);
  for (let c = 0; c < 3; c++) {
    const sc = src[si + c];
    const dc = dst[di + c];
    dst[di + c] = Math.round((sc * sa + dc * da * (1 - sa)) / outA);
  }
  dst[di + 3] = Math.round(outA * 255);
}
