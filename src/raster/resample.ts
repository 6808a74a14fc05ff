// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
import { Raster } from "./raster.js";

const LANCZOS_LOBES = 3;

function sinc(x: number): number {
  if (x === 0) return 1;
  const px = Math.PI * x;
  return Math.sin(px) / px;
}

function lanczos(x: number): number {
  return Math.abs(x) < LANCZOS_LOBES ? sinc(x) * sinc(x / LANCZOS_LOBES) : 0;
}

interface Contribution {
  first: number;
  weights: number[];
}

/**
 * Normalized Lanczos-3 weights for every destination coordinate. When
 * shrinking, the kernel is widened by the scale factor so every source
 * pixel contributes.
 */
function contributions(srcSize: number, dstSize: number): Contribution[] {
  const scale = srcSize / dstSize;
  const filterScale = Math.max(scale, 1);
  const support = LANCZOS_LOBES * filterScale;
  const result: Contribution[] = [];

  for (let i = 0; i < dstSize; i++) {
    const center = (i + 0.5) * scale;
    const first = Math.max(0, Math.floor(center - support));
    const last = Math.min(srcSize - 1, Math.ceil(center + support));
    const weights: number[] = [];
    let total = 0;
    for (let j = first; j <= last; j++) {
      const w = lanczos((j + 0.5 - center) / filterScale);
      weights.push(w);
      total += w;
    }
    result.push({ first, weights: weights.map((w) => (total === 0 ? 0 : w / total)) });
  }
  return result;
}

/**
 * Resample a raster to `width × height` with a Lanczos-3 filter.
 *
 * Filtering runs on premultiplied alpha so fully transparent pixels do not
 * bleed their (meaningless) color into visible neighbours.
 */
export function resize(source: Raster, width: number, height: number): Raster {
  if (width === source.width && height === source.height) return source.clone();

  const src = source.data;
  const premultiplied = new Float64Array(src.length);
  for (let i = 0; i < src.length; i += 4) {
    const a = src[i + 3] / 255;
    premultiplied[i] = src[i] * a;
    premultiplied[i + 1] = src[i + 1] * a;
    premultiplied[i + 2] = src[i + 2] * a;
    premultiplied[i + 3] = src[i + 3];
  }

  // Horizontal pass: source.height rows of `width` pixels.
  const columns = contributions(source.width, width);
  const horizontal = new Float64Array(width * source.height * 4);
  for (let y = 0; y < source.height; y++) {
    for (let x = 0; x < width; x++) {
      const { first, weights } = columns[x];
      const out = (y * width + x) * 4;
      weights.forEach((w, k) => {
        const s = (y * source.width + first + k) * 4;
        for (let c = 0; c < 4; c++) horizontal[out + c] += premultiplied[s + c] * w;
      });
    }
  }

  // Vertical pass into the destination.
  const rows = contributions(source.height, height);
  const result = new Raster(width, height);
  const dst = result.data;
  const acc = [0, 0, 0, 0];
  for (let y = 0; y < height; y++) {
    const { first, weights } = rows[y];
    for (let x = 0; x < width; x++) {
      acc.fill(0);
      weights.forEach((w, k) => {
        const s = ((first + k) * width + x) * 4;
        for (let c = 0; c < 4; c++) acc[c] += horizontal[s + c] * w;
      });
      const out = (y * width + x) * 4;
      const alpha = Math.min(255, Math.max(0, acc[3]));
      dst[out + 3] = Math.round(alpha);
      if (alpha === 0) continue;
      for (let c = 0; c < 3; c++) {
        dst[out + c] = Math.round((acc[c] * 255) / alpha);
      }
    }
  }
  return result;
}

/** Luma of an RGB triple, ITU-R 601 weights in 16-bit fixed point. */
export function luminance(r: number, g: number, b: number): number {
  return (r * 19595 + g * 38470 + b * 7471 + 0x8000) >> 16;
}

/**
 * Stretch color channels away from the mean luminance of the visible
 * pixels by `factor` (1 leaves the image unchanged). Alpha is untouched.
 */
export function enhanceContrast(source: Raster, factor: number): Raster {
  const result = source.clone();
  if (factor === 1) return result;

  const d = result.data;
  let sum = 0;
  let count = 0;
  for (let i = 0; i < d.length; i += 4) {
    if (d[i + 3] === 0) continue;
    sum += luminance(d[i], d[i + 1], d[i + 2]);
    count++;
  }
  if (count === 0) return result;

  const mean = Math.floor(sum / count + 0.5);
  for (let i = 0; i < d.length; i += 4) {
    for (let c = 0; c < 3; c++) {
      d[i + c] = Math.round(mean + factor * (d[i + c] - mean));
    }
  }
  return result;
}
