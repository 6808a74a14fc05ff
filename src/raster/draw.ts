// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
import type { Raster, Rgba } from "./raster.js";

/** A point in pixel space; (0, 0) is the top-left corner of the raster. */
export interface Point {
  x: number;
  y: number;
}

/**
 * Vertices of a regular polygon.
 *
 * The first vertex sits at `rotationDegrees` (0 = pointing right, -90 =
 * pointing up, since y grows downward) and the rest follow clockwise.
 */
export function regularPolygon(
  center: Point,
  radius: number,
  sides: number,
  rotationDegrees: number,
): Point[] {
  const points: Point[] = [];
  for (let i = 0; i < sides; i++) {
    const angle = ((i * 360) / sides + rotationDegrees) * (Math.PI / 180);
    points.push({
      x: center.x + radius * Math.cos(angle),
      y: center.y + radius * Math.sin(angle),
    });
  }
  return points;
}

/**
 * Fill every pixel whose center lies within `radius` of `center`.
 */
export function fillCircle(raster: Raster, center: Point, radius: number, color: Rgba): void {
  forEachPixelInBox(raster, center.x - radius, center.y - radius, center.x + radius, center.y + radius, (px, py) => {
    if (Math.hypot(px + 0.5 - center.x, py + 0.5 - center.y) <= radius) {
      raster.setPixel(px, py, color);
    }
  });
}

/**
 * Draw a ring of the given width whose outer edge is the circle of
 * `radius` around `center`.
 */
export function strokeCircle(
  raster: Raster,
  center: Point,
  radius: number,
  width: number,
  color: Rgba,
): void {
  const inner = radius - Math.max(1, width);
  forEachPixelInBox(raster, center.x - radius, center.y - radius, center.x + radius, center.y + radius, (px, py) => {
    const d = Math.hypot(px + 0.5 - center.x, py + 0.5 - center.y);
    if (d <= radius && d > inner) {
      raster.setPixel(px, py, color);
    }
  });
}

/**
 * Draw a straight line of the given width between two points. A pixel is
 * painted when its center lies within half the width of the segment.
 */
export function strokeLine(raster: Raster, from: Point, to: Point, width: number, color: Rgba): void {
  const half = Math.max(1, width) / 2;
  const dx = to.x - from.x;
  const dy = to.y - from.y;
  const lengthSq = dx * dx + dy * dy;

  forEachPixelInBox(
    raster,
    Math.min(from.x, to.x) - half,
    Math.min(from.y, to.y) - half,
    Math.max(from.x, to.x) + half,
    Math.max(from.y, to.y) + half,
    (px, py) => {
      const cx = px + 0.5;
      const cy = py + 0.5;
      let t = lengthSq === 0 ? 0 : ((cx - from.x) * dx + (cy - from.y) * dy) / lengthSq;
      t = Math.max(0, Math.min(1, t));
      const nx = from.x + t * dx;
      const ny = from.y + t * dy;
      if (Math.hypot(cx - nx, cy - ny) <= half) {
        raster.setPixel(px, py, color);
      }
    },
  );
}

/** Outline a closed polygon. */
export function strokePolygon(raster: Raster, points: Point[], width: number, color: Rgba): void {
  points.forEach((point, i) => {
    const next = points[(i + 1) % points.length];
    if (next) strokeLine(raster, point, next, width, color);
  });
}

function forEachPixelInBox(
  raster: Raster,
  left: number,
  top: number,
  right: number,
  bottom: number,
  visit: (x: number, y: number) => void,
): void {
  const x0 = Math.max(0, Math.floor(left));
  const y0 = Math.max(0, Math.floor(top));
  const x1 = Math.min(raster.width - 1, Math.ceil(right));
  const y1 = Math.min(raster.height - 1, Math.ceil(bottom));
  for (let y = y0; y <= y1; y++) {
    for (let x = x0; x <= x1; x++) {
      visit(x, y);
    }
  }
}
