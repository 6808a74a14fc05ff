// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
import { Raster, TRANSPARENT } from "../raster/raster.js";
import { fillCircle, regularPolygon, strokeCircle, strokePolygon } from "../raster/draw.js";
import type { Point } from "../raster/draw.js";
import type { DiagnosticSink } from "../logger.js";
import type { EmblemGeometry } from "./types.js";

/** Number of hexagons around the central pentagon. */
export const HEXAGON_COUNT = 5;

/** Outline width for an emblem of the given diameter. */
export function strokeWidthFor(diameter: number): number {
  return Math.max(1, Math.floor(diameter / 200));
}

/** Centers of the hexagons surrounding the pentagon, at 72° steps. */
export function hexagonCenters(geometry: EmblemGeometry): Point[] {
  const radius = geometry.ballDiameterPx / 2;
  const distance = radius * geometry.hexagonDistanceFactor;
  const centers: Point[] = [];
  for (let i = 0; i < HEXAGON_COUNT; i++) {
    const angle = (i * 72 * Math.PI) / 180;
    centers.push({
      x: radius + distance * Math.cos(angle),
      y: radius + distance * Math.sin(angle),
    });
  }
  return centers;
}

/**
 * Draw the soccer-ball emblem on a transparent square canvas.
 *
 * Layers, bottom to top: a filled circle inscribed in the canvas, a
 * pentagon pointing along `rotationOffsetDegrees`, five hexagons at 72°
 * steps, and an outline at the canvas boundary. The same geometry always
 * produces the same pixels.
 */
export function generateEmblem(geometry: EmblemGeometry, logger: DiagnosticSink): Raster {
  const diameter = geometry.ballDiameterPx;
  const radius = diameter / 2;
  const center: Point = { x: radius, y: radius };
  const width = strokeWidthFor(diameter);

  const emblem = Raster.filled(diameter, diameter, TRANSPARENT);
  fillCircle(emblem, center, radius, geometry.fillColor);

  const pentagon = regularPolygon(
    center,
    radius * geometry.pentagonRadiusFactor,
    5,
    geometry.rotationOffsetDegrees,
  );
  strokePolygon(emblem, pentagon, width, geometry.lineColor);

  const hexRadius = radius * geometry.hexagonRadiusFactor;
  for (const hexCenter of hexagonCenters(geometry)) {
    strokePolygon(emblem, regularPolygon(hexCenter, hexRadius, 6, 0), width, geometry.lineColor);
  }

  strokeCircle(emblem, center, radius, width, geometry.lineColor);
  logger.info(`Created ${diameter}px soccer ball emblem.`);
  return emblem;
}
