// ============================================================
// Deepsky Chart - Coordinate Projection
// Orthographic (SIN) tangent-plane projection and the angular
// helpers the chart engine needs. Pure math.
// ============================================================

import { CHART_DEFAULTS } from '@shared/constants';
import type { FieldOfView, Point, RaDec } from '@shared/types';

/** Tangent-plane coordinates, dimensionless */
export interface PlaneCoordinates {
  l: number;
  m: number;
}

/**
 * Project an equatorial position onto the plane tangent to the sky at
 * `centre`. `l` grows towards the east, `m` towards the north.
 */
export function radecToLm(position: RaDec, centre: RaDec): PlaneCoordinates {
  const deltaRa = position.ra - centre.ra;
  const cosDec = Math.cos(position.dec);
  return {
    l: cosDec * Math.sin(deltaRa),
    m: Math.sin(position.dec) * Math.cos(centre.dec) -
      cosDec * Math.sin(centre.dec) * Math.cos(deltaRa),
  };
}

/** Great-circle separation in radians (haversine form). */
export function angularDistance(a: RaDec, b: RaDec): number {
  const sinDdec = Math.sin((b.dec - a.dec) / 2);
  const sinDra = Math.sin((b.ra - a.ra) / 2);
  const h = sinDdec * sinDdec + Math.cos(a.dec) * Math.cos(b.dec) * sinDra * sinDra;
  return 2 * Math.asin(Math.min(1, Math.sqrt(h)));
}

/**
 * Angle between the local direction of increasing declination at
 * `position` and the map's +y axis, counter-clockwise in map space.
 * Zero at the field centre.
 */
export function northAngle(position: RaDec, centre: RaDec): number {
  const deltaRa = position.ra - centre.ra;
  const dx = Math.sin(position.dec) * Math.sin(deltaRa);
  const dy = Math.cos(position.dec) * Math.cos(centre.dec) +
    Math.sin(position.dec) * Math.sin(centre.dec) * Math.cos(deltaRa);
  return Math.atan2(-dx, dy);
}

/**
 * Build the projection parameters for a chart of `drawingWidth` mm whose
 * field circle spans `BASE_SCALE` of the width.
 */
export function createFieldOfView(
  ra: number,
  dec: number,
  radius: number,
  drawingWidth: number,
): FieldOfView {
  return {
    ra,
    dec,
    radius,
    drawingScale: (CHART_DEFAULTS.BASE_SCALE * drawingWidth) / 2 / Math.sin(radius),
  };
}

/** Field radius in map millimetres */
export function fieldRadiusMm(field: FieldOfView): number {
  return field.drawingScale * Math.sin(field.radius);
}

/** Project to map millimetres; east is drawn to the left. */
export function projectToMap(position: RaDec, field: FieldOfView): Point {
  const { l, m } = radecToLm(position, field);
  return { x: -l * field.drawingScale, y: m * field.drawingScale };
}
