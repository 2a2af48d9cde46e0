// ============================================================
// Deepsky Chart - Symbol Renderers
// One outline per object class, drawn at map coordinates, plus
// the label at the candidate chosen by the placement step.
// ============================================================

import { CLUSTER_DASH } from '@shared/constants';
import type { DsoType, LabelCandidate, LineWidthOptions } from '@shared/types';
import { assertNever, defaultRadius, normalizeEllipseAngle } from './label-candidates';
import { withSavedState, type DrawingSurface } from './surface';

export interface SymbolContext {
  /** Output surface, already wrapped for mirroring when requested */
  surface: DrawingSurface;
  lineWidths: LineWidthOptions;
}

/** Object geometry in map millimetres */
export interface SymbolGeometry {
  x: number;
  y: number;
  rlong: number;
  rshort: number;
  positionAngle: number;
}

/** Label text plus the candidate it was placed at */
export interface SymbolLabel {
  text: string;
  candidate: LabelCandidate;
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

function radiusOrDefault(ctx: SymbolContext, radius: number): number {
  return radius > 0 ? radius : defaultRadius(ctx.surface.width);
}

/** Star disc radius for `mag`; brighter stars get larger discs. */
export function magnitudeToRadius(mag: number, limitingMagnitude: number): number {
  return 0.15 * 1.33 ** (limitingMagnitude - mag);
}

export function drawLabel(
  surface: DrawingSurface,
  label: SymbolLabel | undefined,
  angle = 0,
): void {
  if (!label || label.text === '') return;
  const { center } = label.candidate;
  surface.textCentred(center.x, center.y, label.text, angle);
}

/**
 * Filled circle with a border. Pen and fill colours are set by the
 * caller. Coordinates are rounded so that backends agree on placement.
 */
export function star(ctx: SymbolContext, x: number, y: number, radius: number): void {
  const { surface } = ctx;
  surface.circle(round2(x), round2(y), round2(radius + surface.lineWidth / 2), 'both');
}

export function openCluster(
  ctx: SymbolContext,
  x: number,
  y: number,
  radius = -1,
  label?: SymbolLabel,
): void {
  const { surface } = ctx;
  const r = radiusOrDefault(ctx, radius);
  withSavedState(surface, () => {
    surface.setLinewidth(ctx.lineWidths.openCluster);
    surface.setDashedLine(CLUSTER_DASH[0], CLUSTER_DASH[1]);
    surface.circle(x, y, r);
    surface.setSolidLine();
    drawLabel(surface, label);
  });
}

export function globularCluster(
  ctx: SymbolContext,
  x: number,
  y: number,
  radius = -1,
  label?: SymbolLabel,
): void {
  const { surface } = ctx;
  const r = radiusOrDefault(ctx, radius);
  withSavedState(surface, () => {
    surface.setLinewidth(ctx.lineWidths.dso);
    surface.circle(x, y, r);
    surface.line(x - r, y, x + r, y);
    surface.line(x, y - r, x, y + r);
    drawLabel(surface, label);
  });
}

export function galaxy(
  ctx: SymbolContext,
  x: number,
  y: number,
  rlong = -1,
  rshort = -1,
  positionAngle = 0,
  label?: SymbolLabel,
): void {
  const { surface } = ctx;
  let rl = rlong;
  let rs = rshort;
  if (rlong <= 0) {
    rl = defaultRadius(surface.width);
    rs = rl / 2;
  } else if (rshort < 0) {
    rs = rlong / 2;
  }
  const p = normalizeEllipseAngle(positionAngle);

  withSavedState(surface, () => {
    surface.setLinewidth(ctx.lineWidths.dso);
    surface.ellipse(x, y, rl, rs, p);
    drawLabel(surface, label, p);
  });
}

/** Square of side `width`; horizontal edges overlap the corners by half a pen. */
export function diffuseNebula(
  ctx: SymbolContext,
  x: number,
  y: number,
  width = -1,
  label?: SymbolLabel,
): void {
  const { surface } = ctx;
  withSavedState(surface, () => {
    surface.setLinewidth(ctx.lineWidths.dso);
    const d = width > 0 ? width / 2 : defaultRadius(surface.width);
    const d1 = d + surface.lineWidth / 2;
    surface.line(x - d1, y + d, x + d1, y + d);
    surface.line(x + d, y + d, x + d, y - d);
    surface.line(x + d1, y - d, x - d1, y - d);
    surface.line(x - d, y - d, x - d, y + d);
    drawLabel(surface, label);
  });
}

export function planetaryNebula(
  ctx: SymbolContext,
  x: number,
  y: number,
  radius = -1,
  label?: SymbolLabel,
): void {
  const { surface } = ctx;
  const r = radiusOrDefault(ctx, radius);
  withSavedState(surface, () => {
    surface.setLinewidth(ctx.lineWidths.dso);
    surface.circle(x, y, 0.75 * r);
    surface.line(x - 0.75 * r, y, x - 1.5 * r, y);
    surface.line(x + 0.75 * r, y, x + 1.5 * r, y);
    surface.line(x, y + 0.75 * r, x, y + 1.5 * r);
    surface.line(x, y - 0.75 * r, x, y - 1.5 * r);
    drawLabel(surface, label);
  });
}

export function supernovaRemnant(
  ctx: SymbolContext,
  x: number,
  y: number,
  radius = -1,
  label?: SymbolLabel,
): void {
  const { surface } = ctx;
  const r = radiusOrDefault(ctx, radius);
  withSavedState(surface, () => {
    surface.setLinewidth(ctx.lineWidths.dso);
    surface.circle(x, y, r - surface.lineWidth / 2);
    drawLabel(surface, label);
  });
}

/** Dashed diamond with half diagonal r / sqrt(2). */
export function asterism(
  ctx: SymbolContext,
  x: number,
  y: number,
  radius = -1,
  label?: SymbolLabel,
): void {
  const { surface } = ctx;
  const d = radiusOrDefault(ctx, radius) / Math.SQRT2;
  withSavedState(surface, () => {
    surface.setLinewidth(ctx.lineWidths.openCluster);
    surface.setDashedLine(CLUSTER_DASH[0], CLUSTER_DASH[1]);
    const diff = surface.lineWidth / 2 / Math.SQRT2;
    surface.line(x - diff, y + d + diff, x + d + diff, y - diff);
    surface.line(x + d, y, x, y - d);
    surface.line(x + diff, y - d - diff, x - d - diff, y + diff);
    surface.line(x - d, y, x, y + d);
    surface.setSolidLine();
    drawLabel(surface, label);
  });
}

export function unknownObject(
  ctx: SymbolContext,
  x: number,
  y: number,
  radius = -1,
  label?: SymbolLabel,
): void {
  const { surface } = ctx;
  const r = radiusOrDefault(ctx, radius) / Math.SQRT2;
  withSavedState(surface, () => {
    surface.setLinewidth(ctx.lineWidths.dso);
    surface.line(x - r, y + r, x + r, y - r);
    surface.line(x + r, y + r, x - r, y - r);
    drawLabel(surface, label);
  });
}

/** Draw the symbol for `type` with its placed label. */
export function drawDeepskyObject(
  ctx: SymbolContext,
  type: DsoType,
  geometry: SymbolGeometry,
  label?: SymbolLabel,
): void {
  const { x, y, rlong, rshort, positionAngle } = geometry;
  switch (type) {
    case 'GALAXY':
      galaxy(ctx, x, y, rlong, rshort, positionAngle, label);
      return;
    case 'DIFFUSE_NEBULA':
      diffuseNebula(ctx, x, y, 2 * rlong, label);
      return;
    case 'PLANETARY_NEBULA':
      planetaryNebula(ctx, x, y, rlong, label);
      return;
    case 'OPEN_CLUSTER':
      openCluster(ctx, x, y, rlong, label);
      return;
    case 'GLOBULAR_CLUSTER':
      globularCluster(ctx, x, y, rlong, label);
      return;
    case 'SUPERNOVA_REMNANT':
      supernovaRemnant(ctx, x, y, rlong, label);
      return;
    case 'ASTERISM':
      asterism(ctx, x, y, rlong, label);
      return;
    case 'GALAXY_CLUSTER':
    case 'UNKNOWN':
      unknownObject(ctx, x, y, rlong, label);
      return;
    default:
      assertNever(type);
  }
}
