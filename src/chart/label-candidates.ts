// ============================================================
// Deepsky Chart - Label Candidates
// Four anchor proposals per symbol shape, always ordered
// below (0), above (1), left (2), right (3). Each proposal is the
// start, midpoint and end of the label baseline in map mm.
// Mirroring is applied later, at the drawing surface.
// ============================================================

import type { DsoType, LabelCandidate, Point } from '@shared/types';

export type SymbolShape = 'ellipse' | 'rectangle' | 'circle' | 'diamond' | 'cross';

/** Text metrics the offsets are derived from */
export interface CandidateMetrics {
  /** Current font size (mm) */
  fontSize: number;
  /** Drawing width (mm); radius fallback is width / 40 */
  drawingWidth: number;
}

export const LABEL_BELOW = 0;
export const LABEL_ABOVE = 1;
export const LABEL_LEFT = 2;
export const LABEL_RIGHT = 3;

export function defaultRadius(drawingWidth: number): number {
  return drawingWidth / 40;
}

function resolveRadius(radius: number, metrics: CandidateMetrics): number {
  return radius > 0 ? radius : defaultRadius(metrics.drawingWidth);
}

/** Baseline centred on (cx, y) */
function centred(cx: number, y: number, length: number): LabelCandidate {
  return {
    start: { x: cx - length / 2, y },
    center: { x: cx, y },
    end: { x: cx + length / 2, y },
  };
}

/** Baseline starting at (xs, y) */
function startingAt(xs: number, y: number, length: number): LabelCandidate {
  return {
    start: { x: xs, y },
    center: { x: xs + length / 2, y },
    end: { x: xs + length, y },
  };
}

/** Baseline ending at (xe, y) */
function endingAt(xe: number, y: number, length: number): LabelCandidate {
  return startingAt(xe - length, y, length);
}

/**
 * Ellipse angles are only meaningful modulo pi; fold into (-pi/2, pi/2]
 * so that labels along the major axis never read upside down.
 */
export function normalizeEllipseAngle(angle: number): number {
  let p = angle % (2 * Math.PI);
  while (p > Math.PI / 2) p -= Math.PI;
  while (p <= -Math.PI / 2) p += Math.PI;
  return p;
}

/**
 * Candidates around a rotated ellipse. Offsets are computed in the frame of
 * the ellipse (u along the major axis, v along the minor axis) and rotated
 * into the map by the normalised position angle.
 */
export function galaxyCandidates(
  x: number,
  y: number,
  rlong: number,
  rshort: number,
  positionAngle: number,
  labelLength: number,
  metrics: CandidateMetrics,
): LabelCandidate[] {
  let rl = rlong;
  let rs = rshort;
  if (rlong <= 0) {
    rl = defaultRadius(metrics.drawingWidth);
    rs = rl / 2;
  } else if (rshort < 0) {
    rs = rlong / 2;
  }

  const p = normalizeEllipseAngle(positionAngle);
  const cp = Math.cos(p);
  const sp = Math.sin(p);
  const fh = metrics.fontSize;
  const toMap = (u: number, v: number): Point => ({
    x: x + u * cp - v * sp,
    y: y + u * sp + v * cp,
  });
  const along = (u0: number, v: number): LabelCandidate => ({
    start: toMap(u0, v),
    center: toMap(u0 + labelLength / 2, v),
    end: toMap(u0 + labelLength, v),
  });

  const hl = labelLength / 2;
  const side = rl + fh / 6;
  return [
    along(-hl, -rs - fh / 2),
    along(-hl, rs + fh / 2),
    along(-side - labelLength, -fh / 3),
    along(side, -fh / 3),
  ];
}

/** Candidates around an axis-aligned square of the given width. */
export function diffuseNebulaCandidates(
  x: number,
  y: number,
  width: number,
  labelLength: number,
  metrics: CandidateMetrics,
): LabelCandidate[] {
  const d = width > 0 ? width / 2 : defaultRadius(metrics.drawingWidth);
  const fh = metrics.fontSize;
  return [
    centred(x, y - d - fh / 2, labelLength),
    centred(x, y + d + fh / 2, labelLength),
    endingAt(x - d - fh / 6, y - fh / 3, labelLength),
    startingAt(x + d + fh / 6, y - fh / 3, labelLength),
  ];
}

/**
 * Half-angle at which a text line of cap height 2fh/3, resting on the
 * bottom of a circle of radius r, meets the circle. Falls back to pi/2
 * when the font is too large for the circle.
 */
export function shoulderAngle(radius: number, fontSize: number): number {
  const arg = 1 - (2 * fontSize) / (3 * radius);
  return arg > -1 && arg < 1 ? Math.acos(arg) : Math.PI / 2;
}

/** Candidates around circular symbols (clusters, planetaries, remnants). */
export function circularCandidates(
  x: number,
  y: number,
  radius: number,
  labelLength: number,
  metrics: CandidateMetrics,
): LabelCandidate[] {
  const r = resolveRadius(radius, metrics);
  const fh = metrics.fontSize;
  const clearance = Math.sin(shoulderAngle(r, fh)) * r + fh / 6;
  return [
    centred(x, y - r - (2 * fh) / 3, labelLength),
    centred(x, y + r + fh / 3, labelLength),
    endingAt(x - clearance, y - r, labelLength),
    startingAt(x + clearance, y - r, labelLength),
  ];
}

/** Candidates around the asterism diamond. */
export function asterismCandidates(
  x: number,
  y: number,
  radius: number,
  labelLength: number,
  metrics: CandidateMetrics,
): LabelCandidate[] {
  const d = resolveRadius(radius, metrics) / Math.SQRT2;
  const fh = metrics.fontSize;
  return [
    centred(x, y - d - (2 * fh) / 3, labelLength),
    centred(x, y + d + fh / 3, labelLength),
    endingAt(x - d - fh / 6, y - fh / 3, labelLength),
    startingAt(x + d + fh / 6, y - fh / 3, labelLength),
  ];
}

/** Candidates around the diagonal cross used for unclassified objects. */
export function unknownObjectCandidates(
  x: number,
  y: number,
  radius: number,
  labelLength: number,
  metrics: CandidateMetrics,
): LabelCandidate[] {
  const r = resolveRadius(radius, metrics) / Math.SQRT2;
  const fh = metrics.fontSize;
  return [
    centred(x, y - r - fh / 2, labelLength),
    centred(x, y + r + fh / 2, labelLength),
    endingAt(x - r - fh / 6, y - fh / 3, labelLength),
    startingAt(x + r + fh / 6, y - fh / 3, labelLength),
  ];
}

export function symbolShape(type: DsoType): SymbolShape {
  switch (type) {
    case 'GALAXY':
      return 'ellipse';
    case 'DIFFUSE_NEBULA':
      return 'rectangle';
    case 'PLANETARY_NEBULA':
    case 'OPEN_CLUSTER':
    case 'GLOBULAR_CLUSTER':
    case 'SUPERNOVA_REMNANT':
      return 'circle';
    case 'ASTERISM':
      return 'diamond';
    case 'GALAXY_CLUSTER':
    case 'UNKNOWN':
      return 'cross';
    default:
      return assertNever(type);
  }
}

/** Shape-specific candidates for a projected deep-sky object. */
export function labelCandidatesFor(
  type: DsoType,
  object: { x: number; y: number; rlong: number; rshort: number; positionAngle: number },
  labelLength: number,
  metrics: CandidateMetrics,
): LabelCandidate[] {
  const { x, y, rlong, rshort, positionAngle } = object;
  const shape = symbolShape(type);
  switch (shape) {
    case 'ellipse':
      return galaxyCandidates(x, y, rlong, rshort, positionAngle, labelLength, metrics);
    case 'rectangle':
      return diffuseNebulaCandidates(x, y, 2 * rlong, labelLength, metrics);
    case 'circle':
      return circularCandidates(x, y, rlong, labelLength, metrics);
    case 'diamond':
      return asterismCandidates(x, y, rlong, labelLength, metrics);
    case 'cross':
      return unknownObjectCandidates(x, y, rlong, labelLength, metrics);
    default:
      return assertNever(shape);
  }
}

export function assertNever(value: never): never {
  throw new Error(`Unhandled variant: ${String(value)}`);
}
