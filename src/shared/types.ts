// ============================================================
// Deepsky Chart - Shared Type Definitions
// Core types used by the chart engine, the catalogs and the server
// ============================================================

import { CHART_DEFAULTS, LINE_WIDTHS } from './constants';

/** Equatorial position in radians */
export interface RaDec {
  ra: number;
  dec: number;
}

/** Point in map millimetres (origin at the field centre, y up) */
export interface Point {
  x: number;
  y: number;
}

/** Deep-sky object classes with their own chart symbol */
export type DsoType =
  | 'GALAXY'
  | 'DIFFUSE_NEBULA'
  | 'PLANETARY_NEBULA'
  | 'OPEN_CLUSTER'
  | 'GLOBULAR_CLUSTER'
  | 'SUPERNOVA_REMNANT'
  | 'ASTERISM'
  | 'GALAXY_CLUSTER'
  | 'UNKNOWN';

export const DSO_TYPES: readonly DsoType[] = [
  'GALAXY',
  'DIFFUSE_NEBULA',
  'PLANETARY_NEBULA',
  'OPEN_CLUSTER',
  'GLOBULAR_CLUSTER',
  'SUPERNOVA_REMNANT',
  'ASTERISM',
  'GALAXY_CLUSTER',
  'UNKNOWN',
];

/** Catalog record for a single deep-sky object */
export interface DeepSkyObject extends RaDec {
  type: DsoType;
  /** Semi-major axis (radians) */
  rlong: number;
  /** Semi-minor axis (radians) */
  rshort: number;
  /** Position angle, north through east (radians) */
  positionAngle: number;
  mag: number;
  /** Messier number, 0 when the object has none */
  messier: number;
  /** Catalog code, e.g. "NGC", "IC" */
  cat: string;
  allNames: string[];
}

/** Deep-sky object after projection, in map millimetres */
export interface ProjectedObject extends Point {
  rlong: number;
  rshort: number;
  /** Rotated into the map and normalised to (-pi/2, pi/2] */
  positionAngle: number;
  label: string;
  labelWidth: number;
}

export interface Star extends RaDec {
  mag: number;
}

export interface BrightStar extends Star {
  /** Three-letter Bayer code ("alp", "bet", ...), empty when none */
  greek: string;
  constellation: string;
}

export interface Constellation {
  abbreviation: string;
  /** Pairs of 1-based indices into the bright-star list */
  lines: Array<[number, number]>;
}

/** Projection parameters of one render pass */
export interface FieldOfView extends RaDec {
  /** Field radius (radians) */
  radius: number;
  /** Map millimetres per radian */
  drawingScale: number;
}

/** Start, midpoint and end of a label baseline */
export interface LabelCandidate {
  start: Point;
  center: Point;
  end: Point;
}

/** Additional marker requested by the caller */
export interface ExtraPosition extends RaDec {
  label: string;
  /** Candidate index 0..3 (below, above, left, right) */
  labelPosition: number;
}

export interface LineWidthOptions {
  starBorder: number;
  openCluster: number;
  dso: number;
  legend: number;
  constellation: number;
}

/** Read-only configuration of a chart */
export interface ChartOptions {
  /** Field centre and radius (radians) */
  ra: number;
  dec: number;
  fieldRadius: number;
  caption: string;
  languageCode: 'EN' | 'NL';
  limitingMagnitude: number;
  deepskyLabelLimit: number;
  minSymbolRadius: number;
  showDsoLegend: boolean;
  invertColors: boolean;
  mirrorX: boolean;
  mirrorY: boolean;
  lineWidths: LineWidthOptions;
  extraPositions: ExtraPosition[];
}

export const DEFAULT_LINE_WIDTHS: LineWidthOptions = {
  starBorder: LINE_WIDTHS.STAR_BORDER,
  openCluster: LINE_WIDTHS.OPEN_CLUSTER,
  dso: LINE_WIDTHS.DSO,
  legend: LINE_WIDTHS.LEGEND,
  constellation: LINE_WIDTHS.CONSTELLATION,
};

/** Default chart configuration */
export const DEFAULT_CHART_OPTIONS: ChartOptions = {
  ra: 0,
  dec: 0,
  fieldRadius: 0.05,
  caption: '',
  languageCode: 'EN',
  limitingMagnitude: CHART_DEFAULTS.LIMITING_MAGNITUDE,
  deepskyLabelLimit: CHART_DEFAULTS.DEEPSKY_LABEL_LIMIT,
  minSymbolRadius: CHART_DEFAULTS.MIN_SYMBOL_RADIUS,
  showDsoLegend: false,
  invertColors: false,
  mirrorX: false,
  mirrorY: false,
  lineWidths: DEFAULT_LINE_WIDTHS,
  extraPositions: [],
};

/** One label committed during a render pass */
export interface PlacedLabel {
  label: string;
  type: DsoType;
  /** Index of the chosen candidate (0 below, 1 above, 2 left, 3 right) */
  position: number;
  anchor: Point;
}

/** Summary of a render pass */
export interface RenderReport {
  deepskyCount: number;
  starCount: number;
  constellationLineCount: number;
  labels: PlacedLabel[];
  ruler: { label: string; lengthMm: number };
}
