// ============================================================
// Deepsky Chart - Constants
// ============================================================

/** Drawing-space defaults (all lengths in millimetres) */
export const CHART_DEFAULTS = {
  DRAWING_WIDTH: 180,
  BASE_SCALE: 0.98,
  FONT_SIZE: 2.6,
  FONT_FAMILY: 'Times-Roman',
  MIN_SYMBOL_RADIUS: 1.0,
  LIMITING_MAGNITUDE: 13.8,
  DEEPSKY_LABEL_LIMIT: 15,
  STARS_IN_SCALE: 7,
  LEGEND_MARGIN: 0.47,
  CONSTELLATION_LABEL_FONT_SCALE: 1.3,
} as const;

/** Default pen widths per symbol class */
export const LINE_WIDTHS = {
  STAR_BORDER: 0.06,
  OPEN_CLUSTER: 0.3,
  DSO: 0.2,
  LEGEND: 0.2,
  CONSTELLATION: 0.5,
} as const;

/** Dash pattern (on, off) for cluster-like symbols */
export const CLUSTER_DASH = [0.6, 0.4] as const;

/** Constellation figure colour */
export const CONSTELLATION_RGB = [0.2, 0.7, 1.0] as const;

/** Repulsion field parameters */
export const LABEL_PLACEMENT = {
  /** Keeps a source finite at its own position (mm) */
  SOFTENING_MM: 1.0,
} as const;

/** Map-scale ruler lengths, ascending */
export const RULER_SCALE = {
  ARCMINUTES: [1, 5, 10, 30, 60, 120, 300, 600, 1200],
  LABELS: ["1'", "5'", "10'", "30'", '1°', '2°', '5°', '10°', '20°'],
  HEIGHT_FACTOR: 0.66,
} as const;

/** Bayer designations as stored in the bright-star catalog */
export const STAR_LABELS: Readonly<Record<string, string>> = {
  alp: 'α',
  bet: 'β',
  gam: 'γ',
  del: 'δ',
  eps: 'ε',
  zet: 'ζ',
  eta: 'η',
  the: 'θ',
  iot: 'ι',
  kap: 'κ',
  lam: 'λ',
  mu: 'μ',
  nu: 'ν',
  xi: 'ξ',
  omi: 'ο',
  pi: 'π',
  rho: 'ρ',
  sig: 'σ',
  tau: 'τ',
  ups: 'υ',
  phi: 'φ',
  chi: 'χ',
  psi: 'ψ',
  ome: 'ω',
};
