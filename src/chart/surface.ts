// ============================================================
// Deepsky Chart - Drawing Surface Contract
// The vector primitives the chart engine emits. Coordinates are
// millimetres with the origin at the field centre and y up.
// ============================================================

import type { Point } from '@shared/types';

/** Stroke the outline, fill it, or both */
export type DrawMode = 'stroke' | 'fill' | 'both';

export interface DrawingSurface {
  /** Drawing width (mm) */
  readonly width: number;
  readonly height: number;
  readonly font: string;
  /** Current font size (mm) */
  readonly fontSize: number;
  /** Current pen width (mm) */
  readonly lineWidth: number;

  setDimensions(width: number, height: number): void;
  /** Start a fresh drawing with the current dimensions */
  newPage(): void;
  finish(): void;

  /** Push pen, fill, font, dash and clip state */
  save(): void;
  restore(): void;

  setLinewidth(width: number): void;
  setDashedLine(on: number, off: number): void;
  setSolidLine(): void;
  setPenGray(gray: number): void;
  setPenRgb(rgb: readonly [number, number, number]): void;
  setFillGray(gray: number): void;
  setFont(font: string, size: number): void;
  setInvertColors(invert: boolean): void;

  line(x1: number, y1: number, x2: number, y2: number): void;
  circle(x: number, y: number, r: number, mode?: DrawMode): void;
  /** Ellipse with semi-axes `rlong`, `rshort`; `angle` turns the long axis from +x */
  ellipse(x: number, y: number, rlong: number, rshort: number, angle: number, mode?: DrawMode): void;
  /** Rectangle with its top-left corner at (x, y) */
  rectangle(x: number, y: number, width: number, height: number, mode?: DrawMode): void;

  /** Text ending at x */
  textLeft(x: number, y: number, text: string, angle?: number): void;
  /** Text starting at x */
  textRight(x: number, y: number, text: string, angle?: number): void;
  /** Text centred on x */
  textCentred(x: number, y: number, text: string, angle?: number): void;
  /** Width of `text` in the current font (mm) */
  textWidth(text: string): number;

  clipPath(points: readonly Point[]): void;
  resetClip(): void;
}

/**
 * Run `draw` between save() and restore(). The state is restored even
 * when a primitive throws; the error still propagates.
 */
export function withSavedState<T>(surface: DrawingSurface, draw: () => T): T {
  surface.save();
  try {
    return draw();
  } finally {
    surface.restore();
  }
}
