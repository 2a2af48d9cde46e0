// ============================================================
// Deepsky Chart - Canvas Drawing Surface
// Implements the chart's DrawingSurface on a 2D canvas context,
// backed by @napi-rs/canvas on the server.
// Chart millimetres (origin at the field centre, y up) are
// mapped to pixels (origin top-left, y down).
// ============================================================

import { createCanvas } from '@napi-rs/canvas';
import { CHART_DEFAULTS } from '@shared/constants';
import type { Point } from '@shared/types';
import type { DrawMode, DrawingSurface } from '@chart/surface';

/** The subset of CanvasRenderingContext2D the surface drives */
export interface CanvasContext2D {
  lineWidth: number;
  strokeStyle: unknown;
  fillStyle: unknown;
  font: string;
  textAlign: string;
  textBaseline: string;
  save(): void;
  restore(): void;
  beginPath(): void;
  closePath(): void;
  moveTo(x: number, y: number): void;
  lineTo(x: number, y: number): void;
  arc(x: number, y: number, radius: number, startAngle: number, endAngle: number): void;
  ellipse(
    x: number,
    y: number,
    radiusX: number,
    radiusY: number,
    rotation: number,
    startAngle: number,
    endAngle: number,
  ): void;
  rect(x: number, y: number, width: number, height: number): void;
  fillRect(x: number, y: number, width: number, height: number): void;
  stroke(): void;
  fill(): void;
  clip(): void;
  translate(x: number, y: number): void;
  rotate(angle: number): void;
  setLineDash(segments: number[]): void;
  fillText(text: string, x: number, y: number): void;
  measureText(text: string): { width: number };
}

export interface CanvasTarget {
  ctx: CanvasContext2D;
  /** Encode the current drawing as PNG */
  encode(): Buffer;
}

export type CanvasFactory = (widthPx: number, heightPx: number) => CanvasTarget;

export interface CanvasSurfaceOptions {
  /** Drawing width (mm) */
  width: number;
  pixelsPerMm: number;
  font?: string;
  createTarget?: CanvasFactory;
}

interface SurfaceStyle {
  lineWidth: number;
  font: string;
  fontSize: number;
  pen: [number, number, number];
  fill: [number, number, number];
  dash: number[];
}

export const napiCanvasFactory: CanvasFactory = (widthPx, heightPx) => {
  const canvas = createCanvas(widthPx, heightPx);
  return {
    ctx: canvas.getContext('2d'),
    encode: () => canvas.toBuffer('image/png'),
  };
};

function cssColor([r, g, b]: readonly number[]): string {
  const c = (v: number) => Math.round(Math.min(1, Math.max(0, v)) * 255);
  return `rgb(${c(r)}, ${c(g)}, ${c(b)})`;
}

export class CanvasSurface implements DrawingSurface {
  readonly pixelsPerMm: number;
  private readonly createTarget: CanvasFactory;
  private target: CanvasTarget | null = null;
  private widthMm: number;
  private heightMm: number;
  private invertColors = false;
  private clipDepth = 0;
  private style: SurfaceStyle;
  private readonly stack: SurfaceStyle[] = [];

  constructor(options: CanvasSurfaceOptions) {
    this.widthMm = options.width;
    this.heightMm = options.width;
    this.pixelsPerMm = options.pixelsPerMm;
    this.createTarget = options.createTarget ?? napiCanvasFactory;
    this.style = {
      lineWidth: 0.1,
      font: options.font ?? CHART_DEFAULTS.FONT_FAMILY,
      fontSize: CHART_DEFAULTS.FONT_SIZE,
      pen: [0, 0, 0],
      fill: [0, 0, 0],
      dash: [],
    };
  }

  get width(): number {
    return this.widthMm;
  }

  get height(): number {
    return this.heightMm;
  }

  get font(): string {
    return this.style.font;
  }

  get fontSize(): number {
    return this.style.fontSize;
  }

  get lineWidth(): number {
    return this.style.lineWidth;
  }

  get widthPx(): number {
    return Math.round(this.widthMm * this.pixelsPerMm);
  }

  get heightPx(): number {
    return Math.round(this.heightMm * this.pixelsPerMm);
  }

  private get ctx(): CanvasContext2D {
    if (!this.target) {
      throw new Error('CanvasSurface: newPage() must be called before drawing');
    }
    return this.target.ctx;
  }

  /** Chart mm to canvas px; the map square sits at the bottom of the page */
  toPixels(x: number, y: number): Point {
    const s = this.pixelsPerMm;
    return {
      x: (x + this.widthMm / 2) * s,
      y: (this.heightMm - this.widthMm / 2 - y) * s,
    };
  }

  setDimensions(width: number, height: number): void {
    this.widthMm = width;
    this.heightMm = height;
  }

  newPage(): void {
    this.target = this.createTarget(this.widthPx, this.heightPx);
    this.clipDepth = 0;
    this.stack.length = 0;
    const { ctx } = this;
    ctx.fillStyle = this.invertColors ? 'rgb(0, 0, 0)' : 'rgb(255, 255, 255)';
    ctx.fillRect(0, 0, this.widthPx, this.heightPx);
  }

  finish(): void {
    this.resetClip();
  }

  /** PNG of the finished page */
  toBuffer(): Buffer {
    if (!this.target) {
      throw new Error('CanvasSurface: nothing has been drawn');
    }
    return this.target.encode();
  }

  save(): void {
    this.stack.push({ ...this.style, dash: [...this.style.dash] });
  }

  restore(): void {
    const previous = this.stack.pop();
    if (previous) this.style = previous;
  }

  setLinewidth(width: number): void {
    this.style.lineWidth = width;
  }

  setDashedLine(on: number, off: number): void {
    this.style.dash = [on, off];
  }

  setSolidLine(): void {
    this.style.dash = [];
  }

  setPenGray(gray: number): void {
    this.style.pen = [gray, gray, gray];
  }

  setPenRgb(rgb: readonly [number, number, number]): void {
    this.style.pen = [rgb[0], rgb[1], rgb[2]];
  }

  setFillGray(gray: number): void {
    this.style.fill = [gray, gray, gray];
  }

  setFont(font: string, size: number): void {
    this.style.font = font;
    this.style.fontSize = size;
  }

  setInvertColors(invert: boolean): void {
    this.invertColors = invert;
  }

  private color(rgb: readonly number[]): string {
    return cssColor(this.invertColors ? rgb.map((v) => 1 - v) : rgb);
  }

  private applyStroke(): void {
    const { ctx, style } = this;
    const s = this.pixelsPerMm;
    ctx.lineWidth = style.lineWidth * s;
    ctx.strokeStyle = this.color(style.pen);
    ctx.fillStyle = this.color(style.fill);
    ctx.setLineDash(style.dash.map((d) => d * s));
  }

  private applyFont(): void {
    const { ctx, style } = this;
    ctx.font = `${style.fontSize * this.pixelsPerMm}px ${style.font}`;
    ctx.fillStyle = this.color(style.pen);
  }

  private paint(mode: DrawMode): void {
    if (mode === 'fill' || mode === 'both') this.ctx.fill();
    if (mode === 'stroke' || mode === 'both') this.ctx.stroke();
  }

  line(x1: number, y1: number, x2: number, y2: number): void {
    const { ctx } = this;
    const a = this.toPixels(x1, y1);
    const b = this.toPixels(x2, y2);
    this.applyStroke();
    ctx.beginPath();
    ctx.moveTo(a.x, a.y);
    ctx.lineTo(b.x, b.y);
    ctx.stroke();
  }

  circle(x: number, y: number, r: number, mode: DrawMode = 'stroke'): void {
    const { ctx } = this;
    const c = this.toPixels(x, y);
    this.applyStroke();
    ctx.beginPath();
    ctx.arc(c.x, c.y, Math.max(0, r) * this.pixelsPerMm, 0, 2 * Math.PI);
    this.paint(mode);
  }

  ellipse(
    x: number,
    y: number,
    rlong: number,
    rshort: number,
    angle: number,
    mode: DrawMode = 'stroke',
  ): void {
    const { ctx } = this;
    const c = this.toPixels(x, y);
    const s = this.pixelsPerMm;
    this.applyStroke();
    ctx.beginPath();
    // Canvas angles turn clockwise because y points down
    ctx.ellipse(c.x, c.y, Math.max(0, rlong) * s, Math.max(0, rshort) * s, -angle, 0, 2 * Math.PI);
    this.paint(mode);
  }

  rectangle(x: number, y: number, width: number, height: number, mode: DrawMode = 'stroke'): void {
    const { ctx } = this;
    const topLeft = this.toPixels(x, y);
    const s = this.pixelsPerMm;
    this.applyStroke();
    ctx.beginPath();
    ctx.rect(topLeft.x, topLeft.y, width * s, height * s);
    this.paint(mode);
  }

  private text(x: number, y: number, text: string, align: 'left' | 'right' | 'center', angle: number): void {
    const { ctx } = this;
    const p = this.toPixels(x, y);
    this.applyFont();
    ctx.textAlign = align;
    ctx.textBaseline = 'alphabetic';
    if (angle === 0) {
      ctx.fillText(text, p.x, p.y);
      return;
    }
    ctx.save();
    try {
      ctx.translate(p.x, p.y);
      ctx.rotate(-angle);
      ctx.fillText(text, 0, 0);
    } finally {
      ctx.restore();
    }
  }

  textLeft(x: number, y: number, text: string, angle = 0): void {
    this.text(x, y, text, 'right', angle);
  }

  textRight(x: number, y: number, text: string, angle = 0): void {
    this.text(x, y, text, 'left', angle);
  }

  textCentred(x: number, y: number, text: string, angle = 0): void {
    this.text(x, y, text, 'center', angle);
  }

  textWidth(text: string): number {
    this.applyFont();
    return this.ctx.measureText(text).width / this.pixelsPerMm;
  }

  clipPath(points: readonly Point[]): void {
    if (points.length < 3) return;
    const { ctx } = this;
    ctx.save();
    this.clipDepth++;
    ctx.beginPath();
    points.forEach((point, i) => {
      const p = this.toPixels(point.x, point.y);
      if (i === 0) ctx.moveTo(p.x, p.y);
      else ctx.lineTo(p.x, p.y);
    });
    ctx.closePath();
    ctx.clip();
  }

  resetClip(): void {
    if (!this.target) return;
    while (this.clipDepth > 0) {
      this.ctx.restore();
      this.clipDepth--;
    }
  }
}
