// ============================================================
// Deepsky Chart - Mirroring Surface
// Applies an axis flip to every primitive before it reaches the
// wrapped surface, so geometry code never needs to know about it.
// ============================================================

import type { Point } from '@shared/types';
import type { DrawMode, DrawingSurface } from './surface';

export class MirroringSurface implements DrawingSurface {
  private readonly sx: number;
  private readonly sy: number;

  constructor(
    private readonly target: DrawingSurface,
    readonly mirrorX: boolean,
    readonly mirrorY: boolean,
  ) {
    this.sx = mirrorX ? -1 : 1;
    this.sy = mirrorY ? -1 : 1;
  }

  get width(): number {
    return this.target.width;
  }

  get height(): number {
    return this.target.height;
  }

  get font(): string {
    return this.target.font;
  }

  get fontSize(): number {
    return this.target.fontSize;
  }

  get lineWidth(): number {
    return this.target.lineWidth;
  }

  /** Map a point through the flip */
  apply(point: Point): Point {
    return { x: this.sx * point.x, y: this.sy * point.y };
  }

  /** A single flip reverses the sense of rotation */
  private angle(angle: number): number {
    return this.sx * this.sy * angle;
  }

  setDimensions(width: number, height: number): void {
    this.target.setDimensions(width, height);
  }

  newPage(): void {
    this.target.newPage();
  }

  finish(): void {
    this.target.finish();
  }

  save(): void {
    this.target.save();
  }

  restore(): void {
    this.target.restore();
  }

  setLinewidth(width: number): void {
    this.target.setLinewidth(width);
  }

  setDashedLine(on: number, off: number): void {
    this.target.setDashedLine(on, off);
  }

  setSolidLine(): void {
    this.target.setSolidLine();
  }

  setPenGray(gray: number): void {
    this.target.setPenGray(gray);
  }

  setPenRgb(rgb: readonly [number, number, number]): void {
    this.target.setPenRgb(rgb);
  }

  setFillGray(gray: number): void {
    this.target.setFillGray(gray);
  }

  setFont(font: string, size: number): void {
    this.target.setFont(font, size);
  }

  setInvertColors(invert: boolean): void {
    this.target.setInvertColors(invert);
  }

  line(x1: number, y1: number, x2: number, y2: number): void {
    this.target.line(this.sx * x1, this.sy * y1, this.sx * x2, this.sy * y2);
  }

  circle(x: number, y: number, r: number, mode?: DrawMode): void {
    this.target.circle(this.sx * x, this.sy * y, r, mode);
  }

  ellipse(x: number, y: number, rlong: number, rshort: number, angle: number, mode?: DrawMode): void {
    this.target.ellipse(this.sx * x, this.sy * y, rlong, rshort, this.angle(angle), mode);
  }

  rectangle(x: number, y: number, width: number, height: number, mode?: DrawMode): void {
    // (x, y) is the top-left corner; after a flip another corner takes its place
    const left = this.mirrorX ? -(x + width) : x;
    const top = this.mirrorY ? -(y - height) : y;
    this.target.rectangle(left, top, width, height, mode);
  }

  /*
   * Glyphs are never mirrored. Under a horizontal flip the reading
   * direction is kept, so text that ended at x must now start there.
   */
  textLeft(x: number, y: number, text: string, angle = 0): void {
    if (this.mirrorX) {
      this.target.textRight(this.sx * x, this.sy * y, text, this.angle(angle));
    } else {
      this.target.textLeft(this.sx * x, this.sy * y, text, this.angle(angle));
    }
  }

  textRight(x: number, y: number, text: string, angle = 0): void {
    if (this.mirrorX) {
      this.target.textLeft(this.sx * x, this.sy * y, text, this.angle(angle));
    } else {
      this.target.textRight(this.sx * x, this.sy * y, text, this.angle(angle));
    }
  }

  textCentred(x: number, y: number, text: string, angle = 0): void {
    this.target.textCentred(this.sx * x, this.sy * y, text, this.angle(angle));
  }

  textWidth(text: string): number {
    return this.target.textWidth(text);
  }

  clipPath(points: readonly Point[]): void {
    this.target.clipPath(points.map((p) => this.apply(p)));
  }

  resetClip(): void {
    this.target.resetClip();
  }
}
