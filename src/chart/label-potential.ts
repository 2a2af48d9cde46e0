// ============================================================
// Deepsky Chart - Label Potential
// Scalar repulsion field used to rank label candidates. Seeded
// with every symbol of the pass, then grown by each committed
// label. Pure math, no drawing dependencies.
// ============================================================

import { LABEL_PLACEMENT } from '@shared/constants';

/** Symbol footprint used to seed the field */
export interface PotentialSeed {
  x: number;
  y: number;
  /** Symbol radius (mm) */
  radius: number;
}

export interface RepulsionSource {
  x: number;
  y: number;
  strength: number;
}

const SOFTENING2 = LABEL_PLACEMENT.SOFTENING_MM * LABEL_PLACEMENT.SOFTENING_MM;

export class LabelPotential {
  readonly fieldRadius: number;
  private readonly reach2: number;
  private readonly sources: RepulsionSource[] = [];

  /**
   * @param fieldRadius - radius of the field in map millimetres
   * @param seeds - every symbol of the pass; source `i` belongs to seed `i`
   */
  constructor(fieldRadius: number, seeds: readonly PotentialSeed[]) {
    this.fieldRadius = fieldRadius;
    // Sources further than the field diameter from a query are ignored
    this.reach2 = fieldRadius > 0 ? 4 * fieldRadius * fieldRadius : Infinity;
    for (const seed of seeds) {
      this.sources.push({ x: seed.x, y: seed.y, strength: Math.max(0, seed.radius) });
    }
  }

  get size(): number {
    return this.sources.length;
  }

  /**
   * Crowdedness at (x, y). Each source contributes
   * strength / (d^2 + softening^2), so the value is finite everywhere and
   * falls off with distance. `exclude` skips one source, normally the
   * seed of the object whose label is being placed.
   */
  potential(x: number, y: number, exclude?: number): number {
    let sum = 0;
    for (let i = 0; i < this.sources.length; i++) {
      if (i === exclude) continue;
      const s = this.sources[i];
      const dx = x - s.x;
      const dy = y - s.y;
      const d2 = dx * dx + dy * dy;
      if (d2 > this.reach2) continue;
      sum += s.strength / (d2 + SOFTENING2);
    }
    return sum;
  }

  /** Record a committed label centred at (x, y), `length` mm wide. */
  addPosition(x: number, y: number, length: number): void {
    this.sources.push({ x, y, strength: Math.max(0, length) / 2 });
  }
}
