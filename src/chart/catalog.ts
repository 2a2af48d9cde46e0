// ============================================================
// Deepsky Chart - Catalogs
// Read-only object sources queried by field of view, plus the
// label text rules for deep-sky objects.
// ============================================================

import type { BrightStar, Constellation, DeepSkyObject, RaDec, Star } from '@shared/types';
import { angularDistance } from './projection';

export interface DeepskyCatalog {
  /** Objects within `radius` of `centre`, in no particular order */
  select(centre: RaDec, radius: number): DeepSkyObject[];
}

export interface StarCatalog {
  select(centre: RaDec, radius: number, limitingMagnitude: number): Star[];
}

export interface ConstellationCatalog {
  brightStars: BrightStar[];
  constellations: Constellation[];
}

export interface ChartCatalogs {
  stars?: StarCatalog;
  deepsky?: DeepskyCatalog;
  constellations?: ConstellationCatalog;
}

export class InMemoryDeepskyCatalog implements DeepskyCatalog {
  constructor(readonly objects: readonly DeepSkyObject[]) {}

  select(centre: RaDec, radius: number): DeepSkyObject[] {
    return this.objects.filter((o) => angularDistance(o, centre) < radius);
  }
}

export class InMemoryStarCatalog implements StarCatalog {
  constructor(readonly stars: readonly Star[]) {}

  select(centre: RaDec, radius: number, limitingMagnitude: number): Star[] {
    return this.stars.filter(
      (s) => s.mag <= limitingMagnitude && angularDistance(s, centre) < radius,
    );
  }
}

/**
 * Chart label for a deep-sky object: Messier objects by number, NGC
 * objects by their sorted numbers, anything else by catalog prefix.
 * Faint non-Messier objects stay unlabelled.
 */
export function dsoLabel(object: DeepSkyObject, labelLimit: number): string {
  if (object.messier > 0) {
    return `M${object.messier}`;
  }
  if (object.mag > labelLimit) {
    return '';
  }
  if (object.cat === 'NGC') {
    return [...object.allNames].sort().join('-');
  }
  return `${object.cat} ${object.allNames.join('-')}`;
}
