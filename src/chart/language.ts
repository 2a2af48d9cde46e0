// ============================================================
// Deepsky Chart - Legend Languages
// ============================================================

export interface LegendLanguage {
  h: string;
  m: string;
  s: string;
  G: string;
  OCL: string;
  GCL: string;
  AST: string;
  PN: string;
  N: string;
  SNR: string;
  PG: string;
}

export type LegendKey = Exclude<keyof LegendLanguage, 'h' | 'm' | 's'>;

export const EN: LegendLanguage = {
  h: 'h',
  m: 'm',
  s: 's',
  G: 'Galaxy',
  OCL: 'Open cluster',
  GCL: 'Globular cluster',
  AST: 'Asterism',
  PN: 'Planetary nebula',
  N: 'Diffuse nebula',
  SNR: 'Supernova remnant',
  PG: 'Part of external galaxy',
};

export const NL: LegendLanguage = {
  h: 'u',
  m: 'm',
  s: 's',
  G: 'Sterrenstelsel',
  OCL: 'Open sterrenhoop',
  GCL: 'Bolhoop',
  AST: 'Groepje sterren',
  PN: 'Planetaire nevel',
  N: 'Diffuse emissienevel',
  SNR: 'Supernovarest',
  PG: 'Deel van sterrenstelsel',
};

export const LANGUAGES = { EN, NL } as const;
