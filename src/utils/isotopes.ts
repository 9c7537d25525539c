import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';

/**
 * Source of major-isotope mass numbers. Returns undefined for elements it
 * does not know, in which case any explicit isotope is written out.
 */
export interface IsotopeTable {
  majorIsotope(symbol: string): number | undefined;
}

function loadMajorIsotopes(): Map<string, number> {
  const dataPath = fileURLToPath(new URL('../data/major-isotopes.json', import.meta.url));
  const json: unknown = JSON.parse(readFileSync(dataPath, 'utf8'));
  const table = new Map<string, number>();
  if (typeof json !== 'object' || json === null) return table;
  for (const [symbol, mass] of Object.entries(json)) {
    if (typeof mass === 'number') table.set(symbol, mass);
  }
  return table;
}

const MAJOR_ISOTOPES = loadMajorIsotopes();

export const defaultIsotopeTable: IsotopeTable = {
  majorIsotope: (symbol: string) => MAJOR_ISOTOPES.get(symbol),
};

export function createIsotopeTable(masses: Record<string, number>): IsotopeTable {
  const table = new Map(Object.entries(masses));
  return {
    majorIsotope: (symbol: string) => table.get(symbol),
  };
}
