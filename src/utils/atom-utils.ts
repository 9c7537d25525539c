const ORGANIC_SUBSET = new Set(['B', 'C', 'N', 'O', 'P', 'S', 'F', 'Cl', 'Br', 'I']);

/**
 * Check if a symbol belongs to the organic subset that may be written without brackets
 */
export function isOrganicAtom(symbol: string): boolean {
  return ORGANIC_SUBSET.has(symbol);
}
