// ============================================
// MELIAPP - Pollen Composition Codec
// ============================================
// Wire format: "species:percentage" pairs joined by ","
// e.g. "Quillay:40,Ulmo:35.5"

export type Composition = Record<string, number>;

export type SumRule = 'none' | 'max100' | 'exact100';

const PAIR_SEPARATOR = ',';
const VALUE_SEPARATOR = ':';
const EXACT_TOLERANCE = 0.01;

/**
 * Parses the wire format into a species -> percentage map.
 * A pair that does not split into exactly two non-empty tokens, or whose
 * percentage is not a finite number, is dropped. Later duplicates win.
 */
export function parseComposition(raw: string | null | undefined): Composition {
  const result: Composition = {};
  if (!raw) return result;

  for (const pair of raw.split(PAIR_SEPARATOR)) {
    const tokens = pair.split(VALUE_SEPARATOR).map(t => t.trim());
    if (tokens.length !== 2) continue;

    const [species, value] = tokens;
    if (!species || !value) continue;

    const percentage = Number(value);
    if (!Number.isFinite(percentage)) continue;

    result[species] = percentage;
  }
  return result;
}

const NUMERIC = /^-?\d+(?:\.\d+)?$/;

export interface StrictParseResult {
  composition: Composition;
  malformed: string[];
}

/**
 * Write-side counterpart of parseComposition: nothing is dropped silently.
 * Every pair that is not "species:number" is reported in `malformed`.
 * Blank segments (a trailing comma) are ignored.
 */
export function parseCompositionStrict(raw: string): StrictParseResult {
  const composition: Composition = {};
  const malformed: string[] = [];

  for (const pair of raw.split(PAIR_SEPARATOR)) {
    const trimmed = pair.trim();
    if (!trimmed) continue;

    const tokens = trimmed.split(VALUE_SEPARATOR).map(t => t.trim());
    const percentage = tokens.length === 2 ? parsePercentage(tokens[1]) : null;
    if (!tokens[0] || percentage === null) {
      malformed.push(trimmed);
      continue;
    }
    composition[tokens[0]] = percentage;
  }
  return { composition, malformed };
}

/** Accepts finite numbers and plain decimal strings ("35", "35.5"). */
export function parsePercentage(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'string' && NUMERIC.test(value.trim())) {
    return Number(value.trim());
  }
  return null;
}

export function formatComposition(composition: Composition): string {
  return Object.entries(composition)
    .map(([species, percentage]) => `${species}${VALUE_SEPARATOR}${percentage}`)
    .join(PAIR_SEPARATOR);
}

export function compositionTotal(composition: Composition): number {
  const sum = Object.values(composition).reduce((acc, p) => acc + p, 0);
  return Math.round(sum * 100) / 100;
}

export function isValidSpeciesName(name: string): boolean {
  return name.trim().length > 0
    && !name.includes(PAIR_SEPARATOR)
    && !name.includes(VALUE_SEPARATOR);
}

/**
 * Returns a human-readable problem, or null when the composition is acceptable.
 */
export function checkComposition(composition: Composition, rule: SumRule): string | null {
  for (const [species, percentage] of Object.entries(composition)) {
    if (!isValidSpeciesName(species)) {
      return `Nombre de especie inválido: "${species}"`;
    }
    if (!Number.isFinite(percentage) || percentage < 0 || percentage > 100) {
      return `El porcentaje de ${species} debe estar entre 0 y 100`;
    }
  }

  const total = compositionTotal(composition);
  if (rule === 'max100' && total > 100) {
    return `La composición total (${total}%) no puede superar 100%`;
  }
  if (rule === 'exact100' && Object.keys(composition).length > 0 && Math.abs(total - 100) > EXACT_TOLERANCE) {
    return `La composición total (${total}%) debe sumar 100%`;
  }
  return null;
}
