const STEAM_ID64 = /^765\d{14}$/;

export const INVALID_STEAM_ID_DETAILS = 'Invalid SteamID64 format';

export function isSteamId64(value: string): boolean {
  return STEAM_ID64.test(value);
}

export interface NormalizedIdentifiers {
  /** Distinct, trimmed identifiers in first-seen order. */
  all: string[];
  valid: string[];
  invalid: string[];
  duplicates: number;
  blanks: number;
}

/**
 * Trims, drops blanks and collapses duplicates while preserving the order of
 * first occurrence, then splits the survivors into valid SteamID64s and the
 * rest.
 */
export function normalizeIdentifiers(
  raw: readonly (string | null | undefined)[],
): NormalizedIdentifiers {
  const seen = new Set<string>();
  const result: NormalizedIdentifiers = {
    all: [],
    valid: [],
    invalid: [],
    duplicates: 0,
    blanks: 0,
  };

  for (const entry of raw) {
    const id = (entry ?? '').trim();
    if (!id) {
      result.blanks++;
      continue;
    }
    if (seen.has(id)) {
      result.duplicates++;
      continue;
    }
    seen.add(id);
    result.all.push(id);
    (isSteamId64(id) ? result.valid : result.invalid).push(id);
  }

  return result;
}
