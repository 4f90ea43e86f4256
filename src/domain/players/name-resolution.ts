/**
 * Player Name Resolution
 *
 * Maps a human-typed name onto one entry of a player index. Matching runs in
 * tiers and the first tier with any hit wins:
 *   1. exact match on the normalized full name
 *   2. normalized name starts with, or contains, the query (3+ chars)
 *   3. Levenshtein distance of at most one edit per five characters
 *
 * Inside the winning tier, ties go to the player active most recently
 * (toYear desc), then the earliest debut (fromYear asc), then lowest id.
 * Within tier 2 prefix hits beat substring hits; within tier 3 fewer edits win.
 *
 * No async I/O.
 */

export interface PlayerIndexEntry {
  id: number;
  fullName: string;
  fromYear: number;
  toYear: number;
}

export type MatchKind = 'exact' | 'prefix' | 'substring' | 'fuzzy';

export interface NameMatch<T extends PlayerIndexEntry> {
  player: T;
  kind: MatchKind;
  distance: number;
}

const MIN_PARTIAL_QUERY_LENGTH = 3;

export function normalizeName(text: string): string {
  return text
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/[^a-z0-9 ]/g, '')
    .replace(/\s+/g, ' ')
    .trim();
}

export function levenshtein(a: string, b: string): number {
  if (a.length === 0) return b.length;
  if (b.length === 0) return a.length;

  let previous = Array.from({ length: b.length + 1 }, (_, j) => j);
  for (let i = 1; i <= a.length; i++) {
    const current = [i];
    for (let j = 1; j <= b.length; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      current[j] = Math.min(previous[j] + 1, current[j - 1] + 1, previous[j - 1] + cost);
    }
    previous = current;
  }
  return previous[b.length];
}

const KIND_ORDER: Record<MatchKind, number> = { exact: 0, prefix: 1, substring: 1, fuzzy: 2 };
const KIND_PREFERENCE: Record<MatchKind, number> = { exact: 0, prefix: 0, substring: 1, fuzzy: 0 };

function classify(query: string, name: string): { kind: MatchKind; distance: number } | null {
  if (name === query) return { kind: 'exact', distance: 0 };

  if (query.length >= MIN_PARTIAL_QUERY_LENGTH) {
    if (name.startsWith(query)) return { kind: 'prefix', distance: 0 };
    if (name.includes(query)) return { kind: 'substring', distance: 0 };
  }

  const threshold = Math.floor(Math.max(query.length, name.length) / 5);
  if (threshold > 0) {
    const distance = levenshtein(query, name);
    if (distance <= threshold) return { kind: 'fuzzy', distance };
  }

  return null;
}

function compareMatches<T extends PlayerIndexEntry>(a: NameMatch<T>, b: NameMatch<T>): number {
  return (
    KIND_ORDER[a.kind] - KIND_ORDER[b.kind] ||
    KIND_PREFERENCE[a.kind] - KIND_PREFERENCE[b.kind] ||
    a.distance - b.distance ||
    b.player.toYear - a.player.toYear ||
    a.player.fromYear - b.player.fromYear ||
    a.player.id - b.player.id
  );
}

/**
 * All matches for a query, best first.
 */
export function findPlayerMatches<T extends PlayerIndexEntry>(
  query: string,
  players: readonly T[]
): NameMatch<T>[] {
  const normalizedQuery = normalizeName(query);
  if (!normalizedQuery) return [];

  const matches: NameMatch<T>[] = [];
  for (const player of players) {
    const result = classify(normalizedQuery, normalizeName(player.fullName));
    if (result) matches.push({ player, ...result });
  }
  return matches.sort(compareMatches);
}

/**
 * The single best match, or null when nothing matches.
 */
export function resolvePlayerName<T extends PlayerIndexEntry>(
  query: string,
  players: readonly T[]
): NameMatch<T> | null {
  const [best] = findPlayerMatches(query, players);
  return best ?? null;
}
