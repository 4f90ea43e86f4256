import {
  PlayerIndexEntry,
  findPlayerMatches,
  levenshtein,
  normalizeName,
  resolvePlayerName,
} from '../../../domain/players/name-resolution';

const PLAYERS: PlayerIndexEntry[] = [
  { id: 1, fullName: 'LeBron James', fromYear: 2003, toYear: 2024 },
  { id: 2, fullName: 'Bronny James', fromYear: 2024, toYear: 2024 },
  { id: 3, fullName: 'Luka Dončić', fromYear: 2018, toYear: 2024 },
  { id: 4, fullName: 'Jalen Williams', fromYear: 2022, toYear: 2024 },
  { id: 5, fullName: 'Jaylin Williams', fromYear: 2022, toYear: 2024 },
  { id: 8, fullName: 'Aaron Gordon', fromYear: 2014, toYear: 2024 },
  { id: 9, fullName: 'Ron Harper', fromYear: 1986, toYear: 2001 },
  { id: 10, fullName: 'Marcus Williams', fromYear: 2007, toYear: 2010 },
  { id: 11, fullName: 'Marcus Williams', fromYear: 2019, toYear: 2019 },
];

describe('normalizeName', () => {
  it('should strip accents, case and punctuation', () => {
    expect(normalizeName('  Luka   Dončić!! ')).toBe('luka doncic');
    expect(normalizeName("Shaquille O'Neal")).toBe('shaquille oneal');
  });
});

describe('levenshtein', () => {
  it('should count single-character edits', () => {
    expect(levenshtein('kitten', 'sitting')).toBe(3);
    expect(levenshtein('', 'abc')).toBe(3);
    expect(levenshtein('same', 'same')).toBe(0);
  });
});

describe('resolvePlayerName', () => {
  it('should match the exact name ignoring case', () => {
    const match = resolvePlayerName('lebron james', PLAYERS);
    expect(match?.player.id).toBe(1);
    expect(match?.kind).toBe('exact');
  });

  it('should match names typed without accents', () => {
    expect(resolvePlayerName('Luka Doncic', PLAYERS)?.player.id).toBe(3);
  });

  it('should match a prefix of the full name', () => {
    const match = resolvePlayerName('LeBron', PLAYERS);
    expect(match?.player.id).toBe(1);
    expect(match?.kind).toBe('prefix');
  });

  it('should prefer a prefix match over a substring match', () => {
    const match = resolvePlayerName('ron', PLAYERS);
    expect(match?.player.id).toBe(9);
  });

  it('should break substring ties by earliest debut among equally recent players', () => {
    expect(resolvePlayerName('james', PLAYERS)?.player.id).toBe(1);
  });

  it('should break remaining ties by lowest id', () => {
    expect(resolvePlayerName('williams', PLAYERS)?.player.id).toBe(4);
  });

  it('should prefer the most recently active player among exact duplicates', () => {
    expect(resolvePlayerName('Marcus Williams', PLAYERS)?.player.id).toBe(11);
  });

  it('should tolerate a small typo', () => {
    const match = resolvePlayerName('Lebrom James', PLAYERS);
    expect(match?.player.id).toBe(1);
    expect(match?.kind).toBe('fuzzy');
    expect(match?.distance).toBe(1);
  });

  it('should return null when nothing matches', () => {
    expect(resolvePlayerName('Zzyzx Nobody', PLAYERS)).toBeNull();
  });

  it('should return null for an empty or too-short query', () => {
    expect(resolvePlayerName('', PLAYERS)).toBeNull();
    expect(resolvePlayerName('!!!', PLAYERS)).toBeNull();
    expect(resolvePlayerName('le', PLAYERS)).toBeNull();
  });
});

describe('findPlayerMatches', () => {
  it('should order matches best first', () => {
    const ids = findPlayerMatches('james', PLAYERS).map((m) => m.player.id);
    expect(ids.slice(0, 2)).toEqual([1, 2]);
  });
});
