import { formatStatValue, ordinal } from '../../../domain/card/format';

describe('formatStatValue', () => {
  it('should format each stat format', () => {
    expect(formatStatValue('integer', 70.6)).toBe('71');
    expect(formatStatValue('decimal', 25.68)).toBe('25.7');
    expect(formatStatValue('percent', 0.5412)).toBe('54.1%');
    expect(formatStatValue('signed', 3.24)).toBe('+3.2');
    expect(formatStatValue('signed', -2.46)).toBe('-2.5');
  });

  it('should not sign a value that rounds to zero', () => {
    expect(formatStatValue('signed', -0.04)).toBe('0.0');
  });

  it('should show N/A for a missing value', () => {
    expect(formatStatValue('decimal', null)).toBe('N/A');
    expect(formatStatValue('percent', NaN)).toBe('N/A');
  });
});

describe('ordinal', () => {
  it('should add English ordinal suffixes', () => {
    expect([1, 2, 3, 4, 11, 12, 13, 21, 22, 23, 100].map(ordinal)).toEqual([
      '1st',
      '2nd',
      '3rd',
      '4th',
      '11th',
      '12th',
      '13th',
      '21st',
      '22nd',
      '23rd',
      '100th',
    ]);
  });
});
