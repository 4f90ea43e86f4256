import { fitText, MeasureText } from '../../../domain/card/text-fit';

// Every character is half as wide as the font size
const halfWidth: MeasureText = (text, fontSize) => text.length * fontSize * 0.5;
const tenPerChar: MeasureText = (text) => text.length * 10;
const tenPerCodePoint: MeasureText = (text) => Array.from(text).length * 10;

describe('fitText', () => {
  it('should keep text that fits at the starting size', () => {
    expect(fitText('Short', { maxWidth: 200, fontSize: 40, minFontSize: 24 }, halfWidth)).toEqual({
      text: 'Short',
      fontSize: 40,
      truncated: false,
    });
  });

  it('should shrink the font in steps until the text fits', () => {
    const result = fitText('A'.repeat(12), { maxWidth: 200, fontSize: 40, minFontSize: 24 }, halfWidth);
    expect(result).toEqual({ text: 'AAAAAAAAAAAA', fontSize: 32, truncated: false });
  });

  it('should truncate with an ellipsis at the minimum size', () => {
    const result = fitText(
      'Giannis Antetokounmpo Jr',
      { maxWidth: 200, fontSize: 40, minFontSize: 24 },
      halfWidth
    );
    expect(result).toEqual({ text: 'Giannis Antetok…', fontSize: 24, truncated: true });
  });

  it('should not leave a space before the ellipsis', () => {
    const result = fitText('Ab Cdefgh', { maxWidth: 40, fontSize: 10, minFontSize: 10 }, tenPerChar);
    expect(result.text).toBe('Ab…');
  });

  it('should fall back to a bare ellipsis when nothing fits', () => {
    const result = fitText('Abc', { maxWidth: 5, fontSize: 10, minFontSize: 10 }, tenPerChar);
    expect(result).toEqual({ text: '…', fontSize: 10, truncated: true });
  });

  it('should cut between code points, never inside a surrogate pair', () => {
    const result = fitText('Ab🏀🏀cd', { maxWidth: 40, fontSize: 10, minFontSize: 10 }, tenPerCodePoint);
    expect(result).toEqual({ text: 'Ab🏀…', fontSize: 10, truncated: true });
  });
});
