import { normalizeLabel, normalizeToString, removeAllWhitespace, removeNonPrintableAscii } from './label-normalizer';

describe('label-normalizer', () => {
  describe('normalizeToString', () => {
    it('should map empty cells to an empty string', () => {
      expect(normalizeToString(null)).toBe('');
      expect(normalizeToString(undefined)).toBe('');
      expect(normalizeToString(NaN)).toBe('');
    });

    it('should keep numbers and booleans in their string form', () => {
      expect(normalizeToString(42)).toBe('42');
      expect(normalizeToString(12.5)).toBe('12.5');
      expect(normalizeToString(true)).toBe('true');
    });

    it('should render midnight dates as a calendar date', () => {
      expect(normalizeToString(new Date(Date.UTC(2024, 0, 15)))).toBe('2024-01-15');
    });

    it('should render dates with a time as full ISO text', () => {
      expect(normalizeToString(new Date(Date.UTC(2024, 0, 15, 10, 30)))).toBe('2024-01-15T10:30:00.000Z');
    });
  });

  describe('normalizeLabel', () => {
    it('should strip whitespace and lowercase', () => {
      expect(normalizeLabel('  Manufacturer P/N ')).toBe('manufacturerp/n');
      expect(normalizeLabel('U/P \n(RMB W/ VAT)')).toBe('u/p(rmbw/vat)');
    });

    it('should drop non-printable and non-ASCII characters', () => {
      expect(normalizeLabel('Qty\u00A0')).toBe('qty');
      expect(normalizeLabel('Désignation')).toBe('dsignation');
      expect(removeNonPrintableAscii('a\u0000b\u200Bc')).toBe('abc');
    });

    it('should be total over every cell type', () => {
      expect(normalizeLabel(null)).toBe('');
      expect(normalizeLabel(7)).toBe('7');
      expect(normalizeLabel(false)).toBe('false');
    });

    it('should be idempotent', () => {
      const labels = ['Sub-Total (RMB W/ VAT)', ' Validated\tat ', 'UL/VDE Number', ''];
      for (const label of labels) {
        expect(normalizeLabel(normalizeLabel(label))).toBe(normalizeLabel(label));
      }
    });
  });

  it('removeAllWhitespace should remove tabs and newlines', () => {
    expect(removeAllWhitespace(' a\tb\nc\r\n d ')).toBe('abcd');
  });
});
