import { LowercaseFilter, lowercaseTerm } from './lowercase-filter';

describe('LowercaseFilter', () => {
  let filter: LowercaseFilter;

  beforeEach(() => {
    filter = new LowercaseFilter();
  });

  it('should be defined', () => {
    expect(filter).toBeDefined();
  });

  it('should convert tokens to lowercase', () => {
    const tokens = ['Hello', 'WORLD', 'Test', 'JavaScript'];
    const result = filter.filter(tokens);
    expect(result).toEqual(['hello', 'world', 'test', 'javascript']);
  });

  it('should lowercase non-ASCII letters', () => {
    expect(filter.filter(['Þorinn', 'ÖL', 'Ærlig'])).toEqual(['þorinn', 'öl', 'ærlig']);
  });

  it('should lowercase each character without context rules', () => {
    expect(filter.filter(['ΟΔΟΣ', 'İstanbul'])).toEqual(['οδοσ', 'istanbul']);
  });

  it('should handle empty array', () => {
    expect(filter.filter([])).toEqual([]);
  });

  it('should not modify the input array', () => {
    const tokens = ['Keep', 'Me'];
    filter.filter(tokens);
    expect(tokens).toEqual(['Keep', 'Me']);
  });

  it('should maintain tokens that are already lowercase', () => {
    const tokens = ['already', 'lowercase', 'tokens'];
    const result = filter.filter(tokens);
    expect(result).toEqual(['already', 'lowercase', 'tokens']);
  });
});

describe('lowercaseTerm', () => {
  it('should keep one character per input character', () => {
    expect(lowercaseTerm('ΣΟΦΟΣ')).toBe('σοφοσ');
    expect(lowercaseTerm('DİYARBAKIR')).toBe('diyarbakir');
  });

  it('should leave characters without a lowercase form alone', () => {
    expect(lowercaseTerm("o'er ٣ 42")).toBe("o'er ٣ 42");
  });
});
