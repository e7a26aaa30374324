import Decimal from 'decimal.js';
import { average, parseDecimal, toNumber } from './decimal.util';

describe('decimal utils', () => {
  describe('parseDecimal', () => {
    it('should parse venue numeric strings', () => {
      expect(parseDecimal('43250.50000000')?.toString()).toBe('43250.5');
    });

    it.each([['abc'], [''], ['Infinity'], [null], [{ price: 1 }]])('should reject %p', (value) => {
      expect(parseDecimal(value)).toBeUndefined();
    });
  });

  it('should round to eight places for output', () => {
    expect(toNumber(new Decimal('0.123456789'))).toBe(0.12345679);
  });

  it('should average a list and treat an empty list as zero', () => {
    expect(average([new Decimal(1), new Decimal(2), new Decimal(6)]).toNumber()).toBe(3);
    expect(average([]).toNumber()).toBe(0);
  });
});
