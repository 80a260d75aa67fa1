import {
  compileLevelFormula,
  computeLevel,
  DEFAULT_LEVEL_FORMULA,
  FormulaError,
  tokenize,
  validateLevelFormula
} from '../../src/services/levelFormula';

describe('Level formula', () => {
  test.each([
    [0, 1],
    [99, 1],
    [100, 2],
    [399, 2],
    [400, 3],
    [10000, 11]
  ])('default formula gives level %p -> %p', (totalEarned, level) => {
    expect(computeLevel(DEFAULT_LEVEL_FORMULA, totalEarned)).toBe(level);
  });

  test('respects precedence, parentheses and unary minus', () => {
    expect(compileLevelFormula('2 + 3 * 4')(0)).toBe(14);
    expect(compileLevelFormula('(2 + 3) * 4')(0)).toBe(20);
    expect(compileLevelFormula('-2 + 5')(0)).toBe(3);
    expect(compileLevelFormula('10 / 4')(0)).toBe(2.5);
    expect(compileLevelFormula('floor(7 / 2)')(0)).toBe(3);
    expect(compileLevelFormula('sqrt(total_earned) + .5')(16)).toBe(4.5);
  });

  test('rejects identifiers outside the grammar', () => {
    expect(() => tokenize('total_earned + bonus')).toThrow(new FormulaError('Unknown identifier: bonus'));
    expect(() => tokenize('2 ^ 3')).toThrow("Invalid character '^' at position 2");
  });

  test('rejects malformed expressions', () => {
    expect(() => compileLevelFormula('')).toThrow('Formula is empty');
    expect(() => compileLevelFormula('1 +')).toThrow('Unexpected end of formula');
    expect(() => compileLevelFormula('(1')).toThrow('Unexpected end of formula');
    expect(() => compileLevelFormula('1 2')).toThrow('Unexpected trailing input');
    expect(() => compileLevelFormula('sqrt 4')).toThrow("Expected '('");
    expect(() => compileLevelFormula(')')).toThrow("Unexpected ')'");
  });

  test('falls back to the linear rule when the formula is broken', () => {
    expect(computeLevel('floor(', 250)).toBe(3);
    expect(computeLevel('total_earned / 0', 100)).toBe(2);
    expect(computeLevel('total_earned / 0', 0)).toBe(1);
  });

  test('clamps levels to at least 1', () => {
    expect(computeLevel('total_earned - 1000', 0)).toBe(1);
    expect(computeLevel('total_earned / 100', 50)).toBe(1);
  });

  test('validation runs the formula over sample totals', () => {
    expect(validateLevelFormula(DEFAULT_LEVEL_FORMULA)).toEqual({ valid: true });
    expect(validateLevelFormula('total_earned - 1')).toEqual({
      valid: false,
      error: 'Formula must produce level >= 1, got -1 at total_earned=0'
    });
    expect(validateLevelFormula('sqrt(total_earned - 100) + 1')).toEqual({
      valid: false,
      error: 'Formula produced a non-finite value for total_earned=0'
    });
    expect(validateLevelFormula('level * 2')).toEqual({ valid: false, error: 'Unknown identifier: level' });
  });
});
