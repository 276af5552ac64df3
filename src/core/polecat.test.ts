import { describe, test, expect } from 'vitest';
import { POLECAT_NAMES, generatePolecatName, isPolecat, polecatBaseName } from './polecat.js';

describe('isPolecat', () => {
  test('given the polecat prefix, should return true', () => {
    expect(isPolecat('polecat_emma')).toBe(true);
    expect(isPolecat('alice')).toBe(false);
  });
});

describe('polecatBaseName', () => {
  test('given a polecat, should strip the prefix', () => {
    expect(polecatBaseName('polecat_nova')).toBe('nova');
    expect(polecatBaseName('tracy')).toBeNull();
  });
});

describe('generatePolecatName', () => {
  test('given no polecats, should pick from the whole pool', () => {
    expect(generatePolecatName([], () => 0)).toBe('polecat_emma');
    expect(generatePolecatName([], () => 0.999)).toBe('polecat_hazel');
  });

  test('given taken names, should skip them', () => {
    expect(generatePolecatName(['polecat_emma', 'tracy'], () => 0)).toBe('polecat_olivia');
  });

  test('given one name left, should return it', () => {
    const used = POLECAT_NAMES.filter((n) => n !== 'nova').map((n) => `polecat_${n}`);
    expect(generatePolecatName(used, () => 0.5)).toBe('polecat_nova');
  });

  test('given an exhausted pool, should still return a pool name', () => {
    const pool = ['a', 'b'];
    expect(generatePolecatName(['polecat_a', 'polecat_b'], () => 0.6, pool)).toBe('polecat_b');
  });

  test('given a random of exactly 1, should stay in range', () => {
    expect(generatePolecatName([], () => 1, ['a', 'b'])).toBe('polecat_a');
  });
});
