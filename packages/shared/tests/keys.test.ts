import { describe, it, expect } from 'vitest';
import {
  feature,
  featureKind,
  slotKey,
  slotKeyKind,
  pairKind,
  indexKind,
  chunkKind,
  isPath,
  withPrefix,
} from '../src/index.js';

describe('key kinds', () => {
  it('encodes features structurally', () => {
    expect(featureKind.encode(feature('a', 1))).toBe(featureKind.encode({ dim: 'a', value: 1 }));
    expect(featureKind.encode(feature('a', 1))).not.toBe(featureKind.encode(feature('a', '1')));
  });

  it('keeps NaN apart from the null reset marker', () => {
    expect(featureKind.encode(feature('d', NaN))).not.toBe(featureKind.encode(feature('d')));
    expect(featureKind.encode(feature('d', NaN))).not.toBe(featureKind.encode(feature('d', 'NaN')));
    const sorted = [feature('d', NaN), feature('d', 1), feature('d')].sort(featureKind.compare);
    expect(sorted).toEqual([feature('d'), feature('d', 1), feature('d', NaN)]);
  });

  it('labels features with their value unless it is null', () => {
    expect(featureKind.label(feature('set-goal'))).toBe('set-goal');
    expect(featureKind.label(feature('write-2', -1))).toBe('write-2=-1');
  });

  it('orders null before numbers before strings', () => {
    const sorted = [feature('d', 'x'), feature('d', 2), feature('d'), feature('c', 9)]
      .sort(featureKind.compare);
    expect(sorted).toEqual([feature('c', 9), feature('d'), feature('d', 2), feature('d', 'x')]);
  });

  it('orders slot keys by slot then chunk', () => {
    const sorted = [slotKey(2, 'a'), slotKey(1, 'b'), slotKey(1, 'a')].sort(slotKeyKind.compare);
    expect(sorted).toEqual([[1, 'a'], [1, 'b'], [2, 'a']]);
    expect(slotKeyKind.label(slotKey(3, 'x'))).toBe('(3, x)');
  });

  it('names pair kinds after their components', () => {
    expect(pairKind(indexKind, chunkKind).name).toBe('pair<index,chunk>');
    expect(slotKeyKind.name).toBe('pair<index,chunk>');
  });
});

describe('paths', () => {
  it('accepts slash-separated segments', () => {
    expect(isPath('wm')).toBe(true);
    expect(isPath('wm/goal_1/set-x')).toBe(true);
  });

  it('rejects empty segments and other characters', () => {
    expect(isPath('')).toBe(false);
    expect(isPath('/wm')).toBe(false);
    expect(isPath('wm.goal')).toBe(false);
  });

  it('adds prefixes', () => {
    expect(withPrefix('set-a', 'p/q')).toBe('p/q/set-a');
    expect(withPrefix('set-a')).toBe('set-a');
  });
});
