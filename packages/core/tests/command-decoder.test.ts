import { describe, it, expect } from 'vitest';
import { CommandDecoder } from '../src/command-decoder.js';
import { WeightedMap } from '../src/weighted-map.js';
import { CommandError, ConfigurationError, feature, featureKind } from '@wmreg/shared';

describe('CommandDecoder', () => {
  const decoder = new CommandDecoder<number>()
    .define('write-1', 1, [-1, 0, 1])
    .define('write-2', 2, [-1, 0, 1]);

  it('routes known dimensions to their targets', () => {
    expect(decoder.target('write-2')).toBe(2);
    expect(decoder.target('write-3')).toBeUndefined();
  });

  it('accepts only declared values', () => {
    expect(decoder.accepts(feature('write-1', -1))).toBe(true);
    expect(decoder.accepts(feature('write-1', 2))).toBe(false);
    expect(decoder.accepts(feature('write-1', null))).toBe(false);
    expect(decoder.accepts(feature('read-1', 1))).toBe(false);
  });

  it('refuses to define a dimension twice', () => {
    expect(() => new CommandDecoder<number>().define('a', 1, [1]).define('a', 2, [1]))
      .toThrow(ConfigurationError);
  });

  it('validates only issued commands', () => {
    const ok = WeightedMap.of(featureKind, [[feature('write-1', 1), 1], [feature('bogus', 1), 0]]);
    expect(() => decoder.validate(ok)).not.toThrow();

    const bad = WeightedMap.of(featureKind, [[feature('write-1', 1), 1], [feature('write-2', 7), 0.5]]);
    expect(() => decoder.validate(bad)).toThrow(CommandError);
    expect(() => decoder.validate(bad)).toThrow("Invalid command 'write-2': unsupported value 7");
  });

  it('lists its vocabulary in definition order', () => {
    expect(decoder.dims).toEqual(['write-1', 'write-2']);
    expect(decoder.vocabulary).toHaveLength(6);
    expect(decoder.vocabulary[0]).toEqual(feature('write-1', -1));
  });
});
