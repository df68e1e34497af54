import type { Chunk, Feature, FeatureValue, KeyKind, SlotKey } from '../types/keys.js';

export function feature(dim: string, value: FeatureValue = null): Feature {
  return Object.freeze({ dim, value });
}

export function slotKey(slot: number, chunk: Chunk): SlotKey {
  return [slot, chunk];
}

export const slotOf = (key: SlotKey): number => key[0];
export const chunkOf = (key: SlotKey): Chunk => key[1];

function compareStrings(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

// NaN sorts after every other number
function compareNumbers(a: number, b: number): number {
  if (Number.isNaN(a)) return Number.isNaN(b) ? 0 : 1;
  if (Number.isNaN(b)) return -1;
  return a < b ? -1 : a > b ? 1 : 0;
}

// null sorts first, then numbers, then strings
function compareValues(a: FeatureValue, b: FeatureValue): number {
  if (a === b) return 0;
  if (a === null) return -1;
  if (b === null) return 1;
  if (typeof a === 'number' && typeof b === 'number') return compareNumbers(a, b);
  if (typeof a === 'number') return -1;
  if (typeof b === 'number') return 1;
  return compareStrings(a, b);
}

export const featureKind: KeyKind<Feature> = {
  name: 'feature',
  // Tagged by type so that null, NaN and numeric strings stay distinct.
  encode: (f) => JSON.stringify([f.dim, typeof f.value, String(f.value)]),
  compare: (a, b) => compareStrings(a.dim, b.dim) || compareValues(a.value, b.value),
  label: (f) => (f.value === null ? f.dim : `${f.dim}=${f.value}`),
};

export const chunkKind: KeyKind<Chunk> = {
  name: 'chunk',
  encode: (c) => c,
  compare: compareStrings,
  label: (c) => c,
};

export const indexKind: KeyKind<number> = {
  name: 'index',
  encode: (i) => String(i),
  compare: (a, b) => a - b,
  label: (i) => String(i),
};

/** Kind of compound keys produced by an outer product. */
export function pairKind<A, B>(left: KeyKind<A>, right: KeyKind<B>): KeyKind<readonly [A, B]> {
  return {
    name: `pair<${left.name},${right.name}>`,
    encode: (k) => JSON.stringify([left.encode(k[0]), right.encode(k[1])]),
    compare: (a, b) => left.compare(a[0], b[0]) || right.compare(a[1], b[1]),
    label: (k) => `(${left.label(k[0])}, ${right.label(k[1])})`,
  };
}

export const slotKeyKind: KeyKind<SlotKey> = pairKind(indexKind, chunkKind);
