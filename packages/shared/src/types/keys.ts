/**
 * Value half of a feature. `null` is the wildcard/reset marker and never
 * stands for data.
 */
export type FeatureValue = number | string | null;

export interface Feature {
  readonly dim: string;
  readonly value: FeatureValue;
}

/** Opaque identifier of a stored concept instance. */
export type Chunk = string;

export type SlotKey = readonly [slot: number, chunk: Chunk];

/**
 * Describes how keys of one kind are identified, ordered and printed.
 * Weighted maps only combine with maps of the same kind name.
 */
export interface KeyKind<K> {
  readonly name: string;
  encode(key: K): string;
  compare(a: K, b: K): number;
  label(key: K): string;
}
