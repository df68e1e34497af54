import {
  type KeyKind,
  DomainError,
  KeyMappingError,
  pairKind,
} from '@wmreg/shared';

interface Entry<K> {
  readonly key: K;
  readonly weight: number;
}

interface Group<G, K> {
  group: G;
  members: Entry<K>[];
}

/**
 * Sparse mapping from keys to weights with an explicit default `c` for every
 * key not stored. Instances are immutable: every operation returns a new map.
 *
 * Iteration order always follows the key kind's ordering, so results that
 * depend on order (tie-breaks in `maxBy`) are deterministic.
 */
export class WeightedMap<K> {
  private constructor(
    readonly kind: KeyKind<K>,
    readonly c: number,
    private readonly data: ReadonlyMap<string, Entry<K>>,
  ) {}

  static of<K>(kind: KeyKind<K>, entries: Iterable<readonly [K, number]> = [], c = 0): WeightedMap<K> {
    const data = new Map<string, Entry<K>>();
    for (const [key, weight] of entries) {
      data.set(kind.encode(key), { key, weight });
    }
    return new WeightedMap(kind, c, data);
  }

  static empty<K>(kind: KeyKind<K>, c = 0): WeightedMap<K> {
    return new WeightedMap(kind, c, new Map());
  }

  get size(): number {
    return this.data.size;
  }

  get(key: K): number {
    return this.data.get(this.kind.encode(key))?.weight ?? this.c;
  }

  /** True when `key` is stored explicitly, whatever its weight. */
  has(key: K): boolean {
    return this.data.has(this.kind.encode(key));
  }

  keys(): K[] {
    return this.sorted().map((e) => e.key);
  }

  entries(): Array<[K, number]> {
    return this.sorted().map((e): [K, number] => [e.key, e.weight]);
  }

  /** Throws `DomainError` unless this map is keyed by `kind`. */
  assertKind(kind: KeyKind<unknown>): void {
    if (kind.name !== this.kind.name) {
      throw new DomainError(kind.name, this.kind.name);
    }
  }

  // --- Restriction and remapping ---

  keep(predicate: (key: K, weight: number) => boolean): WeightedMap<K> {
    return this.rebuild(this.kind, this.c, this.sorted().filter((e) => predicate(e.key, e.weight)));
  }

  /**
   * Remaps every key through `f`, summing weights that collide. `f` must map
   * every explicit key; an `undefined` result raises `KeyMappingError`.
   */
  transformKeys<K2>(kind: KeyKind<K2>, f: (key: K) => K2 | undefined): WeightedMap<K2> {
    const data = new Map<string, Entry<K2>>();
    for (const entry of this.sorted()) {
      const key = f(entry.key);
      if (key === undefined) {
        throw new KeyMappingError(this.kind.label(entry.key));
      }
      const id = kind.encode(key);
      const prior = data.get(id);
      data.set(id, { key, weight: (prior?.weight ?? 0) + entry.weight });
    }
    return new WeightedMap(kind, this.c, data);
  }

  mask(): WeightedMap<K> {
    return this.rebuild(this.kind, this.c, this.sorted().map((e) => ({ key: e.key, weight: 1 })));
  }

  /** Drops every explicit entry whose weight equals the default. */
  squeeze(): WeightedMap<K> {
    return this.keep((_, weight) => weight !== this.c);
  }

  withKeys(keys: Iterable<K>): WeightedMap<K> {
    const data = new Map(this.data);
    for (const key of keys) {
      const id = this.kind.encode(key);
      if (!data.has(id)) data.set(id, { key, weight: this.c });
    }
    return new WeightedMap(this.kind, this.c, data);
  }

  setC(c: number): WeightedMap<K> {
    return new WeightedMap(this.kind, c, this.data);
  }

  // --- Pointwise arithmetic ---

  mul(other: WeightedMap<K> | number): WeightedMap<K> {
    if (typeof other === 'number') return this.mapWeights((w) => w * other);
    return this.zip(other, (a, b) => a * b);
  }

  add(other: WeightedMap<K> | number): WeightedMap<K> {
    if (typeof other === 'number') return this.mapWeights((w) => w + other);
    return this.zip(other, (a, b) => a + b);
  }

  sub(scalar: number): WeightedMap<K> {
    return this.mapWeights((w) => w - scalar);
  }

  /** `scalar - this`, default included. */
  rsub(scalar: number): WeightedMap<K> {
    return this.mapWeights((w) => scalar - w);
  }

  abs(): WeightedMap<K> {
    return this.mapWeights(Math.abs);
  }

  greater(threshold: number): WeightedMap<K> {
    return this.mapWeights((w) => (w > threshold ? 1 : 0));
  }

  /** Union of entries; `other`'s explicit entries win. The default stays ours. */
  merge(other: WeightedMap<K>): WeightedMap<K> {
    this.assertKind(other.kind);
    const data = new Map(this.data);
    for (const [id, entry] of other.data) {
      data.set(id, entry);
    }
    return new WeightedMap(this.kind, this.c, data);
  }

  // --- Grouped aggregation ---

  sumBy<G>(kind: KeyKind<G>, g: (key: K) => G): WeightedMap<G> {
    const result: Array<[G, number]> = [];
    for (const { group, members } of this.groupBy(kind, g)) {
      result.push([group, members.reduce((sum, e) => sum + e.weight, 0)]);
    }
    return WeightedMap.of(kind, result, 0);
  }

  /**
   * Largest weight per group. The default is unchanged: the maximum over
   * unlisted keys of any group is `c`.
   */
  maxBy<G>(kind: KeyKind<G>, g: (key: K) => G): WeightedMap<G> {
    const result: Array<[G, number]> = [];
    for (const { group, members } of this.groupBy(kind, g)) {
      result.push([group, winner(members).weight]);
    }
    return WeightedMap.of(kind, result, this.c);
  }

  /**
   * Key holding the largest weight of each group, in group order. Equal
   * weights resolve to the lowest-ordered key.
   */
  argmaxBy<G>(kind: KeyKind<G>, g: (key: K) => G): Array<[G, K]> {
    return this.groupBy(kind, g).map(({ group, members }): [G, K] => [group, winner(members).key]);
  }

  /**
   * Competitive normalization: each entry minus the largest weight in its
   * group, so a group's winner maps to 0 and its rivals go negative.
   */
  camBy<G>(kind: KeyKind<G>, g: (key: K) => G): WeightedMap<K> {
    const entries: Entry<K>[] = [];
    for (const { members } of this.groupBy(kind, g)) {
      const top = winner(members).weight;
      for (const e of members) {
        entries.push({ key: e.key, weight: e.weight - top });
      }
    }
    return this.rebuild(this.kind, 0, entries);
  }

  // --- Cross-kind combinators ---

  /**
   * Gates this map through `other`, which must be keyed by `kind`: each
   * explicit entry is scaled by the weight `other` assigns to `kf(key)`.
   */
  put<K2>(kind: KeyKind<K2>, other: WeightedMap<K2>, kf: (key: K) => K2): WeightedMap<K> {
    other.assertKind(kind);
    const entries = this.sorted().map((e) => ({ key: e.key, weight: e.weight * other.get(kf(e.key)) }));
    return this.rebuild(this.kind, this.c * other.c, entries);
  }

  /** Replaces each explicit weight with the weight `other` assigns to `kf(key)`. */
  lookup<K2>(kind: KeyKind<K2>, other: WeightedMap<K2>, kf: (key: K) => K2): WeightedMap<K> {
    other.assertKind(kind);
    const entries = this.sorted().map((e) => ({ key: e.key, weight: other.get(kf(e.key)) }));
    return this.rebuild(this.kind, other.c, entries);
  }

  outer<K2>(other: WeightedMap<K2>): WeightedMap<readonly [K, K2]> {
    const kind = pairKind(this.kind, other.kind);
    const entries: Array<[readonly [K, K2], number]> = [];
    for (const left of this.sorted()) {
      for (const right of other.sorted()) {
        entries.push([[left.key, right.key], left.weight * right.weight]);
      }
    }
    return WeightedMap.of(kind, entries, this.c * other.c);
  }

  // --- Comparison and export ---

  equals(other: WeightedMap<K>): boolean {
    if (other.kind.name !== this.kind.name || other.c !== this.c) return false;
    const mine = this.squeeze();
    const theirs = other.squeeze();
    if (mine.size !== theirs.size) return false;
    for (const [id, entry] of mine.data) {
      if (theirs.data.get(id)?.weight !== entry.weight) return false;
    }
    return true;
  }

  toJSON(): { kind: string; c: number; entries: Array<[string, number]> } {
    return {
      kind: this.kind.name,
      c: this.c,
      entries: this.sorted().map((e): [string, number] => [this.kind.label(e.key), e.weight]),
    };
  }

  // --- Internals ---

  private sorted(): Entry<K>[] {
    return [...this.data.values()].sort((a, b) => this.kind.compare(a.key, b.key));
  }

  private rebuild<K2>(kind: KeyKind<K2>, c: number, entries: Iterable<Entry<K2>>): WeightedMap<K2> {
    const data = new Map<string, Entry<K2>>();
    for (const entry of entries) {
      data.set(kind.encode(entry.key), entry);
    }
    return new WeightedMap(kind, c, data);
  }

  private mapWeights(fn: (w: number) => number): WeightedMap<K> {
    return this.rebuild(this.kind, fn(this.c), this.sorted().map((e) => ({ key: e.key, weight: fn(e.weight) })));
  }

  private zip(other: WeightedMap<K>, op: (a: number, b: number) => number): WeightedMap<K> {
    this.assertKind(other.kind);
    const data = new Map<string, Entry<K>>();
    for (const [id, entry] of this.data) {
      data.set(id, { key: entry.key, weight: op(entry.weight, other.get(entry.key)) });
    }
    for (const [id, entry] of other.data) {
      if (!data.has(id)) {
        data.set(id, { key: entry.key, weight: op(this.c, entry.weight) });
      }
    }
    return new WeightedMap(this.kind, op(this.c, other.c), data);
  }

  private groupBy<G>(kind: KeyKind<G>, g: (key: K) => G): Group<G, K>[] {
    const groups = new Map<string, Group<G, K>>();
    for (const entry of this.sorted()) {
      const group = g(entry.key);
      const id = kind.encode(group);
      const bucket = groups.get(id);
      if (bucket) {
        bucket.members.push(entry);
      } else {
        groups.set(id, { group, members: [entry] });
      }
    }
    return [...groups.values()].sort((a, b) => kind.compare(a.group, b.group));
  }
}

// Members arrive in key order; strict comparison keeps the lowest key on ties.
function winner<K>(members: Entry<K>[]): Entry<K> {
  let best = members[0];
  for (const entry of members) {
    if (entry.weight > best.weight) best = entry;
  }
  return best;
}
