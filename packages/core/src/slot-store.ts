import {
  type Chunk,
  type Feature,
  type FeatureValue,
  type SlotKey,
  ConfigurationError,
  READ_VALUES,
  WRITE_VALUES,
  chunkKind,
  chunkOf,
  feature,
  featureKind,
  indexKind,
  slotKeyKind,
  slotOf,
} from '@wmreg/shared';
import { CommandDecoder } from './command-decoder.js';
import { RegisterProcess, type RegisterProcessOptions } from './register-process.js';
import { WeightedMap } from './weighted-map.js';

export type SlotStoreOptions = RegisterProcessOptions;

export type SlotOutput = readonly [chunks: WeightedMap<Chunk>, flags: WeightedMap<Feature>];

type SlotInputs = [commands: WeightedMap<Feature>, selected: WeightedMap<Chunk>, match: WeightedMap<Chunk>];

/**
 * Bank of working-memory slots, numbered from 1.
 *
 * Per tick, `write-i = 1` replaces slot i's contents with `selected`,
 * `write-i = -1` empties it, and `read-i = 1` adds slot i to the output
 * selection. Commands outside the vocabulary are ignored.
 */
export class SlotStore extends RegisterProcess<SlotInputs, SlotOutput> {
  private store = WeightedMap.empty(slotKeyKind);
  private readonly reads = new CommandDecoder<number>();
  private readonly writes = new CommandDecoder<number>();

  constructor(readonly slots: number, options: SlotStoreOptions = {}) {
    super(options);
    if (!Number.isInteger(slots) || slots <= 0) {
      throw new ConfigurationError(`slot count must be a positive integer, got ${slots}`);
    }
    for (const i of this.indices()) {
      this.reads.define(this.dim(`read-${i}`), i, READ_VALUES);
      this.writes.define(this.dim(`write-${i}`), i, WRITE_VALUES);
    }
  }

  /** Applies the tick's writes, then reads from the updated store. */
  step(commands: WeightedMap<Feature>, selected: WeightedMap<Chunk>, match: WeightedMap<Chunk>): SlotOutput {
    commands.assertKind(featureKind);
    selected.assertKind(chunkKind);
    match.assertKind(chunkKind);

    this.update(commands, selected);
    return [this.read(commands), this.status(match)];
  }

  update(commands: WeightedMap<Feature>, selected: WeightedMap<Chunk>): void {
    commands.assertKind(featureKind);
    selected.assertKind(chunkKind);

    const changed = this.command(commands, this.writes, (v) => v === 1 || v === -1);
    const written = this.command(commands, this.writes, (v) => v === 1);

    const cleared = this.store.put(indexKind, changed.rsub(1), slotOf).squeeze();
    this.store = cleared.merge(written.outer(selected).squeeze());

    for (const slot of changed.keys()) {
      if (written.has(slot)) {
        this.tracer?.event('slot_write', { slot, chunks: selected.squeeze().keys() });
      } else {
        this.tracer?.event('slot_clear', { slot });
      }
    }
  }

  /**
   * Chunks of every slot with `read-i = 1`. A chunk held by several requested
   * slots appears once, at its strongest weight.
   */
  read(commands: WeightedMap<Feature>): WeightedMap<Chunk> {
    commands.assertKind(featureKind);
    const requested = this.command(commands, this.reads, (v) => v === 1);
    const chunks = this.store
      .put(indexKind, requested, slotOf)
      .squeeze()
      .maxBy(chunkKind, chunkOf);

    if (requested.size > 0) {
      this.tracer?.event('slot_read', { slots: requested.keys(), chunks: chunks.keys() });
    }
    return chunks;
  }

  /**
   * `full-i` is +1 for a slot holding nonzero content and -1 otherwise, for
   * every slot. `match-i` is the competitive score of the slot's chunk within
   * `match`: 0 for the best-scoring candidate, negative for the rest. Slots
   * whose chunks `match` does not score carry no `match-i` entry.
   */
  status(match: WeightedMap<Chunk>): WeightedMap<Feature> {
    match.assertKind(chunkKind);

    const full = this.store
      .abs()
      .sumBy(indexKind, slotOf)
      .greater(0)
      .mul(2)
      .sub(1)
      .withKeys(this.indices())
      .setC(0)
      .transformKeys(featureKind, (i) => feature(this.dim(`full-${i}`)));

    const scores = match.camBy(indexKind, () => 0);
    const agreement = this.store
      .keep((key, weight) => weight !== 0 && match.has(chunkOf(key)))
      .lookup(chunkKind, scores, chunkOf)
      .maxBy(indexKind, slotOf)
      .setC(0)
      .squeeze()
      .transformKeys(featureKind, (i) => feature(this.dim(`match-${i}`)));

    return full.add(agreement);
  }

  /** Chunks currently held by one slot, empty for unknown slots. */
  contents(slot: number): WeightedMap<Chunk> {
    return this.store
      .keep((key, weight) => slotOf(key) === slot && weight !== 0)
      .transformKeys(chunkKind, chunkOf);
  }

  get state(): WeightedMap<SlotKey> {
    return this.store;
  }

  get initial(): SlotOutput {
    return [WeightedMap.empty(chunkKind), WeightedMap.empty(featureKind)];
  }

  get flags(): Feature[] {
    return [
      ...this.indices().map((i) => feature(this.dim(`full-${i}`))),
      ...this.indices().map((i) => feature(this.dim(`match-${i}`))),
    ];
  }

  get cmds(): Feature[] {
    const out: Feature[] = [];
    for (const i of this.indices()) {
      for (const v of READ_VALUES) out.push(feature(this.dim(`read-${i}`), v));
      for (const v of WRITE_VALUES) out.push(feature(this.dim(`write-${i}`), v));
    }
    return out;
  }

  get nops(): Feature[] {
    return this.indices().flatMap((i) => [
      feature(this.dim(`read-${i}`), 0),
      feature(this.dim(`write-${i}`), 0),
    ]);
  }

  private indices(): number[] {
    return Array.from({ length: this.slots }, (_, i) => i + 1);
  }

  // Slots addressed by issued, in-vocabulary commands whose value passes `accept`.
  private command(
    commands: WeightedMap<Feature>,
    decoder: CommandDecoder<number>,
    accept: (value: FeatureValue) => boolean,
  ): WeightedMap<number> {
    return commands
      .keep((cmd, weight) => weight > 0 && decoder.accepts(cmd) && accept(cmd.value))
      .transformKeys(indexKind, (cmd) => decoder.target(cmd.dim))
      .mask();
  }
}
