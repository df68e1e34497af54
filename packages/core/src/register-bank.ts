import {
  type Feature,
  type RegistersConfig,
  ConfigurationError,
  featureKind,
} from '@wmreg/shared';
import { FlagStore } from './flag-store.js';
import { SlotStore } from './slot-store.js';
import type { StepTracer } from './trace-logger.js';

export interface StoreVocabulary {
  store: string;
  type: 'flags' | 'slots';
  cmds: string[];
  nops: string[];
  flags: string[];
}

/**
 * Named FlagStores and SlotStores built from configuration. Dimensions are
 * checked across the whole bank so that no two stores consume or emit the
 * same one.
 */
export class RegisterBank {
  private readonly flagStores = new Map<string, FlagStore>();
  private readonly slotStores = new Map<string, SlotStore>();

  constructor(config: RegistersConfig, tracer?: StepTracer) {
    for (const entry of config.flags) {
      this.claimName(entry.name);
      this.flagStores.set(entry.name, new FlagStore(entry.flags, {
        values: entry.values,
        prefix: entry.prefix,
        tracer,
      }));
    }
    for (const entry of config.slots) {
      this.claimName(entry.name);
      this.slotStores.set(entry.name, new SlotStore(entry.slots, {
        prefix: entry.prefix,
        tracer,
      }));
    }
    this.checkDimensions();
  }

  flags(name: string): FlagStore {
    const store = this.flagStores.get(name);
    if (!store) throw new ConfigurationError(`unknown flag store '${name}'`);
    return store;
  }

  slots(name: string): SlotStore {
    const store = this.slotStores.get(name);
    if (!store) throw new ConfigurationError(`unknown slot store '${name}'`);
    return store;
  }

  get flagStoreNames(): string[] {
    return [...this.flagStores.keys()];
  }

  get slotStoreNames(): string[] {
    return [...this.slotStores.keys()];
  }

  setTracer(tracer: StepTracer | undefined): void {
    for (const store of this.all()) store.setTracer(tracer);
  }

  vocabulary(): StoreVocabulary[] {
    const describe = (store: string, type: StoreVocabulary['type'], process: Described): StoreVocabulary => ({
      store,
      type,
      cmds: process.cmds.map(featureLabel),
      nops: process.nops.map(featureLabel),
      flags: process.flags.map(featureLabel),
    });
    return [
      ...[...this.flagStores].map(([name, store]) => describe(name, 'flags', store)),
      ...[...this.slotStores].map(([name, store]) => describe(name, 'slots', store)),
    ];
  }

  private all(): Described[] {
    return [...this.flagStores.values(), ...this.slotStores.values()];
  }

  private claimName(name: string): void {
    if (this.flagStores.has(name) || this.slotStores.has(name)) {
      throw new ConfigurationError(`duplicate store name '${name}'`);
    }
  }

  private checkDimensions(): void {
    const owners = new Map<string, string>();
    const stores: Array<[string, Described]> = [...this.flagStores, ...this.slotStores];
    for (const [name, store] of stores) {
      const dims = new Set([...store.cmds, ...store.flags].map((f) => f.dim));
      for (const dim of dims) {
        const owner = owners.get(dim);
        if (owner !== undefined) {
          throw new ConfigurationError(`dimension '${dim}' used by both '${owner}' and '${name}'`);
        }
        owners.set(dim, name);
      }
    }
  }
}

interface Described {
  readonly cmds: Feature[];
  readonly nops: Feature[];
  readonly flags: Feature[];
  setTracer(tracer: StepTracer | undefined): void;
}

const featureLabel = (f: Feature): string => featureKind.label(f);
