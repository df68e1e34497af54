import {
  type Feature,
  type FeatureValue,
  CommandError,
  ConfigurationError,
  DEFAULT_FLAG_VALUES,
  SET_PREFIX,
  feature,
  featureKind,
  isPath,
} from '@wmreg/shared';
import { CommandDecoder } from './command-decoder.js';
import { RegisterProcess, type RegisterProcessOptions } from './register-process.js';
import { WeightedMap } from './weighted-map.js';

export interface FlagStoreOptions extends RegisterProcessOptions {
  /** Values a set command may carry besides `null`. Defaults to -1, 0, 1. */
  values?: readonly number[];
}

/**
 * Named ternary flags that persist across ticks.
 *
 * Command `set-<flag>` with value `null` resets the flag to 0, `1` raises it,
 * `-1` lowers it; any other declared value is a no-op. Within one tick the
 * commands apply as reset, then raise, then lower, so the last one wins.
 * Commands outside the vocabulary raise `CommandError`.
 */
export class FlagStore extends RegisterProcess<[WeightedMap<Feature>], WeightedMap<Feature>> {
  readonly names: readonly string[];
  readonly values: readonly number[];

  private store = WeightedMap.empty(featureKind);
  private readonly decoder = new CommandDecoder<Feature>();

  constructor(names: readonly string[], options: FlagStoreOptions = {}) {
    super(options);

    const seen = new Set<string>();
    for (const name of names) {
      if (!isPath(name)) {
        throw new ConfigurationError(`flag name '${name}' is not a valid path`);
      }
      if (name.startsWith(SET_PREFIX)) {
        throw new ConfigurationError(`flag name '${name}' starts with reserved prefix '${SET_PREFIX}'`);
      }
      if (seen.has(name)) {
        throw new ConfigurationError(`duplicate flag name '${name}'`);
      }
      seen.add(name);
    }

    const values = options.values ?? DEFAULT_FLAG_VALUES;
    if (new Set(values).size !== values.length || !values.every(Number.isFinite)) {
      throw new ConfigurationError('flag values must be distinct finite numbers');
    }

    this.names = [...names];
    this.values = [...values];
    for (const name of this.names) {
      this.decoder.define(this.commandDim(name), feature(this.dim(name)), [null, ...this.values]);
    }
  }

  step(commands: WeightedMap<Feature>): WeightedMap<Feature> {
    this.update(commands);
    return this.store;
  }

  update(commands: WeightedMap<Feature>): void {
    commands.assertKind(featureKind);
    try {
      this.decoder.validate(commands);
    } catch (err) {
      if (err instanceof CommandError) {
        this.tracer?.event('command_rejected', { dim: err.dim, message: err.message });
      }
      throw err;
    }

    const reset = this.signal(commands, null);
    const raise = this.signal(commands, 1);
    const lower = this.signal(commands, -1);

    this.store = this.store
      .mul(reset.rsub(1))
      .squeeze()
      .merge(raise)
      .merge(lower.mul(-1));

    if (reset.size + raise.size + lower.size > 0) {
      this.tracer?.event('flag_update', {
        reset: reset.keys().map((f) => f.dim),
        raise: raise.keys().map((f) => f.dim),
        lower: lower.keys().map((f) => f.dim),
      });
    }
  }

  /** Current flag values; the store's state and output are the same map. */
  get state(): WeightedMap<Feature> {
    return this.store;
  }

  get initial(): WeightedMap<Feature> {
    return WeightedMap.empty(featureKind);
  }

  get flags(): Feature[] {
    return this.names.map((name) => feature(this.dim(name)));
  }

  get cmds(): Feature[] {
    return this.decoder.vocabulary;
  }

  /**
   * The `null`-valued command for every flag. Applying them resets every
   * flag to 0, which clears the store.
   */
  get nops(): Feature[] {
    return this.names.map((name) => feature(this.commandDim(name), null));
  }

  private commandDim(name: string): string {
    return this.dim(`${SET_PREFIX}-${name}`);
  }

  // Issued commands carrying `value`, keyed by the flag they address.
  private signal(commands: WeightedMap<Feature>, value: FeatureValue): WeightedMap<Feature> {
    return commands
      .keep((cmd, weight) => weight > 0 && cmd.value === value)
      .transformKeys(featureKind, (cmd) => this.decoder.target(cmd.dim))
      .mask();
  }
}
