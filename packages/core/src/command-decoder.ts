import {
  type Feature,
  type FeatureValue,
  CommandError,
  ConfigurationError,
  feature,
} from '@wmreg/shared';
import type { WeightedMap } from './weighted-map.js';

interface Route<T> {
  target: T;
  values: readonly FeatureValue[];
}

/**
 * Vocabulary of command dimensions a store accepts, resolved once at
 * construction. Each dimension routes to a target (a flag feature, a slot
 * index) and lists the values it may carry.
 */
export class CommandDecoder<T> {
  private readonly routes = new Map<string, Route<T>>();

  define(dim: string, target: T, values: readonly FeatureValue[]): this {
    if (this.routes.has(dim)) {
      throw new ConfigurationError(`duplicate command dimension '${dim}'`);
    }
    this.routes.set(dim, { target, values });
    return this;
  }

  target(dim: string): T | undefined {
    return this.routes.get(dim)?.target;
  }

  accepts(command: Feature): boolean {
    const route = this.routes.get(command.dim);
    return route !== undefined && route.values.includes(command.value);
  }

  /**
   * Throws `CommandError` for the first issued command outside the
   * vocabulary. A command counts as issued when its weight is positive.
   */
  validate(commands: WeightedMap<Feature>): void {
    for (const [command, weight] of commands.entries()) {
      if (weight <= 0) continue;
      const route = this.routes.get(command.dim);
      if (!route) {
        throw new CommandError(command.dim, 'unknown command dimension');
      }
      if (!route.values.includes(command.value)) {
        throw new CommandError(command.dim, `unsupported value ${String(command.value)}`);
      }
    }
  }

  get dims(): string[] {
    return [...this.routes.keys()];
  }

  get vocabulary(): Feature[] {
    const out: Feature[] = [];
    for (const [dim, route] of this.routes) {
      for (const value of route.values) {
        out.push(feature(dim, value));
      }
    }
    return out;
  }
}
