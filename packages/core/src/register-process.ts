import { type Feature, ConfigurationError, isPath, withPrefix } from '@wmreg/shared';
import type { StepTracer } from './trace-logger.js';

export interface RegisterProcessOptions {
  /** Namespace for every dimension the store consumes or emits. */
  prefix?: string;
  tracer?: StepTracer;
}

/**
 * A stateful register driven once per tick. Configuration is fixed at
 * construction; `step` consumes the tick's signals, updates the single state
 * field and returns the tick's outputs.
 */
export abstract class RegisterProcess<I extends unknown[], O> {
  readonly prefix: string | undefined;
  protected tracer: StepTracer | undefined;

  constructor(options: RegisterProcessOptions = {}) {
    if (options.prefix !== undefined && !isPath(options.prefix)) {
      throw new ConfigurationError(`prefix '${options.prefix}' is not a valid path`);
    }
    this.prefix = options.prefix;
    this.tracer = options.tracer;
  }

  abstract step(...inputs: I): O;

  /** Output before the first tick. */
  abstract get initial(): O;

  /** Every command feature the store understands. */
  abstract get cmds(): Feature[];

  /** Commands that leave the store unchanged. */
  abstract get nops(): Feature[];

  /** Status features the store emits. */
  abstract get flags(): Feature[];

  setTracer(tracer: StepTracer | undefined): void {
    this.tracer = tracer;
  }

  protected dim(name: string): string {
    return withPrefix(name, this.prefix);
  }
}
