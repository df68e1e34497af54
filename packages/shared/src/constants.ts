import type { WmregConfig } from './types/config.js';

/** Values a flag command may carry besides the `null` reset marker. */
export const DEFAULT_FLAG_VALUES: readonly number[] = [-1, 0, 1];

/** Reserved leading word of flag command dimensions (`set-<flag>`). */
export const SET_PREFIX = 'set';

export const READ_VALUES: readonly number[] = [0, 1];
export const WRITE_VALUES: readonly number[] = [-1, 0, 1];

export const CONFIG_FILE_NAMES = ['wmreg.config.yaml', 'wmreg.config.yml', 'wmreg.config.json'];

export const DEFAULT_CONFIG: WmregConfig = {
  registers: {
    flags: [],
    slots: [],
  },
  logging: {
    level: 'info',
    trace: false,
  },
};
