export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface FlagStoreConfig {
  name: string;
  flags: string[];
  values?: number[];
  prefix?: string;
}

export interface SlotStoreConfig {
  name: string;
  slots: number;
  prefix?: string;
}

export interface RegistersConfig {
  flags: FlagStoreConfig[];
  slots: SlotStoreConfig[];
}

export interface LoggingConfig {
  level: LogLevel;
  trace: boolean;
}

export interface WmregConfig {
  registers: RegistersConfig;
  logging: LoggingConfig;
}
