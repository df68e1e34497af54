export type { Feature, FeatureValue, Chunk, SlotKey, KeyKind } from './types/keys.js';
export type {
  LogLevel,
  FlagStoreConfig,
  SlotStoreConfig,
  RegistersConfig,
  LoggingConfig,
  WmregConfig,
} from './types/config.js';
export type { TraceEventType, TraceEvent, TraceSpan, ExecutionTrace } from './types/trace.js';

export {
  feature,
  slotKey,
  slotOf,
  chunkOf,
  featureKind,
  chunkKind,
  indexKind,
  pairKind,
  slotKeyKind,
} from './keys/kinds.js';

export {
  logLevelSchema,
  flagStoreConfigSchema,
  slotStoreConfigSchema,
  registersConfigSchema,
  loggingConfigSchema,
  wmregConfigSchema,
} from './schemas/config.schema.js';

export {
  DEFAULT_FLAG_VALUES,
  SET_PREFIX,
  READ_VALUES,
  WRITE_VALUES,
  CONFIG_FILE_NAMES,
  DEFAULT_CONFIG,
} from './constants.js';

export * from './utils/index.js';
