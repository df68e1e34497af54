export { WeightedMap } from './weighted-map.js';
export { CommandDecoder } from './command-decoder.js';
export { RegisterProcess, type RegisterProcessOptions } from './register-process.js';
export { FlagStore, type FlagStoreOptions } from './flag-store.js';
export { SlotStore, type SlotStoreOptions, type SlotOutput } from './slot-store.js';
export { RegisterBank, type StoreVocabulary } from './register-bank.js';
export { TraceLogger, type StepTracer } from './trace-logger.js';
export { ConfigManager, type ConfigLoadOptions } from './config-manager.js';
