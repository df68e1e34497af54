export { generateId } from './id.js';
export { monotonicNow, elapsedSince, isoNow } from './clock.js';
export { isPath, withPrefix, PATH_SEPARATOR } from './path.js';
export {
  WmregError,
  ConfigurationError,
  KeyMappingError,
  DomainError,
  CommandError,
} from './errors.js';
