/**
 * Centralized utility exports
 */

export { logger, createLogger, type LogLevel } from "./logger";
export { deriveDisplayName } from "./display-name";
export { EventBus, type Listener } from "./events";
export {
  normalizeUrl,
  validateUrl,
  type ValidationError,
  type ValidationErrorCode,
  type ValidationResult,
} from "./url";
