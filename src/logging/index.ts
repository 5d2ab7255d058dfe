/**
 * Logging and observability utilities.
 */

export { generateVerificationId, parseVerificationTimestamp } from "./run-id.js";
export {
  createLogger,
  createSilentLogger,
  type Logger,
  type LogLevel,
  type LoggerOptions,
  type LogBindings,
} from "./logger.js";
