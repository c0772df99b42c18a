/**
 * Core Module
 *
 * @module digraph-kit/core
 */

export {
  ConstructionError,
  ExclusionError,
  type ExclusionSide,
  GraphError,
  NotFoundError,
  type NotFoundKind,
} from "./errors.ts";
export {
  type ConsoleLoggerOptions,
  createConsoleLogger,
  DEFAULT_CONSOLE_LOGGER_OPTIONS,
  getLogger,
  type Logger,
  type LogLevel,
  resetLogger,
  setLogger,
} from "./logger.ts";
export { type Maybe, none, orElse, some } from "./maybe.ts";
