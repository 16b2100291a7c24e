/**
 * Configuration read from the environment.
 *
 *   NODE_ENV           test | development | production (default development)
 *   TOKREX_LOG_LEVEL   debug | info | warn | error, overrides the
 *                      environment's minimum log level
 */

import { type Environment, type LogLevel, type Logger, createLogger, isLogLevel } from './logger.js';
import { TokenRuleContext } from './rule-context.js';
import { TokrexError } from './errors.js';

export type Env = Readonly<Record<string, string | undefined>>;

export interface ProcessorOptions {
  /** Base context whose rule definitions every attempt sees. */
  context?: TokenRuleContext;
  logger?: Logger;
}

export interface ResolvedProcessorOptions {
  context: TokenRuleContext;
  logger: Logger;
}

const ENVIRONMENTS: readonly Environment[] = ['test', 'development', 'production'];

export function resolveEnvironment(env: Env = process.env): Environment {
  const value = env.NODE_ENV;
  return ENVIRONMENTS.find(e => e === value) ?? 'development';
}

export function resolveLogLevel(env: Env = process.env): LogLevel | undefined {
  const value = env.TOKREX_LOG_LEVEL;
  if (value === undefined || value === '') return undefined;
  if (!isLogLevel(value)) {
    throw new TokrexError(`Invalid TOKREX_LOG_LEVEL '${value}', expected debug, info, warn or error`);
  }
  return value;
}

export function createDefaultLogger(env: Env = process.env): Logger {
  return createLogger({ environment: resolveEnvironment(env), minLevel: resolveLogLevel(env) });
}

export function resolveProcessorOptions(options: ProcessorOptions = {}, env: Env = process.env): ResolvedProcessorOptions {
  return {
    context: options.context ?? TokenRuleContext.empty(),
    logger: options.logger ?? createDefaultLogger(env),
  };
}
