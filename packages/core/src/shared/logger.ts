import { pino } from 'pino';
import type { Logger } from 'pino';

export type { Logger } from 'pino';

let rootLogger: Logger = pino({
  name: 'eligibility-ledger',
  level: process.env.LOG_LEVEL ?? 'info',
});

export function getLogger(module?: string): Logger {
  return module ? rootLogger.child({ module }) : rootLogger;
}

/**
 * Replace the root logger, e.g. with `pino({ level: 'silent' })` in tests or a
 * logger carrying deployment bindings.
 */
export function setRootLogger(logger: Logger): void {
  rootLogger = logger;
}

export function createLogger(level: string): Logger {
  return pino({ name: 'eligibility-ledger', level });
}
