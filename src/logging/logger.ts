import winston from 'winston';
import type { PayrollIssue } from '../core/errors';

export interface PayrollLogger {
  debug(message: string, meta?: Record<string, unknown>): unknown;
  info(message: string, meta?: Record<string, unknown>): unknown;
  warn(message: string, meta?: Record<string, unknown>): unknown;
  error(message: string, meta?: Record<string, unknown>): unknown;
}

export const createLogger = (service: string): PayrollLogger => {
  return winston.createLogger({
    level: process.env.PAYROLL_LOG_LEVEL ?? 'info',
    silent: process.env.NODE_ENV === 'test',
    format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
    defaultMeta: { service },
    transports: [new winston.transports.Console()],
  });
};

/** 计算过程本身不写日志，只在编排层把收集到的 issue 交给 logger */
export function reportIssues(logger: PayrollLogger, issues: readonly PayrollIssue[]): void {
  for (const issue of issues) {
    const { level, message, ...rest } = issue;
    if (level === 'ERROR') logger.error(message, rest);
    else if (level === 'WARNING') logger.warn(message, rest);
    else logger.info(message, rest);
  }
}
