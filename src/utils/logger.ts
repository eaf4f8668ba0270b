/**
 * 结构化日志：每条记录是一行 JSON，写到 stderr。
 *
 * stdout 只留给诊断报告，因此这里从不使用 console.log。
 * 级别来自 ConfigService（LOG_LEVEL）。
 */

import { ConfigService } from '../config/config-service.js';

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

export interface LogMetadata {
  [key: string]: unknown;
}

export class Logger {
  constructor(private readonly component: string, private readonly minLevel: LogLevel = LogLevel.INFO) {}

  debug(message: string, meta?: LogMetadata): void {
    this.write(LogLevel.DEBUG, message, meta);
  }

  warn(message: string, meta?: LogMetadata): void {
    this.write(LogLevel.WARN, message, meta);
  }

  private write(level: LogLevel, message: string, meta?: LogMetadata): void {
    if (level < this.minLevel) return;
    console.error(
      JSON.stringify({
        level: LogLevel[level],
        timestamp: new Date().toISOString(),
        component: this.component,
        message,
        ...meta,
      })
    );
  }
}

export interface PerformanceMetrics {
  /** 记录所属组件，作为日志的 component 字段 */
  component: string;
  operation: string;
  duration: number;
  metadata?: LogMetadata;
}

export function logPerformance(metrics: PerformanceMetrics): void {
  createLogger(metrics.component).debug(`${metrics.operation} completed`, {
    duration_ms: Math.round(metrics.duration),
    ...metrics.metadata,
  });
}

export function createLogger(component: string): Logger {
  return new Logger(component, ConfigService.getInstance().logLevel);
}
