/**
 * @module config-service
 *
 * 统一配置管理服务：集中读取所有环境变量配置。
 *
 * **设计目标**：
 * - 单一数据源：渲染宽度、并发度、日志级别等均从 ConfigService 获取
 * - 类型安全：非法数值在启动时回退到默认值
 * - 可测试性：支持测试环境下重置配置
 *
 * **使用方式**：
 * ```typescript
 * import { ConfigService } from './config/config-service.js';
 *
 * const config = ConfigService.getInstance();
 * const renderer = new DiagnosticRenderer(index, { tabWidth: config.tabWidth });
 * ```
 *
 * CLI 参数（--tab-width、--concurrency、--color）优先于这里的环境变量。
 */

import { LogLevel } from '../utils/logger.js';

const DEFAULT_TAB_WIDTH = 4;
const DEFAULT_INLINE_WIDTH = 80;
const DEFAULT_CONCURRENCY = 4;

/**
 * 配置服务单例类。
 *
 * 首次调用 getInstance() 时从环境变量读取配置，之后保持只读。
 */
export class ConfigService {
  private static instance: ConfigService | null = null;

  /** 日志级别（LOG_LEVEL，默认 INFO） */
  readonly logLevel: LogLevel;

  /** 制表符展开宽度（NIXF_REPORT_TAB_WIDTH，默认 4） */
  readonly tabWidth: number;

  /** 行内标签的最大宽度，超出则换行显示（NIXF_REPORT_INLINE_WIDTH，默认 80） */
  readonly inlineWidth: number;

  /** 同时处理的文件数（NIXF_REPORT_CONCURRENCY，默认 4） */
  readonly concurrency: number;

  /** 是否输出 ANSI 颜色（NO_COLOR 禁用，FORCE_COLOR 强制启用，否则看 stdout 是否为 TTY） */
  readonly color: boolean;

  private constructor() {
    this.logLevel = this.parseLogLevel(process.env.LOG_LEVEL);
    this.tabWidth = this.parsePositiveInt(process.env.NIXF_REPORT_TAB_WIDTH, DEFAULT_TAB_WIDTH);
    this.inlineWidth = this.parsePositiveInt(process.env.NIXF_REPORT_INLINE_WIDTH, DEFAULT_INLINE_WIDTH);
    this.concurrency = this.parsePositiveInt(process.env.NIXF_REPORT_CONCURRENCY, DEFAULT_CONCURRENCY);
    this.color = this.parseColor();
  }

  /**
   * 解析 LOG_LEVEL 环境变量为 LogLevel 枚举值。
   *
   * @param raw - 原始环境变量值
   * @returns 解析后的 LogLevel，默认 INFO
   */
  private parseLogLevel(raw: string | undefined): LogLevel {
    switch (raw?.toUpperCase()) {
      case 'DEBUG':
        return LogLevel.DEBUG;
      case 'WARN':
        return LogLevel.WARN;
      case 'ERROR':
        return LogLevel.ERROR;
      default:
        return LogLevel.INFO;
    }
  }

  private parsePositiveInt(raw: string | undefined, fallback: number): number {
    if (!raw) return fallback;
    const value = Number(raw);
    return Number.isInteger(value) && value > 0 ? value : fallback;
  }

  private parseColor(): boolean {
    if (process.env.NO_COLOR) return false;
    if (process.env.FORCE_COLOR && process.env.FORCE_COLOR !== '0') return true;
    return Boolean(process.stdout.isTTY);
  }

  /**
   * 获取 ConfigService 单例实例。
   *
   * @returns ConfigService 实例
   */
  static getInstance(): ConfigService {
    if (ConfigService.instance === null) {
      ConfigService.instance = new ConfigService();
    }
    return ConfigService.instance;
  }

  /**
   * 重置单例实例（仅用于测试）。
   *
   * 重置后，下次调用 getInstance() 会重新读取环境变量。
   */
  static resetForTesting(): void {
    ConfigService.instance = null;
  }
}
