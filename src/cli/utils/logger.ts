/**
 * CLI 专用日志工具，提供带颜色的统一输出格式。
 *
 * 全部写到 stderr：stdout 只输出诊断报告，便于重定向。
 */

import { AnsiColor } from '../../utils/ansi.js';

function colorize(symbol: string, message: string, color: AnsiColor): string {
  return `${color}${symbol}${AnsiColor.Reset} ${message}`;
}

// 使用 Unicode 符号：绿色✓ / 红色✗ / 黄色⚠。

export function info(message: string): void {
  console.error(colorize('ℹ', message, AnsiColor.Cyan));
}

export function success(message: string): void {
  console.error(colorize('✓', message, AnsiColor.Green));
}

export function warn(message: string): void {
  console.warn(colorize('⚠', message, AnsiColor.Yellow));
}

export function error(message: string): void {
  console.error(colorize('✗', message, AnsiColor.Red));
}
