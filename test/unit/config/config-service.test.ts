import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { ConfigService } from '../../../src/config/config-service.js';
import { LogLevel } from '../../../src/utils/logger.js';

const ENV_KEYS = [
  'LOG_LEVEL',
  'NIXF_REPORT_TAB_WIDTH',
  'NIXF_REPORT_INLINE_WIDTH',
  'NIXF_REPORT_CONCURRENCY',
  'NO_COLOR',
  'FORCE_COLOR',
];

const ORIGINAL_ENV: Record<string, string | undefined> = Object.fromEntries(
  ENV_KEYS.map((key) => [key, process.env[key]])
);

function restoreEnv(): void {
  for (const key of ENV_KEYS) {
    const value = ORIGINAL_ENV[key];
    if (typeof value === 'undefined') {
      delete process.env[key];
    } else {
      process.env[key] = value;
    }
  }
}

function clearEnv(): void {
  for (const key of ENV_KEYS) {
    delete process.env[key];
  }
}

describe('ConfigService', { concurrency: false }, () => {
  beforeEach(() => {
    clearEnv();
    ConfigService.resetForTesting();
  });

  afterEach(() => {
    restoreEnv();
    ConfigService.resetForTesting();
  });

  it('未设置环境变量时使用默认值', () => {
    process.env.NO_COLOR = '1';
    const config = ConfigService.getInstance();
    assert.equal(config.logLevel, LogLevel.INFO);
    assert.equal(config.tabWidth, 4);
    assert.equal(config.inlineWidth, 80);
    assert.equal(config.concurrency, 4);
    assert.equal(config.color, false);
  });

  it('读取数值与日志级别配置', () => {
    process.env.LOG_LEVEL = 'debug';
    process.env.NIXF_REPORT_TAB_WIDTH = '2';
    process.env.NIXF_REPORT_INLINE_WIDTH = '120';
    process.env.NIXF_REPORT_CONCURRENCY = '8';
    const config = ConfigService.getInstance();
    assert.equal(config.logLevel, LogLevel.DEBUG);
    assert.equal(config.tabWidth, 2);
    assert.equal(config.inlineWidth, 120);
    assert.equal(config.concurrency, 8);
  });

  it('非法数值回退到默认值', () => {
    process.env.LOG_LEVEL = 'verbose';
    process.env.NIXF_REPORT_TAB_WIDTH = '-3';
    process.env.NIXF_REPORT_CONCURRENCY = 'many';
    const config = ConfigService.getInstance();
    assert.equal(config.logLevel, LogLevel.INFO);
    assert.equal(config.tabWidth, 4);
    assert.equal(config.concurrency, 4);
  });

  it('FORCE_COLOR 启用颜色，NO_COLOR 优先', () => {
    process.env.FORCE_COLOR = '1';
    assert.equal(ConfigService.getInstance().color, true);

    ConfigService.resetForTesting();
    process.env.NO_COLOR = '1';
    assert.equal(ConfigService.getInstance().color, false);
  });

  it('单例在重置前保持不变', () => {
    const first = ConfigService.getInstance();
    process.env.NIXF_REPORT_TAB_WIDTH = '8';
    assert.equal(ConfigService.getInstance(), first);
    assert.equal(first.tabWidth, 4);
  });
});
