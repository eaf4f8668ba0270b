import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { Logger, LogLevel } from '../../../src/utils/logger.js';

describe('Logger', { concurrency: false }, () => {
  let originalError: typeof console.error;
  let lines: string[];

  beforeEach(() => {
    lines = [];
    originalError = console.error;
    console.error = (message?: unknown) => {
      lines.push(String(message ?? ''));
    };
  });

  afterEach(() => {
    console.error = originalError;
  });

  it('以单行 JSON 写出组件、级别与元数据', () => {
    new Logger('pipeline', LogLevel.DEBUG).warn('fixes not applied', { file: 'a.nix' });

    assert.equal(lines.length, 1);
    const entry: unknown = JSON.parse(lines[0] ?? '');
    assert.ok(typeof entry === 'object' && entry !== null);
    assert.equal(Reflect.get(entry, 'level'), 'WARN');
    assert.equal(Reflect.get(entry, 'component'), 'pipeline');
    assert.equal(Reflect.get(entry, 'message'), 'fixes not applied');
    assert.equal(Reflect.get(entry, 'file'), 'a.nix');
  });

  it('低于最小级别的记录被丢弃', () => {
    const logger = new Logger('pipeline', LogLevel.WARN);
    logger.debug('diagnostics selected');
    assert.deepEqual(lines, []);
  });
});
