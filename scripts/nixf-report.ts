#!/usr/bin/env node
import { cac } from 'cac';
import { DEFAULT_PAYLOAD_SUFFIX, reportCommand, type ReportOptions } from '../src/cli/commands/report.js';
import { handleError } from '../src/cli/utils/error-handler.js';

function wrapAction<Args extends unknown[]>(fn: (...args: Args) => Promise<void> | void) {
  return async (...args: Args): Promise<void> => {
    try {
      await fn(...args);
    } catch (error) {
      handleError(error);
    }
  };
}

function positiveInt(value: unknown): number | undefined {
  const parsed = Number(value);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : undefined;
}

async function main(): Promise<void> {
  const cli = cac('nixf-report');

  cli
    .command('[...files]', '渲染 nixf-tidy 诊断，可选地应用修复')
    .option('-i, --ignore <id>', '忽略指定 id 的诊断（可多次使用）')
    .option('--no-variable-lookup', '丢弃变量查找分析产生的诊断')
    .option('--fix', '将每个诊断的首选修复写回源文件', { default: false })
    .option('--payload-suffix <suffix>', 'nixf-tidy 输出文件的后缀', { default: DEFAULT_PAYLOAD_SUFFIX })
    .option('--color', '强制输出 ANSI 颜色')
    .option('--tab-width <n>', '制表符展开宽度')
    .option('--concurrency <n>', '同时处理的文件数')
    .action(
      wrapAction(async (files: string[], options: Record<string, unknown>) => {
        const reportOptions: ReportOptions = {
          variableLookup: options.variableLookup !== false,
          fix: Boolean(options.fix),
        };
        const ignore = options.ignore;
        if (typeof ignore === 'string') {
          reportOptions.ignore = ignore;
        } else if (Array.isArray(ignore)) {
          reportOptions.ignore = ignore.map(String);
        }
        if (typeof options.payloadSuffix === 'string') {
          reportOptions.payloadSuffix = options.payloadSuffix;
        }
        if (options.color === true) {
          reportOptions.color = true;
        }
        const tabWidth = positiveInt(options.tabWidth);
        if (tabWidth !== undefined) {
          reportOptions.tabWidth = tabWidth;
        }
        const concurrency = positiveInt(options.concurrency);
        if (concurrency !== undefined) {
          reportOptions.concurrency = concurrency;
        }

        const summary = await reportCommand(files, reportOptions);
        if (summary.diagnostics > 0 || summary.failed > 0) {
          process.exitCode = 1;
        }
      })
    );

  cli.help();
  cli.version('0.1.0');
  cli.parse();
}

main().catch(handleError);
