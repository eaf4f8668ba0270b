import { readFile, writeFile } from 'node:fs/promises';
import { performance } from 'node:perf_hooks';
import pLimit from 'p-limit';
import { ConfigService } from '../../config/config-service.js';
import { processFile, type FileOutcome } from '../../pipeline/process-file.js';
import { logPerformance } from '../../utils/logger.js';
import { error as logError, info, success, warn } from '../utils/logger.js';

export const DEFAULT_PAYLOAD_SUFFIX = '.tidy.json';

export interface ReportOptions {
  /** cac yields a string for one `--ignore` and an array for several. */
  ignore?: string | string[];
  variableLookup?: boolean;
  fix?: boolean;
  payloadSuffix?: string;
  color?: boolean;
  tabWidth?: number;
  concurrency?: number;
  /** Sink for rendered reports; one call per file. Defaults to stdout. */
  write?: (chunk: string) => void;
  /** Writes a fixed buffer back to its source file. Defaults to fs writeFile. */
  writeBack?: (file: string, data: Buffer) => Promise<void>;
}

export interface ReportSummary {
  readonly files: number;
  readonly diagnostics: number;
  readonly fixed: number;
  readonly failed: number;
}

type FileResult =
  | { readonly kind: 'ok'; readonly outcome: FileOutcome }
  | { readonly kind: 'unwritable'; readonly outcome: FileOutcome; readonly error: Error }
  | { readonly kind: 'unreadable'; readonly file: string; readonly error: Error };

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

function toIgnoreSet(ignore: string | string[] | undefined): ReadonlySet<string> {
  if (ignore === undefined) return new Set();
  return new Set(Array.isArray(ignore) ? ignore : [ignore]);
}

export async function reportCommand(files: readonly string[], options: ReportOptions = {}): Promise<ReportSummary> {
  if (files.length === 0) {
    info('没有需要处理的文件');
    return { files: 0, diagnostics: 0, fixed: 0, failed: 0 };
  }

  const config = ConfigService.getInstance();
  const suffix = options.payloadSuffix ?? DEFAULT_PAYLOAD_SUFFIX;
  const write = options.write ?? ((chunk: string) => void process.stdout.write(chunk));
  const writeBack = options.writeBack ?? ((file: string, data: Buffer) => writeFile(file, data));
  const fix = Boolean(options.fix);
  const processOptions = {
    ignore: toIgnoreSet(options.ignore),
    variableLookup: options.variableLookup ?? true,
    fix,
    render: {
      tabWidth: options.tabWidth ?? config.tabWidth,
      maxInlineWidth: config.inlineWidth,
      color: options.color ?? config.color,
    },
  };

  const limit = pLimit(options.concurrency ?? config.concurrency);
  const startedAt = performance.now();

  const results = await Promise.all(
    files.map(file =>
      limit(async (): Promise<FileResult> => {
        let source: Buffer;
        let payload: string;
        try {
          source = await readFile(file);
          payload = await readFile(`${file}${suffix}`, 'utf8');
        } catch (err: unknown) {
          return { kind: 'unreadable', file, error: toError(err) };
        }

        const outcome = processFile({ file, source, payload }, processOptions);
        if (outcome.fixed) {
          try {
            await writeBack(file, outcome.fixed);
          } catch (err: unknown) {
            // only this file fails; the others keep their reports and fixes
            return { kind: 'unwritable', outcome, error: toError(err) };
          }
        }
        return { kind: 'ok', outcome };
      })
    )
  );

  let diagnostics = 0;
  let fixed = 0;
  let failed = 0;
  // printed in argument order, one write per file
  for (const result of results) {
    if (result.kind === 'unreadable') {
      failed++;
      logError(`无法读取 ${result.file}：${result.error.message}`);
      continue;
    }

    const { outcome } = result;
    diagnostics += outcome.diagnostics.length;
    if (outcome.report.length > 0) {
      write(outcome.report);
    }
    for (const message of outcome.warnings) {
      warn(message);
    }
    if (result.kind === 'unwritable') {
      failed++;
      logError(`无法写回 ${outcome.file}：${result.error.message}`);
      continue;
    }
    if (outcome.malformed || outcome.fixError) {
      failed++;
    }
    if (outcome.fixed) {
      fixed++;
      success(`已修复 ${outcome.file}`);
    }
  }

  logPerformance({
    component: 'report',
    operation: 'report',
    duration: performance.now() - startedAt,
    metadata: { files: files.length, diagnostics, fixed, failed },
  });

  return { files: files.length, diagnostics, fixed, failed };
}
