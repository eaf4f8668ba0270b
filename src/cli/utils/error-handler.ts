import { isNixfReportError } from '../../diagnostics/errors.js';
import { error as logError } from './logger.js';

function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error && typeof error.code === 'string';
}

function handleNodeError(error: NodeJS.ErrnoException): void {
  const code = error.code ?? 'UNKNOWN';
  switch (code) {
    case 'EACCES':
    case 'EPERM':
      logError(`文件权限不足：${error.message}`);
      break;
    case 'ENOENT':
      logError(`未找到目标文件：${error.message}`);
      break;
    default:
      logError(`文件系统错误(${code})：${error.message}`);
      break;
  }
}

/**
 * CLI 顶层错误出口：输出分类后的错误信息并以状态码 1 退出。
 *
 * 单个文件的失败在 processFile / reportCommand 中已转为警告，
 * 走到这里的只有参数解析或意外的运行时错误。
 */
export function handleError(error: unknown): void {
  if (isNodeError(error)) {
    handleNodeError(error);
  } else if (isNixfReportError(error)) {
    logError(`[${error.kind}] ${error.message}`);
  } else if (error instanceof Error) {
    logError(error.message);
  } else {
    logError('发生未知错误，请重试');
  }

  process.exit(1);
}
