import fs from 'fs/promises';
import path from 'path';
import { ErrorCode, FileSystemError } from '../../errors/index.js';
import { getErrorMessage } from '../../utils/errorHandling.js';
import { BatchResult } from './types.js';

/**
 * `batch_results_YYYYMMDD_HHMMSS.json`, local time
 */
export function batchResultsFileName(date: Date): string {
  const pad = (value: number): string => String(value).padStart(2, '0');
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `batch_results_${day}_${time}.json`;
}

export async function writeBatchResults(result: BatchResult, outputPath: string): Promise<string> {
  const target = path.resolve(outputPath);
  try {
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, `${JSON.stringify(result, null, 2)}\n`, 'utf8');
  } catch (error) {
    throw new FileSystemError(
      `Failed to write batch results to ${target}: ${getErrorMessage(error)}`,
      ErrorCode.FS_WRITE_FAILED,
      target,
      false,
      { service: 'batchResults', operation: 'writeBatchResults' },
      error instanceof Error ? error : undefined
    );
  }
  return target;
}

/**
 * Human-readable summary lines for the console
 */
export function summarizeBatch(result: BatchResult): string[] {
  const lines = [
    `Batch ${result.runId}: ${result.succeeded}/${result.total} succeeded, ${result.failed} failed, ${result.canceled} canceled`,
  ];

  for (const item of result.items) {
    const video = item.stages.find(stage => stage.artifact?.kind === 'video')?.artifact;
    const detail =
      item.status === 'succeeded'
        ? video?.kind === 'video' ? video.url : 'done'
        : `${item.error?.stage ?? 'pipeline'}: ${item.error?.message ?? item.status}`;
    lines.push(`  [${item.status.toUpperCase()}] ${item.title} - ${detail}`);
  }

  return lines;
}
