import fs from 'fs/promises';
import path from 'path';
import { validateConfig } from '../config/ConfigManager.js';
import { ConfigurationError, ErrorCode, FileSystemError, SchemaValidationError } from '../errors/index.js';
import { getErrorMessage } from '../utils/errorHandling.js';
import { itemsFileSchema } from '../validation/pipelineSchemas.js';
import { WorkItem } from '../services/pipeline/types.js';
import { batchResultsFileName, summarizeBatch, writeBatchResults } from '../services/pipeline/batchResults.js';
import { AppConfig } from '../config/types.js';
import { CliCommand } from './args.js';
import { abortOnInterrupt, openCliContext } from './context.js';

type RunBatchArgs = Extract<CliCommand, { command: 'run-batch' }>;

/**
 * Read and validate an items file
 */
export async function readItemsFile(filePath: string): Promise<WorkItem[]> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    throw new FileSystemError(
      `Cannot read items file ${filePath}: ${getErrorMessage(error)}`,
      ErrorCode.FS_READ_FAILED,
      filePath,
      false,
      { service: 'cli', operation: 'readItemsFile' },
      error instanceof Error ? error : undefined
    );
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new SchemaValidationError(
      [{ path: '', message: getErrorMessage(error) }],
      `Items file ${filePath} is not valid JSON`
    );
  }

  const parsed = itemsFileSchema.safeParse(json);
  if (!parsed.success) {
    throw new SchemaValidationError(
      parsed.error.issues.map(issue => ({ path: issue.path.join('.'), message: issue.message })),
      `Items file ${filePath} is invalid`
    );
  }

  return Array.isArray(parsed.data) ? parsed.data : parsed.data.items;
}

/**
 * @returns process exit code: 0 when every item succeeded
 */
export async function runBatchCommand(args: RunBatchArgs, config: AppConfig): Promise<number> {
  const problems = validateConfig(config);
  if (problems.length > 0) {
    throw new ConfigurationError('pipeline', `Cannot run a batch:\n  ${problems.join('\n  ')}`);
  }

  const items = await readItemsFile(args.itemsFile);
  const context = await openCliContext(config);
  const interrupt = abortOnInterrupt(() => {
    console.log('\nCanceling: finishing the current step, remaining items will be skipped (Ctrl+C again to exit now)');
  });

  try {
    const { orchestrator, stages } = context.services;
    console.log(`Processing ${items.length} item(s)...`);

    const result = await orchestrator.processBatch(items, stages, {
      interItemDelayMs: args.delayMs ?? config.pipeline.interItemDelayMs,
      concurrency: args.concurrency ?? config.pipeline.concurrency,
      haltOnAuthError: config.pipeline.haltOnAuthError,
      signal: interrupt.signal,
    });

    for (const line of summarizeBatch(result)) {
      console.log(line);
    }

    const output = args.output ?? path.join(config.pipeline.resultsDir, batchResultsFileName(new Date()));
    const written = await writeBatchResults(result, output);
    console.log(`Results written to ${written}`);

    return result.failed === 0 && result.canceled === 0 ? 0 : 1;
  } finally {
    interrupt.dispose();
    await context.close();
  }
}
