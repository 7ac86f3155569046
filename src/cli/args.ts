import { parseArgs } from 'util';
import { ValidationError } from '../errors/index.js';
import { getErrorMessage } from '../utils/errorHandling.js';

export type CliCommand =
  | {
      command: 'run-batch';
      itemsFile: string;
      output?: string | undefined;
      delayMs?: number | undefined;
      concurrency?: number | undefined;
    }
  | {
      command: 'check-job';
      jobId: string;
      poll: boolean;
      intervalSeconds?: number | undefined;
      maxPolls?: number | undefined;
    }
  | { command: 'help' };

export const USAGE = `Usage:
  anchorcast run-batch <items.json> [--output file] [--delay ms] [--concurrency n]
  anchorcast check-job <jobId> [--poll] [--interval seconds] [--max-polls n]

run-batch   Run every item through script, audio and video stages and write a results file
check-job   Refresh a render job's status once, or poll it with --poll
            (without --max-polls, polling continues until Ctrl+C)`;

function parseInteger(name: string, raw: string | undefined, min: number): number | undefined {
  if (raw === undefined) {
    return undefined;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new ValidationError(`--${name} must be an integer >= ${min}, got "${raw}"`);
  }
  return value;
}

function readArgs(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      allowPositionals: true,
      strict: true,
      options: {
        output: { type: 'string', short: 'o' },
        delay: { type: 'string' },
        concurrency: { type: 'string' },
        poll: { type: 'boolean' },
        interval: { type: 'string' },
        'max-polls': { type: 'string' },
        help: { type: 'boolean', short: 'h' },
      },
    });
  } catch (error) {
    throw new ValidationError(getErrorMessage(error));
  }
}

/**
 * Parse `process.argv.slice(2)`
 * @throws ValidationError for unknown commands, unknown options and bad values
 */
export function parseCliArgs(argv: string[]): CliCommand {
  const { values, positionals } = readArgs(argv);
  const [command, target, ...extra] = positionals;

  if (values.help || command === undefined || command === 'help') {
    return { command: 'help' };
  }
  if (extra.length > 0) {
    throw new ValidationError(`Unexpected arguments: ${extra.join(' ')}`);
  }

  switch (command) {
    case 'run-batch':
      if (!target) {
        throw new ValidationError('run-batch needs the path of an items file');
      }
      return {
        command,
        itemsFile: target,
        output: values.output,
        delayMs: parseInteger('delay', values.delay, 0),
        concurrency: parseInteger('concurrency', values.concurrency, 1),
      };
    case 'check-job':
      if (!target) {
        throw new ValidationError('check-job needs a job id');
      }
      return {
        command,
        jobId: target,
        poll: values.poll ?? false,
        intervalSeconds: parseInteger('interval', values.interval, 1),
        maxPolls: parseInteger('max-polls', values['max-polls'], 1),
      };
    default:
      throw new ValidationError(`Unknown command: ${command}`);
  }
}
