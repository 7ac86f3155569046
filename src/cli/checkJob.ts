import { AppConfig } from '../config/types.js';
import { AuthenticationError, ErrorCode } from '../errors/index.js';
import { createPollPolicy } from '../services/polling/PollPolicy.js';
import { Job, resolveOutputUrl } from '../types/jobs.js';
import { CliCommand } from './args.js';
import { abortOnInterrupt, openCliContext } from './context.js';

type CheckJobArgs = Extract<CliCommand, { command: 'check-job' }>;

const DEFAULT_INTERVAL_SECONDS = 30;

function describe(job: Job): string {
  const url = resolveOutputUrl(job);
  return [
    `Job ${job.id}: ${job.status}`,
    `  checks: ${job.attempts}${job.lastCheckedAt ? `, last at ${job.lastCheckedAt}` : ''}`,
    ...(url ? [`  output: ${url}`] : []),
    ...(job.error ? [`  error: ${job.error.message}`] : []),
  ].join('\n');
}

/**
 * @returns process exit code: 0 when the job completed (or, without --poll, when the check succeeded)
 */
export async function checkJobCommand(args: CheckJobArgs, config: AppConfig): Promise<number> {
  if (!config.render.apiKey) {
    throw new AuthenticationError('RENDER_API_KEY is not set');
  }

  const context = await openCliContext(config, {
    pollObserver: {
      onCheck: (job, check) => console.log(`[${new Date().toLocaleTimeString()}] check ${check}: ${job.status}`),
      onWait: (_jobId, delayMs) => console.log(`  next check in ${Math.round(delayMs / 1000)}s`),
    },
  });

  try {
    const { poller } = context.services;

    if (!args.poll) {
      const job = await poller.refresh(args.jobId);
      console.log(describe(job));
      return 0;
    }

    const interrupt = abortOnInterrupt(() => console.log('\nStopping...'));
    try {
      const policy = createPollPolicy(config.polling, {
        intervalMs: (args.intervalSeconds ?? DEFAULT_INTERVAL_SECONDS) * 1000,
        indefinite: args.maxPolls === undefined,
        ...(args.maxPolls !== undefined && { maxAttempts: args.maxPolls }),
      });

      console.log(
        `Polling job ${args.jobId} every ${policy.intervalMs / 1000}s` +
          (policy.indefinite ? ' until it finishes (Ctrl+C to stop)' : ` up to ${policy.maxAttempts} time(s)`)
      );

      const result = await poller.run(args.jobId, policy, interrupt.signal);
      console.log(describe(result.job));

      if (!result.error) {
        return 0;
      }

      console.log(`Stopped: ${result.error.message}`);
      if (result.error.code === ErrorCode.JOB_POLLING_TIMEOUT || result.error.code === ErrorCode.JOB_CANCELED) {
        console.log(`Resume with: anchorcast check-job ${args.jobId} --poll`);
      }
      return 1;
    } finally {
      interrupt.dispose();
    }
  } finally {
    await context.close();
  }
}
