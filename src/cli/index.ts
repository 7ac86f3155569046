#!/usr/bin/env node
import { ConfigManager } from '../config/ConfigManager.js';
import { ApplicationError } from '../errors/index.js';
import { initializeLogger } from '../middleware/logging.js';
import { getErrorMessage } from '../utils/errorHandling.js';
import { USAGE, parseCliArgs } from './args.js';
import { checkJobCommand } from './checkJob.js';
import { runBatchCommand } from './runBatch.js';

async function main(argv: string[]): Promise<number> {
  const command = parseCliArgs(argv);
  if (command.command === 'help') {
    console.log(USAGE);
    return 0;
  }

  const config = ConfigManager.getInstance().getConfig();
  initializeLogger(config.logging);

  switch (command.command) {
    case 'run-batch':
      return runBatchCommand(command, config);
    case 'check-job':
      return checkJobCommand(command, config);
  }
}

main(process.argv.slice(2))
  .then(code => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error(`Error: ${getErrorMessage(error)}`);
    if (error instanceof ApplicationError && error.code.startsWith('VALIDATION')) {
      console.error(`\n${USAGE}`);
    }
    process.exitCode = 1;
  });
