import { AppConfig } from '../config/types.js';
import { DatabaseManager } from '../database/DatabaseManager.js';
import { createJobRecordStore } from '../services/jobStore/index.js';
import { createServices, ServiceOverrides, Services } from '../services/createServices.js';

export interface CliContext {
  config: AppConfig;
  services: Services;
  close(): Promise<void>;
}

/**
 * Open the job store and wire services for one CLI command
 */
export async function openCliContext(config: AppConfig, overrides: ServiceOverrides = {}): Promise<CliContext> {
  const dbManager = new DatabaseManager(config.database);
  if (config.jobStore.backend === 'sqlite') {
    await dbManager.connect();
  }

  const store = createJobRecordStore(config.jobStore, () => dbManager.getConnection());
  await store.initialize();

  return {
    config,
    services: createServices(config, store, overrides),
    close: async () => {
      await store.close();
      await dbManager.disconnect();
    },
  };
}

/**
 * AbortController tied to Ctrl+C. A second Ctrl+C exits immediately.
 */
export function abortOnInterrupt(onFirst: () => void): { signal: AbortSignal; dispose(): void } {
  const controller = new AbortController();

  const handler = (): void => {
    if (controller.signal.aborted) {
      process.exit(130);
    }
    onFirst();
    controller.abort();
  };

  process.on('SIGINT', handler);
  return {
    signal: controller.signal,
    dispose: () => {
      process.off('SIGINT', handler);
    },
  };
}
