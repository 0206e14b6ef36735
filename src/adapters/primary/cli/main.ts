#!/usr/bin/env node
import { DateTime } from 'luxon';
import { parseCliArgs, type CliOptions } from './slotCommand';
import { YamlConfigProvider } from '../../../modules/slot-notifications/adapters/config/YamlConfigProvider';
import { JsonFileStateStore } from '../../../modules/slot-notifications/adapters/persistence/JsonFileStateStore';
import { PhotoLibraryAdapter } from '../../../modules/slot-notifications/adapters/photo-library/PhotoLibraryAdapter';
import { PushNotificationAdapter } from '../../../modules/slot-notifications/adapters/push/PushNotificationAdapter';
import { DispatchSlotUseCase } from '../../../modules/slot-notifications/application/use-cases/DispatchSlotUseCase';
import { RunSlotUseCase } from '../../../modules/slot-notifications/application/use-cases/RunSlotUseCase';
import { DelayWindowService } from '../../../modules/slot-notifications/domain/services/DelayWindowService';
import { RetryPolicy } from '../../../modules/slot-notifications/domain/services/RetryPolicy';
import { SlotStateTracker } from '../../../modules/slot-notifications/domain/services/SlotStateTracker';
import type { AppConfig } from '../../../modules/slot-notifications/domain/types';
import { enableFileLogging, logger, setLogLevel } from '../../../shared/logger';
import { errorMessage } from '../../../shared/errors';

/**
 * Wires the HTTP, file and YAML adapters into the slot use cases
 */
export function createSlotRunner(config: AppConfig): RunSlotUseCase {
  const retry = new RetryPolicy(config.settings.retry);
  const dispatcher = new DispatchSlotUseCase(
    config,
    (apiKey) => new PhotoLibraryAdapter(config.photoServiceUrl, apiKey),
    new PushNotificationAdapter(config.pushServiceUrl),
    new SlotStateTracker(),
    retry
  );

  return new RunSlotUseCase(
    config.settings,
    new JsonFileStateStore(config.settings.stateFile),
    dispatcher,
    new DelayWindowService()
  );
}

/**
 * One slot run for already parsed options
 *
 * @returns process exit code
 */
export async function runSlot(options: CliOptions): Promise<number> {
  let config: AppConfig;
  try {
    config = await new YamlConfigProvider(options.configPath).load();
  } catch (error) {
    logger.error({
      msg: 'Failed to load configuration',
      configPath: options.configPath,
      error: errorMessage(error),
    });
    return 1;
  }
  if (config.settings.logFile) {
    enableFileLogging(config.settings.logFile);
  }
  setLogLevel(config.settings.logLevel);

  const result = await createSlotRunner(config).execute({
    slot: options.slot,
    date: options.date ?? DateTime.now().toFormat('yyyy-MM-dd'),
    testMode: options.testMode,
    dryRun: options.dryRun,
    force: options.force,
    noDelay: options.noDelay,
  });
  return result.exitCode;
}

export async function main(args: readonly string[] = process.argv.slice(2)): Promise<number> {
  return runSlot(parseCliArgs(args));
}

if (require.main === module) {
  main()
    .then((exitCode) => {
      process.exitCode = exitCode;
    })
    .catch((error: unknown) => {
      logger.fatal({
        msg: 'Slot run crashed',
        error: error instanceof Error ? error.message : String(error),
        stack: error instanceof Error ? error.stack : undefined,
      });
      process.exitCode = 1;
    });
}
