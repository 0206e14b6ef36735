import { DateTime } from 'luxon';
import type { IStateStore } from '../ports/IStateStore';
import type { DispatchOptions, DispatchSlotUseCase, DispatchSummary } from './DispatchSlotUseCase';
import type { NotificationState } from '../../domain/entities/NotificationState';
import type { DelayWindowService } from '../../domain/services/DelayWindowService';
import type { Settings } from '../../domain/types';
import { logger } from '../../../../shared/logger';
import { sleepSeconds, type Sleep } from '../../../../shared/sleep';

export interface RunSlotOptions extends DispatchOptions {
  /** Skip the window delay entirely */
  noDelay: boolean;
}

export interface RunSlotResult {
  exitCode: 0 | 1;
  /** Null when the run stopped before dispatching */
  summary: DispatchSummary | null;
  delaySeconds: number;
}

/**
 * RunSlotUseCase
 *
 * **Purpose:**
 * One slot run from start to finish, once configuration is loaded.
 *
 * **Workflow:**
 * 1. Wait a random delay inside the slot's notification window (unless disabled)
 * 2. Load the state once (failure ends the run with exit code 1)
 * 3. Dispatch every configured user
 * 4. Save the state once, never in dry-run (failure is logged, exit code 1)
 * 5. Log "<success>/<total> users successful"
 *
 * Exit code is 0 only when every enabled user succeeded and the state was saved.
 */
export class RunSlotUseCase {
  public constructor(
    private readonly settings: Pick<Settings, 'notificationWindows'>,
    private readonly stateStore: IStateStore,
    private readonly dispatcher: DispatchSlotUseCase,
    private readonly delayWindows: DelayWindowService,
    private readonly sleep: Sleep = sleepSeconds,
    private readonly clock: () => DateTime = () => DateTime.now()
  ) {}

  public async execute(options: RunSlotOptions): Promise<RunSlotResult> {
    const startTime = Date.now();
    logger.info({
      msg: 'Slot run started',
      slot: options.slot,
      date: options.date,
      testMode: options.testMode,
      dryRun: options.dryRun,
      force: options.force,
    });

    const delaySeconds = options.noDelay
      ? 0
      : this.delayWindows.computeSlotDelay(
          this.settings.notificationWindows,
          options.slot,
          this.clock(),
          options.testMode
        );
    if (delaySeconds > 0) {
      logger.info({
        msg: 'Waiting before sending',
        slot: options.slot,
        delaySeconds,
        sendAt: this.clock().plus({ seconds: delaySeconds }).toISO(),
      });
      await this.sleep(delaySeconds);
    }

    let state: NotificationState;
    try {
      state = await this.stateStore.load();
    } catch (error) {
      logger.error({
        msg: 'Failed to load state',
        error: error instanceof Error ? error.message : String(error),
        stack: error instanceof Error ? error.stack : undefined,
      });
      return { exitCode: 1, summary: null, delaySeconds };
    }

    const summary = await this.dispatcher.execute(options, state);

    let saved = true;
    if (options.dryRun) {
      logger.info({ msg: '[DRY RUN] State not saved' });
    } else {
      try {
        await this.stateStore.save(state);
      } catch (error) {
        saved = false;
        logger.error({
          msg: 'Failed to save state',
          error: error instanceof Error ? error.message : String(error),
          stack: error instanceof Error ? error.stack : undefined,
        });
      }
    }

    const allSucceeded = summary.successCount === summary.totalUsers;
    logger.info({
      msg: `${summary.successCount}/${summary.totalUsers} users successful`,
      slot: options.slot,
      outcomes: summary.results.map((result) => `${result.user}:${result.outcome}`),
      durationMs: Date.now() - startTime,
    });

    return { exitCode: allSucceeded && saved ? 0 : 1, summary, delaySeconds };
  }
}
