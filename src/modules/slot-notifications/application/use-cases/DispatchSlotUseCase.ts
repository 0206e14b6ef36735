import { DateTime } from 'luxon';
import type { IPushClient } from '../ports/IPushClient';
import type { IPhotoLibraryClient, PhotoLibraryClientFactory } from '../ports/IPhotoLibraryClient';
import { ContentSelector } from '../services/ContentSelector';
import { PersonRanker } from '../services/PersonRanker';
import type { NotificationState } from '../../domain/entities/NotificationState';
import { filterForDate, findAlternateDate, parseMemories } from '../../domain/services/MemoryParser';
import { MessageRenderer } from '../../domain/services/MessageRenderer';
import type { RetryPolicy } from '../../domain/services/RetryPolicy';
import type { SlotStateTracker } from '../../domain/services/SlotStateTracker';
import { DispatchOutcome, isSuccessfulOutcome } from '../../domain/value-objects/DispatchOutcome';
import type { AppConfig, MemoryRecord, RenderedNotification, SlotContent, UserConfig } from '../../domain/types';
import { CredentialMissingError } from '../../../../domain/errors/CredentialMissingError';
import { mathRandom, type RandomSource } from '../../../../shared/random';
import { logger } from '../../../../shared/logger';

const THUMBNAIL_FILENAME = 'memory.jpg';

export interface DispatchOptions {
  slot: number;
  /** Target date, YYYY-MM-DD */
  date: string;
  testMode: boolean;
  dryRun: boolean;
  force: boolean;
}

export interface UserDispatchResult {
  user: string;
  outcome: DispatchOutcome;
  success: boolean;
  notification?: RenderedNotification;
  error?: string;
}

export interface DispatchSummary {
  results: UserDispatchResult[];
  /** Enabled users whose dispatch succeeded */
  successCount: number;
  /** Enabled users */
  totalUsers: number;
}

/**
 * DispatchSlotUseCase
 *
 * **Purpose:**
 * Runs one slot for every configured user, in configuration order, against
 * the in-memory state passed in by the caller.
 *
 * **Per-user workflow:**
 * 1. Skip disabled users; fail users without an API key
 * 2. Skip when the slot was already sent today (unless force / test mode)
 * 3. Fetch memories and keep the target date's (test mode may pick another date)
 * 4. Select content for the slot; nothing selected ends the user successfully
 * 5. Render; in dry-run mode log the notification and stop
 * 6. Fetch and upload the thumbnail (best effort), publish the notification
 * 7. Record the slot and asset in state (skipped in test mode)
 *
 * **Error Handling Strategy:**
 *
 * | Failure | Outcome | Next user? |
 * |---------|---------|------------|
 * | Missing API key | NO_CREDENTIAL | Yes |
 * | Memories / people fetch (after retries) | FETCH_FAILED | Yes |
 * | Face / person-asset lookup | absorbed by the selector | - |
 * | Thumbnail fetch or upload | warning, sent without attachment | - |
 * | Publish (after retries) | SEND_FAILED | Yes |
 * | Anything else | ERROR | Yes |
 *
 * Persisting the state is the caller's job (once per run, never in dry-run).
 */
export class DispatchSlotUseCase {
  private readonly renderer: MessageRenderer;

  public constructor(
    private readonly config: AppConfig,
    private readonly photoLibraryFactory: PhotoLibraryClientFactory,
    private readonly pushClient: IPushClient,
    private readonly tracker: SlotStateTracker,
    private readonly retry: RetryPolicy,
    private readonly random: RandomSource = mathRandom,
    private readonly clock: () => DateTime = () => DateTime.now()
  ) {
    this.renderer = new MessageRenderer(config.templates, random);
  }

  public async execute(options: DispatchOptions, state: NotificationState): Promise<DispatchSummary> {
    const results: UserDispatchResult[] = [];

    for (const user of this.config.users) {
      let result: UserDispatchResult;
      try {
        result = await this.dispatchUser(user, options, state);
      } catch (error) {
        logger.error({
          msg: 'User dispatch failed with unexpected error',
          user: user.name,
          slot: options.slot,
          error: error instanceof Error ? error.message : String(error),
          stack: error instanceof Error ? error.stack : undefined,
        });
        result = this.result(user, DispatchOutcome.ERROR, {
          error: error instanceof Error ? error.message : String(error),
        });
      }
      results.push(result);
    }

    const enabled = results.filter((result) => result.outcome !== DispatchOutcome.DISABLED);
    return {
      results,
      successCount: enabled.filter((result) => result.success).length,
      totalUsers: enabled.length,
    };
  }

  private async dispatchUser(
    user: UserConfig,
    options: DispatchOptions,
    state: NotificationState
  ): Promise<UserDispatchResult> {
    const ctx = { user: user.name, slot: options.slot };

    if (!user.enabled) {
      logger.info({ msg: 'Skipped (disabled)', ...ctx });
      return this.result(user, DispatchOutcome.DISABLED);
    }

    if (user.apiKey.trim() === '') {
      const error = new CredentialMissingError(user.name);
      logger.error({ msg: error.message, ...ctx });
      return this.result(user, DispatchOutcome.NO_CREDENTIAL, { error: error.message });
    }

    const eligible = this.tracker.isSlotEligible(state, user.name, options.date, options.slot, {
      force: options.force,
      testMode: options.testMode,
    });
    if (!eligible) {
      logger.info({ msg: 'Slot already sent today, skipping', ...ctx, date: options.date });
      return this.result(user, DispatchOutcome.SLOT_ALREADY_SENT);
    }

    logger.info({ msg: 'Processing user', ...ctx, date: options.date });
    const client = this.photoLibraryFactory(user.apiKey);

    // FETCHING
    let memories: MemoryRecord[];
    try {
      memories = await this.retry.run(() => client.fetchMemories(), 'fetchMemories', ctx);
    } catch (error) {
      return this.failed(user, DispatchOutcome.FETCH_FAILED, 'Failed to fetch memories', error, ctx);
    }
    const todays = this.memoriesForRun(memories, options, ctx);
    const parsed = parseMemories(todays);
    logger.info({
      msg: 'Memories for date',
      ...ctx,
      totalAssets: parsed.totalAssets,
      images: parsed.imageCount,
      videos: parsed.videoCount,
      years: parsed.years,
    });

    // SELECTING
    const now = this.clock();
    const selector = this.selectorFor(client, ctx);
    let content: SlotContent | null;
    try {
      content = await selector.select({
        slot: options.slot,
        memories: parsed,
        sentAssetIds: this.tracker.assetsSentToday(state, user.name, options.date),
        now,
      });
    } catch (error) {
      return this.failed(user, DispatchOutcome.FETCH_FAILED, 'Failed to select content', error, ctx);
    }

    if (!content) {
      logger.info({ msg: 'No content for this slot', ...ctx });
      return this.result(user, DispatchOutcome.EMPTY);
    }

    const notification = this.renderer.render(content, {
      targetYear: DateTime.fromISO(options.date).year,
      testMode: options.testMode,
      videoEmoji: this.config.settings.videoEmoji,
    });

    if (options.dryRun) {
      logger.info({
        msg: '[DRY RUN] Would send notification',
        ...ctx,
        kind: notification.kind,
        title: notification.title,
        message: notification.message,
        assetId: notification.assetId,
      });
      return this.result(user, DispatchOutcome.DRY_RUN, { notification });
    }

    // SENDING
    const attachmentUrl = await this.prepareAttachment(client, user, notification.assetId, ctx);
    try {
      await this.retry.run(
        () =>
          this.pushClient.publish(
            {
              topic: user.pushTopic,
              title: notification.title,
              message: notification.message,
              tags: notification.tags,
              clickUrl: this.config.clickUrl ?? undefined,
              attachmentUrl: attachmentUrl ?? undefined,
            },
            user.pushAuth
          ),
        'publish',
        ctx
      );
    } catch (error) {
      return this.failed(user, DispatchOutcome.SEND_FAILED, 'Failed to send notification', error, ctx, {
        notification,
      });
    }

    // RECORD
    const recorded = this.tracker.recordSend(
      state,
      user.name,
      options.date,
      options.slot,
      notification.assetId,
      this.clock(),
      options.testMode
    );

    logger.info({
      msg: 'Notification sent',
      ...ctx,
      kind: notification.kind,
      title: notification.title,
      assetId: notification.assetId,
      withAttachment: attachmentUrl !== null,
      recorded,
    });
    return this.result(user, DispatchOutcome.SENT, { notification });
  }

  /**
   * Memories for the target date. In test mode a day without memories is
   * replaced by the first date among the fetched memories that has some.
   */
  private memoriesForRun(
    memories: MemoryRecord[],
    options: DispatchOptions,
    ctx: Record<string, unknown>
  ): MemoryRecord[] {
    const todays = filterForDate(memories, options.date);
    if (todays.length > 0 || !options.testMode) {
      return todays;
    }

    const alternate = findAlternateDate(memories);
    if (!alternate) {
      return todays;
    }
    logger.info({ msg: 'Test mode: using another date with memories', ...ctx, date: alternate });
    return filterForDate(memories, alternate);
  }

  private selectorFor(client: IPhotoLibraryClient, ctx: Record<string, unknown>): ContentSelector {
    const ranker = new PersonRanker(client, this.retry, ctx);
    return new ContentSelector(client, ranker, this.retry, this.config.settings, this.random, ctx);
  }

  /**
   * Thumbnail fetch and upload. Any failure is a warning and the notification
   * goes out without an attachment.
   */
  private async prepareAttachment(
    client: IPhotoLibraryClient,
    user: UserConfig,
    assetId: string,
    ctx: Record<string, unknown>
  ): Promise<string | null> {
    let thumbnail: Buffer;
    try {
      thumbnail = await this.retry.run(() => client.fetchThumbnail(assetId), 'fetchThumbnail', ctx);
      logger.debug({ msg: 'Fetched thumbnail', ...ctx, assetId, bytes: thumbnail.length });
    } catch (error) {
      logger.warn({
        msg: 'Could not fetch thumbnail, sending without attachment',
        ...ctx,
        assetId,
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    }

    try {
      const url = await this.retry.run(
        () => this.pushClient.uploadAttachment(thumbnail, THUMBNAIL_FILENAME, user.pushAuth),
        'uploadAttachment',
        ctx
      );
      if (!url) {
        logger.warn({ msg: 'Upload returned no attachment URL, sending without attachment', ...ctx });
      }
      return url;
    } catch (error) {
      logger.warn({
        msg: 'Could not upload thumbnail, sending without attachment',
        ...ctx,
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    }
  }

  private failed(
    user: UserConfig,
    outcome: DispatchOutcome,
    msg: string,
    error: unknown,
    ctx: Record<string, unknown>,
    extra: Partial<UserDispatchResult> = {}
  ): UserDispatchResult {
    const message = error instanceof Error ? error.message : String(error);
    logger.error({ msg, ...ctx, outcome, error: message });
    return this.result(user, outcome, { ...extra, error: message });
  }

  private result(
    user: UserConfig,
    outcome: DispatchOutcome,
    extra: Partial<UserDispatchResult> = {}
  ): UserDispatchResult {
    return { ...extra, user: user.name, outcome, success: isSuccessfulOutcome(outcome) };
  }
}
