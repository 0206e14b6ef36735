import { DateTime } from 'luxon';
import { DispatchSlotUseCase, type DispatchOptions } from './DispatchSlotUseCase';
import type { IPhotoLibraryClient } from '../ports/IPhotoLibraryClient';
import type { IPushClient } from '../ports/IPushClient';
import { NotificationState } from '../../domain/entities/NotificationState';
import { SlotState } from '../../domain/entities/SlotState';
import { RetryPolicy } from '../../domain/services/RetryPolicy';
import { SlotStateTracker } from '../../domain/services/SlotStateTracker';
import { DispatchOutcome } from '../../domain/value-objects/DispatchOutcome';
import type { AppConfig, MemoryRecord, UserConfig } from '../../domain/types';
import { UpstreamError } from '../../../../domain/errors/UpstreamError';
import type { RandomSource } from '../../../../shared/random';

jest.mock('../../../../shared/logger', () => ({
  logger: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  },
}));

const lowest: RandomSource = { integer: (min) => min };

const NOW = DateTime.fromISO('2024-06-15T12:00:00.000Z', { zone: 'utc' });
const DATE = '2024-06-15';
const AUTH = { username: 'alice', password: 'test-secret' };

function user(overrides: Partial<UserConfig> = {}): UserConfig {
  return {
    name: 'alice',
    apiKey: 'test-key',
    pushTopic: 'alice-topic',
    pushAuth: AUTH,
    enabled: true,
    ...overrides,
  };
}

function config(users: UserConfig[]): AppConfig {
  return {
    photoServiceUrl: 'https://photos.example.test',
    pushServiceUrl: 'https://push.example.test',
    clickUrl: 'https://photos.example.test',
    users,
    settings: {
      retry: { maxAttempts: 2, delaySeconds: 0 },
      stateFile: 'state.json',
      logLevel: 'info',
      logFile: null,
      memorySlots: 3,
      personSlots: 2,
      fallbackSlots: 3,
      topPersonsLimit: 5,
      excludeRecentDays: 30,
      videoEmoji: true,
      notificationWindows: [],
    },
    templates: { memory: [], person: [], videoMemory: [], videoPerson: [] },
  };
}

function memoryOn(showAt: string, year: number, assetIds: string[]): MemoryRecord {
  return { showAt, year, assets: assetIds.map((id) => ({ id, type: 'IMAGE' })) };
}

const options = (overrides: Partial<DispatchOptions> = {}): DispatchOptions => ({
  slot: 1,
  date: DATE,
  testMode: false,
  dryRun: false,
  force: false,
  ...overrides,
});

describe('DispatchSlotUseCase', () => {
  let client: jest.Mocked<IPhotoLibraryClient>;
  let factory: jest.Mock<IPhotoLibraryClient, [string]>;
  let pushClient: jest.Mocked<IPushClient>;
  let state: NotificationState;

  function useCase(users: UserConfig[] = [user()]): DispatchSlotUseCase {
    return new DispatchSlotUseCase(
      config(users),
      factory,
      pushClient,
      new SlotStateTracker(),
      new RetryPolicy({ maxAttempts: 2, delaySeconds: 0 }, async () => undefined),
      lowest,
      () => NOW
    );
  }

  beforeEach(() => {
    client = {
      fetchMemories: jest.fn().mockResolvedValue([memoryOn('2024-06-15T00:00:00.000Z', 2019, ['a1'])]),
      fetchPeople: jest.fn().mockResolvedValue([]),
      countPersonAssets: jest.fn().mockResolvedValue(0),
      fetchPersonAssets: jest.fn().mockResolvedValue([]),
      fetchAssetPeople: jest.fn().mockResolvedValue([]),
      fetchThumbnail: jest.fn().mockResolvedValue(Buffer.from('jpeg-bytes')),
    };
    factory = jest.fn((_apiKey: string) => client);
    pushClient = {
      uploadAttachment: jest.fn().mockResolvedValue('https://push.example.test/file/a1.jpg'),
      publish: jest.fn().mockResolvedValue(undefined),
    };
    state = NotificationState.empty();
  });

  describe('sending', () => {
    it('should send a memory notification with attachment and record it', async () => {
      // Act
      const summary = await useCase().execute(options(), state);

      // Assert
      expect(summary).toEqual({
        results: [
          {
            user: 'alice',
            outcome: DispatchOutcome.SENT,
            success: true,
            notification: {
              kind: 'memory',
              title: 'Memories from 2019',
              message: 'You have memories from 2019!',
              assetId: 'a1',
              tags: ['camera', 'calendar'],
            },
          },
        ],
        successCount: 1,
        totalUsers: 1,
      });
      expect(factory).toHaveBeenCalledWith('test-key');
      expect(client.fetchThumbnail).toHaveBeenCalledWith('a1');
      expect(pushClient.uploadAttachment).toHaveBeenCalledWith(Buffer.from('jpeg-bytes'), 'memory.jpg', AUTH);
      expect(pushClient.publish).toHaveBeenCalledWith(
        {
          topic: 'alice-topic',
          title: 'Memories from 2019',
          message: 'You have memories from 2019!',
          tags: ['camera', 'calendar'],
          clickUrl: 'https://photos.example.test',
          attachmentUrl: 'https://push.example.test/file/a1.jpg',
        },
        AUTH
      );

      const recorded = state.getOrEmpty('alice');
      expect(recorded.slotsDate).toBe(DATE);
      expect(recorded.slotsSent).toEqual([1]);
      expect(recorded.assetsSentToday).toEqual(['a1']);
      expect(recorded.lastSlotTime).toBe('2024-06-15T12:00:00.000Z');
    });

    it('should send a person notification in a person slot', async () => {
      // Arrange
      client.fetchPeople.mockResolvedValue([{ id: 'p1', name: 'Ana', assetCount: 0 }]);
      client.countPersonAssets.mockResolvedValue(12);
      client.fetchPersonAssets.mockResolvedValue([
        { id: 'pa1', type: 'VIDEO', createdAt: DateTime.fromISO('2020-03-01T10:00:00.000Z') },
      ]);

      // Act
      const summary = await useCase().execute(options({ slot: 4 }), state);

      // Assert
      expect(summary.results[0]?.notification).toEqual({
        kind: 'person',
        title: '🎥 Photo of Ana',
        message: "Here's a photo of Ana!",
        assetId: 'pa1',
        tags: ['camera', 'busts_in_silhouette'],
      });
      expect(state.getOrEmpty('alice').slotsSent).toEqual([4]);
      expect(state.getOrEmpty('alice').assetsSentToday).toEqual(['pa1']);
    });

    it('should send without attachment when the thumbnail cannot be fetched', async () => {
      // Arrange
      client.fetchThumbnail.mockRejectedValue(new UpstreamError('thumbnail gone', 404));

      // Act
      const summary = await useCase().execute(options(), state);

      // Assert
      expect(summary.results[0]?.outcome).toBe(DispatchOutcome.SENT);
      expect(client.fetchThumbnail).toHaveBeenCalledTimes(2);
      expect(pushClient.uploadAttachment).not.toHaveBeenCalled();
      expect(pushClient.publish).toHaveBeenCalledWith(
        expect.objectContaining({ attachmentUrl: undefined }),
        AUTH
      );
      expect(state.getOrEmpty('alice').slotsSent).toEqual([1]);
    });

    it('should send without attachment when the upload returns no URL', async () => {
      // Arrange
      pushClient.uploadAttachment.mockResolvedValue(null);

      // Act
      await useCase().execute(options(), state);

      // Assert
      expect(pushClient.publish).toHaveBeenCalledWith(
        expect.objectContaining({ attachmentUrl: undefined }),
        AUTH
      );
    });

    it('should fail the user with SEND_FAILED when publishing keeps failing', async () => {
      // Arrange
      pushClient.publish.mockRejectedValue(new UpstreamError('Push service publish failed with HTTP 502', 502));

      // Act
      const summary = await useCase().execute(options(), state);

      // Assert
      expect(summary.results[0]).toMatchObject({
        outcome: DispatchOutcome.SEND_FAILED,
        success: false,
        error: 'Push service publish failed with HTTP 502',
      });
      expect(pushClient.publish).toHaveBeenCalledTimes(2);
      expect(state.get('alice')).toBeUndefined();
      expect(summary.successCount).toBe(0);
    });
  });

  describe('slot gating', () => {
    it('should skip a slot already sent today without any network call or state change', async () => {
      // Arrange
      const before = SlotState.empty().recordSend(DATE, 1, 'a0', NOW);
      state.set('alice', before);

      // Act
      const summary = await useCase().execute(options({ slot: 1 }), state);

      // Assert
      expect(summary.results[0]).toEqual({ user: 'alice', outcome: DispatchOutcome.SLOT_ALREADY_SENT, success: true });
      expect(summary.successCount).toBe(1);
      expect(factory).not.toHaveBeenCalled();
      expect(pushClient.publish).not.toHaveBeenCalled();
      expect(state.get('alice')).toBe(before);
    });

    it('should send a different slot on the same day and keep earlier records', async () => {
      // Arrange
      state.set('alice', SlotState.empty().recordSend(DATE, 1, 'a0', NOW));

      // Act
      await useCase().execute(options({ slot: 2 }), state);

      // Assert
      expect(state.getOrEmpty('alice').slotsSent).toEqual([1, 2]);
      expect(state.getOrEmpty('alice').assetsSentToday).toEqual(['a0', 'a1']);
    });

    it('should resend a sent slot when forced', async () => {
      // Arrange
      state.set('alice', SlotState.empty().recordSend(DATE, 1, 'a0', NOW));

      // Act
      const summary = await useCase().execute(options({ force: true }), state);

      // Assert
      expect(summary.results[0]?.outcome).toBe(DispatchOutcome.SENT);
      expect(state.getOrEmpty('alice').slotsSent).toEqual([1]);
      expect(state.getOrEmpty('alice').assetsSentToday).toEqual(['a0', 'a1']);
    });

    it('should treat a record from another day as empty', async () => {
      // Arrange
      state.set('alice', SlotState.empty().recordSend('2024-06-14', 1, 'a1', NOW.minus({ days: 1 })));

      // Act
      const summary = await useCase().execute(options({ slot: 1 }), state);

      // Assert
      expect(summary.results[0]?.outcome).toBe(DispatchOutcome.SENT);
      expect(state.getOrEmpty('alice').slotsDate).toBe(DATE);
      expect(state.getOrEmpty('alice').slotsSent).toEqual([1]);
      expect(state.getOrEmpty('alice').assetsSentToday).toEqual(['a1']);
    });
  });

  describe('user handling', () => {
    it('should skip disabled users and leave them out of the total', async () => {
      // Act
      const summary = await useCase([user({ name: 'bob', enabled: false }), user()]).execute(options(), state);

      // Assert
      expect(summary.results.map((result) => [result.user, result.outcome])).toEqual([
        ['bob', DispatchOutcome.DISABLED],
        ['alice', DispatchOutcome.SENT],
      ]);
      expect(summary.successCount).toBe(1);
      expect(summary.totalUsers).toBe(1);
      expect(factory).toHaveBeenCalledTimes(1);
    });

    it('should fail a user without API key and continue with the next', async () => {
      // Act
      const summary = await useCase([user({ name: 'bob', apiKey: '  ' }), user()]).execute(options(), state);

      // Assert
      expect(summary.results[0]).toEqual({
        user: 'bob',
        outcome: DispatchOutcome.NO_CREDENTIAL,
        success: false,
        error: "No API key configured for user 'bob'",
      });
      expect(summary.results[1]?.outcome).toBe(DispatchOutcome.SENT);
      expect(summary.successCount).toBe(1);
      expect(summary.totalUsers).toBe(2);
    });

    it('should fail a user whose memories cannot be fetched and continue', async () => {
      // Arrange
      client.fetchMemories
        .mockRejectedValueOnce(new UpstreamError('down', 503))
        .mockRejectedValueOnce(new UpstreamError('down', 503));

      // Act
      const summary = await useCase([user({ name: 'bob', apiKey: 'key-b' }), user()]).execute(options(), state);

      // Assert
      expect(summary.results.map((result) => result.outcome)).toEqual([
        DispatchOutcome.FETCH_FAILED,
        DispatchOutcome.SENT,
      ]);
      expect(client.fetchMemories).toHaveBeenCalledTimes(3);
      expect(factory.mock.calls).toEqual([['key-b'], ['test-key']]);
      expect(state.get('bob')).toBeUndefined();
    });

    it('should report an unexpected error as ERROR and continue', async () => {
      // Arrange
      factory.mockImplementationOnce(() => {
        throw new Error('boom');
      });

      // Act
      const summary = await useCase([user({ name: 'bob' }), user()]).execute(options(), state);

      // Assert
      expect(summary.results[0]).toEqual({ user: 'bob', outcome: DispatchOutcome.ERROR, success: false, error: 'boom' });
      expect(summary.results[1]?.outcome).toBe(DispatchOutcome.SENT);
    });
  });

  describe('empty slots', () => {
    it('should end successfully when the slot has nothing to send', async () => {
      // Arrange
      client.fetchMemories.mockResolvedValue([]);

      // Act
      const summary = await useCase().execute(options({ slot: 2 }), state);

      // Assert
      expect(summary.results[0]).toEqual({ user: 'alice', outcome: DispatchOutcome.EMPTY, success: true });
      expect(pushClient.publish).not.toHaveBeenCalled();
      expect(state.get('alice')).toBeUndefined();
    });

    it('should end successfully past the last configured slot', async () => {
      // Act
      const summary = await useCase().execute(options({ slot: 6 }), state);

      // Assert
      expect(summary.results[0]?.outcome).toBe(DispatchOutcome.EMPTY);
      expect(client.fetchPeople).not.toHaveBeenCalled();
    });

    it('should fail a person slot when people cannot be listed', async () => {
      // Arrange
      client.fetchMemories.mockResolvedValue([]);
      client.fetchPeople.mockRejectedValue(new UpstreamError('people unavailable', 500));

      // Act
      const summary = await useCase().execute(options({ slot: 1 }), state);

      // Assert
      expect(summary.results[0]).toMatchObject({
        outcome: DispatchOutcome.FETCH_FAILED,
        success: false,
        error: 'people unavailable',
      });
    });

    it('should only keep memories shown on the target date', async () => {
      // Arrange
      client.fetchMemories.mockResolvedValue([memoryOn('2024-06-16T00:00:00.000Z', 2019, ['tomorrow'])]);

      // Act
      const summary = await useCase().execute(options({ slot: 4 }), state);

      // Assert
      expect(summary.results[0]?.outcome).toBe(DispatchOutcome.EMPTY);
      expect(client.fetchAssetPeople).not.toHaveBeenCalled();
    });
  });

  describe('dry run', () => {
    it('should render but neither deliver nor record', async () => {
      // Act
      const summary = await useCase().execute(options({ dryRun: true }), state);

      // Assert
      expect(summary.results[0]).toMatchObject({
        outcome: DispatchOutcome.DRY_RUN,
        success: true,
        notification: { title: 'Memories from 2019', assetId: 'a1' },
      });
      expect(client.fetchThumbnail).not.toHaveBeenCalled();
      expect(pushClient.uploadAttachment).not.toHaveBeenCalled();
      expect(pushClient.publish).not.toHaveBeenCalled();
      expect(state.size).toBe(0);
    });
  });

  describe('test mode', () => {
    it('should prefix the title, ignore the slot gate and not record', async () => {
      // Arrange
      const before = SlotState.empty().recordSend(DATE, 1, 'a0', NOW);
      state.set('alice', before);

      // Act
      const summary = await useCase().execute(options({ testMode: true }), state);

      // Assert
      expect(summary.results[0]?.outcome).toBe(DispatchOutcome.SENT);
      expect(pushClient.publish).toHaveBeenCalledWith(
        expect.objectContaining({ title: '[TEST] Memories from 2019' }),
        AUTH
      );
      expect(state.get('alice')).toBe(before);
    });

    it('should fall back to another date with memories', async () => {
      // Arrange
      client.fetchMemories.mockResolvedValue([
        { showAt: null, year: 2018, assets: [{ id: 'x', type: 'IMAGE' }] },
        memoryOn('2024-06-10T00:00:00.000Z', 2016, ['b1']),
      ]);

      // Act
      const summary = await useCase().execute(options({ testMode: true }), state);

      // Assert
      expect(summary.results[0]?.notification).toMatchObject({
        title: '[TEST] Memories from 2016',
        message: 'You have memories from 2016!',
        assetId: 'b1',
      });
    });

    it('should not look for another date outside test mode', async () => {
      // Arrange
      client.fetchMemories.mockResolvedValue([memoryOn('2024-06-10T00:00:00.000Z', 2016, ['b1'])]);

      // Act
      const summary = await useCase().execute(options({ slot: 4 }), state);

      // Assert
      expect(summary.results[0]?.outcome).toBe(DispatchOutcome.EMPTY);
    });
  });
});
