import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { DateTime } from 'luxon';
import { JsonFileStateStore } from './JsonFileStateStore';
import { NotificationState } from '../../domain/entities/NotificationState';
import { SlotState } from '../../domain/entities/SlotState';
import { StateIOError } from '../../../../domain/errors/StateIOError';
import { logger } from '../../../../shared/logger';

jest.mock('../../../../shared/logger', () => ({
  logger: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  },
}));

describe('JsonFileStateStore', () => {
  let dir: string;
  let filePath: string;
  let store: JsonFileStateStore;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'slot-state-'));
    filePath = path.join(dir, 'state.json');
    store = new JsonFileStateStore(filePath);
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  describe('load', () => {
    it('should return an empty state when the file does not exist', async () => {
      // Act
      const state = await store.load();

      // Assert
      expect(state.size).toBe(0);
    });

    it('should map the snake_case document to slot states', async () => {
      // Arrange
      await fs.writeFile(
        filePath,
        JSON.stringify({
          users: {
            alice: {
              slots_date: '2024-06-15',
              slots_sent: [1, 3],
              assets_sent_today: ['a1'],
              last_slot_time: '2024-06-15T09:12:00.000+00:00',
            },
            bob: { slots_date: null },
          },
        })
      );

      // Act
      const state = await store.load();

      // Assert
      const alice = state.getOrEmpty('alice');
      expect(alice.slotsDate).toBe('2024-06-15');
      expect(alice.slotsSent).toEqual([1, 3]);
      expect(alice.assetsSentToday).toEqual(['a1']);
      expect(alice.lastSlotTime).toBe('2024-06-15T09:12:00.000+00:00');

      const bob = state.getOrEmpty('bob');
      expect(bob.slotsDate).toBeNull();
      expect(bob.slotsSent).toEqual([]);
      expect(bob.assetsSentToday).toEqual([]);
      expect(bob.lastSlotTime).toBeNull();
    });

    it('should treat a file that is not JSON as empty and warn', async () => {
      // Arrange
      await fs.writeFile(filePath, '{ not json');

      // Act
      const state = await store.load();

      // Assert
      expect(state.size).toBe(0);
      expect(logger.warn).toHaveBeenCalledWith(
        expect.objectContaining({ msg: 'State file is not valid JSON, starting empty', filePath })
      );
    });

    it('should drop only the unreadable record and keep the other users', async () => {
      // Arrange
      await fs.writeFile(
        filePath,
        JSON.stringify({
          users: {
            alice: { slots_date: '2024-06-15', slots_sent: [1, 2] },
            bob: { slots_date: '2024-06-15', slots_sent: ['1'] },
          },
        })
      );

      // Act
      const state = await store.load();

      // Assert
      expect(state.entries().map(([name]) => name)).toEqual(['alice']);
      expect(state.getOrEmpty('alice').hasSentSlot('2024-06-15', 1)).toBe(true);
      expect(state.getOrEmpty('bob').slotsSent).toEqual([]);
      expect(logger.warn).toHaveBeenCalledWith(
        expect.objectContaining({ msg: 'Dropping unreadable state record', filePath, user: 'bob' })
      );
    });

    it('should keep the readable records when saving after a partial load', async () => {
      // Arrange
      await fs.writeFile(
        filePath,
        JSON.stringify({
          users: {
            alice: { slots_date: '2024-06-15', slots_sent: [1, 2] },
            bob: { slots_sent: 'one' },
          },
        })
      );

      // Act
      await store.save(await store.load());

      // Assert
      const written: unknown = JSON.parse(await fs.readFile(filePath, 'utf-8'));
      expect(written).toEqual({
        users: {
          alice: {
            slots_date: '2024-06-15',
            slots_sent: [1, 2],
            assets_sent_today: [],
            last_slot_time: null,
          },
        },
      });
    });

    it('should treat a document whose users are not an object as empty', async () => {
      // Arrange
      await fs.writeFile(filePath, JSON.stringify({ users: 'alice' }));

      // Act
      const state = await store.load();

      // Assert
      expect(state.size).toBe(0);
      expect(logger.warn).toHaveBeenCalledWith(
        expect.objectContaining({ msg: 'State file has an unexpected shape, starting empty', filePath })
      );
    });

    it('should read an empty object as an empty state', async () => {
      // Arrange
      await fs.writeFile(filePath, '{}');

      // Act & Assert
      await expect(store.load()).resolves.toHaveProperty('size', 0);
    });

    it('should throw StateIOError when the path cannot be read as a file', async () => {
      // Arrange
      await fs.mkdir(filePath);

      // Act & Assert
      await expect(store.load()).rejects.toBeInstanceOf(StateIOError);
    });
  });

  describe('save', () => {
    it('should write the snake_case document', async () => {
      // Arrange
      const state = NotificationState.empty();
      state.set(
        'alice',
        SlotState.empty().recordSend('2024-06-15', 2, 'a9', DateTime.fromISO('2024-06-15T10:00:00.000Z', { zone: 'utc' }))
      );

      // Act
      await store.save(state);

      // Assert
      const written: unknown = JSON.parse(await fs.readFile(filePath, 'utf-8'));
      expect(written).toEqual({
        users: {
          alice: {
            slots_date: '2024-06-15',
            slots_sent: [2],
            assets_sent_today: ['a9'],
            last_slot_time: '2024-06-15T10:00:00.000Z',
          },
        },
      });
    });

    it('should leave no temporary or lock files behind', async () => {
      // Act
      await store.save(NotificationState.empty());

      // Assert
      expect(await fs.readdir(dir)).toEqual(['state.json']);
    });

    it('should remove the temporary file when the rename fails', async () => {
      // Arrange
      await fs.mkdir(filePath);
      await fs.writeFile(path.join(filePath, 'occupied'), 'x');

      // Act & Assert
      await expect(store.save(NotificationState.empty())).rejects.toBeInstanceOf(StateIOError);
      expect(await fs.readdir(dir)).toEqual(['state.json']);
    });

    it('should create the parent directory when missing', async () => {
      // Arrange
      const nested = new JsonFileStateStore(path.join(dir, 'nested', 'state.json'));

      // Act
      await nested.save(NotificationState.empty());

      // Assert
      const written: unknown = JSON.parse(await fs.readFile(path.join(dir, 'nested', 'state.json'), 'utf-8'));
      expect(written).toEqual({ users: {} });
    });

    it('should replace the previous contents on the next save', async () => {
      // Arrange
      const first = NotificationState.empty();
      first.set('alice', SlotState.empty().recordSend('2024-06-14', 1, 'old', DateTime.fromISO('2024-06-14T08:00:00Z')));
      await store.save(first);

      const second = NotificationState.empty();
      second.set('bob', SlotState.empty().recordSend('2024-06-15', 1, null, DateTime.fromISO('2024-06-15T08:00:00Z')));

      // Act
      await store.save(second);
      const loaded = await store.load();

      // Assert
      expect(loaded.entries().map(([name]) => name)).toEqual(['bob']);
      expect(loaded.getOrEmpty('bob').slotsSent).toEqual([1]);
      expect(loaded.getOrEmpty('bob').assetsSentToday).toEqual([]);
    });
  });
});
