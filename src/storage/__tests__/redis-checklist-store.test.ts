/**
 * Tests for RedisChecklistStore
 *
 * ioredis is mocked (no Redis server required). Tests verify the key
 * layout, per-step writes through the Lua script, decoding of stored hashes
 * and the mapping of Redis failures to typed errors.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';

// ---------------------------------------------------------------------------
// Mock Redis (must be before imports)
// ---------------------------------------------------------------------------

const { mockHgetall, mockHget, mockEval, mockZrevrange, mockMulti, tx } = vi.hoisted(() => {
  const tx = {
    hset: vi.fn().mockReturnThis(),
    zadd: vi.fn().mockReturnThis(),
    del: vi.fn().mockReturnThis(),
    zrem: vi.fn().mockReturnThis(),
    exec: vi.fn(),
  };
  return {
    mockHgetall: vi.fn(),
    mockHget: vi.fn(),
    mockEval: vi.fn(),
    mockZrevrange: vi.fn(),
    mockMulti: vi.fn(() => tx),
    tx,
  };
});

vi.mock('ioredis', () => ({
  Redis: class MockIORedis {
    hgetall = mockHgetall;
    hget = mockHget;
    eval = mockEval;
    zrevrange = mockZrevrange;
    multi = mockMulti;
  },
}));

// ---------------------------------------------------------------------------
// Import after mocks
// ---------------------------------------------------------------------------

import { Redis as IORedis } from 'ioredis';
import { RedisChecklistStore, UPDATE_STEP_SCRIPT } from '../redis-checklist-store.js';
import { NotFoundError, StorageUnavailableError } from '../../checklist/errors.js';
import { halfDoneChecklist, movingTemplate } from '../../checklist/__tests__/fixtures/index.js';

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

const checklist = halfDoneChecklist();

const storedHash = {
  userId: 'user-alice',
  sourceTemplateId: 'tpl-moving',
  title: 'First time moving to a new city',
  steps: JSON.stringify(movingTemplate.steps),
  createdAt: '2026-01-01T12:00:00.000Z',
  updatedAt: '2026-01-03T08:00:00.000Z',
};

const storedProgress = {
  '0': '{"completed":true,"completedAt":"2026-01-02T08:00:00.000Z"}',
  '1': '{"completed":false,"completedAt":null}',
  '2': '{"completed":true,"completedAt":"2026-01-03T08:00:00.000Z"}',
  '3': '{"completed":false,"completedAt":null}',
};

/** hgetall answering from a key -> hash map ({} for unknown keys, like Redis) */
function hgetallFrom(hashes: Record<string, Record<string, string>>) {
  return async (key: string) => hashes[key] ?? {};
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('RedisChecklistStore', () => {
  let store: RedisChecklistStore;

  beforeEach(() => {
    vi.clearAllMocks();
    tx.exec.mockResolvedValue([]);
    store = new RedisChecklistStore(new IORedis());
  });

  describe('insert', () => {
    it('writes the record, every progress field and the user index in one MULTI', async () => {
      await store.insert(checklist);

      expect(mockMulti).toHaveBeenCalledOnce();
      expect(tx.hset).toHaveBeenNthCalledWith(1, 'checklist:chk-half', storedHash);
      expect(tx.hset).toHaveBeenNthCalledWith(2, 'checklist:chk-half:progress', storedProgress);
      expect(tx.zadd).toHaveBeenCalledWith(
        'user:user-alice:checklists',
        Date.parse('2026-01-01T12:00:00.000Z'),
        'chk-half',
      );
      expect(tx.exec).toHaveBeenCalledOnce();
    });

    it('skips the progress hash for a checklist without steps', async () => {
      await store.insert(halfDoneChecklist({ steps: [], progress: [] }));

      expect(tx.hset).toHaveBeenCalledOnce();
      expect(tx.hset.mock.calls[0][0]).toBe('checklist:chk-half');
    });

    it('reports a failed queued command as StorageUnavailableError', async () => {
      tx.exec.mockResolvedValue([[new Error('OOM command not allowed'), null]]);

      await expect(store.insert(checklist)).rejects.toBeInstanceOf(StorageUnavailableError);
    });
  });

  describe('getById', () => {
    it('decodes the record and index-aligned progress', async () => {
      mockHgetall.mockImplementation(
        hgetallFrom({
          'checklist:chk-half': storedHash,
          'checklist:chk-half:progress': storedProgress,
        }),
      );

      expect(await store.getById('chk-half')).toEqual(checklist);
    });

    it('returns null when the record does not exist', async () => {
      mockHgetall.mockImplementation(hgetallFrom({}));

      expect(await store.getById('chk-missing')).toBeNull();
    });

    it('treats a missing progress field as incomplete', async () => {
      const { '3': _dropped, ...partial } = storedProgress;
      mockHgetall.mockImplementation(
        hgetallFrom({
          'checklist:chk-half': storedHash,
          'checklist:chk-half:progress': partial,
        }),
      );

      const loaded = await store.getById('chk-half');
      expect(loaded?.progress[3]).toEqual({ stepIndex: 3, completed: false, completedAt: null });
    });

    it('reports a corrupt record as StorageUnavailableError', async () => {
      mockHgetall.mockImplementation(
        hgetallFrom({ 'checklist:chk-half': { ...storedHash, steps: 'not json' } }),
      );

      await expect(store.getById('chk-half')).rejects.toBeInstanceOf(StorageUnavailableError);
    });
  });

  describe('updateStepProgress', () => {
    it('writes a single progress field through the update script', async () => {
      mockEval.mockResolvedValue(1);

      await store.updateStepProgress('chk-half', 1, true, '2026-02-01T10:00:00.000Z');

      expect(mockEval).toHaveBeenCalledWith(
        UPDATE_STEP_SCRIPT,
        2,
        'checklist:chk-half',
        'checklist:chk-half:progress',
        '1',
        '{"completed":true,"completedAt":"2026-02-01T10:00:00.000Z"}',
        '2026-02-01T10:00:00.000Z',
      );
    });

    it('stores a null completedAt when un-checking', async () => {
      mockEval.mockResolvedValue(1);

      await store.updateStepProgress('chk-half', 0, false, '2026-02-01T10:00:00.000Z');

      expect(mockEval.mock.calls[0][5]).toBe('{"completed":false,"completedAt":null}');
      expect(mockEval.mock.calls[0][6]).toBe('2026-02-01T10:00:00.000Z');
    });

    it('throws NotFoundError when the script finds no checklist', async () => {
      mockEval.mockResolvedValue(0);

      await expect(
        store.updateStepProgress('chk-gone', 0, true, '2026-02-01T10:00:00.000Z'),
      ).rejects.toBeInstanceOf(NotFoundError);
    });

    it('wraps connection failures in StorageUnavailableError', async () => {
      mockEval.mockRejectedValue(new Error('Connection is closed.'));

      await expect(
        store.updateStepProgress('chk-half', 0, true, '2026-02-01T10:00:00.000Z'),
      ).rejects.toThrow('Storage unavailable during step update: Connection is closed.');
    });
  });

  describe('listByUser', () => {
    it('loads ids from the user index newest first and skips vanished records', async () => {
      mockZrevrange.mockResolvedValue(['chk-gone', 'chk-half']);
      mockHgetall.mockImplementation(
        hgetallFrom({
          'checklist:chk-half': storedHash,
          'checklist:chk-half:progress': storedProgress,
        }),
      );

      const listed = await store.listByUser('user-alice');

      expect(mockZrevrange).toHaveBeenCalledWith('user:user-alice:checklists', 0, -1);
      expect(listed).toEqual([checklist]);
    });
  });

  describe('delete', () => {
    it('removes both hashes and the index entry', async () => {
      mockHget.mockResolvedValue('user-alice');

      expect(await store.delete('chk-half')).toBe(true);
      expect(mockHget).toHaveBeenCalledWith('checklist:chk-half', 'userId');
      expect(tx.del).toHaveBeenCalledWith('checklist:chk-half', 'checklist:chk-half:progress');
      expect(tx.zrem).toHaveBeenCalledWith('user:user-alice:checklists', 'chk-half');
    });

    it('returns false without a transaction when the record does not exist', async () => {
      mockHget.mockResolvedValue(null);

      expect(await store.delete('chk-missing')).toBe(false);
      expect(mockMulti).not.toHaveBeenCalled();
    });
  });
});
