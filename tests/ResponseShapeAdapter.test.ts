import { describe, it, expect, vi } from 'vitest';
import {
  TASK_FIELD_DEFAULTS,
  adaptEnvelope,
  adaptPayload,
  adaptTask,
  computePagination,
  normalizePriority,
  normalizeStatus,
} from '../src/ResponseShapeAdapter.js';
import { isJsonObject, type GatewayLogger, type JsonObject } from '../src/types.js';

function createLogger(): GatewayLogger {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  };
}

describe('ResponseShapeAdapter', () => {
  describe('normalizeStatus', () => {
    it.each([
      ['NOT_STARTED', 'pending'],
      ['TODO', 'pending'],
      ['todo', 'pending'],
      ['pending', 'pending'],
      ['IN_PROGRESS', 'in_progress'],
      ['inprogress', 'in_progress'],
      ['in_progress', 'in_progress'],
      ['COMPLETED', 'completed'],
      ['completed', 'completed'],
    ])('should map %s to %s', (input, expected) => {
      expect(normalizeStatus(input)).toBe(expected);
    });

    it('should lower-case and log unknown statuses', () => {
      const logger = createLogger();

      expect(normalizeStatus('ARCHIVED', { logger })).toBe('archived');
      expect(logger.warn).toHaveBeenCalledWith(
        { field: 'status', value: 'ARCHIVED' },
        'Unknown task status, passing it lower-cased'
      );
    });

    it('should be idempotent', () => {
      for (const value of ['NOT_STARTED', 'InProgress', 'COMPLETED', 'ARCHIVED']) {
        const once = normalizeStatus(value);
        expect(normalizeStatus(once)).toBe(once);
      }
    });
  });

  describe('normalizePriority', () => {
    it('should map priorities case-insensitively', () => {
      expect(normalizePriority('HIGH')).toBe('high');
      expect(normalizePriority('Medium')).toBe('medium');
      expect(normalizePriority('low')).toBe('low');
    });

    it('should lower-case and log unknown priorities', () => {
      const logger = createLogger();

      expect(normalizePriority('URGENT', { logger })).toBe('urgent');
      expect(logger.warn).toHaveBeenCalledWith(
        { field: 'priority', value: 'URGENT' },
        'Unknown task priority, passing it lower-cased'
      );
    });
  });

  describe('adaptTask', () => {
    it('should normalize enums and back-fill missing fields', () => {
      expect(adaptTask({ id: 't1', title: 'Write', status: 'TODO', priority: 'HIGH' })).toEqual({
        id: 't1',
        title: 'Write',
        status: 'pending',
        priority: 'high',
        parent_id: null,
        tags: [],
        service_ids: [],
        planned_start_time: null,
        planned_end_time: null,
        last_claimed_date: null,
        is_deleted: false,
        completion_percentage: 0,
      });
    });

    it('should never overwrite fields the service sent', () => {
      const adapted = adaptTask({
        id: 't1',
        parent_id: 'p1',
        tags: ['work'],
        is_deleted: true,
        completion_percentage: 50,
      });

      expect(adapted['parent_id']).toBe('p1');
      expect(adapted['tags']).toEqual(['work']);
      expect(adapted['is_deleted']).toBe(true);
      expect(adapted['completion_percentage']).toBe(50);
    });

    it('should not mutate the input or share default arrays', () => {
      const task: JsonObject = { id: 't1', status: 'TODO' };

      const first = adaptTask(task);
      const second = adaptTask(task);

      expect(task).toEqual({ id: 't1', status: 'TODO' });
      expect(first['tags']).not.toBe(second['tags']);
      expect(first['tags']).not.toBe(TASK_FIELD_DEFAULTS['tags']);
    });

    it('should be idempotent', () => {
      const samples: JsonObject[] = [
        { id: 't1', status: 'NOT_STARTED', priority: 'HIGH' },
        { id: 't2', status: 'weird', tags: ['a'] },
        { id: 't3' },
      ];

      for (const sample of samples) {
        const once = adaptTask(sample);
        expect(adaptTask(once)).toEqual(once);
      }
    });
  });

  describe('computePagination', () => {
    it('should derive pages from total, limit and offset', () => {
      expect(computePagination(45, 20, 20)).toEqual({
        currentPage: 2,
        pageSize: 20,
        totalCount: 45,
        totalPages: 3,
        hasNext: true,
        hasPrev: true,
      });
    });

    it('should treat a non-positive limit as a single page', () => {
      expect(computePagination(7, 0, 0)).toEqual({
        currentPage: 1,
        pageSize: 7,
        totalCount: 7,
        totalPages: 1,
        hasNext: false,
        hasPrev: false,
      });
    });

    it('should keep hasNext and hasPrev consistent with the page', () => {
      for (const [total, limit, offset] of [
        [0, 10, 0],
        [10, 10, 0],
        [11, 10, 10],
        [100, 7, 49],
        [5, 2, 4],
      ] as const) {
        const page = computePagination(total, limit, offset);
        expect(page.hasNext).toBe(page.currentPage < page.totalPages);
        expect(page.hasPrev).toBe(page.currentPage > 1);
        expect(page.currentPage).toBe(Math.floor(offset / limit) + 1);
      }
    });
  });

  describe('adaptPayload', () => {
    it('should adapt a task list with pagination', () => {
      const result = adaptPayload({
        tasks: [{ id: 't1', status: 'NOT_STARTED', priority: 'HIGH' }],
        total: 10,
        limit: 10,
        offset: 0,
      });

      if (!result.ok || !isJsonObject(result.value)) {
        throw new Error('Expected an object payload');
      }
      const payload = result.value;
      expect(payload['tasks']).toEqual([
        expect.objectContaining({ id: 't1', status: 'pending', priority: 'high' }),
      ]);
      expect(payload['pagination']).toEqual({
        currentPage: 1,
        pageSize: 10,
        totalCount: 10,
        totalPages: 1,
        hasNext: false,
        hasPrev: false,
      });
      expect(payload).not.toHaveProperty('total');
    });

    it('should wrap a bare array', () => {
      const result = adaptPayload([{ id: 't1' }, { id: 't2' }]);

      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.value).toMatchObject({
          tasks: [{ id: 't1' }, { id: 't2' }],
          pagination: {
            currentPage: 1,
            pageSize: 2,
            totalCount: 2,
            totalPages: 1,
            hasNext: false,
            hasPrev: false,
          },
        });
      }
    });

    it('should default limit and offset from the item count', () => {
      const result = adaptPayload({ tasks: [{ id: 't1' }, { id: 't2' }], total: 5 });

      expect(result.ok && result.value).toMatchObject({
        pagination: { currentPage: 1, pageSize: 2, totalCount: 5, totalPages: 3, hasNext: true },
      });
    });

    it('should keep unrelated keys of a list payload', () => {
      const result = adaptPayload({ tasks: [], total: 0, limit: 10, offset: 0, filter: 'all' });

      expect(result.ok && result.value).toMatchObject({ filter: 'all', tasks: [] });
    });

    it('should adapt a single task object', () => {
      const result = adaptPayload({ id: 't1', status: 'COMPLETED' });

      expect(result.ok && result.value).toMatchObject({ id: 't1', status: 'completed', tags: [] });
    });

    it.each([['text'], [42], [true], [null]])('should pass %s through', (value) => {
      expect(adaptPayload(value)).toEqual({ ok: true, value });
    });

    it('should report a non-array tasks field as malformed', () => {
      const result = adaptPayload({ tasks: 'nope' });

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe('MalformedResponse');
        expect(result.error.message).toBe('Task list payload has a non-array "tasks" field');
        expect(result.error.body).toBe('{"tasks":"nope"}');
      }
    });

    it('should report a non-object list entry as malformed', () => {
      const result = adaptPayload([{ id: 't1' }, 'oops']);

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.message).toBe('Task list entry 1 is not an object');
      }
    });

    it('should leave an already adapted task as it is', () => {
      const task = adaptTask({ id: 't1', status: 'TODO', priority: 'LOW' });

      expect(adaptPayload(task)).toEqual({ ok: true, value: task });
    });
  });

  describe('adaptEnvelope', () => {
    it('should adapt the data of an envelope', () => {
      const result = adaptEnvelope({
        code: 200,
        success: true,
        message: 'success',
        data: { id: 't1', priority: 'LOW' },
      });

      expect(result.ok && result.value.data).toMatchObject({ id: 't1', priority: 'low' });
    });

    it('should leave an envelope without data untouched', () => {
      const envelope = { code: 204, success: true, message: 'deleted', data: null };

      expect(adaptEnvelope(envelope)).toEqual({ ok: true, value: envelope });
    });
  });
});
