/**
 * Task Service API
 *
 * Typed wrappers around {@link GatewayClient.call}, one per logical route
 * in the task service table. Every method resolves to the normalized
 * envelope and throws only `InvalidIdentifierError`.
 *
 * @example
 * ```typescript
 * const api = new TaskServiceApi(gateway);
 *
 * const page = await api.listTasks(userId, { limit: 20, offset: 40 });
 * await api.completeTask(userId, taskId);
 * ```
 */

import type { GatewayClient } from './GatewayClient.js';
import type { CallResponse, JsonObject, JsonValue } from './types.js';

/** Filters such as `limit`, `offset`, `status` or `priority` */
export type TaskListQuery = JsonObject;

export type TaskFields = JsonObject;

export class TaskServiceApi {
  constructor(private readonly gateway: GatewayClient) {}

  listTasks(userId: string, query: TaskListQuery = {}): Promise<CallResponse> {
    return this.gateway.call('GET', 'tasks', userId, undefined, query);
  }

  /**
   * Filtered listing; the filters are sent upstream as query parameters
   */
  queryTasks(userId: string, filters: TaskListQuery = {}): Promise<CallResponse> {
    return this.gateway.call('POST', 'tasks/query', userId, filters);
  }

  createTask(userId: string, task: TaskFields): Promise<CallResponse> {
    return this.gateway.call('POST', 'tasks', userId, task);
  }

  getTask(userId: string, taskId: string): Promise<CallResponse> {
    return this.gateway.call('GET', 'tasks/{task_id}', userId, undefined, undefined, {
      task_id: taskId,
    });
  }

  updateTask(userId: string, taskId: string, changes: TaskFields): Promise<CallResponse> {
    return this.gateway.call('PUT', 'tasks/{task_id}', userId, changes, undefined, {
      task_id: taskId,
    });
  }

  deleteTask(userId: string, taskId: string): Promise<CallResponse> {
    return this.gateway.call('DELETE', 'tasks/{task_id}', userId, undefined, undefined, {
      task_id: taskId,
    });
  }

  /**
   * Mark a task completed. Completion is a status update upstream, so any
   * extra fields travel with it.
   */
  completeTask(userId: string, taskId: string, extra: TaskFields = {}): Promise<CallResponse> {
    return this.gateway.call(
      'POST',
      'tasks/{task_id}/complete',
      userId,
      { ...extra, status: 'completed' },
      undefined,
      { task_id: taskId }
    );
  }

  searchTasks(userId: string, keyword: string, options: JsonObject = {}): Promise<CallResponse> {
    return this.gateway.call('POST', 'tasks/search', userId, { ...options, keyword });
  }

  getTags(userId: string): Promise<CallResponse> {
    return this.gateway.call('GET', 'tasks/tags', userId);
  }

  getTaskTree(userId: string, taskId: string): Promise<CallResponse> {
    return this.gateway.call('GET', 'tasks/{task_id}/tree', userId, undefined, undefined, {
      task_id: taskId,
    });
  }

  queryTop3(userId: string, filters: JsonObject = {}): Promise<CallResponse> {
    return this.gateway.call('POST', 'tasks/top3/query', userId, filters);
  }

  /**
   * @param date - `YYYY-MM-DD`
   */
  setTop3(userId: string, date: string, taskIds: readonly string[]): Promise<CallResponse> {
    const ids: JsonValue[] = [...taskIds];
    return this.gateway.call('POST', 'tasks/special/top3', userId, { date, task_ids: ids });
  }

  /**
   * @param date - `YYYY-MM-DD`
   */
  getTop3(userId: string, date: string): Promise<CallResponse> {
    return this.gateway.call('GET', 'tasks/special/top3/{date}', userId, undefined, undefined, {
      date,
    });
  }

  sendFocusStatus(userId: string, status: JsonObject): Promise<CallResponse> {
    return this.gateway.call('POST', 'tasks/focus-status', userId, status);
  }

  getPomodoroCount(userId: string, query: JsonObject = {}): Promise<CallResponse> {
    return this.gateway.call('GET', 'tasks/pomodoro-count', userId, undefined, query);
  }
}
