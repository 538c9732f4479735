/**
 * Response Shape Adapter
 *
 * Normalizes task payloads from the task service into the client contract:
 *
 * - bare arrays become `{ tasks, pagination }`
 * - `{ tasks, total, limit, offset }` gets a derived `pagination` block
 * - a single task object is adapted in place
 * - anything else passes through untouched
 *
 * Per task, upper-case enum values (`NOT_STARTED`, `HIGH`) are mapped to the
 * contract's lower-case ones and contract fields the service omits are
 * back-filled.
 */

import { err, ok, truncateBody, type MalformedResponseError, type Result } from './errors.js';
import {
  isJsonObject,
  type CallResponse,
  type GatewayLogger,
  type JsonObject,
  type JsonValue,
  type PaginationInfo,
} from './types.js';

export type TaskStatus = 'pending' | 'in_progress' | 'completed';
export type TaskPriority = 'low' | 'medium' | 'high';

/** Keys are lower-cased before lookup */
const STATUS_ALIASES: Readonly<Record<string, TaskStatus>> = {
  not_started: 'pending',
  todo: 'pending',
  pending: 'pending',
  in_progress: 'in_progress',
  inprogress: 'in_progress',
  completed: 'completed',
};

const PRIORITY_ALIASES: Readonly<Record<string, TaskPriority>> = {
  low: 'low',
  medium: 'medium',
  high: 'high',
};

/**
 * Contract fields and the value used when the task service leaves them out
 */
export const TASK_FIELD_DEFAULTS: Readonly<Record<string, JsonValue>> = Object.freeze({
  parent_id: null,
  tags: [],
  service_ids: [],
  planned_start_time: null,
  planned_end_time: null,
  last_claimed_date: null,
  is_deleted: false,
  completion_percentage: 0,
});

export interface AdapterOptions {
  /** Receives a warning for every enum value outside the alias tables */
  logger?: GatewayLogger;
}

/**
 * Map a status alias to the contract value; unknown values are lower-cased.
 */
export function normalizeStatus(value: string, options: AdapterOptions = {}): string {
  const lowered = value.toLowerCase();
  const mapped = STATUS_ALIASES[lowered];
  if (mapped) {
    return mapped;
  }
  options.logger?.warn({ field: 'status', value }, 'Unknown task status, passing it lower-cased');
  return lowered;
}

/**
 * Map a priority alias to the contract value; unknown values are lower-cased.
 */
export function normalizePriority(value: string, options: AdapterOptions = {}): string {
  const lowered = value.toLowerCase();
  const mapped = PRIORITY_ALIASES[lowered];
  if (mapped) {
    return mapped;
  }
  options.logger?.warn(
    { field: 'priority', value },
    'Unknown task priority, passing it lower-cased'
  );
  return lowered;
}

/**
 * Adapt one task: normalize enums and back-fill missing contract fields.
 * Existing fields are never overwritten; the input is not mutated.
 */
export function adaptTask(task: JsonObject, options: AdapterOptions = {}): JsonObject {
  const adapted: JsonObject = { ...task };

  const status = adapted['status'];
  if (typeof status === 'string') {
    adapted['status'] = normalizeStatus(status, options);
  }
  const priority = adapted['priority'];
  if (typeof priority === 'string') {
    adapted['priority'] = normalizePriority(priority, options);
  }

  for (const [field, fallback] of Object.entries(TASK_FIELD_DEFAULTS)) {
    if (!(field in adapted)) {
      adapted[field] = Array.isArray(fallback) ? [] : fallback;
    }
  }
  return adapted;
}

/**
 * Derive pagination from `total`/`limit`/`offset`.
 *
 * A non-positive limit means everything fits on one page.
 */
export function computePagination(total: number, limit: number, offset: number): PaginationInfo {
  const totalCount = Math.max(total, 0);
  if (limit <= 0) {
    return {
      currentPage: 1,
      pageSize: totalCount,
      totalCount,
      totalPages: 1,
      hasNext: false,
      hasPrev: false,
    };
  }

  const currentPage = Math.floor(Math.max(offset, 0) / limit) + 1;
  const totalPages = Math.ceil(totalCount / limit);
  return {
    currentPage,
    pageSize: limit,
    totalCount,
    totalPages,
    hasNext: currentPage < totalPages,
    hasPrev: currentPage > 1,
  };
}

function paginationToJson(pagination: PaginationInfo): JsonObject {
  return {
    currentPage: pagination.currentPage,
    pageSize: pagination.pageSize,
    totalCount: pagination.totalCount,
    totalPages: pagination.totalPages,
    hasNext: pagination.hasNext,
    hasPrev: pagination.hasPrev,
  };
}

function malformed(message: string, value: JsonValue): MalformedResponseError {
  return {
    kind: 'MalformedResponse',
    retryable: false,
    message,
    body: truncateBody(JSON.stringify(value)),
  };
}

function adaptTaskList(
  items: readonly JsonValue[],
  options: AdapterOptions
): Result<JsonObject[], MalformedResponseError> {
  const adapted: JsonObject[] = [];
  for (const [index, item] of items.entries()) {
    if (!isJsonObject(item)) {
      return err(malformed(`Task list entry ${index} is not an object`, item));
    }
    adapted.push(adaptTask(item, options));
  }
  return ok(adapted);
}

function numberOr(value: JsonValue | undefined, fallback: number): number {
  return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
}

/**
 * Adapt a task payload (the `data` of an envelope).
 *
 * @returns the adapted payload, or `MalformedResponse` when a task list
 * cannot be interpreted
 */
export function adaptPayload(
  raw: JsonValue | undefined,
  options: AdapterOptions = {}
): Result<JsonValue | undefined, MalformedResponseError> {
  if (Array.isArray(raw)) {
    const tasks = adaptTaskList(raw, options);
    if (!tasks.ok) {
      return tasks;
    }
    const count = tasks.value.length;
    return ok({
      tasks: tasks.value,
      pagination: paginationToJson({
        currentPage: 1,
        pageSize: count,
        totalCount: count,
        totalPages: 1,
        hasNext: false,
        hasPrev: false,
      }),
    });
  }

  if (!isJsonObject(raw)) {
    return ok(raw);
  }

  if (!('tasks' in raw)) {
    return ok(adaptTask(raw, options));
  }

  const items = raw['tasks'];
  if (!Array.isArray(items)) {
    return err(malformed('Task list payload has a non-array "tasks" field', raw));
  }
  const tasks = adaptTaskList(items, options);
  if (!tasks.ok) {
    return tasks;
  }

  const { total, limit, offset, ...rest } = raw;
  const pagination = computePagination(
    numberOr(total, tasks.value.length),
    numberOr(limit, tasks.value.length),
    numberOr(offset, 0)
  );
  return ok({ ...rest, tasks: tasks.value, pagination: paginationToJson(pagination) });
}

/**
 * Adapt the `data` of an envelope; envelopes without data are returned as is.
 */
export function adaptEnvelope(
  envelope: CallResponse,
  options: AdapterOptions = {}
): Result<CallResponse, MalformedResponseError> {
  if (envelope.data === null) {
    return ok(envelope);
  }
  const adapted = adaptPayload(envelope.data, options);
  if (!adapted.ok) {
    return adapted;
  }
  return ok({ ...envelope, data: adapted.value ?? null });
}
