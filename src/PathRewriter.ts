/**
 * Path Rewriter
 *
 * Translates a logical `(method, path)` pair into the method and path the
 * task service serves, substituting `{name}` placeholders from the caller's
 * path parameters.
 */

import { RouteConfigurationError } from './errors.js';
import { isCanonicalUuid, isIdentifierParam } from './IdentifierValidator.js';
import { isHttpMethod, type HttpMethod } from './types.js';
import {
  TASK_SERVICE_ROUTES,
  type PayloadKind,
  type RouteTable,
  type RouteTarget,
} from './routes.js';

const PLACEHOLDER = /\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

export interface RewriteResult {
  method: HttpMethod;
  /** Upstream path with placeholders substituted */
  path: string;
  /** Path parameters after merging values captured from a concrete path */
  params: Record<string, string>;
  /** Matched table entry, undefined on a pass-through */
  target?: Readonly<RouteTarget>;
  payload: PayloadKind;
}

interface TemplateRoute {
  method: HttpMethod;
  template: string;
  segments: string[];
  literalSegments: number;
  target: Readonly<RouteTarget>;
}

/**
 * Placeholder names used in a template, in order of appearance
 */
export function placeholdersOf(template: string): string[] {
  return Array.from(template.matchAll(PLACEHOLDER), (match) => match[1] ?? '');
}

/**
 * Substitute every `{name}` of a template.
 *
 * @throws RouteConfigurationError when a placeholder has no value
 */
export function fillTemplate(template: string, params: Readonly<Record<string, string>>): string {
  return template.replace(PLACEHOLDER, (_token, name: string) => {
    const value = params[name];
    if (value === undefined || value === '') {
      throw new RouteConfigurationError(`${name} is required for route ${template}`);
    }
    return encodeURIComponent(value);
  });
}

function splitRouteKey(key: string): { method: HttpMethod; path: string } {
  const separator = key.indexOf(' ');
  const method = key.slice(0, separator);
  if (separator < 0 || !isHttpMethod(method)) {
    throw new RouteConfigurationError(`Route key must start with an HTTP method: ${key}`);
  }
  return { method, path: key.slice(separator + 1) };
}

/**
 * Check that every placeholder of every target is declared by its logical
 * route.
 *
 * @throws RouteConfigurationError listing the offending routes
 */
export function validateRouteTable(table: RouteTable): void {
  const problems: string[] = [];
  for (const [key, target] of Object.entries(table)) {
    const logicalPath = splitRouteKey(key).path;
    const declared = new Set(placeholdersOf(logicalPath));
    for (const name of placeholdersOf(target.path)) {
      if (!declared.has(name)) {
        problems.push(`${key} -> ${target.method} ${target.path} references {${name}}`);
      }
    }
  }
  if (problems.length > 0) {
    throw new RouteConfigurationError(`Route table is inconsistent: ${problems.join(', ')}`);
  }
}

function defaultPayload(logicalPath: string): PayloadKind {
  return logicalPath === 'tasks' || logicalPath.startsWith('tasks/') ? 'task' : 'raw';
}

/**
 * Route rewriter over a read-only route table
 */
export class PathRewriter {
  private readonly exact: ReadonlyMap<string, Readonly<RouteTarget>>;
  private readonly templates: readonly TemplateRoute[];

  constructor(private readonly table: RouteTable = TASK_SERVICE_ROUTES) {
    validateRouteTable(table);

    const exact = new Map<string, Readonly<RouteTarget>>();
    const templates: TemplateRoute[] = [];
    for (const [key, target] of Object.entries(table)) {
      exact.set(key, target);
      const { method, path } = splitRouteKey(key);
      if (placeholdersOf(path).length > 0) {
        const segments = path.split('/');
        templates.push({
          method,
          template: path,
          segments,
          literalSegments: segments.filter((segment) => !segment.startsWith('{')).length,
          target,
        });
      }
    }
    // More literal segments means more specific
    templates.sort((a, b) => b.literalSegments - a.literalSegments);

    this.exact = exact;
    this.templates = templates;
  }

  /**
   * Rewrite a logical call.
   *
   * Exact matches win over template matches; a miss passes the method and
   * path through unchanged. An identifier placeholder only matches a
   * segment shaped like a UUID.
   *
   * @throws RouteConfigurationError when a placeholder has no value
   */
  rewrite(
    method: HttpMethod,
    logicalPath: string,
    pathParams: Readonly<Record<string, string>> = {}
  ): RewriteResult {
    const exactTarget = this.exact.get(`${method} ${logicalPath}`);
    if (exactTarget) {
      return this.resolve(exactTarget, { ...pathParams });
    }

    const match = this.matchTemplate(method, logicalPath);
    if (match) {
      return this.resolve(match.route.target, { ...match.captured, ...pathParams });
    }

    return {
      method,
      path: logicalPath,
      params: { ...pathParams },
      payload: defaultPayload(logicalPath),
    };
  }

  /**
   * Whether a logical route has an entry in the table
   */
  has(method: HttpMethod, logicalPath: string): boolean {
    return (
      this.exact.has(`${method} ${logicalPath}`) ||
      this.matchTemplate(method, logicalPath) !== undefined
    );
  }

  getTable(): RouteTable {
    return this.table;
  }

  private resolve(target: Readonly<RouteTarget>, params: Record<string, string>): RewriteResult {
    return {
      method: target.method,
      path: fillTemplate(target.path, params),
      params,
      target,
      payload: target.payload ?? 'task',
    };
  }

  private matchTemplate(
    method: HttpMethod,
    logicalPath: string
  ): { route: TemplateRoute; captured: Record<string, string> } | undefined {
    const segments = logicalPath.split('/');
    for (const route of this.templates) {
      if (route.method !== method || route.segments.length !== segments.length) {
        continue;
      }
      const captured = matchSegments(route.segments, segments);
      if (captured) {
        return { route, captured };
      }
    }
    return undefined;
  }
}

function matchSegments(
  templateSegments: readonly string[],
  pathSegments: readonly string[]
): Record<string, string> | null {
  const captured: Record<string, string> = {};
  for (let i = 0; i < templateSegments.length; i++) {
    const expected = templateSegments[i] ?? '';
    const actual = pathSegments[i] ?? '';
    if (expected.startsWith('{') && expected.endsWith('}')) {
      // A concrete path never carries an unfilled placeholder
      if (actual === '' || actual.startsWith('{')) {
        return null;
      }
      const value = decodeSegment(actual);
      if (value === null) {
        return null;
      }
      const name = expected.slice(1, -1);
      // `tasks/statistics` is not `tasks/{task_id}`
      if (isIdentifierParam(name) && !isCanonicalUuid(value)) {
        return null;
      }
      captured[name] = value;
    } else if (expected !== actual) {
      return null;
    }
  }
  return captured;
}

function decodeSegment(segment: string): string | null {
  try {
    return decodeURIComponent(segment);
  } catch (error) {
    if (error instanceof URIError) {
      return null;
    }
    throw error;
  }
}
