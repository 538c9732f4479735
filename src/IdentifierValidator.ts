/**
 * Identifier Validator
 *
 * Guards every user and task identifier before it is embedded in a URL or
 * payload. Identifiers must be canonical, hyphenated UUIDs.
 */

import { InvalidIdentifierError } from './errors.js';

/**
 * 8-4-4-4-12 hex digits, any case. Version and variant nibbles are not
 * checked, so v6/v7, nil and max UUIDs pass.
 */
const CANONICAL_UUID = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

/**
 * Whether a value has the canonical UUID shape
 */
export function isCanonicalUuid(value: string): boolean {
  return CANONICAL_UUID.test(value);
}

/** Value recorded on the error when the identifier is missing */
export const EMPTY_IDENTIFIER = '<empty>';

/**
 * Validate an identifier and return it unchanged.
 *
 * @param value - Candidate UUID
 * @param fieldName - Field name reported on failure (`user_id`, `task_id`, ...)
 * @throws InvalidIdentifierError when the value is empty or not a canonical UUID
 */
export function validateIdentifier(value: string | null | undefined, fieldName: string): string {
  if (value === null || value === undefined || value === '') {
    throw new InvalidIdentifierError(fieldName, EMPTY_IDENTIFIER);
  }
  if (!isCanonicalUuid(value)) {
    throw new InvalidIdentifierError(fieldName, value);
  }
  return value;
}

/**
 * Path parameters holding identifiers: `id` itself and anything ending in `_id`
 */
export function isIdentifierParam(name: string): boolean {
  return name === 'id' || name.endsWith('_id');
}

/**
 * Validate every identifier-like entry of a path parameter map
 */
export function validatePathIdentifiers(pathParams: Readonly<Record<string, string>>): void {
  for (const [name, value] of Object.entries(pathParams)) {
    if (isIdentifierParam(name)) {
      validateIdentifier(value, name);
    }
  }
}
