/**
 * Input validation for collection names, entity ids and payload bodies.
 *
 * @module validation
 */

import { TidemarkError, ValidationError } from '../errors/tidemark-error.js';
import type { EntityPayload } from '../types/entity.js';

/** Validation result */
export interface InputValidationResult {
  readonly valid: boolean;
  readonly errors: readonly string[];
}

// ── Collection Name Validation ───────────────────────────────────────────────

/** Collection names double as SQL table suffixes */
export const COLLECTION_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]{0,63}$/;
const RESERVED_PREFIX = '_tidemark';

/** Validate a collection name */
export function validateCollectionName(name: unknown): InputValidationResult {
  const errors: string[] = [];
  if (typeof name !== 'string') {
    return { valid: false, errors: ['Collection name must be a string'] };
  }
  if (name.length === 0) {
    errors.push('Collection name cannot be empty');
  } else if (name.length > 64) {
    errors.push(`Collection name too long (${name.length} chars, max 64)`);
  } else if (!COLLECTION_NAME_PATTERN.test(name)) {
    errors.push(
      'Collection name must start with a letter or underscore and contain only letters, digits or underscores'
    );
  }
  if (name.startsWith(RESERVED_PREFIX)) {
    errors.push(`"${name}" uses the reserved prefix "${RESERVED_PREFIX}"`);
  }
  return { valid: errors.length === 0, errors };
}

/** Assert a collection name is valid */
export function assertCollectionName(name: unknown): asserts name is string {
  const result = validateCollectionName(name);
  if (!result.valid) {
    throw new TidemarkError({
      code: 'TIDEMARK_V101',
      message: `Invalid collection name: ${result.errors.join('; ')}`,
      context: { name },
    });
  }
}

// ── Entity ID Validation ─────────────────────────────────────────────────────

/** Validate an entity id */
export function validateEntityId(id: unknown): InputValidationResult {
  const errors: string[] = [];
  if (typeof id !== 'string') {
    return { valid: false, errors: ['Entity id must be a string'] };
  }
  if (id.length === 0) errors.push('Entity id cannot be empty');
  else if (id.length > 256) errors.push(`Entity id too long (${id.length} chars, max 256)`);
  if (id.includes('\0')) errors.push('Entity id cannot contain null bytes');
  return { valid: errors.length === 0, errors };
}

/** Assert an entity id is valid */
export function assertEntityId(id: unknown): asserts id is string {
  const result = validateEntityId(id);
  if (!result.valid) {
    throw new TidemarkError({
      code: 'TIDEMARK_V102',
      message: `Invalid entity id: ${result.errors.join('; ')}`,
      context: { id },
    });
  }
}

// ── Payload Body Validation ──────────────────────────────────────────────────

const DANGEROUS_KEYS = new Set(['__proto__', 'constructor', 'prototype']);

/** Whether a value is a plain (non-array) object */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/** Validate a payload body before it is stored */
export function validatePayloadBody(payload: unknown): InputValidationResult {
  if (payload === null || payload === undefined) {
    return { valid: false, errors: ['Payload cannot be null or undefined'] };
  }
  if (!isPlainObject(payload)) {
    return { valid: false, errors: ['Payload must be a plain object'] };
  }
  const errors: string[] = [];
  for (const key of Object.keys(payload)) {
    if (DANGEROUS_KEYS.has(key)) {
      errors.push(`Payload key "${key}" is not allowed`);
    }
  }
  try {
    JSON.stringify(payload);
  } catch {
    errors.push('Payload contains non-serializable values');
  }
  return { valid: errors.length === 0, errors };
}

/** Assert a payload body is valid */
export function assertPayloadBody(payload: unknown): asserts payload is EntityPayload {
  const result = validatePayloadBody(payload);
  if (!result.valid) {
    throw new ValidationError(result.errors.map((message) => ({ path: '', message })));
  }
}
