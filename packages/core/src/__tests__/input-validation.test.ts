import { describe, it, expect } from 'vitest';
import { TidemarkError, ValidationError } from '../errors/tidemark-error.js';
import {
  assertCollectionName,
  assertEntityId,
  assertPayloadBody,
  isPlainObject,
  validateCollectionName,
  validateEntityId,
  validatePayloadBody,
} from '../validation/input-validation.js';

describe('Input Validation', () => {
  describe('validateCollectionName', () => {
    it('should accept valid names', () => {
      expect(validateCollectionName('todos').valid).toBe(true);
      expect(validateCollectionName('user_profiles').valid).toBe(true);
      expect(validateCollectionName('_private').valid).toBe(true);
      expect(validateCollectionName('Notes2').valid).toBe(true);
    });

    it('should reject non-string inputs', () => {
      const r = validateCollectionName(42);
      expect(r.valid).toBe(false);
      expect(r.errors).toEqual(['Collection name must be a string']);
      expect(validateCollectionName(null).valid).toBe(false);
      expect(validateCollectionName(undefined).valid).toBe(false);
    });

    it('should reject empty string', () => {
      expect(validateCollectionName('').errors).toEqual(['Collection name cannot be empty']);
    });

    it('should reject names that are not SQL-safe identifiers', () => {
      expect(validateCollectionName('123abc').valid).toBe(false);
      expect(validateCollectionName('my-data').valid).toBe(false);
      expect(validateCollectionName('my.collection').valid).toBe(false);
      expect(validateCollectionName('my collection').valid).toBe(false);
      expect(validateCollectionName('notes; DROP TABLE x').valid).toBe(false);
    });

    it('should reject names longer than 64 characters', () => {
      expect(validateCollectionName('a'.repeat(64)).valid).toBe(true);
      expect(validateCollectionName('a'.repeat(65)).errors).toEqual([
        'Collection name too long (65 chars, max 64)',
      ]);
    });

    it('should reject the reserved prefix', () => {
      const r = validateCollectionName('_tidemark_queue');
      expect(r.valid).toBe(false);
      expect(r.errors[0]).toContain('reserved');
    });
  });

  describe('assertCollectionName', () => {
    it('should throw TIDEMARK_V101', () => {
      expect(() => assertCollectionName('bad name')).toThrow(TidemarkError);
      try {
        assertCollectionName('bad name');
      } catch (error) {
        expect(TidemarkError.isCode(error, 'TIDEMARK_V101')).toBe(true);
      }
    });

    it('should not throw for valid names', () => {
      expect(() => assertCollectionName('posts')).not.toThrow();
    });
  });

  describe('validateEntityId', () => {
    it('should accept ordinary ids', () => {
      expect(validateEntityId('p1').valid).toBe(true);
      expect(validateEntityId('0b8f-4c1e').valid).toBe(true);
    });

    it('should reject non-strings, empty, long and null-byte ids', () => {
      expect(validateEntityId(7).valid).toBe(false);
      expect(validateEntityId('').errors).toEqual(['Entity id cannot be empty']);
      expect(validateEntityId('x'.repeat(257)).valid).toBe(false);
      expect(validateEntityId('a\0b').errors).toEqual(['Entity id cannot contain null bytes']);
    });

    it('should throw TIDEMARK_V102 from assertEntityId', () => {
      try {
        assertEntityId('');
        expect.unreachable();
      } catch (error) {
        expect(TidemarkError.isCode(error, 'TIDEMARK_V102')).toBe(true);
      }
    });
  });

  describe('validatePayloadBody', () => {
    it('should accept plain objects', () => {
      expect(validatePayloadBody({ caption: 'hello', tags: ['a'] }).valid).toBe(true);
      expect(validatePayloadBody({}).valid).toBe(true);
    });

    it('should reject null, arrays and class instances', () => {
      expect(validatePayloadBody(null).valid).toBe(false);
      expect(validatePayloadBody([1, 2]).valid).toBe(false);
      expect(validatePayloadBody(new Date()).valid).toBe(false);
    });

    it('should reject prototype-polluting keys', () => {
      const payload: unknown = JSON.parse('{"__proto__": {"admin": true}}');
      expect(validatePayloadBody(payload).errors).toEqual(['Payload key "__proto__" is not allowed']);
    });

    it('should reject values JSON cannot encode', () => {
      const payload: Record<string, unknown> = { name: 'loop' };
      payload['self'] = payload;
      expect(validatePayloadBody(payload).errors).toEqual([
        'Payload contains non-serializable values',
      ]);
    });

    it('should throw ValidationError from assertPayloadBody', () => {
      expect(() => assertPayloadBody('text')).toThrow(ValidationError);
    });
  });

  describe('isPlainObject', () => {
    it('should accept object literals and null-prototype objects', () => {
      expect(isPlainObject({ a: 1 })).toBe(true);
      expect(isPlainObject(Object.create(null))).toBe(true);
    });

    it('should reject everything else', () => {
      expect(isPlainObject(null)).toBe(false);
      expect(isPlainObject([])).toBe(false);
      expect(isPlainObject(new Map())).toBe(false);
      expect(isPlainObject('x')).toBe(false);
    });
  });
});
