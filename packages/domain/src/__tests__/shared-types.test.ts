/**
 * @fileoverview Tests for Shared Domain Error Types
 */

import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import {
  DomainError,
  DuplicateEntryError,
  NotFoundError,
  ValidationError,
} from '../shared/types.js';

describe('Domain Errors', () => {
  describe('DomainError', () => {
    it('should create domain error with code and message', () => {
      const error = new DomainError('INVALID_QUANTITY', 'Bad magnitude');

      expect(error.code).toBe('INVALID_QUANTITY');
      expect(error.message).toBe('Bad magnitude');
      expect(error.name).toBe('DomainError');
      expect(error.details).toBeUndefined();
    });

    it('should serialize to JSON', () => {
      const error = new DomainError('UNKNOWN_UNIT', 'Cannot parse unit', { expression: 'xyz' });

      expect(error.toJSON()).toEqual({
        name: 'DomainError',
        code: 'UNKNOWN_UNIT',
        message: 'Cannot parse unit',
        details: { expression: 'xyz' },
      });
    });

    it('should keep the subclass prototype', () => {
      const error = new DuplicateEntryError('tool', 'T1');

      expect(error).toBeInstanceOf(DuplicateEntryError);
      expect(error).toBeInstanceOf(DomainError);
      expect(error).toBeInstanceOf(Error);
    });
  });

  describe('DuplicateEntryError', () => {
    it('should name the entry type and key', () => {
      const error = new DuplicateEntryError('machine', 'Bench Mill');

      expect(error.code).toBe('DUPLICATE_ENTRY');
      expect(error.message).toBe('Duplicate machine: Bench Mill');
      expect(error.details).toEqual({ entryType: 'machine', key: 'Bench Mill' });
    });
  });

  describe('NotFoundError', () => {
    it('should name the entry type and key', () => {
      const error = new NotFoundError('Material', 'Unobtainium');

      expect(error.code).toBe('NOT_FOUND');
      expect(error.message).toBe('Material not found: Unobtainium');
    });
  });

  describe('ValidationError', () => {
    it('should create validation error with field errors', () => {
      const fieldErrors = { 'tools.0.toothCount': ['Tooth count must be an integer'] };
      const error = new ValidationError('Validation failed', fieldErrors);

      expect(error.code).toBe('VALIDATION_ERROR');
      expect(error.fieldErrors).toEqual(fieldErrors);
      expect(error.name).toBe('ValidationError');
      expect(error.details).toEqual({ fieldErrors });
    });

    it('should create from Zod error with joined paths', () => {
      const schema = z.object({
        tools: z.array(z.object({ toothCount: z.number().int('Must be an integer') })),
      });
      const result = schema.safeParse({ tools: [{ toothCount: 2 }, { toothCount: 2.5 }] });

      expect(result.success).toBe(false);
      if (!result.success) {
        const error = ValidationError.fromZodError(result.error, 'Invalid catalog');
        expect(error.message).toBe('Invalid catalog');
        expect(error.fieldErrors).toEqual({ 'tools.1.toothCount': ['Must be an integer'] });
      }
    });

    it('should handle Zod errors without path', () => {
      const result = z.string().min(5, 'Too short').safeParse('ab');

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(ValidationError.fromZodError(result.error).fieldErrors).toEqual({
          _root: ['Too short'],
        });
      }
    });
  });
});
