/**
 * @fileoverview Shared Domain Types
 *
 * Structured error hierarchy used by every machining service.
 *
 * @module domain/shared/types
 */

import type { z } from 'zod';

// ============================================================================
// DOMAIN ERROR TYPES
// ============================================================================

/**
 * Domain error codes
 */
export type DomainErrorCode =
  | 'VALIDATION_ERROR'
  | 'DIMENSION_MISMATCH'
  | 'INVALID_QUANTITY'
  | 'UNKNOWN_UNIT'
  | 'INVALID_TOOL_GEOMETRY'
  | 'INVALID_MATERIAL_SPEC'
  | 'INVALID_MACHINE_SPEC'
  | 'INVALID_CUTTING_SETTINGS'
  | 'MISSING_SURFACE_SPEED_MULTIPLIER'
  | 'DUPLICATE_ENTRY'
  | 'NOT_FOUND';

/**
 * Domain error class with structured error information
 */
export class DomainError extends Error {
  constructor(
    public readonly code: DomainErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'DomainError';
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Convert to JSON for logging/serialization
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * Validation error with field-level details
 */
export class ValidationError extends DomainError {
  constructor(
    message: string,
    public readonly fieldErrors: Record<string, string[]>
  ) {
    super('VALIDATION_ERROR', message, { fieldErrors });
    this.name = 'ValidationError';
  }

  /**
   * Create from Zod error
   */
  static fromZodError(error: z.ZodError, message = 'Validation failed'): ValidationError {
    const fieldErrors: Record<string, string[]> = {};

    for (const issue of error.issues) {
      const key = issue.path.join('.') || '_root';
      const messages = fieldErrors[key] ?? [];
      messages.push(issue.message);
      fieldErrors[key] = messages;
    }

    return new ValidationError(message, fieldErrors);
  }
}

/**
 * A record appeared twice where keys must be unique
 */
export class DuplicateEntryError extends DomainError {
  constructor(
    public readonly entryType: string,
    public readonly key: string
  ) {
    super('DUPLICATE_ENTRY', `Duplicate ${entryType}: ${key}`, { entryType, key });
    this.name = 'DuplicateEntryError';
  }
}

/**
 * A lookup by key found nothing
 */
export class NotFoundError extends DomainError {
  constructor(
    public readonly entryType: string,
    public readonly key: string
  ) {
    super('NOT_FOUND', `${entryType} not found: ${key}`, { entryType, key });
    this.name = 'NotFoundError';
  }
}
