/**
 * Core error kinds.
 *
 * MalformedInputError marks a single unusable record; the normalizer catches it,
 * records it and moves on. InvariantViolationError is fatal to the run that hit it.
 * Missing statistics are not errors at all: they are reported as null.
 */

import { ZodError } from 'zod';
import type { MalformedRecordKind } from './types/events.js';

export class MalformedInputError extends Error {
  constructor(
    message: string,
    public recordKind: MalformedRecordKind,
    public recordId: string
  ) {
    super(message);
    this.name = 'MalformedInputError';
  }
}

export class InvariantViolationError extends Error {
  constructor(
    message: string,
    public key: string
  ) {
    super(message);
    this.name = 'InvariantViolationError';
  }
}

/**
 * One-line message for surfaces. Validation errors list each failing field.
 */
export function describeError(error: unknown): string {
  if (error instanceof ZodError) {
    return error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
  }
  return error instanceof Error ? error.message : 'Unknown error';
}
