/**
 * Inspiration interfaces for the inspiration store
 *
 * An inspiration is a single short note. It always belongs to exactly one theme.
 */

import type { ValidationResult } from './theme.js';

/** Maximum content length (characters) */
export const MAX_CONTENT_LENGTH = 500;

/**
 * Represents one stored note
 */
export interface Inspiration {
  /** Store-assigned, monotonically increasing */
  id: number;

  content: string;

  /** Foreign key into themes.name */
  themeName: string;

  /** Milliseconds since epoch */
  createdAt: number;

  /** Supplied by the caller, never recomputed by the store */
  wordCount: number;
}

/**
 * Inspiration as accepted by insert. The id is assigned by the store and
 * createdAt defaults to the clock's current time.
 */
export type NewInspiration = Omit<Inspiration, 'id' | 'createdAt'> & { createdAt?: number };

export function validateContent(content: string): ValidationResult {
  if (content.trim().length === 0) {
    return { kind: 'EMPTY' };
  }
  if (content.length > MAX_CONTENT_LENGTH) {
    return { kind: 'TOO_LONG', maxLength: MAX_CONTENT_LENGTH };
  }
  return { kind: 'VALID' };
}
