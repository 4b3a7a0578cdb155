/**
 * Inspiration Store - Zod Validation Schemas
 *
 * Shape validation for values entering the store from callers and from the
 * environment. Business rules with their own result variants (theme name,
 * content length) live in the models and are applied by the operations.
 *
 * @module utils/validation
 */

import { z } from 'zod';

// ═══════════════════════════════════════════════════════════════════════════════
// CUSTOM ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Custom validation error with descriptive message
 */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// HELPER FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Validate input against schema and throw descriptive error if invalid
 *
 * @returns Validated and typed input data
 * @throws ValidationError listing every failing path
 */
export function validateInput<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const errors = result.error.errors.map((e) => {
      const path = e.path.length > 0 ? `${e.path.join('.')}: ` : '';
      return `${path}${e.message}`;
    });
    throw new ValidationError(errors.join('; '));
  }
  return result.data;
}

// ═══════════════════════════════════════════════════════════════════════════════
// SHARED BASE SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

/** Milliseconds since epoch */
export const Timestamp = z.number().int('Timestamp must be an integer').nonnegative();

/** ARGB color packed into an unsigned 32-bit integer */
export const ArgbColor = z
  .number()
  .int('Color must be an integer')
  .min(0)
  .max(0xffffffff, 'Color must fit in 32 bits');

export const InspirationId = z.number().int('Id must be an integer').positive('Id must be positive');

// ═══════════════════════════════════════════════════════════════════════════════
// ENTITY INPUT SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Theme create input. Name rules (blank, length, marker) are checked
 * separately so the caller receives a ValidationResult variant.
 */
export const NewThemeSchema = z.object({
  name: z.string(),
  icon: z.string().optional(),
  color: ArgbColor.optional(),
  description: z.string().optional(),
  createdAt: Timestamp.optional(),
  lastUsed: Timestamp.optional(),
  inspirationCount: z.number().int().nonnegative('Inspiration count cannot be negative').optional(),
});

export const ThemeMetadataPatchSchema = z
  .object({
    icon: z.string().optional(),
    color: ArgbColor.optional(),
    description: z.string().optional(),
  })
  .strict();

export const NewInspirationSchema = z.object({
  content: z.string(),
  themeName: z.string(),
  createdAt: Timestamp.optional(),
  wordCount: z.number().int('Word count must be an integer').nonnegative('Word count cannot be negative'),
});

export const InspirationSchema = NewInspirationSchema.extend({
  id: InspirationId,
  createdAt: Timestamp,
});
