/**
 * Theme interfaces for the inspiration store
 *
 * A theme is a user-defined category. Its name is the primary key of the
 * themes table and the target of every inspiration's foreign key.
 */

/** Maximum theme name length (characters) */
export const MAX_THEME_NAME_LENGTH = 50;

/**
 * Content/name value reserved by the legacy schema for theme-tracking
 * placeholder rows. Never valid as a theme name, never survives migration.
 */
export const THEME_MARKER = '__THEME_MARKER__';

export const DEFAULT_THEME_ICON = '💡';

/** ARGB 0xFF4A90E2 */
export const DEFAULT_THEME_COLOR = 0xff4a90e2;

export const DEFAULT_THEME_DESCRIPTION = '';

/**
 * Represents a user-defined theme
 */
export interface Theme {
  /** Unique name, 1-50 characters */
  name: string;

  icon: string;

  /** ARGB color as an unsigned 32-bit integer */
  color: number;

  description: string;

  /** Milliseconds since epoch */
  createdAt: number;

  /** Milliseconds since epoch of the last insert/delete touching this theme */
  lastUsed: number;

  /** Cached number of inspirations referencing this theme */
  inspirationCount: number;
}

/**
 * Theme as accepted by create: only the name is required
 */
export type NewTheme = Pick<Theme, 'name'> & Partial<Omit<Theme, 'name'>>;

/** Display metadata that can change without touching the primary key */
export type ThemeMetadataPatch = Partial<Pick<Theme, 'icon' | 'color' | 'description'>>;

/**
 * Sort orders supported by theme listings
 * - name: ascending
 * - lastUsed: most recent first
 * - inspirationCount: largest first
 */
export type ThemeOrder = 'name' | 'lastUsed' | 'inspirationCount';

export const THEME_ORDERS: readonly ThemeOrder[] = ['name', 'lastUsed', 'inspirationCount'] as const;

/**
 * Outcome of a name or content check. Callers render a precise message
 * from the variant instead of parsing an error string.
 */
export type ValidationResult =
  | { kind: 'VALID' }
  | { kind: 'EMPTY' }
  | { kind: 'TOO_LONG'; maxLength: number }
  | { kind: 'INVALID'; reason: string };

export function validateThemeName(name: string): ValidationResult {
  if (name.trim().length === 0) {
    return { kind: 'EMPTY' };
  }
  if (name.length > MAX_THEME_NAME_LENGTH) {
    return { kind: 'TOO_LONG', maxLength: MAX_THEME_NAME_LENGTH };
  }
  if (name.includes(THEME_MARKER)) {
    return { kind: 'INVALID', reason: `Theme name must not contain "${THEME_MARKER}"` };
  }
  return { kind: 'VALID' };
}

/**
 * Fill defaults for a theme about to be created
 */
export function buildTheme(input: NewTheme, now: number): Theme {
  return {
    name: input.name,
    icon: input.icon ?? DEFAULT_THEME_ICON,
    color: input.color ?? DEFAULT_THEME_COLOR,
    description: input.description ?? DEFAULT_THEME_DESCRIPTION,
    createdAt: input.createdAt ?? now,
    lastUsed: input.lastUsed ?? now,
    inspirationCount: input.inspirationCount ?? 0,
  };
}
