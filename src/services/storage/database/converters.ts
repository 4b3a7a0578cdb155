/**
 * Row conversion functions for DatabaseService
 *
 * Converts database row objects to domain model interfaces.
 */

import type { Theme } from '../../../models/theme.js';
import type { Inspiration } from '../../../models/inspiration.js';
import type { ThemeRow, InspirationRow } from './types.js';

export function rowToTheme(row: ThemeRow): Theme {
  return {
    name: row.name,
    icon: row.icon,
    color: row.color,
    description: row.description,
    createdAt: row.createdAt,
    lastUsed: row.lastUsed,
    inspirationCount: row.inspirationCount,
  };
}

export function rowToInspiration(row: InspirationRow): Inspiration {
  return {
    id: row.id,
    content: row.content,
    themeName: row.theme_name,
    createdAt: row.created_at,
    wordCount: row.word_count,
  };
}
