/**
 * Store Configuration
 *
 * Reads settings from the environment (optionally populated from a .env file)
 * and validates them with zod. Nothing here touches the database.
 *
 * Environment variables:
 * - INSPIRATION_STORE_ENV_FILE: explicit .env path
 * - INSPIRATION_STORE_PATH: directory holding .db files
 * - INSPIRATION_STORE_DATABASE: database name (file name without .db)
 * - INSPIRATION_STORE_DEFAULT_THEME: fallback theme for reassignment
 * - INSPIRATION_STORE_BACKUP_BEFORE_MIGRATION: 'true' | 'false'
 *
 * @module utils/config
 */

import dotenv from 'dotenv';
import fs from 'fs';
import path from 'path';
import { homedir } from 'os';
import { z } from 'zod';
import { validateInput } from './validation.js';
import { MAX_THEME_NAME_LENGTH, THEME_MARKER } from '../models/theme.js';

export const DEFAULT_DATABASE_NAME = 'inspirations';

export const DEFAULT_THEME_NAME = 'Uncategorized';

export const DEFAULT_STORAGE_PATH = path.join(homedir(), '.inspiration-store', 'databases');

export interface StoreConfig {
  storagePath: string;
  databaseName: string;
  /** Theme that always exists and receives the notes of deleted themes */
  defaultThemeName: string;
  /** Copy the .db file before upgrading an older schema */
  backupBeforeMigration: boolean;
}

const BooleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const EnvSchema = z.object({
  INSPIRATION_STORE_PATH: z.string().min(1).optional(),
  INSPIRATION_STORE_DATABASE: z
    .string()
    .regex(/^[a-zA-Z0-9_-]+$/, 'Database name may only contain letters, digits, _ and -')
    .optional(),
  INSPIRATION_STORE_DEFAULT_THEME: z
    .string()
    .trim()
    .min(1, 'Default theme name cannot be blank')
    .max(MAX_THEME_NAME_LENGTH)
    .refine((name) => !name.includes(THEME_MARKER), 'Default theme name is reserved')
    .optional(),
  INSPIRATION_STORE_BACKUP_BEFORE_MIGRATION: BooleanFlag.optional(),
});

/**
 * Load a .env file into process.env. First existing candidate wins:
 * 1. INSPIRATION_STORE_ENV_FILE
 * 2. CWD/.env
 *
 * @returns The path that was loaded, or null when none exists
 */
export function loadEnvFile(): string | null {
  const candidates = [
    process.env.INSPIRATION_STORE_ENV_FILE,
    path.resolve(process.cwd(), '.env'),
  ].filter((p): p is string => typeof p === 'string' && p.length > 0);

  for (const envPath of candidates) {
    if (fs.existsSync(envPath)) {
      dotenv.config({ path: envPath });
      return envPath;
    }
  }
  return null;
}

/**
 * Build the store configuration from environment variables.
 * Empty strings count as unset.
 *
 * @throws ValidationError when a variable is present but malformed
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): StoreConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
  );
  const parsed = validateInput(EnvSchema, present);

  return {
    storagePath: parsed.INSPIRATION_STORE_PATH ?? DEFAULT_STORAGE_PATH,
    databaseName: parsed.INSPIRATION_STORE_DATABASE ?? DEFAULT_DATABASE_NAME,
    defaultThemeName: parsed.INSPIRATION_STORE_DEFAULT_THEME ?? DEFAULT_THEME_NAME,
    backupBeforeMigration: parsed.INSPIRATION_STORE_BACKUP_BEFORE_MIGRATION ?? true,
  };
}
