/**
 * Inspiration Store
 *
 * Embedded store for short notes grouped by user-defined themes. Opening a
 * store migrates legacy databases, guarantees the default theme exists and
 * returns one handle shared by the coordinator and the validator.
 *
 * Logging goes to stderr via console.error.
 *
 * @module index
 */

import { DatabaseService } from './services/storage/database/service.js';
import { IntegrityCoordinator } from './services/integrity/coordinator.js';
import { DataValidator } from './services/integrity/data-validator.js';
import { loadConfig, type StoreConfig } from './utils/config.js';
import { systemClock, type Clock } from './utils/clock.js';

export interface Store {
  db: DatabaseService;
  coordinator: IntegrityCoordinator;
  validator: DataValidator;
  /** Closes the connection and ends every live query */
  close(): void;
}

/**
 * Open (or create) the configured store. Missing config fields come from
 * the environment via loadConfig().
 *
 * @throws MigrationError when a legacy database cannot be upgraded
 * @throws DatabaseError for invalid names or an unusable file
 */
export function openStore(config: Partial<StoreConfig> = {}, clock: Clock = systemClock): Store {
  const resolved: StoreConfig = { ...loadConfig(), ...config };
  const options = {
    storagePath: resolved.storagePath,
    defaultThemeName: resolved.defaultThemeName,
    backupBeforeMigration: resolved.backupBeforeMigration,
    clock,
  };

  const db = DatabaseService.exists(resolved.databaseName, resolved.storagePath)
    ? DatabaseService.open(resolved.databaseName, options)
    : DatabaseService.create(resolved.databaseName, options);

  return {
    db,
    coordinator: new IntegrityCoordinator(db),
    validator: new DataValidator(db),
    close: () => {
      db.close();
    },
  };
}

export * from './models/index.js';
export * from './services/storage/index.js';
export * from './services/integrity/index.js';
export { loadConfig, loadEnvFile, type StoreConfig } from './utils/config.js';
export { systemClock, type Clock } from './utils/clock.js';
export { ValidationError } from './utils/validation.js';
