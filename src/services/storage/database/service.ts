/**
 * DatabaseService class for all database operations
 *
 * One handle per open store. Wraps the theme catalog and inspiration
 * operations, owns the transaction boundary, and announces committed
 * writes to live queries.
 */

import type Database from 'better-sqlite3';
import type {
  NewTheme,
  Theme,
  ThemeMetadataPatch,
  ThemeOrder,
} from '../../../models/theme.js';
import type { Inspiration, NewInspiration } from '../../../models/inspiration.js';
import type { StoreOpenOptions, TableName } from './types.js';
import {
  createDatabase,
  openDatabase,
  databaseExists,
  type OpenedDatabase,
} from './static-operations.js';
import * as themeOps from './theme-operations.js';
import * as inspOps from './inspiration-operations.js';
import { ChangeNotifier } from './change-notifier.js';
import { LiveQuery } from './live-query.js';
import { describeError } from './helpers.js';
import { DEFAULT_THEME_NAME } from '../../../utils/config.js';
import { systemClock, type Clock } from '../../../utils/clock.js';

/**
 * DatabaseService class for all database operations
 */
export class DatabaseService {
  private readonly db: Database.Database;
  private readonly name: string;
  private readonly path: string;
  private readonly defaultThemeName: string;
  private readonly clock: Clock;
  private readonly notifier = new ChangeNotifier();
  /** Tables written since the outermost transaction began */
  private readonly pendingChanges = new Set<TableName>();

  private constructor(opened: OpenedDatabase, options: StoreOpenOptions) {
    this.db = opened.db;
    this.name = opened.name;
    this.path = opened.path;
    this.defaultThemeName = options.defaultThemeName ?? DEFAULT_THEME_NAME;
    this.clock = options.clock ?? systemClock;
  }

  static create(name: string, options: StoreOpenOptions = {}): DatabaseService {
    return new DatabaseService(createDatabase(name, options), options);
  }

  static open(name: string, options: StoreOpenOptions = {}): DatabaseService {
    return new DatabaseService(openDatabase(name, options), options);
  }

  static exists(name: string, storagePath?: string): boolean {
    return databaseExists(name, storagePath);
  }

  /** Ends every live query, then closes the connection */
  close(): void {
    if (!this.db.open) return;
    this.notifier.close();
    try {
      this.db.pragma('optimize');
    } catch (error) {
      console.error('[DatabaseService] pragma optimize failed:', describeError(error));
    }
    this.db.close();
  }

  isOpen(): boolean {
    return this.db.open;
  }

  getName(): string {
    return this.name;
  }

  getPath(): string {
    return this.path;
  }

  getDefaultThemeName(): string {
    return this.defaultThemeName;
  }

  getClock(): Clock {
    return this.clock;
  }

  getConnection(): Database.Database {
    return this.db;
  }

  /**
   * Run `fn` atomically. Nested calls become savepoints of the outer
   * transaction. Writes are announced once, after the outermost commit;
   * a rollback discards them unannounced.
   */
  transaction<T>(fn: () => T): T {
    if (this.db.inTransaction) {
      return this.db.transaction(fn)();
    }

    let result: T;
    try {
      result = this.db.transaction(fn)();
    } catch (error) {
      this.pendingChanges.clear();
      throw error;
    }
    this.flushChanges();
    return result;
  }

  private markChanged(...tables: TableName[]): void {
    for (const table of tables) {
      this.pendingChanges.add(table);
    }
    if (!this.db.inTransaction) {
      this.flushChanges();
    }
  }

  private flushChanges(): void {
    if (this.pendingChanges.size === 0) return;
    const tables = [...this.pendingChanges];
    this.pendingChanges.clear();
    this.notifier.emitChange(tables);
  }

  private live<T>(tables: readonly TableName[], query: () => T): LiveQuery<T> {
    return new LiveQuery(this.notifier, tables, query);
  }

  // ==================== THEME OPERATIONS ====================

  createTheme(theme: NewTheme): Theme {
    const created = themeOps.createTheme(this.db, theme, this.clock.now());
    this.markChanged('themes');
    return created;
  }

  getTheme(name: string): Theme | null {
    return themeOps.getTheme(this.db, name);
  }

  listThemes(orderBy: ThemeOrder = 'name'): Theme[] {
    return themeOps.listThemes(this.db, orderBy);
  }

  countThemes(): number {
    return themeOps.countThemes(this.db);
  }

  themeExists(name: string): boolean {
    return themeOps.themeExists(this.db, name);
  }

  /** Primary-key change; referencing inspirations follow via ON UPDATE CASCADE. The default theme is protected. */
  renameTheme(oldName: string, newName: string): void {
    themeOps.renameTheme(this.db, oldName, newName, this.defaultThemeName);
    this.markChanged('themes', 'inspirations');
  }

  /** Low-level row delete; the default theme is protected */
  deleteTheme(name: string): void {
    themeOps.deleteTheme(this.db, name, this.defaultThemeName);
    this.markChanged('themes', 'inspirations');
  }

  updateThemeMetadata(name: string, patch: ThemeMetadataPatch): Theme {
    const updated = themeOps.updateThemeMetadata(this.db, name, patch);
    this.markChanged('themes');
    return updated;
  }

  setLastUsed(name: string, timestamp: number): boolean {
    const changed = themeOps.setLastUsed(this.db, name, timestamp);
    if (changed) this.markChanged('themes');
    return changed;
  }

  setInspirationCount(name: string, count: number): boolean {
    const changed = themeOps.setInspirationCount(this.db, name, count);
    if (changed) this.markChanged('themes');
    return changed;
  }

  /** lastUsed = now, inspirationCount = actual count */
  recordThemeUsage(name: string): number | null {
    const count = themeOps.recordThemeUsage(this.db, name, this.clock.now());
    if (count !== null) this.markChanged('themes');
    return count;
  }

  recountTheme(name: string): number | null {
    const count = themeOps.recountTheme(this.db, name);
    if (count !== null) this.markChanged('themes');
    return count;
  }

  recountAllThemes(): number {
    const changed = themeOps.recountAllThemes(this.db);
    if (changed > 0) this.markChanged('themes');
    return changed;
  }

  // ==================== INSPIRATION OPERATIONS ====================

  insertInspiration(inspiration: NewInspiration): number {
    const id = inspOps.insertInspiration(this.db, inspiration, this.clock.now());
    this.markChanged('inspirations');
    return id;
  }

  getInspiration(id: number): Inspiration | null {
    return inspOps.getInspiration(this.db, id);
  }

  getAllInspirations(): Inspiration[] {
    return inspOps.getAllInspirations(this.db);
  }

  getInspirationsByTheme(themeName: string): Inspiration[] {
    return inspOps.getInspirationsByTheme(this.db, themeName);
  }

  searchInspirations(keyword: string): Inspiration[] {
    return inspOps.searchInspirations(this.db, keyword);
  }

  countInspirations(): number {
    return inspOps.countInspirations(this.db);
  }

  countInspirationsByTheme(themeName: string): number {
    return inspOps.countInspirationsByTheme(this.db, themeName);
  }

  getDistinctThemeNames(): string[] {
    return inspOps.getDistinctThemeNames(this.db);
  }

  updateInspiration(inspiration: Inspiration): void {
    inspOps.updateInspiration(this.db, inspiration);
    this.markChanged('inspirations');
  }

  deleteInspiration(id: number): boolean {
    const deleted = inspOps.deleteInspiration(this.db, id);
    if (deleted) this.markChanged('inspirations');
    return deleted;
  }

  deleteInspirations(ids: readonly number[]): number {
    const deleted = this.transaction(() => inspOps.deleteInspirations(this.db, ids));
    if (deleted > 0) this.markChanged('inspirations');
    return deleted;
  }

  deleteInspirationsByTheme(themeName: string): number {
    const deleted = inspOps.deleteInspirationsByTheme(this.db, themeName);
    if (deleted > 0) this.markChanged('inspirations');
    return deleted;
  }

  updateThemeNameForAll(oldName: string, newName: string): number {
    const moved = inspOps.updateThemeNameForAll(this.db, oldName, newName);
    if (moved > 0) this.markChanged('inspirations');
    return moved;
  }

  reassignOrphans(target: string): number {
    const moved = inspOps.reassignOrphans(this.db, target);
    if (moved > 0) this.markChanged('inspirations');
    return moved;
  }

  // ==================== LIVE QUERIES ====================

  watchThemes(orderBy: ThemeOrder = 'name'): LiveQuery<Theme[]> {
    return this.live(['themes'], () => this.listThemes(orderBy));
  }

  watchTheme(name: string): LiveQuery<Theme | null> {
    return this.live(['themes'], () => this.getTheme(name));
  }

  watchThemeCount(): LiveQuery<number> {
    return this.live(['themes'], () => this.countThemes());
  }

  watchInspiration(id: number): LiveQuery<Inspiration | null> {
    return this.live(['inspirations'], () => this.getInspiration(id));
  }

  watchAllInspirations(): LiveQuery<Inspiration[]> {
    return this.live(['inspirations'], () => this.getAllInspirations());
  }

  watchInspirationsByTheme(themeName: string): LiveQuery<Inspiration[]> {
    return this.live(['inspirations'], () => this.getInspirationsByTheme(themeName));
  }

  watchSearch(keyword: string): LiveQuery<Inspiration[]> {
    return this.live(['inspirations'], () => this.searchInspirations(keyword));
  }

  watchInspirationCount(): LiveQuery<number> {
    return this.live(['inspirations'], () => this.countInspirations());
  }

  watchInspirationCountByTheme(themeName: string): LiveQuery<number> {
    return this.live(['inspirations'], () => this.countInspirationsByTheme(themeName));
  }
}
