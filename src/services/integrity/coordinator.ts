/**
 * Integrity Coordinator
 *
 * Every write that spans themes and inspirations goes through here. Each
 * operation runs as one transaction on the store handle, so observers see
 * the state before or after it and never a mix. Cached theme aggregates
 * are refreshed after commit, best-effort.
 *
 * @module integrity/coordinator
 */

import type { DatabaseService } from '../storage/database/service.js';
import { DatabaseError, DatabaseErrorCode } from '../storage/database/types.js';
import { assertValidThemeName } from '../storage/database/theme-operations.js';
import { assertValidContent } from '../storage/database/inspiration-operations.js';
import { describeError } from '../storage/database/helpers.js';
import type { NewTheme, Theme, ThemeMetadataPatch } from '../../models/theme.js';
import type { Inspiration, NewInspiration } from '../../models/inspiration.js';
import {
  cancelled,
  fail,
  ok,
  toOperationError,
  type OperationResult,
} from './result.js';

export interface OperationOptions {
  /** Abort before commit rolls the whole operation back (OPERATION_CANCELLED) */
  signal?: AbortSignal;
}

export interface DeleteThemeResult {
  deletedTheme: string;
  movedTo: string;
  /** Inspirations rewritten to the target theme */
  reassigned: number;
}

/** Throws OPERATION_CANCELLED when the signal has fired */
type Checkpoint = () => void;

function themeNotFound(name: string): DatabaseError {
  return new DatabaseError(`Theme "${name}" not found`, DatabaseErrorCode.NOT_FOUND);
}

export class IntegrityCoordinator {
  constructor(private readonly store: DatabaseService) {}

  /**
   * Run `body` inside one transaction. The signal is checked before the
   * transaction opens, between sub-steps (via the checkpoint) and once
   * more right before commit.
   */
  private run<T>(
    operation: string,
    options: OperationOptions,
    body: (checkpoint: Checkpoint) => T
  ): OperationResult<T> {
    const checkpoint: Checkpoint = () => {
      if (options.signal?.aborted) throw cancelled(operation);
    };

    try {
      checkpoint();
      const value = this.store.transaction(() => {
        const result = body(checkpoint);
        checkpoint();
        return result;
      });
      return ok(value);
    } catch (error) {
      const opError = toOperationError(error);
      if (opError.code === 'INTERNAL_ERROR') {
        console.error(`[integrity-coordinator] ${operation} failed: ${opError.message}`);
      }
      return { ok: false, error: opError };
    }
  }

  private requireTheme(name: string): void {
    if (!this.store.themeExists(name)) throw themeNotFound(name);
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // THEMES
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * On a bad name the error carries the ValidationResult variant
   * (EMPTY, TOO_LONG or INVALID).
   */
  createTheme(theme: NewTheme, options: OperationOptions = {}): OperationResult<Theme> {
    return this.run('createTheme', options, () => this.store.createTheme(theme));
  }

  /**
   * Catalog rename plus the inspiration cascade, committed together.
   * The default theme keeps its name.
   */
  renameTheme(
    oldName: string,
    newName: string,
    options: OperationOptions = {}
  ): OperationResult<Theme> {
    return this.run('renameTheme', options, (checkpoint) => {
      assertValidThemeName(newName);
      this.requireTheme(oldName);
      if (oldName !== newName && oldName === this.store.getDefaultThemeName()) {
        throw new DatabaseError(
          `Theme "${oldName}" is the default theme and cannot be renamed`,
          DatabaseErrorCode.PROTECTED_THEME
        );
      }
      if (oldName !== newName && this.store.themeExists(newName)) {
        throw new DatabaseError(
          `Cannot rename "${oldName}": theme "${newName}" already exists`,
          DatabaseErrorCode.DUPLICATE_KEY
        );
      }

      checkpoint();
      this.store.renameTheme(oldName, newName);
      checkpoint();
      // The foreign key cascade has already moved the rows; this sweeps any stragglers
      this.store.updateThemeNameForAll(oldName, newName);

      const renamed = this.store.getTheme(newName);
      if (!renamed) throw themeNotFound(newName);
      return renamed;
    });
  }

  /**
   * Move every inspiration of `name` to `moveToTheme`, then drop the theme.
   * The target must already exist and is recounted before commit.
   */
  deleteTheme(
    name: string,
    moveToTheme: string = this.store.getDefaultThemeName(),
    options: OperationOptions = {}
  ): OperationResult<DeleteThemeResult> {
    if (name === this.store.getDefaultThemeName()) {
      return fail(
        DatabaseErrorCode.PROTECTED_THEME,
        `Theme "${name}" is the default theme and cannot be deleted`
      );
    }
    if (name === moveToTheme) {
      const reason = 'Cannot move inspirations into the theme being deleted';
      return fail(DatabaseErrorCode.INVALID_NAME, reason, { kind: 'INVALID', reason });
    }

    return this.run('deleteTheme', options, (checkpoint) => {
      this.requireTheme(name);
      this.requireTheme(moveToTheme);

      const children = this.store.getInspirationsByTheme(name);
      for (const child of children) {
        checkpoint();
        this.store.updateInspiration({ ...child, themeName: moveToTheme });
      }

      checkpoint();
      this.store.deleteTheme(name);
      this.store.recountTheme(moveToTheme);

      return { deletedTheme: name, movedTo: moveToTheme, reassigned: children.length };
    });
  }

  /**
   * Discard a theme together with its inspirations.
   *
   * @returns Number of inspirations deleted
   */
  deleteThemeWithInspirations(name: string, options: OperationOptions = {}): OperationResult<number> {
    if (name === this.store.getDefaultThemeName()) {
      return fail(
        DatabaseErrorCode.PROTECTED_THEME,
        `Theme "${name}" is the default theme and cannot be deleted`
      );
    }

    return this.run('deleteThemeWithInspirations', options, (checkpoint) => {
      this.requireTheme(name);
      const deleted = this.store.deleteInspirationsByTheme(name);
      checkpoint();
      this.store.deleteTheme(name);
      return deleted;
    });
  }

  updateThemeMetadata(
    name: string,
    patch: ThemeMetadataPatch,
    options: OperationOptions = {}
  ): OperationResult<Theme> {
    return this.run('updateThemeMetadata', options, () =>
      this.store.updateThemeMetadata(name, patch)
    );
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // AGGREGATES
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * lastUsed = now and inspirationCount = actual count. Runs outside any
   * coordinator transaction; a failure is logged and never reaches the caller.
   */
  recordUsage(themeName: string): void {
    try {
      const count = this.store.recordThemeUsage(themeName);
      if (count === null) {
        console.error(
          `[integrity-coordinator] AggregateRefreshFailure: theme "${themeName}" not found`
        );
      }
    } catch (error) {
      console.error(
        `[integrity-coordinator] AggregateRefreshFailure for "${themeName}": ${describeError(error)}`
      );
    }
  }

  /**
   * Recount every theme in one transaction
   *
   * @returns Number of themes whose cached count was stale
   */
  refreshThemeCounts(options: OperationOptions = {}): OperationResult<number> {
    return this.run('refreshThemeCounts', options, () => this.store.recountAllThemes());
  }

  /**
   * Point orphaned inspirations at an existing theme and recount it
   *
   * @returns Number of inspirations reassigned
   */
  repairOrphans(
    target: string = this.store.getDefaultThemeName(),
    options: OperationOptions = {}
  ): OperationResult<number> {
    return this.run('repairOrphans', options, (checkpoint) => {
      this.requireTheme(target);
      const moved = this.store.reassignOrphans(target);
      checkpoint();
      this.store.recountTheme(target);
      return moved;
    });
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // INSPIRATIONS
  // ═══════════════════════════════════════════════════════════════════════════

  saveInspiration(
    input: NewInspiration,
    options: OperationOptions = {}
  ): OperationResult<Inspiration> {
    const result = this.run('saveInspiration', options, () => {
      assertValidContent(input.content);
      this.requireTheme(input.themeName);
      const id = this.store.insertInspiration(input);
      const saved = this.store.getInspiration(id);
      if (!saved) {
        throw new DatabaseError(`Inspiration ${String(id)} vanished after insert`, DatabaseErrorCode.NOT_FOUND);
      }
      return saved;
    });
    if (result.ok) this.recordUsage(result.value.themeName);
    return result;
  }

  /**
   * Bulk import. All rows commit together or none do; aggregates are
   * refreshed once per distinct theme afterwards.
   *
   * @returns Assigned ids, in input order
   */
  saveInspirations(
    inputs: readonly NewInspiration[],
    options: OperationOptions = {}
  ): OperationResult<number[]> {
    const result = this.run('saveInspirations', options, (checkpoint) => {
      const known = new Set<string>();
      const ids: number[] = [];
      for (const input of inputs) {
        checkpoint();
        assertValidContent(input.content);
        if (!known.has(input.themeName)) {
          this.requireTheme(input.themeName);
          known.add(input.themeName);
        }
        ids.push(this.store.insertInspiration(input));
      }
      return ids;
    });
    if (result.ok) {
      for (const themeName of new Set(inputs.map((input) => input.themeName))) {
        this.recordUsage(themeName);
      }
    }
    return result;
  }

  /**
   * Full replace by id. When the theme changes, both the old and the new
   * theme are refreshed.
   */
  updateInspiration(
    inspiration: Inspiration,
    options: OperationOptions = {}
  ): OperationResult<Inspiration> {
    const result = this.run('updateInspiration', options, () => {
      const existing = this.store.getInspiration(inspiration.id);
      if (!existing) {
        throw new DatabaseError(
          `Inspiration ${String(inspiration.id)} not found`,
          DatabaseErrorCode.NOT_FOUND
        );
      }
      assertValidContent(inspiration.content);
      if (existing.themeName !== inspiration.themeName) {
        this.requireTheme(inspiration.themeName);
      }
      this.store.updateInspiration(inspiration);
      const stored = this.store.getInspiration(inspiration.id);
      if (!stored) {
        throw new DatabaseError(
          `Inspiration ${String(inspiration.id)} vanished after update`,
          DatabaseErrorCode.NOT_FOUND
        );
      }
      return { previousTheme: existing.themeName, stored };
    });
    if (!result.ok) return result;

    const { previousTheme, stored } = result.value;
    this.recordUsage(previousTheme);
    if (previousTheme !== stored.themeName) {
      this.recordUsage(stored.themeName);
    }
    return ok(stored);
  }

  /**
   * @returns The deleted inspiration
   */
  deleteInspiration(id: number, options: OperationOptions = {}): OperationResult<Inspiration> {
    const result = this.run('deleteInspiration', options, () => {
      const existing = this.store.getInspiration(id);
      if (!existing) {
        throw new DatabaseError(`Inspiration ${String(id)} not found`, DatabaseErrorCode.NOT_FOUND);
      }
      this.store.deleteInspiration(id);
      return existing;
    });
    if (result.ok) this.recordUsage(result.value.themeName);
    return result;
  }

  /**
   * Delete several inspirations at once. Unknown ids are ignored.
   *
   * @returns Number of inspirations deleted
   */
  deleteInspirations(ids: readonly number[], options: OperationOptions = {}): OperationResult<number> {
    const touched = new Set<string>();
    const result = this.run('deleteInspirations', options, () => {
      for (const id of ids) {
        const existing = this.store.getInspiration(id);
        if (existing) touched.add(existing.themeName);
      }
      return this.store.deleteInspirations(ids);
    });
    if (result.ok) {
      for (const themeName of touched) {
        this.recordUsage(themeName);
      }
    }
    return result;
  }
}
