/**
 * IntegrityCoordinator Tests
 *
 * Cross-entity writes: theme rename and delete with their inspirations,
 * cached aggregates, bulk saves, cancellation and rollback.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { IntegrityCoordinator } from '../../../src/services/integrity/coordinator.js';
import type { Theme } from '../../../src/models/theme.js';
import {
  ArmableClock,
  SteppingClock,
  createTestDir,
  cleanupTestDir,
  createFreshDatabase,
  createTestInspiration,
  safeCloseDatabase,
  requireService,
  expectOk,
  expectFailure,
  insertOrphan,
  DatabaseService,
  DatabaseErrorCode,
} from './helpers.js';

describe('IntegrityCoordinator', () => {
  let testDir: string;
  let dbService: DatabaseService | undefined;
  let coordinator: IntegrityCoordinator;

  beforeEach(() => {
    testDir = createTestDir('coordinator-');
    dbService = createFreshDatabase(testDir, 'coord', new SteppingClock());
    coordinator = new IntegrityCoordinator(dbService);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    safeCloseDatabase(dbService);
    dbService = undefined;
    cleanupTestDir(testDir);
  });

  function seedThemes(...names: string[]): void {
    for (const name of names) {
      expectOk(coordinator.createTheme({ name }));
    }
  }

  function save(themeName: string, content = 'A short test note'): number {
    return expectOk(coordinator.saveInspiration(createTestInspiration(themeName, { content }))).id;
  }

  describe('createTheme()', () => {
    it('returns the stored theme with defaults filled', () => {
      const theme = expectOk(coordinator.createTheme({ name: 'Ideas' }));

      expect(theme).toEqual({
        name: 'Ideas',
        icon: '💡',
        color: 0xff4a90e2,
        description: '',
        createdAt: 1001,
        lastUsed: 1001,
        inspirationCount: 0,
      });
      expect(requireService(dbService).getTheme('Ideas')).toEqual(theme);
    });

    it('reports a duplicate name', () => {
      seedThemes('Ideas');
      expect(expectFailure(coordinator.createTheme({ name: 'Ideas' })).code).toBe(
        DatabaseErrorCode.DUPLICATE_KEY
      );
    });

    it('carries the validation variant for a long name', () => {
      const error = expectFailure(coordinator.createTheme({ name: 'x'.repeat(51) }));
      expect(error.code).toBe(DatabaseErrorCode.INVALID_NAME);
      expect(error.validation).toEqual({ kind: 'TOO_LONG', maxLength: 50 });
    });
  });

  describe('saveInspiration()', () => {
    it('keeps the cached count equal to the number of saves', () => {
      seedThemes('Ideas');
      save('Ideas', 'one');
      save('Ideas', 'two');
      save('Ideas', 'three');

      const theme = requireService(dbService).getTheme('Ideas');
      expect(theme?.inspirationCount).toBe(3);
      // Clock reads: seed 1000, create 1001, then insert/usage pairs 1002-1007
      expect(theme?.lastUsed).toBe(1007);
    });

    it('returns the stored row', () => {
      seedThemes('Ideas');
      const saved = expectOk(
        coordinator.saveInspiration(createTestInspiration('Ideas', { content: 'first' }))
      );
      expect(saved).toEqual({
        id: 1,
        content: 'first',
        themeName: 'Ideas',
        createdAt: 1002,
        wordCount: 4,
      });
    });

    it('rejects a theme that does not exist', () => {
      const error = expectFailure(coordinator.saveInspiration(createTestInspiration('Nowhere')));
      expect(error.code).toBe(DatabaseErrorCode.NOT_FOUND);
      expect(requireService(dbService).countInspirations()).toBe(0);
    });

    it('rejects blank content', () => {
      const error = expectFailure(
        coordinator.saveInspiration(createTestInspiration('Uncategorized', { content: '   ' }))
      );
      expect(error.code).toBe(DatabaseErrorCode.INVALID_CONTENT);
      expect(error.validation).toEqual({ kind: 'EMPTY' });
    });
  });

  describe('saveInspirations()', () => {
    it('assigns ids in input order and refreshes each theme once', () => {
      seedThemes('Ideas', 'Work');
      const ids = expectOk(
        coordinator.saveInspirations([
          createTestInspiration('Ideas', { content: 'a' }),
          createTestInspiration('Work', { content: 'b' }),
          createTestInspiration('Ideas', { content: 'c' }),
        ])
      );

      const db = requireService(dbService);
      expect(ids).toEqual([1, 2, 3]);
      expect(db.getTheme('Ideas')?.inspirationCount).toBe(2);
      expect(db.getTheme('Work')?.inspirationCount).toBe(1);
    });

    it('stores nothing when one row fails', () => {
      seedThemes('Ideas');
      const error = expectFailure(
        coordinator.saveInspirations([
          createTestInspiration('Ideas', { content: 'a' }),
          createTestInspiration('Nowhere', { content: 'b' }),
        ])
      );

      expect(error.code).toBe(DatabaseErrorCode.NOT_FOUND);
      expect(requireService(dbService).countInspirations()).toBe(0);
      expect(requireService(dbService).getTheme('Ideas')?.inspirationCount).toBe(0);
    });
  });

  describe('renameTheme()', () => {
    it('moves exactly the inspirations of the old theme', () => {
      seedThemes('Ideas', 'Work');
      const first = save('Ideas', 'one');
      const second = save('Ideas', 'two');
      const other = save('Work', 'three');

      const renamed = expectOk(coordinator.renameTheme('Ideas', 'Projects'));

      const db = requireService(dbService);
      expect(renamed.name).toBe('Projects');
      expect(renamed.inspirationCount).toBe(2);
      expect(db.themeExists('Ideas')).toBe(false);
      expect(db.getInspirationsByTheme('Ideas')).toEqual([]);
      expect(
        db
          .getInspirationsByTheme('Projects')
          .map((i) => i.id)
          .sort()
      ).toEqual([first, second]);
      expect(db.getInspirationsByTheme('Work').map((i) => i.id)).toEqual([other]);
    });

    it('refuses an existing target and changes nothing', () => {
      seedThemes('Ideas', 'Work');
      save('Ideas', 'one');
      save('Work', 'two');

      const error = expectFailure(coordinator.renameTheme('Ideas', 'Work'));

      const db = requireService(dbService);
      expect(error.code).toBe(DatabaseErrorCode.DUPLICATE_KEY);
      expect(db.getInspirationsByTheme('Ideas').map((i) => i.content)).toEqual(['one']);
      expect(db.getInspirationsByTheme('Work').map((i) => i.content)).toEqual(['two']);
    });

    it('reports a missing theme', () => {
      expect(expectFailure(coordinator.renameTheme('Nowhere', 'Somewhere')).code).toBe(
        DatabaseErrorCode.NOT_FOUND
      );
    });

    it('refuses to rename the default theme', () => {
      seedThemes('Ideas');
      save('Ideas', 'one');
      save('Uncategorized', 'kept');

      const error = expectFailure(coordinator.renameTheme('Uncategorized', 'Misc'));

      const db = requireService(dbService);
      expect(error.code).toBe(DatabaseErrorCode.PROTECTED_THEME);
      expect(db.themeExists('Uncategorized')).toBe(true);
      expect(db.themeExists('Misc')).toBe(false);
      expect(db.getInspirationsByTheme('Uncategorized').map((i) => i.content)).toEqual(['kept']);
      // The fallback is still there for later deletes
      expect(expectOk(coordinator.deleteTheme('Ideas')).movedTo).toBe('Uncategorized');
    });

    it('rolls back the catalog rename when the cascade step fails', () => {
      seedThemes('Ideas');
      save('Ideas', 'one');
      const db = requireService(dbService);
      vi.spyOn(console, 'error').mockImplementation(() => undefined);
      vi.spyOn(db, 'updateThemeNameForAll').mockImplementation(() => {
        throw new Error('disk full');
      });

      const error = expectFailure(coordinator.renameTheme('Ideas', 'Projects'));

      expect(error).toEqual({ code: 'INTERNAL_ERROR', message: 'disk full' });
      expect(db.themeExists('Ideas')).toBe(true);
      expect(db.themeExists('Projects')).toBe(false);
      expect(db.getInspirationsByTheme('Ideas').map((i) => i.content)).toEqual(['one']);
    });

    it('reports a blank new name with its variant', () => {
      seedThemes('Ideas');
      const error = expectFailure(coordinator.renameTheme('Ideas', ' '));
      expect(error.code).toBe(DatabaseErrorCode.INVALID_NAME);
      expect(error.validation).toEqual({ kind: 'EMPTY' });
    });
  });

  describe('deleteTheme()', () => {
    it('moves the inspirations to the default theme and recounts it', () => {
      seedThemes('Ideas');
      const kept = save('Uncategorized', 'kept');
      const first = save('Ideas', 'one');
      const second = save('Ideas', 'two');

      const result = expectOk(coordinator.deleteTheme('Ideas'));

      const db = requireService(dbService);
      expect(result).toEqual({ deletedTheme: 'Ideas', movedTo: 'Uncategorized', reassigned: 2 });
      expect(db.themeExists('Ideas')).toBe(false);
      expect(db.getInspirationsByTheme('Ideas')).toEqual([]);
      expect(
        db
          .getInspirationsByTheme('Uncategorized')
          .map((i) => i.id)
          .sort()
      ).toEqual([kept, first, second]);
      expect(db.getTheme('Uncategorized')?.inspirationCount).toBe(3);
    });

    it('moves to a named target', () => {
      seedThemes('Ideas', 'Work');
      save('Ideas', 'one');

      const result = expectOk(coordinator.deleteTheme('Ideas', 'Work'));

      expect(result.movedTo).toBe('Work');
      expect(requireService(dbService).getTheme('Work')?.inspirationCount).toBe(1);
    });

    it('protects the default theme', () => {
      save('Uncategorized', 'kept');
      const error = expectFailure(coordinator.deleteTheme('Uncategorized', 'Ideas'));

      expect(error.code).toBe(DatabaseErrorCode.PROTECTED_THEME);
      expect(requireService(dbService).countInspirationsByTheme('Uncategorized')).toBe(1);
    });

    it('refuses a missing target and leaves the theme in place', () => {
      seedThemes('Ideas');
      save('Ideas', 'one');

      const error = expectFailure(coordinator.deleteTheme('Ideas', 'Nowhere'));

      expect(error.code).toBe(DatabaseErrorCode.NOT_FOUND);
      expect(requireService(dbService).countInspirationsByTheme('Ideas')).toBe(1);
    });

    it('refuses to move a theme into itself', () => {
      seedThemes('Ideas');
      const error = expectFailure(coordinator.deleteTheme('Ideas', 'Ideas'));

      expect(error.code).toBe(DatabaseErrorCode.INVALID_NAME);
      expect(error.validation).toEqual({
        kind: 'INVALID',
        reason: 'Cannot move inspirations into the theme being deleted',
      });
    });

    it('reports a missing theme', () => {
      expect(expectFailure(coordinator.deleteTheme('Nowhere')).code).toBe(
        DatabaseErrorCode.NOT_FOUND
      );
    });

    it('is observed as a single change', () => {
      seedThemes('Ideas');
      save('Ideas', 'one');
      save('Ideas', 'two');
      const seen: string[][] = [];
      const unsubscribe = requireService(dbService)
        .watchThemes()
        .subscribe((themes: Theme[]) => seen.push(themes.map((t) => t.name)));

      expectOk(coordinator.deleteTheme('Ideas'));
      unsubscribe();

      expect(seen).toEqual([['Ideas', 'Uncategorized'], ['Uncategorized']]);
    });
  });

  describe('deleteThemeWithInspirations()', () => {
    it('removes the theme and its inspirations', () => {
      seedThemes('Ideas');
      save('Ideas', 'one');
      save('Ideas', 'two');
      save('Uncategorized', 'kept');

      expect(expectOk(coordinator.deleteThemeWithInspirations('Ideas'))).toBe(2);

      const db = requireService(dbService);
      expect(db.themeExists('Ideas')).toBe(false);
      expect(db.getAllInspirations().map((i) => i.content)).toEqual(['kept']);
    });

    it('protects the default theme', () => {
      expect(expectFailure(coordinator.deleteThemeWithInspirations('Uncategorized')).code).toBe(
        DatabaseErrorCode.PROTECTED_THEME
      );
    });
  });

  describe('updateThemeMetadata()', () => {
    it('updates display fields only', () => {
      seedThemes('Ideas');
      const updated = expectOk(coordinator.updateThemeMetadata('Ideas', { icon: '🎯' }));
      expect(updated.icon).toBe('🎯');
      expect(updated.name).toBe('Ideas');
      expect(updated.createdAt).toBe(1001);
    });

    it('reports a missing theme', () => {
      expect(expectFailure(coordinator.updateThemeMetadata('Nowhere', { icon: '🎯' })).code).toBe(
        DatabaseErrorCode.NOT_FOUND
      );
    });
  });

  describe('updateInspiration()', () => {
    it('refreshes both themes when the theme changes', () => {
      seedThemes('Ideas', 'Work');
      const saved = expectOk(coordinator.saveInspiration(createTestInspiration('Ideas')));

      const moved = expectOk(coordinator.updateInspiration({ ...saved, themeName: 'Work' }));

      const db = requireService(dbService);
      expect(moved.themeName).toBe('Work');
      expect(db.getTheme('Ideas')?.inspirationCount).toBe(0);
      expect(db.getTheme('Work')?.inspirationCount).toBe(1);
    });

    it('returns the stored row', () => {
      const saved = expectOk(coordinator.saveInspiration(createTestInspiration('Uncategorized')));

      const updated = expectOk(
        coordinator.updateInspiration({ ...saved, content: 'rewritten', wordCount: 1 })
      );

      expect(updated).toEqual({ ...saved, content: 'rewritten', wordCount: 1 });
      expect(updated).toEqual(requireService(dbService).getInspiration(saved.id));
    });

    it('refuses a missing target theme and keeps the row', () => {
      seedThemes('Ideas');
      const saved = expectOk(coordinator.saveInspiration(createTestInspiration('Ideas')));

      const error = expectFailure(coordinator.updateInspiration({ ...saved, themeName: 'Nowhere' }));

      expect(error.code).toBe(DatabaseErrorCode.NOT_FOUND);
      expect(requireService(dbService).getInspiration(saved.id)?.themeName).toBe('Ideas');
    });

    it('reports a missing id', () => {
      const error = expectFailure(
        coordinator.updateInspiration({
          id: 99,
          content: 'x',
          themeName: 'Uncategorized',
          createdAt: 1,
          wordCount: 1,
        })
      );
      expect(error.code).toBe(DatabaseErrorCode.NOT_FOUND);
    });

    it('rejects blank content', () => {
      const saved = expectOk(coordinator.saveInspiration(createTestInspiration('Uncategorized')));
      const error = expectFailure(coordinator.updateInspiration({ ...saved, content: '' }));
      expect(error.code).toBe(DatabaseErrorCode.INVALID_CONTENT);
    });
  });

  describe('deleteInspiration() / deleteInspirations()', () => {
    it('returns the deleted row and refreshes its theme', () => {
      seedThemes('Ideas');
      const id = save('Ideas', 'one');
      save('Ideas', 'two');

      const deleted = expectOk(coordinator.deleteInspiration(id));

      expect(deleted.content).toBe('one');
      expect(requireService(dbService).getTheme('Ideas')?.inspirationCount).toBe(1);
    });

    it('reports a missing id', () => {
      expect(expectFailure(coordinator.deleteInspiration(42)).code).toBe(
        DatabaseErrorCode.NOT_FOUND
      );
    });

    it('deletes several and ignores unknown ids', () => {
      seedThemes('Ideas', 'Work');
      const a = save('Ideas', 'a');
      const b = save('Work', 'b');
      save('Work', 'c');

      expect(expectOk(coordinator.deleteInspirations([a, b, 999]))).toBe(2);

      const db = requireService(dbService);
      expect(db.getTheme('Ideas')?.inspirationCount).toBe(0);
      expect(db.getTheme('Work')?.inspirationCount).toBe(1);
    });
  });

  describe('aggregates', () => {
    it('refreshThemeCounts fixes stale counts', () => {
      seedThemes('Ideas');
      save('Ideas');
      const db = requireService(dbService);
      db.setInspirationCount('Ideas', 7);

      expect(expectOk(coordinator.refreshThemeCounts())).toBe(1);
      expect(db.getTheme('Ideas')?.inspirationCount).toBe(1);
      expect(expectOk(coordinator.refreshThemeCounts())).toBe(0);
    });

    it('repairOrphans moves orphans to the default theme', () => {
      const db = requireService(dbService);
      const orphan = insertOrphan(db, 'lost note', 'Ghost');

      expect(expectOk(coordinator.repairOrphans())).toBe(1);
      expect(db.getInspiration(orphan)?.themeName).toBe('Uncategorized');
      expect(db.getTheme('Uncategorized')?.inspirationCount).toBe(1);
    });

    it('repairOrphans requires the target theme', () => {
      expect(expectFailure(coordinator.repairOrphans('Nowhere')).code).toBe(
        DatabaseErrorCode.NOT_FOUND
      );
    });

    it('recordUsage logs a missing theme instead of throwing', () => {
      const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);

      coordinator.recordUsage('Nowhere');

      expect(errorSpy).toHaveBeenCalledWith(
        '[integrity-coordinator] AggregateRefreshFailure: theme "Nowhere" not found'
      );
    });

    it('recordUsage swallows a failing store', () => {
      const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
      requireService(dbService).close();

      expect(() => {
        coordinator.recordUsage('Uncategorized');
      }).not.toThrow();
      expect(errorSpy).toHaveBeenCalled();
    });
  });
});

describe('IntegrityCoordinator - cancellation', () => {
  let testDir: string;
  let dbService: DatabaseService | undefined;
  let clock: ArmableClock;
  let coordinator: IntegrityCoordinator;

  beforeEach(() => {
    testDir = createTestDir('coordinator-cancel-');
    clock = new ArmableClock();
    dbService = createFreshDatabase(testDir, 'cancel', clock);
    coordinator = new IntegrityCoordinator(dbService);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    safeCloseDatabase(dbService);
    dbService = undefined;
    cleanupTestDir(testDir);
  });

  it('does nothing when the signal has already fired', () => {
    const controller = new AbortController();
    controller.abort();

    const error = expectFailure(
      coordinator.saveInspiration(createTestInspiration('Uncategorized'), {
        signal: controller.signal,
      })
    );

    expect(error.code).toBe(DatabaseErrorCode.OPERATION_CANCELLED);
    expect(requireService(dbService).countInspirations()).toBe(0);
  });

  it('rolls back rows written before the abort', () => {
    const controller = new AbortController();
    clock.arm(controller);

    const error = expectFailure(
      coordinator.saveInspirations(
        [
          createTestInspiration('Uncategorized', { content: 'a' }),
          createTestInspiration('Uncategorized', { content: 'b' }),
        ],
        { signal: controller.signal }
      )
    );

    expect(error.code).toBe(DatabaseErrorCode.OPERATION_CANCELLED);
    expect(requireService(dbService).countInspirations()).toBe(0);
  });

  it('rolls back a rename cancelled after the catalog row changed', () => {
    expectOk(coordinator.createTheme({ name: 'Ideas' }));
    const saved = expectOk(coordinator.saveInspiration(createTestInspiration('Ideas')));
    const db = requireService(dbService);
    const controller = new AbortController();
    const renameRow = db.renameTheme.bind(db);
    vi.spyOn(db, 'renameTheme').mockImplementation((oldName: string, newName: string) => {
      renameRow(oldName, newName);
      controller.abort();
    });

    const error = expectFailure(
      coordinator.renameTheme('Ideas', 'Projects', { signal: controller.signal })
    );

    expect(error.code).toBe(DatabaseErrorCode.OPERATION_CANCELLED);
    expect(db.themeExists('Ideas')).toBe(true);
    expect(db.themeExists('Projects')).toBe(false);
    expect(db.getInspiration(saved.id)?.themeName).toBe('Ideas');
  });

  it('leaves a cancelled theme delete untouched', () => {
    expectOk(coordinator.createTheme({ name: 'Ideas' }));
    expectOk(coordinator.saveInspiration(createTestInspiration('Ideas')));
    const controller = new AbortController();
    controller.abort();

    const error = expectFailure(
      coordinator.deleteTheme('Ideas', undefined, { signal: controller.signal })
    );

    const db = requireService(dbService);
    expect(error.code).toBe(DatabaseErrorCode.OPERATION_CANCELLED);
    expect(db.themeExists('Ideas')).toBe(true);
    expect(db.countInspirationsByTheme('Ideas')).toBe(1);
  });
});
