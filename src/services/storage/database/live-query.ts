/**
 * Live Queries
 *
 * A read that re-runs after every committed write to the tables it depends
 * on. Consumers either subscribe with a callback or iterate snapshots.
 * Several commits that land before an iterator resumes collapse into one
 * snapshot; the latest state is always delivered.
 *
 * @module database/live-query
 */

import type { ChangeEvent, ChangeNotifier } from './change-notifier.js';
import type { TableName } from './types.js';
import { describeError } from './helpers.js';

export type SnapshotListener<T> = (snapshot: T) => void;

export class LiveQuery<T> {
  constructor(
    private readonly notifier: ChangeNotifier,
    private readonly tables: readonly TableName[],
    private readonly query: () => T
  ) {}

  /** Run the read now */
  current(): T {
    return this.query();
  }

  private touches(event: ChangeEvent): boolean {
    return event.tables.some((table) => this.tables.includes(table));
  }

  /**
   * Deliver the current snapshot immediately, then one after each relevant commit.
   * A snapshot read that throws is logged and skipped.
   *
   * @returns unsubscribe function
   */
  subscribe(listener: SnapshotListener<T>): () => void {
    const deliver = (): void => {
      let snapshot: T;
      try {
        snapshot = this.query();
      } catch (error) {
        console.error(`[LiveQuery] snapshot read failed: ${describeError(error)}`);
        return;
      }
      listener(snapshot);
    };

    deliver();
    return this.notifier.onChange((event) => {
      if (this.touches(event)) deliver();
    });
  }

  /**
   * Async stream of snapshots. Ends when the signal aborts or the store closes.
   */
  async *snapshots(signal?: AbortSignal): AsyncGenerator<T, void, undefined> {
    const state = { dirty: false, ended: false };
    let wake: (() => void) | null = null;
    const notify = (): void => {
      const resolve = wake;
      wake = null;
      resolve?.();
    };
    const end = (): void => {
      state.ended = true;
      notify();
    };

    const offChange = this.notifier.onChange((event) => {
      if (!this.touches(event)) return;
      state.dirty = true;
      notify();
    });
    const offClose = this.notifier.onClose(end);
    signal?.addEventListener('abort', end);

    try {
      if (signal?.aborted || state.ended) return;
      yield this.query();

      for (;;) {
        if (state.ended || signal?.aborted) return;
        if (!state.dirty) {
          await new Promise<void>((resolve) => {
            wake = resolve;
          });
          continue;
        }
        state.dirty = false;
        yield this.query();
      }
    } finally {
      offChange();
      offClose();
      signal?.removeEventListener('abort', end);
    }
  }
}
