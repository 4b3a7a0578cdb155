/**
 * Commit Notifications
 *
 * Typed event emitter announcing which tables a committed write touched.
 * Live queries listen here and re-run their read after each relevant commit.
 *
 * @module database/change-notifier
 */

import { EventEmitter } from 'events';
import type { TableName } from './types.js';
import { describeError } from './helpers.js';

export interface ChangeEvent {
  tables: readonly TableName[];
  /** Monotonic per-store commit counter */
  sequence: number;
}

export type ChangeHandler = (event: ChangeEvent) => void;

export class ChangeNotifier extends EventEmitter {
  private sequence = 0;
  private closed = false;

  constructor() {
    super();
    // One change and one close listener per open live query
    this.setMaxListeners(0);
  }

  /** Announce a commit */
  emitChange(tables: readonly TableName[]): void {
    if (this.closed || tables.length === 0) return;
    this.sequence += 1;
    const event: ChangeEvent = { tables, sequence: this.sequence };
    this.emit('change', event);
  }

  /**
   * Listener failures are logged, never thrown back at the writer or the
   * other listeners.
   *
   * @returns unsubscribe function
   */
  onChange(handler: ChangeHandler): () => void {
    if (this.closed) return () => undefined;
    const guarded = (event: ChangeEvent): void => {
      try {
        handler(event);
      } catch (error) {
        console.error(
          `[ChangeNotifier] listener failed for ${event.tables.join(',')}: ${describeError(error)}`
        );
      }
    };
    this.on('change', guarded);
    return () => {
      this.off('change', guarded);
    };
  }

  /** @returns unsubscribe function */
  onClose(handler: () => void): () => void {
    if (this.closed) {
      handler();
      return () => undefined;
    }
    this.once('close', handler);
    return () => {
      this.off('close', handler);
    };
  }

  isClosed(): boolean {
    return this.closed;
  }

  /** Ends every live query; later emits are ignored */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.emit('close');
    this.removeAllListeners();
  }
}
