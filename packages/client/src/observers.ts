/**
 * @notekeep/client - Change observers
 *
 * Observers are notified after an operation succeeds. They run detached from
 * the operation: a slow or failing observer never changes its result.
 */

import {
  type BackendKind,
  captureStoreException,
  logStoreEvent,
  type NoteRecord,
  type SearchTier,
  toErrorMessage,
} from '@notekeep/core';

export interface BackendSwitchEvent {
  from: BackendKind;
  to: BackendKind;
  copiedCount: number;
}

export interface SearchEvent {
  query: string;
  scope: 'local' | 'remote' | 'hybrid';
  hitCount: number;
  tier: SearchTier | null;
}

type MaybePromise = void | Promise<void>;

export interface NoteObserver {
  onCreated?(record: NoteRecord): MaybePromise;
  onUpdated?(record: NoteRecord, previous: NoteRecord): MaybePromise;
  onDeleted?(record: NoteRecord): MaybePromise;
  onRestored?(record: NoteRecord): MaybePromise;
  onPurged?(id: string): MaybePromise;
  onBackendSwitched?(event: BackendSwitchEvent): MaybePromise;
  onSearched?(event: SearchEvent): MaybePromise;
}

export type ObserverHook = keyof NoteObserver;

export class ObserverRegistry {
  private readonly observers = new Set<NoteObserver>();

  constructor(initial: readonly NoteObserver[] = []) {
    for (const observer of initial) {
      this.observers.add(observer);
    }
  }

  /** Returns a function that removes the observer again. */
  add(observer: NoteObserver): () => void {
    this.observers.add(observer);
    return () => {
      this.observers.delete(observer);
    };
  }

  get size(): number {
    return this.observers.size;
  }

  notify(
    hook: ObserverHook,
    invoke: (observer: NoteObserver) => MaybePromise
  ): void {
    for (const observer of this.observers) {
      void Promise.resolve()
        .then(() => invoke(observer))
        .catch((error: unknown) => {
          logStoreEvent({
            event: 'repository.observer.failed',
            level: 'warn',
            hook,
            error: toErrorMessage(error),
          });
          captureStoreException(error, { hook });
        });
    }
  }
}
