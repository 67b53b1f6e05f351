import {
  abortReason,
  type RemoteDataSource,
  type RemoteRequestOptions,
  type RemoteSearchSource,
} from '@notekeep/core';

export type RemoteOperation = 'fetch' | 'push' | 'search';

export interface FaultRemoteOptions {
  /** Operations that may fail (default: all) */
  failOn?: readonly RemoteOperation[];
  /** Fail the first N calls of each operation, then succeed */
  failTimes?: number;
  /** Fail every call of an operation from this call index on */
  failAfter?: number;
  failWith?: Error;
  /** Never settle until the request signal aborts */
  hang?: boolean;
  latencyMs?: number;
  onFail?: (operation: RemoteOperation, error: Error) => void;
}

export interface FaultRemoteState {
  fetchCount: number;
  pushCount: number;
  searchCount: number;
  failureCount: number;
}

export type FaultableRemote = RemoteDataSource & Partial<RemoteSearchSource>;

export interface FaultRemoteResult {
  remote: RemoteDataSource & RemoteSearchSource;
  getState: () => FaultRemoteState;
  reset: () => void;
  setOptions: (options: Partial<FaultRemoteOptions>) => void;
}

/**
 * Wrap a remote so selected operations fail, hang or slow down.
 */
export function withRemoteFaults(
  baseRemote: FaultableRemote,
  options: FaultRemoteOptions = {}
): FaultRemoteResult {
  let currentOptions = { ...options };
  const state: FaultRemoteState = {
    fetchCount: 0,
    pushCount: 0,
    searchCount: 0,
    failureCount: 0,
  };
  const calls: Record<RemoteOperation, number> = {
    fetch: 0,
    push: 0,
    search: 0,
  };

  const defaultError = new Error('Simulated remote error');

  const waitForAbort = (signal: AbortSignal | undefined): Promise<never> =>
    new Promise<never>((_resolve, reject) => {
      if (!signal) return;
      if (signal.aborted) {
        reject(abortReason(signal));
        return;
      }
      signal.addEventListener('abort', () => reject(abortReason(signal)), {
        once: true,
      });
    });

  const maybeDelay = async (signal: AbortSignal | undefined): Promise<void> => {
    const latencyMs = currentOptions.latencyMs ?? 0;
    if (latencyMs <= 0) return;
    await Promise.race([
      new Promise<void>((resolve) => setTimeout(resolve, latencyMs)),
      waitForAbort(signal),
    ]);
  };

  const shouldFail = (operation: RemoteOperation, index: number): boolean => {
    const failOn = currentOptions.failOn;
    if (failOn && !failOn.includes(operation)) return false;
    if (
      currentOptions.failTimes !== undefined &&
      index < currentOptions.failTimes
    ) {
      return true;
    }
    return (
      currentOptions.failAfter !== undefined &&
      index >= currentOptions.failAfter
    );
  };

  const guard = async <R>(
    operation: RemoteOperation,
    requestOptions: RemoteRequestOptions | undefined,
    run: () => Promise<R>
  ): Promise<R> => {
    const signal = requestOptions?.signal;
    const index = calls[operation];
    calls[operation] += 1;
    if (operation === 'fetch') state.fetchCount++;
    if (operation === 'push') state.pushCount++;
    if (operation === 'search') state.searchCount++;

    if (
      currentOptions.hang &&
      (!currentOptions.failOn || currentOptions.failOn.includes(operation))
    ) {
      return waitForAbort(signal);
    }
    await maybeDelay(signal);

    if (shouldFail(operation, index)) {
      const error = currentOptions.failWith ?? defaultError;
      state.failureCount++;
      currentOptions.onFail?.(operation, error);
      throw error;
    }
    return run();
  };

  const baseSearch = baseRemote.search;
  const remote: FaultableRemote & RemoteSearchSource = {
    fetchAll: (requestOptions) =>
      guard('fetch', requestOptions, () =>
        baseRemote.fetchAll(requestOptions)
      ),
    fetchSince: (since, requestOptions) =>
      guard('fetch', requestOptions, () =>
        baseRemote.fetchSince(since, requestOptions)
      ),
    search: (query, requestOptions) =>
      guard('search', requestOptions, async () => {
        if (!baseSearch) throw new Error('Remote does not support search');
        return baseSearch.call(baseRemote, query, requestOptions);
      }),
  };

  const basePush = baseRemote.push;
  if (basePush) {
    remote.push = (records, requestOptions) =>
      guard('push', requestOptions, () =>
        basePush.call(baseRemote, records, requestOptions)
      );
  }

  return {
    remote,
    getState: () => ({ ...state }),
    reset: () => {
      calls.fetch = 0;
      calls.push = 0;
      calls.search = 0;
      state.fetchCount = 0;
      state.pushCount = 0;
      state.searchCount = 0;
      state.failureCount = 0;
    },
    setOptions: (newOptions) => {
      currentOptions = { ...currentOptions, ...newOptions };
    },
  };
}
