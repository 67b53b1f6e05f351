import { throwIfAborted } from '@notekeep/core';

export interface CreateIdFactoryOptions {
  prefix?: string;
  separator?: string;
  startAt?: number;
  padLength?: number;
}

export interface IdFactory {
  next: () => string;
  peek: () => string;
  reset: (startAt?: number) => void;
}

function normalizeCounter(value: number, label: string): number {
  if (!Number.isFinite(value)) {
    throw new Error(`${label} must be a finite number`);
  }

  return Math.trunc(value);
}

/**
 * Sequential ids (`note-001`, `note-002`, ...) so ordering by id is
 * predictable in assertions.
 */
export function createIdFactory(
  options: CreateIdFactoryOptions = {}
): IdFactory {
  const prefix = options.prefix ?? 'note';
  const separator = options.separator ?? '-';
  const padLength = Math.max(
    0,
    normalizeCounter(options.padLength ?? 3, 'padLength')
  );

  let counter = normalizeCounter(options.startAt ?? 1, 'startAt');

  const format = (value: number): string => {
    const token = String(value).padStart(padLength, '0');
    return prefix.length === 0 ? token : `${prefix}${separator}${token}`;
  };

  return {
    next: () => {
      const value = format(counter);
      counter += 1;
      return value;
    },
    peek: () => format(counter),
    reset: (nextStartAt = options.startAt ?? 1) => {
      counter = normalizeCounter(nextStartAt, 'startAt');
    },
  };
}

/**
 * Sleep replacement for retry loops: records the requested delays and
 * resolves immediately unless the signal is already aborted.
 */
export function createRecordingSleep(): {
  sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  delays: number[];
} {
  const delays: number[] = [];
  return {
    delays,
    sleep: async (ms, signal) => {
      delays.push(ms);
      throwIfAborted(signal);
    },
  };
}
