import { createCapturedTelemetry } from '@notekeep/testkit';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ObserverRegistry } from './observers';

describe('ObserverRegistry', () => {
  let captured: ReturnType<typeof createCapturedTelemetry>;
  let restoreTelemetry: () => void;

  beforeEach(() => {
    captured = createCapturedTelemetry();
    restoreTelemetry = captured.install();
  });

  afterEach(() => {
    restoreTelemetry();
  });

  it('notifies after the caller continues', async () => {
    const onPurged = vi.fn();
    const registry = new ObserverRegistry([{ onPurged }]);

    registry.notify('onPurged', (observer) => observer.onPurged?.('n-1'));
    expect(onPurged).not.toHaveBeenCalled();

    await vi.waitFor(() => expect(onPurged).toHaveBeenCalledWith('n-1'));
  });

  it('isolates a failing observer from the others', async () => {
    const seen: string[] = [];
    const registry = new ObserverRegistry();
    registry.add({
      onPurged: () => {
        throw new Error('observer boom');
      },
    });
    registry.add({
      onPurged: async () => {
        throw new Error('async boom');
      },
    });
    registry.add({
      onPurged: (id) => {
        seen.push(id);
      },
    });

    registry.notify('onPurged', (observer) => observer.onPurged?.('n-1'));

    await vi.waitFor(() => expect(captured.exceptions).toHaveLength(2));
    expect(seen).toEqual(['n-1']);
    const failures = captured.events.filter(
      (event) => event.event === 'repository.observer.failed'
    );
    expect(failures.map((event) => event.error).sort()).toEqual([
      'async boom',
      'observer boom',
    ]);
    expect(failures[0]?.hook).toBe('onPurged');
  });

  it('stops notifying a removed observer', async () => {
    const registry = new ObserverRegistry();
    const onPurged = vi.fn();
    const remove = registry.add({ onPurged });
    const kept = vi.fn();
    registry.add({ onPurged: kept });

    remove();
    expect(registry.size).toBe(1);
    registry.notify('onPurged', (observer) => observer.onPurged?.('n-1'));

    await vi.waitFor(() => expect(kept).toHaveBeenCalledTimes(1));
    expect(onPurged).not.toHaveBeenCalled();
  });
});
