import { describe, it, expect, afterEach, vi } from 'vitest';
import { createFieldBusStack } from '../src/stack.js';
import type { FieldBusStack } from '../src/stack.js';
import { ImplementEmulator } from '../src/implement-emulator/implement-emulator.js';
import { BusNotActiveError, RangeConflictError } from '../src/errors.js';

describe('createFieldBusStack', () => {
  let stack: FieldBusStack | undefined;

  afterEach(() => {
    stack?.stop();
    stack = undefined;
    vi.useRealTimers();
  });

  it('wires bus, registry and engine without a runner by default', async () => {
    stack = createFieldBusStack({ bus: { bitrate: 500000 }, logLevel: 'error' });
    expect(stack.runner).toBeNull();
    expect(stack.bus.isActive()).toBe(false);

    stack.start();
    expect(stack.bus.getBitrate()).toBe(500000);
    expect(stack.engine.isStarted()).toBe(true);
    expect(stack.registry.isFrozen()).toBe(true);

    const implement = new ImplementEmulator(stack.bus, 0x10);
    implement.join();
    expect(await stack.processCycle()).toEqual({ received: 1, handled: 1, dropped: 0, disconnected: 0 });
    expect(stack.engine.getDeviceState(0x10)).toBe('connected');

    stack.stop();
    expect(stack.bus.isActive()).toBe(false);
    expect(stack.engine.isStarted()).toBe(false);
    expect(() => implement.heartbeat()).toThrow(BusNotActiveError);
  });

  it('registers extra ranges and reserved roles', () => {
    stack = createFieldBusStack({
      ranges: [{ category: 'actuator', low: 0x300, high: 0x3ff }],
      roles: [{ address: 0x30, role: 'implement' }],
      logLevel: 'error',
    });
    expect(stack.registry.classify(0x350)).toBe('actuator');
    expect(stack.registry.resolveRole(0x30)).toBe('implement');
  });

  it('refuses ranges that collide with the defaults', () => {
    expect(() =>
      createFieldBusStack({ ranges: [{ category: 'sensor', low: 0x1f0, high: 0x20f }], logLevel: 'error' })
    ).toThrow(RangeConflictError);
  });

  it('drives engine cycles and extra steps from the runner', async () => {
    vi.useFakeTimers({ toFake: ['setTimeout', 'clearTimeout', 'Date'] });
    const emulators: ImplementEmulator[] = [];
    const onCycleError = vi.fn<[Error, number], void>();
    stack = createFieldBusStack({
      cycleInterval: 10,
      cycleSteps: [
        async () => Promise.all(emulators.map(emulator => emulator.processCycle())),
        async () => {
          throw new Error('step failed');
        },
      ],
      onCycleError,
      logLevel: 'error',
    });

    stack.start();
    const implement = new ImplementEmulator(stack.bus, 0x10);
    implement.join();
    emulators.push(implement);

    await vi.advanceTimersByTimeAsync(0);
    expect(stack.engine.getDeviceState(0x10)).toBe('connected');
    expect(implement.connected).toBe(true);
    expect(onCycleError).toHaveBeenCalledWith(new Error('step failed'), 2);
    expect(stack.runner?.getStats().totalRuns).toBe(1);

    stack.stop();
    expect(stack.runner?.isRunning()).toBe(false);
  });
});
