import { describe, it, expect, beforeEach, vi } from 'vitest';
import { TaskManager, assertInRange, canTransition, isActive, isTerminal } from '../src/application/task-manager.js';
import {
  InvalidTransitionError,
  OutOfRangeError,
  TaskNotActiveError,
  UnknownParameterError,
  UnknownTaskError,
} from '../src/errors.js';
import type { ParameterDefinition, TaskEvent } from '../src/types/fieldbus-types.js';

const applicationRate: ParameterDefinition = {
  ddi: 0x0001,
  name: 'applicationRate',
  unit: 'L/ha',
  low: 0,
  high: 120,
};

const workingWidth: ParameterDefinition = {
  ddi: 0x0043,
  name: 'workingWidth',
  unit: 'm',
  low: 1,
  high: 36,
};

describe('task state machine', () => {
  it('allows only the documented transitions', () => {
    expect(canTransition('requested', 'assigned')).toBe(true);
    expect(canTransition('requested', 'running')).toBe(false);
    expect(canTransition('running', 'suspended')).toBe(true);
    expect(canTransition('suspended', 'running')).toBe(true);
    expect(canTransition('completed', 'running')).toBe(false);
    expect(canTransition('aborted', 'assigned')).toBe(false);
  });

  it('classifies states', () => {
    expect(isTerminal('completed')).toBe(true);
    expect(isTerminal('aborted')).toBe(true);
    expect(isTerminal('suspended')).toBe(false);
    expect(isActive('requested')).toBe(false);
    expect(isActive('assigned')).toBe(true);
    expect(isActive('suspended')).toBe(true);
  });

  it('checks ranges without clamping', () => {
    expect(() => assertInRange(applicationRate, 120)).not.toThrow();
    expect(() => assertInRange(applicationRate, 150)).toThrow(OutOfRangeError);
    expect(() => assertInRange(applicationRate, -0.01)).toThrow(OutOfRangeError);
    expect(() => assertInRange(applicationRate, Number.NaN)).toThrow(OutOfRangeError);
  });
});

describe('TaskManager', () => {
  let manager: TaskManager;

  beforeEach(() => {
    manager = new TaskManager({ maxTaskHistory: 2 });
  });

  it('creates tasks in the requested state with initial values', () => {
    const task = manager.create(0x10, [{ definition: applicationRate, value: 80 }], 1000);

    expect(task.id).toBe(1);
    expect(task.state).toBe('requested');
    expect(task.implementAddress).toBe(0x10);
    expect(task.parameters.get(0x0001)).toEqual({ definition: applicationRate, value: 80, updatedAt: 1000 });
  });

  it('refuses out of range initial values', () => {
    expect(() => manager.create(0x10, [{ definition: applicationRate, value: 150 }])).toThrow(OutOfRangeError);
    expect(manager.liveTasks()).toEqual([]);
  });

  it('walks a task through its lifecycle and keeps it in history', () => {
    const { id } = manager.create(0x10, []);
    manager.transition(id, 'assigned');
    manager.transition(id, 'running');
    manager.transition(id, 'suspended');
    manager.transition(id, 'running');
    const done = manager.transition(id, 'completed', 'finished by implement');

    expect(done.state).toBe('completed');
    expect(done.endReason).toBe('finished by implement');
    expect(manager.liveTasks()).toEqual([]);
    expect(manager.get(id)?.state).toBe('completed');
    expect(manager.getHistory().map(task => task.id)).toEqual([id]);
  });

  it('treats re-entering the current state as a no-op', () => {
    const { id } = manager.create(0x10, []);
    manager.transition(id, 'assigned');
    manager.transition(id, 'assigned');
    expect(manager.flushEvents()).toBe(1);
  });

  it('rejects invalid transitions', () => {
    const { id } = manager.create(0x10, []);
    expect(() => manager.transition(id, 'running')).toThrow(InvalidTransitionError);
    manager.transition(id, 'aborted');
    expect(() => manager.transition(id, 'assigned')).toThrow(InvalidTransitionError);
    expect(() => manager.transition(99, 'assigned')).toThrow(UnknownTaskError);
  });

  it('bounds the history', () => {
    for (let i = 0; i < 3; i++) {
      const { id } = manager.create(0x10, []);
      manager.transition(id, 'aborted');
    }
    expect(manager.getHistory().map(task => task.id)).toEqual([2, 3]);
    expect(manager.has(1)).toBe(false);
  });

  it('asserts that a task is active', () => {
    const { id } = manager.create(0x10, []);
    expect(() => manager.assertActive(id)).toThrow(TaskNotActiveError);
    manager.transition(id, 'assigned');
    expect(manager.assertActive(id).state).toBe('assigned');
    manager.transition(id, 'completed');
    expect(() => manager.assertActive(id)).toThrow(TaskNotActiveError);
    expect(() => manager.assertActive(42)).toThrow(UnknownTaskError);
  });

  it('resolves parameters by DDI, name or definition', () => {
    const { id } = manager.create(0x10, [{ definition: applicationRate, value: 80 }]);

    expect(manager.resolveParameter(id, 0x0001).value).toBe(80);
    expect(manager.resolveParameter(id, 'applicationRate').value).toBe(80);
    expect(() => manager.resolveParameter(id, 'workingWidth')).toThrow(UnknownParameterError);

    const resolved = manager.resolveParameter(id, workingWidth, 2000);
    expect(resolved).toEqual({ definition: workingWidth, value: null, updatedAt: 2000 });
    expect(() => manager.resolveParameter(id, 'workingWidth')).toThrow(UnknownParameterError);

    manager.addParameter(id, workingWidth, 2500);
    expect(manager.resolveParameter(id, 'workingWidth')).toEqual({ definition: workingWidth, value: null, updatedAt: 2500 });
    manager.addParameter(id, { ...applicationRate, high: 10 });
    expect(manager.resolveParameter(id, 0x0001).definition.high).toBe(120);
  });

  it('applies acknowledged sets in order', () => {
    const { id } = manager.create(0x10, [{ definition: applicationRate, value: 80 }]);
    manager.addPendingSet(id, 0x0001, 95);
    manager.addPendingSet(id, 0x0001, 100);
    expect(manager.pendingSetCount(id)).toBe(2);

    const first = manager.takePendingSet(id, 0x0001);
    expect(first).toBe(95);
    manager.applyValue(id, 0x0001, 95, 3000);
    expect(manager.get(id)?.parameters.get(0x0001)?.value).toBe(95);
    expect(manager.takePendingSet(id, 0x0001)).toBe(100);
    expect(manager.takePendingSet(id, 0x0001)).toBeUndefined();
  });

  it('drops pending sets when a task ends', () => {
    const { id } = manager.create(0x10, []);
    manager.addPendingSet(id, 0x0001, 95);
    manager.transition(id, 'aborted');
    expect(manager.pendingSetCount(id)).toBe(0);
  });

  it('queues events until flushed', () => {
    const handler = vi.fn<[TaskEvent], void>();
    manager.onEvent(handler);
    const { id } = manager.create(0x10, [{ definition: applicationRate, value: 80 }]);
    manager.transition(id, 'assigned');
    manager.applyValue(id, 0x0001, 95);
    manager.rejectValue(id, 0x0001, 'Value out of range');

    expect(handler).not.toHaveBeenCalled();
    expect(manager.flushEvents()).toBe(3);
    expect(handler.mock.calls.map(([event]) => event.type)).toEqual(['state', 'parameter', 'parameter-rejected']);
    expect(handler.mock.calls[0]?.[0]).toMatchObject({ type: 'state', previous: 'requested' });
  });

  it('keeps delivering when a handler throws', () => {
    const calls: string[] = [];
    manager.onEvent(() => {
      throw new Error('handler failure');
    });
    manager.onEvent(event => calls.push(event.type));
    const { id } = manager.create(0x10, []);
    manager.transition(id, 'assigned');
    manager.flushEvents();
    expect(calls).toEqual(['state']);
  });

  it('skips ids still in history when wrapping around', () => {
    const wide = new TaskManager({ maxTaskHistory: 253 });
    const ids = Array.from({ length: 254 }, () => wide.create(0x10, []).id);
    expect(ids[0]).toBe(1);
    expect(ids[253]).toBe(254);

    wide.transition(2, 'aborted');
    wide.transition(1, 'aborted');
    for (let id = 3; id <= 254; id++) wide.transition(id, 'aborted');
    expect(wide.has(2)).toBe(false);
    expect(wide.has(1)).toBe(true);

    expect(wide.create(0x10, []).id).toBe(2);
  });

  it('reuses the lowest free id once history holds every other one', () => {
    const wide = new TaskManager({ maxTaskHistory: 300 });
    for (let i = 0; i < 254; i++) wide.create(0x10, []);
    for (let id = 1; id <= 254; id++) wide.transition(id, 'aborted');

    expect(wide.create(0x10, []).id).toBe(1);
    expect(wide.create(0x10, []).id).toBe(2);
  });

  it('allocates increasing ids', () => {
    const first = manager.create(0x10, []);
    const second = manager.create(0x11, []);
    manager.transition(first.id, 'aborted');
    expect(second.id).toBe(2);
    expect(manager.create(0x12, []).id).toBe(3);
  });
});
