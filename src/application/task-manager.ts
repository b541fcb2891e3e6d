// src/application/task-manager.ts

import Logger from '../logger.js';
import { DEFAULT_ENGINE_OPTIONS, MAX_TASK_ID } from '../constants/constants.js';
import {
  FieldBusError,
  InvalidTransitionError,
  OutOfRangeError,
  TaskNotActiveError,
  UnknownParameterError,
  UnknownTaskError,
} from '../errors.js';
import type {
  InitialParameter,
  LoggerInstance,
  LogLevel,
  ParameterDefinition,
  ParameterKey,
  ProcessDataParameter,
  Task,
  TaskEvent,
  TaskEventHandler,
  TaskState,
} from '../types/fieldbus-types.js';

const TRANSITIONS: Record<TaskState, readonly TaskState[]> = {
  requested: ['assigned', 'aborted'],
  assigned: ['running', 'completed', 'aborted'],
  running: ['suspended', 'completed', 'aborted'],
  suspended: ['running', 'completed', 'aborted'],
  completed: [],
  aborted: [],
};

const ACTIVE_STATES: readonly TaskState[] = ['assigned', 'running', 'suspended'];

export function isTerminal(state: TaskState): boolean {
  return TRANSITIONS[state].length === 0;
}

export function canTransition(from: TaskState, to: TaskState): boolean {
  return TRANSITIONS[from].includes(to);
}

export function isActive(state: TaskState): boolean {
  return ACTIVE_STATES.includes(state);
}

/**
 * Throws unless the value lies inside the definition's bounds. Values are never clamped.
 */
export function assertInRange(definition: ParameterDefinition, value: number): void {
  if (!Number.isFinite(value) || value < definition.low || value > definition.high) {
    throw new OutOfRangeError(value, definition.low, definition.high);
  }
}

function snapshot(task: Task): Readonly<Task> {
  return {
    ...task,
    parameters: new Map(
      Array.from(task.parameters, ([ddi, parameter]): [number, ProcessDataParameter] => [ddi, { ...parameter }])
    ),
  };
}

export interface TaskManagerOptions {
  maxTaskHistory?: number;
  logger?: Logger;
  logLevel?: LogLevel;
}

/**
 * Task state machine and process data bookkeeping:
 * requested -> assigned -> running <-> suspended -> completed, or aborted from any live state.
 *
 * Terminal tasks move to a bounded history. Events queue until {@link TaskManager.flushEvents}.
 */
export class TaskManager {
  private readonly tasks = new Map<number, Task>();
  private readonly history: Task[] = [];
  private readonly pendingSets = new Map<string, number[]>();
  private readonly handlers = new Set<TaskEventHandler>();
  private events: TaskEvent[] = [];
  private nextId: number = 1;
  private readonly maxTaskHistory: number;
  private readonly logger: LoggerInstance;

  constructor(options: TaskManagerOptions = {}) {
    this.maxTaskHistory = options.maxTaskHistory ?? DEFAULT_ENGINE_OPTIONS.maxTaskHistory;
    const loggerInstance = options.logger ?? new Logger();
    this.logger = loggerInstance.createLogger('TaskManager');
    this.logger.setLevel(options.logLevel ?? 'warn');
  }

  public onEvent(handler: TaskEventHandler): () => void {
    this.handlers.add(handler);
    return () => {
      this.handlers.delete(handler);
    };
  }

  /**
   * Creates a task in the `requested` state.
   * @throws OutOfRangeError when an initial value is outside its definition
   */
  public create(implementAddress: number, parameters: readonly InitialParameter[], now: number = Date.now()): Readonly<Task> {
    for (const { definition, value } of parameters) {
      assertInRange(definition, value);
    }

    const task: Task = {
      id: this.allocateId(),
      implementAddress,
      state: 'requested',
      parameters: new Map(
        parameters.map(({ definition, value }): [number, ProcessDataParameter] => [
          definition.ddi,
          { definition, value, updatedAt: now },
        ])
      ),
      progress: 0,
      createdAt: now,
      updatedAt: now,
    };
    this.tasks.set(task.id, task);
    this.logger.info('Task requested', { taskId: task.id, address: implementAddress });
    return snapshot(task);
  }

  public get(taskId: number): Readonly<Task> | undefined {
    const task = this.find(taskId);
    return task ? snapshot(task) : undefined;
  }

  public has(taskId: number): boolean {
    return this.find(taskId) !== undefined;
  }

  /**
   * Live (non-terminal) tasks, optionally of one implement.
   */
  public liveTasks(implementAddress?: number): Array<Readonly<Task>> {
    return Array.from(this.tasks.values())
      .filter(task => implementAddress === undefined || task.implementAddress === implementAddress)
      .map(snapshot);
  }

  public getHistory(): Array<Readonly<Task>> {
    return this.history.map(snapshot);
  }

  /**
   * Moves a task to a new state. Re-entering the current state is a no-op.
   * @throws UnknownTaskError | InvalidTransitionError
   */
  public transition(taskId: number, to: TaskState, reason?: string, now: number = Date.now()): Readonly<Task> {
    const task = this.require(taskId);
    if (task.state === to) return snapshot(task);
    if (!canTransition(task.state, to)) {
      throw new InvalidTransitionError(task.state, to);
    }

    const previous = task.state;
    task.state = to;
    task.updatedAt = now;

    if (isTerminal(to)) {
      task.endReason = reason;
      this.tasks.delete(task.id);
      this.history.push(task);
      if (this.history.length > this.maxTaskHistory) this.history.shift();
      this.clearPendingSets(task.id);
    }

    this.logger.info(`Task ${previous} -> ${to}`, { taskId, address: task.implementAddress });
    const view = snapshot(task);
    this.events.push({ type: 'state', task: view, previous });
    return view;
  }

  /**
   * @throws UnknownTaskError | TaskNotActiveError
   */
  public assertActive(taskId: number): Readonly<Task> {
    const task = this.find(taskId);
    if (!task) throw new UnknownTaskError(taskId);
    if (!isActive(task.state)) throw new TaskNotActiveError(taskId, task.state);
    return snapshot(task);
  }

  /**
   * Finds a task parameter by DDI, by name, or by definition. A definition the task
   * does not carry yet resolves to an empty parameter without being stored.
   */
  public resolveParameter(
    taskId: number,
    key: ParameterKey | ParameterDefinition,
    now: number = Date.now()
  ): ProcessDataParameter {
    const task = this.require(taskId);

    if (typeof key === 'object') {
      const existing = task.parameters.get(key.ddi);
      return existing ? { ...existing } : { definition: key, value: null, updatedAt: now };
    }

    const parameter =
      typeof key === 'number'
        ? task.parameters.get(key)
        : Array.from(task.parameters.values()).find(p => p.definition.name === key);
    if (!parameter) throw new UnknownParameterError(taskId, key);
    return { ...parameter };
  }

  /**
   * Adds a definition to a task with no value. A DDI the task already carries is left as it is.
   */
  public addParameter(taskId: number, definition: ParameterDefinition, now: number = Date.now()): void {
    const task = this.require(taskId);
    if (task.parameters.has(definition.ddi)) return;
    task.parameters.set(definition.ddi, { definition, value: null, updatedAt: now });
  }

  public addPendingSet(taskId: number, ddi: number, value: number): void {
    const key = `${taskId}:${ddi}`;
    const queue = this.pendingSets.get(key) ?? [];
    queue.push(value);
    this.pendingSets.set(key, queue);
  }

  /**
   * Oldest unacknowledged set for a parameter, removed from the pending list.
   */
  public takePendingSet(taskId: number, ddi: number): number | undefined {
    const key = `${taskId}:${ddi}`;
    const queue = this.pendingSets.get(key);
    const value = queue?.shift();
    if (queue && queue.length === 0) this.pendingSets.delete(key);
    return value;
  }

  public pendingSetCount(taskId: number): number {
    let count = 0;
    for (const [key, queue] of this.pendingSets) {
      if (key.startsWith(`${taskId}:`)) count += queue.length;
    }
    return count;
  }

  /**
   * Stores a confirmed value and queues a parameter event.
   */
  public applyValue(taskId: number, ddi: number, value: number, now: number = Date.now()): ProcessDataParameter {
    const task = this.require(taskId);
    const parameter = task.parameters.get(ddi);
    if (!parameter) throw new UnknownParameterError(taskId, ddi);

    parameter.value = value;
    parameter.updatedAt = now;
    task.updatedAt = now;
    this.logger.debug('Parameter updated', { taskId, ddi, value });
    this.events.push({ type: 'parameter', task: snapshot(task), parameter: { ...parameter } });
    return { ...parameter };
  }

  public rejectValue(taskId: number, ddi: number, reason: string): void {
    const task = this.require(taskId);
    this.logger.warn(`Parameter set rejected: ${reason}`, { taskId, ddi });
    this.events.push({ type: 'parameter-rejected', task: snapshot(task), ddi, reason });
  }

  public setProgress(taskId: number, progress: number, now: number = Date.now()): void {
    const task = this.require(taskId);
    task.progress = progress;
    task.updatedAt = now;
  }

  /**
   * Delivers queued events to the handlers.
   * @returns number of events delivered
   */
  public flushEvents(): number {
    const batch = this.events;
    this.events = [];
    for (const event of batch) {
      for (const handler of this.handlers) {
        try {
          handler(event);
        } catch (err: unknown) {
          this.logger.error('Task event handler failed', {
            taskId: event.task.id,
            error: err instanceof Error ? err.message : String(err),
          });
        }
      }
    }
    return batch.length;
  }

  private find(taskId: number): Task | undefined {
    const live = this.tasks.get(taskId);
    if (live) return live;
    for (let i = this.history.length - 1; i >= 0; i--) {
      const task = this.history[i];
      if (task?.id === taskId) return task;
    }
    return undefined;
  }

  private require(taskId: number): Task {
    const task = this.find(taskId);
    if (!task) throw new UnknownTaskError(taskId);
    return task;
  }

  private clearPendingSets(taskId: number): void {
    for (const key of Array.from(this.pendingSets.keys())) {
      if (key.startsWith(`${taskId}:`)) this.pendingSets.delete(key);
    }
  }

  private allocateId(): number {
    for (let attempt = 0; attempt < MAX_TASK_ID; attempt++) {
      const id = this.nextId;
      this.nextId = id >= MAX_TASK_ID ? 1 : id + 1;
      if (!this.find(id)) return id;
    }
    // every free id is still in history; reuse the lowest
    for (let id = 1; id <= MAX_TASK_ID; id++) {
      if (!this.tasks.has(id)) {
        this.nextId = id >= MAX_TASK_ID ? 1 : id + 1;
        return id;
      }
    }
    throw new FieldBusError(`All ${MAX_TASK_ID} task ids are in use`);
  }
}
