import { describe, it, expect, beforeEach } from 'vitest';
import { CanBus } from '../src/bus/can-bus.js';
import { createDefaultRegistry } from '../src/addressing/identifier-registry.js';
import { composeIdentifier, parseIdentifier } from '../src/addressing/protocol-identifier.js';
import { ProtocolEngine } from '../src/application/protocol-engine.js';
import { ImplementEmulator } from '../src/implement-emulator/implement-emulator.js';
import { decodeFrame, encodeFrame } from '../src/framers/can-framer.js';
import { buildTaskStart } from '../src/messages/task-control.js';
import { buildProcessData } from '../src/messages/process-data.js';
import { decodeSensorValue, encodeCommandValue } from '../src/messages/sensor-reading.js';
import { ACTUATOR_COMMANDS, PDU_FORMATS } from '../src/constants/constants.js';
import { BusNotActiveError } from '../src/errors.js';
import type { NodeHandle, ParameterDefinition, TaskEvent, VirtualTerminalMessage } from '../src/types/fieldbus-types.js';

const IMPLEMENT = 0x10;

const applicationRate: ParameterDefinition = {
  ddi: 0x0001,
  name: 'applicationRate',
  unit: 'L/ha',
  low: 0,
  high: 120,
};

describe('ImplementEmulator', () => {
  it('validates its address', () => {
    const bus = new CanBus();
    expect(() => new ImplementEmulator(bus, 0xfe)).toThrow(RangeError);
    expect(() => new ImplementEmulator(bus, 1.5)).toThrow(RangeError);
  });

  it('needs to join before draining', () => {
    const bus = new CanBus();
    bus.start();
    const implement = new ImplementEmulator(bus, IMPLEMENT);
    expect(() => implement.drain()).toThrow(BusNotActiveError);
    implement.join();
    expect(implement.drain()).toBe(0);
    implement.leave();
    expect(() => implement.drain()).toThrow(BusNotActiveError);
  });

  describe('against a bare controller node', () => {
    let bus: CanBus;
    let controller: NodeHandle;
    let implement: ImplementEmulator;

    const send = (pduFormat: number, payload: Uint8Array, destination: number = IMPLEMENT): void => {
      const identifier = composeIdentifier({ priority: 3, pduFormat, destination, source: 0xf7 });
      bus.transmit(controller, encodeFrame(identifier, payload, 'extended'));
    };

    const receive = (): Array<{ pduFormat: number; destination: number; payload: number[] }> =>
      Array.from(bus.poll(controller), frame => {
        const decoded = decodeFrame(frame.raw);
        const { pduFormat, destination } = parseIdentifier(decoded.identifier);
        return { pduFormat, destination, payload: Array.from(decoded.payload) };
      });

    beforeEach(async () => {
      bus = new CanBus();
      bus.start();
      controller = bus.registerNode(0xf7, [{ kind: 'mask', mask: 0xff00, match: 0xf700, format: 'extended' }]);
      implement = new ImplementEmulator(bus, IMPLEMENT, {
        limits: { 0x0001: { low: 0, high: 100 } },
      });
      implement.join();
      await bus.runCycle();
    });

    it('acknowledges a task start automatically', async () => {
      send(PDU_FORMATS.TASK_CONTROL, buildTaskStart(1));
      expect(await implement.processCycle()).toBe(1);
      await bus.runCycle();

      expect(receive()).toEqual([{ pduFormat: PDU_FORMATS.TASK_CONTROL, destination: 0xf7, payload: [0x02, 1, 0] }]);
      expect(implement.getTask(1)).toEqual({ taskId: 1, controller: 0xf7, state: 'assigned', values: new Map() });
    });

    it('rejects sets for unknown tasks and values outside its limits', async () => {
      send(PDU_FORMATS.TASK_CONTROL, buildTaskStart(1));
      send(PDU_FORMATS.PROCESS_DATA, buildProcessData('set', 9, 0x0001, 5000));
      send(PDU_FORMATS.PROCESS_DATA, buildProcessData('set', 1, 0x0001, 11000));
      await implement.processCycle();
      await bus.runCycle();

      expect(receive().map(frame => frame.payload)).toEqual([
        [0x02, 1, 0],
        [0x06, 9, 0x01, 0x00, 0x03, 0, 0, 0],
        [0x06, 1, 0x01, 0x00, 0x02, 0, 0, 0],
      ]);
      expect(implement.getValue(1, 0x0001)).toBeUndefined();
    });

    it('answers a request for an unknown parameter with a negative acknowledgement', async () => {
      send(PDU_FORMATS.TASK_CONTROL, buildTaskStart(1));
      send(PDU_FORMATS.PROCESS_DATA, buildProcessData('request', 1, 0x0043));
      await implement.processCycle();
      await bus.runCycle();

      expect(receive().map(frame => frame.payload)).toEqual([
        [0x02, 1, 0],
        [0x06, 1, 0x43, 0x00, 0x01, 0, 0, 0],
      ]);
    });

    it('skips frames it cannot handle and keeps draining', async () => {
      send(PDU_FORMATS.TASK_CONTROL, Uint8Array.of(0x04, 7));
      send(PDU_FORMATS.TASK_CONTROL, buildTaskStart(2));
      expect(await implement.processCycle()).toBe(2);
      expect(implement.getTask(2)?.state).toBe('assigned');
      expect(implement.getTask(7)).toBeUndefined();
    });
  });

  describe('with a protocol engine', () => {
    let bus: CanBus;
    let engine: ProtocolEngine;
    let implement: ImplementEmulator;

    async function roundTrip(): Promise<void> {
      await implement.processCycle();
      await engine.processCycle();
    }

    async function startTask(): Promise<number> {
      const task = engine.startTask(IMPLEMENT, [{ definition: applicationRate, value: 80 }]);
      await roundTrip();
      return task.id;
    }

    beforeEach(async () => {
      bus = new CanBus();
      bus.start();
      engine = new ProtocolEngine(bus, createDefaultRegistry({ logLevel: 'error' }), { logLevel: 'error' });
      engine.start();
      implement = new ImplementEmulator(bus, IMPLEMENT, { limits: { 0x0001: { low: 0, high: 100 } } });

      implement.join();
      await engine.processCycle();
      await implement.processCycle();
    });

    it('connects on the connect acknowledgement', () => {
      expect(implement.connected).toBe(true);
      expect(implement.controllerAddress).toBe(0xf7);
      expect(engine.getDeviceState(IMPLEMENT)).toBe('connected');
    });

    it('takes a task and its initial values', async () => {
      const taskId = await startTask();
      expect(engine.getTask(taskId)?.state).toBe('assigned');
      expect(engine.getDeviceState(IMPLEMENT)).toBe('active');
      expect(implement.getValue(taskId, 0x0001)).toBe(80);
    });

    it('acknowledges sets within its limits and rejects the rest', async () => {
      const taskId = await startTask();
      const events: TaskEvent[] = [];
      engine.onTaskEvent(event => events.push(event));

      engine.setParameter(taskId, 'applicationRate', 95);
      await roundTrip();
      expect(engine.getParameter(taskId, 'applicationRate').value).toBe(95);
      expect(implement.getValue(taskId, 0x0001)).toBe(95);

      engine.setParameter(taskId, 'applicationRate', 110);
      await roundTrip();
      expect(engine.getParameter(taskId, 'applicationRate').value).toBe(95);
      expect(events.map(event => event.type)).toEqual(['parameter', 'parameter-rejected']);
    });

    it('answers value requests with its current value', async () => {
      const taskId = await startTask();
      implement.setLocalValue(taskId, 0x0001, 90);

      const pending = engine.requestParameter(taskId, 'applicationRate');
      await roundTrip();

      await expect(pending).resolves.toBe(90);
      expect(engine.getParameter(taskId, 'applicationRate').value).toBe(90);
    });

    it('applies broadcast values to every task without replying', async () => {
      const taskId = await startTask();
      engine.broadcastParameter(applicationRate, 50);
      expect(await implement.processCycle()).toBe(1);
      expect(implement.getValue(taskId, 0x0001)).toBe(50);
      expect((await engine.processCycle()).received).toBe(0);
    });

    it('follows pause, resume and end commands', async () => {
      const taskId = await startTask();
      implement.sendStatus(taskId, 'working', 10);
      await engine.processCycle();
      expect(implement.getTask(taskId)?.state).toBe('working');

      engine.pauseTask(taskId);
      await implement.processCycle();
      expect(implement.getTask(taskId)?.state).toBe('paused');

      engine.resumeTask(taskId);
      await implement.processCycle();
      expect(implement.getTask(taskId)?.state).toBe('working');

      engine.endTask(taskId);
      await implement.processCycle();
      expect(implement.getTask(taskId)?.state).toBe('ended');
    });

    it('finishes a task through its status', async () => {
      const taskId = await startTask();
      implement.sendStatus(taskId, 'finished', 100);
      await engine.processCycle();
      expect(engine.getTask(taskId)).toMatchObject({ state: 'completed', progress: 100 });
      expect(implement.getTask(taskId)?.state).toBe('ended');
    });

    it('can reject a task by hand', async () => {
      implement = new ImplementEmulator(bus, 0x11, { autoAcknowledgeTasks: false });
      implement.join();
      await engine.processCycle();
      await implement.processCycle();

      const task = engine.startTask(0x11);
      await implement.processCycle();
      expect(implement.getTask(task.id)?.state).toBe('assigned');

      implement.acknowledgeTask(task.id, false);
      await engine.processCycle();
      expect(engine.getTask(task.id)).toMatchObject({ state: 'aborted', endReason: 'rejected by implement (code 1)' });
      expect(implement.getTask(task.id)?.state).toBe('aborted');
    });

    it('publishes sensor readings the engine can decode', async () => {
      const readings: number[] = [];
      engine.onFrame('sensor', ({ payload }) => readings.push(decodeSensorValue(payload)));
      implement.publishSensorReading('soil-moisture', 21.5);
      await engine.processCycle();
      expect(readings).toEqual([21.5]);
    });

    it('records actuator commands and operator interface screens', async () => {
      engine.issueActuatorCommand(IMPLEMENT, ACTUATOR_COMMANDS.SET_RATE, encodeCommandValue(500));
      engine.issueActuatorCommand(0xff, ACTUATOR_COMMANDS.STOP);
      engine.sendVirtualTerminalMessage(IMPLEMENT, 0x01, 3, [7]);
      await implement.processCycle();

      expect(implement.receivedCommands).toEqual([
        { command: ACTUATOR_COMMANDS.SET_RATE, parameters: Uint8Array.of(0x01, 0xf4) },
        { command: ACTUATOR_COMMANDS.STOP, parameters: new Uint8Array(0) },
      ]);
      expect(implement.receivedScreens).toEqual([
        { source: 0xf7, commandId: 0x01, screenId: 3, data: Uint8Array.of(7) },
      ]);
    });

    it('sends operator input to the controller', async () => {
      const seen: VirtualTerminalMessage[] = [];
      engine.registerScreenHandler(3, message => seen.push(message));
      implement.sendVirtualTerminalMessage(0x02, 3, [1]);
      await engine.processCycle();
      expect(seen).toEqual([{ source: IMPLEMENT, destination: 0xf7, commandId: 0x02, screenId: 3, data: Uint8Array.of(1) }]);
    });

    it('sends heartbeats to the controller and disconnects', async () => {
      implement.heartbeat();
      expect((await engine.processCycle()).dropped).toBe(0);

      implement.disconnect();
      expect(implement.connected).toBe(false);
      const report = await engine.processCycle();
      expect(report.disconnected).toBe(1);
      expect(engine.getDeviceState(IMPLEMENT)).toBe('disconnected');
    });
  });
});
