import { describe, it, expect, beforeEach } from 'vitest';
import { IdentifierRegistry, createDefaultRegistry } from '../src/addressing/identifier-registry.js';
import { composeIdentifier, parseIdentifier } from '../src/addressing/protocol-identifier.js';
import {
  FieldBusError,
  InvalidRangeError,
  RangeConflictError,
  RegistryFrozenError,
  UnclassifiedIdentifierError,
  UnknownAddressError,
} from '../src/errors.js';

describe('protocol identifiers', () => {
  it('packs priority, PDU format, destination and source', () => {
    const identifier = composeIdentifier({ priority: 6, pduFormat: 0xcb, destination: 0x10, source: 0xf7 });
    expect(identifier).toBe(0x18cb10f7);
    expect(parseIdentifier(identifier)).toEqual({ priority: 6, pduFormat: 0xcb, destination: 0x10, source: 0xf7 });
  });

  it('leaves the two bits between priority and PDU format clear', () => {
    const identifier = composeIdentifier({ priority: 7, pduFormat: 0xff, destination: 0xff, source: 0xff });
    expect(identifier).toBe(0x1cffffff);
  });

  it('rejects out of range fields', () => {
    expect(() => composeIdentifier({ priority: 8, pduFormat: 0, destination: 0, source: 0 })).toThrow(FieldBusError);
    expect(() => composeIdentifier({ priority: 0, pduFormat: 0x100, destination: 0, source: 0 })).toThrow(
      FieldBusError
    );
    expect(() => composeIdentifier({ priority: 0, pduFormat: 0, destination: 0, source: -1 })).toThrow(FieldBusError);
  });
});

describe('IdentifierRegistry', () => {
  let registry: IdentifierRegistry;

  beforeEach(() => {
    registry = createDefaultRegistry();
  });

  it('classifies identifiers by the default ranges', () => {
    expect(registry.classify(0x101)).toBe('sensor');
    expect(registry.classify(0x210)).toBe('actuator');
    expect(registry.classify(0x050)).toBe('system-control');
    expect(registry.classify(0x18cb10f7, 'extended')).toBe('system-control');
    expect(registry.classify(0x300)).toBe('unclassified');
  });

  it('throws for unclassified identifiers on request', () => {
    expect(registry.classifyOrThrow(0x1ff)).toBe('sensor');
    expect(() => registry.classifyOrThrow(0x7ff)).toThrow(UnclassifiedIdentifierError);
  });

  it('rejects a range overlapping another category', () => {
    expect(() => registry.registerRange('actuator', 0x1f0, 0x20f)).toThrow(RangeConflictError);
    expect(registry.registerRange('sensor', 0x180, 0x1a0).category).toBe('sensor');
    expect(registry.registerRange('actuator', 0x300, 0x3ff).low).toBe(0x300);
    expect(registry.classify(0x350)).toBe('actuator');
  });

  it('rejects inverted or too wide ranges', () => {
    expect(() => registry.registerRange('sensor', 0x500, 0x400)).toThrow(InvalidRangeError);
    expect(() => registry.registerRange('sensor', 0x700, 0x800)).toThrow(InvalidRangeError);
  });

  it('resolves reserved roles', () => {
    expect(registry.resolveRole(0xf7)).toBe('task-controller');
    expect(registry.resolveRole(0xf0)).toBe('controller');
    expect(registry.resolveRole(0x26)).toBe('virtual-terminal');
    expect(registry.resolveRole(0xff)).toBe('broadcast');
    expect(registry.hasRole(0x10)).toBe(false);
    expect(() => registry.resolveRole(0x10)).toThrow(UnknownAddressError);
    expect(() => registry.registerRole(0x100, 'implement')).toThrow(UnknownAddressError);
  });

  it('becomes read-only once frozen', () => {
    registry.freeze();
    expect(registry.isFrozen()).toBe(true);
    expect(() => registry.registerRange('actuator', 0x300, 0x3ff)).toThrow(RegistryFrozenError);
    expect(() => registry.registerRole(0x10, 'implement')).toThrow(RegistryFrozenError);
    expect(registry.classify(0x101)).toBe('sensor');
  });

  it('lists ranges per format', () => {
    expect(registry.getRanges('standard')).toHaveLength(3);
    expect(registry.getRanges('extended')).toEqual([
      { category: 'system-control', low: 0, high: 0x1fffffff, format: 'extended' },
    ]);
    expect(new IdentifierRegistry().getRanges()).toEqual([]);
  });
});
