import { describe, it, expect } from 'vitest';
import { DEFAULT_OPTIONS, resolveOptions, SessionOptions } from './options';
import { defaultRegistry, Registry } from './registry';
import { ByteOrder } from './types';
import { Encoder } from './encoder';
import { Writer } from './writer';

describe('DEFAULT_OPTIONS', () => {
  it('holds the documented defaults', () => {
    expect(DEFAULT_OPTIONS).toEqual({
      byteOrder: ByteOrder.BigEndian,
      tag: 'bin',
      onlyTagged: false,
      lengthPrefix: 8,
      presenceMarkers: false,
      sortMapKeys: false,
      strict: false,
      maxLength: 64 * 1024 * 1024,
      warnOnTruncation: false,
      registry: defaultRegistry,
    });
  });

  it('is frozen', () => {
    expect(Object.isFrozen(DEFAULT_OPTIONS)).toBe(true);
  });
});

describe('resolveOptions', () => {
  it('fills in defaults', () => {
    expect(resolveOptions()).toEqual(DEFAULT_OPTIONS);
  });

  it('keeps given values', () => {
    const registry = new Registry();
    const resolved = resolveOptions({ byteOrder: ByteOrder.LittleEndian, lengthPrefix: 4, registry });
    expect(resolved.byteOrder).toBe(ByteOrder.LittleEndian);
    expect(resolved.lengthPrefix).toBe(4);
    expect(resolved.registry).toBe(registry);
    expect(resolved.tag).toBe('bin');
  });

  it('rejects invalid values from untyped configuration', () => {
    const badPrefix: SessionOptions = JSON.parse('{"lengthPrefix": 2}');
    const badOrder: SessionOptions = JSON.parse('{"byteOrder": "middle"}');
    expect(() => resolveOptions(badPrefix)).toThrow('Length prefix must be 4 or 8 bytes, got 2');
    expect(() => resolveOptions(badOrder)).toThrow('Unknown byte order: middle');
  });

  it('rejects negative or fractional maxLength', () => {
    expect(() => resolveOptions({ maxLength: -1 })).toThrow(RangeError);
    expect(() => resolveOptions({ maxLength: 1.5 })).toThrow(RangeError);
  });

  it('is applied when sessions are created', () => {
    expect(() => new Encoder(new Writer(), { maxLength: -1 })).toThrow(RangeError);
  });
});
