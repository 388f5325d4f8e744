import { describe, it, expect } from 'vitest';
import { t } from './schema';
import { Kind, Type } from './types';
import { classify } from './classify';
import { readFull, Source } from './reader';
import { writeAll, Sink } from './writer';
import { UnsupportedKindError } from './errors';

class Counter {
  n = 0;

  marshalBinary(sink: Sink): number {
    return writeAll(sink, new Uint8Array([this.n]));
  }

  unmarshalBinary(source: Source): number {
    this.n = readFull(source, 1).bytes[0];
    return 1;
  }
}

class Point {
  x: number;
  y: number;

  constructor(x = 0, y = 0) {
    this.x = x;
    this.y = y;
  }
}

const PointType = t.struct('Point', { x: t.int32, y: t.int32 }, () => new Point());

const Tagged = t.struct('Tagged', {
  id: t.field(t.int64, { bin: 'id' }),
  name: t.string,
  secret: t.field(t.pointer(t.string), { bin: '-' }),
});

interface ListNode {
  value: number;
  next: ListNode | null;
}

const ListNode: Type<ListNode> = t.struct('ListNode', {
  value: t.int32,
  next: t.pointer(t.lazy(() => ListNode)),
});

describe('schema', () => {
  describe('descriptors', () => {
    it('are frozen', () => {
      expect(Object.isFrozen(t.int32)).toBe(true);
      expect(Object.isFrozen(t.slice(t.int8))).toBe(true);
      expect(Object.isFrozen(PointType)).toBe(true);
    });

    it('keep struct fields in declaration order with their tags', () => {
      const d = classify(Tagged);
      expect(d.kind).toBe(Kind.Struct);
      if (d.kind === Kind.Struct) {
        expect(d.fields.map((f) => f.name)).toEqual(['id', 'name', 'secret']);
        expect(d.fields.map((f) => f.tags)).toEqual([{ bin: 'id' }, {}, { bin: '-' }]);
      }
    });

    it('rejects field names that look like array indices', () => {
      expect(() => t.struct('Bad', { '1': t.int8 })).toThrow(TypeError);
      expect(() => t.struct('Fine', { '01': t.int8 })).not.toThrow();
    });

    it('rejects invalid array lengths', () => {
      expect(() => t.array(t.int8, -1)).toThrow(RangeError);
      expect(() => t.array(t.int8, 1.5)).toThrow(RangeError);
      expect(t.array(t.int8, 0)).toEqual({ kind: Kind.Array, elem: t.int8, length: 0 });
    });

    it('names custom types after their class', () => {
      expect(classify(t.custom(Counter))).toMatchObject({ kind: Kind.Custom, name: 'Counter' });
      expect(classify(t.custom(Counter, 'Tally'))).toMatchObject({ name: 'Tally' });
    });
  });

  describe('zero', () => {
    it('returns zero scalars', () => {
      expect(t.zero(t.int32)).toBe(0);
      expect(t.zero(t.uint)).toBe(0n);
      expect(t.zero(t.bool)).toBe(false);
      expect(t.zero(t.string)).toBe('');
      expect(t.zero(t.complex64)).toEqual({ real: 0, imag: 0 });
    });

    it('returns empty containers', () => {
      expect(t.zero(t.bytes)).toEqual(new Uint8Array(0));
      expect(t.zero(t.array(t.uint8, 3))).toEqual([0, 0, 0]);
      expect(t.zero(t.slice(t.int8))).toEqual([]);
      expect(t.zero(t.map(t.string, t.bool))).toEqual(new Map());
      expect(t.zero(t.pointer(t.int8))).toBeNull();
    });

    it('builds structs through their factory', () => {
      const p = t.zero(PointType);
      expect(p).toBeInstanceOf(Point);
      expect(p).toEqual(new Point(0, 0));
      expect(t.zero(Tagged)).toEqual({ id: 0n, name: '', secret: null });
    });

    it('stops at nil pointers in recursive types', () => {
      expect(t.zero(ListNode)).toEqual({ value: 0, next: null });
    });

    it('creates custom instances', () => {
      expect(t.zero(t.custom(Counter))).toBeInstanceOf(Counter);
    });

    it('refuses forbidden kinds', () => {
      expect(() => t.zero(t.any)).toThrow(UnsupportedKindError);
      expect(() => t.zero(t.struct('Holder', { f: t.func }))).toThrow('Unsupported kind: function');
    });
  });

  describe('is', () => {
    it('checks scalar ranges', () => {
      expect(t.is(t.uint8, 255)).toBe(true);
      expect(t.is(t.uint8, 256)).toBe(false);
      expect(t.is(t.int64, 1)).toBe(false);
    });

    it('checks containers element by element', () => {
      expect(t.is(t.slice(t.int16), [1, 2])).toBe(true);
      expect(t.is(t.slice(t.int16), [1, 'x'])).toBe(false);
      expect(t.is(t.array(t.int16, 2), [1])).toBe(false);
      expect(t.is(t.map(t.string, t.bool), new Map([['a', true]]))).toBe(true);
      expect(t.is(t.map(t.string, t.bool), new Map([['a', 1]]))).toBe(false);
    });

    it('accepts null and undefined for pointers', () => {
      expect(t.is(t.pointer(t.int8), null)).toBe(true);
      expect(t.is(t.pointer(t.int8), undefined)).toBe(true);
      expect(t.is(t.pointer(t.int8), 300)).toBe(false);
    });

    it('checks struct fields', () => {
      expect(t.is(PointType, { x: 1, y: 2 })).toBe(true);
      expect(t.is(PointType, { x: 1 })).toBe(false);
      expect(t.is(PointType, null)).toBe(false);
    });

    it('lets hook-bearing values stand for any encodable kind', () => {
      expect(t.is(t.int32, new Counter())).toBe(true);
      expect(t.is(t.custom(Counter), new Counter())).toBe(true);
      expect(t.is(t.custom(Counter), new Point())).toBe(false);
    });

    it('never accepts forbidden kinds', () => {
      expect(t.is(t.any, 1)).toBe(false);
      expect(t.is(t.func, () => 1)).toBe(false);
    });
  });
});
