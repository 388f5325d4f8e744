/**
 * Wire-format tests against golden vectors.
 *
 * Each vector is the exact encoding of a fixture value below; the tests
 * check both directions so layout changes show up as failures here.
 */

import { describe, it, expect, beforeAll } from 'vitest';
import * as fs from 'fs';
import { fileURLToPath } from 'url';
import {
  Decoder,
  Encoder,
  type Infer,
  type Type,
  Reader,
  type Source,
  type Sink,
  Writer,
  marshal,
  marshalOnly,
  newEncoderWithTags,
  readFull,
  refOf,
  t,
  unmarshal,
  unmarshalOnly,
  writeAll,
} from '../../src';

const GOLDEN_FILE = fileURLToPath(new URL('../golden/vectors.json', import.meta.url));

let vectors: Record<string, string> = {};

function golden(name: string): Uint8Array {
  const hex = vectors[name];
  if (hex === undefined) {
    throw new Error(`Golden vector not found: ${name}`);
  }
  return new Uint8Array(Buffer.from(hex, 'hex'));
}

const hex = (data: Uint8Array): string => Buffer.from(data).toString('hex');

// Fixtures

const Account = t.struct('Account', {
  Id: t.int,
  Name: t.string,
  SomeFlag: t.bool,
});

const MyStruct = t.struct('MyStruct', {
  A: t.field(t.int, { test: 'fieldA' }),
  B: t.field(t.string, { test: 'b' }),
  C: t.field(t.pointer(t.string), { test: 'cc' }),
  D: t.field(t.bool, { test: '-' }),
  E: t.string,
});

const myStruct: Infer<typeof MyStruct> = { A: 1n, B: 'yada', C: 'yada', D: true, E: '' };

class MyInt {
  value: bigint;

  constructor(value: bigint = 0n) {
    this.value = value;
  }

  marshalBinary(sink: Sink): number {
    const b = new Uint8Array(8);
    new DataView(b.buffer).setBigUint64(0, this.value);
    return writeAll(sink, b);
  }

  unmarshalBinary(source: Source): number {
    const { bytes } = readFull(source, 8);
    this.value = new DataView(bytes.buffer).getBigUint64(0);
    return 8;
  }
}

const Item = t.struct('Item', { sku: t.string, qty: t.uint16 });

const Order = t.struct('Order', {
  id: t.uint32,
  items: t.slice(Item),
  notes: t.map(t.string, t.bool),
  discount: t.pointer(t.float32),
  total: t.float64,
});

const order: Infer<typeof Order> = {
  id: 7,
  items: [{ sku: 'ab', qty: 2 }],
  notes: new Map([['x', true]]),
  discount: 0.5,
  total: 1,
};

function encode4<T>(value: T, type: Type<T>): string {
  const writer = new Writer();
  new Encoder(writer, { lengthPrefix: 4 }).encode(value, type);
  return hex(writer.bytes());
}

describe('Golden vectors', () => {
  beforeAll(() => {
    vectors = JSON.parse(fs.readFileSync(GOLDEN_FILE, 'utf8'));
  });

  describe('encoding', () => {
    it('account', () => {
      expect(hex(marshal({ Id: 1n, Name: 'some Name', SomeFlag: true }, Account))).toBe(hex(golden('account')));
    });

    it('myStruct', () => {
      expect(hex(marshal(myStruct, MyStruct))).toBe(hex(golden('myStruct')));
    });

    it('myStruct, only tagged', () => {
      expect(hex(marshalOnly(myStruct, 'test', MyStruct))).toBe(hex(golden('myStructOnlyTagged')));
    });

    it('4-byte length prefixes', () => {
      expect(encode4(myStruct, MyStruct)).toBe(hex(golden('myStructPrefix4')));
      expect(encode4('testString', t.string)).toBe(hex(golden('stringPrefix4')));
      expect(encode4([0, 1, 2, 3, 4], t.slice(t.uint16))).toBe(hex(golden('slicePrefix4')));
      expect(encode4(new Map([['a', 1]]), t.map(t.string, t.uint16))).toBe(hex(golden('mapPrefix4')));
    });

    it('custom hook', () => {
      expect(hex(marshal(new MyInt(11n), t.custom(MyInt)))).toBe(hex(golden('myInt')));
    });

    it('nested order', () => {
      expect(hex(marshal(order, Order))).toBe(hex(golden('order')));
    });
  });

  describe('decoding', () => {
    it('account', () => {
      const data = golden('account');
      const target = refOf(Account);
      const used = unmarshal(data, target, Account);
      expect(`parsed ${used} bytes of ${data.length}`).toBe('parsed 26 bytes of 26');
      expect(target.value).toEqual({ Id: 1n, Name: 'some Name', SomeFlag: true });
    });

    it('myStruct', () => {
      const target = refOf(MyStruct);
      unmarshal(golden('myStruct'), target, MyStruct);
      expect(target.value).toEqual(myStruct);
    });

    it('myStruct, only tagged', () => {
      const target = refOf(MyStruct);
      unmarshalOnly(golden('myStructOnlyTagged'), target, 'test', MyStruct);
      expect(target.value).toEqual({ A: 1n, B: 'yada', C: 'yada', D: false, E: '' });
    });

    it('4-byte length prefixes', () => {
      const target = refOf(t.map(t.string, t.uint16));
      new Decoder(new Reader(golden('mapPrefix4')), { lengthPrefix: 4 }).decode(target, t.map(t.string, t.uint16));
      expect(target.value).toEqual(new Map([['a', 1]]));
    });

    it('custom hook', () => {
      const target = refOf(t.custom(MyInt));
      unmarshal(golden('myInt'), target, t.custom(MyInt));
      expect(target.value.value).toBe(11n);
    });

    it('nested order', () => {
      const data = golden('order');
      const target = refOf(Order);
      expect(unmarshal(data, target, Order)).toBe(data.length);
      expect(target.value).toEqual(order);
    });
  });
});

describe('Mismatched sessions', () => {
  it('zero-fills fields an only-tagged encoder left out', () => {
    const Tagged = t.struct('Tagged', {
      Id: t.field(t.int, { someTag: '+' }),
      Name: t.field(t.string, { someTag: 'aaaaaa' }),
      SomeFlag: t.field(t.bool, { someTag: '-' }),
    });

    const writer = new Writer();
    newEncoderWithTags(writer, 'someTag').encode({ Id: 1n, Name: 'some Name', SomeFlag: true }, Tagged);
    expect(writer.position).toBe(25);

    const target = refOf(Tagged);
    const decoder = new Decoder(new Reader(writer.bytes()));
    decoder.decode(target, Tagged);
    expect(target.value).toEqual({ Id: 1n, Name: 'some Name', SomeFlag: false });
    expect(decoder.bytesRead).toBe(25);
  });
});
