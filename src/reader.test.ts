import { describe, it, expect } from 'vitest';
import { Reader, readFull, Source } from './reader';

describe('Reader', () => {
  it('hands out bytes in order', () => {
    const reader = new Reader(new Uint8Array([1, 2, 3]));
    const into = new Uint8Array(2);
    expect(reader.read(into)).toBe(2);
    expect(into).toEqual(new Uint8Array([1, 2]));
    expect(reader.position).toBe(2);
    expect(reader.remaining).toBe(1);
    expect(reader.hasMore).toBe(true);
  });

  it('returns 0 at the end', () => {
    const reader = new Reader(new Uint8Array([1]));
    reader.read(new Uint8Array(1));
    expect(reader.hasMore).toBe(false);
    expect(reader.read(new Uint8Array(1))).toBe(0);
  });

  it('limits each read to chunkSize', () => {
    const reader = new Reader(new Uint8Array([1, 2, 3]), { chunkSize: 2 });
    const into = new Uint8Array(3);
    expect(reader.read(into)).toBe(2);
    expect(into).toEqual(new Uint8Array([1, 2, 0]));
  });

  it('resets to the beginning', () => {
    const reader = new Reader(new Uint8Array([4, 5]));
    reader.read(new Uint8Array(2));
    reader.reset();
    expect(reader.position).toBe(0);
    expect(reader.remaining).toBe(2);
  });
});

describe('readFull', () => {
  it('keeps reading until the requested length arrived', () => {
    const reader = new Reader(new Uint8Array([1, 2, 3, 4, 5]), { chunkSize: 2 });
    const { bytes, count } = readFull(reader, 5);
    expect(count).toBe(5);
    expect(bytes).toEqual(new Uint8Array([1, 2, 3, 4, 5]));
  });

  it('zero-fills past the end of the source', () => {
    const reader = new Reader(new Uint8Array([9, 8]));
    const { bytes, count } = readFull(reader, 4);
    expect(count).toBe(2);
    expect(bytes).toEqual(new Uint8Array([9, 8, 0, 0]));
  });

  it('stops at the first empty read', () => {
    let calls = 0;
    const source: Source = {
      read(into: Uint8Array): number {
        calls++;
        if (calls > 1) {
          return 0;
        }
        into[0] = 0xaa;
        return 1;
      },
    };
    const { bytes, count } = readFull(source, 3);
    expect(count).toBe(1);
    expect(bytes).toEqual(new Uint8Array([0xaa, 0, 0]));
    expect(calls).toBe(2);
  });

  it('reads nothing for a zero length', () => {
    const reader = new Reader(new Uint8Array([1]));
    expect(readFull(reader, 0).count).toBe(0);
    expect(reader.position).toBe(0);
  });
});
