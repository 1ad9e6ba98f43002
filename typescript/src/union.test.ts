import { describe, it, expect } from 'vitest';
import { taggedUnion, unitEnum } from './union';
import type { UnionValue, VariantMap } from './union';
import { struct } from './composite';
import { i16, u32, u64, u8, unit } from './primitives';
import {
  InvalidDiscriminantError,
  InvalidValueError,
  TooManyVariantsError,
} from './errors';
import { Reader } from './reader';
import { Writer } from './writer';
import { deserialize, marshal, serialize, unmarshal } from './index';

describe('taggedUnion', () => {
  const variants = { A: unit, B: u32 };
  const Message = taggedUnion(variants);

  it('bounds the size by the largest variant plus one', () => {
    expect(Message.maxSize).toBe(5);
  });

  it('writes only the discriminant for an empty payload', () => {
    expect(marshal(Message, { tag: 'A' })).toEqual(new Uint8Array([0x00]));
  });

  it('writes the discriminant then the payload', () => {
    expect(marshal(Message, { tag: 'B', value: 1 })).toEqual(
      new Uint8Array([0x01, 0x01, 0x00, 0x00, 0x00])
    );
  });

  it('decodes each variant', () => {
    expect(unmarshal(Message, new Uint8Array([0x00]))).toEqual({ tag: 'A', value: undefined });
    expect(unmarshal(Message, new Uint8Array([0x01, 0x01, 0x00, 0x00, 0x00]))).toEqual({
      tag: 'B',
      value: 1,
    });
  });

  it('rejects an unknown discriminant without reading further', () => {
    const reader = new Reader(new Uint8Array([0x02, 0xaa, 0xbb]));
    expect(() => Message.decode(reader)).toThrow(InvalidDiscriminantError);
    expect(reader.position).toBe(1);
  });

  it('rejects an unknown tag on encode', () => {
    const incoming: UnionValue<typeof variants> = JSON.parse('{"tag":"C"}');
    expect(() => marshal(Message, incoming)).toThrow('Unknown variant tag: C');
  });

  it('writes fewer bytes than maxSize for small variants', () => {
    const buf = new Uint8Array(Message.maxSize);
    expect(serialize(Message, { tag: 'A' }, buf)).toBe(1);
    expect(serialize(Message, { tag: 'B', value: 0xffffffff }, buf)).toBe(5);
  });

  it('carries struct payloads', () => {
    const Command = taggedUnion({ Stop: unit, Move: struct({ x: i16, y: i16 }), Wait: u8 });
    const buf = new Uint8Array(Command.maxSize);
    const written = serialize(Command, { tag: 'Move', value: { x: 1, y: -1 } }, buf);
    expect(written).toBe(5);
    expect(buf).toEqual(new Uint8Array([1, 1, 0, 0xff, 0xff]));
    expect(deserialize(Command, buf).value).toEqual({ tag: 'Move', value: { x: 1, y: -1 } });
  });

  it('accepts up to 256 variants', () => {
    const many: VariantMap = {};
    for (let i = 0; i < 256; i++) {
      many[`V${i}`] = unit;
    }
    const Wide = taggedUnion(many);
    expect(Wide.maxSize).toBe(1);
    expect(marshal(Wide, { tag: 'V255', value: undefined })).toEqual(new Uint8Array([255]));
  });

  it('rejects more than 256 variants', () => {
    const many: VariantMap = {};
    for (let i = 0; i < 257; i++) {
      many[`V${i}`] = unit;
    }
    expect(() => taggedUnion(many)).toThrow(TooManyVariantsError);
  });

  it('rejects integer-like tags', () => {
    expect(() => taggedUnion({ Zero: unit, 1: u8 })).toThrow(RangeError);
  });

  it('uses the largest variant for the bound', () => {
    const Sample = taggedUnion({ Small: u8, Big: u64 });
    expect(Sample.maxSize).toBe(9);
    expect(marshal(Sample, { tag: 'Big', value: 1n }).length).toBe(9);
    expect(marshal(Sample, { tag: 'Small', value: 1 }).length).toBe(2);
  });
});

describe('unitEnum', () => {
  const Color = unitEnum(['Red', 'Green', 'Blue']);

  it('encodes the ordinal as one byte', () => {
    expect(Color.maxSize).toBe(1);
    expect(marshal(Color, 'Blue')).toEqual(new Uint8Array([2]));
    expect(unmarshal(Color, new Uint8Array([1]))).toBe('Green');
  });

  it('rejects out-of-range ordinals', () => {
    expect(() => unmarshal(Color, new Uint8Array([3]))).toThrow(InvalidDiscriminantError);
  });

  it('rejects unknown names on encode', () => {
    const writer = new Writer(new Uint8Array(1));
    const incoming: 'Red' | 'Green' | 'Blue' = JSON.parse('"Purple"');
    expect(() => Color.encode(writer, incoming)).toThrow(InvalidValueError);
    expect(writer.position).toBe(0);
  });

  it('rejects duplicate names', () => {
    expect(() => unitEnum(['On', 'Off', 'On'])).toThrow('Duplicate enum name "On"');
  });

  it('rejects more than 256 names', () => {
    const names = Array.from({ length: 257 }, (_, i) => `N${i}`);
    expect(() => unitEnum(names)).toThrow(TooManyVariantsError);
  });
});
