import { z } from 'zod';
import { booleanCodec, enumCodec, intCodec, jsonCodec, stringCodec } from './codec';
import { DecodeError, EncodeError } from './errors';

describe('codecs', () => {
  it('stores strings as they are', () => {
    expect(stringCodec.encode('Alice')).toBe('Alice');
    expect(stringCodec.decode('Alice')).toBe('Alice');
  });

  it('round trips integers', () => {
    for (const value of [0, 30, -7, Number.MAX_SAFE_INTEGER]) {
      expect(intCodec.decode(intCodec.encode(value))).toBe(value);
    }
    expect(intCodec.encode(30)).toBe('30');
  });

  it('refuses to encode numbers that are not safe integers', () => {
    expect(() => intCodec.encode(2.5)).toThrow(EncodeError);
    expect(() => intCodec.encode(2.5)).toThrow('Expected a safe integer, got 2.5');
    expect(() => intCodec.encode(Number.NaN)).toThrow('Expected a safe integer, got NaN');
    expect(() => intCodec.encode(Number.POSITIVE_INFINITY)).toThrow('Expected a safe integer, got Infinity');
    expect(() => intCodec.encode(1e21)).toThrow(EncodeError);
  });

  it('rejects malformed integers', () => {
    expect(() => intCodec.decode('thirty')).toThrow(DecodeError);
    expect(() => intCodec.decode('3.5')).toThrow('Expected an integer, got "3.5"');
    expect(() => intCodec.decode('99999999999999999999')).toThrow('Integer out of range: 99999999999999999999');
  });

  it('round trips booleans and rejects anything else', () => {
    expect(booleanCodec.decode(booleanCodec.encode(true))).toBe(true);
    expect(booleanCodec.decode(booleanCodec.encode(false))).toBe(false);
    expect(() => booleanCodec.decode('yes')).toThrow(DecodeError);
  });

  it('only accepts declared enum members', () => {
    const codec = enumCodec(['personal', 'business'] as const);

    expect(codec.decode('business')).toBe('business');
    expect(() => codec.decode('charity')).toThrow('Expected one of personal, business, got "charity"');
  });

  it('validates json values against their schema', () => {
    const codec = jsonCodec(z.object({ firstName: z.string(), age: z.number().int() }));
    const value = { firstName: 'Alice', age: 30 };

    expect(codec.encode(value)).toBe('{"firstName":"Alice","age":30}');
    expect(codec.decode(codec.encode(value))).toEqual(value);
  });

  it('reports unparseable and mismatching json as decode errors', () => {
    const codec = jsonCodec(z.object({ firstName: z.string() }));

    expect(() => codec.decode('{nope')).toThrow(DecodeError);
    let caught: unknown;
    try {
      codec.decode('{"firstName":42}');
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(DecodeError);
    expect(caught).toMatchObject({ code: 'decode_failed', message: 'Stored value does not match its schema' });
  });
});
