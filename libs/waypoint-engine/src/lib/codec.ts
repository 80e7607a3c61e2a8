import { z } from 'zod';
import { DecodeError, EncodeError } from './errors';

/**
 * Converts a step value to and from its session string. `encode` throws `EncodeError` for values
 * the codec cannot represent, `decode` throws `DecodeError`.
 */
export type Codec<A> = {
  encode(value: A): string;
  decode(raw: string): A;
};

export const stringCodec: Codec<string> = {
  encode: (value) => value,
  decode: (raw) => raw,
};

export const intCodec: Codec<number> = {
  encode: (value) => {
    if (!Number.isSafeInteger(value)) {
      throw new EncodeError(`Expected a safe integer, got ${value}`);
    }
    return String(value);
  },
  decode: (raw) => {
    if (!/^-?\d+$/.test(raw)) {
      throw new DecodeError(`Expected an integer, got "${raw}"`);
    }
    const parsed = Number(raw);
    if (!Number.isSafeInteger(parsed)) {
      throw new DecodeError(`Integer out of range: ${raw}`);
    }
    return parsed;
  },
};

export const booleanCodec: Codec<boolean> = {
  encode: (value) => (value ? 'true' : 'false'),
  decode: (raw) => {
    if (raw === 'true') return true;
    if (raw === 'false') return false;
    throw new DecodeError(`Expected true or false, got "${raw}"`);
  },
};

export const enumCodec = <const V extends readonly [string, ...string[]]>(values: V): Codec<V[number]> => ({
  encode: (value) => value,
  decode: (raw) => {
    const match = values.find((value) => value === raw);
    if (match === undefined) {
      throw new DecodeError(`Expected one of ${values.join(', ')}, got "${raw}"`);
    }
    return match;
  },
});

// Values are stored as JSON and re-validated against the schema on every read.
export const jsonCodec = <S extends z.ZodTypeAny>(schema: S): Codec<z.output<S>> => ({
  encode: (value) => JSON.stringify(value),
  decode: (raw) => {
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new DecodeError(`Stored value is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
    }
    const result = schema.safeParse(parsed);
    if (!result.success) {
      throw new DecodeError('Stored value does not match its schema', undefined, result.error.issues);
    }
    return result.data;
  },
});
