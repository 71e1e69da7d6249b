import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import {
  int,
  uint,
  float,
  bool,
  string,
  char,
  bigint,
  integer,
  oneOf,
  createParser,
  fromZod,
  resolveParser,
  isZodSchema,
} from '../parsers.js';

describe('integer parsers', () => {
  it('parses signed integers', () => {
    expect(int.parse('42')).toEqual({ ok: true, value: 42 });
    expect(int.parse('-17')).toEqual({ ok: true, value: -17 });
    expect(int.parse('+8')).toEqual({ ok: true, value: 8 });
  });

  it('reads "-0" as 0', () => {
    const result = int.parse('-0');
    expect(result.ok && Object.is(result.value, 0)).toBe(true);
  });

  it('rejects empty text', () => {
    expect(int.parse('')).toEqual({ ok: false, reason: 'cannot parse integer from empty string' });
  });

  it('rejects non-digit text', () => {
    expect(int.parse('abc')).toEqual({ ok: false, reason: 'invalid digit found in string' });
    expect(int.parse('4.5')).toEqual({ ok: false, reason: 'invalid digit found in string' });
    expect(int.parse('1e3')).toEqual({ ok: false, reason: 'invalid digit found in string' });
    expect(int.parse(' 5')).toEqual({ ok: false, reason: 'invalid digit found in string' });
  });

  it('rejects values beyond safe integer range', () => {
    expect(int.parse('99999999999999999999')).toEqual({
      ok: false,
      reason: 'number too large to fit in target type',
    });
  });

  it('uint rejects negatives', () => {
    expect(uint.name).toBe('unsigned integer');
    expect(uint.parse('-1')).toEqual({ ok: false, reason: 'number too small to fit in target type' });
    expect(uint.parse('0')).toEqual({ ok: true, value: 0 });
  });

  it('integer() applies bounds and name', () => {
    const port = integer({ min: 1, max: 65535, name: 'port' });
    expect(port.name).toBe('port');
    expect(port.parse('8080')).toEqual({ ok: true, value: 8080 });
    expect(port.parse('0')).toEqual({ ok: false, reason: 'number too small to fit in target type' });
    expect(port.parse('70000')).toEqual({ ok: false, reason: 'number too large to fit in target type' });
  });

  it('integer() rejects inverted bounds', () => {
    expect(() => integer({ min: 5, max: 1 })).toThrow('integer bounds must be safe integers with min <= max');
  });
});

describe('float', () => {
  it('parses decimal and exponent notation', () => {
    expect(float.parse('2.5')).toEqual({ ok: true, value: 2.5 });
    expect(float.parse('-.5')).toEqual({ ok: true, value: -0.5 });
    expect(float.parse('5.')).toEqual({ ok: true, value: 5 });
    expect(float.parse('1e3')).toEqual({ ok: true, value: 1000 });
    expect(float.parse('7')).toEqual({ ok: true, value: 7 });
  });

  it('parses infinities and nan', () => {
    expect(float.parse('inf')).toEqual({ ok: true, value: Infinity });
    expect(float.parse('-Infinity')).toEqual({ ok: true, value: -Infinity });
    const nan = float.parse('NaN');
    expect(nan.ok && Number.isNaN(nan.value)).toBe(true);
  });

  it('rejects malformed text', () => {
    expect(float.parse('xyz')).toEqual({ ok: false, reason: 'invalid float literal' });
    expect(float.parse('.')).toEqual({ ok: false, reason: 'invalid float literal' });
    expect(float.parse('1e')).toEqual({ ok: false, reason: 'invalid float literal' });
    expect(float.parse('0x10')).toEqual({ ok: false, reason: 'invalid float literal' });
    expect(float.parse('')).toEqual({ ok: false, reason: 'cannot parse float from empty string' });
  });
});

describe('bool, string, char, bigint', () => {
  it('bool accepts exactly true and false', () => {
    expect(bool.parse('true')).toEqual({ ok: true, value: true });
    expect(bool.parse('false')).toEqual({ ok: true, value: false });
    expect(bool.parse('True')).toEqual({ ok: false, reason: 'provided string was not `true` or `false`' });
  });

  it('string accepts anything', () => {
    expect(string.parse('')).toEqual({ ok: true, value: '' });
    expect(string.parse('hello world')).toEqual({ ok: true, value: 'hello world' });
  });

  it('char accepts a single code point', () => {
    expect(char.parse('x')).toEqual({ ok: true, value: 'x' });
    expect(char.parse('😀')).toEqual({ ok: true, value: '😀' });
    expect(char.parse('xy')).toEqual({ ok: false, reason: 'too many characters in string' });
    expect(char.parse('')).toEqual({ ok: false, reason: 'cannot parse char from empty string' });
  });

  it('bigint parses beyond safe integer range', () => {
    expect(bigint.parse('123456789012345678901234567890')).toEqual({
      ok: true,
      value: 123456789012345678901234567890n,
    });
    expect(bigint.parse('+5')).toEqual({ ok: true, value: 5n });
    expect(bigint.parse('5n')).toEqual({ ok: false, reason: 'invalid digit found in string' });
  });
});

describe('oneOf', () => {
  it('returns the matching choice', () => {
    const color = oneOf(['red', 'green']);
    expect(color.name).toBe('red|green');
    expect(color.parse('green')).toEqual({ ok: true, value: 'green' });
    expect(color.parse('GREEN')).toEqual({ ok: false, reason: 'expected one of: red, green' });
  });

  it('returns the canonical choice when ignoring case', () => {
    const answer = oneOf(['Yes', 'No'], { ignoreCase: true, name: 'answer' });
    expect(answer.name).toBe('answer');
    expect(answer.parse('yes')).toEqual({ ok: true, value: 'Yes' });
  });

  it('requires at least one choice', () => {
    expect(() => oneOf([])).toThrow('oneOf requires at least one choice');
  });
});

describe('createParser', () => {
  it('wraps a conversion function', () => {
    const upper = createParser('upper', (text) => text.toUpperCase());
    expect(upper.name).toBe('upper');
    expect(upper.parse('abc')).toEqual({ ok: true, value: 'ABC' });
  });

  it('turns thrown errors into failures', () => {
    const even = createParser('even number', (text) => {
      const n = Number(text);
      if (!Number.isInteger(n) || n % 2 !== 0) throw new Error(`${text} is not even`);
      return n;
    });
    expect(even.parse('4')).toEqual({ ok: true, value: 4 });
    expect(even.parse('3')).toEqual({ ok: false, reason: '3 is not even' });
  });

  it('stringifies non-Error throws', () => {
    const broken = createParser('broken', () => {
      throw 'nope';
    });
    expect(broken.parse('x')).toEqual({ ok: false, reason: 'nope' });
  });
});

describe('zod schemas', () => {
  it('detects zod schemas', () => {
    expect(isZodSchema(z.string())).toBe(true);
    expect(isZodSchema(int)).toBe(false);
  });

  it('fromZod parses with the schema', () => {
    const age = fromZod(z.coerce.number().int().min(0), 'age');
    expect(age.name).toBe('age');
    expect(age.parse('36')).toEqual({ ok: true, value: 36 });
    expect(age.parse('-1').ok).toBe(false);
  });

  it('fromZod names the parser from the schema description', () => {
    expect(fromZod(z.string().describe('nickname')).name).toBe('nickname');
    expect(fromZod(z.string()).name).toBe('string');
    expect(fromZod(z.number()).name).toBe('number');
  });

  it('fromZod turns exceptions thrown by the schema into failures', () => {
    const json = fromZod(z.string().transform((s): unknown => JSON.parse(s)), 'JSON');
    const bad = json.parse('{bad');
    expect(bad.ok).toBe(false);
    expect(bad.ok ? '' : bad.reason).toMatch(/JSON/);
    expect(json.parse('{"a":1}')).toEqual({ ok: true, value: { a: 1 } });
  });

  it('fromZod reports the issue message', () => {
    const short = fromZod(z.string().max(3, 'at most 3 characters'));
    expect(short.parse('abcd')).toEqual({ ok: false, reason: 'at most 3 characters' });
  });

  it('resolveParser passes parsers through and wraps schemas', () => {
    expect(resolveParser(int)).toBe(int);
    const resolved = resolveParser(z.coerce.number());
    expect(resolved.parse('2.5')).toEqual({ ok: true, value: 2.5 });
  });
});
