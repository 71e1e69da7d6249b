/**
 * Built-in parsers and helpers for defining new ones
 *
 * A parser pairs a type name with a parse function that never throws:
 * it returns either the value or a reason the text was rejected.
 *
 * @example
 * ```typescript
 * const port = integer({ min: 1, max: 65535, name: 'port' });
 * const url = createParser('URL', (text) => new URL(text));
 * const age = fromZod(z.coerce.number().int().min(0), 'age');
 * ```
 */

import type { ZodType } from 'zod';
import type { Parser, ParserLike, ParseResult } from './types.js';

export function ok<T>(value: T): ParseResult<T> {
  return { ok: true, value };
}

export function fail<T = never>(reason: string): ParseResult<T> {
  return { ok: false, reason };
}

const INTEGER_PATTERN = /^[+-]?\d+$/;
const FLOAT_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const FLOAT_SPECIAL_PATTERN = /^([+-]?)(inf|infinity|nan)$/i;

/**
 * Options for integer()
 */
export interface IntegerOptions {
  /** Smallest accepted value (inclusive) */
  min?: number;
  /** Largest accepted value (inclusive) */
  max?: number;
  /** Type name for diagnostics */
  name?: string;
}

/**
 * Integer parser with optional bounds. Accepts an optional sign followed by digits.
 */
export function integer(options: IntegerOptions = {}): Parser<number> {
  const min = options.min ?? Number.MIN_SAFE_INTEGER;
  const max = options.max ?? Number.MAX_SAFE_INTEGER;
  if (!Number.isSafeInteger(min) || !Number.isSafeInteger(max) || min > max) {
    throw new Error('integer bounds must be safe integers with min <= max');
  }

  return {
    name: options.name ?? 'integer',
    parse(text) {
      if (text === '') return fail('cannot parse integer from empty string');
      if (!INTEGER_PATTERN.test(text)) return fail('invalid digit found in string');
      const value = Number(text);
      if (value > max) return fail('number too large to fit in target type');
      if (value < min) return fail('number too small to fit in target type');
      // -0 from "-0" reads back as 0
      return ok(value === 0 ? 0 : value);
    },
  };
}

export const int: Parser<number> = integer();

export const uint: Parser<number> = integer({ min: 0, name: 'unsigned integer' });

/**
 * Floating point parser. Accepts decimal and exponent notation plus inf, infinity and nan.
 */
export const float: Parser<number> = {
  name: 'float',
  parse(text) {
    if (text === '') return fail('cannot parse float from empty string');
    const special = FLOAT_SPECIAL_PATTERN.exec(text);
    if (special) {
      if (special[2].toLowerCase() === 'nan') return ok(Number.NaN);
      return ok(special[1] === '-' ? Number.NEGATIVE_INFINITY : Number.POSITIVE_INFINITY);
    }
    if (!FLOAT_PATTERN.test(text)) return fail('invalid float literal');
    return ok(Number(text));
  },
};

/**
 * Boolean parser: exactly "true" or "false"
 */
export const bool: Parser<boolean> = {
  name: 'boolean',
  parse(text) {
    if (text === 'true') return ok(true);
    if (text === 'false') return ok(false);
    return fail('provided string was not `true` or `false`');
  },
};

/**
 * Accepts any text, including the empty string
 */
export const string: Parser<string> = {
  name: 'string',
  parse: (text) => ok(text),
};

/**
 * Exactly one character (one code point)
 */
export const char: Parser<string> = {
  name: 'char',
  parse(text) {
    const chars = Array.from(text);
    if (chars.length === 0) return fail('cannot parse char from empty string');
    if (chars.length > 1) return fail('too many characters in string');
    return ok(chars[0]);
  },
};

/**
 * Arbitrary-precision integer
 */
export const bigint: Parser<bigint> = {
  name: 'bigint',
  parse(text) {
    if (text === '') return fail('cannot parse integer from empty string');
    if (!INTEGER_PATTERN.test(text)) return fail('invalid digit found in string');
    return ok(BigInt(text.startsWith('+') ? text.slice(1) : text));
  },
};

/**
 * Options for oneOf()
 */
export interface OneOfOptions {
  /** Match regardless of letter case; the canonical choice is returned */
  ignoreCase?: boolean;
  /** Type name for diagnostics. Defaults to the choices joined with "|" */
  name?: string;
}

/**
 * Accepts one of a fixed set of strings
 */
export function oneOf<T extends string>(choices: readonly T[], options: OneOfOptions = {}): Parser<T> {
  if (choices.length === 0) {
    throw new Error('oneOf requires at least one choice');
  }
  const normalize = (s: string) => (options.ignoreCase ? s.toLowerCase() : s);

  return {
    name: options.name ?? choices.join('|'),
    parse(text) {
      const match = choices.find((choice) => normalize(choice) === normalize(text));
      if (match === undefined) return fail(`expected one of: ${choices.join(', ')}`);
      return ok(match);
    },
  };
}

/**
 * Build a parser from a conversion function.
 * Anything the function throws becomes a parse failure with the error's message.
 */
export function createParser<T>(name: string, convert: (text: string) => T): Parser<T> {
  return {
    name,
    parse(text) {
      try {
        return ok(convert(text));
      } catch (err) {
        return fail(err instanceof Error ? err.message : String(err));
      }
    },
  };
}

/**
 * Check if a value is a Zod schema
 */
export function isZodSchema<T>(value: ParserLike<T>): value is ZodType<T> {
  return value !== null && typeof value === 'object' && '_def' in value;
}

/**
 * Use a Zod schema as a parser. The schema receives the raw text, so
 * non-string types need coercion: `z.coerce.number()`. A plain `z.number()`
 * rejects every line.
 *
 * The type name is `name`, else the schema's description, else its Zod type ("number").
 * Exceptions thrown inside the schema (a throwing transform) become parse failures.
 */
export function fromZod<T>(schema: ZodType<T>, name?: string): Parser<T> {
  return {
    name: name ?? schema.description ?? schema.def.type,
    parse(text) {
      try {
        const result = schema.safeParse(text);
        if (result.success) return ok(result.data);
        return fail(result.error.issues.map((issue) => issue.message).join('; '));
      } catch (err) {
        return fail(err instanceof Error ? err.message : String(err));
      }
    },
  };
}

/**
 * Resolve a Parser or Zod schema into a Parser
 */
export function resolveParser<T>(parser: ParserLike<T>): Parser<T> {
  if (isZodSchema(parser)) {
    return fromZod(parser);
  }
  return parser;
}
