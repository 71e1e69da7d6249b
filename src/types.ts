/**
 * Shared type definitions for typed-input
 */

import type { ZodType } from 'zod';
import type { InputEvents } from './events.js';
import type { LineSource } from './line-source.js';

/**
 * Outcome of parsing one line of text
 */
export type ParseResult<T> = { ok: true; value: T } | { ok: false; reason: string };

/**
 * Per-type parse capability: converts text into a T or explains why it cannot
 */
export interface Parser<T> {
  /** Expected-type description shown in diagnostics, e.g. "integer" */
  readonly name: string;
  parse(text: string): ParseResult<T>;
}

/**
 * Anything accepted where a parser is expected: a Parser or a Zod schema
 */
export type ParserLike<T> = Parser<T> | ZodType<T>;

/**
 * Details of a single failed parse attempt
 */
export interface ParseFailure {
  /** The offending text after terminator stripping (and trimming) */
  input: string;
  /** Name of the expected type */
  expected: string;
  /** Why the parser rejected the text */
  reason: string;
  /** Prompt the text was entered for */
  prompt: string;
  /** 1-based attempt number within the request */
  attempt: number;
}

/**
 * Invoked once per failed parse attempt, before the prompt is shown again
 */
export type ErrorHandler = (failure: ParseFailure) => void | Promise<void>;

/**
 * Anything text can be written to (process.stdout, a socket, a test buffer)
 */
export interface OutputChannel {
  write(text: string): unknown;
}

/**
 * Configuration options (all fields optional for user-facing API)
 */
export interface InputConfig {
  /** Where lines are read from. Defaults to a readline source over stdin, opened on first use */
  lineSource?: LineSource;
  /** Where prompts are written */
  output?: OutputChannel;
  /** Where diagnostics and log lines are written */
  errorOutput?: OutputChannel;
  /** Append the expected type to the prompt: "Age (integer): " */
  showType?: boolean;
  /** Strip surrounding whitespace before parsing. The line terminator is always stripped */
  trim?: boolean;
  /** Give up after this many failed parses. Unset means retry forever */
  maxAttempts?: number;
  /** When true, suppresses default diagnostics and log lines. Custom handlers and listeners still fire. */
  silent?: boolean;
}

/**
 * Resolved configuration (all fields have values after merging defaults)
 */
export interface ResolvedInputConfig {
  lineSource: LineSource | undefined;
  output: OutputChannel;
  errorOutput: OutputChannel;
  showType: boolean;
  trim: boolean;
  maxAttempts: number | undefined;
  silent: boolean;
}

/**
 * Per-request options: a custom error handler, a destination for the value,
 * and config overrides for this request only
 */
export interface RequestOptions<T> extends InputConfig {
  onError?: ErrorHandler;
  /** Receives the value as soon as it is parsed */
  into?(value: T): void;
}

/**
 * One entry of a request list
 */
export interface ValueRequest<T> {
  parser: Parser<T>;
  prompt: string;
  onError?: ErrorHandler;
  into?(value: T): void;
  config?: InputConfig;
}

/**
 * Maps a tuple of requests to the tuple of their values
 */
export type ValuesOf<R extends readonly ValueRequest<unknown>[]> = {
  -readonly [K in keyof R]: R[K] extends ValueRequest<infer T> ? T : never;
};

/**
 * Maps a keyed set of requests to an object of their values
 */
export type RecordOf<R extends Record<string, ValueRequest<unknown>>> = {
  [K in keyof R]: R[K] extends ValueRequest<infer T> ? T : never;
};

/**
 * A typed-input instance with its own configuration, events and input queue
 */
export interface TypedInputInstance {
  /**
   * Prompt until one valid value is entered.
   * Zod schemas get the raw text: use `z.coerce.number()`, not `z.number()`.
   */
  input<T>(parser: ParserLike<T>, prompt: string, handler?: ErrorHandler | RequestOptions<T>): Promise<T>;
  /** Run requests in order; resolves to their values as a tuple */
  sequence<R extends ValueRequest<unknown>[]>(...requests: R): Promise<ValuesOf<R>>;
  /** Run requests in key order; resolves to an object keyed like the input */
  record<R extends Record<string, ValueRequest<unknown>>>(requests: R): Promise<RecordOf<R>>;
  /** Update the instance configuration */
  setConfig(config: InputConfig): void;
  /** Subscribe to an event */
  on<K extends keyof InputEvents>(event: K, handler: (...args: InputEvents[K]) => void): void;
  /** Unsubscribe from an event */
  off<K extends keyof InputEvents>(event: K, handler: (...args: InputEvents[K]) => void): void;
  /** Close the line source this instance opened itself */
  close(): void;
}

// Re-export event types for convenience
export type { InputEvents } from './events.js';
