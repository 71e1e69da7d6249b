/**
 * typed-input - Prompt for typed values until the user enters a valid one
 *
 * @example
 * ```typescript
 * import { input, sequence, request, int, float, close } from 'typed-input';
 *
 * const age = await input(int, 'Age: ');
 *
 * // Custom error handler replaces the default diagnostic
 * const ratio = await input(float, 'Ratio: ', (failure) => {
 *   console.error(`"${failure.input}" is not a number`);
 * });
 *
 * // Several values, asked in order
 * const [width, height] = await sequence(request(int, 'Width: '), request(int, 'Height: '));
 *
 * // Release stdin so the process can exit
 * close();
 *
 * // Or create isolated instances over other streams
 * import { createTypedInput, createReadlineSource } from 'typed-input';
 * const remote = createTypedInput({ lineSource: createReadlineSource(socket), output: socket });
 * ```
 *
 * @packageDocumentation
 */

// Factory for creating isolated instances
export { createTypedInput } from './factory.js';

// Parsers (stateless, shared across instances)
export {
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
  ok,
  fail,
  type IntegerOptions,
  type OneOfOptions,
} from './parsers.js';

// Request descriptors
export { request } from './request.js';

// Line sources
export { createReadlineSource, createScriptedSource, type LineSource } from './line-source.js';

// Errors
export { StreamError, AttemptsExhaustedError, type StreamErrorKind } from './errors.js';

// Engine, for callers that manage their own context
export { requestValue, formatPrompt, normalizeLine, type EngineContext } from './engine.js';

// Types
export type {
  Parser,
  ParserLike,
  ParseResult,
  ParseFailure,
  ErrorHandler,
  OutputChannel,
  InputConfig,
  ResolvedInputConfig,
  RequestOptions,
  ValueRequest,
  ValuesOf,
  RecordOf,
  TypedInputInstance,
} from './types.js';

// Event utilities
export {
  InputEmitter,
  type InputEvents,
  type InputEventHandler,
  formatParseFailure,
  defaultErrorHandler,
  defaultStreamErrorHandler,
  defaultAttemptsExhaustedHandler,
  installDefaultHandlers,
  type DefaultHandlerOptions,
} from './events.js';

// Create the default instance with factory defaults
import { createTypedInput } from './factory.js';

const defaultInstance = createTypedInput();

/**
 * Prompt on stdout and read stdin until a valid value is entered (default instance)
 *
 * @example
 * ```typescript
 * const port = await input(integer({ min: 1, max: 65535 }), 'Port: ');
 * ```
 */
export const input = defaultInstance.input;

/**
 * Ask several values in order (default instance)
 */
export const sequence = defaultInstance.sequence;

/**
 * Ask several values in key order (default instance)
 *
 * @example
 * ```typescript
 * const { name, age } = await record({ name: request(string, 'Name: '), age: request(uint, 'Age: ') });
 * ```
 */
export const record = defaultInstance.record;

/**
 * Update configuration for the default instance
 *
 * @example
 * ```typescript
 * setConfig({ showType: true }); // "Age (integer): "
 * setConfig({ silent: true }); // No default diagnostics
 * ```
 */
export const setConfig = defaultInstance.setConfig;

/**
 * Subscribe to events on the default instance
 */
export const on = defaultInstance.on;

/**
 * Unsubscribe from events on the default instance
 */
export const off = defaultInstance.off;

/**
 * Close stdin for the default instance
 */
export const close = defaultInstance.close;
