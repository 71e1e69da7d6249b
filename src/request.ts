/**
 * Request descriptors for asking several values in one call
 *
 * @example
 * ```typescript
 * const [age, height] = await sequence(
 *   request(int, 'Age: '),
 *   request(float, 'Height in meters: ', (failure) => console.error(`${failure.input}? try again`)),
 * );
 * ```
 */

import { resolveParser } from './parsers.js';
import type { ErrorHandler, InputConfig, ParserLike, RequestOptions, ValueRequest } from './types.js';

/**
 * Split the third argument of input()/request() into handler, destination and config
 */
export function splitRequestOptions<T>(handlerOrOptions?: ErrorHandler | RequestOptions<T>): {
  onError?: ErrorHandler;
  into?: (value: T) => void;
  config: InputConfig;
} {
  if (handlerOrOptions === undefined) {
    return { config: {} };
  }
  if (typeof handlerOrOptions === 'function') {
    return { onError: handlerOrOptions, config: {} };
  }
  const { onError, into, ...config } = handlerOrOptions;
  return { onError, into, config };
}

/**
 * Describe one value to ask for
 *
 * @param parser - Parser or Zod schema for the value. Schemas receive the raw text,
 *   so non-string types need `z.coerce`
 * @param prompt - Text shown before each attempt
 * @param handlerOrOptions - Custom error handler, or options with `onError`, `into` and config overrides
 */
export function request<T>(
  parser: ParserLike<T>,
  prompt: string,
  handlerOrOptions?: ErrorHandler | RequestOptions<T>,
): ValueRequest<T> {
  const { onError, into, config } = splitRequestOptions(handlerOrOptions);
  return { parser: resolveParser(parser), prompt, onError, into, config };
}
